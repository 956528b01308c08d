/**
 * The transport seam between the clients and the network.
 *
 * @module
 */
import * as Context from "effect/Context"
import type * as Effect from "effect/Effect"
import type * as Stream from "effect/Stream"
import type { SingleBlockRequest } from "../request/single-block-request.ts"
import type { Request } from "../request/stream-request.ts"
import type { Response, SingleBlockResponse } from "../response/response.ts"
import type { TransportError } from "./errors.ts"

// =============================================================================
// Service Interface
// =============================================================================

export interface TransportService {
  /**
   * Opens a block stream.
   *
   * Nothing is sent until the stream is run. Once it ends or fails it cannot
   * be resumed: run `blocks` again with a request carrying the last cursor.
   * The stream ends on its own when the request has a stop block.
   */
  readonly blocks: (request: Request) => Stream.Stream<Response, TransportError>

  /**
   * Fetches a single block.
   */
  readonly block: (request: SingleBlockRequest) => Effect.Effect<SingleBlockResponse, TransportError>
}

// =============================================================================
// Context.Tag
// =============================================================================

/**
 * A service which carries requests to a Firehose server.
 */
export class Transport extends Context.Tag("Firehose/Transport")<
  Transport,
  TransportService
>() {}
