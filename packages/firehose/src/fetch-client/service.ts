/**
 * FetchClient service - single-block fetches.
 *
 * @module
 */
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import { makeRetrySchedule, RetryPolicy } from "../config.ts"
import type { Displayable, FromResponse } from "../conversion/from-response.ts"
import type { SingleBlockRequest } from "../request/single-block-request.ts"
import type { SingleBlockResponse } from "../response/response.ts"
import type { TransportError } from "../transport/errors.ts"
import { Transport } from "../transport/service.ts"

// =============================================================================
// Service Interface
// =============================================================================

export interface FetchClientService {
  /**
   * Fetches the raw response for a single block. Retryable failures are
   * retried following the `RetryPolicy`.
   */
  readonly fetch: (request: SingleBlockRequest) => Effect.Effect<SingleBlockResponse, TransportError>

  /**
   * Fetches a single block and converts it with `decoder`. A conversion
   * failure fails the effect with the decoder's error.
   */
  readonly fetchBlock: <A, E extends Displayable>(
    request: SingleBlockRequest,
    decoder: FromResponse<A, E>
  ) => Effect.Effect<A, TransportError | E>
}

// =============================================================================
// Context.Tag
// =============================================================================

export class FetchClient extends Context.Tag("Firehose/FetchClient")<
  FetchClient,
  FetchClientService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const make = Effect.gen(function*() {
  const transport = yield* Transport

  const fetch = Effect.fn("FetchClient.fetch")(function*(request: SingleBlockRequest) {
    const policy = yield* RetryPolicy
    return yield* transport.block(request).pipe(
      Effect.tapError((error) => Effect.logWarning("Firehose fetch failed", error)),
      Effect.retry(makeRetrySchedule(policy))
    )
  })

  const fetchBlock = <A, E extends Displayable>(
    request: SingleBlockRequest,
    decoder: FromResponse<A, E>
  ): Effect.Effect<A, TransportError | E> =>
    fetch(request).pipe(
      Effect.flatMap((response) => decoder.fromResponse(response)),
      Effect.withSpan("FetchClient.fetchBlock")
    )

  return { fetch, fetchBlock } satisfies FetchClientService
})

// =============================================================================
// Layer
// =============================================================================

/**
 * Layer providing FetchClient. Requires a Transport.
 */
export const layer: Layer.Layer<FetchClient, never, Transport> = Layer.effect(FetchClient, make)
