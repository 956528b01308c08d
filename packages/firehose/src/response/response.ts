/**
 * Response messages produced by the streaming and fetch endpoints.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { BlockMetadata, Cursor, ForkStep, Payload } from "../core/domain.ts"

/**
 * One element of a block stream.
 *
 * Carries the fork step of the block, the cursor to resume right after it and
 * the opaque block payload.
 */
export class Response extends Schema.TaggedClass<Response>(
  "Firehose/Response"
)("Response", {
  step: ForkStep,
  cursor: Cursor,
  block: Schema.optional(Payload),
  metadata: Schema.optional(BlockMetadata)
}) {}

/**
 * The answer to a single-block fetch. There is no fork step: the block is
 * reported as the server currently knows it.
 */
export class SingleBlockResponse extends Schema.TaggedClass<SingleBlockResponse>(
  "Firehose/SingleBlockResponse"
)("SingleBlockResponse", {
  block: Schema.optional(Payload),
  metadata: Schema.optional(BlockMetadata)
}) {}

/**
 * Any response which carries a block payload.
 */
export type BlockEnvelope = Response | SingleBlockResponse
