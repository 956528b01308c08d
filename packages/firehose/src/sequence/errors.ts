/**
 * Error types for sequence checks.
 *
 * @module
 */
import * as Schema from "effect/Schema"

/**
 * One or more blocks are missing between two consecutive blocks.
 */
export class GapError extends Schema.TaggedError<GapError>(
  "Firehose/Sequence/GapError"
)("GapError", {
  expected: Schema.BigIntFromSelf,
  actual: Schema.BigIntFromSelf
}) {
  override get message(): string {
    return `Gap in block sequence: expected ${this.expected}, got ${this.actual}`
  }
}

/**
 * A block is not above the block which preceded it.
 */
export class OutOfOrderError extends Schema.TaggedError<OutOfOrderError>(
  "Firehose/Sequence/OutOfOrderError"
)("OutOfOrderError", {
  previous: Schema.BigIntFromSelf,
  actual: Schema.BigIntFromSelf
}) {
  override get message(): string {
    return `Block ${this.actual} received after block ${this.previous}`
  }
}

export type SequenceError = GapError | OutOfOrderError
