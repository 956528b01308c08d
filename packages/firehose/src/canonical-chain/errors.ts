/**
 * Error types for canonical chain bookkeeping.
 *
 * @module
 */
import * as Schema from "effect/Schema"

/**
 * A fork step which cannot be applied to the current chain, such as a `New`
 * block at or below the tip which is not the tip, or an `Undo` of a block
 * which is not the tip.
 */
export class ForkSequenceError extends Schema.TaggedError<ForkSequenceError>(
  "Firehose/CanonicalChain/ForkSequenceError"
)("ForkSequenceError", {
  step: Schema.Literal("New", "Undo", "Final"),
  number: Schema.BigIntFromSelf,
  id: Schema.String,
  tip: Schema.optional(Schema.BigIntFromSelf)
}) {
  override get message(): string {
    const tip = this.tip === undefined ? "an empty chain" : `tip ${this.tip}`
    return `Cannot apply ${this.step} of block ${this.number} (${this.id}) to ${tip}`
  }
}

/**
 * An `Undo` step for a block at or below the last final block.
 */
export class UndoFinalizedBlockError extends Schema.TaggedError<UndoFinalizedBlockError>(
  "Firehose/CanonicalChain/UndoFinalizedBlockError"
)("UndoFinalizedBlockError", {
  number: Schema.BigIntFromSelf,
  id: Schema.String,
  finalNumber: Schema.BigIntFromSelf
}) {
  override get message(): string {
    return `Cannot undo block ${this.number} (${this.id}): block ${this.finalNumber} is final`
  }
}

export type CanonicalChainError = ForkSequenceError | UndoFinalizedBlockError
