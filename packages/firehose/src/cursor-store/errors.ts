/**
 * Error types for the CursorStore.
 *
 * @module
 */
import * as Schema from "effect/Schema"

/**
 * Error from CursorStore operations.
 */
export class CursorStoreError extends Schema.TaggedError<CursorStoreError>(
  "Firehose/CursorStore/CursorStoreError"
)("CursorStoreError", {
  reason: Schema.String,
  operation: Schema.Literal("load", "save", "clear"),
  key: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {
  override get message(): string {
    return `Cursor ${this.operation} failed for "${this.key}": ${this.reason}`
  }
}
