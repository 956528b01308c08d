/**
 * The single-block fetch request and its block reference variants.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { BlockNumber, blockNumber, Cursor, Payload } from "../core/domain.ts"

// =============================================================================
// Block References
// =============================================================================

/**
 * Selects the block currently known as canonical at the given number.
 */
export class BlockNumberReference extends Schema.TaggedClass<BlockNumberReference>(
  "Firehose/Request/BlockNumberReference"
)("BlockNumber", {
  num: BlockNumber
}) {}

/**
 * Selects a specific block by hash and number. The hash is passed through to
 * the server as given.
 */
export class BlockHashAndNumberReference extends Schema.TaggedClass<BlockHashAndNumberReference>(
  "Firehose/Request/BlockHashAndNumberReference"
)("BlockHashAndNumber", {
  hash: Schema.String,
  num: BlockNumber
}) {}

/**
 * Selects the block which produced the given cursor.
 */
export class CursorReference extends Schema.TaggedClass<CursorReference>(
  "Firehose/Request/CursorReference"
)("Cursor", {
  cursor: Cursor
}) {}

/**
 * Exactly one way of selecting a block.
 */
export const Reference = Schema.Union(
  BlockNumberReference,
  BlockHashAndNumberReference,
  CursorReference
).annotations({ identifier: "Reference" })
export type Reference = typeof Reference.Type

// =============================================================================
// Single Block Request
// =============================================================================

/**
 * A request for exactly one block.
 *
 * The default value (`new SingleBlockRequest({})`) has no reference selected,
 * which the server will reject. Use one of the static constructors.
 *
 * @example
 * ```typescript
 * const byNumber = SingleBlockRequest.newByBlockNumber(12345)
 * const byHash = SingleBlockRequest.newByBlockHashAndNumber("0xabc", 12345)
 * ```
 */
export class SingleBlockRequest extends Schema.Class<SingleBlockRequest>(
  "Firehose/Request/SingleBlockRequest"
)({
  reference: Schema.optional(Reference),
  transforms: Schema.optionalWith(Schema.Array(Payload), { default: () => [] })
}) {
  /**
   * Alias of `newByBlockNumber`.
   */
  static new(num: bigint | number): SingleBlockRequest {
    return SingleBlockRequest.newByBlockNumber(num)
  }

  static newByBlockNumber(num: bigint | number): SingleBlockRequest {
    return new SingleBlockRequest({
      reference: new BlockNumberReference({ num: blockNumber(num) })
    })
  }

  static newByBlockHashAndNumber(hash: string, num: bigint | number): SingleBlockRequest {
    return new SingleBlockRequest({
      reference: new BlockHashAndNumberReference({ hash, num: blockNumber(num) })
    })
  }

  static newByCursor(cursor: Cursor): SingleBlockRequest {
    return new SingleBlockRequest({
      reference: new CursorReference({ cursor })
    })
  }

  /**
   * Returns a copy of this request with the given transforms.
   */
  withTransforms(transforms: ReadonlyArray<Payload>): SingleBlockRequest {
    return new SingleBlockRequest({ reference: this.reference, transforms })
  }
}
