/**
 * Primitive values shared by the request, response and conversion models.
 *
 * @module
 */
import * as Schema from "effect/Schema"

// =============================================================================
// Numbers
// =============================================================================

export const MAX_UINT64 = 18446744073709551615n
export const MIN_INT64 = -9223372036854775808n
export const MAX_INT64 = 9223372036854775807n

/**
 * An unsigned 64-bit integer.
 */
export const Uint64 = Schema.BigIntFromSelf.pipe(
  Schema.betweenBigInt(0n, MAX_UINT64)
).annotations({ identifier: "Uint64" })

/**
 * A signed 64-bit integer.
 */
export const Int64 = Schema.BigIntFromSelf.pipe(
  Schema.betweenBigInt(MIN_INT64, MAX_INT64)
).annotations({ identifier: "Int64" })

/**
 * An unsigned 64-bit integer in its decimal string form.
 */
export const Uint64FromString = Schema.compose(Schema.BigInt, Uint64)

/**
 * A signed 64-bit integer in its decimal string form.
 */
export const Int64FromString = Schema.compose(Schema.BigInt, Int64)

/**
 * The first block of a stream. Negative values count back from the chain
 * head.
 */
export const StartBlockNumber = Int64.annotations({ identifier: "StartBlockNumber" })
export type StartBlockNumber = typeof StartBlockNumber.Type

/**
 * Represents a block number, or a slot number on chains which can skip
 * numbers.
 */
export const BlockNumber = Uint64.pipe(
  Schema.brand("Firehose/BlockNumber")
).annotations({
  identifier: "BlockNumber",
  description: "A block number or slot"
})
export type BlockNumber = typeof BlockNumber.Type

/**
 * A block number in its decimal string form.
 */
export const BlockNumberFromString = Schema.compose(Schema.BigInt, BlockNumber)

const blockNumberFromNumber = Schema.decodeSync(Schema.compose(Schema.BigIntFromNumber, BlockNumber))

/**
 * Converts a numeric value into a `BlockNumber`.
 *
 * Throws a `ParseError` when the value is not an integer in the unsigned
 * 64-bit range.
 */
export const blockNumber = (num: bigint | number): BlockNumber =>
  typeof num === "bigint" ? BlockNumber.make(num) : blockNumberFromNumber(num)

// =============================================================================
// Cursor
// =============================================================================

/**
 * An opaque resumption token issued by the server with every response.
 *
 * The empty string means "no cursor".
 */
export const Cursor = Schema.String.annotations({
  identifier: "Cursor",
  description: "An opaque stream resumption token"
})
export type Cursor = typeof Cursor.Type

// =============================================================================
// Fork Step
// =============================================================================

/**
 * The kind of chain event a streamed response represents.
 *
 * - `New`: a block was appended to the chain
 * - `Undo`: a previously delivered block was retracted by a reorganization
 * - `Final`: a previously delivered block became irreversible
 */
export const ForkStep = Schema.Literal("New", "Undo", "Final").annotations({
  identifier: "ForkStep"
})
export type ForkStep = typeof ForkStep.Type

// =============================================================================
// Payload
// =============================================================================

/**
 * An opaque, self-describing block payload (a `google.protobuf.Any`).
 */
export const Payload = Schema.Struct({
  typeUrl: Schema.String,
  value: Schema.Uint8ArrayFromSelf
}).annotations({ identifier: "Payload" })
export type Payload = typeof Payload.Type

// =============================================================================
// Block Metadata
// =============================================================================

/**
 * Chain position information sent alongside every block.
 */
export const BlockMetadata = Schema.Struct({
  num: BlockNumber,
  id: Schema.String,
  parentNum: BlockNumber,
  parentId: Schema.String,
  /**
   * The last irreversible block number known to the server.
   */
  libNum: BlockNumber,
  time: Schema.optional(Schema.DateFromSelf)
}).annotations({ identifier: "BlockMetadata" })
export type BlockMetadata = typeof BlockMetadata.Type
