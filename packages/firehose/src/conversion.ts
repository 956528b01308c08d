/**
 * Conversion of responses into typed blocks.
 *
 * @example
 * ```typescript
 * import * as Conversion from "firehose-client/conversion"
 *
 * class Block extends Schema.Class<Block>("Block")({
 *   number: Schema.BigInt,
 *   hash: Schema.String
 * }) {
 *   numberOrSlot() {
 *     return this.number
 *   }
 * }
 *
 * const decoder = Conversion.fromJsonPayload(Block, { typeUrl: "type.example.com/Block" })
 * ```
 *
 * @module
 */

// =============================================================================
// Errors
// =============================================================================

export {
  type ConversionError,
  MalformedPayloadError,
  MissingPayloadError,
  UnexpectedTypeUrlError
} from "./conversion/errors.ts"

// =============================================================================
// Contract
// =============================================================================

export {
  type Displayable,
  type Failure,
  fromJsonPayload,
  fromPayload,
  type FromResponse,
  make,
  map,
  payloadOf,
  type Success
} from "./conversion/from-response.ts"
