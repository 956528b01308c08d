/**
 * Errors reported by the built-in response decoders.
 *
 * @module
 */
import * as Schema from "effect/Schema"

/**
 * The response did not carry a block payload.
 */
export class MissingPayloadError extends Schema.TaggedError<MissingPayloadError>(
  "Firehose/Conversion/MissingPayloadError"
)("MissingPayloadError", {}) {
  override get message(): string {
    return "Response does not carry a block payload"
  }
}

/**
 * The payload type URL is not the one the decoder understands.
 */
export class UnexpectedTypeUrlError extends Schema.TaggedError<UnexpectedTypeUrlError>(
  "Firehose/Conversion/UnexpectedTypeUrlError"
)("UnexpectedTypeUrlError", {
  expected: Schema.String,
  actual: Schema.String
}) {
  override get message(): string {
    return `Unexpected payload type: expected ${this.expected}, got ${this.actual}`
  }
}

/**
 * The payload bytes could not be decoded into a block.
 */
export class MalformedPayloadError extends Schema.TaggedError<MalformedPayloadError>(
  "Firehose/Conversion/MalformedPayloadError"
)("MalformedPayloadError", {
  typeUrl: Schema.String,
  reason: Schema.String
}) {
  override get message(): string {
    return `Malformed payload of type ${this.typeUrl}: ${this.reason}`
  }
}

export type ConversionError =
  | MissingPayloadError
  | UnexpectedTypeUrlError
  | MalformedPayloadError
