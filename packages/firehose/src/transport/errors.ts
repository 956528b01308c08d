/**
 * Errors raised while talking to a Firehose server.
 *
 * @module
 */
import { status as Status } from "@grpc/grpc-js"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

// =============================================================================
// Errors
// =============================================================================

/**
 * Represents an RPC which was rejected or aborted by the server or the
 * channel.
 */
export class RpcError extends Schema.TaggedError<RpcError>(
  "Firehose/Transport/RpcError"
)("RpcError", {
  method: Schema.String,
  /**
   * The gRPC status code.
   */
  code: Schema.Number,
  details: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {
  get codeName(): string {
    return Status[this.code] ?? "UNKNOWN"
  }

  override get message(): string {
    return `${this.method} failed with ${this.codeName}: ${this.details}`
  }
}

/**
 * Represents a request which could not be encoded for the wire.
 */
export class RequestEncodeError extends Schema.TaggedError<RequestEncodeError>(
  "Firehose/Transport/RequestEncodeError"
)("RequestEncodeError", {
  method: Schema.String,
  reason: Schema.String
}) {
  override get message(): string {
    return `Could not encode ${this.method} request: ${this.reason}`
  }
}

/**
 * Represents a response which violates the protocol, for example a stream
 * element without a fork step.
 */
export class ResponseDecodeError extends Schema.TaggedError<ResponseDecodeError>(
  "Firehose/Transport/ResponseDecodeError"
)("ResponseDecodeError", {
  method: Schema.String,
  reason: Schema.String
}) {
  override get message(): string {
    return `Could not decode ${this.method} response: ${this.reason}`
  }
}

/**
 * Represents a failure to set up a transport, such as an unusable endpoint.
 */
export class TransportSetupError extends Schema.TaggedError<TransportSetupError>(
  "Firehose/Transport/TransportSetupError"
)("TransportSetupError", {
  reason: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {
  override get message(): string {
    return `Could not set up the Firehose transport: ${this.reason}`
  }
}

export type TransportError =
  | RpcError
  | RequestEncodeError
  | ResponseDecodeError

// =============================================================================
// Classification
// =============================================================================

const retryableCodes: ReadonlySet<number> = new Set([
  Status.UNAVAILABLE,
  Status.DEADLINE_EXCEEDED,
  Status.RESOURCE_EXHAUSTED,
  Status.ABORTED,
  Status.INTERNAL,
  Status.UNKNOWN
])

/**
 * Whether an operation which failed with `error` may succeed when attempted
 * again. Encoding and decoding failures are never retryable.
 */
export const isRetryable = (error: TransportError): boolean =>
  error._tag === "RpcError" && retryableCodes.has(error.code)

/**
 * Converts anything thrown or emitted by a gRPC call into an `RpcError`.
 */
export const toRpcError = (method: string, cause: unknown): RpcError => {
  const code = Predicate.hasProperty(cause, "code") && Predicate.isNumber(cause.code)
    ? cause.code
    : Status.UNKNOWN
  const details = Predicate.hasProperty(cause, "details") && Predicate.isString(cause.details)
    ? cause.details
    : cause instanceof Error
    ? cause.message
    : String(cause)
  return new RpcError({ method, code, details, cause })
}
