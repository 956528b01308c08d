/**
 * Configuration of the Firehose clients.
 *
 * Settings are read through `effect/Config`, nested under `FIREHOSE`. With the
 * default environment provider this means:
 *
 * | Variable                              | Default      |
 * | ------------------------------------- | ------------ |
 * | `FIREHOSE_ENDPOINT`                   | (required)   |
 * | `FIREHOSE_API_KEY`                    | (none)       |
 * | `FIREHOSE_TOKEN`                      | (none)       |
 * | `FIREHOSE_MAX_RECEIVE_MESSAGE_LENGTH` | `1073741824` |
 * | `FIREHOSE_RETRY_INITIAL_DELAY`        | `500 millis` |
 * | `FIREHOSE_RETRY_MAX_DELAY`            | `30 seconds` |
 * | `FIREHOSE_RETRY_MAX_ATTEMPTS`         | `10`         |
 *
 * @module
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Schedule from "effect/Schedule"
import { isRetryable, type TransportError, type TransportSetupError } from "./transport/errors.ts"
import { DEFAULT_MAX_RECEIVE_MESSAGE_LENGTH, layerGrpc } from "./transport/grpc.ts"
import { layerApiKey, layerBearerToken } from "./transport/metadata.ts"
import type { Transport } from "./transport/service.ts"

// =============================================================================
// Retry Policy
// =============================================================================

export interface RetryPolicySettings {
  /**
   * Delay before the first reconnection attempt. Doubles on every attempt.
   */
  readonly initialDelay: Duration.Duration
  /**
   * Upper bound of the delay between two attempts.
   */
  readonly maxDelay: Duration.Duration
  /**
   * Attempts made after a failure before giving up. The count starts over
   * once an element is delivered.
   */
  readonly maxAttempts: number
}

export const defaultRetryPolicy: RetryPolicySettings = {
  initialDelay: Duration.millis(500),
  maxDelay: Duration.seconds(30),
  maxAttempts: 10
}

/**
 * The reconnection policy used by the stream and fetch clients.
 */
export class RetryPolicy extends Context.Reference<RetryPolicy>()(
  "Firehose/RetryPolicy",
  { defaultValue: () => defaultRetryPolicy }
) {}

/**
 * Capped exponential backoff which only recurs on retryable transport
 * errors.
 */
export const makeRetrySchedule = (policy: RetryPolicySettings) =>
  Schedule.exponential(policy.initialDelay).pipe(
    Schedule.union(Schedule.spaced(policy.maxDelay)),
    Schedule.intersect(Schedule.recurs(policy.maxAttempts)),
    Schedule.whileInput((error: TransportError) => isRetryable(error))
  )

// =============================================================================
// Config
// =============================================================================

export const RetryPolicyConfig: Config.Config<RetryPolicySettings> = Config.all({
  initialDelay: Config.duration("RETRY_INITIAL_DELAY").pipe(
    Config.withDefault(defaultRetryPolicy.initialDelay)
  ),
  maxDelay: Config.duration("RETRY_MAX_DELAY").pipe(
    Config.withDefault(defaultRetryPolicy.maxDelay)
  ),
  maxAttempts: Config.integer("RETRY_MAX_ATTEMPTS").pipe(
    Config.validate({ message: "Expected a non-negative integer", validation: (n) => n >= 0 }),
    Config.withDefault(defaultRetryPolicy.maxAttempts)
  )
})

export const FirehoseConfig = Config.all({
  endpoint: Config.url("ENDPOINT"),
  apiKey: Config.option(Config.redacted("API_KEY")),
  token: Config.option(Config.redacted("TOKEN")),
  maxReceiveMessageLength: Config.integer("MAX_RECEIVE_MESSAGE_LENGTH").pipe(
    Config.withDefault(DEFAULT_MAX_RECEIVE_MESSAGE_LENGTH)
  ),
  retry: RetryPolicyConfig
}).pipe(Config.nested("FIREHOSE"))
export type FirehoseConfig = Effect.Effect.Success<typeof FirehoseConfig>

// =============================================================================
// Layers
// =============================================================================

/**
 * Builds a gRPC `Transport` and the `RetryPolicy` from loaded settings.
 */
export const layerFromSettings = (
  config: FirehoseConfig
): Layer.Layer<Transport | RetryPolicy, TransportSetupError> => {
  let transport = layerGrpc({
    endpoint: config.endpoint,
    maxReceiveMessageLength: config.maxReceiveMessageLength
  })
  if (Option.isSome(config.token)) {
    transport = transport.pipe(Layer.provide(layerBearerToken(config.token.value)))
  }
  if (Option.isSome(config.apiKey)) {
    transport = transport.pipe(Layer.provide(layerApiKey(config.apiKey.value)))
  }
  return Layer.merge(transport, Layer.succeed(RetryPolicy, config.retry))
}

/**
 * Builds a gRPC `Transport` and the `RetryPolicy` from `FirehoseConfig`.
 */
export const layerFromConfig: Layer.Layer<
  Transport | RetryPolicy,
  TransportSetupError | ConfigError.ConfigError
> = Layer.unwrapEffect(Effect.map(FirehoseConfig, layerFromSettings))
