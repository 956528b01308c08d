/**
 * Call metadata attached to every request a transport sends.
 *
 * @module
 */
import * as Arr from "effect/Array"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Redacted from "effect/Redacted"

export interface MetadataEntry {
  readonly key: string
  readonly value: Redacted.Redacted<string>
}

/**
 * The set of metadata entries sent with every call. Values are redacted so
 * that credentials never show up in logs or traces.
 */
export class CallMetadata extends Context.Reference<CallMetadata>()(
  "Firehose/Transport/CallMetadata",
  { defaultValue: () => Arr.empty<MetadataEntry>() }
) {}

/**
 * A layer which adds an entry to the configured `CallMetadata`.
 */
export const layerMetadata = (key: string, value: Redacted.Redacted<string>) =>
  Layer.effectContext(Effect.gen(function*() {
    const entries = yield* CallMetadata
    return Context.make(CallMetadata, Arr.append(entries, { key: key.toLowerCase(), value }))
  }))

/**
 * A layer which authenticates calls with an API key sent as `x-api-key`.
 */
export const layerApiKey = (apiKey: Redacted.Redacted<string>) => layerMetadata("x-api-key", apiKey)

/**
 * A layer which authenticates calls with a bearer token.
 */
export const layerBearerToken = (token: Redacted.Redacted<string>) =>
  layerMetadata("authorization", Redacted.make(`Bearer ${Redacted.value(token)}`))
