/**
 * Loads the `sf.firehose.v2` service definitions from the bundled `.proto`
 * file at run time.
 *
 * @module
 */
import {
  loadSync,
  type MethodDefinition,
  type Options,
  type PackageDefinition,
  type ServiceDefinition
} from "@grpc/proto-loader"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { fileURLToPath } from "node:url"
import { TransportSetupError } from "./errors.ts"

export const PROTO_PACKAGE = "sf.firehose.v2"

export const protoPath = fileURLToPath(new URL("../../proto/sf/firehose/v2/firehose.proto", import.meta.url))

/**
 * Decoded records carry 64-bit integers as decimal strings, enums by name,
 * unset message fields as `null` and the name of the active oneof member.
 */
export const loaderOptions = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true
} satisfies Options

export interface FirehoseServices {
  readonly stream: ServiceDefinition
  readonly fetch: ServiceDefinition
  /**
   * `sf.firehose.v2.Stream/Blocks`
   */
  readonly blocks: MethodDefinition<object, object>
  /**
   * `sf.firehose.v2.Fetch/Block`
   */
  readonly block: MethodDefinition<object, object>
}

const lookupService = (
  definition: PackageDefinition,
  name: string
): Either.Either<ServiceDefinition, TransportSetupError> => {
  const service = definition[`${PROTO_PACKAGE}.${name}`]
  if (service === undefined || "format" in service) {
    return Either.left(new TransportSetupError({ reason: `Service ${PROTO_PACKAGE}.${name} is not defined` }))
  }
  return Either.right(service)
}

const lookupMethod = (
  service: ServiceDefinition,
  name: string
): Either.Either<MethodDefinition<object, object>, TransportSetupError> => {
  const method = service[name]
  return method === undefined
    ? Either.left(new TransportSetupError({ reason: `Method ${name} is not defined` }))
    : Either.right(method)
}

export const loadFirehoseServices: Effect.Effect<FirehoseServices, TransportSetupError> = Effect.gen(function*() {
  const definition = yield* Effect.try({
    try: () => loadSync(protoPath, loaderOptions),
    catch: (cause) => new TransportSetupError({ reason: `Could not load ${protoPath}`, cause })
  })
  const stream = yield* lookupService(definition, "Stream")
  const fetch = yield* lookupService(definition, "Fetch")
  const blocks = yield* lookupMethod(stream, "Blocks")
  const block = yield* lookupMethod(fetch, "Block")
  return { stream, fetch, blocks, block }
})
