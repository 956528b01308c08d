/**
 * A `Transport` which speaks gRPC to a Firehose server.
 *
 * @module
 */
import { type ChannelOptions, Client, credentials, Metadata, status as Status } from "@grpc/grpc-js"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"
import * as Redacted from "effect/Redacted"
import * as Runtime from "effect/Runtime"
import * as Schema from "effect/Schema"
import * as Stream from "effect/Stream"
import type { SingleBlockRequest } from "../request/single-block-request.ts"
import type { Request } from "../request/stream-request.ts"
import type { Response } from "../response/response.ts"
import {
  RequestEncodeError,
  ResponseDecodeError,
  RpcError,
  toRpcError,
  type TransportError,
  TransportSetupError
} from "./errors.ts"
import { CallMetadata } from "./metadata.ts"
import { loadFirehoseServices } from "./proto.ts"
import { Transport, type TransportService } from "./service.ts"
import { RequestFromWire, ResponseFromWire, SingleBlockRequestFromWire, SingleBlockResponseFromWire } from "./wire.ts"

const BLOCKS = "sf.firehose.v2.Stream/Blocks"
const BLOCK = "sf.firehose.v2.Fetch/Block"

export const DEFAULT_MAX_RECEIVE_MESSAGE_LENGTH = 1024 * 1024 * 1024

// =============================================================================
// Endpoint
// =============================================================================

export interface Endpoint {
  /**
   * The `host:port` pair to connect to.
   */
  readonly address: string
  readonly secure: boolean
}

/**
 * Parses an endpoint URL. `https` endpoints use TLS, `http` endpoints use
 * plaintext. The port defaults to the scheme's default port.
 */
export const parseEndpoint = (endpoint: string | URL): Either.Either<Endpoint, TransportSetupError> =>
  Either.try({
    try: () => typeof endpoint === "string" ? new URL(endpoint) : endpoint,
    catch: (cause) => new TransportSetupError({ reason: `Invalid endpoint URL: ${String(endpoint)}`, cause })
  }).pipe(
    Either.flatMap((url) => {
      const secure = url.protocol === "https:"
      if (!secure && url.protocol !== "http:") {
        return Either.left(new TransportSetupError({ reason: `Unsupported endpoint scheme: ${url.protocol}` }))
      }
      if (url.hostname === "") {
        return Either.left(new TransportSetupError({ reason: `Endpoint has no host: ${url.href}` }))
      }
      const port = url.port === "" ? (secure ? "443" : "80") : url.port
      return Either.right({ address: `${url.hostname}:${port}`, secure })
    })
  )

// =============================================================================
// Implementation
// =============================================================================

export interface GrpcTransportOptions {
  readonly endpoint: string | URL
  /**
   * Largest response accepted, in bytes. Full blocks of busy chains can be
   * well above the gRPC default of 4 MiB.
   */
  readonly maxReceiveMessageLength?: number | undefined
  readonly channelOptions?: ChannelOptions | undefined
}

const make = Effect.fnUntraced(function*(options: GrpcTransportOptions) {
  const endpoint = yield* parseEndpoint(options.endpoint)
  const services = yield* loadFirehoseServices
  const entries = yield* CallMetadata

  const client = yield* Effect.acquireRelease(
    Effect.try({
      try: () =>
        new Client(
          endpoint.address,
          endpoint.secure ? credentials.createSsl() : credentials.createInsecure(),
          {
            ...options.channelOptions,
            "grpc.max_receive_message_length": options.maxReceiveMessageLength ?? DEFAULT_MAX_RECEIVE_MESSAGE_LENGTH
          }
        ),
      catch: (cause) => new TransportSetupError({ reason: `Could not create a client for ${endpoint.address}`, cause })
    }),
    (client) => Effect.sync(() => client.close())
  )

  yield* Effect.logDebug("Firehose transport ready").pipe(
    Effect.annotateLogs({ address: endpoint.address, secure: endpoint.secure })
  )

  const makeMetadata = () => {
    const metadata = new Metadata()
    for (const entry of entries) {
      metadata.add(entry.key, Redacted.value(entry.value))
    }
    return metadata
  }

  const encodeRequest = Schema.encode(RequestFromWire)
  const decodeResponse = Schema.decodeUnknown(ResponseFromWire)
  const encodeSingleBlockRequest = Schema.encode(SingleBlockRequestFromWire)
  const decodeSingleBlockResponse = Schema.decodeUnknown(SingleBlockResponseFromWire)

  const blocks = (request: Request): Stream.Stream<Response, TransportError> =>
    Effect.gen(function*() {
      const runtime = yield* Effect.runtime<never>()
      const wire = yield* encodeRequest(request).pipe(
        Effect.mapError((error) => new RequestEncodeError({ method: BLOCKS, reason: error.message }))
      )
      const call = yield* Effect.acquireRelease(
        Effect.sync(() =>
          client.makeServerStreamRequest(
            services.blocks.path,
            services.blocks.requestSerialize,
            services.blocks.responseDeserialize,
            wire,
            makeMetadata()
          )
        ),
        (call) =>
          Effect.sync(() => {
            // Cancelling emits a final status as an error event
            call.on("error", (cause: unknown) => {
              const error = toRpcError(BLOCKS, cause)
              if (error.code !== Status.CANCELLED) {
                Runtime.runSync(runtime)(Effect.logDebug("Firehose stream closed after release", error))
              }
            })
            call.cancel()
          })
      )
      return Stream.fromAsyncIterable<unknown, RpcError>(call, (cause) => toRpcError(BLOCKS, cause))
    }).pipe(
      Stream.unwrapScoped,
      Stream.mapEffect((message) =>
        decodeResponse(message).pipe(
          Effect.mapError((error) => new ResponseDecodeError({ method: BLOCKS, reason: error.message }))
        )
      ),
      Stream.withSpan("Transport.blocks")
    )

  const block = Effect.fn("Transport.block")(function*(request: SingleBlockRequest) {
    const wire = yield* encodeSingleBlockRequest(request).pipe(
      Effect.mapError((error) => new RequestEncodeError({ method: BLOCK, reason: error.message }))
    )
    const message = yield* Effect.async<object, RpcError>((resume) => {
      const call = client.makeUnaryRequest(
        services.block.path,
        services.block.requestSerialize,
        services.block.responseDeserialize,
        wire,
        makeMetadata(),
        (error, value) => {
          if (error !== null) {
            resume(Effect.fail(toRpcError(BLOCK, error)))
          } else if (value === undefined) {
            resume(Effect.fail(new RpcError({ method: BLOCK, code: Status.INTERNAL, details: "Empty response" })))
          } else {
            resume(Effect.succeed(value))
          }
        }
      )
      return Effect.sync(() => call.cancel())
    })
    return yield* decodeSingleBlockResponse(message).pipe(
      Effect.mapError((error) => new ResponseDecodeError({ method: BLOCK, reason: error.message }))
    )
  })

  return { blocks, block } satisfies TransportService
})

// =============================================================================
// Layer
// =============================================================================

/**
 * A layer which provides a gRPC `Transport` for the given endpoint.
 *
 * Call credentials are taken from `CallMetadata`. The channel is closed when
 * the layer is released.
 *
 * @example
 * ```typescript
 * const TransportLive = layerGrpc({ endpoint: "https://firehose.example.com" }).pipe(
 *   Layer.provide(layerApiKey(Redacted.make("test-secret")))
 * )
 * ```
 */
export const layerGrpc = (options: GrpcTransportOptions): Layer.Layer<Transport, TransportSetupError> =>
  Layer.scoped(Transport, make(options))
