import { status as Status } from "@grpc/grpc-js"
import { describe, expect, it } from "@effect/vitest"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Stream from "effect/Stream"
import { RetryPolicy } from "firehose-client/config"
import * as Conversion from "firehose-client/conversion"
import * as FetchClient from "firehose-client/fetch-client"
import { SingleBlockRequest } from "firehose-client/request"
import { SingleBlockResponse } from "firehose-client/response"
import { RpcError, Transport, type TransportError } from "firehose-client/transport"
import {
  EXECUTION_BLOCK_TYPE,
  ExecutionBlock,
  executionBlock,
  makeSingleBlockResponse
} from "firehose-client/test/fixtures"

const decoder = Conversion.fromJsonPayload(ExecutionBlock, { typeUrl: EXECUTION_BLOCK_TYPE })

/**
 * A transport answering each fetch attempt with the given effect and
 * recording the requests it receives.
 */
const makeTransport = (attempt: (index: number) => Effect.Effect<SingleBlockResponse, TransportError>) => {
  const requests: Array<SingleBlockRequest> = []
  const layer = FetchClient.layer.pipe(
    Layer.provide(Layer.succeed(Transport, {
      blocks: () => Stream.dieMessage("Streaming is not used by the fetch client"),
      block: (request) =>
        Effect.suspend(() => {
          requests.push(request)
          return attempt(requests.length - 1)
        })
    }))
  )
  return { requests, layer }
}

const rpcError = (code: Status, details: string) =>
  new RpcError({ method: "sf.firehose.v2.Fetch/Block", code, details })

const fastRetries = Effect.provideService(RetryPolicy, {
  initialDelay: Duration.millis(1),
  maxDelay: Duration.millis(5),
  maxAttempts: 2
})

describe("FetchClient", () => {
  it.effect("fetches and converts a block", () => {
    const { layer, requests } = makeTransport(() => Effect.succeed(makeSingleBlockResponse(executionBlock(12345))))
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const block = yield* client.fetchBlock(SingleBlockRequest.new(12345), decoder)

      expect(block).toEqual(executionBlock(12345))
      expect(requests).toEqual([SingleBlockRequest.newByBlockNumber(12345)])
    }).pipe(Effect.provide(layer))
  })

  it.effect("returns the raw response", () => {
    const { layer } = makeTransport(() => Effect.succeed(makeSingleBlockResponse(executionBlock(7))))
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const response = yield* client.fetch(SingleBlockRequest.newByCursor("c7"))

      expect(response.metadata?.id).toBe("0x7")
      expect(response.block?.typeUrl).toBe(EXECUTION_BLOCK_TYPE)
    }).pipe(Effect.provide(layer))
  })

  it.effect("fails with the conversion error", () => {
    const { layer } = makeTransport(() => Effect.succeed(new SingleBlockResponse({})))
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const error = yield* client.fetchBlock(SingleBlockRequest.new(1), decoder).pipe(Effect.flip)

      expect(error._tag).toBe("MissingPayloadError")
      expect(error.message).toBe("Response does not carry a block payload")
    }).pipe(Effect.provide(layer))
  })

  it.live("retries retryable failures", () => {
    const { layer, requests } = makeTransport((index) =>
      index === 0
        ? Effect.fail(rpcError(Status.UNAVAILABLE, "connection reset"))
        : Effect.succeed(makeSingleBlockResponse(executionBlock(3)))
    )
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const block = yield* client.fetchBlock(SingleBlockRequest.new(3), decoder)

      expect(block.number).toBe(3n)
      expect(requests).toHaveLength(2)
    }).pipe(Effect.provide(layer), fastRetries)
  })

  it.live("gives up after the configured number of attempts", () => {
    const { layer, requests } = makeTransport(() => Effect.fail(rpcError(Status.UNAVAILABLE, "connection reset")))
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const error = yield* client.fetch(SingleBlockRequest.new(3)).pipe(Effect.flip)

      expect(error.message).toBe("sf.firehose.v2.Fetch/Block failed with UNAVAILABLE: connection reset")
      expect(requests).toHaveLength(3)
    }).pipe(Effect.provide(layer), fastRetries)
  })

  it.live("does not retry a missing block", () => {
    const { layer, requests } = makeTransport(() => Effect.fail(rpcError(Status.NOT_FOUND, "unknown block")))
    return Effect.gen(function*() {
      const client = yield* FetchClient.FetchClient
      const error = yield* client.fetch(SingleBlockRequest.newByBlockHashAndNumber("0xabc", 3)).pipe(Effect.flip)

      expect(error._tag).toBe("RpcError")
      expect(requests).toHaveLength(1)
    }).pipe(Effect.provide(layer), fastRetries)
  })
})
