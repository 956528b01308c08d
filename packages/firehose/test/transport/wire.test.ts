/**
 * Tests for the mapping between protobuf records and the domain classes,
 * through the serializers generated from the bundled `.proto` file.
 *
 * @module
 */
import { describe, expect, it } from "@effect/vitest"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Schema from "effect/Schema"
import { blockNumber } from "firehose-client/core"
import { BlockHashAndNumberReference, BlockNumberReference, Request, SingleBlockRequest } from "firehose-client/request"
import { Response, SingleBlockResponse } from "firehose-client/response"
import { loadFirehoseServices, Wire } from "firehose-client/transport"

const metadata = {
  num: blockNumber(5),
  id: "0x5",
  parentNum: blockNumber(4),
  parentId: "0x4",
  libNum: blockNumber(2),
  time: new Date("2024-01-02T03:04:05.678Z")
}

describe("PayloadFromWire", () => {
  it("uses the field names of google.protobuf.Any", () => {
    const value = new Uint8Array([7])
    expect(Schema.encodeSync(Wire.PayloadFromWire)({ typeUrl: "type.example.com/test.Block", value })).toEqual({
      type_url: "type.example.com/test.Block",
      value
    })
    expect(Schema.decodeUnknownSync(Wire.PayloadFromWire)({ type_url: "type.example.com/test.Block", value })).toEqual({
      typeUrl: "type.example.com/test.Block",
      value
    })
  })

  it.effect("keeps the type URL through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const response = new Response({
        step: "New",
        cursor: "c1",
        block: { typeUrl: "type.example.com/test.Block", value: new Uint8Array([1]) }
      })
      const wire = yield* Schema.encode(Wire.ResponseFromWire)(response)
      const raw = services.blocks.responseDeserialize(services.blocks.responseSerialize(wire))

      expect(raw).toMatchObject({ block: { type_url: "type.example.com/test.Block" } })
    }))
})

describe("Response", () => {
  it.effect("round trips every field through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const response = new Response({
        step: "Undo",
        cursor: "cursor-5",
        block: { typeUrl: "type.example.com/test.Block", value: new Uint8Array([1, 2, 3]) },
        metadata
      })

      const wire = yield* Schema.encode(Wire.ResponseFromWire)(response)
      const bytes = services.blocks.responseSerialize(wire)
      const decoded = yield* Schema.decodeUnknown(Wire.ResponseFromWire)(services.blocks.responseDeserialize(bytes))

      expect(decoded).toBeInstanceOf(Response)
      expect(decoded.step).toBe("Undo")
      expect(decoded.cursor).toBe("cursor-5")
      expect(decoded.block?.typeUrl).toBe("type.example.com/test.Block")
      expect(Array.from(decoded.block?.value ?? [])).toEqual([1, 2, 3])
      expect(decoded.metadata?.num).toBe(5n)
      expect(decoded.metadata?.id).toBe("0x5")
      expect(decoded.metadata?.parentNum).toBe(4n)
      expect(decoded.metadata?.parentId).toBe("0x4")
      expect(decoded.metadata?.libNum).toBe(2n)
      expect(decoded.metadata?.time?.toISOString()).toBe("2024-01-02T03:04:05.678Z")
    }))

  it.effect("leaves unset messages out", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const wire = yield* Schema.encode(Wire.ResponseFromWire)(new Response({ step: "Final", cursor: "cursor-9" }))
      const raw = services.blocks.responseDeserialize(services.blocks.responseSerialize(wire))
      const decoded = yield* Schema.decodeUnknown(Wire.ResponseFromWire)(raw)

      expect(decoded.step).toBe("Final")
      expect(decoded.cursor).toBe("cursor-9")
      expect(decoded.block).toBeUndefined()
      expect(decoded.metadata).toBeUndefined()
    }))

  it.effect("keeps block numbers beyond the safe integer range", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const response = new Response({
        step: "New",
        cursor: "cursor-big",
        metadata: { ...metadata, num: blockNumber(9007199254740993n) }
      })
      const wire = yield* Schema.encode(Wire.ResponseFromWire)(response)
      const raw = services.blocks.responseDeserialize(services.blocks.responseSerialize(wire))
      const decoded = yield* Schema.decodeUnknown(Wire.ResponseFromWire)(raw)

      expect(decoded.metadata?.num).toBe(9007199254740993n)
    }))

  it.effect("rejects an unset fork step", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const raw = services.blocks.responseDeserialize(
        services.blocks.responseSerialize({ step: "STEP_UNSET", cursor: "cursor-1" })
      )
      const result = Schema.decodeUnknownEither(Wire.ResponseFromWire)(raw)

      expect(Either.isLeft(result)).toBe(true)
    }))

  it("maps every fork step", () => {
    const decode = Schema.decodeUnknownSync(Wire.ForkStepFromWire)
    expect(decode("STEP_NEW")).toBe("New")
    expect(decode("STEP_UNDO")).toBe("Undo")
    expect(decode("STEP_FINAL")).toBe("Final")
    expect(() => decode("STEP_UNSET")).toThrow()
  })
})

describe("Request", () => {
  it.effect("round trips through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const request = new Request({
        startBlockNum: -10n,
        cursor: "cursor-1",
        stopBlockNum: 9007199254740993n,
        finalBlocksOnly: true,
        transforms: [{ typeUrl: "type.example.com/test.Filter", value: new Uint8Array([9]) }]
      })

      const wire = yield* Schema.encode(Wire.RequestFromWire)(request)
      expect(wire.startBlockNum).toBe("-10")
      expect(wire.stopBlockNum).toBe("9007199254740993")

      const raw = services.blocks.requestDeserialize(services.blocks.requestSerialize(wire))
      expect(raw).toMatchObject({ transforms: [{ type_url: "type.example.com/test.Filter" }] })

      const decoded = yield* Schema.decodeUnknown(Wire.RequestFromWire)(raw)

      expect(decoded.startBlockNum).toBe(-10n)
      expect(decoded.cursor).toBe("cursor-1")
      expect(decoded.stopBlockNum).toBe(9007199254740993n)
      expect(decoded.finalBlocksOnly).toBe(true)
      expect(decoded.transforms.map((transform) => transform.typeUrl)).toEqual(["type.example.com/test.Filter"])
    }))

  it.effect("encodes the default request", () =>
    Effect.gen(function*() {
      const wire = yield* Schema.encode(Wire.RequestFromWire)(new Request({}))
      expect(wire).toEqual({
        startBlockNum: "0",
        cursor: "",
        stopBlockNum: "0",
        finalBlocksOnly: false,
        transforms: []
      })
    }))
})

describe("SingleBlockRequest", () => {
  it.effect("encodes a block number reference", () =>
    Effect.gen(function*() {
      const wire = yield* Schema.encode(Wire.SingleBlockRequestFromWire)(SingleBlockRequest.new(12345))
      expect(wire).toEqual({ blockNumber: { num: "12345" }, transforms: [] })
    }))

  it.effect("encodes a cursor reference", () =>
    Effect.gen(function*() {
      const wire = yield* Schema.encode(Wire.SingleBlockRequestFromWire)(SingleBlockRequest.newByCursor("cursor-1"))
      expect(wire).toEqual({ cursor: { cursor: "cursor-1" }, transforms: [] })
    }))

  it.effect("round trips the hash and number reference through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const request = SingleBlockRequest.newByBlockHashAndNumber("0xabc", 12345)
      const wire = yield* Schema.encode(Wire.SingleBlockRequestFromWire)(request)
      const raw = services.block.requestDeserialize(services.block.requestSerialize(wire))
      const decoded = yield* Schema.decodeUnknown(Wire.SingleBlockRequestFromWire)(raw)

      expect(decoded.reference).toEqual(
        new BlockHashAndNumberReference({ hash: "0xabc", num: blockNumber(12345) })
      )
    }))

  it.effect("round trips the block number reference through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const wire = yield* Schema.encode(Wire.SingleBlockRequestFromWire)(SingleBlockRequest.newByBlockNumber(77))
      const raw = services.block.requestDeserialize(services.block.requestSerialize(wire))
      const decoded = yield* Schema.decodeUnknown(Wire.SingleBlockRequestFromWire)(raw)

      expect(decoded.reference).toEqual(new BlockNumberReference({ num: blockNumber(77) }))
    }))

  it("rejects more than one reference", () => {
    const result = Schema.decodeUnknownEither(Wire.SingleBlockRequestFromWire)({
      blockNumber: { num: "1" },
      cursor: { cursor: "cursor-1" },
      transforms: []
    })
    expect(Either.isLeft(result)).toBe(true)
  })
})

describe("SingleBlockResponse", () => {
  it.effect("round trips through the protobuf codec", () =>
    Effect.gen(function*() {
      const services = yield* loadFirehoseServices
      const response = new SingleBlockResponse({
        block: { typeUrl: "type.example.com/test.Block", value: new Uint8Array([4, 5]) },
        metadata
      })
      const wire = yield* Schema.encode(Wire.SingleBlockResponseFromWire)(response)
      const raw = services.block.responseDeserialize(services.block.responseSerialize(wire))
      const decoded = yield* Schema.decodeUnknown(Wire.SingleBlockResponseFromWire)(raw)

      expect(decoded).toBeInstanceOf(SingleBlockResponse)
      expect(Array.from(decoded.block?.value ?? [])).toEqual([4, 5])
      expect(decoded.metadata?.num).toBe(5n)
      expect(decoded.metadata?.time?.toISOString()).toBe("2024-01-02T03:04:05.678Z")
    }))
})
