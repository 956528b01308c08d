/**
 * Mapping between the decoded protobuf records of the `sf.firehose.v2`
 * package and the domain request and response classes.
 *
 * Decoded records use camel-case field names, carry 64-bit integers as
 * decimal strings, enums by name and unset message fields as `null`. The
 * bundled `google.protobuf` types keep their snake-case field names.
 *
 * @module
 */
import * as ParseResult from "effect/ParseResult"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"
import {
  BlockMetadata,
  BlockNumberFromString,
  Cursor,
  type ForkStep,
  ForkStep as ForkStepSchema,
  Int64FromString,
  Uint64FromString
} from "../core/domain.ts"
import {
  BlockHashAndNumberReference,
  BlockNumberReference,
  CursorReference,
  type Reference,
  SingleBlockRequest
} from "../request/single-block-request.ts"
import { Request } from "../request/stream-request.ts"
import { Response, SingleBlockResponse } from "../response/response.ts"

// =============================================================================
// Well-Known Types
// =============================================================================

const WireTimestamp = Schema.Struct({
  seconds: Schema.String,
  nanos: Schema.Number
})

/**
 * A `google.protobuf.Timestamp` record.
 */
export const TimestampFromWire = Schema.transformOrFail(WireTimestamp, Schema.DateFromSelf, {
  strict: true,
  decode: ({ nanos, seconds }, _, ast) =>
    ParseResult.try({
      try: () => new Date(Number(BigInt(seconds) * 1000n) + Math.floor(nanos / 1_000_000)),
      catch: () => new ParseResult.Type(ast, seconds, `Invalid timestamp seconds: ${seconds}`)
    }),
  encode: (date) => {
    const millis = date.getTime()
    const seconds = Math.floor(millis / 1000)
    return ParseResult.succeed({ seconds: String(seconds), nanos: (millis - seconds * 1000) * 1_000_000 })
  }
})

/**
 * A `google.protobuf.Any` record.
 */
export const PayloadFromWire = Schema.Struct({
  typeUrl: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("type_url")),
  value: Schema.Uint8ArrayFromSelf
})

// =============================================================================
// Block Metadata
// =============================================================================

/**
 * A `sf.firehose.v2.BlockMetadata` record.
 */
export const BlockMetadataFromWire = Schema.transform(
  Schema.Struct({
    num: BlockNumberFromString,
    id: Schema.String,
    parentNum: BlockNumberFromString,
    parentId: Schema.String,
    libNum: BlockNumberFromString,
    time: Schema.NullOr(TimestampFromWire)
  }),
  Schema.typeSchema(BlockMetadata),
  {
    strict: true,
    decode: ({ time, ...rest }) => time === null ? rest : { ...rest, time },
    encode: ({ time, ...rest }) => ({ ...rest, time: time ?? null })
  }
)

// =============================================================================
// Fork Step
// =============================================================================

const WireForkStep = Schema.Literal("STEP_UNSET", "STEP_NEW", "STEP_UNDO", "STEP_FINAL")

const wireForkSteps = {
  New: "STEP_NEW",
  Undo: "STEP_UNDO",
  Final: "STEP_FINAL"
} as const satisfies Record<ForkStep, typeof WireForkStep.Type>

/**
 * A `sf.firehose.v2.ForkStep` enum name. `STEP_UNSET` is a protocol
 * violation.
 */
export const ForkStepFromWire = Schema.transformOrFail(WireForkStep, ForkStepSchema, {
  strict: true,
  decode: (step, _, ast) => {
    switch (step) {
      case "STEP_NEW":
        return ParseResult.succeed("New" as const)
      case "STEP_UNDO":
        return ParseResult.succeed("Undo" as const)
      case "STEP_FINAL":
        return ParseResult.succeed("Final" as const)
      case "STEP_UNSET":
        return ParseResult.fail(new ParseResult.Type(ast, step, "Fork step is unset"))
    }
  },
  encode: (step) => ParseResult.succeed(wireForkSteps[step])
})

// =============================================================================
// Streaming
// =============================================================================

/**
 * A `sf.firehose.v2.Request` record.
 */
export const RequestFromWire = Schema.transform(
  Schema.Struct({
    startBlockNum: Int64FromString,
    cursor: Cursor,
    stopBlockNum: Uint64FromString,
    finalBlocksOnly: Schema.Boolean,
    transforms: Schema.Array(PayloadFromWire)
  }),
  Schema.typeSchema(Request),
  {
    strict: true,
    decode: (wire) => new Request(wire),
    encode: (request) => ({
      startBlockNum: request.startBlockNum,
      cursor: request.cursor,
      stopBlockNum: request.stopBlockNum,
      finalBlocksOnly: request.finalBlocksOnly,
      transforms: request.transforms
    })
  }
)

/**
 * A `sf.firehose.v2.Response` record.
 */
export const ResponseFromWire = Schema.transform(
  Schema.Struct({
    block: Schema.NullOr(PayloadFromWire),
    step: ForkStepFromWire,
    cursor: Cursor,
    metadata: Schema.NullOr(BlockMetadataFromWire)
  }),
  Schema.typeSchema(Response),
  {
    strict: true,
    decode: ({ block, cursor, metadata, step }) =>
      new Response({
        step,
        cursor,
        ...(block === null ? {} : { block }),
        ...(metadata === null ? {} : { metadata })
      }),
    encode: (response) => ({
      block: response.block ?? null,
      step: response.step,
      cursor: response.cursor,
      metadata: response.metadata ?? null
    })
  }
)

// =============================================================================
// Fetch
// =============================================================================

const WireSingleBlockRequest = Schema.Struct({
  blockNumber: Schema.optionalWith(
    Schema.Struct({ num: BlockNumberFromString }),
    { nullable: true }
  ),
  blockHashAndNumber: Schema.optionalWith(
    Schema.Struct({ num: BlockNumberFromString, hash: Schema.String }),
    { nullable: true }
  ),
  cursor: Schema.optionalWith(
    Schema.Struct({ cursor: Cursor }),
    { nullable: true }
  ),
  transforms: Schema.Array(PayloadFromWire)
})

/**
 * A `sf.firehose.v2.SingleBlockRequest` record. The `reference` oneof maps to
 * exactly one of the `Reference` variants.
 */
export const SingleBlockRequestFromWire = Schema.transformOrFail(
  WireSingleBlockRequest,
  Schema.typeSchema(SingleBlockRequest),
  {
    strict: true,
    decode: (wire, _, ast) => {
      const references: Array<Reference> = []
      if (Predicate.isNotUndefined(wire.blockNumber)) {
        references.push(new BlockNumberReference({ num: wire.blockNumber.num }))
      }
      if (Predicate.isNotUndefined(wire.blockHashAndNumber)) {
        references.push(new BlockHashAndNumberReference(wire.blockHashAndNumber))
      }
      if (Predicate.isNotUndefined(wire.cursor)) {
        references.push(new CursorReference({ cursor: wire.cursor.cursor }))
      }
      if (references.length > 1) {
        return ParseResult.fail(new ParseResult.Type(ast, wire, "More than one block reference is set"))
      }
      return ParseResult.succeed(new SingleBlockRequest({ reference: references[0], transforms: wire.transforms }))
    },
    encode: ({ reference, transforms }) => {
      if (Predicate.isUndefined(reference)) {
        return ParseResult.succeed({ transforms })
      }
      switch (reference._tag) {
        case "BlockNumber":
          return ParseResult.succeed({ blockNumber: { num: reference.num }, transforms })
        case "BlockHashAndNumber":
          return ParseResult.succeed({
            blockHashAndNumber: { num: reference.num, hash: reference.hash },
            transforms
          })
        case "Cursor":
          return ParseResult.succeed({ cursor: { cursor: reference.cursor }, transforms })
      }
    }
  }
)

/**
 * A `sf.firehose.v2.SingleBlockResponse` record.
 */
export const SingleBlockResponseFromWire = Schema.transform(
  Schema.Struct({
    block: Schema.NullOr(PayloadFromWire),
    metadata: Schema.NullOr(BlockMetadataFromWire)
  }),
  Schema.typeSchema(SingleBlockResponse),
  {
    strict: true,
    decode: ({ block, metadata }) =>
      new SingleBlockResponse({
        ...(block === null ? {} : { block }),
        ...(metadata === null ? {} : { metadata })
      }),
    encode: (response) => ({
      block: response.block ?? null,
      metadata: response.metadata ?? null
    })
  }
)
