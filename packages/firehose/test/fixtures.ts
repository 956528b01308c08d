/**
 * Block types and response builders shared by the tests.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { blockNumber, type ForkStep, type HasNumberOrSlot, type Payload } from "firehose-client/core"
import { Response, SingleBlockResponse } from "firehose-client/response"

export const EXECUTION_BLOCK_TYPE = "type.example.com/test.ExecutionBlock"
export const CONSENSUS_BLOCK_TYPE = "type.example.com/test.ConsensusBlock"

/**
 * A block of a chain addressed by block number.
 */
export class ExecutionBlock extends Schema.Class<ExecutionBlock>("Test/ExecutionBlock")({
  number: Schema.BigInt,
  hash: Schema.String,
  parentHash: Schema.String
}) implements HasNumberOrSlot {
  numberOrSlot(): bigint {
    return this.number
  }
}

/**
 * A block of a chain addressed by slot, where slots may be skipped.
 */
export class ConsensusBlock extends Schema.Class<ConsensusBlock>("Test/ConsensusBlock")({
  slot: Schema.BigInt,
  root: Schema.String
}) implements HasNumberOrSlot {
  numberOrSlot(): bigint {
    return this.slot
  }
}

const utf8 = new TextEncoder()

export const jsonPayload = <A, I>(schema: Schema.Schema<A, I>, typeUrl: string, value: A): Payload => ({
  typeUrl,
  value: utf8.encode(Schema.encodeSync(Schema.parseJson(schema))(value))
})

export const executionBlock = (number: number, hash = `0x${number.toString(16)}`): ExecutionBlock =>
  new ExecutionBlock({
    number: BigInt(number),
    hash,
    parentHash: `0x${(number - 1).toString(16)}`
  })

export const consensusBlock = (slot: number): ConsensusBlock =>
  new ConsensusBlock({ slot: BigInt(slot), root: `0xroot${slot}` })

const metadataOf = (block: ExecutionBlock) => ({
  num: blockNumber(block.number),
  id: block.hash,
  parentNum: blockNumber(block.number - 1n),
  parentId: block.parentHash,
  libNum: blockNumber(0)
})

/**
 * A stream response carrying `block` as JSON, with the cursor `c<number>`.
 */
export const makeResponse = (
  step: ForkStep,
  block: ExecutionBlock,
  cursor = `c${block.number}`
): Response =>
  new Response({
    step,
    cursor,
    block: jsonPayload(ExecutionBlock, EXECUTION_BLOCK_TYPE, block),
    metadata: metadataOf(block)
  })

export const makeSingleBlockResponse = (block: ExecutionBlock): SingleBlockResponse =>
  new SingleBlockResponse({
    block: jsonPayload(ExecutionBlock, EXECUTION_BLOCK_TYPE, block),
    metadata: metadataOf(block)
  })
