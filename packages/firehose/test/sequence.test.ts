import { describe, expect, it } from "@effect/vitest"
import * as Cause from "effect/Cause"
import * as Chunk from "effect/Chunk"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Exit from "effect/Exit"
import * as HashMap from "effect/HashMap"
import * as Logger from "effect/Logger"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import * as Sequence from "firehose-client/sequence"
import { consensusBlock, executionBlock } from "firehose-client/test/fixtures"

const defectMessage = <A, E>(exit: Exit.Exit<A, E>): Option.Option<string> =>
  Exit.isFailure(exit)
    ? Option.flatMap(
      Cause.dieOption(exit.cause),
      (defect) => defect instanceof Error ? Option.some(defect.message) : Option.none()
    )
    : Option.none()

describe("Sequence", () => {
  describe("checkSuccessor", () => {
    it("accepts the next block", () => {
      expect(Sequence.checkSuccessor(executionBlock(5), executionBlock(6))).toEqual(Either.right(undefined))
    })

    it("reports a gap", () => {
      expect(Sequence.checkSuccessor(consensusBlock(10), consensusBlock(12))).toEqual(
        Either.left(new Sequence.GapError({ expected: 11n, actual: 12n }))
      )
    })

    it("reports blocks which go backwards", () => {
      expect(Sequence.checkSuccessor(executionBlock(5), executionBlock(5))).toEqual(
        Either.left(new Sequence.OutOfOrderError({ previous: 5n, actual: 5n }))
      )
    })
  })

  describe("ensureContiguous", () => {
    it.effect("passes contiguous blocks through", () =>
      Effect.gen(function*() {
        const blocks = yield* Stream.make(executionBlock(5), executionBlock(6), executionBlock(7)).pipe(
          Sequence.ensureContiguous,
          Stream.runCollect
        )
        expect(Chunk.toReadonlyArray(blocks).map((block) => block.number)).toEqual([5n, 6n, 7n])
      }))

    it.effect("fails on skipped slots", () =>
      Effect.gen(function*() {
        const error = yield* Stream.make(consensusBlock(1), consensusBlock(2), consensusBlock(4)).pipe(
          Sequence.ensureContiguous,
          Stream.runDrain,
          Effect.flip
        )
        expect(error.message).toBe("Gap in block sequence: expected 3, got 4")
      }))

    it.effect("fails on a repeated block", () =>
      Effect.gen(function*() {
        const error = yield* Stream.make(executionBlock(5), executionBlock(6), executionBlock(6)).pipe(
          Sequence.ensureContiguous,
          Stream.runDrain,
          Effect.flip
        )
        expect(error.message).toBe("Block 6 received after block 6")
      }))
  })

  describe("logProgress", () => {
    it.effect("logs every multiple of the interval", () => {
      const logged: Array<string> = []
      const logger = Logger.make(({ annotations }) => {
        const block = HashMap.get(annotations, "block")
        if (Option.isSome(block)) logged.push(String(block.value))
      })
      return Effect.gen(function*() {
        const blocks = yield* Stream.range(8, 21).pipe(
          Stream.map((number) => executionBlock(number)),
          Sequence.logProgress(5n),
          Stream.runCollect
        )
        expect(Chunk.size(blocks)).toBe(14)
        expect(logged).toEqual(["10", "15", "20"])
      }).pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger)))
    })

    it.effect("rejects a non-positive interval", () =>
      Effect.gen(function*() {
        const exit = yield* Stream.make(executionBlock(1)).pipe(
          Sequence.logProgress(0n),
          Stream.runCollect,
          Effect.exit
        )
        expect(defectMessage(exit)).toEqual(Option.some("logProgress interval must be positive, got 0"))
      }))
  })

  describe("groupByRange", () => {
    it.effect("rejects a non-positive span", () =>
      Effect.gen(function*() {
        const exit = yield* Stream.make(executionBlock(1)).pipe(
          Sequence.groupByRange(0n),
          Stream.runCollect,
          Effect.exit
        )
        expect(defectMessage(exit)).toEqual(Option.some("groupByRange span must be positive, got 0"))
      }))

    it.effect("groups blocks into aligned ranges", () =>
      Effect.gen(function*() {
        const groups = yield* Stream.make(8, 9, 10, 11, 25).pipe(
          Stream.map((number) => executionBlock(number)),
          Sequence.groupByRange(10n),
          Stream.runCollect
        )
        expect(
          Chunk.toReadonlyArray(groups).map((group) => ({
            start: group.start,
            end: group.end,
            numbers: group.blocks.map((block) => block.number)
          }))
        ).toEqual([
          { start: 0n, end: 9n, numbers: [8n, 9n] },
          { start: 10n, end: 19n, numbers: [10n, 11n] },
          { start: 20n, end: 29n, numbers: [25n] }
        ])
      }))
  })
})
