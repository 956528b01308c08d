/**
 * Stream operators which only rely on the block identity abstraction.
 *
 * These operate on converted blocks of a single fork step (usually `New`
 * blocks of a final-only stream). Streams mixing `Undo` steps are not
 * contiguous by nature.
 *
 * @module
 */
import * as Arr from "effect/Array"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import { type HasNumberOrSlot, numberOrSlot } from "../core/identity.ts"
import { GapError, OutOfOrderError, type SequenceError } from "./errors.ts"

/**
 * Checks that `next` directly follows `previous`.
 */
export const checkSuccessor = (
  previous: HasNumberOrSlot,
  next: HasNumberOrSlot
): Either.Either<void, SequenceError> => {
  const prev = numberOrSlot(previous)
  const actual = numberOrSlot(next)
  if (actual <= prev) return Either.left(new OutOfOrderError({ previous: prev, actual }))
  if (actual !== prev + 1n) return Either.left(new GapError({ expected: prev + 1n, actual }))
  return Either.right(undefined)
}

/**
 * Fails the stream when a block does not directly follow its predecessor.
 */
export const ensureContiguous = <A extends HasNumberOrSlot, E, R>(
  self: Stream.Stream<A, E, R>
): Stream.Stream<A, E | SequenceError, R> =>
  Stream.mapAccumEffect(
    self,
    Option.none<A>(),
    (previous, block): Effect.Effect<readonly [Option.Option<A>, A], SequenceError> =>
      Option.match(previous, {
        onNone: () => Effect.succeed([Option.some(block), block] as const),
        onSome: (previous) =>
          Either.match(checkSuccessor(previous, block), {
            onLeft: (error) => Effect.fail(error),
            onRight: () => Effect.succeed([Option.some(block), block] as const)
          })
      })
  )

/**
 * Logs every block whose number or slot is a multiple of `every`. The stream
 * dies when `every` is not positive.
 */
export const logProgress: {
  (every: bigint): <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>) => Stream.Stream<A, E, R>
  <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>, every: bigint): Stream.Stream<A, E, R>
} = dual(
  2,
  <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>, every: bigint): Stream.Stream<A, E, R> =>
    every <= 0n
      ? Stream.dieMessage(`logProgress interval must be positive, got ${every}`)
      : Stream.tap(self, (block) => {
        const number = numberOrSlot(block)
        return number % every === 0n
          ? Effect.log("Block progress").pipe(Effect.annotateLogs("block", String(number)))
          : Effect.void
      })
)

export interface BlockGroup<A> {
  /**
   * First number of the range, inclusive.
   */
  readonly start: bigint
  /**
   * Last number of the range, inclusive.
   */
  readonly end: bigint
  readonly blocks: ReadonlyArray<A>
}

/**
 * Groups adjacent blocks falling into the same range of `span` numbers,
 * aligned on multiples of `span`. The stream dies when `span` is not
 * positive.
 */
export const groupByRange: {
  (span: bigint): <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>) => Stream.Stream<BlockGroup<A>, E, R>
  <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>, span: bigint): Stream.Stream<BlockGroup<A>, E, R>
} = dual(
  2,
  <A extends HasNumberOrSlot, E, R>(self: Stream.Stream<A, E, R>, span: bigint): Stream.Stream<BlockGroup<A>, E, R> =>
    span <= 0n
      ? Stream.dieMessage(`groupByRange span must be positive, got ${span}`)
      : self.pipe(
        Stream.groupAdjacentBy((block) => numberOrSlot(block) / span),
        Stream.map(([range, blocks]) => ({
          start: range * span,
          end: range * span + span - 1n,
          blocks: Arr.fromIterable(blocks)
        }))
      )
)
