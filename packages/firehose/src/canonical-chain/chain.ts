/**
 * Consumer-side bookkeeping of the canonical chain as seen through fork
 * steps.
 *
 * A chain is an immutable list of blocks, ordered by number, plus the number
 * of the last block known to be final. Every operation returns a new chain.
 * Steps redelivered after a reconnection (at-least-once delivery) are
 * absorbed: a repeated `New` of the tip and an `Undo` of a block which is no
 * longer in the chain leave it unchanged.
 *
 * @module
 */
import * as Arr from "effect/Array"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import type { BlockNumber, ForkStep } from "../core/domain.ts"
import type { BlockMessage } from "../stream-client/types.ts"
import { type CanonicalChainError, ForkSequenceError, UndoFinalizedBlockError } from "./errors.ts"

// =============================================================================
// Types
// =============================================================================

export interface ChainEntry<A> {
  readonly number: BlockNumber
  /**
   * The block hash, as reported in the response metadata.
   */
  readonly id: string
  readonly block: A
}

export interface CanonicalChain<A> {
  readonly entries: ReadonlyArray<ChainEntry<A>>
  readonly finalNumber: Option.Option<BlockNumber>
}

// =============================================================================
// Constructors
// =============================================================================

export const empty = <A>(): CanonicalChain<A> => ({
  entries: [],
  finalNumber: Option.none()
})

/**
 * Builds a chain entry from a streamed message. Messages without metadata
 * have no position and yield `None`.
 */
export const fromMessage = <A, E>(
  message: BlockMessage<A, E>
): Option.Option<ChainEntry<Either.Either<A, E>>> =>
  Option.map(message.metadata, (metadata) => ({
    number: metadata.num,
    id: metadata.id,
    block: message.block
  }))

// =============================================================================
// Queries
// =============================================================================

export const tip = <A>(chain: CanonicalChain<A>): Option.Option<ChainEntry<A>> => Arr.last(chain.entries)

const sameBlock = <A>(a: ChainEntry<A>, b: ChainEntry<A>): boolean => a.number === b.number && a.id === b.id

export const contains = <A>(chain: CanonicalChain<A>, entry: ChainEntry<A>): boolean =>
  chain.entries.some((existing) => sameBlock(existing, entry))

const isFinalized = <A>(chain: CanonicalChain<A>, number: BlockNumber): boolean =>
  Option.exists(chain.finalNumber, (finalNumber) => number <= finalNumber)

// =============================================================================
// Steps
// =============================================================================

const sequenceError = <A>(chain: CanonicalChain<A>, step: ForkStep, entry: ChainEntry<A>) =>
  new ForkSequenceError({
    step,
    number: entry.number,
    id: entry.id,
    tip: Option.getOrUndefined(Option.map(tip(chain), (tip) => tip.number))
  })

const applyNew = <A>(
  chain: CanonicalChain<A>,
  entry: ChainEntry<A>
): Either.Either<CanonicalChain<A>, CanonicalChainError> =>
  Option.match(tip(chain), {
    onNone: () => Either.right({ ...chain, entries: [entry] }),
    onSome: (last) => {
      if (sameBlock(last, entry)) return Either.right(chain)
      if (entry.number > last.number) return Either.right({ ...chain, entries: [...chain.entries, entry] })
      return Either.left(sequenceError(chain, "New", entry))
    }
  })

const applyUndo = <A>(
  chain: CanonicalChain<A>,
  entry: ChainEntry<A>
): Either.Either<CanonicalChain<A>, CanonicalChainError> => {
  if (Option.isSome(chain.finalNumber) && entry.number <= chain.finalNumber.value) {
    return Either.left(
      new UndoFinalizedBlockError({ number: entry.number, id: entry.id, finalNumber: chain.finalNumber.value })
    )
  }
  if (!contains(chain, entry)) return Either.right(chain)
  if (Option.exists(tip(chain), (last) => sameBlock(last, entry))) {
    return Either.right({ ...chain, entries: chain.entries.slice(0, -1) })
  }
  return Either.left(sequenceError(chain, "Undo", entry))
}

const applyFinal = <A>(
  chain: CanonicalChain<A>,
  entry: ChainEntry<A>
): Either.Either<CanonicalChain<A>, CanonicalChainError> => {
  if (isFinalized(chain, entry.number)) return Either.right(chain)
  const withEntry = contains(chain, entry) ? Either.right(chain) : applyNew(chain, entry)
  return Either.map(withEntry, (next) => ({ ...next, finalNumber: Option.some(entry.number) }))
}

/**
 * Applies a fork step to the chain.
 *
 * - `New` appends the block. It must be above the tip, or be the tip itself.
 * - `Undo` retracts the tip. Blocks not in the chain are ignored, final
 *   blocks cannot be undone.
 * - `Final` marks the block final, appending it first when it is new.
 */
export const apply = <A>(
  chain: CanonicalChain<A>,
  step: ForkStep,
  entry: ChainEntry<A>
): Either.Either<CanonicalChain<A>, CanonicalChainError> => {
  switch (step) {
    case "New":
      return applyNew(chain, entry)
    case "Undo":
      return applyUndo(chain, entry)
    case "Final":
      return applyFinal(chain, entry)
  }
}

/**
 * Drops the blocks below the last final block. The last final block itself is
 * kept as the anchor of the reversible segment.
 */
export const prune = <A>(chain: CanonicalChain<A>): CanonicalChain<A> =>
  Option.match(chain.finalNumber, {
    onNone: () => chain,
    onSome: (finalNumber) => ({
      ...chain,
      entries: chain.entries.filter((entry) => entry.number >= finalNumber)
    })
  })
