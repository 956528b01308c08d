/**
 * CanonicalChain module - applying New, Undo and Final steps to a local view
 * of the chain.
 *
 * @module
 */
export { type CanonicalChainError, ForkSequenceError, UndoFinalizedBlockError } from "./canonical-chain/errors.ts"

export {
  apply,
  type CanonicalChain,
  type ChainEntry,
  contains,
  empty,
  fromMessage,
  prune,
  tip
} from "./canonical-chain/chain.ts"
