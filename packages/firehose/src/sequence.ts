/**
 * Sequence module - generic processing of streams of blocks which implement
 * `HasNumberOrSlot`.
 *
 * @module
 */
export { GapError, OutOfOrderError, type SequenceError } from "./sequence/errors.ts"

export {
  type BlockGroup,
  checkSuccessor,
  ensureContiguous,
  groupByRange,
  logProgress
} from "./sequence/operators.ts"
