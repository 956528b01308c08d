/**
 * The block identity abstraction.
 *
 * Generic sequencing utilities only ever ask a block for its number or slot.
 * Implementations are expected to be immutable values, so that a block can
 * be retained and moved between fibers after the response which produced it
 * is gone.
 *
 * @module
 */
import * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"

/**
 * A block which knows its position in the chain.
 */
export interface HasNumberOrSlot {
  /**
   * Returns the block number, or the slot for chains which use slots. Must
   * be pure.
   */
  numberOrSlot(): bigint
}

export const numberOrSlot = (block: HasNumberOrSlot): bigint => block.numberOrSlot()

export const isHasNumberOrSlot = (u: unknown): u is HasNumberOrSlot =>
  Predicate.hasProperty(u, "numberOrSlot") && Predicate.isFunction(u.numberOrSlot)

/**
 * Orders blocks by ascending number or slot.
 */
export const ByNumberOrSlot: Order.Order<HasNumberOrSlot> = Order.mapInput(Order.bigint, numberOrSlot)
