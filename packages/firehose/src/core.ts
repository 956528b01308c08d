/**
 * Core domain primitives: block numbers, cursors, fork steps, payloads and
 * the block identity abstraction.
 *
 * @module
 */
export * from "./core/domain.ts"
export * from "./core/identity.ts"
