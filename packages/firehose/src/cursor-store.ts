/**
 * CursorStore module - persistence of stream resumption points.
 *
 * @example
 * ```typescript
 * import * as KeyValueStore from "@effect/platform/KeyValueStore"
 * import { KeyValueCursorStore } from "firehose-client/cursor-store"
 *
 * const CursorStoreLive = KeyValueCursorStore.layer.pipe(
 *   Layer.provide(KeyValueStore.layerMemory)
 * )
 * ```
 *
 * @module
 */

// =============================================================================
// Errors
// =============================================================================

export { CursorStoreError } from "./cursor-store/errors.ts"

// =============================================================================
// CursorStore Service
// =============================================================================

export { CursorStore, type CursorStoreService } from "./cursor-store/service.ts"

// =============================================================================
// Layers
// =============================================================================

export * as InMemoryCursorStore from "./cursor-store/memory-store.ts"

export * as KeyValueCursorStore from "./cursor-store/key-value-store.ts"
