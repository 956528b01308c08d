/**
 * CursorStore service: persistence of stream resumption points.
 *
 * @module
 */
import * as Context from "effect/Context"
import type * as Effect from "effect/Effect"
import type * as Option from "effect/Option"
import type { Cursor } from "../core/domain.ts"
import type { CursorStoreError } from "./errors.ts"

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Keeps the last committed cursor of every named stream.
 *
 * Implementations:
 * - InMemoryCursorStore: development and testing (no persistence)
 * - KeyValueCursorStore: any `@effect/platform` KeyValueStore backend
 */
export interface CursorStoreService {
  /**
   * Returns the last committed cursor for `key`, if any.
   */
  readonly load: (key: string) => Effect.Effect<Option.Option<Cursor>, CursorStoreError>

  /**
   * Records `cursor` as the resumption point for `key`, replacing the
   * previous one.
   */
  readonly save: (key: string, cursor: Cursor) => Effect.Effect<void, CursorStoreError>

  /**
   * Forgets the cursor for `key`. Must be idempotent.
   */
  readonly clear: (key: string) => Effect.Effect<void, CursorStoreError>
}

// =============================================================================
// Context.Tag
// =============================================================================

export class CursorStore extends Context.Tag("Firehose/CursorStore")<
  CursorStore,
  CursorStoreService
>() {}
