/**
 * Messages and handles emitted by the StreamClient.
 *
 * @module
 */
import type * as Effect from "effect/Effect"
import type * as Either from "effect/Either"
import type * as Option from "effect/Option"
import type { BlockMetadata, Cursor, ForkStep } from "../core/domain.ts"
import type { CursorStoreError } from "../cursor-store/errors.ts"
import type { TransportError } from "../transport/errors.ts"

// =============================================================================
// Messages
// =============================================================================

/**
 * A streamed block after conversion.
 *
 * `block` holds either the converted block or the conversion error. A block
 * which fails to convert is still delivered, so the consumer decides whether
 * to skip it, stop, or record the failure.
 */
export interface BlockMessage<A, E> {
  readonly step: ForkStep
  /**
   * The cursor which resumes the stream right after this message.
   */
  readonly cursor: Cursor
  readonly metadata: Option.Option<BlockMetadata>
  readonly block: Either.Either<A, E>
}

// =============================================================================
// CommitHandle
// =============================================================================

/**
 * Handle for recording that a message has been processed.
 *
 * Committing persists the message cursor, so a restarted stream resumes
 * after it. Blocks received after the last commit are delivered again on
 * restart. Without a `cursorKey`, or for a response without a cursor, there
 * is nothing to persist and `commit` does nothing.
 *
 * @example
 * ```typescript
 * yield* client.stream(request, decoder, { cursorKey: "mainnet" }).pipe(
 *   Stream.runForEach(Effect.fnUntraced(function*([message, handle]) {
 *     yield* processMessage(message)
 *     yield* handle.commit
 *   }))
 * )
 * ```
 */
export interface CommitHandle {
  readonly cursor: Cursor
  readonly commit: Effect.Effect<void, CursorStoreError>
}

// =============================================================================
// Options
// =============================================================================

export interface StreamOptions {
  /**
   * Name of the stream in the `CursorStore`. When set, the stream resumes
   * from the stored cursor and commits persist new cursors under this name.
   */
  readonly cursorKey?: string | undefined
  /**
   * Reconnect after retryable transport failures, following the
   * `RetryPolicy`. Defaults to `true`.
   */
  readonly retry?: boolean | undefined
}

// =============================================================================
// Errors
// =============================================================================

export type StreamClientError = TransportError | CursorStoreError
