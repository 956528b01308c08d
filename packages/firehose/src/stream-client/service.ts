/**
 * StreamClient service - block streaming with cursor resumption.
 *
 * The client keeps the cursor of the last delivered response. When the
 * connection fails with a retryable error it reconnects with the original
 * request and that cursor, so the stream continues where it stopped without
 * the consumer noticing. Delivery is at least once: a restarted process
 * resumes from the last committed cursor and may see blocks again.
 *
 * @module
 */
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import * as Schedule from "effect/Schedule"
import * as Stream from "effect/Stream"
import { makeRetrySchedule, RetryPolicy } from "../config.ts"
import type { Cursor } from "../core/domain.ts"
import type { Displayable, FromResponse } from "../conversion/from-response.ts"
import { CursorStoreError } from "../cursor-store/errors.ts"
import { CursorStore, type CursorStoreService } from "../cursor-store/service.ts"
import type { Request } from "../request/stream-request.ts"
import type { Response } from "../response/response.ts"
import type { TransportError } from "../transport/errors.ts"
import { Transport } from "../transport/service.ts"
import type { BlockMessage, CommitHandle, StreamClientError, StreamOptions } from "./types.ts"

// =============================================================================
// Service Interface
// =============================================================================

export interface StreamClientService {
  /**
   * The raw response stream of a single connection. Responses are passed
   * through in server order, without buffering, deduplication or
   * reconnection.
   */
  readonly blocks: (request: Request) => Stream.Stream<Response, TransportError>

  /**
   * Streams converted blocks with their commit handles, reconnecting from
   * the last delivered cursor after retryable failures.
   */
  readonly stream: <A, E extends Displayable>(
    request: Request,
    decoder: FromResponse<A, E>,
    options?: StreamOptions
  ) => Stream.Stream<readonly [BlockMessage<A, E>, CommitHandle], StreamClientError>

  /**
   * High-level consumer: commits each message after the handler succeeds.
   * A failing handler ends the stream and its message is not committed.
   */
  readonly forEach: <A, E extends Displayable, E2, R>(
    request: Request,
    decoder: FromResponse<A, E>,
    handler: (message: BlockMessage<A, E>) => Effect.Effect<void, E2, R>,
    options?: StreamOptions
  ) => Effect.Effect<void, StreamClientError | E2, R>
}

// =============================================================================
// Context.Tag
// =============================================================================

export class StreamClient extends Context.Tag("Firehose/StreamClient")<
  StreamClient,
  StreamClientService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const missingStore = (operation: "load" | "save", key: string) =>
  new CursorStoreError({ reason: "No CursorStore service is available", operation, key })

const loadCursor = (
  store: Option.Option<CursorStoreService>,
  key: string | undefined
): Effect.Effect<Option.Option<Cursor>, CursorStoreError> => {
  if (key === undefined) return Effect.succeedNone
  return Option.match(store, {
    onNone: () => Effect.fail(missingStore("load", key)),
    onSome: (store) => Effect.map(store.load(key), (stored) => Option.filter(stored, (cursor) => cursor !== ""))
  })
}

const makeCommitHandle = (
  store: Option.Option<CursorStoreService>,
  key: string | undefined,
  cursor: Cursor
): CommitHandle => {
  // An empty cursor is no resumption point and must not replace a stored one
  if (key === undefined || cursor === "") return { cursor, commit: Effect.void }
  return {
    cursor,
    commit: Option.match(store, {
      onNone: () => Effect.fail(missingStore("save", key)),
      onSome: (store) => store.save(key, cursor)
    })
  }
}

const make = Effect.gen(function*() {
  const transport = yield* Transport

  const blocks = (request: Request) => transport.blocks(request)

  // Responses of successive connections, each opened from the last delivered
  // cursor
  const resumable = Effect.fnUntraced(function*(
    request: Request,
    store: Option.Option<CursorStoreService>,
    options?: StreamOptions
  ) {
    const stored = yield* loadCursor(store, options?.cursorKey)
    const cursorRef = yield* Ref.make(Option.getOrElse(stored, () => request.cursor))

    const connect = Effect.gen(function*() {
      const cursor = yield* Ref.get(cursorRef)
      yield* Effect.logDebug("Opening Firehose stream").pipe(
        Effect.annotateLogs({
          cursor,
          startBlockNum: String(request.startBlockNum),
          stopBlockNum: String(request.stopBlockNum)
        })
      )
      return transport.blocks(cursor === "" ? request : request.withCursor(cursor))
    }).pipe(
      Stream.unwrap,
      Stream.tap((response) => response.cursor === "" ? Effect.void : Ref.set(cursorRef, response.cursor))
    )

    if (options?.retry === false) {
      return connect
    }

    const policy = yield* RetryPolicy
    const schedule = makeRetrySchedule(policy).pipe(
      Schedule.tapInput((error: TransportError) =>
        Ref.get(cursorRef).pipe(
          Effect.flatMap((cursor) =>
            Effect.logWarning("Firehose stream failed, reconnecting", error).pipe(
              Effect.annotateLogs({ cursor })
            )
          )
        )
      )
    )
    return Stream.retry(connect, schedule)
  })

  const stream = <A, E extends Displayable>(
    request: Request,
    decoder: FromResponse<A, E>,
    options?: StreamOptions
  ): Stream.Stream<readonly [BlockMessage<A, E>, CommitHandle], StreamClientError> =>
    Effect.gen(function*() {
      const store = yield* Effect.serviceOption(CursorStore)
      return resumable(request, store, options).pipe(
        Stream.unwrap,
        Stream.map((response) => {
          const message: BlockMessage<A, E> = {
            step: response.step,
            cursor: response.cursor,
            metadata: Option.fromNullable(response.metadata),
            block: decoder.fromResponse(response)
          }
          return [message, makeCommitHandle(store, options?.cursorKey, response.cursor)] as const
        })
      )
    }).pipe(
      Stream.unwrap,
      Stream.withSpan("StreamClient.stream")
    )

  const forEach = <A, E extends Displayable, E2, R>(
    request: Request,
    decoder: FromResponse<A, E>,
    handler: (message: BlockMessage<A, E>) => Effect.Effect<void, E2, R>,
    options?: StreamOptions
  ): Effect.Effect<void, StreamClientError | E2, R> =>
    stream(request, decoder, options).pipe(
      Stream.runForEach(
        Effect.fnUntraced(function*([message, handle]) {
          yield* handler(message)
          yield* handle.commit
        })
      ),
      Effect.withSpan("StreamClient.forEach")
    )

  return { blocks, stream, forEach } satisfies StreamClientService
})

// =============================================================================
// Layer
// =============================================================================

/**
 * Layer providing StreamClient.
 *
 * Requires a Transport. The CursorStore, when streams use a `cursorKey`, and
 * the RetryPolicy are looked up in the context of each stream.
 */
export const layer: Layer.Layer<StreamClient, never, Transport> = Layer.effect(StreamClient, make)
