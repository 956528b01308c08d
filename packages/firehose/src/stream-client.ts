/**
 * StreamClient module - resumable block streaming with typed conversion and
 * at-least-once delivery.
 *
 * @example
 * ```typescript
 * import { Request } from "firehose-client/request"
 * import { StreamClient } from "firehose-client/stream-client"
 *
 * const program = Effect.gen(function*() {
 *   const client = yield* StreamClient
 *
 *   yield* client.forEach(
 *     new Request({ startBlockNum: 17_000_000n }),
 *     decoder,
 *     Effect.fnUntraced(function*(message) {
 *       switch (message.step) {
 *         case "New":
 *           yield* insertBlock(message.block)
 *           break
 *         case "Undo":
 *           yield* revertBlock(message.block)
 *           break
 *         case "Final":
 *           break
 *       }
 *     }),
 *     { cursorKey: "mainnet" }
 *   )
 * })
 *
 * const AppLayer = StreamClient.layer.pipe(
 *   Layer.provide(layerGrpc({ endpoint: "https://firehose.example.com" })),
 *   Layer.provideMerge(InMemoryCursorStore.layer)
 * )
 * ```
 *
 * @module
 */

// =============================================================================
// Messages
// =============================================================================

export type { BlockMessage, CommitHandle, StreamClientError, StreamOptions } from "./stream-client/types.ts"

// =============================================================================
// StreamClient Service
// =============================================================================

export { layer, StreamClient, type StreamClientService } from "./stream-client/service.ts"
