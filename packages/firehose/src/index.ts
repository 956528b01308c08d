/**
 * Block identity, cursors, fork steps and block payloads.
 */
export * as Core from "./core.ts"

/**
 * The streaming request and the single-block request with its references.
 */
export * as Requests from "./request.ts"

/**
 * Streamed and fetched responses.
 */
export * as Responses from "./response.ts"

/**
 * The contract for converting responses into typed blocks.
 */
export * as Conversion from "./conversion.ts"

/**
 * The transport seam, its errors and the gRPC implementation.
 */
export * as Transport from "./transport.ts"

/**
 * Resumable block streaming.
 */
export * as StreamClient from "./stream-client.ts"

/**
 * Single-block fetches.
 */
export * as FetchClient from "./fetch-client.ts"

/**
 * Persistence of stream cursors.
 */
export * as CursorStore from "./cursor-store.ts"

/**
 * Local bookkeeping of New, Undo and Final steps.
 */
export * as CanonicalChain from "./canonical-chain.ts"

/**
 * Generic processing of streams of numbered blocks.
 */
export * as Sequence from "./sequence.ts"

/**
 * Environment configuration and the retry policy.
 */
export * as Config from "./config.ts"
