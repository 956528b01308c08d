/**
 * FetchClient module - fetch one block by number, by hash and number, or by
 * cursor.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function*() {
 *   const client = yield* FetchClient
 *   return yield* client.fetchBlock(SingleBlockRequest.newByBlockNumber(12345), decoder)
 * })
 * ```
 *
 * @module
 */
export { FetchClient, type FetchClientService, layer } from "./fetch-client/service.ts"
