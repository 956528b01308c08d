/**
 * Response model for the streaming and single-block fetch endpoints.
 *
 * @module
 */
export { type BlockEnvelope, Response, SingleBlockResponse } from "./response/response.ts"
