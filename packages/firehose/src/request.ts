/**
 * Request model for the streaming and single-block fetch endpoints.
 *
 * @module
 */

// =============================================================================
// Single Block Request
// =============================================================================

export {
  BlockHashAndNumberReference,
  BlockNumberReference,
  CursorReference,
  Reference,
  SingleBlockRequest
} from "./request/single-block-request.ts"

// =============================================================================
// Stream Request
// =============================================================================

export { Request } from "./request/stream-request.ts"
