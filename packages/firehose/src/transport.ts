/**
 * The transport seam: opening block streams and fetching single blocks.
 *
 * @module
 */

// =============================================================================
// Errors
// =============================================================================

export {
  isRetryable,
  RequestEncodeError,
  ResponseDecodeError,
  RpcError,
  toRpcError,
  type TransportError,
  TransportSetupError
} from "./transport/errors.ts"

// =============================================================================
// Transport Service
// =============================================================================

export { Transport, type TransportService } from "./transport/service.ts"

// =============================================================================
// Call Metadata
// =============================================================================

export {
  CallMetadata,
  layerApiKey,
  layerBearerToken,
  layerMetadata,
  type MetadataEntry
} from "./transport/metadata.ts"

// =============================================================================
// gRPC
// =============================================================================

export {
  DEFAULT_MAX_RECEIVE_MESSAGE_LENGTH,
  type Endpoint,
  type GrpcTransportOptions,
  layerGrpc,
  parseEndpoint
} from "./transport/grpc.ts"

export { type FirehoseServices, loadFirehoseServices, loaderOptions, protoPath } from "./transport/proto.ts"

// =============================================================================
// Wire Mapping
// =============================================================================

export * as Wire from "./transport/wire.ts"
