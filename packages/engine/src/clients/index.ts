/**
 * gRPC client exports
 */

export { BaseGrpcClient, defaultProtoRoot, type ClientConfig } from './base.js';
export {
  GrpcEngineClient,
  DEFAULT_ENGINE_SERVICE_CONFIG,
  type GrpcEngineConfig,
} from './grpc-engine.js';
