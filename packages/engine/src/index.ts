/**
 * @chesslab/engine - engine move providers for chesslab
 *
 * This package provides:
 * - UciEngine: a local UCI engine (e.g. Stockfish) run as a child process
 * - GrpcEngineClient: a remote engine service over gRPC
 */

export const VERSION = '0.1.0';

// Re-export clients
export {
  GrpcEngineClient,
  DEFAULT_ENGINE_SERVICE_CONFIG,
  defaultProtoRoot,
  type ClientConfig,
  type GrpcEngineConfig,
} from './clients/index.js';

export {
  UciEngine,
  DEFAULT_UCI_ENGINE_CONFIG,
  type EngineProcess,
  type SpawnEngine,
  type UciEngineConfig,
  type UciEngineOptions,
} from './uci/uci-engine.js';

export { createEngineClient, type EngineKind, type EngineSettings } from './factory.js';

// Re-export types
export type { EngineClient, EngineHealthCheckResponse, BestMoveRequest } from './types.js';

// Re-export errors
export {
  EngineError,
  EngineErrorCode,
  EngineUnavailableError,
  EngineProcessError,
  EngineTimeoutError,
  NoMoveError,
  mapGrpcError,
} from './errors.js';
