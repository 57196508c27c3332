import { GrpcEngineClient } from './clients/grpc-engine.js';
import type { EngineClient } from './types.js';
import { UciEngine, type UciEngineOptions } from './uci/uci-engine.js';

/**
 * How the engine is reached
 */
export type EngineKind = 'uci' | 'grpc';

export interface EngineSettings {
  kind: EngineKind;
  /** Executable for `uci` */
  path?: string;
  /** Service address for `grpc` */
  host?: string;
  port?: number;
  skillLevel?: number;
}

/**
 * Create the engine client described by the settings
 */
export function createEngineClient(
  settings: EngineSettings,
  options: UciEngineOptions = {},
): EngineClient {
  if (settings.kind === 'grpc') {
    return new GrpcEngineClient({
      ...(settings.host !== undefined && { host: settings.host }),
      ...(settings.port !== undefined && { port: settings.port }),
      ...(settings.skillLevel !== undefined && { skillLevel: settings.skillLevel }),
    });
  }

  return new UciEngine(
    {
      ...(settings.path !== undefined && { path: settings.path }),
      ...(settings.skillLevel !== undefined && { skillLevel: settings.skillLevel }),
    },
    options,
  );
}
