/**
 * Remote engine client over gRPC
 */

import { NoMoveError } from '../errors.js';
import type { BestMoveRequest, EngineClient, EngineHealthCheckResponse } from '../types.js';

import { BaseGrpcClient, type ClientConfig } from './base.js';

/**
 * Default configuration for the engine service client
 */
export const DEFAULT_ENGINE_SERVICE_CONFIG: ClientConfig = {
  host: 'localhost',
  port: 50051,
  timeoutMs: 30000,
};

/**
 * Extra deadline on top of the search time, for transport and setup
 */
const DEADLINE_GRACE_MS = 2000;

export interface GrpcEngineConfig extends ClientConfig {
  /** Engine skill level sent with each request (0 = engine default) */
  skillLevel?: number;
}

/**
 * Client for a remote engine service
 */
export class GrpcEngineClient extends BaseGrpcClient implements EngineClient {
  private readonly skillLevel: number;

  constructor(config: Partial<GrpcEngineConfig> = {}) {
    super({
      ...DEFAULT_ENGINE_SERVICE_CONFIG,
      ...config,
    });
    this.skillLevel = config.skillLevel ?? 0;
  }

  protected getProtoPath(): string {
    return 'engine.proto';
  }

  protected getServiceName(): string {
    return 'EngineService';
  }

  protected getPackageName(): string {
    return 'chesslab.engine';
  }

  /**
   * Ask the service for the best move in a position
   *
   * @param fen - Position in FEN notation
   * @param timeBudgetMs - Search time granted to the engine
   * @returns Best move in UCI notation
   */
  async bestMove(fen: string, timeBudgetMs: number): Promise<string> {
    const request: BestMoveRequest = {
      fen,
      timeLimitMs: Math.max(1, Math.round(timeBudgetMs)),
      skillLevel: this.skillLevel,
    };

    const response = await this.unaryCall<BestMoveRequest, RawBestMoveResponse>(
      'bestMove',
      request,
      request.timeLimitMs + DEADLINE_GRACE_MS,
    );

    const move = (response.bestMove || '').trim();
    if (!move) {
      throw new NoMoveError(fen);
    }
    return move;
  }

  /**
   * Check if the engine service is healthy
   */
  async healthCheck(): Promise<EngineHealthCheckResponse> {
    const response = await this.unaryCall<Record<string, never>, RawHealthCheckResponse>(
      'healthCheck',
      {},
    );

    return {
      healthy: response.healthy,
      version: response.version,
    };
  }
}

/**
 * Raw responses from gRPC (proto-loader converts fields to camelCase)
 */
interface RawBestMoveResponse {
  bestMove: string;
  ponder: string;
}

interface RawHealthCheckResponse {
  healthy: boolean;
  version: string;
}
