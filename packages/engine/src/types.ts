/**
 * Engine provider types
 * The gRPC shapes match protos/engine.proto
 */

/**
 * Health check response
 */
export interface EngineHealthCheckResponse {
  healthy: boolean;
  /** Engine name and version */
  version: string;
}

/**
 * A move source that searches a position for a bounded time
 */
export interface EngineClient {
  /**
   * Best move for the side to move, in UCI notation
   *
   * @param fen - Position in FEN notation
   * @param timeBudgetMs - Search time; the call fails rather than wait far past it
   */
  bestMove(fen: string, timeBudgetMs: number): Promise<string>;

  healthCheck(): Promise<EngineHealthCheckResponse>;

  close(): void;
}

/**
 * Request for a best-move search
 */
export interface BestMoveRequest {
  fen: string;
  timeLimitMs: number;
  /** 0 = engine default */
  skillLevel: number;
}
