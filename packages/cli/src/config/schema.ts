/**
 * Configuration schema types for the chesslab CLI
 */

import type { SessionMode, SourceKind } from '@chesslab/core';
import type { EngineKind } from '@chesslab/engine';

/**
 * Engine configuration
 */
export interface EngineConfigSchema {
  /** `uci` runs a local executable, `grpc` asks a remote service */
  kind: EngineKind;
  /** Engine executable for `uci` (searched on PATH) */
  path: string;
  /** Service host for `grpc` */
  host: string;
  /** Service port for `grpc` */
  port: number;
  /** Search time per engine move or hint (ms) */
  timeBudgetMs: number;
  /** UCI `Skill Level` (engine default when unset) */
  skillLevel?: number;
}

/**
 * LLM configuration
 */
export interface LLMConfigSchema {
  /** OpenAI API key (from env var); the advisor is disabled without one */
  apiKey?: string;
  /** Model to use */
  model: string;
  /** Temperature for generation (0.0-2.0) */
  temperature: number;
  /** Request timeout in milliseconds */
  timeout: number;
}

/**
 * Seats and start position of a new session
 */
export interface SessionConfigSchema {
  white: SourceKind;
  black: SourceKind;
  startFen?: string;
}

/**
 * Advisor conversation limits
 */
export interface AdvisoryConfigSchema {
  /** Transcript turns kept before the oldest are dropped */
  transcriptCap: number;
  /** Recent moves included in advisor prompts */
  historyWindow: number;
}

/**
 * Complete chesslab configuration
 */
export interface ChesslabConfig {
  engine: EngineConfigSchema;
  llm: LLMConfigSchema;
  session: SessionConfigSchema;
  advisory: AdvisoryConfigSchema;
}

/**
 * Options of the `play` command after parsing
 */
export interface CliOptions {
  /** Explicit config file path */
  config?: string;
  /** Seat preset */
  mode?: SessionMode;
  white?: SourceKind;
  black?: SourceKind;
  /** Start position */
  fen?: string;
  /** PGN file to load before play starts */
  pgn?: string;
  /** Engine search time (ms) */
  engineTime?: number;
  /** OpenAI model */
  model?: string;
  /** Print resolved configuration and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Options of the `export` command after parsing
 */
export interface ExportOptions {
  pgn: string;
  white?: string;
  black?: string;
  event?: string;
  noColor?: boolean;
}
