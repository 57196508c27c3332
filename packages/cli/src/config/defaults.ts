/**
 * Default configuration values
 */

import {
  DEFAULT_ENGINE_TIME_BUDGET_MS,
  DEFAULT_SESSION_CONFIG,
  DEFAULT_TRANSCRIPT_CAP,
} from '@chesslab/core';
import { DEFAULT_ENGINE_SERVICE_CONFIG, DEFAULT_UCI_ENGINE_CONFIG } from '@chesslab/engine';
import { DEFAULT_HISTORY_WINDOW, DEFAULT_LLM_CONFIG as LLM_PACKAGE_DEFAULTS } from '@chesslab/llm';

import type {
  AdvisoryConfigSchema,
  ChesslabConfig,
  EngineConfigSchema,
  LLMConfigSchema,
  SessionConfigSchema,
} from './schema.js';

/**
 * Default engine configuration: Stockfish found on PATH
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfigSchema = {
  kind: 'uci',
  path: DEFAULT_UCI_ENGINE_CONFIG.path,
  host: DEFAULT_ENGINE_SERVICE_CONFIG.host,
  port: DEFAULT_ENGINE_SERVICE_CONFIG.port,
  timeBudgetMs: DEFAULT_ENGINE_TIME_BUDGET_MS,
};

/**
 * Default LLM configuration
 */
export const DEFAULT_LLM_CONFIG: LLMConfigSchema = {
  model: LLM_PACKAGE_DEFAULTS.model,
  temperature: LLM_PACKAGE_DEFAULTS.temperature,
  timeout: LLM_PACKAGE_DEFAULTS.timeout,
};

/**
 * Default seats: a human playing White against the advisor
 */
export const DEFAULT_SESSION_SEATS: SessionConfigSchema = {
  white: DEFAULT_SESSION_CONFIG.white,
  black: DEFAULT_SESSION_CONFIG.black,
};

export const DEFAULT_ADVISORY_CONFIG: AdvisoryConfigSchema = {
  transcriptCap: DEFAULT_TRANSCRIPT_CAP,
  historyWindow: DEFAULT_HISTORY_WINDOW,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChesslabConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  llm: DEFAULT_LLM_CONFIG,
  session: DEFAULT_SESSION_SEATS,
  advisory: DEFAULT_ADVISORY_CONFIG,
};
