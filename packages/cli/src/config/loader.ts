/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { SESSION_PRESETS } from '@chesslab/core';
import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ChesslabConfig, CliOptions } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialConfig } from './validation.js';

type ConfigSection = keyof ChesslabConfig;

/**
 * Environment variable mapping
 * Maps env var names to config section and key
 */
const ENV_VAR_MAP: Record<string, [ConfigSection, string]> = {
  // API Keys
  OPENAI_API_KEY: ['llm', 'apiKey'],

  // LLM
  OPENAI_MODEL: ['llm', 'model'],
  CHESSLAB_LLM_TIMEOUT: ['llm', 'timeout'],

  // Engine
  CHESSLAB_ENGINE_KIND: ['engine', 'kind'],
  CHESSLAB_ENGINE_PATH: ['engine', 'path'],
  CHESSLAB_ENGINE_HOST: ['engine', 'host'],
  CHESSLAB_ENGINE_PORT: ['engine', 'port'],
  CHESSLAB_ENGINE_TIME_MS: ['engine', 'timeBudgetMs'],

  // Advisory
  CHESSLAB_TRANSCRIPT_CAP: ['advisory', 'transcriptCap'],
  CHESSLAB_HISTORY_WINDOW: ['advisory', 'historyWindow'],
};

const NUMERIC_KEYS = new Set(['port', 'timeout', 'timeBudgetMs', 'transcriptCap', 'historyWindow']);

/**
 * Deep merge two configurations
 * Source values override target values
 */
function deepMerge(target: ChesslabConfig, source: PartialConfig): ChesslabConfig {
  return {
    engine: { ...target.engine, ...source.engine },
    llm: { ...target.llm, ...source.llm },
    session: { ...target.session, ...source.session },
    advisory: { ...target.advisory, ...source.advisory },
  };
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, key: string): unknown {
  if (NUMERIC_KEYS.has(key)) {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an unusable value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: Partial<Record<ConfigSection, Record<string, unknown>>> = {};

  for (const [envVar, [section, key]] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const target = config[section] ?? {};
      target[key] = parseEnvValue(value, key);
      config[section] = target;
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('chesslab', {
    searchPlaces: [
      'package.json',
      '.chesslabrc',
      '.chesslabrc.json',
      '.chesslabrc.yaml',
      '.chesslabrc.yml',
      'chesslab.config.js',
      'chesslab.config.cjs',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search();
  if (result && result.config) {
    return validatePartialConfig(result.config);
  }

  return null;
}

/**
 * Map CLI options to config object
 *
 * A mode sets both seats; --white and --black then override one seat each.
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const config: PartialConfig = {};

  const preset = options.mode !== undefined ? SESSION_PRESETS[options.mode] : undefined;
  const white = options.white ?? preset?.white;
  const black = options.black ?? preset?.black;
  if (white !== undefined || black !== undefined || options.fen !== undefined) {
    config.session = {
      ...(white !== undefined && { white }),
      ...(black !== undefined && { black }),
      ...(options.fen !== undefined && { startFen: options.fen }),
    };
  }

  if (options.engineTime !== undefined) {
    config.engine = { timeBudgetMs: options.engineTime };
  }

  if (options.model !== undefined) {
    config.llm = { model: options.model };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ChesslabConfig> {
  let config = deepMerge(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  validateConfig(config);

  return config;
}

/**
 * Format configuration for display, with the API key masked
 */
export function formatConfig(config: ChesslabConfig): string {
  const masked: ChesslabConfig = {
    ...config,
    llm: {
      ...config.llm,
      ...(config.llm.apiKey !== undefined && { apiKey: maskSecret(config.llm.apiKey) }),
    },
  };
  return JSON.stringify(masked, null, 2);
}

/**
 * Keep the last four characters of a secret
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) {
    return '****';
  }
  return `****${secret.slice(-4)}`;
}
