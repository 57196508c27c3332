/**
 * Configuration module exports
 */

// Schema types
export type {
  EngineConfigSchema,
  LLMConfigSchema,
  SessionConfigSchema,
  AdvisoryConfigSchema,
  ChesslabConfig,
  CliOptions,
  ExportOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_LLM_CONFIG,
  DEFAULT_SESSION_SEATS,
  DEFAULT_ADVISORY_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  sourceKindSchema,
  sessionModeSchema,
  engineKindSchema,
  ConfigValidationError,
  toValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, mapCliToConfig, formatConfig, maskSecret } from './loader.js';
