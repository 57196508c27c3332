/**
 * Configuration types and defaults for LLM operations
 */

/**
 * Retry configuration for API calls
 */
export interface RetryConfig {
  /** Maximum number of retries (default: 2) */
  maxRetries: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier: number;
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  /** Number of failures before opening circuit (default: 5) */
  failureThreshold: number;
  /** Number of successes in half-open state before closing (default: 2) */
  successThreshold: number;
  /** Time in open state before transitioning to half-open (default: 30000ms) */
  resetTimeoutMs: number;
}

/**
 * Main LLM configuration
 */
export interface LLMConfig {
  /** OpenAI API key (required) */
  apiKey: string;
  /** Model to use (default: 'gpt-4o-mini') */
  model: string;
  /** Temperature for generation (default: 0.7) */
  temperature: number;
  /** Request timeout in milliseconds (default: 30000) */
  timeout: number;
  /** Maximum tokens per reply (default: 600) */
  maxTokens: number;
  /** Retry settings */
  retry: RetryConfig;
  /** Circuit breaker settings */
  circuitBreaker: CircuitBreakerConfig;
}

/**
 * Default retry configuration
 *
 * A player is waiting on every request, so retries stay short.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

/**
 * Default circuit breaker configuration
 */
export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30000,
};

/**
 * Default LLM configuration (requires apiKey to be provided)
 */
export const DEFAULT_LLM_CONFIG: Omit<LLMConfig, 'apiKey'> = {
  model: 'gpt-4o-mini',
  temperature: 0.7,
  timeout: 30000,
  maxTokens: 600,
  retry: DEFAULT_RETRY_CONFIG,
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
};

/**
 * Create a full LLM config with defaults for unspecified values
 */
export function createLLMConfig(partial: Partial<LLMConfig> & { apiKey: string }): LLMConfig {
  return {
    ...DEFAULT_LLM_CONFIG,
    ...partial,
    retry: { ...DEFAULT_RETRY_CONFIG, ...partial.retry },
    circuitBreaker: { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...partial.circuitBreaker },
  };
}

/**
 * Load LLM config from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<LLMConfig> {
  const config: Partial<LLMConfig> = {};

  if (env['OPENAI_API_KEY']) {
    config.apiKey = env['OPENAI_API_KEY'];
  }

  if (env['OPENAI_MODEL']) {
    config.model = env['OPENAI_MODEL'];
  }

  if (env['CHESSLAB_LLM_TIMEOUT']) {
    const timeout = parseInt(env['CHESSLAB_LLM_TIMEOUT'], 10);
    if (!isNaN(timeout)) {
      config.timeout = timeout;
    }
  }

  return config;
}
