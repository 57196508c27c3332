/**
 * @chesslab/llm - natural-language advisor for chesslab
 *
 * This package provides:
 * - OpenAI client with retry logic and circuit breaker
 * - The advisor text provider built on it
 * - Prompt templates grounded in the current position
 * - Extraction of coordinate moves from advisor replies
 */

export const VERSION = '0.1.0';

// Client
export { OpenAIClient, type OpenAIClientOptions } from './client/openai-client.js';
export { CircuitBreaker, type CircuitBreakerOptions } from './client/circuit-breaker.js';
export type {
  ChatMessage,
  MessageRole,
  LLMRequest,
  LLMResponse,
  TokenUsage,
  CircuitState,
  HealthStatus,
} from './client/types.js';

// Advisor
export { OpenAIAdvisor, createOpenAIAdvisor, type TextGenerator } from './advisor/openai-advisor.js';

// Config
export {
  createLLMConfig,
  loadConfigFromEnv,
  DEFAULT_LLM_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type LLMConfig,
  type RetryConfig,
  type CircuitBreakerConfig,
} from './config/llm-config.js';

// Prompts
export { CHESS_ADVISOR_SYSTEM } from './prompts/system-prompts.js';
export {
  buildMovePrompt,
  buildQuestionPrompt,
  buildSummaryPrompt,
  formatMoveHistory,
  DEFAULT_HISTORY_WINDOW,
  type HistoryMove,
  type PositionContext,
} from './prompts/templates.js';

// Move extraction
export {
  extractCoordinateMove,
  parseAdvisorMove,
  MOVE_EXTRACTION_PATTERN,
} from './validator/move-extractor.js';

// Errors
export {
  LLMError,
  LLMErrorCode,
  AuthenticationError,
  RateLimitError,
  ValidationError,
  InvalidResponseError,
  TimeoutError,
  CircuitOpenError,
  APIError,
} from './errors.js';
