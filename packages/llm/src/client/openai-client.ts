/**
 * OpenAI client wrapper with retry logic and error handling
 */

import OpenAILib from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { LLMConfig } from '../config/llm-config.js';
import {
  LLMError,
  LLMErrorCode,
  AuthenticationError,
  RateLimitError,
  TimeoutError,
  APIError,
} from '../errors.js';

import { CircuitBreaker } from './circuit-breaker.js';
import type {
  ChatMessage,
  LLMRequest,
  LLMResponse,
  TokenUsage,
  HealthStatus,
  CircuitState,
} from './types.js';

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Add jitter to a delay (+/-25%)
 */
function addJitter(delayMs: number): number {
  const jitter = delayMs * 0.25 * (Math.random() * 2 - 1);
  return Math.round(delayMs + jitter);
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export interface OpenAIClientOptions {
  /** Receives retry and circuit notices (default: console.warn) */
  onWarning?: (message: string) => void;
}

/**
 * OpenAI client with retry logic and circuit breaker
 */
export class OpenAIClient {
  private readonly client: OpenAILib;
  private readonly config: LLMConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly onWarning: (message: string) => void;
  private tokensUsed = 0;
  private lastError: string | undefined;

  /**
   * @throws AuthenticationError if no API key is configured
   */
  constructor(config: LLMConfig, options: OpenAIClientOptions = {}) {
    if (!config.apiKey) {
      throw new AuthenticationError('No OpenAI API key configured (set OPENAI_API_KEY)');
    }

    this.config = config;
    this.onWarning = options.onWarning ?? ((message) => console.warn(message));
    this.client = new OpenAILib({
      apiKey: config.apiKey,
      timeout: config.timeout,
      // Retries are ours
      maxRetries: 0,
    });
    this.circuitBreaker = new CircuitBreaker(config.circuitBreaker, {
      // Caller-side problems say nothing about the service's health
      countsAsFailure: (error) => !(error instanceof LLMError) || error.retryable,
      onStateChange: (from, to) => this.onWarning(`Advisor circuit ${from} -> ${to}`),
    });
  }

  /**
   * Send a chat completion request with retry logic
   */
  async chat(request: LLMRequest): Promise<LLMResponse> {
    return this.circuitBreaker.execute(async () => {
      return this.withRetry(() => this.doChat(request));
    });
  }

  /**
   * Get current health status
   */
  getHealthStatus(): HealthStatus {
    return {
      healthy: this.circuitBreaker.getState() !== 'open',
      circuitState: this.circuitBreaker.getState(),
      tokensUsed: this.tokensUsed,
      consecutiveFailures: this.circuitBreaker.getFailureCount(),
      lastError: this.lastError,
    };
  }

  /**
   * Get circuit breaker state
   */
  getCircuitState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  /**
   * Model requests are sent to
   */
  get model(): string {
    return this.config.model;
  }

  private async doChat(request: LLMRequest): Promise<LLMResponse> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: request.messages.map(toMessageParam),
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw new LLMError('No response from LLM', LLMErrorCode.INVALID_RESPONSE, false);
      }

      const usage: TokenUsage = {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      };
      this.tokensUsed += usage.totalTokens;

      return {
        content: choice.message.content ?? '',
        finishReason: this.mapFinishReason(choice.finish_reason),
        usage,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    const config = this.config.retry;
    let delay = config.initialDelayMs;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const llmError = this.mapError(error);
        this.lastError = llmError.message;

        if (!llmError.retryable || attempt >= config.maxRetries) {
          throw llmError;
        }

        // Rate limits wait at least as long as the server asks
        const wait =
          llmError instanceof RateLimitError
            ? Math.min(Math.max(delay, llmError.retryAfterMs), config.maxDelayMs)
            : delay;
        const waitWithJitter = addJitter(wait);
        this.onWarning(
          `${llmError.message} (attempt ${attempt + 1}/${config.maxRetries + 1}), retrying in ${waitWithJitter}ms`,
        );
        await sleep(waitWithJitter);
        delay = Math.min(delay * config.backoffMultiplier, config.maxDelayMs);
      }
    }
  }

  private mapError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof OpenAILib.APIError) {
      if (error.status === 401 || error.status === 403) {
        return new AuthenticationError(`OpenAI rejected the API key: ${error.message}`, error);
      }

      if (error.status === 429) {
        return new RateLimitError(this.parseRetryAfter(error), error);
      }

      if (error.status === 408 || /timed? ?out/i.test(error.message)) {
        return new TimeoutError('chat', this.config.timeout, error);
      }

      return new APIError(error.message, error.status, error);
    }

    // Unknown error
    return new LLMError(
      error instanceof Error ? error.message : String(error),
      LLMErrorCode.API_ERROR,
      true,
      error instanceof Error ? error : undefined,
    );
  }

  private parseRetryAfter(error: {
    headers?: Record<string, string | null | undefined> | undefined;
  }): number {
    const retryAfter = error.headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    // Default to 5 seconds
    return 5000;
  }

  private mapFinishReason(reason: string | null): 'stop' | 'length' | 'content_filter' {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
