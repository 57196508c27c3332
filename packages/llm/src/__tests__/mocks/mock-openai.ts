/**
 * Mock OpenAI module for testing
 *
 * Use with:
 *   vi.mock('openai', async () => (await import('./mocks/mock-openai.js')).mockOpenAIModule);
 */

import { vi } from 'vitest';

import type { LLMConfig } from '../../config/llm-config.js';
import { createLLMConfig } from '../../config/llm-config.js';

/**
 * Stand-in for the SDK's APIError
 */
export class MockAPIError extends Error {
  constructor(
    public readonly status: number | undefined,
    message: string,
    public readonly headers: Record<string, string> = {},
  ) {
    super(message);
  }
}

/**
 * Shared `chat.completions.create` spy behind every mocked client
 */
export const createCompletion = vi.fn();

/**
 * Options each mocked client was constructed with
 */
export const constructedWith: unknown[] = [];

class MockOpenAI {
  static APIError = MockAPIError;

  chat = { completions: { create: createCompletion } };

  constructor(options: unknown) {
    constructedWith.push(options);
  }
}

export const mockOpenAIModule = {
  default: MockOpenAI,
  APIError: MockAPIError,
};

/**
 * A chat completion response with the given content
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function completion(content: string | null) {
  return {
    choices: [
      {
        message: { content },
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: 100,
      completion_tokens: 50,
      total_tokens: 150,
    },
  };
}

/**
 * Create a config for testing with near-zero retry delays
 */
export function createMockConfig(overrides?: Partial<LLMConfig>): LLMConfig {
  return createLLMConfig({
    apiKey: 'test-secret',
    retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 4, backoffMultiplier: 2 },
    ...overrides,
  });
}
