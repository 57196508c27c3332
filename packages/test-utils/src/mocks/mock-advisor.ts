/**
 * Scripted advisor for testing
 *
 * Implements the generate(prompt) contract of the advisor provider
 */

import { vi } from 'vitest';

import type { PendingRequest } from './mock-engine.js';

export interface MockAdvisorConfig {
  /** Replies handed out in order */
  replies?: string[];
  /** Reply once the script is used up (default: "e7e5") */
  defaultReply?: string;
  /** Build the reply from the prompt instead */
  respond?: (prompt: string) => string;
  /** Every request fails with this error */
  failWith?: Error;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockAdvisor(config: MockAdvisorConfig = {}) {
  const replies = [...(config.replies ?? [])];
  const defaultReply = config.defaultReply ?? 'e7e5';

  const generate = vi.fn(async (prompt: string): Promise<string> => {
    if (config.failWith) {
      throw config.failWith;
    }
    if (config.respond) {
      return config.respond(prompt);
    }
    return replies.shift() ?? defaultReply;
  });

  return {
    generate,
    /** Prompts received so far */
    prompts: (): string[] => generate.mock.calls.map(([prompt]) => prompt),
  };
}

export type MockAdvisor = ReturnType<typeof createMockAdvisor>;

/**
 * Advisor whose requests stay pending until the test settles them
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createDeferredAdvisor() {
  const pending: Array<PendingRequest<string>> = [];

  const generate = vi.fn(
    (prompt: string): Promise<string> =>
      new Promise<string>((resolve, reject) => {
        pending.push({ input: prompt, resolve, reject });
      }),
  );

  return { generate, pending };
}

export type DeferredAdvisor = ReturnType<typeof createDeferredAdvisor>;
