import { describe, it, expect } from 'vitest';

import {
  createLLMConfig,
  loadConfigFromEnv,
  DEFAULT_LLM_CONFIG,
  DEFAULT_RETRY_CONFIG,
} from '../config/llm-config.js';

describe('createLLMConfig', () => {
  it('should fill defaults around the key', () => {
    const config = createLLMConfig({ apiKey: 'test-secret' });

    expect(config).toEqual({ ...DEFAULT_LLM_CONFIG, apiKey: 'test-secret' });
  });

  it('should merge nested retry settings', () => {
    const config = createLLMConfig({
      apiKey: 'test-secret',
      retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: 0 },
    });

    expect(config.retry.maxRetries).toBe(0);
    expect(config.retry.initialDelayMs).toBe(1000);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read key, model and timeout', () => {
    expect(
      loadConfigFromEnv({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-test',
        CHESSLAB_LLM_TIMEOUT: '15000',
      }),
    ).toEqual({ apiKey: 'test-secret', model: 'gpt-test', timeout: 15000 });
  });

  it('should skip unset and unparsable values', () => {
    expect(loadConfigFromEnv({ CHESSLAB_LLM_TIMEOUT: 'soon' })).toEqual({});
  });
});
