import { OpenAIClient, type OpenAIClientOptions } from '../client/openai-client.js';
import { createLLMConfig, type LLMConfig } from '../config/llm-config.js';
import { InvalidResponseError } from '../errors.js';
import { CHESS_ADVISOR_SYSTEM } from '../prompts/system-prompts.js';

/**
 * Anything that turns a prompt into text
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

/**
 * Advisor backed by the OpenAI chat API
 */
export class OpenAIAdvisor implements TextGenerator {
  constructor(
    private readonly client: OpenAIClient,
    private readonly systemPrompt: string = CHESS_ADVISOR_SYSTEM,
  ) {}

  /**
   * @throws LLMError on provider failure or an empty reply
   */
  async generate(prompt: string): Promise<string> {
    const response = await this.client.chat({
      messages: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: prompt },
      ],
    });

    const text = response.content.trim();
    if (!text) {
      throw new InvalidResponseError('Advisor returned an empty reply', response.content);
    }
    return text;
  }

  get healthy(): boolean {
    return this.client.getHealthStatus().healthy;
  }
}

/**
 * Create an advisor from a (partial) config
 *
 * @throws AuthenticationError if no API key is configured
 */
export function createOpenAIAdvisor(
  config: Partial<LLMConfig> & { apiKey: string },
  options: OpenAIClientOptions = {},
): OpenAIAdvisor {
  return new OpenAIAdvisor(new OpenAIClient(createLLMConfig(config), options));
}
