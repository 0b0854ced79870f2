import { OpenAIConfig } from '../types/config.types';
import { ConfigurationError } from '../utils/errors';

import { LLMProvider } from './llm-provider';
import { OpenAIProvider } from './openai-provider';

/**
 * Creates the LLM provider for a resolved OpenAI configuration.
 *
 * @param config - The `openai` group of the effective configuration.
 * @returns An LLM provider instance.
 * @throws {ConfigurationError} If the API key is empty.
 */
export function createProvider(config: OpenAIConfig): LLMProvider {
  if (config.apiKey.trim() === '') {
    throw new ConfigurationError('openai.api_key is not set');
  }
  return new OpenAIProvider(config.apiKey, config.baseUrl);
}
