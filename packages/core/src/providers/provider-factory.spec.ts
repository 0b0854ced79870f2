import { OpenAIConfig } from '../types/config.types';
import { ConfigurationError } from '../utils/errors';

import { OpenAIProvider } from './openai-provider';
import { createProvider } from './provider-factory';

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: jest.fn() } } })),
}));

const BASE_CONFIG: OpenAIConfig = {
  apiKey: 'test-secret',
  model: 'gpt-4',
  temperature: 0.7,
  maxTokens: 2000,
  baseUrl: 'https://api.openai.com/v1',
};

describe('createProvider', () => {
  it('should create an OpenAI provider for a configured key', () => {
    expect(createProvider(BASE_CONFIG)).toBeInstanceOf(OpenAIProvider);
  });

  it('should reject an empty key', () => {
    expect(() => createProvider({ ...BASE_CONFIG, apiKey: ' ' })).toThrow(ConfigurationError);
    expect(() => createProvider({ ...BASE_CONFIG, apiKey: ' ' })).toThrow('Configuration error: openai.api_key is not set');
  });
});
