import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { ProviderConnectionError } from '../utils/errors';

import { CHAT_ROLES, ChatMessage, CompletionRequest, CompletionResponse, LLMProvider } from './llm-provider';

const DEFAULT_SERVER_LABEL = 'the OpenAI API';

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case CHAT_ROLES.SYSTEM:
      return { role: CHAT_ROLES.SYSTEM, content: message.content };
    case CHAT_ROLES.ASSISTANT:
      return { role: CHAT_ROLES.ASSISTANT, content: message.content };
    case CHAT_ROLES.USER:
      return { role: CHAT_ROLES.USER, content: message.content };
  }
}

/**
 * LLM provider backed by the OpenAI chat completions API. A custom `baseURL` points it at
 * any OpenAI-compatible server (for example a local model server).
 */
export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;

  constructor(apiKey: string, private readonly baseURL?: string) {
    this.client = new OpenAI(baseURL ? { apiKey, baseURL } : { apiKey });
  }

  async checkConnection(): Promise<number> {
    try {
      const page = await this.client.models.list();
      return page.data.length;
    } catch (error: unknown) {
      throw new ProviderConnectionError(this.baseURL ?? DEFAULT_SERVER_LABEL, error);
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const chat = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      ...(request.maxTokens != null && { max_tokens: request.maxTokens }),
    });

    const text = chat.choices[0]?.message?.content ?? '';
    const out: CompletionResponse = { text };
    if (chat.usage) {
      out.usage = {
        inputTokens: chat.usage.prompt_tokens,
        outputTokens: chat.usage.completion_tokens,
        totalTokens: chat.usage.total_tokens,
      };
    }
    return out;
  }
}
