/**
 * Chat message roles understood by chat-completion APIs.
 */
export const CHAT_ROLES = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
} as const;

export type ChatRole = (typeof CHAT_ROLES)[keyof typeof CHAT_ROLES];

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
}

export interface CompletionUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface CompletionResponse {
  text: string;
  usage?: CompletionUsage;
}

export interface LLMProvider {
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Verifies that the model server answers before a session starts.
   *
   * @returns The number of models the server lists.
   * @throws {ProviderConnectionError} When the server cannot be reached.
   */
  checkConnection(): Promise<number>;
}
