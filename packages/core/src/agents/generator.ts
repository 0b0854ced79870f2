import { CHAT_ROLES, ChatMessage, LLMProvider } from '../providers/llm-provider';
import { OpenAIConfig } from '../types/config.types';
import { GenerateFn, Message, Role, ROLE_KINDS, TurnContext } from '../types/debate.types';
import { AgentLogger } from './agent-logger';

import { MEDIATOR_CLOSING_INSTRUCTIONS } from './prompts/debate-prompts';

/**
 * True when `turn` is the final turn of the schedule.
 */
export function isFinalTurn(turn: TurnContext): boolean {
  return turn.sequenceIndex === turn.maxTurns;
}

/**
 * Builds the system instructions for one turn. The closing instructions are added only
 * when the mediator holds the final scheduled turn; with a turn count that is not a
 * multiple of the roster size the session ends on an advocate and no closing is asked
 * for. Whether the reply honours them is up to the model.
 */
export function buildInstructions(role: Role, turn: TurnContext): string {
  if (role.kind === ROLE_KINDS.MEDIATOR && isFinalTurn(turn)) {
    return `${role.systemMessage}\n\n${MEDIATOR_CLOSING_INSTRUCTIONS}`;
  }
  return role.systemMessage;
}

/**
 * Converts the shared message log into the chat view of one role: its own earlier
 * replies (matched by role kind) become assistant messages, everyone else's become user
 * messages prefixed with the speaker's name.
 */
export function buildChatMessages(role: Role, priorMessages: readonly Message[], turn: TurnContext): ChatMessage[] {
  const history = priorMessages.map((message): ChatMessage =>
    message.roleKind === role.kind
      ? { role: CHAT_ROLES.ASSISTANT, content: message.content }
      : { role: CHAT_ROLES.USER, content: `${message.speaker}: ${message.content}` }
  );
  return [{ role: CHAT_ROLES.SYSTEM, content: buildInstructions(role, turn) }, ...history];
}

/**
 * Adapts an LLM provider to the generation capability the scheduler calls.
 *
 * @param provider - Provider performing the completion.
 * @param config - Model, temperature and token limit to use.
 * @param logger - Optional logger; receives latency and usage in verbose mode.
 * @returns A GenerateFn that rejects on provider failure or an empty reply.
 */
export function createGenerator(provider: LLMProvider, config: OpenAIConfig, logger?: AgentLogger): GenerateFn {
  return async (role, priorMessages, turn) => {
    const started = Date.now();
    const response = await provider.complete({
      model: config.model,
      messages: buildChatMessages(role, priorMessages, turn),
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    });

    const text = response.text.trim();
    if (text.length === 0) {
      throw new Error(`${role.name} returned an empty reply`);
    }

    const tokens = response.usage?.totalTokens;
    logger?.(`[${role.name}] latency=${Date.now() - started}ms, tokens=${tokens ?? 'N/A'}`, true);
    return text;
  };
}
