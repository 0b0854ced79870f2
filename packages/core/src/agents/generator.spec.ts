import { CHAT_ROLES, CompletionRequest, CompletionResponse, LLMProvider } from '../providers/llm-provider';
import { OpenAIConfig } from '../types/config.types';
import { CONVENER_NAME, Message, Role, ROLE_KINDS, TurnContext } from '../types/debate.types';

import { buildChatMessages, buildInstructions, createGenerator, isFinalTurn } from './generator';
import { MEDIATOR_CLOSING_INSTRUCTIONS } from './prompts/debate-prompts';

const PRO: Role = { kind: ROLE_KINDS.ADVOCATE_A, name: 'Pro', stance: 'Supports Plan A', systemMessage: 'pro system' };
const CON: Role = { kind: ROLE_KINDS.ADVOCATE_B, name: 'Con', stance: 'Supports Plan B', systemMessage: 'con system' };
const MEDIATOR: Role = { kind: ROLE_KINDS.MEDIATOR, name: 'Mediator', stance: 'Mediator', systemMessage: 'mediator system' };

const OPENAI_CONFIG: OpenAIConfig = {
  apiKey: 'test-secret',
  model: 'gpt-4o',
  temperature: 0.4,
  maxTokens: 300,
  baseUrl: 'https://api.openai.com/v1',
};

function turn(sequenceIndex: number, maxTurns = 9): TurnContext {
  return { sequenceIndex, maxTurns };
}

class StubProvider implements LLMProvider {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly response: CompletionResponse | Error) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    if (this.response instanceof Error) {
      throw this.response;
    }
    return this.response;
  }

  async checkConnection(): Promise<number> {
    return 1;
  }
}

describe('generator', () => {
  describe('isFinalTurn', () => {
    it('should be true only for the last scheduled turn', () => {
      expect(isFinalTurn(turn(7))).toBe(false);
      expect(isFinalTurn(turn(9))).toBe(true);
      expect(isFinalTurn(turn(4, 4))).toBe(true);
    });
  });

  describe('buildInstructions', () => {
    it('should add the closing instructions to the mediator on the final turn', () => {
      expect(buildInstructions(MEDIATOR, turn(9))).toBe(`mediator system\n\n${MEDIATOR_CLOSING_INSTRUCTIONS}`);
    });

    it('should leave the mediator unchanged on earlier turns', () => {
      expect(buildInstructions(MEDIATOR, turn(6))).toBe('mediator system');
    });

    it('should not close on the mediator\'s last turn when an advocate speaks after it', () => {
      expect(buildInstructions(MEDIATOR, turn(9, 10))).toBe('mediator system');
    });

    it('should never add closing instructions for advocates', () => {
      expect(buildInstructions(PRO, turn(10, 10))).toBe('pro system');
    });
  });

  describe('buildChatMessages', () => {
    it('should map own messages to assistant and others to labelled user messages', () => {
      const prior: Message[] = [
        { speaker: CONVENER_NAME, content: 'Topic: energy' },
        { speaker: 'Pro', roleKind: ROLE_KINDS.ADVOCATE_A, content: 'Plan A is safer.' },
        { speaker: 'Con', roleKind: ROLE_KINDS.ADVOCATE_B, content: 'Plan B is cheaper.' },
      ];

      expect(buildChatMessages(PRO, prior, turn(4))).toEqual([
        { role: CHAT_ROLES.SYSTEM, content: 'pro system' },
        { role: CHAT_ROLES.USER, content: 'Convener: Topic: energy' },
        { role: CHAT_ROLES.ASSISTANT, content: 'Plan A is safer.' },
        { role: CHAT_ROLES.USER, content: 'Con: Plan B is cheaper.' },
      ]);
    });

    it('should decide ownership by role kind, not by display name', () => {
      const pro: Role = { ...PRO, name: 'Agent' };
      const con: Role = { ...CON, name: 'Agent' };
      const prior: Message[] = [
        { speaker: CONVENER_NAME, content: 'topic' },
        { speaker: con.name, roleKind: con.kind, content: 'con says B' },
      ];

      expect(buildChatMessages(pro, prior, turn(3)).slice(1)).toEqual([
        { role: CHAT_ROLES.USER, content: 'Convener: topic' },
        { role: CHAT_ROLES.USER, content: 'Agent: con says B' },
      ]);
    });

    it('should never treat the opening message as the role\'s own reply', () => {
      const pro: Role = { ...PRO, name: CONVENER_NAME };

      expect(buildChatMessages(pro, [{ speaker: CONVENER_NAME, content: 'Topic: x' }], turn(1)).slice(1)).toEqual([
        { role: CHAT_ROLES.USER, content: 'Convener: Topic: x' },
      ]);
    });
  });

  describe('createGenerator', () => {
    it('should call the provider with the configured model settings and trim the reply', async () => {
      const provider = new StubProvider({ text: '  Plan A wins.\n', usage: { totalTokens: 42 } });
      const generate = createGenerator(provider, OPENAI_CONFIG);

      const reply = await generate(PRO, [{ speaker: 'Convener', content: 'Topic' }], turn(1));

      expect(reply).toBe('Plan A wins.');
      expect(provider.requests).toHaveLength(1);
      expect(provider.requests[0]).toEqual({
        model: 'gpt-4o',
        temperature: 0.4,
        maxTokens: 300,
        messages: [
          { role: CHAT_ROLES.SYSTEM, content: 'pro system' },
          { role: CHAT_ROLES.USER, content: 'Convener: Topic' },
        ],
      });
    });

    it('should reject an empty reply', async () => {
      const generate = createGenerator(new StubProvider({ text: '   ' }), OPENAI_CONFIG);

      await expect(generate(PRO, [], turn(1))).rejects.toThrow('Pro returned an empty reply');
    });

    it('should propagate provider failures', async () => {
      const generate = createGenerator(new StubProvider(new Error('timeout')), OPENAI_CONFIG);

      await expect(generate(PRO, [], turn(1))).rejects.toThrow('timeout');
    });

    it('should report latency and token usage as a verbose log line', async () => {
      const logger = jest.fn();
      const generate = createGenerator(new StubProvider({ text: 'ok', usage: { totalTokens: 42 } }), OPENAI_CONFIG, logger);

      await generate(PRO, [], turn(1));

      expect(logger).toHaveBeenCalledTimes(1);
      expect(logger.mock.calls[0][0]).toMatch(/^\[Pro\] latency=\d+ms, tokens=42$/);
      expect(logger.mock.calls[0][1]).toBe(true);
    });

    it('should log N/A when the provider reports no usage', async () => {
      const logger = jest.fn();
      const generate = createGenerator(new StubProvider({ text: 'ok' }), OPENAI_CONFIG, logger);

      await generate(PRO, [], turn(1));

      expect(logger.mock.calls[0][0]).toMatch(/tokens=N\/A$/);
    });
  });
});
