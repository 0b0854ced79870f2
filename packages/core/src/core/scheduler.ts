import { buildOpeningMessage } from '../agents/prompts/debate-prompts';
import { formatParticipants } from '../agents/roles';
import { EffectiveConfig } from '../types/config.types';
import {
  CONVENER_NAME, GenerateFn, Message, Role, SESSION_STATUS, TerminalStatus, Transcript, Turn, TurnContext,
} from '../types/debate.types';
import { ConfigurationError, GenerationFailure } from '../utils/errors';

import { TranscriptHandle, TranscriptSink } from './transcript-writer';

/**
 * SessionHooks provides optional callbacks for real-time notifications about session
 * progress, for progress displays and logging. All hooks are optional.
 */
export interface SessionHooks {
  /**
   * Called once the opening message exists and the transcript file (if any) is open.
   * @param transcript - The in-progress transcript.
   * @param roster - Speaking order.
   * @param maxTurns - Total number of scheduled turns.
   */
  onSessionStart?: (transcript: Transcript, roster: readonly Role[], maxTurns: number) => void;

  /**
   * Called before the generation call of a turn.
   * @param sequenceIndex - 1-based turn index.
   * @param maxTurns - Total number of scheduled turns.
   * @param role - The role about to speak.
   */
  onTurnStart?: (sequenceIndex: number, maxTurns: number, role: Role) => void;

  /**
   * Called after a turn has been generated and persisted.
   */
  onTurnComplete?: (turn: Turn, maxTurns: number) => void;

  /**
   * Called after the transcript is sealed, on success and on failure.
   */
  onSessionEnd?: (transcript: Transcript) => void;
}

export interface SessionParams {
  config: EffectiveConfig;
  roster: readonly Role[];
  topic: string;
  generate: GenerateFn;
  /** Omitted when file output is disabled. */
  writer?: TranscriptSink | undefined;
  hooks?: SessionHooks | undefined;
  clock?: () => Date;
}

/**
 * Picks the speaker of a 1-based turn under strict round-robin.
 */
export function speakerForTurn(roster: readonly Role[], sequenceIndex: number): Role {
  const role = roster[(sequenceIndex - 1) % roster.length];
  if (!role) {
    throw new ConfigurationError('Roster must contain at least one role');
  }
  return role;
}

/**
 * Runs one debate session.
 *
 * The convener's opening message seeds the log; then roster members speak in strict
 * round-robin until `config.debate.maxTurns` turns have been produced. Each generation
 * call is awaited before the next one and receives the full ordered log so far. Every
 * turn is appended to the transcript file before the next turn starts.
 *
 * The transcript is sealed on every exit path. When a generation call fails, the
 * remaining schedule is dropped, the completed turns are kept, and a
 * {@link GenerationFailure} carrying the sealed transcript is thrown.
 *
 * @returns The sealed transcript with status completed.
 */
export async function runSession(params: SessionParams): Promise<Transcript> {
  const { config, roster, topic, generate, writer, hooks } = params;
  const clock = params.clock ?? (() => new Date());
  if (roster.length === 0) {
    throw new ConfigurationError('Roster must contain at least one role');
  }

  const maxTurns = config.debate.maxTurns;
  const startTime = clock();
  const opening: Message = Object.freeze({
    speaker: CONVENER_NAME,
    content: buildOpeningMessage(topic, maxTurns, roster.map((role) => role.name)),
  });
  const transcript: Transcript = { topic, opening, turns: [], startTime, status: SESSION_STATUS.IN_PROGRESS };
  const log: Message[] = [opening];

  let handle: TranscriptHandle | undefined;
  if (writer) {
    handle = await writer.open(topic, startTime, formatParticipants(roster));
    transcript.filePath = handle.filePath;
  }
  hooks?.onSessionStart?.(transcript, roster, maxTurns);

  let failure: unknown;
  try {
    for (let sequenceIndex = 1; sequenceIndex <= maxTurns; sequenceIndex++) {
      const role = speakerForTurn(roster, sequenceIndex);
      hooks?.onTurnStart?.(sequenceIndex, maxTurns, role);

      const turnContext: TurnContext = { sequenceIndex, maxTurns };
      let content: string;
      try {
        content = await generate(role, log.slice(), turnContext);
      } catch (error: unknown) {
        throw new GenerationFailure(role.name, sequenceIndex, transcript, error);
      }

      const turn: Turn = Object.freeze({ speaker: role.name, roleKind: role.kind, content, sequenceIndex, timestamp: clock() });
      if (writer && handle) {
        await writer.appendTurn(handle, turn.speaker, turn.content, sequenceIndex, turn.timestamp);
      }
      transcript.turns.push(turn);
      log.push(turn);
      hooks?.onTurnComplete?.(turn, maxTurns);
    }
  } catch (error: unknown) {
    failure = error;
  }

  const status: TerminalStatus = failure === undefined ? SESSION_STATUS.COMPLETED : SESSION_STATUS.FAILED;
  const endTime = clock();
  transcript.status = status;
  transcript.endTime = endTime;
  if (writer && handle) {
    try {
      await writer.finalize(handle, endTime, transcript.turns.length, status);
    } catch (finalizeError: unknown) {
      if (failure === undefined) throw finalizeError;
      throw new AggregateError([failure, finalizeError], 'Session failed and its transcript could not be sealed');
    }
  }
  hooks?.onSessionEnd?.(transcript);

  if (failure !== undefined) throw failure;
  return transcript;
}
