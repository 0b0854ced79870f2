import {
  MessageType,
  Role,
  SESSION_STATUS,
  SessionHooks,
  Transcript,
  Turn,
  logInfo,
  logSuccess,
  logWarning,
} from '@triad/core';

/**
 * DebateProgressUI manages the real-time progress display for a debate session.
 *
 * This class provides an append-only log-style progress indicator that shows:
 * - Session start with the speaking order
 * - Each turn as it starts and completes
 * - The terminal status of the session
 *
 * Messages are appended chronologically with colored icons:
 * - Info messages (blue ℹ): session start, turn start
 * - Success messages (green ✓): turn completion, session completion
 * - Warning messages (yellow ⚠): failures
 *
 * The UI writes to stderr to keep stdout for the transcript path.
 * When disabled, every call is a no-op.
 */
export class DebateProgressUI {
  private totalTurns = 0;
  private currentTurn = 0;

  constructor(private readonly enabled: boolean = true) {}

  /**
   * Records the number of scheduled turns.
   */
  initialize(totalTurns: number): void {
    this.totalTurns = totalTurns;
    this.currentTurn = 0;
  }

  /**
   * Writes a log message to stderr with appropriate icon and color based on message type.
   * Messages inside an active turn get the turn prefix.
   */
  log(message: string, type: MessageType = MessageType.INFO): void {
    this.appendMessage(this.formatMessageWithTurn(message), type);
  }

  startSession(roster: readonly Role[]): void {
    const order = roster.map((role) => role.name).join(' → ');
    this.appendMessage(`Debate starting: ${this.totalTurns} turns, order ${order}`, MessageType.INFO);
  }

  startTurn(sequenceIndex: number, speakerName: string): void {
    this.currentTurn = sequenceIndex;
    this.appendMessage(`Turn ${sequenceIndex}/${this.totalTurns}: ${speakerName} is speaking...`, MessageType.INFO);
  }

  completeTurn(turn: Turn): void {
    this.appendMessage(
      `Turn ${turn.sequenceIndex}/${this.totalTurns}: ${turn.speaker} finished (${turn.content.length} chars)`,
      MessageType.SUCCESS,
    );
    this.currentTurn = 0;
  }

  /**
   * Reports the terminal state of the session.
   */
  complete(transcript: Transcript): void {
    const count = transcript.turns.length;
    if (transcript.status === SESSION_STATUS.COMPLETED) {
      this.appendMessage(`Debate completed (${count} turns)`, MessageType.SUCCESS);
    } else {
      this.appendMessage(`Debate failed after ${count} of ${this.totalTurns} turns`, MessageType.WARNING);
    }
  }

  /**
   * Session hooks that drive this display.
   */
  createHooks(): Required<SessionHooks> {
    return {
      onSessionStart: (_transcript: Transcript, roster: readonly Role[], maxTurns: number): void => {
        this.initialize(maxTurns);
        this.startSession(roster);
      },
      onTurnStart: (sequenceIndex: number, _maxTurns: number, role: Role): void => {
        this.startTurn(sequenceIndex, role.name);
      },
      onTurnComplete: (turn: Turn): void => {
        this.completeTurn(turn);
      },
      onSessionEnd: (transcript: Transcript): void => {
        this.complete(transcript);
      },
    };
  }

  private formatMessageWithTurn(message: string): string {
    if (this.currentTurn > 0) {
      return `[Turn ${this.currentTurn}] ${message}`;
    }
    return message;
  }

  private appendMessage(message: string, type: MessageType): void {
    if (!this.enabled) return;
    if (type === MessageType.SUCCESS) {
      logSuccess(message);
    } else if (type === MessageType.WARNING || type === MessageType.ERROR) {
      logWarning(message);
    } else {
      logInfo(message);
    }
  }
}
