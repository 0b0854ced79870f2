/** String literal constants for the participant roles */
export const ROLE_KINDS = {
  ADVOCATE_A: 'advocate-a',
  ADVOCATE_B: 'advocate-b',
  MEDIATOR: 'mediator',
} as const;

/** Union type of all role kinds */
export type RoleKind = (typeof ROLE_KINDS)[keyof typeof ROLE_KINDS];

/** String literal constants for session statuses */
export const SESSION_STATUS = {
  IN_PROGRESS: 'in-progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

/** Union type of all session statuses */
export type SessionStatus = (typeof SESSION_STATUS)[keyof typeof SESSION_STATUS];

/** Statuses a transcript can be sealed with. */
export type TerminalStatus = Exclude<SessionStatus, typeof SESSION_STATUS.IN_PROGRESS>;

/** Speaker label of the non-speaking convener that opens the session. */
export const CONVENER_NAME = 'Convener';

/**
 * A debate participant. Roles differ only in their static text, so they are plain
 * frozen data rather than behaviour-bearing objects.
 */
export interface Role {
  readonly kind: RoleKind;
  readonly name: string;
  readonly stance: string;
  readonly systemMessage: string;
}

/**
 * An entry of the message log as seen by the generation capability.
 */
export interface Message {
  readonly speaker: string;
  readonly content: string;
  /** Absent on the convener's opening message. */
  readonly roleKind?: RoleKind;
}

/**
 * One generated message from exactly one role.
 */
export interface Turn extends Message {
  readonly roleKind: RoleKind;
  /** 1-based position among speaker turns. */
  readonly sequenceIndex: number;
  readonly timestamp: Date;
}

/**
 * Position of the turn being generated within the schedule.
 */
export interface TurnContext {
  /** 1-based index of the turn about to be generated. */
  sequenceIndex: number;
  maxTurns: number;
}

/**
 * Produces one reply for `role` given the full ordered message log so far.
 * Any rejection is treated as fatal for the session.
 */
export type GenerateFn = (role: Role, priorMessages: readonly Message[], turn: TurnContext) => Promise<string>;

/**
 * Ordered record of one session.
 */
export interface Transcript {
  topic: string;
  /** Convener message that seeds the log; not counted as a turn. */
  opening: Message;
  turns: Turn[];
  startTime: Date;
  endTime?: Date;
  status: SessionStatus;
  /** Set when the transcript was persisted to disk. */
  filePath?: string;
}
