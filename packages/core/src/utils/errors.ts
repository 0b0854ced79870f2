import { EXIT_GENERAL_ERROR } from './exit-codes';
import type { Transcript } from '../types/debate.types';

/**
 * Base class for every failure the debate system reports to the user.
 * The `code` is used as the process exit code by the CLI.
 */
export abstract class TriadError extends Error {
  readonly code: number;

  constructor(message: string, options?: { cause?: unknown; code?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = options?.code ?? EXIT_GENERAL_ERROR;
  }
}

/**
 * Raised when the merged configuration is unusable. Carries every violation found,
 * not only the first one.
 */
export class ConfigurationError extends TriadError {
  readonly violations: readonly string[];

  constructor(violations: string[] | string, options?: { cause?: unknown }) {
    const list = typeof violations === 'string' ? [violations] : violations;
    super(ConfigurationError.formatMessage(list), options);
    this.violations = Object.freeze([...list]);
  }

  private static formatMessage(violations: string[]): string {
    if (violations.length === 1) {
      return `Configuration error: ${violations[0]}`;
    }
    return `Configuration errors (${violations.length}):\n${violations.map((v) => `  - ${v}`).join('\n')}`;
  }
}

/**
 * Raised when the generation capability fails during a turn. The session is sealed
 * as failed before this is thrown; `transcript` holds the turns completed so far.
 */
export class GenerationFailure extends TriadError {
  constructor(
    readonly speaker: string,
    readonly sequenceIndex: number,
    readonly transcript: Transcript,
    cause: unknown
  ) {
    super(`Generation failed on turn ${sequenceIndex} (${speaker}): ${describeCause(cause)}`, { cause });
  }
}

/**
 * Raised when the model server does not answer the pre-session connection check.
 */
export class ProviderConnectionError extends TriadError {
  constructor(readonly server: string, cause: unknown) {
    super(
      `Cannot reach the model server at ${server}: ${describeCause(cause)}\n` +
        '  - Start the server and load a model if it runs locally\n' +
        '  - Check that openai.base_url points at it',
      { cause }
    );
  }
}

/**
 * Raised when the transcript file cannot be created or written.
 */
export class TranscriptWriteError extends TriadError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to write transcript ${filePath}: ${describeCause(cause)}`, { cause });
  }
}

/**
 * Raised by finalize when the transcript header can no longer be located or is not
 * in the expected in-progress state.
 */
export class MalformedTranscriptError extends TriadError {
  constructor(readonly filePath: string, reason: string) {
    super(`Malformed transcript ${filePath}: ${reason}`);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
