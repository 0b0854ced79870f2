import fs from 'fs';
import path from 'path';

import { OutputSettings } from '../types/config.types';
import { SESSION_STATUS, TerminalStatus } from '../types/debate.types';
import { ensureDirectory } from '../utils/common';
import { MalformedTranscriptError, TranscriptWriteError } from '../utils/errors';
import { formatDuration, formatFileTimestamp, formatLocalTime } from '../utils/time-format';

const FILE_ENCODING_UTF8 = 'utf-8';
const MARKDOWN_FILE_EXTENSION = '.md';

/** Line separating the header and every turn block. */
export const SECTION_BREAK = '---';
const SECTION_BREAK_LINE = `\n${SECTION_BREAK}\n`;

const TITLE = '# AI Debate Session';
const LABEL_TOPIC = '**Topic:**';
const LABEL_START = '**Start time:**';
const LABEL_END = '**End time:**';
const LABEL_DURATION = '**Duration:**';
const LABEL_PARTICIPANTS = '**Participants:**';
const LABEL_STATUS = '**Status:**';
const LABEL_TURNS = '**Turns:**';
const PENDING_COUNT = 'pending';

/**
 * Handle to an open transcript file. Owned by the session that opened it.
 */
export interface TranscriptHandle {
  readonly filePath: string;
  readonly topic: string;
  readonly startTime: Date;
  appendedTurns: number;
  finalized: boolean;
}

/**
 * Where a session mirrors its turns. The scheduler depends only on this contract.
 */
export interface TranscriptSink {
  open(topic: string, startTime: Date, participants: string): Promise<TranscriptHandle>;
  appendTurn(handle: TranscriptHandle, speakerName: string, content: string, sequenceIndex: number, timestamp?: Date): Promise<void>;
  finalize(handle: TranscriptHandle, endTime: Date, turnCount: number, status: TerminalStatus): Promise<void>;
}

export type TranscriptWriterOptions = Pick<OutputSettings, 'directory' | 'filenamePrefix' | 'showTimestamps'>;

function singleLine(text: string): string {
  return text.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

/**
 * Builds the transcript file name: `<prefix>_<YYYYMMDD_HHmmss>.md`.
 */
export function transcriptFileName(prefix: string, startTime: Date): string {
  return `${prefix}_${formatFileTimestamp(startTime)}${MARKDOWN_FILE_EXTENSION}`;
}

/**
 * Renders the header written by `open`, ending with the first section break.
 */
export function renderHeader(topic: string, startTime: Date, participants: string): string {
  return [
    TITLE,
    `${LABEL_TOPIC} ${singleLine(topic)}`,
    `${LABEL_START} ${formatLocalTime(startTime)}`,
    `${LABEL_PARTICIPANTS} ${singleLine(participants)}`,
    `${LABEL_STATUS} ${SESSION_STATUS.IN_PROGRESS}`,
    `${LABEL_TURNS} ${PENDING_COUNT}`,
    SECTION_BREAK,
    '',
  ].join('\n\n');
}

/**
 * Renders one turn block, terminated by the section break.
 */
export function renderTurnBlock(sequenceIndex: number, speakerName: string, content: string, timestamp?: Date): string {
  const lines = [`## Turn ${sequenceIndex}: ${speakerName}`];
  if (timestamp) {
    lines.push(`*${formatLocalTime(timestamp)}*`);
  }
  lines.push(content.trim(), SECTION_BREAK, '');
  return lines.join('\n\n');
}

function replaceHeaderLine(header: string, label: string, replacement: string): string | undefined {
  const lines = header.split('\n');
  const index = lines.findIndex((line) => line.startsWith(label));
  if (index < 0) return undefined;
  lines[index] = replacement;
  return lines.join('\n');
}

/**
 * Rewrites the header region of a transcript to its sealed form.
 *
 * @throws {MalformedTranscriptError} When the section break is missing or the header is
 *   not in the in-progress state.
 */
export function sealTranscriptText(text: string, filePath: string, startTime: Date, endTime: Date, turnCount: number, status: TerminalStatus): string {
  const breakIndex = text.indexOf(SECTION_BREAK_LINE);
  if (breakIndex < 0) {
    throw new MalformedTranscriptError(filePath, `section break "${SECTION_BREAK}" not found`);
  }
  const header = text.slice(0, breakIndex);
  const body = text.slice(breakIndex);

  const inProgressLine = `${LABEL_STATUS} ${SESSION_STATUS.IN_PROGRESS}`;
  if (!header.split('\n').includes(inProgressLine)) {
    throw new MalformedTranscriptError(filePath, 'header is not marked in-progress');
  }

  let sealed = replaceHeaderLine(header, LABEL_STATUS, `${LABEL_STATUS} ${status}`);
  sealed = sealed && replaceHeaderLine(sealed, LABEL_TURNS, `${LABEL_TURNS} ${turnCount}`);
  sealed = sealed && replaceHeaderLine(sealed, LABEL_START,
    `${LABEL_START} ${formatLocalTime(startTime)}\n\n` +
    `${LABEL_END} ${formatLocalTime(endTime)}\n\n` +
    `${LABEL_DURATION} ${formatDuration(startTime, endTime)}`);
  if (sealed === undefined) {
    throw new MalformedTranscriptError(filePath, 'header fields are missing');
  }
  return sealed + body;
}

/**
 * Writes a session transcript as Markdown, one open-append-close cycle per turn so a
 * partial transcript survives a crash mid-session.
 *
 * Two sessions opened within the same second share a file name; the later one
 * overwrites the earlier file.
 */
export class TranscriptWriter implements TranscriptSink {
  constructor(private readonly options: TranscriptWriterOptions) {}

  async open(topic: string, startTime: Date, participants: string): Promise<TranscriptHandle> {
    const directory = path.resolve(process.cwd(), this.options.directory);
    const filePath = path.join(directory, transcriptFileName(this.options.filenamePrefix, startTime));
    try {
      await ensureDirectory(directory);
      await fs.promises.writeFile(filePath, renderHeader(topic, startTime, participants), FILE_ENCODING_UTF8);
    } catch (error: unknown) {
      throw new TranscriptWriteError(filePath, error);
    }
    return { filePath, topic, startTime, appendedTurns: 0, finalized: false };
  }

  async appendTurn(handle: TranscriptHandle, speakerName: string, content: string, sequenceIndex: number, timestamp?: Date): Promise<void> {
    if (handle.finalized) {
      throw new MalformedTranscriptError(handle.filePath, 'cannot append to a finalized transcript');
    }
    const stamp = this.options.showTimestamps ? timestamp : undefined;
    try {
      await fs.promises.appendFile(handle.filePath, renderTurnBlock(sequenceIndex, speakerName, content, stamp), FILE_ENCODING_UTF8);
    } catch (error: unknown) {
      throw new TranscriptWriteError(handle.filePath, error);
    }
    handle.appendedTurns++;
  }

  async finalize(handle: TranscriptHandle, endTime: Date, turnCount: number, status: TerminalStatus): Promise<void> {
    if (handle.finalized) {
      throw new MalformedTranscriptError(handle.filePath, 'transcript is already finalized');
    }
    if (turnCount !== handle.appendedTurns) {
      throw new MalformedTranscriptError(
        handle.filePath,
        `turn count ${turnCount} does not match the ${handle.appendedTurns} appended turns`
      );
    }

    let text: string;
    try {
      text = await fs.promises.readFile(handle.filePath, FILE_ENCODING_UTF8);
    } catch (error: unknown) {
      throw new TranscriptWriteError(handle.filePath, error);
    }

    const sealed = sealTranscriptText(text, handle.filePath, handle.startTime, endTime, turnCount, status);
    try {
      await fs.promises.writeFile(handle.filePath, sealed, FILE_ENCODING_UTF8);
    } catch (error: unknown) {
      throw new TranscriptWriteError(handle.filePath, error);
    }
    handle.finalized = true;
  }
}
