import fs from 'fs';
import os from 'os';
import path from 'path';

import { SESSION_STATUS } from '../types/debate.types';
import { MalformedTranscriptError, TranscriptWriteError } from '../utils/errors';

import {
  renderHeader,
  renderTurnBlock,
  sealTranscriptText,
  transcriptFileName,
  TranscriptWriter,
} from './transcript-writer';

const START = new Date(2025, 0, 15, 9, 5, 3);
const END = new Date(START.getTime() + 65_000);
const PARTICIPANTS = 'Pro (Supports Plan A), Con (Supports Plan B)';

function at(offsetSeconds: number): Date {
  return new Date(START.getTime() + offsetSeconds * 1000);
}

describe('transcript-writer', () => {
  describe('transcriptFileName', () => {
    it('should combine the prefix with the local start timestamp', () => {
      expect(transcriptFileName('debate', START)).toBe('debate_20250115_090503.md');
    });
  });

  describe('renderHeader', () => {
    it('should render an in-progress header ending with the section break', () => {
      expect(renderHeader('Energy policy', START, PARTICIPANTS)).toBe(
        '# AI Debate Session\n\n' +
        '**Topic:** Energy policy\n\n' +
        '**Start time:** 2025-01-15 09:05:03\n\n' +
        `**Participants:** ${PARTICIPANTS}\n\n` +
        '**Status:** in-progress\n\n' +
        '**Turns:** pending\n\n' +
        '---\n\n'
      );
    });

    it('should collapse a multi-line topic onto one line', () => {
      expect(renderHeader('Line one\nline two', START, PARTICIPANTS)).toContain('**Topic:** Line one line two\n');
    });
  });

  describe('renderTurnBlock', () => {
    it('should render heading, timestamp, trimmed content and section break', () => {
      expect(renderTurnBlock(3, 'Mediator', '  Both plans share a goal.\n', at(7))).toBe(
        '## Turn 3: Mediator\n\n*2025-01-15 09:05:10*\n\nBoth plans share a goal.\n\n---\n\n'
      );
    });

    it('should omit the timestamp line when no timestamp is given', () => {
      expect(renderTurnBlock(1, 'Pro', 'Opening.')).toBe('## Turn 1: Pro\n\nOpening.\n\n---\n\n');
    });
  });

  describe('sealTranscriptText', () => {
    it('should inject end time and duration and replace status and count', () => {
      const text = renderHeader('Energy policy', START, PARTICIPANTS) + renderTurnBlock(1, 'Pro', 'Opening.');

      expect(sealTranscriptText(text, 'x.md', START, END, 1, SESSION_STATUS.COMPLETED)).toBe(
        '# AI Debate Session\n\n' +
        '**Topic:** Energy policy\n\n' +
        '**Start time:** 2025-01-15 09:05:03\n\n' +
        '**End time:** 2025-01-15 09:06:08\n\n' +
        '**Duration:** 65.0s (1m 5s)\n\n' +
        `**Participants:** ${PARTICIPANTS}\n\n` +
        '**Status:** completed\n\n' +
        '**Turns:** 1\n\n' +
        '---\n\n' +
        '## Turn 1: Pro\n\nOpening.\n\n---\n\n'
      );
    });

    it('should leave turn content that looks like header fields untouched', () => {
      const text = renderHeader('Energy policy', START, PARTICIPANTS) +
        renderTurnBlock(1, 'Pro', '**Status:** in-progress is how I feel');

      const sealed = sealTranscriptText(text, 'x.md', START, END, 1, SESSION_STATUS.FAILED);

      expect(sealed).toContain('**Status:** failed\n');
      expect(sealed).toContain('\n**Status:** in-progress is how I feel\n');
    });

    it('should throw when the section break is missing', () => {
      expect(() => sealTranscriptText('# AI Debate Session\n\n**Status:** in-progress\n', 'x.md', START, END, 0, SESSION_STATUS.COMPLETED))
        .toThrow('Malformed transcript x.md: section break "---" not found');
    });

    it('should throw when the header is no longer in-progress', () => {
      const text = renderHeader('Energy policy', START, PARTICIPANTS).replace('in-progress', 'completed');

      expect(() => sealTranscriptText(text, 'x.md', START, END, 0, SESSION_STATUS.COMPLETED))
        .toThrow('Malformed transcript x.md: header is not marked in-progress');
    });
  });

  describe('TranscriptWriter', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'triad-transcript-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function createWriter(showTimestamps = true, directory = tmpDir): TranscriptWriter {
      return new TranscriptWriter({ directory, filenamePrefix: 'debate', showTimestamps });
    }

    it('should create the file with the header on open', async () => {
      const handle = await createWriter().open('Energy policy', START, PARTICIPANTS);

      expect(handle.filePath).toBe(path.join(tmpDir, 'debate_20250115_090503.md'));
      expect(handle.appendedTurns).toBe(0);
      expect(handle.finalized).toBe(false);
      expect(fs.readFileSync(handle.filePath, 'utf-8')).toBe(renderHeader('Energy policy', START, PARTICIPANTS));
    });

    it('should create missing output directories', async () => {
      const nested = path.join(tmpDir, 'transcripts', '2025');

      const handle = await createWriter(true, nested).open('Energy policy', START, PARTICIPANTS);

      expect(path.dirname(handle.filePath)).toBe(nested);
      expect(fs.existsSync(handle.filePath)).toBe(true);
    });

    it('should append each turn to the file as it is written', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);

      await writer.appendTurn(handle, 'Pro', 'First.', 1, at(5));
      const afterFirst = fs.readFileSync(handle.filePath, 'utf-8');
      await writer.appendTurn(handle, 'Con', 'Second.', 2, at(10));
      const afterSecond = fs.readFileSync(handle.filePath, 'utf-8');

      expect(afterFirst.endsWith('## Turn 1: Pro\n\n*2025-01-15 09:05:08*\n\nFirst.\n\n---\n\n')).toBe(true);
      expect(afterSecond).toBe(afterFirst + '## Turn 2: Con\n\n*2025-01-15 09:05:13*\n\nSecond.\n\n---\n\n');
      expect(handle.appendedTurns).toBe(2);
    });

    it('should drop timestamps when they are disabled', async () => {
      const writer = createWriter(false);
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);

      await writer.appendTurn(handle, 'Pro', 'First.', 1, at(5));

      expect(fs.readFileSync(handle.filePath, 'utf-8')).toBe(
        renderHeader('Energy policy', START, PARTICIPANTS) + '## Turn 1: Pro\n\nFirst.\n\n---\n\n'
      );
    });

    it('should seal the header with the turn count that was appended', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      await writer.appendTurn(handle, 'Pro', 'First.', 1, at(5));
      await writer.appendTurn(handle, 'Con', 'Second.', 2, at(10));

      await writer.finalize(handle, END, handle.appendedTurns, SESSION_STATUS.COMPLETED);

      const text = fs.readFileSync(handle.filePath, 'utf-8');
      expect(handle.finalized).toBe(true);
      expect(text).toContain('\n**Turns:** 2\n');
      expect(text).toContain('\n**Status:** completed\n');
      expect(text.match(/^## Turn /gm)).toHaveLength(2);
      expect(text.match(/^\*\*End time:\*\*/gm)).toHaveLength(1);
    });

    it('should refuse a turn count that differs from the appended turns', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      await writer.appendTurn(handle, 'Pro', 'First.', 1, at(5));
      await writer.appendTurn(handle, 'Con', 'Second.', 2, at(10));
      const before = fs.readFileSync(handle.filePath, 'utf-8');

      await expect(writer.finalize(handle, END, 7, SESSION_STATUS.COMPLETED)).rejects.toThrow(
        `Malformed transcript ${handle.filePath}: turn count 7 does not match the 2 appended turns`
      );
      expect(handle.finalized).toBe(false);
      expect(fs.readFileSync(handle.filePath, 'utf-8')).toBe(before);
    });

    it('should refuse to finalize twice and leave the file unchanged', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      await writer.finalize(handle, END, 0, SESSION_STATUS.COMPLETED);
      const sealed = fs.readFileSync(handle.filePath, 'utf-8');

      await expect(writer.finalize(handle, END, 0, SESSION_STATUS.COMPLETED)).rejects.toThrow(MalformedTranscriptError);
      expect(fs.readFileSync(handle.filePath, 'utf-8')).toBe(sealed);
    });

    it('should refuse to append after finalize', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      await writer.finalize(handle, END, 0, SESSION_STATUS.COMPLETED);

      await expect(writer.appendTurn(handle, 'Pro', 'Late.', 1, at(70))).rejects.toThrow(
        `Malformed transcript ${handle.filePath}: cannot append to a finalized transcript`
      );
    });

    it('should report a header that was edited out of the in-progress state', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      const edited = fs.readFileSync(handle.filePath, 'utf-8').replace('in-progress', 'completed');
      fs.writeFileSync(handle.filePath, edited);

      await expect(writer.finalize(handle, END, 0, SESSION_STATUS.COMPLETED)).rejects.toThrow(MalformedTranscriptError);
      expect(handle.finalized).toBe(false);
    });

    it('should wrap file system failures in TranscriptWriteError', async () => {
      const blocker = path.join(tmpDir, 'not-a-directory');
      fs.writeFileSync(blocker, 'x');

      await expect(createWriter(true, blocker).open('Energy policy', START, PARTICIPANTS)).rejects.toThrow(TranscriptWriteError);
    });

    it('should wrap a missing file on finalize in TranscriptWriteError', async () => {
      const writer = createWriter();
      const handle = await writer.open('Energy policy', START, PARTICIPANTS);
      fs.unlinkSync(handle.filePath);

      await expect(writer.finalize(handle, END, 0, SESSION_STATUS.COMPLETED)).rejects.toThrow(TranscriptWriteError);
    });
  });
});
