import { describe, it, expect } from 'vitest';
import { IOError } from '../src/pipeline/errors';
import {
  audioStatus,
  resolveWorkspace,
  sanitizeTitle,
  transcriptStatus,
  workspaceFor,
} from '../src/pipeline/workspace';
import { MemoryStore } from './helpers/fakes';

describe('sanitizeTitle', () => {
  it('strips characters that are illegal in paths', () => {
    expect(sanitizeTitle('My: Video / Part 1?')).toBe('My Video Part 1');
    expect(sanitizeTitle('a<b>c"d|e*f\\g')).toBe('abcdefg');
  });

  it('collapses whitespace and trims', () => {
    expect(sanitizeTitle('  a\t\tb\n c  ')).toBe('a b c');
  });

  it('turns tabs and newlines into single spaces', () => {
    expect(sanitizeTitle('Line one\nLine two')).toBe('Line one Line two');
    expect(sanitizeTitle('a\tb')).toBe('a b');
    expect(sanitizeTitle('a \r\n b')).toBe('a b');
  });

  it('drops other control characters', () => {
    expect(sanitizeTitle('bell\u0007char')).toBe('bellchar');
  });

  it('truncates to 100 characters', () => {
    expect(sanitizeTitle('x'.repeat(150))).toBe('x'.repeat(100));
  });

  it('drops trailing dots and spaces left by truncation', () => {
    expect(sanitizeTitle('Title...')).toBe('Title');
    expect(sanitizeTitle(`${'a'.repeat(99)} b`)).toBe('a'.repeat(99));
  });

  it('never splits a character outside the basic plane', () => {
    const title = `${'a'.repeat(99)}🎬🎬`;
    expect(sanitizeTitle(title)).toBe(`${'a'.repeat(99)}🎬`);
  });

  it('falls back to a placeholder when nothing is left', () => {
    expect(sanitizeTitle('???')).toBe('untitled');
    expect(sanitizeTitle('')).toBe('untitled');
  });

  it('is deterministic', () => {
    expect(sanitizeTitle('Same: Title')).toBe(sanitizeTitle('Same: Title'));
  });
});

describe('resolveWorkspace', () => {
  it('creates the root and its four subdirectories', async () => {
    const store = new MemoryStore();
    const ws = await resolveWorkspace('/data', 'Talk', store);

    expect(ws.sanitizedTitle).toBe('Talk');
    expect(ws.rootPath).toBe('/data/Talk');
    expect(ws.subpaths).toEqual({
      audio: '/data/Talk/base_youtube_audio',
      chunks: '/data/Talk/extracted_audio',
      transcription: '/data/Talk/base_transcription',
      responses: '/data/Talk/responses',
    });
    for (const dir of [ws.rootPath, ...Object.values(ws.subpaths)]) {
      expect(store.dirs.has(dir)).toBe(true);
    }
  });

  it('is idempotent and keeps existing content', async () => {
    const store = new MemoryStore();
    const first = await resolveWorkspace('/data', 'Talk', store);
    store.put('/data/Talk/responses/answer_1.txt', 'kept');

    const second = await resolveWorkspace('/data', 'Talk', store);

    expect(second).toEqual(first);
    expect(await store.readFile('/data/Talk/responses/answer_1.txt')).toBe('kept');
  });

  it('maps titles that sanitize alike to the same workspace', () => {
    expect(workspaceFor('/data', 'Talk?').rootPath).toBe(workspaceFor('/data', 'Talk').rootPath);
  });

  it('raises IOError when a directory cannot be created', async () => {
    const store = new MemoryStore();
    store.failEnsureDir = (p) => p.endsWith('responses');

    const err = await resolveWorkspace('/data', 'Talk', store).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IOError);
    expect(err).toMatchObject({ path: '/data/Talk/responses' });
  });
});

describe('cache status', () => {
  it('reports the canonical audio path when no wav exists', async () => {
    const store = new MemoryStore();
    const ws = await resolveWorkspace('/data', 'Talk', store);
    store.put('/data/Talk/base_youtube_audio/Talk.webm.part');

    expect(await audioStatus(ws, store)).toEqual({
      present: false,
      path: '/data/Talk/base_youtube_audio/Talk.wav',
    });
  });

  it('uses whichever wav is already in the audio directory', async () => {
    const store = new MemoryStore();
    const ws = await resolveWorkspace('/data', 'Talk', store);
    store.put('/data/Talk/base_youtube_audio/downloaded.wav', 'RIFF');

    expect(await audioStatus(ws, store)).toEqual({
      present: true,
      path: '/data/Talk/base_youtube_audio/downloaded.wav',
    });
  });

  it('reports the transcript once it is written', async () => {
    const store = new MemoryStore();
    const ws = await resolveWorkspace('/data', 'Talk', store);
    const before = await transcriptStatus(ws, store);
    expect(before).toEqual({ present: false, path: '/data/Talk/base_transcription/transcription.txt' });

    store.put(before.path, '[Chunk 1]\nhello\n\n');
    expect((await transcriptStatus(ws, store)).present).toBe(true);
  });
});
