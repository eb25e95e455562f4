import path from 'path';
import { describe, it, expect } from 'vitest';
import type { EngineStage } from '../src/pipeline/engines';
import { PipelineError, TranscriptionServiceError } from '../src/pipeline/errors';
import { runPool } from '../src/pipeline/pool';
import { transcribeAll } from '../src/pipeline/transcribe';
import { FakeEngine, makeChunks, sleep } from './helpers/fakes';

const byName = (p: string) => `text of ${path.basename(p, '.wav')}`;

function chain(primary: FakeEngine, fallback?: FakeEngine, primaryAttempts = 2): EngineStage[] {
  const stages: EngineStage[] = [{ engine: primary, attempts: primaryAttempts }];
  if (fallback) stages.push({ engine: fallback, attempts: 1 });
  return stages;
}

describe('transcribeAll', () => {
  it('returns one ordered result per chunk when the primary succeeds', async () => {
    const primary = new FakeEngine('openai', 'primary', async (p) => byName(p));
    const fallback = new FakeEngine('deepgram', 'fallback', async () => 'unused');

    const results = await transcribeAll(makeChunks(3), chain(primary, fallback), { workers: 2 });

    expect(results).toEqual([
      { chunkIndex: 0, text: 'text of chunk_001', engineUsed: 'primary', status: 'ok' },
      { chunkIndex: 1, text: 'text of chunk_002', engineUsed: 'primary', status: 'ok' },
      { chunkIndex: 2, text: 'text of chunk_003', engineUsed: 'primary', status: 'ok' },
    ]);
    expect(fallback.calls).toHaveLength(0);
  });

  it('tries the primary twice before the fallback once', async () => {
    const primary = new FakeEngine('openai', 'primary', async () => {
      throw new TranscriptionServiceError('rate limited', 'openai', 429);
    });
    const fallback = new FakeEngine('deepgram', 'fallback', async (p) => byName(p));

    const results = await transcribeAll(makeChunks(4), chain(primary, fallback), { workers: 2 });

    expect(results.map((r) => [r.engineUsed, r.status])).toEqual([
      ['fallback', 'ok'],
      ['fallback', 'ok'],
      ['fallback', 'ok'],
      ['fallback', 'ok'],
    ]);
    expect(results[3].text).toBe('text of chunk_004');
    expect(primary.calls).toHaveLength(8);
    expect(fallback.calls).toHaveLength(4);
  });

  it('keeps the primary when its second attempt succeeds', async () => {
    let calls = 0;
    const primary = new FakeEngine('openai', 'primary', async () => {
      calls += 1;
      if (calls === 1) throw new Error('socket hang up');
      return 'recovered';
    });
    const fallback = new FakeEngine('deepgram', 'fallback', async () => 'unused');

    const [result] = await transcribeAll(makeChunks(1), chain(primary, fallback), { workers: 1 });

    expect(result).toEqual({ chunkIndex: 0, text: 'recovered', engineUsed: 'primary', status: 'ok' });
    expect(primary.calls).toHaveLength(2);
    expect(fallback.calls).toHaveLength(0);
  });

  it('records a chunk that exhausts every engine as failed without affecting siblings', async () => {
    const broken = (p: string) => p.endsWith('chunk_002.wav');
    const primary = new FakeEngine('openai', 'primary', async (p) => {
      if (broken(p)) throw new Error('primary down');
      return byName(p);
    });
    const fallback = new FakeEngine('deepgram', 'fallback', async () => {
      throw new Error('fallback down');
    });

    const results = await transcribeAll(makeChunks(3), chain(primary, fallback), { workers: 3 });

    expect(results[1]).toEqual({ chunkIndex: 1, text: '', engineUsed: 'fallback', status: 'failed' });
    expect(results[0].status).toBe('ok');
    expect(results[2].status).toBe('ok');
    expect(fallback.calls).toEqual(['/w/v/extracted_audio/chunk_002.wav']);
  });

  it('records the primary as the last engine tried when there is no fallback', async () => {
    const primary = new FakeEngine('openai', 'primary', async () => {
      throw new Error('down');
    });

    const [result] = await transcribeAll(makeChunks(1), chain(primary), { workers: 1 });

    expect(result).toEqual({ chunkIndex: 0, text: '', engineUsed: 'primary', status: 'failed' });
    expect(primary.calls).toHaveLength(2);
  });

  it('honours the configured attempt bound', async () => {
    const primary = new FakeEngine('openai', 'primary', async () => {
      throw new Error('down');
    });

    await transcribeAll(makeChunks(1), chain(primary, undefined, 3), { workers: 1 });

    expect(primary.calls).toHaveLength(3);
  });

  it('orders results by chunk index whatever the completion order', async () => {
    const chunks = makeChunks(6);
    const primary = new FakeEngine('openai', 'primary', async (p) => {
      const index = chunks.findIndex((c) => c.path === p);
      await sleep((chunks.length - index) * 5);
      return byName(p);
    });

    const results = await transcribeAll([...chunks].reverse(), chain(primary), { workers: 6 });

    expect(results.map((r) => r.chunkIndex)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(results.map((r) => r.text)).toEqual(chunks.map((c) => byName(c.path)));
  });

  it('never runs more calls than workers at once', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const primary = new FakeEngine('openai', 'primary', async (p) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(5);
      inFlight -= 1;
      return byName(p);
    });

    const results = await transcribeAll(makeChunks(10), chain(primary), { workers: 3 });

    expect(results).toHaveLength(10);
    expect(maxInFlight).toBe(3);
  });

  it('requires at least one engine', async () => {
    await expect(transcribeAll(makeChunks(1), [], { workers: 1 })).rejects.toBeInstanceOf(PipelineError);
  });

  it('rejects chunk sets with gaps in their indices', async () => {
    const primary = new FakeEngine('openai', 'primary', async () => 'x');
    const [a, , c] = makeChunks(3);

    await expect(transcribeAll([a, c], chain(primary), { workers: 1 })).rejects.toBeInstanceOf(PipelineError);
  });
});

describe('runPool', () => {
  it('aligns results with inputs', async () => {
    const out = await runPool([30, 10, 20], 2, async (ms, i) => {
      await sleep(ms);
      return `${i}:${ms}`;
    });
    expect(out).toEqual(['0:30', '1:10', '2:20']);
  });

  it('handles an empty input', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
