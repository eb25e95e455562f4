import type { EngineStage } from './engines';
import { PipelineError } from './errors';
import { debug, info, startStep, warn } from './log';
import { runPool } from './pool';
import type { AudioChunk, TranscriptionResult } from './types';

export interface TranscribeOptions {
    workers: number;
}

async function transcribeChunk(chunk: AudioChunk, chain: EngineStage[]): Promise<TranscriptionResult> {
    let lastRole = chain[chain.length - 1].engine.role;
    for (const { engine, attempts } of chain) {
        lastRole = engine.role;
        for (let attempt = 1; attempt <= attempts; attempt++) {
            debug('transcribe.chunk.start', { idx: chunk.index, engine: engine.name, attempt });
            const res = await engine.attempt(chunk);
            if (res.ok) {
                info('transcribe.chunk.done', {
                    idx: chunk.index,
                    engine: engine.name,
                    attempt,
                    chars: res.text.length,
                });
                return { chunkIndex: chunk.index, text: res.text, engineUsed: engine.role, status: 'ok' };
            }
            warn('transcribe.chunk.fail', {
                idx: chunk.index,
                engine: engine.name,
                attempt,
                error: res.error.message,
                statusCode: res.error.statusCode,
            });
        }
    }
    warn('transcribe.chunk.giveup', { idx: chunk.index, path: chunk.path });
    return { chunkIndex: chunk.index, text: '', engineUsed: lastRole, status: 'failed' };
}

/**
 * Transcribe every chunk through the engine chain on a bounded worker pool.
 *
 * Per chunk each stage is tried up to its attempt bound, in chain order; a chunk
 * that exhausts the chain is recorded as failed and never aborts its siblings.
 * The returned array is ordered by chunk index.
 */
export async function transcribeAll(
    chunks: AudioChunk[],
    chain: EngineStage[],
    opts: TranscribeOptions
): Promise<TranscriptionResult[]> {
    if (!chain.length) {
        throw new PipelineError('At least one transcription engine is required');
    }
    const ordered = [...chunks].sort((a, b) => a.index - b.index);
    if (ordered.some((c, i) => c.index !== i)) {
        throw new PipelineError('Chunk indices must be dense and start at 0', {
            details: { indices: ordered.map((c) => c.index) },
        });
    }

    const timer = startStep('transcribe.chunks', {
        total: ordered.length,
        workers: opts.workers,
        engines: chain.map((s) => `${s.engine.name}x${s.attempts}`),
    });
    let processed = 0;
    const results = await runPool(ordered, opts.workers, async (chunk) => {
        const result = await transcribeChunk(chunk, chain);
        processed += 1;
        timer.eta(processed, ordered.length);
        return result;
    });
    timer.end();

    const failed = results.filter((r) => r.status === 'failed').length;
    const viaFallback = results.filter((r) => r.status === 'ok' && r.engineUsed === 'fallback').length;
    info('transcribe.complete', { total: results.length, failed, viaFallback });
    return results;
}
