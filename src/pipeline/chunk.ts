import { execa } from 'execa';
import path from 'path';
import { CHUNK_MANIFEST_FILE, DEFAULT_CHUNK_COUNT } from './constants';
import type { PipelineConfig } from './env';
import { ChunkingError, errorMessage } from './errors';
import { info, startStep } from './log';
import type { FileStore } from './store';
import type { AudioChunk, ChunkBoundary, ChunkManifest, VideoWorkspace } from './types';

/**
 * Audio probing and cutting. The pipeline never decodes audio itself.
 */
export interface AudioTools {
    probeDuration(audioPath: string): Promise<number>;
    extractSegment(src: string, dest: string, startSec: number, durationSec: number): Promise<void>;
}

export function ffmpegTools(cfg: Pick<PipelineConfig, 'ffmpegBin' | 'ffprobeBin'>): AudioTools {
    return {
        async probeDuration(audioPath) {
            const probe = await execa(cfg.ffprobeBin, [
                '-v',
                'error',
                '-show_entries',
                'format=duration',
                '-of',
                'default=noprint_wrappers=1:nokey=1',
                audioPath,
            ]);
            return parseFloat(probe.stdout);
        },
        async extractSegment(src, dest, startSec, durationSec) {
            // Accurate seeking: -ss after -i. Output is WAV PCM 16k mono.
            await execa(cfg.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                src,
                '-ss',
                String(startSec),
                '-t',
                String(durationSec),
                '-vn',
                '-sn',
                '-ac',
                '1',
                '-ar',
                '16000',
                '-acodec',
                'pcm_s16le',
                '-f',
                'wav',
                dest,
            ]);
        },
    };
}

function assertChunkCount(chunkCount: number) {
    if (!Number.isInteger(chunkCount) || chunkCount <= 0) {
        throw new ChunkingError(`chunkCount must be a positive integer, got ${chunkCount}`);
    }
}

/**
 * Split [0, durationSec) into `chunkCount` contiguous windows on a millisecond grid.
 * The last window absorbs the rounding remainder.
 */
export function planBoundaries(durationSec: number, chunkCount: number): ChunkBoundary[] {
    assertChunkCount(chunkCount);
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
        throw new ChunkingError(`Audio duration must be a positive number of seconds, got ${durationSec}`);
    }
    const totalMs = Math.round(durationSec * 1000);
    const chunkMs = Math.floor(totalMs / chunkCount);
    if (chunkMs < 1) {
        throw new ChunkingError(`Audio of ${totalMs}ms is too short for ${chunkCount} chunks`);
    }
    const boundaries: ChunkBoundary[] = [];
    for (let index = 0; index < chunkCount; index++) {
        boundaries.push({
            index,
            startMs: index * chunkMs,
            endMs: index === chunkCount - 1 ? totalMs : (index + 1) * chunkMs,
        });
    }
    return boundaries;
}

export function chunkFileName(index: number, chunkCount: number): string {
    const width = Math.max(3, String(chunkCount).length);
    return `chunk_${String(index + 1).padStart(width, '0')}.wav`;
}

function toChunks(boundaries: ChunkBoundary[], chunksDir: string): AudioChunk[] {
    return boundaries.map((b) => ({
        index: b.index,
        path: path.join(chunksDir, chunkFileName(b.index, boundaries.length)),
        startOffset: b.startMs / 1000,
        endOffset: b.endMs / 1000,
    }));
}

function isChunk(v: unknown): v is AudioChunk {
    if (typeof v !== 'object' || v === null) return false;
    return (
        'index' in v &&
        Number.isInteger(v.index) &&
        'path' in v &&
        typeof v.path === 'string' &&
        'startOffset' in v &&
        typeof v.startOffset === 'number' &&
        'endOffset' in v &&
        typeof v.endOffset === 'number' &&
        v.endOffset > v.startOffset
    );
}

function isManifest(v: unknown): v is ChunkManifest {
    if (typeof v !== 'object' || v === null) return false;
    return (
        'audioPath' in v &&
        typeof v.audioPath === 'string' &&
        'durationSec' in v &&
        typeof v.durationSec === 'number' &&
        'chunkCount' in v &&
        typeof v.chunkCount === 'number' &&
        'chunks' in v &&
        Array.isArray(v.chunks) &&
        v.chunks.every(isChunk)
    );
}

/**
 * A manifest describes the expected set only when it was cut from the same
 * audio for the same count, and its entries line up with the expected files.
 */
function matchesPlan(manifest: ChunkManifest, audioPath: string, chunkCount: number, chunksDir: string): boolean {
    if (manifest.audioPath !== audioPath || manifest.chunkCount !== chunkCount) return false;
    if (manifest.chunks.length !== chunkCount) return false;
    return manifest.chunks.every(
        (c, i) => c.index === i && c.path === path.join(chunksDir, chunkFileName(i, chunkCount))
    );
}

async function readManifest(manifestPath: string, store: FileStore): Promise<ChunkManifest | null> {
    try {
        const parsed: unknown = JSON.parse(await store.readFile(manifestPath));
        return isManifest(parsed) ? parsed : null;
    } catch (e) {
        info('chunk.manifest.unreadable', { manifestPath, error: errorMessage(e) });
        return null;
    }
}

async function probe(tools: AudioTools, audioPath: string): Promise<number> {
    let durationSec: number;
    try {
        durationSec = await tools.probeDuration(audioPath);
    } catch (e) {
        throw new ChunkingError(`Could not determine duration for ${audioPath}: ${errorMessage(e)}`, { cause: e });
    }
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
        throw new ChunkingError(`Could not determine duration for ${audioPath} (probe returned ${durationSec})`);
    }
    return durationSec;
}

export interface PlanChunksDeps {
    tools: AudioTools;
    store: FileStore;
}

/**
 * Cut the workspace audio into `chunkCount` files under the chunks subpath.
 *
 * Reuses the existing set only when every expected chunk file is present and
 * the manifest, if any, was written for this audio and count. A partially
 * chunked directory, or one cut for another plan, is re-cut in full.
 */
export async function planChunks(
    ws: VideoWorkspace,
    audioPath: string,
    deps: PlanChunksDeps,
    chunkCount: number = DEFAULT_CHUNK_COUNT
): Promise<AudioChunk[]> {
    assertChunkCount(chunkCount);
    const { tools, store } = deps;
    const chunksDir = ws.subpaths.chunks;
    const manifestPath = path.join(chunksDir, CHUNK_MANIFEST_FILE);
    await store.ensureDir(chunksDir);

    const expected = Array.from({ length: chunkCount }, (_, i) => chunkFileName(i, chunkCount));
    const existing = new Set(await store.readdir(chunksDir));
    const missing = expected.filter((name) => !existing.has(name));

    if (missing.length === 0) {
        if (!(await store.pathExists(manifestPath))) {
            const durationSec = await probe(tools, audioPath);
            info('chunk.reuse', { dir: chunksDir, count: chunkCount, source: 'probe', durationSec });
            return toChunks(planBoundaries(durationSec, chunkCount), chunksDir);
        }
        const manifest = await readManifest(manifestPath, store);
        if (manifest && matchesPlan(manifest, audioPath, chunkCount, chunksDir)) {
            info('chunk.reuse', { dir: chunksDir, count: chunkCount, source: 'manifest' });
            return manifest.chunks;
        }
        // Files with the expected names were cut for another plan, or the manifest is unusable
        info('chunk.stale', {
            dir: chunksDir,
            count: chunkCount,
            manifestCount: manifest ? manifest.chunkCount : null,
            manifestAudio: manifest ? manifest.audioPath : null,
        });
    } else if (missing.length < chunkCount) {
        info('chunk.partial', { dir: chunksDir, missing: missing.length, expected: chunkCount });
    }

    const durationSec = await probe(tools, audioPath);
    info('chunk.probe', { audioPath, durationSec });
    const chunks = toChunks(planBoundaries(durationSec, chunkCount), chunksDir);

    const timer = startStep('chunk.split', { durationSec, chunkCount });
    for (const chunk of chunks) {
        const segmentDur = chunk.endOffset - chunk.startOffset;
        try {
            await tools.extractSegment(audioPath, chunk.path, chunk.startOffset, segmentDur);
        } catch (e) {
            throw new ChunkingError(
                `ffmpeg failed while extracting segment index=${chunk.index} start=${chunk.startOffset} dur=${segmentDur}: ${errorMessage(e)}`,
                { cause: e }
            );
        }
        timer.eta(chunk.index + 1, chunks.length);
    }
    timer.end();

    const manifest: ChunkManifest = { audioPath, durationSec, chunkCount, chunks };
    await store.writeFile(manifestPath, JSON.stringify(manifest, null, 2));
    info('chunk.complete', { count: chunks.length, durationSec });
    return chunks;
}
