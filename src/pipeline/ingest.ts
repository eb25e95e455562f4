import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import type { PipelineConfig } from './env';
import { DownloadError, errorMessage } from './errors';
import { debug, info, startStep } from './log';
import type { FileStore } from './store';
import type { AudioAsset, VideoWorkspace } from './types';
import { audioStatus } from './workspace';

/**
 * Where videos come from. Both calls are fatal for the run when they fail.
 */
export interface VideoSource {
    fetchTitle(url: string): Promise<string>;
    // Produces a single audio file at `destPath`
    downloadBestAudio(url: string, destPath: string): Promise<void>;
}

type Candidate = [cmd: string, args: string[]];

function candidatesFor(cfg: Pick<PipelineConfig, 'ytdlpBin' | 'ytdlpPythonBin'>, args: string[]): Candidate[] {
    const candidates: Candidate[] = [[cfg.ytdlpBin, args]];
    if (cfg.ytdlpBin !== 'yt-dlp') {
        candidates.push(['yt-dlp', args]);
    }
    if (cfg.ytdlpPythonBin) {
        candidates.push([cfg.ytdlpPythonBin, ['-m', 'yt_dlp', ...args]]);
    }
    candidates.push(['python3', ['-m', 'yt_dlp', ...args]]);
    return candidates;
}

function describeFailure(e: unknown): string {
    if (typeof e === 'object' && e !== null) {
        for (const key of ['stderr', 'shortMessage'] as const) {
            if (key in e) {
                const v: unknown = Reflect.get(e, key);
                if (typeof v === 'string' && v.trim()) return v.trim();
            }
        }
    }
    return errorMessage(e);
}

async function runFirstAvailable(candidates: Candidate[], what: string): Promise<string> {
    const errors: string[] = [];
    for (const [cmd, args] of candidates) {
        try {
            const res = await execa(cmd, args, { stdio: 'pipe' });
            return res.stdout;
        } catch (e) {
            errors.push(`[${cmd}] ${describeFailure(e)}`);
            debug('ingest.candidate.fail', { cmd, what });
        }
    }
    throw new DownloadError(`All yt-dlp attempts failed for ${what}. Errors:\n${errors.join('\n---\n')}`);
}

export function ytdlpSource(cfg: Pick<PipelineConfig, 'ytdlpBin' | 'ytdlpPythonBin' | 'ffmpegBin'>): VideoSource {
    return {
        async fetchTitle(url) {
            const stdout = await runFirstAvailable(
                candidatesFor(cfg, ['--no-playlist', '--skip-download', '--print', 'title', url]),
                'metadata'
            );
            const title = stdout.split(/\r?\n/)[0]?.trim();
            if (!title) {
                throw new DownloadError(`yt-dlp returned no title for ${url}`);
            }
            return title;
        },
        async downloadBestAudio(url, destPath) {
            const parsed = path.parse(destPath);
            // yt-dlp substitutes the extension; -x converts to wav afterwards
            const template = path.join(parsed.dir, `${parsed.name}.%(ext)s`);
            const args = [
                '--no-playlist',
                '-f',
                'bestaudio/best',
                '-x',
                '--audio-format',
                'wav',
                '--ffmpeg-location',
                cfg.ffmpegBin,
                '-o',
                template,
                url,
            ];
            await runFirstAvailable(candidatesFor(cfg, args), 'audio download');
            if (!(await fs.pathExists(destPath))) {
                throw new DownloadError(
                    `Expected yt-dlp output ${destPath} was not created. Check yt-dlp availability or network.`
                );
            }
        },
    };
}

export interface AcquireAudioDeps {
    source: VideoSource;
    store: FileStore;
}

/**
 * Materialize the workspace audio unless a canonical WAV is already there.
 */
export async function acquireAudio(
    ws: VideoWorkspace,
    url: string,
    deps: AcquireAudioDeps
): Promise<AudioAsset & { downloaded: boolean }> {
    const status = await audioStatus(ws, deps.store);
    if (status.present) {
        info('ingest.skip', { reason: 'audio exists', path: status.path });
        return { ...status, downloaded: false };
    }
    const timer = startStep('ingest.download', { url, dest: status.path });
    try {
        await deps.source.downloadBestAudio(url, status.path);
    } catch (e) {
        if (e instanceof DownloadError) throw e;
        throw new DownloadError(`Failed to download audio: ${errorMessage(e)}`, { cause: e });
    }
    timer.end();
    return { present: true, path: status.path, downloaded: true };
}
