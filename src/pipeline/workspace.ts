import path from 'path';
import {
    AUDIO_DIR,
    CHUNKS_DIR,
    MAX_TITLE_LENGTH,
    RESPONSES_DIR,
    TRANSCRIPT_FILE,
    TRANSCRIPTION_DIR,
} from './constants';
import { IOError } from './errors';
import { debug } from './log';
import type { FileStore } from './store';
import type { AudioAsset, Transcript, VideoWorkspace } from './types';

// Reserved on Windows/macOS/Linux file systems, plus ASCII control characters
// eslint-disable-next-line no-control-regex
const ILLEGAL_PATH_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function sanitizeTitle(title: string): string {
    // Whitespace first: tabs and newlines fall inside the control-character range
    const collapsed = title
        .replace(/\s+/g, ' ')
        .replace(ILLEGAL_PATH_CHARS, '')
        .replace(/ {2,}/g, ' ')
        .trim();
    // Truncate by code point so emoji in titles are never split
    const cleaned = Array.from(collapsed)
        .slice(0, MAX_TITLE_LENGTH)
        .join('')
        .replace(/[. ]+$/, '');
    return cleaned || 'untitled';
}

export function workspaceFor(root: string, videoTitle: string): VideoWorkspace {
    const sanitizedTitle = sanitizeTitle(videoTitle);
    const rootPath = path.resolve(root, sanitizedTitle);
    return {
        sanitizedTitle,
        rootPath,
        subpaths: {
            audio: path.join(rootPath, AUDIO_DIR),
            chunks: path.join(rootPath, CHUNKS_DIR),
            transcription: path.join(rootPath, TRANSCRIPTION_DIR),
            responses: path.join(rootPath, RESPONSES_DIR),
        },
    };
}

/**
 * Map a video title to its workspace, creating any missing directories.
 * Safe to call on every run; nothing is ever removed.
 */
export async function resolveWorkspace(
    root: string,
    videoTitle: string,
    store: FileStore
): Promise<VideoWorkspace> {
    const ws = workspaceFor(root, videoTitle);
    const dirs = [ws.rootPath, ...Object.values(ws.subpaths)];
    for (const dir of dirs) {
        try {
            await store.ensureDir(dir);
        } catch (e) {
            throw new IOError(`Workspace directory is not writable: ${dir}`, dir, { cause: e });
        }
    }
    debug('workspace.resolve', { title: videoTitle, dir: ws.rootPath });
    return ws;
}

export async function audioStatus(ws: VideoWorkspace, store: FileStore): Promise<AudioAsset> {
    const wavs = (await store.readdir(ws.subpaths.audio))
        .filter((f) => f.toLowerCase().endsWith('.wav'))
        .sort();
    if (!wavs.length) {
        return { present: false, path: path.join(ws.subpaths.audio, `${ws.sanitizedTitle}.wav`) };
    }
    return { present: true, path: path.join(ws.subpaths.audio, wavs[0]) };
}

export async function transcriptStatus(ws: VideoWorkspace, store: FileStore): Promise<Transcript> {
    const transcriptPath = path.join(ws.subpaths.transcription, TRANSCRIPT_FILE);
    return { present: await store.pathExists(transcriptPath), path: transcriptPath };
}
