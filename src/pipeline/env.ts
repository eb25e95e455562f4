import { DEFAULT_BOILERPLATE_PHRASES } from './constants';
import { ConfigError, MissingCredentialsError } from './errors';
import type { LogFormat, LogLevel } from './log';

export interface PipelineConfig {
    openaiApiKey: string;
    anthropicApiKey: string;
    // Optional: makes Deepgram the fallback engine
    deepgramApiKey: string;
    workspacesRoot: string;
    chunkCount: number;
    workers: number;
    primaryAttempts: number;
    fallbackAttempts: number;
    transcribeModel: string;
    // OpenAI model of the fallback stage when no Deepgram key is set
    fallbackModel: string;
    deepgramModel: string;
    analysisModel: string;
    analysisMaxTokens: number;
    analysisTemperature: number;
    requestTimeoutMs: number;
    ytdlpBin: string;
    // Optional: python interpreter with yt_dlp installed, tried after the binaries
    ytdlpPythonBin: string;
    ffmpegBin: string;
    ffprobeBin: string;
    boilerplatePhrases: string[];
    logLevel: LogLevel;
    logFormat: LogFormat;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function positiveInt(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
        throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
    }
    return n;
}

function number(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
        throw new ConfigError(`${name} must be a number, got "${raw}"`);
    }
    return n;
}

function logLevel(raw: string | undefined): LogLevel {
    const found = LOG_LEVELS.find((l) => l === (raw || '').toLowerCase());
    return found ?? 'info';
}

/**
 * Resolve the process-wide configuration once at startup. Credentials are
 * checked first so a misconfigured run fails before touching disk or network.
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
    const missing = ['OPENAI_API_KEY', 'ANTHROPIC_API_KEY'].filter(
        (name) => !(env[name] || '').trim()
    );
    if (missing.length) {
        throw new MissingCredentialsError(missing);
    }

    return {
        openaiApiKey: (env.OPENAI_API_KEY || '').trim(),
        anthropicApiKey: (env.ANTHROPIC_API_KEY || '').trim(),
        deepgramApiKey: (env.DEEPGRAM_API_KEY || '').trim(),
        workspacesRoot: env.WORKSPACES_ROOT || 'workspaces',
        chunkCount: positiveInt(env, 'CHUNK_COUNT', 30),
        workers: positiveInt(env, 'TRANSCRIBE_WORKERS', 4),
        primaryAttempts: positiveInt(env, 'PRIMARY_ATTEMPTS', 2),
        fallbackAttempts: positiveInt(env, 'FALLBACK_ATTEMPTS', 1),
        transcribeModel: env.OPENAI_TRANSCRIBE_MODEL || 'gpt-4o-mini-transcribe',
        fallbackModel: env.OPENAI_FALLBACK_MODEL || 'whisper-1',
        deepgramModel: env.DEEPGRAM_MODEL || 'nova-2',
        analysisModel: env.ANTHROPIC_MODEL || 'claude-sonnet-4-20250514',
        analysisMaxTokens: positiveInt(env, 'ANALYSIS_MAX_TOKENS', 4000),
        analysisTemperature: number(env, 'ANALYSIS_TEMPERATURE', 0.7),
        requestTimeoutMs: positiveInt(env, 'REQUEST_TIMEOUT_MS', 120000),
        ytdlpBin: env.YTDLP_BIN || 'yt-dlp',
        ytdlpPythonBin: env.YTDLP_PYTHON_BIN || '',
        ffmpegBin: env.FFMPEG_BIN || 'ffmpeg',
        ffprobeBin: env.FFPROBE_BIN || 'ffprobe',
        boilerplatePhrases: [...DEFAULT_BOILERPLATE_PHRASES],
        logLevel: logLevel(env.LOG_LEVEL),
        logFormat: env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    };
}
