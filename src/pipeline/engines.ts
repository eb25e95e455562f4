import fs from 'fs-extra';
import ky, { HTTPError, type KyInstance } from 'ky';
import OpenAI from 'openai';
import type { PipelineConfig } from './env';
import { TranscriptionServiceError, errorMessage } from './errors';
import { info } from './log';
import type { AudioChunk, EngineRole } from './types';

export type AttemptResult =
    | { ok: true; text: string }
    | { ok: false; error: TranscriptionServiceError };

/**
 * A speech-to-text service. Each call is a single attempt: no internal retries.
 */
export interface TranscriptionEngine {
    readonly name: string;
    readonly role: EngineRole;
    transcribe(chunkPath: string): Promise<string>;
    attempt(chunk: AudioChunk): Promise<AttemptResult>;
}

/**
 * One link of the fallback chain: an engine and how many times to try it per chunk.
 */
export interface EngineStage {
    engine: TranscriptionEngine;
    attempts: number;
}

export abstract class BaseEngine implements TranscriptionEngine {
    readonly name: string;
    readonly role: EngineRole;

    protected constructor(name: string, role: EngineRole) {
        this.name = name;
        this.role = role;
    }

    abstract transcribe(chunkPath: string): Promise<string>;

    async attempt(chunk: AudioChunk): Promise<AttemptResult> {
        try {
            return { ok: true, text: await this.transcribe(chunk.path) };
        } catch (e) {
            return { ok: false, error: this.toServiceError(e) };
        }
    }

    protected toServiceError(e: unknown): TranscriptionServiceError {
        if (e instanceof TranscriptionServiceError) return e;
        return new TranscriptionServiceError(errorMessage(e), this.name, undefined, { cause: e });
    }
}

export interface OpenAIEngineOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
    name?: string;
    role?: EngineRole;
}

export class OpenAIEngine extends BaseEngine {
    private client: OpenAI;
    readonly model: string;

    constructor(opts: OpenAIEngineOptions) {
        super(opts.name ?? 'openai', opts.role ?? 'primary');
        this.model = opts.model;
        // The scheduler owns retries
        this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
    }

    async transcribe(chunkPath: string): Promise<string> {
        try {
            const res = await this.client.audio.transcriptions.create({
                file: fs.createReadStream(chunkPath),
                model: this.model,
            });
            return res.text;
        } catch (e) {
            if (e instanceof OpenAI.APIError) {
                throw new TranscriptionServiceError(
                    `OpenAI transcription failed: ${e.message}`,
                    this.name,
                    e.status,
                    { cause: e }
                );
            }
            throw e;
        }
    }
}

interface DeepgramListenResponse {
    results?: {
        channels?: Array<{
            alternatives?: Array<{ transcript: string; confidence?: number }>;
        }>;
    };
}

export interface DeepgramEngineOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
    baseUrl?: string;
    role?: EngineRole;
    fetch?: typeof fetch;
}

export class DeepgramEngine extends BaseEngine {
    private client: KyInstance;
    readonly model: string;

    constructor(opts: DeepgramEngineOptions) {
        super('deepgram', opts.role ?? 'fallback');
        this.model = opts.model;
        this.client = ky.create({
            prefixUrl: opts.baseUrl ?? 'https://api.deepgram.com',
            timeout: opts.timeoutMs,
            retry: 0,
            headers: { Authorization: `Token ${opts.apiKey}` },
            ...(opts.fetch ? { fetch: opts.fetch } : {}),
        });
    }

    async transcribe(chunkPath: string): Promise<string> {
        const audio = await fs.readFile(chunkPath);
        let res: DeepgramListenResponse;
        try {
            res = await this.client
                .post('v1/listen', {
                    body: new Uint8Array(audio),
                    headers: { 'Content-Type': 'audio/wav' },
                    searchParams: { model: this.model, smart_format: 'true', punctuate: 'true' },
                })
                .json<DeepgramListenResponse>();
        } catch (e) {
            if (e instanceof HTTPError) {
                throw new TranscriptionServiceError(
                    `Deepgram request failed: ${e.message}`,
                    this.name,
                    e.response.status,
                    { cause: e }
                );
            }
            throw e;
        }
        const alternative = res.results?.channels?.[0]?.alternatives?.[0];
        if (!alternative) {
            throw new TranscriptionServiceError('Invalid Deepgram response: missing channel data', this.name);
        }
        return alternative.transcript;
    }
}

/**
 * Primary engine first, then one fallback stage. Deepgram is the fallback when
 * its key is configured; otherwise a second OpenAI model on the same key.
 */
export function buildEngineChain(cfg: PipelineConfig): EngineStage[] {
    const primary: EngineStage = {
        engine: new OpenAIEngine({
            apiKey: cfg.openaiApiKey,
            model: cfg.transcribeModel,
            timeoutMs: cfg.requestTimeoutMs,
        }),
        attempts: cfg.primaryAttempts,
    };
    const fallback = cfg.deepgramApiKey
        ? new DeepgramEngine({
              apiKey: cfg.deepgramApiKey,
              model: cfg.deepgramModel,
              timeoutMs: cfg.requestTimeoutMs,
          })
        : new OpenAIEngine({
              apiKey: cfg.openaiApiKey,
              model: cfg.fallbackModel,
              timeoutMs: cfg.requestTimeoutMs,
              name: 'openai-fallback',
              role: 'fallback',
          });
    info('engines.chain', {
        primary: `${primary.engine.name}:${cfg.transcribeModel}`,
        fallback: fallback.name,
    });
    return [primary, { engine: fallback, attempts: cfg.fallbackAttempts }];
}
