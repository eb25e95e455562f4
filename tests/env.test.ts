import { describe, it, expect } from 'vitest';
import { DEFAULT_BOILERPLATE_PHRASES } from '../src/pipeline/constants';
import { loadConfig } from '../src/pipeline/env';
import { ConfigError, MissingCredentialsError } from '../src/pipeline/errors';

const creds = { OPENAI_API_KEY: 'test-key', ANTHROPIC_API_KEY: 'test-key' };

describe('loadConfig', () => {
  it('names every missing credential', () => {
    const err = (() => {
      try {
        loadConfig({});
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(MissingCredentialsError);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty('missing', ['OPENAI_API_KEY', 'ANTHROPIC_API_KEY']);
    expect(err).toHaveProperty('message', 'Missing required credentials: OPENAI_API_KEY, ANTHROPIC_API_KEY');
  });

  it('treats blank values as missing', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', ANTHROPIC_API_KEY: '   ' })).toThrow(
      'Missing required credentials: ANTHROPIC_API_KEY'
    );
  });

  it('applies defaults', () => {
    const cfg = loadConfig(creds);

    expect(cfg).toMatchObject({
      openaiApiKey: 'test-key',
      anthropicApiKey: 'test-key',
      deepgramApiKey: '',
      workspacesRoot: 'workspaces',
      chunkCount: 30,
      workers: 4,
      primaryAttempts: 2,
      fallbackAttempts: 1,
      transcribeModel: 'gpt-4o-mini-transcribe',
      fallbackModel: 'whisper-1',
      analysisMaxTokens: 4000,
      analysisTemperature: 0.7,
      ytdlpBin: 'yt-dlp',
      ffmpegBin: 'ffmpeg',
      ffprobeBin: 'ffprobe',
      logLevel: 'info',
      logFormat: 'json',
    });
    expect(cfg.boilerplatePhrases).toEqual([...DEFAULT_BOILERPLATE_PHRASES]);
  });

  it('reads overrides', () => {
    const cfg = loadConfig({
      ...creds,
      DEEPGRAM_API_KEY: ' test-key ',
      CHUNK_COUNT: '12',
      TRANSCRIBE_WORKERS: '8',
      ANALYSIS_TEMPERATURE: '0',
      WORKSPACES_ROOT: '/srv/videos',
      LOG_LEVEL: 'WARN',
      LOG_FORMAT: 'pretty',
    });

    expect(cfg).toMatchObject({
      deepgramApiKey: 'test-key',
      chunkCount: 12,
      workers: 8,
      analysisTemperature: 0,
      workspacesRoot: '/srv/videos',
      logLevel: 'warn',
      logFormat: 'pretty',
    });
  });

  it('rejects counts that are not positive integers', () => {
    for (const CHUNK_COUNT of ['0', '-3', '2.5', 'abc']) {
      expect(() => loadConfig({ ...creds, CHUNK_COUNT })).toThrow(ConfigError);
    }
  });

  it('falls back to info for an unknown log level', () => {
    expect(loadConfig({ ...creds, LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });
});
