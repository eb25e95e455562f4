/**
 * Error taxonomy for the pipeline.
 *
 * Stage-level errors are fatal for a run. TranscriptionServiceError is the
 * only one the scheduler recovers from (retry, then fallback, then a
 * recorded failed chunk).
 */

export class PipelineError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Required credentials absent from the environment. Raised before any I/O.
 */
export class MissingCredentialsError extends ConfigError {
  missing: string[];

  constructor(missing: string[]) {
    super(`Missing required credentials: ${missing.join(', ')}`, { details: { missing } });
    this.name = 'MissingCredentialsError';
    this.missing = missing;
  }
}

/**
 * Workspace or filesystem not writable
 */
export class IOError extends PipelineError {
  path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, details: { path } });
    this.name = 'IOError';
    this.path = path;
  }
}

export class DownloadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options);
    this.name = 'DownloadError';
  }
}

/**
 * Bad duration or chunk count, or ffmpeg could not cut a segment
 */
export class ChunkingError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options);
    this.name = 'ChunkingError';
  }
}

/**
 * A single failed call to a speech-to-text engine
 */
export class TranscriptionServiceError extends PipelineError {
  engine: string;
  statusCode?: number;

  constructor(message: string, engine: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, details: { engine, statusCode } });
    this.name = 'TranscriptionServiceError';
    this.engine = engine;
    this.statusCode = statusCode;
  }

  toString(): string {
    const parts = [`[${this.engine}] ${this.message}`];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    return parts.join(' ');
  }
}

/**
 * Every chunk of a run failed; nothing was reassembled
 */
export class TranscriptionFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options);
    this.name = 'TranscriptionFailedError';
  }
}

export class AnalysisServiceError extends PipelineError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, details: { statusCode } });
    this.name = 'AnalysisServiceError';
    this.statusCode = statusCode;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
