/**
 * Error classes for the transcription pipeline.
 *
 * Every fatal condition is a `PipelineError`; a run that detects no speech is
 * not an error and resolves with an empty segment list.
 */

export type ErrorDetails = Record<string, string | number | boolean | null | undefined>;

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(message: string, code = 'pipeline_error', details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`, `(code: ${this.code})`];
    if (this.details && Object.keys(this.details).length) {
      parts.push(JSON.stringify(this.details));
    }
    return parts.join(' ');
  }
}

/**
 * Invalid option or option combination, raised before any audio is touched
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'configuration_error', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Missing, unreadable or empty input audio
 */
export class InputError extends PipelineError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, 'input_error', details, options);
    this.name = 'InputError';
  }
}

/**
 * Speech intervals that break the ascending, non-empty contract
 */
export class ChunkingError extends PipelineError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, 'chunking_error', details, options);
    this.name = 'ChunkingError';
  }
}

/**
 * Engine failure or unparsable engine output for one chunk
 */
export class TranscriptionError extends PipelineError {
  chunkIndex?: number;

  constructor(message: string, chunkIndex?: number, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, 'transcription_error', { ...details, chunkIndex }, options);
    this.name = 'TranscriptionError';
    this.chunkIndex = chunkIndex;
  }
}

export function errorMessage(e: unknown): string {
  if (e && typeof e === 'object' && 'shortMessage' in e && typeof e.shortMessage === 'string') {
    return e.shortMessage;
  }
  return e instanceof Error ? e.message : String(e);
}
