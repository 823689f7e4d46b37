export type GenerationErrorKind =
  | 'INVALID_REQUEST'
  | 'SUBMISSION_FAILED'
  | 'GENERATION_FAILED'
  | 'GENERATION_TIMEOUT'
  | 'STORAGE_FAILED'
  | 'CANCELLED';

/**
 * The only error type `generate` rejects with. `kind` lets the caller tell
 * "try again" (timeout) from "broken prompt/service" (failed) from
 * "storage misconfigured" (storage).
 */
export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly detail?: string;
  readonly jobId?: string;

  constructor(
    kind: GenerationErrorKind,
    message: string,
    options: { detail?: string; jobId?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'GenerationError';
    this.kind = kind;
    this.detail = options.detail;
    this.jobId = options.jobId;
  }
}

export class SubmissionError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SubmissionError';
    this.status = options.status;
  }
}

export class StorageError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
  }
}

export function isGenerationError(err: unknown): err is GenerationError {
  return err instanceof GenerationError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isAbortError(err: unknown) {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

export function mapGeminiError(err: unknown) {
  const msg = errorMessage(err);

  if (msg.includes('API key not valid') || msg.includes('PERMISSION_DENIED')) {
    return 'Gemini API key is invalid or lacks permission.';
  }

  if (msg.includes('model') && msg.includes('not found')) {
    return 'Gemini model is unavailable.';
  }

  if (msg.toLowerCase().includes('quota') || msg.includes('RESOURCE_EXHAUSTED')) {
    return 'Gemini quota exceeded.';
  }

  if (isAbortError(err)) {
    return 'Gemini request timed out.';
  }

  return 'Gemini request failed. Check server logs.';
}

export const HTTP_STATUS_BY_KIND: Record<GenerationErrorKind, number> = {
  INVALID_REQUEST: 400,
  SUBMISSION_FAILED: 502,
  GENERATION_FAILED: 502,
  GENERATION_TIMEOUT: 504,
  STORAGE_FAILED: 500,
  CANCELLED: 499,
};
