import { HTTP_STATUS_BY_KIND, errorMessage, isGenerationError, type GenerationErrorKind } from '../errors';
import type { GenerationResult } from '../types';

export interface GenerateVideoResponse {
  message: string;
  url: string;
  backend: 'CDN' | 'LOCAL';
  filename: string;
  bytes: number;
  original_prompt: string;
  enhanced_prompt: string | null;
  used_fallback: boolean;
  job_id: string;
}

export function buildGenerateVideoResponse(result: GenerationResult, enhanceRequested: boolean): GenerateVideoResponse {
  const { prompt, job, artifact } = result;
  // Only the fields below leave the server; the job's transient resultRef never does.
  return {
    message: 'Video generated successfully',
    url: artifact.uri,
    backend: artifact.backend,
    filename: artifact.filename,
    bytes: artifact.bytesSize,
    original_prompt: prompt.original,
    enhanced_prompt: enhanceRequested ? prompt.enhanced : null,
    used_fallback: prompt.usedFallback,
    job_id: job.jobId,
  };
}

export interface ErrorResponse {
  status: number;
  body: { error: { kind: GenerationErrorKind | 'INTERNAL'; message: string; job_id?: string } };
}

export function buildErrorResponse(err: unknown): ErrorResponse {
  if (isGenerationError(err)) {
    return {
      status: HTTP_STATUS_BY_KIND[err.kind],
      body: { error: { kind: err.kind, message: err.message, job_id: err.jobId } },
    };
  }
  return {
    status: 500,
    body: { error: { kind: 'INTERNAL', message: `Video generation failed: ${errorMessage(err)}` } },
  };
}
