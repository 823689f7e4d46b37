export const ASPECT_RATIOS = ['16:9', '9:16', '1:1', '4:3'] as const;

export type AspectRatio = (typeof ASPECT_RATIOS)[number];

export interface GenerationRequest {
  readonly rawPrompt: string;
  readonly aspectRatio: AspectRatio;
  readonly enhance: boolean;
}

export interface EnhancedPrompt {
  readonly original: string;
  readonly enhanced: string;
  readonly usedFallback: boolean;
}

export type JobState = 'SUBMITTED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT';

export interface GenerationJob {
  readonly jobId: string;
  readonly state: JobState;
  // Transient remote file reference; only present once the job SUCCEEDED.
  readonly resultRef?: string;
  readonly error?: string;
  readonly polls: number;
}

export type StorageBackend = 'CDN' | 'LOCAL';

export interface StoredArtifact {
  readonly uri: string;
  readonly backend: StorageBackend;
  readonly bytesSize: number;
  readonly filename: string;
}

export interface ListedArtifact extends StoredArtifact {
  readonly publicId: string;
  readonly format?: string;
  readonly width?: number;
  readonly height?: number;
  readonly durationSec?: number;
  readonly createdAt?: string;
}

export interface GenerationResult {
  readonly prompt: EnhancedPrompt;
  readonly job: GenerationJob;
  readonly artifact: StoredArtifact;
}

export function isAspectRatio(value: unknown): value is AspectRatio {
  return ASPECT_RATIOS.some((ratio) => ratio === value);
}
