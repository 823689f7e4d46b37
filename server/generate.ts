import { GenerationError, StorageError, SubmissionError, errorMessage, isGenerationError } from './errors';
import { applyPromptLengthPolicy, hashShort, type PromptLengthPolicy } from './promptEnhancer/enhance';
import { passThrough, type EnhancementClient } from './promptEnhancer/runtime';
import { buildArtifactFilename, type ArtifactStore } from './storage';
import {
  isAspectRatio,
  type EnhancedPrompt,
  type GenerationJob,
  type GenerationRequest,
  type GenerationResult,
  type ListedArtifact,
} from './types';
import type { GenerationClient } from './video';

export interface GenerationOrchestrator {
  generate(request: GenerationRequest, options?: { signal?: AbortSignal }): Promise<GenerationResult>;
  listStoredArtifacts(folder: string, maxResults: number): Promise<ListedArtifact[]>;
}

export interface GenerationOrchestratorOptions {
  enhancer: EnhancementClient;
  generator: GenerationClient;
  store: ArtifactStore;
  lengthPolicy: PromptLengthPolicy;
  filenamePrefix: string;
  now?: () => Date;
}

/** Rejects malformed input before any remote call is made. */
export function validateGenerationRequest(request: GenerationRequest, policy: PromptLengthPolicy): GenerationRequest {
  if (typeof request.rawPrompt !== 'string') {
    throw new GenerationError('INVALID_REQUEST', 'Prompt is required.');
  }
  const checked = applyPromptLengthPolicy(request.rawPrompt, policy);
  if (!checked.ok) throw new GenerationError('INVALID_REQUEST', checked.reason);
  if (!isAspectRatio(request.aspectRatio)) {
    throw new GenerationError('INVALID_REQUEST', `Unsupported aspect ratio "${String(request.aspectRatio)}".`);
  }
  return Object.freeze({ rawPrompt: checked.prompt, aspectRatio: request.aspectRatio, enhance: request.enhance === true });
}

function failureFor(job: GenerationJob): GenerationError {
  if (job.state === 'TIMED_OUT') {
    return new GenerationError(
      'GENERATION_TIMEOUT',
      `Video generation did not finish in time (job ${job.jobId}). The remote job may still be running.`,
      { detail: job.error, jobId: job.jobId }
    );
  }
  return new GenerationError('GENERATION_FAILED', `Video generation failed: ${job.error ?? 'unknown error'}`, {
    detail: job.error,
    jobId: job.jobId,
  });
}

export function createGenerationOrchestrator(options: GenerationOrchestratorOptions): GenerationOrchestrator {
  const { enhancer, generator, store, lengthPolicy, filenamePrefix } = options;
  const now = options.now ?? (() => new Date());

  return {
    async generate(input, { signal } = {}) {
      const request = validateGenerationRequest(input, lengthPolicy);
      const label = hashShort(request.rawPrompt);
      const started = Date.now();

      const prompt: EnhancedPrompt = request.enhance
        ? await enhancer.enhance(request.rawPrompt, request.aspectRatio)
        : passThrough(request.rawPrompt, false);
      console.log(`[Generate:${label}] prompt ready`, { enhance: request.enhance, usedFallback: prompt.usedFallback });

      if (signal?.aborted) {
        throw new GenerationError('CANCELLED', 'Generation was cancelled before submission.', { cause: signal.reason });
      }

      let submitted: GenerationJob;
      try {
        submitted = await generator.submit(prompt.enhanced, request.aspectRatio);
      } catch (err) {
        const status = err instanceof SubmissionError ? err.status : undefined;
        console.error(`[Generate:${label}] submission failed`, { status, error: errorMessage(err) });
        throw new GenerationError('SUBMISSION_FAILED', `Could not start video generation: ${errorMessage(err)}`, {
          detail: errorMessage(err),
          cause: err,
        });
      }
      console.log(`[Generate:${label}] job submitted`, { jobId: submitted.jobId });

      let job: GenerationJob;
      try {
        job = await generator.awaitCompletion(submitted, { signal });
      } catch (err) {
        if (isGenerationError(err)) throw err;
        throw new GenerationError('GENERATION_FAILED', `Video generation failed: ${errorMessage(err)}`, {
          jobId: submitted.jobId,
          cause: err,
        });
      }
      console.log(`[Generate:${label}] job finished`, {
        jobId: job.jobId,
        state: job.state,
        polls: job.polls,
        ms: Date.now() - started,
      });

      if (job.state !== 'SUCCEEDED' || !job.resultRef) throw failureFor(job);

      const filename = buildArtifactFilename(filenamePrefix, now());
      try {
        const artifact = await store.persist(job.resultRef, filename);
        console.log(`[Generate:${label}] done`, { jobId: job.jobId, backend: artifact.backend, ms: Date.now() - started });
        return { prompt, job, artifact };
      } catch (err) {
        console.error(`[Generate:${label}] storage failed`, { jobId: job.jobId, error: errorMessage(err) });
        const message = err instanceof StorageError ? err.message : `Storage failed: ${errorMessage(err)}`;
        throw new GenerationError('STORAGE_FAILED', message, { detail: errorMessage(err), jobId: job.jobId, cause: err });
      }
    },

    listStoredArtifacts(folder, maxResults) {
      return store.list(folder, maxResults);
    },
  };
}
