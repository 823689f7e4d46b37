import { GenerationError, errorMessage, isAbortError } from './errors';
import type { AspectRatio, GenerationJob } from './types';
import { sleep as defaultSleep, type Sleep } from './utils/async';
import type { VideoJobApi } from './veo';

export interface PollingPolicy {
  intervalMs: number;
  deadlineMs: number;
  maxConsecutiveErrors: number;
}

export interface GenerationClient {
  /** One job-creation call; failures propagate and are never retried. */
  submit(prompt: string, aspectRatio: AspectRatio): Promise<GenerationJob>;
  /**
   * Polls until the job is terminal. Cancelling `signal` stops local polling
   * only; the remote job keeps running.
   */
  awaitCompletion(job: GenerationJob, options?: { signal?: AbortSignal }): Promise<GenerationJob>;
}

export interface GenerationClientOptions {
  api: VideoJobApi;
  polling: PollingPolicy;
  sleep?: Sleep;
  now?: () => number;
}

function cancelled(job: GenerationJob, cause?: unknown) {
  return new GenerationError('CANCELLED', 'Generation was cancelled before the job finished.', {
    jobId: job.jobId,
    cause,
  });
}

export function createGenerationClient(options: GenerationClientOptions): GenerationClient {
  const { api, polling } = options;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  return {
    async submit(prompt, aspectRatio) {
      const jobId = await api.createJob({ prompt, aspectRatio });
      return { jobId, state: 'SUBMITTED', polls: 0 };
    },

    async awaitCompletion(job, { signal } = {}) {
      const started = now();
      let current: GenerationJob = job;
      let consecutiveErrors = 0;

      for (;;) {
        if (signal?.aborted) throw cancelled(current, signal.reason);

        const polls = current.polls + 1;
        try {
          const status = await api.getJobStatus(current.jobId);
          consecutiveErrors = 0;
          if (status.done && status.resultRef && !status.error) {
            return { jobId: current.jobId, state: 'SUCCEEDED', resultRef: status.resultRef, polls };
          }
          if (status.done) {
            return { jobId: current.jobId, state: 'FAILED', error: status.error, polls };
          }
          if (current.state !== 'RUNNING') {
            console.log('[Veo] job running', { jobId: current.jobId, polls });
          }
          current = { jobId: current.jobId, state: 'RUNNING', polls };
        } catch (err) {
          consecutiveErrors += 1;
          console.warn('[Veo] status check failed', {
            jobId: current.jobId,
            attempt: consecutiveErrors,
            of: polling.maxConsecutiveErrors,
            error: errorMessage(err),
          });
          if (consecutiveErrors >= polling.maxConsecutiveErrors) {
            return {
              jobId: current.jobId,
              state: 'FAILED',
              error: `Status check failed ${consecutiveErrors} times in a row: ${errorMessage(err)}`,
              polls,
            };
          }
          current = { ...current, polls };
        }

        const elapsed = now() - started;
        if (elapsed >= polling.deadlineMs) {
          console.warn('[Veo] stopped watching job after deadline; remote job may still be running', {
            jobId: current.jobId,
            elapsedMs: elapsed,
            polls: current.polls,
          });
          return { jobId: current.jobId, state: 'TIMED_OUT', error: `No result within ${polling.deadlineMs}ms`, polls: current.polls };
        }

        try {
          await sleep(Math.min(polling.intervalMs, polling.deadlineMs - elapsed), signal);
        } catch (err) {
          if (signal?.aborted || isAbortError(err)) throw cancelled(current, err);
          throw err;
        }
      }
    },
  };
}
