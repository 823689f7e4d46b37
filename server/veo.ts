import { Readable } from 'node:stream';
import { ApiError, GenerateVideosOperation, GoogleGenAI } from '@google/genai';
import { SubmissionError, errorMessage } from './errors';
import type { AspectRatio } from './types';
import { withTimeout, type FetchLike } from './utils/async';

export interface RemoteJobStatus {
  done: boolean;
  error?: string;
  resultRef?: string;
}

export interface VideoJobApi {
  /** Returns the opaque job id assigned by the remote service. */
  createJob(args: { prompt: string; aspectRatio: AspectRatio }): Promise<string>;
  getJobStatus(jobId: string): Promise<RemoteJobStatus>;
}

export type OpenResult = (resultRef: string, signal: AbortSignal) => Promise<Readable>;

/** The fields of a long-running video operation this service reads. */
export interface VideoOperation {
  name?: string;
  done?: boolean;
  error?: Record<string, unknown>;
  response?: {
    generatedVideos?: Array<{ video?: { uri?: string } }>;
    raiMediaFilteredReasons?: string[];
  };
}

/** Start and refresh calls of the video operation API. */
export interface VideoOperations {
  start(args: { prompt: string; aspectRatio: AspectRatio; signal: AbortSignal }): Promise<VideoOperation>;
  refresh(jobId: string, signal: AbortSignal): Promise<VideoOperation>;
}

export function createGenAiVideoOperations(args: { apiKey: string; model: string; baseUrl?: string }): VideoOperations {
  const ai = new GoogleGenAI({
    apiKey: args.apiKey,
    httpOptions: args.baseUrl ? { baseUrl: args.baseUrl } : undefined,
  });

  return {
    start({ prompt, aspectRatio, signal }) {
      return ai.models.generateVideos({
        model: args.model,
        prompt,
        config: { numberOfVideos: 1, aspectRatio, abortSignal: signal },
      });
    },

    refresh(jobId, signal) {
      // Only the name is needed to look the operation up again.
      const operation = new GenerateVideosOperation();
      operation.name = jobId;
      return ai.operations.getVideosOperation({ operation, config: { abortSignal: signal } });
    },
  };
}

export function toRemoteJobStatus(operation: VideoOperation): RemoteJobStatus {
  if (!operation.done) return { done: false };

  if (operation.error) {
    const { message, code } = operation.error;
    const text = typeof message === 'string' && message ? message : 'Video generation failed';
    return { done: true, error: typeof code === 'number' ? `${text} (code ${code})` : text };
  }

  const uri = operation.response?.generatedVideos?.[0]?.video?.uri;
  if (uri) return { done: true, resultRef: uri };

  const filtered = operation.response?.raiMediaFilteredReasons?.filter(Boolean) ?? [];
  if (filtered.length) return { done: true, error: `Video was filtered: ${filtered.join('; ')}` };
  return { done: true, error: 'Operation finished without a generated video.' };
}

export interface VeoApiOptions {
  operations: VideoOperations;
  apiKey: string;
  /** Host that issued the result references; only it receives the API key. */
  apiBaseUrl: string;
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

export function createVeoApi(options: VeoApiOptions): VideoJobApi & { openResult: OpenResult } {
  const { operations, apiKey, requestTimeoutMs } = options;
  const apiHost = new URL(options.apiBaseUrl).host;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  return {
    async createJob({ prompt, aspectRatio }) {
      let operation: VideoOperation;
      try {
        operation = await withTimeout((signal) => operations.start({ prompt, aspectRatio, signal }), requestTimeoutMs);
      } catch (err) {
        const status = err instanceof ApiError ? err.status : undefined;
        const prefix = status !== undefined ? `Job creation failed (${status})` : 'Job creation failed';
        throw new SubmissionError(`${prefix}: ${errorMessage(err)}`, { status, cause: err });
      }

      const jobId = operation.name;
      if (!jobId || /\s/.test(jobId)) {
        throw new SubmissionError('Job creation returned a malformed job id.');
      }
      console.log('[Veo] job created', { jobId, aspectRatio });
      return jobId;
    },

    async getJobStatus(jobId) {
      const operation = await withTimeout((signal) => operations.refresh(jobId, signal), requestTimeoutMs);
      return toRemoteJobStatus(operation);
    },

    async openResult(resultRef, signal) {
      const target = new URL(resultRef);
      if (!['http:', 'https:'].includes(target.protocol)) {
        throw new Error('Only http/https result references are allowed.');
      }
      // The key only travels to the API host that issued the reference.
      const res = await fetchImpl(target.toString(), {
        headers: target.host === apiHost ? { 'x-goog-api-key': apiKey } : undefined,
        redirect: 'follow',
        signal,
      });
      if (!res.ok) throw new Error(`Video download failed (${res.status}).`);
      if (!res.body) throw new Error('Video download returned no body.');
      return Readable.fromWeb(res.body);
    },
  };
}
