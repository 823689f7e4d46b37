import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { GenerationError, StorageError, SubmissionError } from './errors';
import { createGenerationOrchestrator } from './generate';
import type { TextModel } from './promptEnhancer/gemini';
import { createEnhancementClient } from './promptEnhancer/runtime';
import { createArtifactStore, type ArtifactStore } from './storage';
import type { GenerationRequest, ListedArtifact } from './types';
import type { RemoteJobStatus, VideoJobApi } from './veo';
import { createGenerationClient } from './video';

const NOW = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
const RESULT_REF = 'https://example.test/files/op-1.mp4';

interface HarnessOptions {
  statuses?: RemoteJobStatus[];
  reply?: () => Promise<string>;
  createJob?: VideoJobApi['createJob'];
  store?: ArtifactStore;
  deadlineMs?: number;
  maxLength?: number;
  overflowPolicy?: 'reject' | 'truncate';
}

function harness(options: HarnessOptions = {}) {
  const calls: { text: string[]; created: string[]; polls: number; persisted: string[] } = {
    text: [],
    created: [],
    polls: 0,
    persisted: [],
  };
  const statuses: RemoteJobStatus[] = [...(options.statuses ?? [{ done: false }, { done: true, resultRef: RESULT_REF }])];

  const textModel: TextModel = {
    async generateText(prompt) {
      calls.text.push(prompt);
      return options.reply ? options.reply() : 'A curious cat points at floating paint swatches.';
    },
  };

  const api: VideoJobApi = {
    async createJob(args) {
      calls.created.push(args.prompt);
      return options.createJob ? options.createJob(args) : 'operations/op-1';
    },
    async getJobStatus() {
      calls.polls += 1;
      const status = statuses.length > 1 ? statuses.shift() : statuses[0];
      if (!status) throw new Error('no scripted status');
      return status;
    },
  };

  let t = 0;
  const generator = createGenerationClient({
    api,
    polling: { intervalMs: 5000, deadlineMs: options.deadlineMs ?? 600_000, maxConsecutiveErrors: 3 },
    sleep: async (ms) => {
      t += ms;
    },
    now: () => t,
  });

  const store: ArtifactStore = options.store ?? {
    cdnEnabled: false,
    async persist(resultRef, filename) {
      calls.persisted.push(resultRef);
      return { uri: `/videos/generated-videos/${filename}`, backend: 'LOCAL', bytesSize: 42, filename };
    },
    async list() {
      return [];
    },
  };

  const orchestrator = createGenerationOrchestrator({
    enhancer: createEnhancementClient({
      textModel,
      timeoutMs: 1000,
      enabled: true,
      lengthPolicy: { maxLength: 2000, overflowPolicy: 'reject' },
    }),
    generator,
    store,
    lengthPolicy: { maxLength: options.maxLength ?? 2000, overflowPolicy: options.overflowPolicy ?? 'reject' },
    filenamePrefix: 'video',
    now: () => NOW,
  });

  return { orchestrator, calls };
}

const request: GenerationRequest = { rawPrompt: 'A cat explains colors', aspectRatio: '16:9', enhance: true };

function expectKind(kind: GenerationError['kind']) {
  return (err: unknown) => {
    assert.ok(err instanceof GenerationError);
    assert.equal(err.kind, kind);
    return true;
  };
}

test('a successful run enhances, generates and stores the video', async (t) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-'));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  const store = createArtifactStore({
    cdn: null,
    openResult: async () => Readable.from([Buffer.from('mp4-bytes')]),
    folder: 'generated-videos',
    localDir: dir,
    uploadRetryDelayMs: 0,
    downloadTimeoutMs: 5000,
  });
  const { orchestrator, calls } = harness({ store });

  const result = await orchestrator.generate(request);

  assert.deepEqual(result.prompt, {
    original: 'A cat explains colors',
    enhanced: 'A curious cat points at floating paint swatches.',
    usedFallback: false,
  });
  assert.deepEqual(result.job, { jobId: 'operations/op-1', state: 'SUCCEEDED', resultRef: RESULT_REF, polls: 2 });
  assert.deepEqual(result.artifact, {
    uri: '/videos/generated-videos/video_20260102_030405.mp4',
    backend: 'LOCAL',
    bytesSize: 9,
    filename: 'video_20260102_030405.mp4',
  });
  assert.match(result.artifact.filename, /^video_\d{8}_\d{6}\.mp4$/);
  assert.deepEqual(calls.created, ['A curious cat points at floating paint swatches.']);
});

test('a job that fails on the first poll raises GENERATION_FAILED and stores nothing', async () => {
  const { orchestrator, calls } = harness({ statuses: [{ done: true, error: 'Video was filtered: unsafe' }] });

  await assert.rejects(orchestrator.generate(request), (err) => {
    expectKind('GENERATION_FAILED')(err);
    assert.ok(err instanceof GenerationError);
    assert.equal(err.message, 'Video generation failed: Video was filtered: unsafe');
    assert.equal(err.jobId, 'operations/op-1');
    return true;
  });
  assert.equal(calls.polls, 1);
  assert.deepEqual(calls.persisted, []);
});

test('an empty prompt is rejected before any remote call', async () => {
  const { orchestrator, calls } = harness();

  await assert.rejects(orchestrator.generate({ ...request, rawPrompt: '   ' }), (err) => {
    expectKind('INVALID_REQUEST')(err);
    assert.ok(err instanceof Error);
    assert.equal(err.message, 'Prompt must not be empty.');
    return true;
  });
  assert.deepEqual(calls, { text: [], created: [], polls: 0, persisted: [] });
});

test('enhance=false submits the raw prompt without calling the text model', async () => {
  const { orchestrator, calls } = harness();

  const result = await orchestrator.generate({ ...request, enhance: false });

  assert.deepEqual(result.prompt, {
    original: 'A cat explains colors',
    enhanced: 'A cat explains colors',
    usedFallback: false,
  });
  assert.deepEqual(calls.text, []);
  assert.deepEqual(calls.created, ['A cat explains colors']);
});

test('the prompt is submitted and reported exactly as the caller wrote it', async () => {
  const { orchestrator, calls } = harness();
  const raw = 'Title card:\tBIG  TEXT\r\n  then a cat explains colors';

  const result = await orchestrator.generate({ ...request, rawPrompt: raw, enhance: false });

  assert.equal(result.prompt.original, raw);
  assert.equal(result.prompt.enhanced, raw);
  assert.deepEqual(calls.created, [raw]);
});

test('the truncate policy shortens the prompt without rewriting it', async () => {
  const { orchestrator, calls } = harness({ maxLength: 12, overflowPolicy: 'truncate' });

  const result = await orchestrator.generate({ ...request, rawPrompt: 'Big  TEXT\tthen a cat', enhance: false });

  assert.equal(result.prompt.enhanced, 'Big  TEXT\tth');
  assert.deepEqual(calls.created, ['Big  TEXT\tth']);
});

test('an enhancement failure still generates from the raw prompt', async () => {
  const { orchestrator, calls } = harness({
    reply: async () => {
      throw new Error('quota');
    },
  });

  const result = await orchestrator.generate(request);

  assert.equal(result.prompt.usedFallback, true);
  assert.equal(result.prompt.enhanced, 'A cat explains colors');
  assert.deepEqual(calls.created, ['A cat explains colors']);
});

test('a rejected submission raises SUBMISSION_FAILED without polling', async () => {
  const { orchestrator, calls } = harness({
    createJob: async () => {
      throw new SubmissionError('Job creation failed (429): Quota exceeded', { status: 429 });
    },
  });

  await assert.rejects(orchestrator.generate(request), (err) => {
    expectKind('SUBMISSION_FAILED')(err);
    assert.ok(err instanceof Error);
    assert.equal(err.message, 'Could not start video generation: Job creation failed (429): Quota exceeded');
    return true;
  });
  assert.equal(calls.polls, 0);
});

test('a job still running at the deadline raises GENERATION_TIMEOUT with the job id', async () => {
  const { orchestrator, calls } = harness({ statuses: [{ done: false }], deadlineMs: 10_000 });

  await assert.rejects(orchestrator.generate(request), (err) => {
    expectKind('GENERATION_TIMEOUT')(err);
    assert.ok(err instanceof GenerationError);
    assert.equal(err.jobId, 'operations/op-1');
    assert.equal(err.detail, 'No result within 10000ms');
    return true;
  });
  assert.deepEqual(calls.persisted, []);
});

test('a storage failure raises STORAGE_FAILED', async () => {
  const store: ArtifactStore = {
    cdnEnabled: false,
    async persist() {
      throw new StorageError('Local write failed: EACCES');
    },
    async list() {
      return [];
    },
  };
  const { orchestrator } = harness({ store });

  await assert.rejects(orchestrator.generate(request), (err) => {
    expectKind('STORAGE_FAILED')(err);
    assert.ok(err instanceof GenerationError);
    assert.equal(err.message, 'Local write failed: EACCES');
    assert.equal(err.jobId, 'operations/op-1');
    return true;
  });
});

test('an aborted signal cancels before the job is submitted', async () => {
  const { orchestrator, calls } = harness();
  const controller = new AbortController();
  controller.abort(new Error('client gone'));

  await assert.rejects(orchestrator.generate(request, { signal: controller.signal }), expectKind('CANCELLED'));
  assert.deepEqual(calls.created, []);
});

test('listStoredArtifacts delegates to the store', async () => {
  const listed: ListedArtifact[] = [
    { uri: '/videos/a/b.mp4', backend: 'LOCAL', bytesSize: 1, filename: 'b.mp4', publicId: 'a/b' },
  ];
  const seen: Array<[string, number]> = [];
  const { orchestrator } = harness({
    store: {
      cdnEnabled: false,
      async persist() {
        throw new Error('unused');
      },
      async list(folder, max) {
        seen.push([folder, max]);
        return listed;
      },
    },
  });

  assert.deepEqual(await orchestrator.listStoredArtifacts('a', 3), listed);
  assert.deepEqual(seen, [['a', 3]]);
});
