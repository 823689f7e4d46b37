import test from 'node:test';
import assert from 'node:assert/strict';
import { GenerationError } from './errors';
import type { Sleep } from './utils/async';
import type { RemoteJobStatus, VideoJobApi } from './veo';
import { createGenerationClient, type PollingPolicy } from './video';

type Step = RemoteJobStatus | Error;

function scriptedApi(steps: Step[], repeatLast = false) {
  const calls: string[] = [];
  const api: VideoJobApi = {
    async createJob() {
      return 'operations/job-1';
    },
    async getJobStatus(jobId) {
      calls.push(jobId);
      const step = steps.length > 1 || !repeatLast ? steps.shift() : steps[0];
      if (!step) throw new Error('script exhausted');
      if (step instanceof Error) throw step;
      return step;
    },
  };
  return { api, calls };
}

function fakeClock() {
  let t = 0;
  const slept: number[] = [];
  const sleep: Sleep = async (ms) => {
    slept.push(ms);
    t += ms;
  };
  return { now: () => t, sleep, slept };
}

const policy: PollingPolicy = { intervalMs: 5000, deadlineMs: 600_000, maxConsecutiveErrors: 3 };
const submitted = { jobId: 'operations/job-1', state: 'SUBMITTED', polls: 0 } as const;
const running: RemoteJobStatus = { done: false };
const finished: RemoteJobStatus = { done: true, resultRef: 'https://example.test/v.mp4' };

test('submit returns a SUBMITTED job with the remote id', async () => {
  const { api } = scriptedApi([]);
  const client = createGenerationClient({ api, polling: policy });
  assert.deepEqual(await client.submit('a boat', '16:9'), submitted);
});

test('submit propagates creation failures without retrying', async () => {
  let attempts = 0;
  const api: VideoJobApi = {
    async createJob() {
      attempts += 1;
      throw new Error('quota');
    },
    async getJobStatus() {
      return running;
    },
  };
  const client = createGenerationClient({ api, polling: policy });
  await assert.rejects(client.submit('a boat', '16:9'), /quota/);
  assert.equal(attempts, 1);
});

test('polls at a constant interval until the job succeeds', async () => {
  const { api, calls } = scriptedApi([running, running, finished]);
  const clock = fakeClock();
  const client = createGenerationClient({ api, polling: policy, sleep: clock.sleep, now: clock.now });

  const job = await client.awaitCompletion(submitted);

  assert.deepEqual(job, {
    jobId: 'operations/job-1',
    state: 'SUCCEEDED',
    resultRef: 'https://example.test/v.mp4',
    polls: 3,
  });
  assert.equal(calls.length, 3);
  assert.deepEqual(clock.slept, [5000, 5000]);
  assert.ok(clock.now() >= 2 * policy.intervalMs);
});

test('stops watching at the deadline and reports TIMED_OUT', async () => {
  const { api } = scriptedApi([running], true);
  const clock = fakeClock();
  const client = createGenerationClient({
    api,
    polling: { ...policy, deadlineMs: 12_000 },
    sleep: clock.sleep,
    now: clock.now,
  });

  const job = await client.awaitCompletion(submitted);

  assert.equal(job.state, 'TIMED_OUT');
  assert.equal(job.polls, 4);
  assert.equal(job.error, 'No result within 12000ms');
  assert.equal(job.resultRef, undefined);
  assert.deepEqual(clock.slept, [5000, 5000, 2000]);
  assert.ok(clock.now() >= 12_000);
});

test('a job that finishes with an error is FAILED with the remote reason', async () => {
  const { api } = scriptedApi([running, { done: true, error: 'Video was filtered: unsafe content' }]);
  const clock = fakeClock();
  const client = createGenerationClient({ api, polling: policy, sleep: clock.sleep, now: clock.now });

  const job = await client.awaitCompletion(submitted);

  assert.deepEqual(job, {
    jobId: 'operations/job-1',
    state: 'FAILED',
    error: 'Video was filtered: unsafe content',
    polls: 2,
  });
});

test('consecutive status errors up to the limit fail the job', async () => {
  const { api, calls } = scriptedApi([new Error('boom'), new Error('boom'), new Error('boom'), finished]);
  const clock = fakeClock();
  const client = createGenerationClient({ api, polling: policy, sleep: clock.sleep, now: clock.now });

  const job = await client.awaitCompletion(submitted);

  assert.equal(job.state, 'FAILED');
  assert.equal(job.error, 'Status check failed 3 times in a row: boom');
  assert.equal(job.polls, 3);
  assert.equal(calls.length, 3);
});

test('a successful status check resets the error count', async () => {
  const { api } = scriptedApi([
    new Error('flaky'),
    new Error('flaky'),
    running,
    new Error('flaky'),
    new Error('flaky'),
    finished,
  ]);
  const clock = fakeClock();
  const client = createGenerationClient({ api, polling: policy, sleep: clock.sleep, now: clock.now });

  const job = await client.awaitCompletion(submitted);

  assert.equal(job.state, 'SUCCEEDED');
  assert.equal(job.polls, 6);
});

test('an already aborted signal cancels before any status check', async () => {
  const { api, calls } = scriptedApi([finished]);
  const controller = new AbortController();
  controller.abort(new Error('client gone'));
  const client = createGenerationClient({ api, polling: policy });

  await assert.rejects(client.awaitCompletion(submitted, { signal: controller.signal }), (err) => {
    assert.ok(err instanceof GenerationError);
    assert.equal(err.kind, 'CANCELLED');
    assert.equal(err.jobId, 'operations/job-1');
    return true;
  });
  assert.equal(calls.length, 0);
});

test('aborting while waiting between polls cancels the wait', async () => {
  const { api, calls } = scriptedApi([running], true);
  const controller = new AbortController();
  const sleep: Sleep = async (_ms, signal) => {
    controller.abort(new Error('shutdown'));
    if (signal?.aborted) throw signal.reason;
  };
  const client = createGenerationClient({ api, polling: policy, sleep });

  await assert.rejects(client.awaitCompletion(submitted, { signal: controller.signal }), (err) => {
    assert.ok(err instanceof GenerationError);
    assert.equal(err.kind, 'CANCELLED');
    return true;
  });
  assert.equal(calls.length, 1);
});
