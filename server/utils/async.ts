import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function timeoutError(timeoutMs: number) {
  const err = new Error(`Timed out after ${timeoutMs}ms`);
  err.name = 'TimeoutError';
  return err;
}

/**
 * Races `task` against a timer. On timeout the task's signal is aborted and the
 * returned promise rejects with a TimeoutError, whether or not the task honours
 * the signal.
 */
export async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = timeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
