// CHANGE: Supervised task runner with per-attempt timeout, exponential backoff and cooperative abort.
// WHY: Every crawl task and startup feed fetch shares one retry envelope.

import { RetryExhaustedError, TaskAbortedError, TaskTimeoutError, describeError } from "../errors.js";
import { warn } from "../logger.js";

/**
 * Retry envelope of a supervised task.
 *
 * @property timeoutMs - Limit of one attempt.
 * @property retries - Attempts after the first one.
 * @property baseDelayMs - Delay before the first retry, doubled for each further retry.
 */
export interface SupervisePolicy {
  readonly timeoutMs: number;
  readonly retries: number;
  readonly baseDelayMs: number;
}

export type SupervisedWork<T> = (signal: AbortSignal) => Promise<T>;

function sleep(delayMs: number, label: string, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TaskAbortedError(label));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TaskAbortedError(label));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

async function runAttempt<T>(
  label: string,
  work: SupervisedWork<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeoutError = new TaskTimeoutError(label, timeoutMs);
      controller.abort(timeoutError);
      reject(timeoutError);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Run a unit of work until it succeeds or the retry envelope is exhausted.
 *
 * A timed-out attempt counts as an ordinary failure. An abort of `signal` stops the task
 * at once without further attempts.
 *
 * @param label - Name used in logs and errors.
 * @param work - Receives a signal that fires on timeout or abort of the attempt.
 * @param policy - Timeout and backoff settings.
 * @param signal - Cancels the whole task.
 * @throws RetryExhaustedError after the last failed attempt.
 * @throws TaskAbortedError when `signal` fires.
 */
export async function supervise<T>(
  label: string,
  work: SupervisedWork<T>,
  policy: SupervisePolicy,
  signal?: AbortSignal
): Promise<T> {
  const attempts = policy.retries + 1;
  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (signal?.aborted) {
      throw new TaskAbortedError(label);
    }
    try {
      return await runAttempt(label, work, policy.timeoutMs, signal);
    } catch (cause) {
      if (signal?.aborted) {
        throw new TaskAbortedError(label);
      }
      lastError = cause;
      if (attempt + 1 >= attempts) {
        break;
      }
      const backoff = policy.baseDelayMs * 2 ** attempt;
      warn(`${label} failed: ${describeError(cause)}. Retry ${attempt + 1}/${policy.retries} after ${backoff}ms.`);
      await sleep(backoff, label, signal);
    }
  }
  throw new RetryExhaustedError(label, attempts, lastError);
}
