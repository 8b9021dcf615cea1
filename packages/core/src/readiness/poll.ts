/**
 * Poll-with-timeout
 *
 * Checks immediately, then every interval. The last sleep is shortened so the
 * final check lands exactly on the deadline.
 *
 * Each check is raced against the time left and the abort signal: a read that
 * has not answered by the deadline counts as a failed read, and an abort
 * while a read is outstanding throws `CancellationError` straight away.
 */

import { TransportError } from '@seqctl/shared';
import { throwIfCancelled, type Clock } from './clock.js';

export interface PollOptions<T> {
  check: () => Promise<T>;
  /** Stop polling once this returns true for a check result */
  isDone: (result: T) => boolean;
  /** Called when `check` throws or does not answer in time; polling continues */
  onError?: (error: unknown) => void;
  timeoutMs: number;
  intervalMs: number;
  clock: Clock;
  signal?: AbortSignal;
}

export interface PollOutcome<T> {
  done: boolean;
  /** Result of the latest successful check, if any */
  last?: T;
  /** Error of the latest check when it threw */
  lastError?: unknown;
  attempts: number;
  elapsedMs: number;
}

// A check issued on the deadline still gets this long to answer
export const FINAL_READ_GRACE_MS = 1000;

const EXPIRED = Symbol('expired');

export async function pollUntil<T>(options: PollOptions<T>): Promise<PollOutcome<T>> {
  const { check, isDone, onError, timeoutMs, intervalMs, clock, signal } = options;
  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  let attempts = 0;
  let last: T | undefined;
  let lastError: unknown;

  for (;;) {
    throwIfCancelled(signal);
    attempts++;

    try {
      last = await readWithin(check, Math.max(deadline - clock.now(), FINAL_READ_GRACE_MS), clock, signal, onError);
      lastError = undefined;
      if (isDone(last)) {
        return { done: true, last, attempts, elapsedMs: clock.now() - startedAt };
      }
    } catch (error) {
      throwIfCancelled(signal);
      lastError = error;
      onError?.(error);
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return {
        done: false,
        ...(last !== undefined && { last }),
        ...(lastError !== undefined && { lastError }),
        attempts,
        elapsedMs: clock.now() - startedAt,
      };
    }

    await clock.sleep(Math.min(intervalMs, remaining), signal);
  }
}

/**
 * Run one read, giving up after `budgetMs` with a `TransportError`.
 * Throws `CancellationError` as soon as the signal aborts.
 */
export async function readWithin<T>(
  check: () => Promise<T>,
  budgetMs: number,
  clock: Clock,
  signal: AbortSignal | undefined,
  onError?: (error: unknown) => void
): Promise<T> {
  const timer = new AbortController();
  const stop = (): void => timer.abort();
  signal?.addEventListener('abort', stop, { once: true });

  let abandoned = false;
  const read = check();
  // An abandoned read that fails later is still reported
  read.catch((error: unknown) => {
    if (abandoned) {
      onError?.(error);
    }
  });

  try {
    const winner = await Promise.race([read, clock.sleep(budgetMs, timer.signal).then((): typeof EXPIRED => EXPIRED)]);
    if (winner === EXPIRED) {
      abandoned = true;
      throwIfCancelled(signal);
      throw new TransportError(`read did not answer within ${budgetMs}ms`);
    }
    return winner;
  } finally {
    timer.abort();
    signal?.removeEventListener('abort', stop);
  }
}
