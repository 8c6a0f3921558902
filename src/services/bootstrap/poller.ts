import { setTimeout as delay } from 'timers/promises';
import type { PollOptions } from '../../types/bootstrap.types.js';

/**
 * Time source used by the poller. Tests substitute a fake one.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};

export interface PollResult {
  satisfied: boolean;
  attempts: number;
  aborted: boolean;
}

export function assertPollOptions(options: PollOptions): void {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${options.maxAttempts}`);
  }
  if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
    throw new RangeError(`intervalMs must be > 0, got ${options.intervalMs}`);
  }
}

/**
 * Run `probe` until it returns true or `maxAttempts` probes have failed.
 * Sleeps `intervalMs` between probes, never after the last one.
 */
export async function pollUntil(
  probe: (attempt: number) => Promise<boolean>,
  options: PollOptions,
  clock: Clock = systemClock
): Promise<PollResult> {
  assertPollOptions(options);

  const { maxAttempts, intervalMs, signal } = options;
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (signal?.aborted) {
      return { satisfied: false, attempts, aborted: true };
    }

    attempts += 1;
    if (await probe(attempts)) {
      return { satisfied: true, attempts, aborted: false };
    }

    if (attempts < maxAttempts) {
      try {
        await clock.sleep(intervalMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          return { satisfied: false, attempts, aborted: true };
        }
        throw error;
      }
    }
  }

  return { satisfied: false, attempts, aborted: false };
}
