import type { Clock } from '../../src/services/bootstrap/poller.js';

/**
 * Clock that advances only when slept on
 */
export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('The operation was aborted');
    }
    this.sleeps.push(ms);
    this.current += ms;
  }
}
