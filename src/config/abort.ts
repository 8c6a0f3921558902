import { logger } from './logger.js';

export interface AbortOptions {
  deadlineMs?: number;
  signals?: NodeJS.Signals[];
}

export interface BootstrapAbort {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort readiness polling on process signals and, when set, once `deadlineMs` has passed.
 * `dispose` detaches the listeners and the deadline timer.
 */
export function createBootstrapAbort(options: AbortOptions = {}): BootstrapAbort {
  const { deadlineMs, signals = ['SIGTERM', 'SIGINT'] } = options;
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal, abandoning readiness polling');
    controller.abort();
  };
  for (const signal of signals) {
    process.once(signal, onSignal);
  }

  let timer: NodeJS.Timeout | undefined;
  if (deadlineMs !== undefined) {
    timer = setTimeout(() => {
      logger.warn({ deadlineMs }, 'Bootstrap deadline reached, abandoning readiness polling');
      controller.abort();
    }, deadlineMs);
    timer.unref();
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const signal of signals) {
        process.removeListener(signal, onSignal);
      }
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    },
  };
}
