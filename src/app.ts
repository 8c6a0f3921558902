import { env } from './config/environment.js';
import { logger } from './config/logger.js';
import { metabaseTarget } from './config/targets.js';
import { createBootstrapAbort } from './config/abort.js';
import { BootstrapService } from './services/bootstrap/bootstrap.service.js';
import { exitCodeFor } from './utils/error-codes.js';
import type { AdminIdentity, BootstrapResult } from './types/bootstrap.types.js';

/**
 * Admin identity from the environment, defaults already applied by the schema
 */
export function identityFromEnv(): AdminIdentity {
  return {
    email: env.MB_ADMIN_EMAIL,
    password: env.MB_ADMIN_PASSWORD,
    firstName: env.MB_ADMIN_FIRST_NAME,
    lastName: env.MB_ADMIN_LAST_NAME,
    siteName: env.MB_SITE_NAME,
  };
}

function report(result: BootstrapResult): void {
  const context = {
    target: result.target,
    status: result.status,
    attempts: result.attempts,
    elapsedMs: result.elapsedMs,
  };

  if (result.outcome === 'failed') {
    logger.error(context, result.detail);
  } else {
    logger.info(context, result.detail);
  }
}

/**
 * Bootstrap the configured target once and return the process exit code
 */
export async function run(
  service: Pick<BootstrapService, 'bootstrap'> = new BootstrapService({
    clientOptions: { timeoutMs: env.BOOTSTRAP_REQUEST_TIMEOUT_MS },
  })
): Promise<number> {
  const target = metabaseTarget(env.METABASE_URL);

  logger.info(
    {
      target: target.name,
      baseUrl: target.baseUrl,
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
    'Starting service bootstrap...'
  );

  const abort = createBootstrapAbort({ deadlineMs: env.BOOTSTRAP_DEADLINE_MS });
  try {
    const result = await service.bootstrap(target, identityFromEnv(), {
      maxAttempts: env.BOOTSTRAP_MAX_ATTEMPTS,
      intervalMs: env.BOOTSTRAP_INTERVAL_MS,
      signal: abort.signal,
      prefs: { allowTracking: env.MB_ALLOW_TRACKING },
    });

    report(result);
    return exitCodeFor(result);
  } finally {
    abort.dispose();
  }
}

export async function main(service?: Pick<BootstrapService, 'bootstrap'>): Promise<void> {
  process.exitCode = await run(service);
}
