import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { identityFromEnv, main, run } from '../../src/app.js';
import { logger } from '../../src/config/logger.js';
import type { BootstrapResult, BootstrapStatus } from '../../src/types/bootstrap.types.js';

function resultFor(status: BootstrapStatus, detail: string): BootstrapResult {
  return {
    target: 'metabase',
    outcome: status === 'skipped' || status === 'succeeded' ? status : 'failed',
    status,
    detail,
    attempts: 1,
    elapsedMs: 0,
  };
}

describe('app', () => {
  const bootstrap = vi.fn();
  const service = { bootstrap };

  beforeEach(() => {
    vi.clearAllMocks();
    bootstrap.mockResolvedValue(resultFor('skipped', 'already configured'));
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('identityFromEnv', () => {
    it('should read the admin identity from the environment', () => {
      expect(identityFromEnv()).toEqual({
        email: 'admin@example.test',
        password: 'test-password',
        firstName: 'Admin',
        lastName: 'User',
        siteName: 'Test Site',
      });
    });
  });

  describe('run', () => {
    it('should bootstrap the configured target with the environment poll budget', async () => {
      await run(service);

      expect(bootstrap).toHaveBeenCalledWith(
        expect.objectContaining({ name: 'metabase', baseUrl: 'http://metabase.test:3000' }),
        identityFromEnv(),
        {
          maxAttempts: 3,
          intervalMs: 10,
          signal: expect.any(AbortSignal),
          prefs: { allowTracking: false },
        }
      );
    });

    it.each([
      ['skipped', 0],
      ['succeeded', 0],
      ['failed-timeout', 2],
      ['failed-state-check', 3],
      ['failed-no-token', 4],
      ['failed-setup-rejected', 5],
      ['failed-transport', 6],
    ] as const)('should return the exit code for %s', async (status, code) => {
      bootstrap.mockResolvedValue(resultFor(status, 'detail'));

      await expect(run(service)).resolves.toBe(code);
    });

    it('should log a failure at error level', async () => {
      bootstrap.mockResolvedValue(resultFor('failed-timeout', 'target did not become healthy'));

      await run(service);

      expect(logger.error).toHaveBeenCalledWith(
        { target: 'metabase', status: 'failed-timeout', attempts: 1, elapsedMs: 0 },
        'target did not become healthy'
      );
    });

    it('should release the signal listeners after the run', async () => {
      const sigterm = process.listenerCount('SIGTERM');

      await run(service);

      expect(process.listenerCount('SIGTERM')).toBe(sigterm);
    });

    it('should release the signal listeners when bootstrap throws', async () => {
      const sigterm = process.listenerCount('SIGTERM');
      bootstrap.mockRejectedValue(new RangeError('intervalMs must be > 0, got 0'));

      await expect(run(service)).rejects.toThrow('intervalMs must be > 0, got 0');
      expect(process.listenerCount('SIGTERM')).toBe(sigterm);
    });
  });

  describe('main', () => {
    it('should set the process exit code from the result', async () => {
      bootstrap.mockResolvedValue(resultFor('failed-no-token', 'setup token missing from session properties: {}'));

      await main(service);

      expect(process.exitCode).toBe(4);
    });

    it('should leave a zero exit code on success', async () => {
      await main(service);

      expect(process.exitCode).toBe(0);
    });
  });
});
