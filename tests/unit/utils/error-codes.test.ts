import { describe, it, expect } from 'vitest';
import {
  BootstrapError,
  ErrorCodes,
  exitCodeFor,
  statusForCode,
} from '../../../src/utils/error-codes.js';
import type { BootstrapStatus } from '../../../src/types/bootstrap.types.js';

describe('BootstrapError', () => {
  it('should create BootstrapError with correct properties', () => {
    const error = new BootstrapError(ErrorCodes.SETUP_REJECTED, 'setup rejected: {}', { raw: true });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('BootstrapError');
    expect(error.code).toBe('SETUP_REJECTED');
    expect(error.message).toBe('setup rejected: {}');
    expect(error.details).toEqual({ raw: true });
  });

  it('should capture stack trace', () => {
    const error = new BootstrapError(ErrorCodes.TOKEN_MISSING, 'token missing');

    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('BootstrapError');
  });
});

describe('statusForCode', () => {
  it('should map every code to a failed status', () => {
    expect(statusForCode).toEqual({
      READINESS_TIMEOUT: 'failed-timeout',
      STATE_CHECK_AMBIGUOUS: 'failed-state-check',
      TOKEN_MISSING: 'failed-no-token',
      SETUP_REJECTED: 'failed-setup-rejected',
      TRANSPORT_ERROR: 'failed-transport',
    });
  });
});

describe('exitCodeFor', () => {
  it.each<[BootstrapStatus, number]>([
    ['skipped', 0],
    ['succeeded', 0],
    ['failed-timeout', 2],
    ['failed-state-check', 3],
    ['failed-no-token', 4],
    ['failed-setup-rejected', 5],
    ['failed-transport', 6],
  ])('should exit %s with %i', (status, code) => {
    expect(exitCodeFor({ status })).toBe(code);
  });
});
