import type { BootstrapResult, BootstrapStatus } from '../types/bootstrap.types.js';

export const ErrorCodes = {
  READINESS_TIMEOUT: 'READINESS_TIMEOUT',
  STATE_CHECK_AMBIGUOUS: 'STATE_CHECK_AMBIGUOUS',
  TOKEN_MISSING: 'TOKEN_MISSING',
  SETUP_REJECTED: 'SETUP_REJECTED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Result status reported for each error code
 */
export const statusForCode: Record<ErrorCode, BootstrapStatus> = {
  READINESS_TIMEOUT: 'failed-timeout',
  STATE_CHECK_AMBIGUOUS: 'failed-state-check',
  TOKEN_MISSING: 'failed-no-token',
  SETUP_REJECTED: 'failed-setup-rejected',
  TRANSPORT_ERROR: 'failed-transport',
};

export const ExitCodes: Record<BootstrapStatus, number> = {
  skipped: 0,
  succeeded: 0,
  'failed-timeout': 2,
  'failed-state-check': 3,
  'failed-no-token': 4,
  'failed-setup-rejected': 5,
  'failed-transport': 6,
};

export function exitCodeFor(result: Pick<BootstrapResult, 'status'>): number {
  return ExitCodes[result.status];
}

/**
 * Error raised by a bootstrap step. `details` keeps the upstream body, if any.
 */
export class BootstrapError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BootstrapError';
    Error.captureStackTrace(this, this.constructor);
  }
}
