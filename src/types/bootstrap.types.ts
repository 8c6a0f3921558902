/**
 * Bootstrap Types
 * Inputs, intermediate states and results of a single bootstrap run
 */

/**
 * Identifies the service instance to bootstrap and where its endpoints live
 */
export interface TargetDescriptor {
  name: string;
  baseUrl: string;
  healthPath: string;
  propertiesPath: string;
  setupPath: string;
  healthyStatus: string; // affirmative value of the health body's `status`
}

/**
 * Admin account created by the setup call
 */
export interface AdminIdentity {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  siteName: string;
}

/**
 * Target-specific preference flags sent alongside the identity
 */
export interface SetupPreferences {
  allowTracking: boolean;
}

export type ReadinessState = 'ready' | 'not_ready' | 'timed_out';

export type ConfigurationState = 'already_configured' | 'needs_setup';

export type BootstrapOutcome = 'skipped' | 'succeeded' | 'failed';

export type BootstrapStatus =
  | 'skipped'
  | 'succeeded'
  | 'failed-timeout'
  | 'failed-state-check'
  | 'failed-no-token'
  | 'failed-setup-rejected'
  | 'failed-transport';

export interface ReadinessResult {
  state: Exclude<ReadinessState, 'not_ready'>;
  attempts: number;
}

export interface PollOptions {
  maxAttempts: number;
  intervalMs: number;
  signal?: AbortSignal;
}

export interface BootstrapOptions extends PollOptions {
  prefs?: SetupPreferences;
}

/**
 * Terminal, caller-visible artifact of one bootstrap run
 */
export interface BootstrapResult {
  target: string;
  outcome: BootstrapOutcome;
  status: BootstrapStatus;
  detail: string;
  attempts: number;
  elapsedMs: number;
  userId?: string;
}

export interface BootstrapRequest {
  target: TargetDescriptor;
  identity: AdminIdentity;
  options: BootstrapOptions;
}
