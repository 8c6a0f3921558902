/**
 * Bootstrap Service
 *
 * Drives one target service from "unknown readiness" to a definitive result:
 * wait for health, read whether an admin already exists, and if not, perform
 * the one-time setup with the token the target issued.
 *
 * An already configured target is never written to, so running the bootstrap
 * on every stack start is safe.
 */

import { createTargetLogger } from '../../config/logger.js';
import { SetupTargetClient } from '../integrations/setup-target.client.js';
import { describeBody, isSuccessStatus, type ServiceClientOptions, type ServiceResponse } from '../integrations/base-service.client.js';
import {
  formatIssues,
  sessionPropertiesSchema,
  setupResponseSchema,
  setupTokenSchema,
  type SessionProperties,
  type SetupPayload,
} from '../../validators/setup-api.validators.js';
import { BootstrapError, ErrorCodes, statusForCode } from '../../utils/error-codes.js';
import { pollUntil, systemClock, type Clock } from './poller.js';
import type {
  AdminIdentity,
  BootstrapOptions,
  BootstrapOutcome,
  BootstrapRequest,
  BootstrapResult,
  BootstrapStatus,
  ConfigurationState,
  PollOptions,
  ReadinessResult,
  SetupPreferences,
  TargetDescriptor,
} from '../../types/bootstrap.types.js';

export const DEFAULT_POLL_OPTIONS: PollOptions = {
  maxAttempts: 60,
  intervalMs: 5000,
};

export const DEFAULT_SETUP_PREFERENCES: SetupPreferences = {
  allowTracking: false,
};

export const TIMEOUT_DETAIL = 'target did not become healthy';
export const SKIPPED_DETAIL = 'already configured';

/**
 * HTTP surface of a target, as far as the bootstrap needs it
 */
export interface TargetClient {
  isHealthy(signal?: AbortSignal): Promise<boolean>;
  getSessionProperties(): Promise<ServiceResponse>;
  submitSetup(payload: SetupPayload): Promise<ServiceResponse>;
}

export interface BootstrapServiceDeps {
  createClient?: (target: TargetDescriptor) => TargetClient;
  clock?: Clock;
  clientOptions?: ServiceClientOptions;
}

export interface ConfigurationCheck {
  state: ConfigurationState;
  properties: SessionProperties;
}

export function buildSetupPayload(
  token: string,
  identity: AdminIdentity,
  prefs: SetupPreferences
): SetupPayload {
  return {
    token,
    user: {
      email: identity.email,
      password: identity.password,
      first_name: identity.firstName,
      last_name: identity.lastName,
      site_name: identity.siteName,
    },
    prefs: {
      site_name: identity.siteName,
      allow_tracking: prefs.allowTracking,
    },
  };
}

function outcomeFor(status: BootstrapStatus): BootstrapOutcome {
  if (status === 'skipped' || status === 'succeeded') {
    return status;
  }
  return 'failed';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BootstrapService {
  private readonly createClient: (target: TargetDescriptor) => TargetClient;
  private readonly clock: Clock;

  constructor(deps: BootstrapServiceDeps = {}) {
    const clientOptions = deps.clientOptions;
    this.createClient = deps.createClient ?? ((target) => new SetupTargetClient(target, clientOptions));
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Poll the health endpoint until it answers affirmatively.
   * Connection errors, non-2xx answers and failed probes only count as "not ready yet".
   */
  async waitUntilReady(target: TargetDescriptor, options: PollOptions): Promise<ReadinessResult> {
    const log = createTargetLogger(target.name);
    const client = this.createClient(target);

    const result = await pollUntil(
      async (attempt) => {
        let healthy: boolean;
        try {
          healthy = await client.isHealthy(options.signal);
        } catch (error) {
          log.debug({ attempt, message: errorMessage(error) }, 'Health probe failed');
          healthy = false;
        }
        if (!healthy) {
          log.info({ attempt, maxAttempts: options.maxAttempts }, 'Target not ready yet');
        }
        return healthy;
      },
      options,
      this.clock
    );

    if (result.satisfied) {
      log.info({ attempts: result.attempts }, 'Target is healthy');
      return { state: 'ready', attempts: result.attempts };
    }

    log.warn({ attempts: result.attempts, aborted: result.aborted }, 'Target did not become healthy');
    return { state: 'timed_out', attempts: result.attempts };
  }

  /**
   * Read the session properties and decide whether setup is still needed.
   * Anything other than an explicit boolean flag is an error, never `needs_setup`.
   */
  async checkConfigurationState(target: TargetDescriptor): Promise<ConfigurationCheck> {
    const client = this.createClient(target);

    let response: ServiceResponse;
    try {
      response = await client.getSessionProperties();
    } catch (error) {
      throw new BootstrapError(
        ErrorCodes.STATE_CHECK_AMBIGUOUS,
        `could not read session properties: ${errorMessage(error)}`
      );
    }

    if (!isSuccessStatus(response.status)) {
      throw new BootstrapError(
        ErrorCodes.STATE_CHECK_AMBIGUOUS,
        `session properties returned HTTP ${response.status}: ${describeBody(response.data)}`,
        response.data
      );
    }

    const parsed = sessionPropertiesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new BootstrapError(
        ErrorCodes.STATE_CHECK_AMBIGUOUS,
        `unrecognized session properties (${formatIssues(parsed.error)}): ${describeBody(response.data)}`,
        response.data
      );
    }

    return {
      state: parsed.data['has-user-setup'] ? 'already_configured' : 'needs_setup',
      properties: parsed.data,
    };
  }

  extractSetupToken(properties: unknown): string {
    const parsed = setupTokenSchema.safeParse(properties);
    if (!parsed.success) {
      throw new BootstrapError(
        ErrorCodes.TOKEN_MISSING,
        `setup token missing from session properties: ${describeBody(properties)}`,
        properties
      );
    }
    return parsed.data['setup-token'];
  }

  /**
   * One-shot setup call. Not retried: the token is single-use.
   * Resolves with the created identifier.
   */
  async submitSetup(
    target: TargetDescriptor,
    token: string,
    identity: AdminIdentity,
    prefs: SetupPreferences = DEFAULT_SETUP_PREFERENCES
  ): Promise<{ userId: string }> {
    const client = this.createClient(target);

    let response: ServiceResponse;
    try {
      response = await client.submitSetup(buildSetupPayload(token, identity, prefs));
    } catch (error) {
      throw new BootstrapError(ErrorCodes.TRANSPORT_ERROR, `setup request failed: ${errorMessage(error)}`);
    }

    const body = describeBody(response.data);
    if (!isSuccessStatus(response.status)) {
      throw new BootstrapError(
        ErrorCodes.SETUP_REJECTED,
        `setup rejected with HTTP ${response.status}: ${body}`,
        response.data
      );
    }

    const parsed = setupResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new BootstrapError(ErrorCodes.SETUP_REJECTED, `setup rejected: ${body}`, response.data);
    }

    return { userId: String(parsed.data.id) };
  }

  async bootstrap(
    target: TargetDescriptor,
    identity: AdminIdentity,
    options: BootstrapOptions = DEFAULT_POLL_OPTIONS
  ): Promise<BootstrapResult> {
    const log = createTargetLogger(target.name);
    const startedAt = this.clock.now();

    const finish = (
      status: BootstrapStatus,
      detail: string,
      attempts: number,
      userId?: string
    ): BootstrapResult => ({
      target: target.name,
      outcome: outcomeFor(status),
      status,
      detail,
      attempts,
      elapsedMs: this.clock.now() - startedAt,
      ...(userId !== undefined ? { userId } : {}),
    });

    log.info(
      { baseUrl: target.baseUrl, maxAttempts: options.maxAttempts, intervalMs: options.intervalMs },
      'Waiting for target to be ready'
    );

    let attempts = 0;
    try {
      const readiness = await this.waitUntilReady(target, options);
      attempts = readiness.attempts;
      if (readiness.state === 'timed_out') {
        throw new BootstrapError(ErrorCodes.READINESS_TIMEOUT, TIMEOUT_DETAIL);
      }

      const { state, properties } = await this.checkConfigurationState(target);
      if (state === 'already_configured') {
        log.info('Target already configured, skipping setup');
        return finish('skipped', SKIPPED_DETAIL, attempts);
      }

      const token = this.extractSetupToken(properties);

      log.info({ email: identity.email }, 'Running initial setup');
      const { userId } = await this.submitSetup(
        target,
        token,
        identity,
        options.prefs ?? DEFAULT_SETUP_PREFERENCES
      );

      log.info({ email: identity.email, userId }, 'Setup completed');
      return finish('succeeded', `setup completed, admin user: ${identity.email}`, attempts, userId);
    } catch (error) {
      if (error instanceof BootstrapError) {
        log.error({ code: error.code, details: error.details }, error.message);
        return finish(statusForCode[error.code], error.message, attempts);
      }
      throw error;
    }
  }

  /**
   * Bootstrap independent targets concurrently. Results keep the input order.
   */
  async bootstrapAll(requests: BootstrapRequest[]): Promise<BootstrapResult[]> {
    return Promise.all(
      requests.map((request) => this.bootstrap(request.target, request.identity, request.options))
    );
  }
}

export const bootstrapService = new BootstrapService();

export function bootstrap(
  target: TargetDescriptor,
  identity: AdminIdentity,
  options?: BootstrapOptions
): Promise<BootstrapResult> {
  return bootstrapService.bootstrap(target, identity, options);
}

export { metabaseTarget } from '../../config/targets.js';
export type { AdminIdentity, BootstrapOptions, BootstrapResult, TargetDescriptor } from '../../types/bootstrap.types.js';
