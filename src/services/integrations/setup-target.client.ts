import { BaseServiceClient, isSuccessStatus, type ServiceClientOptions, type ServiceResponse } from './base-service.client.js';
import { logger } from '../../config/logger.js';
import { healthResponseSchema, type SetupPayload } from '../../validators/setup-api.validators.js';
import type { TargetDescriptor } from '../../types/bootstrap.types.js';

/**
 * Setup Target Client
 * Talks to the health, session properties and setup endpoints of a target service
 */
export class SetupTargetClient extends BaseServiceClient {
  private readonly target: TargetDescriptor;

  constructor(target: TargetDescriptor, options?: ServiceClientOptions) {
    super(target.baseUrl, target.name, options);
    this.target = target;
  }

  /**
   * Single health probe. Any failure to get an affirmative answer is `false`.
   * Aborting `signal` cancels the request in flight.
   */
  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.get(this.target.healthPath, { signal });
      return isSuccessStatus(response.status) && this.isAffirmative(response.data);
    } catch (error) {
      logger.debug(
        { service: this.serviceName, message: error instanceof Error ? error.message : String(error) },
        'Health probe failed'
      );
      return false;
    }
  }

  async getSessionProperties(): Promise<ServiceResponse> {
    return this.get(this.target.propertiesPath);
  }

  async submitSetup(payload: SetupPayload): Promise<ServiceResponse> {
    return this.post(this.target.setupPath, payload);
  }

  private isAffirmative(body: unknown): boolean {
    if (typeof body === 'string') {
      return body.trim() === this.target.healthyStatus;
    }
    const parsed = healthResponseSchema.safeParse(body);
    return parsed.success && parsed.data.status === this.target.healthyStatus;
  }
}
