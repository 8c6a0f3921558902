import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosError } from 'axios';
import http from 'http';
import https from 'https';
import { logger } from '../../config/logger.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 9000;

export interface ServiceClientOptions {
  timeoutMs?: number;
}

/**
 * Status and body of an answered request, whatever the status code
 */
export interface ServiceResponse<T = unknown> {
  status: number;
  data: T;
}

/**
 * Base HTTP client for the services being bootstrapped
 * Provides common configuration and error logging
 */
export class BaseServiceClient {
  protected client: AxiosInstance;
  protected serviceName: string;

  constructor(baseURL: string, serviceName: string, options: ServiceClientOptions = {}) {
    this.serviceName = serviceName;

    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      // One connection per request, nothing pooled between poll attempts
      httpAgent: new http.Agent({ keepAlive: false }),
      httpsAgent: new https.Agent({ keepAlive: false }),
    });

    this.client.interceptors.request.use(
      (config) => {
        logger.debug(
          {
            service: this.serviceName,
            method: config.method,
            url: config.url,
          },
          'External API request'
        );
        return config;
      },
      (error) => {
        logger.error({ service: this.serviceName, error }, 'Request interceptor error');
        return Promise.reject(error);
      }
    );

    this.client.interceptors.response.use(
      (response) => {
        logger.debug(
          {
            service: this.serviceName,
            status: response.status,
            url: response.config.url,
          },
          'External API response'
        );
        return response;
      },
      (error: AxiosError) => {
        this.handleError(error);
        return Promise.reject(error);
      }
    );
  }

  /**
   * Log transport failures. Requests accept every status code, so an error
   * reaching here means no answer was received at all.
   */
  private handleError(error: AxiosError): void {
    if (error.request) {
      // Expected while the target is still starting
      logger.debug(
        {
          service: this.serviceName,
          message: error.message,
          url: error.config?.url,
        },
        'External API no response'
      );
    } else {
      logger.error(
        {
          service: this.serviceName,
          message: error.message,
        },
        'External API request setup error'
      );
    }
  }

  /**
   * Make GET request, resolving for any HTTP status
   */
  protected async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<ServiceResponse<T>> {
    const response = await this.client.get<T>(url, { ...config, validateStatus: () => true });
    return { status: response.status, data: response.data };
  }

  /**
   * Make POST request, resolving for any HTTP status
   */
  protected async post<T = unknown>(
    url: string,
    data?: unknown,
    config?: AxiosRequestConfig
  ): Promise<ServiceResponse<T>> {
    const response = await this.client.post<T>(url, data, { ...config, validateStatus: () => true });
    return { status: response.status, data: response.data };
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Render a response body for result details and logs
 */
export function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined) {
    return '';
  }
  return JSON.stringify(data);
}
