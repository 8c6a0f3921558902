import type { TargetDescriptor } from '../types/bootstrap.types.js';

/**
 * Metabase publishes `{"status":"ok"}` on /api/health once its database
 * migrations are done, and the setup token on /api/session/properties until
 * the first admin exists.
 */
export function metabaseTarget(baseUrl: string, name = 'metabase'): TargetDescriptor {
  return {
    name,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    healthPath: '/api/health',
    propertiesPath: '/api/session/properties',
    setupPath: '/api/setup',
    healthyStatus: 'ok',
  };
}
