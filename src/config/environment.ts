/**
 * Environment Configuration and Validation
 *
 * Validates all environment variables using Zod schema and provides
 * type-safe access to configuration values throughout the application.
 *
 * Every variable has a default, so a bare `service-bootstrap` run targets
 * `http://metabase:3000` with the stack's stock admin identity.
 *
 * @module config/environment
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load the project-level .env first, then whatever sits in the working directory
dotenv.config({ path: path.resolve(__dirname, '../../.env') });
dotenv.config();

const positiveInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().min(1)).default(fallback);

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .transform((val) => val === 'true')
    .default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Target
  METABASE_URL: z.string().url('METABASE_URL must be a valid URL').default('http://metabase:3000'),

  // Admin identity
  MB_ADMIN_EMAIL: z.string().min(1).default('admin@localhost'),
  MB_ADMIN_PASSWORD: z.string().min(1).default('ecosystem'),
  MB_ADMIN_FIRST_NAME: z.string().min(1).default('Admin'),
  MB_ADMIN_LAST_NAME: z.string().min(1).default('User'),
  MB_SITE_NAME: z.string().min(1).default('Analytical Ecosystem'),
  MB_ALLOW_TRACKING: booleanFlag('false'),

  // Polling
  BOOTSTRAP_MAX_ATTEMPTS: positiveInt('60'),
  BOOTSTRAP_INTERVAL_MS: positiveInt('5000'),
  BOOTSTRAP_REQUEST_TIMEOUT_MS: positiveInt('9000'),
  BOOTSTRAP_DEADLINE_MS: z.string().transform(Number).pipe(z.number().int().min(1)).optional(),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_PRETTY: booleanFlag('true'),
});

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidVars = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      console.error('Environment validation failed:');
      invalidVars.forEach((msg) => console.error(`  - ${msg}`));
      console.error('\nCheck your .env file or the variables passed to the container.');
      process.exit(1);
    }
    throw error;
  }
}

export const env = validateEnv();

export type Environment = z.infer<typeof envSchema>;
