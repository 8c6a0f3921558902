import { z } from 'zod';

/**
 * Health endpoint body, e.g. `{"status":"ok"}`
 */
export const healthResponseSchema = z.object({
  status: z.string(),
});

/**
 * Session properties as published before and after setup.
 * Only the two fields the bootstrap depends on are declared; the rest pass through.
 */
export const sessionPropertiesSchema = z
  .object({
    'has-user-setup': z.boolean(),
    'setup-token': z.string().nullish(),
  })
  .passthrough();

/**
 * Token field alone; absent, null and empty are all "missing"
 */
export const setupTokenSchema = z.object({
  'setup-token': z.string().min(1),
});

/**
 * Setup endpoint answer. Metabase returns the new session id under `id`.
 */
export const setupResponseSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]),
  })
  .passthrough();

export type SessionProperties = z.infer<typeof sessionPropertiesSchema>;

/**
 * Body of the setup POST
 */
export interface SetupPayload {
  token: string;
  user: {
    email: string;
    password: string;
    first_name: string;
    last_name: string;
    site_name: string;
  };
  prefs: {
    site_name: string;
    allow_tracking: boolean;
  };
}

/**
 * Flatten zod issues to a single line for result details
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
    .join('; ');
}
