import { z } from 'zod';

import { DEFAULT_POLL_INTERVAL_MS } from './executors/batch-executor.js';
import type { HttpClientConfig } from './types.js';

export const DEFAULT_USER_AGENT = 'volley/0.1.0';

export const httpEnvSchema = z.object({
  VOLLEY_DEFAULT_RETRIES: z.coerce.number().int().min(0, { message: 'Retries must be non-negative' }).default(0),
  VOLLEY_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive({ message: 'Poll interval must be positive' })
    .default(DEFAULT_POLL_INTERVAL_MS),
  VOLLEY_USER_AGENT: z.string().trim().min(1, { message: 'Invalid user agent' }).default(DEFAULT_USER_AGENT),
});

export type HttpEnvConfig = z.infer<typeof httpEnvSchema>;

export function loadHttpEnv(env: NodeJS.ProcessEnv = process.env): HttpEnvConfig {
  return httpEnvSchema.parse(env);
}

/**
 * Client configuration from environment variables. Explicit overrides win.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: HttpClientConfig = {}
): HttpClientConfig {
  const parsed = loadHttpEnv(env);

  return {
    defaultRetries: parsed.VOLLEY_DEFAULT_RETRIES,
    pollIntervalMs: parsed.VOLLEY_POLL_INTERVAL_MS,
    ...overrides,
    defaultHeaders: {
      'User-Agent': parsed.VOLLEY_USER_AGENT,
      ...overrides.defaultHeaders,
    },
  };
}
