import { z } from 'zod';

import { initLogger, LOG_LEVELS } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .trim()
    .toLowerCase()
    .default(fallback)
    .refine((val: string) => val === 'true' || val === 'false', { message: 'Expected "true" or "false"' })
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  VOLLEY_LOG_COLOR: booleanFlag('false'),
  VOLLEY_LOG_CONSOLE: booleanFlag('false'),
  VOLLEY_LOG_LEVEL: z.string().trim().toLowerCase().default('info').pipe(z.enum(LOG_LEVELS)),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Configure the global logger from environment variables.
 * Console output stays off unless VOLLEY_LOG_CONSOLE=true.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  initLogger({
    level: config.VOLLEY_LOG_LEVEL,
    sinks: config.VOLLEY_LOG_CONSOLE ? [new ConsoleSink({ color: config.VOLLEY_LOG_COLOR })] : [],
  });
  return config;
}
