import { z } from 'zod';

import { LOG_LEVELS, initLogger } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = z
  .enum(['true', 'false'], { message: 'Expected "true" or "false"' })
  .default('false')
  .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  VALIDATABLE_LOG_LEVEL: z.enum(LOG_LEVELS, { message: 'Invalid log level' }).default('warn'),
  VALIDATABLE_LOG_CONSOLE: booleanFlag,
  VALIDATABLE_LOG_COLOR: booleanFlag,
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Parse logger settings from the environment.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }
  return result.data;
}

/**
 * Configure the global logger from environment variables.
 * Console output stays off unless VALIDATABLE_LOG_CONSOLE=true.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  initLogger({
    level: config.VALIDATABLE_LOG_LEVEL,
    sinks: config.VALIDATABLE_LOG_CONSOLE ? [new ConsoleSink({ color: config.VALIDATABLE_LOG_COLOR })] : [],
  });
  return config;
}
