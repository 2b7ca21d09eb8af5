import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

const envSchema = z.object({
  JAVADOC_PATH: z.string().min(1).default('javadocs'),
  JAVADOC_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Config {
  /** Directory containing the Javadoc ZIP archives */
  javadocPath: string;
  logLevel: LogLevel;
}

/**
 * Build the configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`);
  }

  return {
    javadocPath: path.resolve(cwd, result.data.JAVADOC_PATH),
    logLevel: result.data.JAVADOC_LOG_LEVEL,
  };
}
