/**
 * CLI configuration read from the environment.
 *
 * Environment variables:
 * - JSONPACK_LOG_LEVEL: error | warn | info | verbose | debug | silly | silent (default: warn)
 * - JSONPACK_OUTPUT_ENCODING: base64 | hex (default: base64)
 * - JSONPACK_INDENT: spaces per JSON indentation level, 0-8 (default: 2)
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  outputEncoding: z.enum(['base64', 'hex']).default('base64'),
  indent: z.coerce.number().int().min(0).max(8).default(2),
});

export type Config = z.infer<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof Config, string> = {
  logLevel: 'JSONPACK_LOG_LEVEL',
  outputEncoding: 'JSONPACK_OUTPUT_ENCODING',
  indent: 'JSONPACK_INDENT',
};

/** Invalid configuration value */
export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the configuration from environment variables.
 * Unset or empty variables take their defaults. Throws ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const names: Record<string, string> = ENV_KEYS;
    throw new ConfigError(
      parsed.error.issues.map(issue => {
        const field = String(issue.path[0]);
        return `${names[field] ?? field}: ${issue.message}`;
      })
    );
  }
  return parsed.data;
}
