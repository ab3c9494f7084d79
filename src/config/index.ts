/**
 * Dispatch configuration from environment variables.
 *
 * | Variable                         | Default          |
 * | -------------------------------- | ---------------- |
 * | `DISPATCH_ENV`                   | `development`    |
 * | `DISPATCH_LOG_LEVEL`             | per environment  |
 * | `DISPATCH_OVERRIDE_TIERS`        | none             |
 * | `DISPATCH_MAX_CONCURRENCY`       | `10`             |
 * | `DISPATCH_CACHE_ENABLED`         | `true`           |
 * | `DISPATCH_CACHE_COMPRESS`        | `true`           |
 * | `DISPATCH_CACHE_KEY_PREFIX`      | `resource_cache` |
 * | `DISPATCH_INVOCATION_TIMEOUT_MS` | none             |
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { LogLevel } from '../logging/index.js';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'].includes(value), {
    message: 'expected a boolean (true/false, 1/0, yes/no, on/off)',
  })
  .transform((value) => ['true', '1', 'yes', 'on'].includes(value));

const tierList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((tier) => tier.trim())
      .filter((tier) => tier.length > 0)
  )
  .refine((tiers) => new Set(tiers).size === tiers.length, { message: 'tiers must be unique' });

const positiveInteger = z.coerce.number().int().positive();

/**
 * Schema of the recognized variables, keyed by variable name.
 */
const envSchema = z.object({
  DISPATCH_ENV: z.string().trim().min(1).optional(),
  DISPATCH_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
  DISPATCH_OVERRIDE_TIERS: tierList.optional(),
  DISPATCH_MAX_CONCURRENCY: positiveInteger.optional(),
  DISPATCH_CACHE_ENABLED: booleanFlag.optional(),
  DISPATCH_CACHE_COMPRESS: booleanFlag.optional(),
  DISPATCH_CACHE_KEY_PREFIX: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_\-.]+$/, 'expected letters, digits, dots, dashes or underscores')
    .optional(),
  DISPATCH_INVOCATION_TIMEOUT_MS: positiveInteger.optional(),
});

export interface DispatchConfig {
  environment: string;
  logLevel: LogLevel | undefined;

  /** Override tier preference, highest priority first */
  overrideTiers: readonly string[];

  /** Default worker pool width for bulk dispatch */
  maxConcurrency: number;

  cacheEnabled: boolean;
  cacheCompress: boolean;
  cacheKeyPrefix: string;

  /** Default per-invocation timeout, none when undefined */
  invocationTimeoutMs: number | undefined;
}

export const DEFAULT_CONFIG: Readonly<DispatchConfig> = Object.freeze({
  environment: 'development',
  logLevel: undefined,
  overrideTiers: [],
  maxConcurrency: 10,
  cacheEnabled: true,
  cacheCompress: true,
  cacheKeyPrefix: 'resource_cache',
  invocationTimeoutMs: undefined,
});

/**
 * Parse the dispatch configuration.
 *
 * Empty variables are treated as unset.
 *
 * @throws ConfigError naming the first invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ DISPATCH_OVERRIDE_TIERS: 'cloud,enterprise' });
 * config.overrideTiers; // ['cloud', 'enterprise']
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DispatchConfig {
  const relevant: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      relevant[key] = value;
    }
  }

  const parsed = envSchema.safeParse(relevant);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.map(String).join('.') || 'environment';
    throw new ConfigError(variable, issue?.message ?? 'invalid value');
  }

  const values = parsed.data;
  return {
    environment: values.DISPATCH_ENV ?? env.NODE_ENV ?? DEFAULT_CONFIG.environment,
    logLevel: values.DISPATCH_LOG_LEVEL,
    overrideTiers: Object.freeze(values.DISPATCH_OVERRIDE_TIERS ?? []),
    maxConcurrency: values.DISPATCH_MAX_CONCURRENCY ?? DEFAULT_CONFIG.maxConcurrency,
    cacheEnabled: values.DISPATCH_CACHE_ENABLED ?? DEFAULT_CONFIG.cacheEnabled,
    cacheCompress: values.DISPATCH_CACHE_COMPRESS ?? DEFAULT_CONFIG.cacheCompress,
    cacheKeyPrefix: values.DISPATCH_CACHE_KEY_PREFIX ?? DEFAULT_CONFIG.cacheKeyPrefix,
    invocationTimeoutMs: values.DISPATCH_INVOCATION_TIMEOUT_MS,
  };
}
