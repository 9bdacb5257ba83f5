/**
 * Configuration Module
 *
 * Loads and validates environment variables for the dedupe tool.
 * Uses Zod for runtime validation with sensible defaults; CLI flags
 * override these values per run.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { PrefixLengthSchema, ThresholdSchema } from '../schemas/params.js';

/** Threshold used when FUZZY_DEDUPE_THRESHOLD is unset */
export const DEFAULT_THRESHOLD = 0.9;

/** Prefix length used when FUZZY_DEDUPE_PREFIX_LENGTH is unset */
export const DEFAULT_PREFIX_LENGTH = 3;

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Engine defaults
  FUZZY_DEDUPE_THRESHOLD: z.coerce.number().pipe(ThresholdSchema).default(DEFAULT_THRESHOLD),
  FUZZY_DEDUPE_PREFIX_LENGTH: z.coerce.number().pipe(PrefixLengthSchema).default(DEFAULT_PREFIX_LENGTH),
  FUZZY_DEDUPE_PROGRESS_INTERVAL: z.coerce.number().int().positive().default(100),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Environment variables failed validation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function buildConfig(env: Env) {
  return Object.freeze({
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Engine defaults
    defaults: Object.freeze({
      threshold: env.FUZZY_DEDUPE_THRESHOLD,
      prefixLength: env.FUZZY_DEDUPE_PREFIX_LENGTH,
      progressInterval: env.FUZZY_DEDUPE_PROGRESS_INTERVAL,
    }),
  });
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Parse configuration from an environment map.
 *
 * Empty variables count as unset.
 *
 * @param source - Environment to read (defaults to process.env)
 * @throws {ConfigurationError} When a variable is present but invalid
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const parseResult = envSchema.safeParse(present);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment variables: ${issues.join(', ')}`, issues);
  }

  return buildConfig(parseResult.data);
}

let cachedConfig: Config | null = null;

/**
 * Get or load the application configuration from process.env.
 *
 * Loaded on first use so that an invalid variable surfaces inside the
 * command that needs it.
 *
 * @throws {ConfigurationError} When a variable is present but invalid
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (useful for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
