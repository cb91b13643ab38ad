/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for Vocab Drill. Values come from
 * environment variables plus the `--test` command-line flag, and are fixed
 * for the lifetime of the process.
 *
 * The `--test` flag (or VOCAB_TEST_MODE=1) switches the whole run to
 * accelerated time: every scheduling duration is divided by 1000, so a
 * one-day interval resolves in 86.4 seconds. Test mode also uses a separate
 * database file so accelerated schedules never mix with real ones.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig(process.env, process.argv.slice(2));
 *   const clock = new SystemClock(config.scheduler.accelerationFactor);
 *   const db = createDatabase(config.database.path);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  app: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    testMode: z.boolean().default(false),
  }),

  scheduler: z.object({
    // 1 in normal mode, 1000 in test mode
    accelerationFactor: z.number().positive().finite().default(1),
    efOrdering: z.enum(['before-update', 'after-update']).default('before-update'),
  }),

  database: z.object({
    path: z.string().min(1).default('vocab.db'),
  }),

  dictionary: z.object({
    enabled: z.boolean().default(true),
    apiUrl: z.string().url().default('https://api.dictionaryapi.dev/api/v2/entries/en'),
    translationUrl: z.string().url().default('https://api.mymemory.translated.net/get'),
    languagePair: z.string().default('en|zh-TW'),
    timeoutMs: z.number().int().positive().default(10000),
  }),

  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
  }),
});

export type Config = z.infer<typeof configSchema>;

/** Acceleration factor applied by test mode unless VOCAB_TIME_SCALE overrides it. */
export const DEFAULT_TEST_TIME_SCALE = 1000;

// =============================================================================
// Environment Variable Loading
// =============================================================================

type Environment = Record<string, string | undefined>;

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNumberOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Interprets '1', 'true', 'yes' and 'on' as true, '0', 'false', 'no' and
 * 'off' as false. Anything else is treated as unset.
 */
function parseBooleanOrUndefined(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Build the raw config object from environment variables and argv.
 */
function loadFromEnvironment(env: Environment, argv: readonly string[]) {
  const testMode = argv.includes('--test') || (parseBooleanOrUndefined(env.VOCAB_TEST_MODE) ?? false);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      testMode,
    },
    scheduler: {
      accelerationFactor: testMode
        ? parseNumberOrUndefined(env.VOCAB_TIME_SCALE) ?? DEFAULT_TEST_TIME_SCALE
        : 1,
      efOrdering: env.SM2_EF_ORDERING,
    },
    database: {
      path: env.DATABASE_PATH ?? (testMode ? 'vocab_test.db' : 'vocab.db'),
    },
    dictionary: {
      enabled: parseBooleanOrUndefined(env.LOOKUP_ENABLED),
      apiUrl: env.DICTIONARY_API_URL,
      translationUrl: env.TRANSLATION_API_URL,
      languagePair: env.TRANSLATION_LANGUAGE_PAIR,
      timeoutMs: parseIntOrUndefined(env.LOOKUP_TIMEOUT_MS),
    },
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses configuration from the given environment and arguments.
 *
 * @throws {ConfigValidationError} If a value fails the schema, or if
 *   accelerated time is requested in production
 *
 * @example
 * ```typescript
 * const testConfig = loadConfig({ NODE_ENV: 'test' }, ['--test']);
 * testConfig.scheduler.accelerationFactor; // 1000
 * ```
 */
export function loadConfig(env: Environment, argv: readonly string[] = []): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env, argv));

  if (!parseResult.success) {
    const invalidVars = parseResult.error.errors.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      invalidVars
    );
  }

  const loaded = parseResult.data;

  if (loaded.app.nodeEnv === 'production' && loaded.app.testMode) {
    throw new ConfigValidationError(
      'Invalid configuration: accelerated test mode cannot run with NODE_ENV=production',
      [{ name: 'VOCAB_TEST_MODE', reason: 'not allowed in production' }]
    );
  }

  return loaded;
}
