// Trail configuration
//
// Options are validated once when a trail is created. Environment settings
// follow the same DATABASE_URL convention the Postgres engine uses.

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

export const trailSettingsSchema = z
  .object({
    strictMode: z.boolean().default(false),
    idStrategy: z.enum(['sequence', 'max']).default('sequence'),
    modelKey: z.string().min(1).default('model'),
    versionKey: z.string().min(1).default('version'),
  })
  .refine((settings) => settings.modelKey !== settings.versionKey, {
    message: 'modelKey and versionKey must differ',
    path: ['versionKey'],
  });

export type TrailSettingsInput = z.input<typeof trailSettingsSchema>;
export type TrailSettings = z.output<typeof trailSettingsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate trail options and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid option
 */
export function resolveTrailOptions(input: TrailSettingsInput = {}): TrailSettings {
  const parsed = trailSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid trail options: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  TRAILKEEP_STRICT_MODE: booleanFlag.optional(),
  TRAILKEEP_ID_STRATEGY: z.enum(['sequence', 'max']).optional(),
  TRAILKEEP_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
});

export type EnvironmentSettings = {
  trail: TrailSettingsInput;
  database: { connectionString: string; maxConnections?: number } | null;

  /**
   * Level for `createConsoleLogger`, when one is set
   */
  logLevel: LogLevel | null;
};

/**
 * Read trail and database settings from environment variables.
 *
 * Usage:
 * ```ts
 * const settings = loadTrailSettingsFromEnv(process.env);
 * const logger = createConsoleLogger({ level: settings.logLevel ?? 'info' });
 * ```
 *
 * @throws ConfigurationError if a variable is set to an invalid value
 */
export function loadTrailSettingsFromEnv(
  env: Record<string, string | undefined>
): EnvironmentSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  const trail: TrailSettingsInput = {};
  if (vars.TRAILKEEP_STRICT_MODE !== undefined) trail.strictMode = vars.TRAILKEEP_STRICT_MODE;
  if (vars.TRAILKEEP_ID_STRATEGY !== undefined) trail.idStrategy = vars.TRAILKEEP_ID_STRATEGY;

  return {
    trail,
    database: vars.DATABASE_URL
      ? { connectionString: vars.DATABASE_URL, maxConnections: vars.DATABASE_MAX_CONNECTIONS }
      : null,
    logLevel: vars.TRAILKEEP_LOG_LEVEL ?? null,
  };
}
