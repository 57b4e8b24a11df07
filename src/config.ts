/**
 * Configuration: defaults, `CONFLICT_DAG_*` environment variables and
 * explicit options, validated with zod
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';

import { InvalidDeclarationError } from './errors.js';
import type { Logger } from './logger.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const SystemConfigSchema = z.object({
  workers: z.number().int().positive().optional(),
  trials: z.number().int().positive(),
  seed: z.number().int(),
  validateAccess: z.boolean(),
  logLevel: LogLevelSchema.optional(),
});

export type SystemConfig = z.infer<typeof SystemConfigSchema>;

export type SystemOptions = Partial<SystemConfig> & {
  /** Takes precedence over `logLevel` */
  logger?: Logger;
};

const DEFAULT_CONFIG: SystemConfig = {
  trials: 5,
  seed: 12345,
  validateAccess: false,
};

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvConfigSchema = z.object({
  workers: z.coerce.number().int().positive().optional(),
  trials: z.coerce.number().int().positive().optional(),
  seed: z.coerce.number().int().optional(),
  validateAccess: BooleanFlagSchema.optional(),
  logLevel: LogLevelSchema.optional(),
});

const ENV_KEYS = {
  workers: 'CONFLICT_DAG_WORKERS',
  trials: 'CONFLICT_DAG_TRIALS',
  seed: 'CONFLICT_DAG_SEED',
  validateAccess: 'CONFLICT_DAG_VALIDATE_ACCESS',
  logLevel: 'CONFLICT_DAG_LOG_LEVEL',
} as const;

export type Env = Readonly<Record<string, string | undefined>>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Resolve configuration: defaults → environment → explicit options
 */
export function resolveConfig(options: SystemOptions = {}, env: Env = process.env): SystemConfig {
  const rawEnv: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') rawEnv[field] = value;
  }

  const parsedEnv = EnvConfigSchema.safeParse(rawEnv);
  if (!parsedEnv.success) {
    throw new InvalidDeclarationError('environment configuration', formatIssues(parsedEnv.error));
  }

  const explicit = Object.fromEntries(
    Object.entries({
      workers: options.workers,
      trials: options.trials,
      seed: options.seed,
      validateAccess: options.validateAccess,
      logLevel: options.logLevel,
    }).filter(([, value]) => value !== undefined)
  );
  const definedEnv = Object.fromEntries(
    Object.entries(parsedEnv.data).filter(([, value]) => value !== undefined)
  );

  const merged = SystemConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...definedEnv, ...explicit });
  if (!merged.success) {
    throw new InvalidDeclarationError('configuration', formatIssues(merged.error));
  }
  return merged.data;
}

export function defaultWorkerCount(): number {
  return availableParallelism();
}

/**
 * Validate a caller-supplied worker count, defaulting to hardware concurrency
 */
export function resolveWorkerCount(workers: number | undefined): number {
  if (workers === undefined) return defaultWorkerCount();
  const parsed = z.number().int().positive().safeParse(workers);
  if (!parsed.success) {
    throw new InvalidDeclarationError('worker count', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate a caller-supplied trial count, falling back to `fallback`
 */
export function resolveTrialCount(trials: number | undefined, fallback: number): number {
  const parsed = z.number().int().positive().safeParse(trials ?? fallback);
  if (!parsed.success) {
    throw new InvalidDeclarationError('trial count', formatIssues(parsed.error));
  }
  return parsed.data;
}
