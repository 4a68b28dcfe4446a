/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import {
  DEFAULT_MAP_GROWTH_STEP,
  DEFAULT_MAP_INITIAL_CEILING,
  DEFAULT_MAP_MAX_CAPACITY,
} from '../exit-condition/types.js';
import { DEFAULT_REPORT_LABEL } from '../exit-condition/report.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type MapSize = Brand<number, 'MapSize'>;
export type ReportLabel = Brand<string, 'ReportLabel'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly map: {
    /** Capacity used by `m` when no size is given */
    readonly defaultCapacity: MapSize;
    /** Upper bound for the first outcome map allocation */
    readonly initialCeiling: MapSize;
    readonly growthStep: MapSize;
  };
  readonly report: { readonly label: ReportLabel };
}

/** Config that came out of `loadConfig`. */
export type ValidatedConfig = Brand<AppConfig, 'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const mapSize = (name: string, fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(1, `${name} must be >= 1`)
        .max(1_048_576, `${name} cannot exceed 1048576`)
        .default(fallback)
    );

const EnvSchema = z.object({
  PROBECOND_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  PROBECOND_MAP_DEFAULT_CAPACITY: mapSize('PROBECOND_MAP_DEFAULT_CAPACITY', DEFAULT_MAP_MAX_CAPACITY),
  PROBECOND_MAP_INITIAL_CEILING: mapSize('PROBECOND_MAP_INITIAL_CEILING', DEFAULT_MAP_INITIAL_CEILING),
  PROBECOND_MAP_GROWTH_STEP: mapSize('PROBECOND_MAP_GROWTH_STEP', DEFAULT_MAP_GROWTH_STEP),

  PROBECOND_REPORT_LABEL: z
    .string()
    .min(1, 'PROBECOND_REPORT_LABEL cannot be empty')
    .regex(/^[^/\n]+$/, "PROBECOND_REPORT_LABEL cannot contain '/' or newlines")
    .default(DEFAULT_REPORT_LABEL),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.PROBECOND_LOG_LEVEL },
    map: {
      defaultCapacity: env.PROBECOND_MAP_DEFAULT_CAPACITY as MapSize,
      initialCeiling: env.PROBECOND_MAP_INITIAL_CEILING as MapSize,
      growthStep: env.PROBECOND_MAP_GROWTH_STEP as MapSize,
    },
    report: { label: env.PROBECOND_REPORT_LABEL as ReportLabel },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
