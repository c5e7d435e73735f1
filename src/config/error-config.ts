/**
 * Error-handling configuration - parse, don't validate.
 *
 * - One zod schema is the config surface and its defaults
 * - A JSON config file is overlaid by environment variables
 * - Errors are data (Result), never thrown
 */

import * as fs from 'fs';
import { z } from 'zod';
import { Result, ok } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError } from '../core/errors/app-error.js';
import { validateConfigLoad } from '../core/errors/boundary-validation.js';
import {
  ERROR_CATEGORIES,
  HANDLING_LEVELS,
  type ErrorCategory,
  type HandlingLevel,
} from '../domain/taxonomy.js';

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const CategorySettingsSchema = z.object({
  level: z.enum(HANDLING_LEVELS).optional(),
  maxOccurrences: z.number().int().nonnegative().optional(),
}).strict();

const RecoverySettingsSchema = z.object({
  enabled: z.boolean().default(true),
  similarityThreshold: z.number().min(0).max(1).default(0.6),
  largeFileThresholdBytes: z.number().int().positive().default(10 * 1024 * 1024),
}).strict();

export const ErrorConfigSchema = z.object({
  defaultLevel: z.enum(HANDLING_LEVELS).default('normal'),
  categories: z.record(z.enum(ERROR_CATEGORIES), CategorySettingsSchema).default({}),
  showSuggestions: z.boolean().default(true),
  showStatistics: z.boolean().default(true),
  displayLimit: z.number().int().positive().default(10),
  contextLines: z.number().int().nonnegative().default(2),
  historyCapacity: z.number().int().positive().default(100),
  recovery: RecoverySettingsSchema.default({}),
}).strict();

export type ErrorConfig = z.output<typeof ErrorConfigSchema>;
export type ErrorConfigInput = z.input<typeof ErrorConfigSchema>;
export type ValidatedErrorConfig = Brand<ErrorConfig, 'ValidatedErrorConfig'>;

export const ENV_LEVEL = 'GRACEFUL_MARKUP_LEVEL';
export const ENV_SHOW_SUGGESTIONS = 'GRACEFUL_MARKUP_SHOW_SUGGESTIONS';
export const ENV_DISPLAY_LIMIT = 'GRACEFUL_MARKUP_DISPLAY_LIMIT';

const EnvSchema = z.object({
  [ENV_LEVEL]: z.enum(HANDLING_LEVELS).optional(),
  [ENV_SHOW_SUGGESTIONS]: z
    .enum(['0', '1', 'true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === '1' || v === 'true')),
  [ENV_DISPLAY_LIMIT]: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(z.number().int().positive('Display limit must be a positive integer').optional()),
});

// =============================================================================
// Public API
// =============================================================================

export interface LoadErrorConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Path to a JSON config file; defaults apply when omitted. */
  readonly file?: string;
}

export type LoadErrorConfigResult = Result<ValidatedErrorConfig, ConfigInvalidError>;

export function loadErrorConfig(options: LoadErrorConfigOptions): LoadErrorConfigResult {
  const source = options.file ?? 'defaults';
  return readConfigFile(options.file)
    .andThen((raw) => validateConfigLoad(ErrorConfigSchema, raw, source))
    .andThen((fromFile) =>
      validateConfigLoad(EnvSchema, options.env, 'environment').map((env) =>
        createValidatedErrorConfig({
          ...fromFile,
          defaultLevel: env[ENV_LEVEL] ?? fromFile.defaultLevel,
          showSuggestions: env[ENV_SHOW_SUGGESTIONS] ?? fromFile.showSuggestions,
          displayLimit: env[ENV_DISPLAY_LIMIT] ?? fromFile.displayLimit,
        })
      )
    );
}

/**
 * Tests and local construction: fill defaults from a partial config.
 * Throws on invalid input; boundary code uses `loadErrorConfig` instead.
 */
export function errorConfigFrom(input: ErrorConfigInput = {}): ValidatedErrorConfig {
  return createValidatedErrorConfig(ErrorConfigSchema.parse(input));
}

export function createValidatedErrorConfig(value: ErrorConfig): ValidatedErrorConfig {
  return value as ValidatedErrorConfig;
}

export function levelFor(config: ErrorConfig, category: ErrorCategory): HandlingLevel {
  return config.categories[category]?.level ?? config.defaultLevel;
}

/** Infinity when the category has no limit. */
export function maxOccurrencesFor(config: ErrorConfig, category: ErrorCategory): number {
  return config.categories[category]?.maxOccurrences ?? Number.POSITIVE_INFINITY;
}

// =============================================================================
// Internal
// =============================================================================

function readConfigFile(file: string | undefined): Result<unknown, ConfigInvalidError> {
  if (file === undefined) return ok({});
  const text = Result.fromThrowable(
    () => fs.readFileSync(file, 'utf8'),
    (e) => Err.configInvalid(file, [{ path: '(file)', message: e instanceof Error ? e.message : String(e) }])
  )();
  return text.andThen((content) =>
    Result.fromThrowable(
      (): unknown => JSON.parse(content),
      (e) => Err.configInvalid(file, [{ path: '(json)', message: e instanceof Error ? e.message : String(e) }])
    )()
  );
}
