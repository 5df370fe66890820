/**
 * Application configuration - parse, don't validate.
 *
 * - Environment is the only config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

export const LOG_LEVEL_ENV = 'B64URL_LOG_LEVEL';

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];

const EnvSchema = z.object({
  [LOG_LEVEL_ENV]: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() || undefined)
    .pipe(z.enum(LOG_LEVELS).default('silent')),
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

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env[LOG_LEVEL_ENV] },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
