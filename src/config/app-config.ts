/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../core/errors/app-error.js';
import type { InputBindingMode } from '../engine/input-resolver.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type TreesDir = Brand<string, 'TreesDir'>;

export interface AppConfig {
  readonly trees: {
    /** Extra directory of JSON trees, loaded after the bundled ones */
    readonly directory: TreesDir | null;
  };
  readonly engine: {
    readonly inputBinding: InputBindingMode;
  };
}

export type ValidatedConfig = Brand<AppConfig, 'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  BRANCHWISE_TREES_DIR: z
    .string()
    .trim()
    .min(1, 'BRANCHWISE_TREES_DIR cannot be empty when set')
    .optional(),

  BRANCHWISE_INPUT_BINDING: z
    .enum(['declared', 'substring'], {
      errorMap: () => ({ message: "BRANCHWISE_INPUT_BINDING must be 'declared' or 'substring'" }),
    })
    .default('declared'),
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
    trees: {
      directory: env.BRANCHWISE_TREES_DIR === undefined ? null : (env.BRANCHWISE_TREES_DIR as TreesDir),
    },
    engine: {
      inputBinding: env.BRANCHWISE_INPUT_BINDING === 'substring' ? 'declared_or_substring' : 'declared_only',
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
