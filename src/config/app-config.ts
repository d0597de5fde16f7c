/**
 * Application configuration - parse, don't validate.
 *
 * - Environment variables are the only input
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../core/errors/app-error.js';
import type { Alphabet } from '../formula/alphabet.js';
import { parseAlphabet } from '../formula/alphabet.js';
import type { SearchMode } from '../formula/scan.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type PreviewLimit = Brand<number, 'PreviewLimit'>;

export interface AppConfig {
  readonly formula: {
    readonly alphabet: Alphabet;
  };
  readonly search: {
    readonly mode: SearchMode;
    readonly previewLimit: PreviewLimit;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  PHRASE_FORMULA_ALPHABET: z
    .string()
    .default('ABCD')
    .transform((value, ctx) => {
      const parsed = parseAlphabet(value);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
        return z.NEVER;
      }
      return parsed.value;
    }),

  PHRASE_FORMULA_SEARCH_MODE: z.enum(['line', 'document']).default('line'),

  PHRASE_FORMULA_PREVIEW_LIMIT: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('PHRASE_FORMULA_PREVIEW_LIMIT must be an integer')
        .min(16, 'PHRASE_FORMULA_PREVIEW_LIMIT must be >= 16')
        .max(65_536, 'PHRASE_FORMULA_PREVIEW_LIMIT must be <= 65536')
        .default(1024)
    ),
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
    formula: { alphabet: env.PHRASE_FORMULA_ALPHABET },
    search: {
      mode: env.PHRASE_FORMULA_SEARCH_MODE,
      previewLimit: env.PHRASE_FORMULA_PREVIEW_LIMIT as PreviewLimit,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
