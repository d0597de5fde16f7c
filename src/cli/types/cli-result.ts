/**
 * CLI Result Types
 *
 * Commands return these; only the composition root turns them into output
 * and an exit code.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  /** Plain result lines (matches, a constructed formula), printed as-is. */
  readonly lines?: readonly string[];
  readonly details?: readonly string[];
  readonly errors?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    details?: readonly string[];
    errors?: readonly string[];
    warnings?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      errors: options?.errors,
      warnings: options?.warnings,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
