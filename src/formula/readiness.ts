/**
 * Search gate: folds a ValidationResult into what a caller may do next.
 *
 *   invalid -> hard errors, fix the formula text
 *   blocked -> parses, but a blocking warning (paradox) means it never matches
 *   review  -> advisory warnings only, search may run
 *   ready   -> no findings
 */

import type { Diagnostic, ValidationResult } from './diagnostics.js';
import { isBlocking } from './diagnostics.js';

export type FormulaReadiness =
  | { readonly kind: 'ready' }
  | { readonly kind: 'review'; readonly warnings: readonly Diagnostic[] }
  | { readonly kind: 'blocked'; readonly reasons: readonly Diagnostic[] }
  | { readonly kind: 'invalid'; readonly errors: readonly Diagnostic[] };

export function assessReadiness(result: ValidationResult): FormulaReadiness {
  if (!result.isValid) {
    return { kind: 'invalid', errors: result.errors };
  }

  const blocking = result.warnings.filter(isBlocking);
  if (blocking.length > 0) {
    return { kind: 'blocked', reasons: blocking };
  }
  if (result.warnings.length > 0) {
    return { kind: 'review', warnings: result.warnings };
  }
  return { kind: 'ready' };
}

export function canExecute(readiness: FormulaReadiness): boolean {
  return readiness.kind === 'ready' || readiness.kind === 'review';
}
