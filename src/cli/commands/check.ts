/**
 * Check Command
 *
 * Validation report for a formula: errors, warnings and suggested changes.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { FormulaCheck } from '../../application/services/formula-service.js';
import type { Alphabet } from '../../formula/alphabet.js';
import type { PhraseBindingSet, PhraseInputs } from '../../formula/bindings.js';
import type { Diagnostic } from '../../formula/diagnostics.js';
import { describeVariables } from '../../formula/bindings.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { PhraseOptions } from '../phrase-options.js';
import { parsePhraseOptions, PHRASE_OPTION_HINTS } from '../phrase-options.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CheckCommandDeps {
  readonly alphabet: Alphabet;
  readonly bindings: (inputs: PhraseInputs) => PhraseBindingSet;
  readonly check: (formula: string, bindings: PhraseBindingSet) => FormulaCheck;
}

export type CheckCommandOptions = PhraseOptions;

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeCheckCommand(
  formula: string,
  options: CheckCommandOptions,
  deps: CheckCommandDeps
): CliResult {
  const inputs = parsePhraseOptions(options, deps.alphabet);
  if (inputs.isErr()) {
    return misuse(inputs.error.message, PHRASE_OPTION_HINTS);
  }

  const bindings = deps.bindings(inputs.value);
  const { validation, suggestions, readiness } = deps.check(formula, bindings);
  const details = [`Formula: ${formula.trim() || '<empty>'}`, ...describeVariables(bindings)];

  switch (readiness.kind) {
    case 'invalid':
      return failure('Formula has errors', {
        details,
        errors: messagesOf(readiness.errors),
        suggestions,
      });

    case 'blocked':
      return failure('Formula cannot be executed until the logical conflicts are resolved', {
        details,
        warnings: messagesOf(validation.warnings),
        suggestions,
      });

    case 'review':
      return success({
        message: 'Formula is valid with warnings',
        details,
        warnings: messagesOf(readiness.warnings),
        suggestions,
      });

    case 'ready':
      return success({ message: 'No issues detected. Ready to search.', details });

    default:
      return assertNever(readiness);
  }
}

function messagesOf(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map((diagnostic) => diagnostic.message);
}
