/**
 * Diagnostic -> remediation text.
 *
 * One fixed suggestion per diagnostic kind, deduplicated case-insensitively,
 * in input order. Kinds this table does not know fall back to echoing the
 * message.
 */

import type { DiagnosticKind } from './diagnostics.js';

const BALANCE_BRACKETS = 'Balance parentheses/brackets so every opening symbol has a matching close.';

const SUGGESTIONS: ReadonlyMap<string, string> = new Map<DiagnosticKind, string>([
  ['Paradox', "Remove contradictory terms like 'A AND NOT A', or split them into separate conditions."],
  ['Tautology', "Simplify tautologies such as 'A OR NOT A' to reduce unnecessary matches."],
  ['UnboundVariable', 'Fill in phrases for the listed variables or remove those letters from the formula.'],
  ['InvalidCharacter', 'Replace unsupported characters with AND/OR/NOT operators or parentheses.'],
  ['AdjacentVariables', "Ensure each variable is separated by an operator, e.g. 'A AND B'."],
  ['ConsecutiveBinaryOperators', "Keep a single operator between two operands, e.g. 'A OR B' instead of 'A AND OR B'."],
  ['UnmatchedOpen', BALANCE_BRACKETS],
  ['UnmatchedClose', BALANCE_BRACKETS],
  ['MismatchedBracketKind', BALANCE_BRACKETS],
  ['DanglingOperator', "Provide values on both sides of each operator, such as 'A OR (B AND C)'."],
  ['MissingNotOperand', "Follow NOT with a variable or a bracketed group, such as 'NOT A' or 'NOT (A OR B)'."],
  ['EmptyGroup', 'Add content inside the empty parentheses or remove them entirely.'],
  ['EmptyFormula', "Enter a formula such as 'A AND B', or fill in phrases to build one automatically."],
  ['FormulaTooComplex', 'Split the formula into smaller searches, or remove redundant brackets and NOT operators.'],
]);

/** Anything shaped like a diagnostic; `kind` may come from a newer producer. */
export interface SuggestibleDiagnostic {
  readonly kind: string;
  readonly message: string;
}

export function suggest(diagnostics: readonly SuggestibleDiagnostic[]): string[] {
  const seen = new Set<string>();
  const suggestions: string[] = [];

  for (const diagnostic of diagnostics) {
    const suggestion = SUGGESTIONS.get(diagnostic.kind) ?? `Review: ${diagnostic.message}`;
    const key = suggestion.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    suggestions.push(suggestion);
  }

  return suggestions;
}
