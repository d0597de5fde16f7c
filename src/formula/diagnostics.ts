/**
 * Diagnostic model shared by the parser and validator.
 *
 * Parse errors are fatal to compilation. Semantic warnings carry their own
 * `blocking` flag: a blocking warning compiles fine but must stop a search.
 */

import type { SourceSpan } from './tokens.js';

export type ParseErrorKind =
  | 'UnmatchedOpen'
  | 'UnmatchedClose'
  | 'MismatchedBracketKind'
  | 'EmptyGroup'
  | 'ConsecutiveBinaryOperators'
  | 'AdjacentVariables'
  | 'DanglingOperator'
  | 'MissingNotOperand'
  | 'InvalidCharacter'
  | 'EmptyFormula'
  | 'FormulaTooComplex';

export type WarningKind = 'Paradox' | 'Tautology' | 'UnboundVariable';

export type DiagnosticKind = ParseErrorKind | WarningKind;

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
  readonly position: SourceSpan | undefined;
}

export type DiagnosticSeverity = 'error' | 'blocking' | 'advisory';

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly position: SourceSpan | undefined;
  readonly severity: DiagnosticSeverity;
  /** Letter the diagnostic is about, for per-variable warnings. */
  readonly letter?: string;
}

export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly Diagnostic[];
  readonly warnings: readonly Diagnostic[];
}

export function parseErrorToDiagnostic(error: ParseError): Diagnostic {
  return {
    kind: error.kind,
    message: error.message,
    position: error.position,
    severity: 'error',
  };
}

export function isBlocking(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === 'blocking';
}
