/**
 * Formula validation.
 *
 * A parse failure yields exactly one error and no further passes. A formula
 * that parses gets three independent semantic passes:
 *
 * - contradiction: `X AND NOT X` inside any AND chain (blocking)
 * - tautology:     `X OR NOT X` inside any OR chain (advisory)
 * - unbound:       a referenced letter with no phrase text (advisory)
 *
 * Warnings never affect `isValid`; callers inspect each warning's severity.
 */

import type { Result } from 'neverthrow';
import type { Alphabet } from './alphabet.js';
import { DEFAULT_ALPHABET } from './alphabet.js';
import type { FormulaNode } from './ast.js';
import { findVariable } from './ast.js';
import type { CompiledFormula } from './compile.js';
import { compile } from './compile.js';
import { isBlankPhrase } from './bindings.js';
import type { Diagnostic, ParseError, ValidationResult } from './diagnostics.js';
import { parseErrorToDiagnostic } from './diagnostics.js';
import type { SourceSpan } from './tokens.js';

export type PhraseTexts = ReadonlyMap<string, string> | Readonly<Partial<Record<string, string>>>;

export function validate(
  formulaText: string,
  phraseTexts: PhraseTexts,
  alphabet: Alphabet = DEFAULT_ALPHABET
): ValidationResult {
  return validateCompiled(compile(formulaText, alphabet), phraseTexts);
}

/** Validation over an existing compile outcome, so callers compile once. */
export function validateCompiled(
  compiled: Result<CompiledFormula, ParseError>,
  phraseTexts: PhraseTexts
): ValidationResult {
  return compiled.match<ValidationResult>(
    (formula) => ({ isValid: true, errors: [], warnings: semanticWarnings(formula, phraseTexts) }),
    (error) => ({ isValid: false, errors: [parseErrorToDiagnostic(error)], warnings: [] })
  );
}

/** Semantic passes for an already compiled formula. */
export function semanticWarnings(compiled: CompiledFormula, phraseTexts: PhraseTexts): Diagnostic[] {
  return [
    ...contradictionPass(compiled.ast),
    ...tautologyPass(compiled.ast),
    ...unboundVariablePass(compiled, phraseTexts),
  ];
}

// =============================================================================
// Contradiction / tautology
// =============================================================================

interface ComplementaryPair {
  readonly letter: string;
  readonly span: SourceSpan;
}

function contradictionPass(ast: FormulaNode): Diagnostic[] {
  return findComplementaryPairs(ast, 'AND').map(({ letter, span }): Diagnostic => ({
    kind: 'Paradox',
    message: `Logical paradox detected: '${letter} AND NOT ${letter}' - this will always be false`,
    position: span,
    severity: 'blocking',
    letter,
  }));
}

function tautologyPass(ast: FormulaNode): Diagnostic[] {
  return findComplementaryPairs(ast, 'OR').map(({ letter, span }): Diagnostic => ({
    kind: 'Tautology',
    message: `Tautology detected: '${letter} OR NOT ${letter}' - this will always be true`,
    position: span,
    severity: 'advisory',
    letter,
  }));
}

/**
 * Letters appearing both plain and negated among the operands of one
 * AND (or OR) chain, at any depth. Each letter is reported once.
 */
function findComplementaryPairs(root: FormulaNode, operator: 'AND' | 'OR'): ComplementaryPair[] {
  const pairs: ComplementaryPair[] = [];

  const visit = (node: FormulaNode, parentOperator: string | undefined): void => {
    switch (node.type) {
      case 'var':
        return;
      case 'not':
        visit(node.operand, undefined);
        return;
      case 'binary':
        if (node.operator === operator && parentOperator !== operator) {
          for (const letter of complementaryLetters(flattenChain(node, operator))) {
            if (!pairs.some((pair) => pair.letter === letter)) {
              pairs.push({ letter, span: node.span });
            }
          }
        }
        visit(node.left, node.operator);
        visit(node.right, node.operator);
        return;
    }
  };

  visit(root, undefined);
  return pairs;
}

function flattenChain(node: FormulaNode, operator: 'AND' | 'OR'): FormulaNode[] {
  if (node.type === 'binary' && node.operator === operator) {
    return [...flattenChain(node.left, operator), ...flattenChain(node.right, operator)];
  }
  return [node];
}

function complementaryLetters(operands: readonly FormulaNode[]): string[] {
  const plain = new Set<string>();
  const negated = new Set<string>();
  const order: string[] = [];

  for (const operand of operands) {
    if (operand.type === 'var') {
      plain.add(operand.letter);
      order.push(operand.letter);
    } else if (operand.type === 'not' && operand.operand.type === 'var') {
      negated.add(operand.operand.letter);
      order.push(operand.operand.letter);
    }
  }

  return [...new Set(order)].filter((letter) => plain.has(letter) && negated.has(letter));
}

// =============================================================================
// Unbound variables
// =============================================================================

function unboundVariablePass(compiled: CompiledFormula, phraseTexts: PhraseTexts): Diagnostic[] {
  return compiled.variables
    .filter((letter) => isBlankPhrase(lookupPhrase(phraseTexts, letter)))
    .map((letter): Diagnostic => ({
      kind: 'UnboundVariable',
      message: `Variable ${letter} is used in formula but has no corresponding phrase`,
      position: findVariable(compiled.ast, letter)?.span,
      severity: 'advisory',
      letter,
    }));
}

function lookupPhrase(phraseTexts: PhraseTexts, letter: string): string {
  if (isPhraseMap(phraseTexts)) {
    return phraseTexts.get(letter) ?? phraseTexts.get(letter.toLowerCase()) ?? '';
  }
  return phraseTexts[letter] ?? phraseTexts[letter.toLowerCase()] ?? '';
}

function isPhraseMap(phraseTexts: PhraseTexts): phraseTexts is ReadonlyMap<string, string> {
  return phraseTexts instanceof Map;
}
