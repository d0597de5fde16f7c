/**
 * Compilation: raw formula text -> immutable, reusable CompiledFormula.
 *
 * Compile once per formula, then evaluate against as many lines or documents
 * (and binding sets) as needed.
 */

import { Result } from 'neverthrow';
import type { Alphabet } from './alphabet.js';
import { DEFAULT_ALPHABET } from './alphabet.js';
import type { FormulaNode } from './ast.js';
import { collectVariables } from './ast.js';
import type { ParseError } from './diagnostics.js';
import { normalize } from './normalizer.js';
import { parse } from './parser.js';
import { tokenize } from './tokenizer.js';

export interface CompiledFormula {
  readonly sourceText: string;
  readonly normalizedText: string;
  readonly ast: FormulaNode;
  readonly alphabet: Alphabet;
  /** Letters the formula references, in first-occurrence order. */
  readonly variables: readonly string[];
}

export function compile(formulaText: string, alphabet: Alphabet = DEFAULT_ALPHABET): Result<CompiledFormula, ParseError> {
  const normalizedText = normalize(formulaText);
  const tokens = tokenize(normalizedText, alphabet);

  return parse(tokens).map((ast) =>
    Object.freeze({
      sourceText: formulaText,
      normalizedText,
      ast: deepFreeze(ast),
      alphabet,
      variables: Object.freeze(collectVariables(ast)),
    })
  );
}

function deepFreeze(node: FormulaNode): FormulaNode {
  switch (node.type) {
    case 'var':
      break;
    case 'not':
      deepFreeze(node.operand);
      break;
    case 'binary':
      deepFreeze(node.left);
      deepFreeze(node.right);
      break;
  }
  Object.freeze(node.span);
  return Object.freeze(node);
}
