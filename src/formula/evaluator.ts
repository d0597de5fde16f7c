/**
 * AST interpreter.
 *
 * Pure and total: no I/O, no shared mutable state, no error path. A letter
 * without a binding, or with blank text, is simply false.
 */

import type { FormulaNode } from './ast.js';
import type { PhraseBindingSet } from './bindings.js';
import { isBlankPhrase } from './bindings.js';
import type { CompiledFormula } from './compile.js';
import { assertNever } from '../runtime/assert-never.js';

export function evaluate(compiled: CompiledFormula, bindings: PhraseBindingSet, content: string): boolean {
  return evaluateNode(compiled.ast, bindings, content);
}

export function evaluateNode(node: FormulaNode, bindings: PhraseBindingSet, content: string): boolean {
  // Lower-cased once per call, and only if some insensitive phrase needs it.
  let lowered: string | undefined;
  const lowerContent = (): string => (lowered ??= content.toLowerCase());

  const isPresent = (letter: string): boolean => {
    const binding = bindings.get(letter);
    if (binding === undefined || isBlankPhrase(binding.text)) return false;
    return binding.caseSensitive
      ? content.includes(binding.text)
      : lowerContent().includes(binding.text.toLowerCase());
  };

  const walk = (current: FormulaNode): boolean => {
    switch (current.type) {
      case 'var':
        return isPresent(current.letter);
      case 'not':
        return !walk(current.operand);
      case 'binary': {
        const left = walk(current.left);
        switch (current.operator) {
          case 'AND':
            return left && walk(current.right);
          case 'OR':
            return left || walk(current.right);
          case 'NOR':
            return !(left || walk(current.right));
          case 'XOR':
            return left !== walk(current.right);
          case 'XNOR':
            return left === walk(current.right);
          default:
            return assertNever(current.operator);
        }
      }
    }
  };

  return walk(node);
}
