/**
 * AST for compiled formulas.
 *
 * Grouping brackets collapse into tree shape; every node keeps the span of
 * normalized text it came from so warnings can point at it.
 */

import type { BinaryOperator, SourceSpan } from './tokens.js';

export interface VarNode {
  readonly type: 'var';
  readonly letter: string;
  readonly span: SourceSpan;
}

export interface NotNode {
  readonly type: 'not';
  readonly operand: FormulaNode;
  readonly span: SourceSpan;
}

export interface BinaryNode {
  readonly type: 'binary';
  readonly operator: BinaryOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
  readonly span: SourceSpan;
}

export type FormulaNode = VarNode | NotNode | BinaryNode;

/** Letters referenced anywhere in the tree, in first-occurrence order. */
export function collectVariables(node: FormulaNode): string[] {
  const seen: string[] = [];
  const visit = (current: FormulaNode): void => {
    switch (current.type) {
      case 'var':
        if (!seen.includes(current.letter)) seen.push(current.letter);
        return;
      case 'not':
        visit(current.operand);
        return;
      case 'binary':
        visit(current.left);
        visit(current.right);
        return;
    }
  };
  visit(node);
  return seen;
}

/** First occurrence of a letter, for diagnostics. */
export function findVariable(node: FormulaNode, letter: string): VarNode | undefined {
  switch (node.type) {
    case 'var':
      return node.letter === letter ? node : undefined;
    case 'not':
      return findVariable(node.operand, letter);
    case 'binary':
      return findVariable(node.left, letter) ?? findVariable(node.right, letter);
  }
}

/** Canonical, fully parenthesized rendering: `((A AND NOT B) OR C)`. */
export function formatNode(node: FormulaNode): string {
  switch (node.type) {
    case 'var':
      return node.letter;
    case 'not':
      return `NOT ${formatNode(node.operand)}`;
    case 'binary':
      return `(${formatNode(node.left)} ${node.operator} ${formatNode(node.right)})`;
  }
}
