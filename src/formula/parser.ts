/**
 * Recursive-descent parser for phrase formulas.
 *
 * Grammar (loosest binding first):
 *   formula := xorExpr (('OR' | 'NOR') xorExpr)*
 *   xorExpr := andExpr (('XOR' | 'XNOR') andExpr)*
 *   andExpr := unary ('AND' unary)*
 *   unary   := 'NOT' unary | primary
 *   primary := VAR | '(' formula ')' | '[' formula ']' | '{' formula '}'
 *
 * All binary tiers are left-associative. A group must close with the same
 * bracket kind that opened it.
 *
 * Before descending, the token stream is checked for invalid tokens, bracket
 * structure and operator/operand sequencing, so the error a user sees is the
 * most specific one rather than whatever the descent trips over first.
 */

import { Result, ok, err } from 'neverthrow';
import type { FormulaNode } from './ast.js';
import type { ParseError, ParseErrorKind } from './diagnostics.js';
import type { BinaryOperator, OpenBracketToken, SourceSpan, Token } from './tokens.js';
import { BRACKET_SYMBOLS, describeToken } from './tokens.js';

/** Deepest bracket nesting a formula may use. */
export const MAX_NESTING_DEPTH = 256;

/** Most operators (binary and NOT) a formula may use; bounds the depth of the AST. */
export const MAX_OPERATORS = 1024;

/** Binary operator tiers, loosest first. Shared by every consumer of the grammar. */
export const PRECEDENCE_TIERS: ReadonlyArray<readonly BinaryOperator[]> = [
  ['OR', 'NOR'],
  ['XOR', 'XNOR'],
  ['AND'],
];

export function parse(tokens: readonly Token[]): Result<FormulaNode, ParseError> {
  const structural = checkStructure(tokens);
  if (structural !== undefined) {
    return err(structural);
  }
  return new FormulaParser(tokens).parseFormula();
}

// =============================================================================
// Structural checks
// =============================================================================

/**
 * First structural problem in the token stream, or undefined.
 * Order: empty input, invalid tokens, brackets, operator sequencing, size.
 *
 * Parsing and every AST walk recurse, so bracket depth and operator count
 * are capped here, before any recursion starts.
 */
export function checkStructure(tokens: readonly Token[]): ParseError | undefined {
  if (tokens.length === 0) {
    return parseError('EmptyFormula', 'The formula is empty. Add phrase variables or enter an expression.', undefined);
  }
  return checkInvalidTokens(tokens) ?? checkBrackets(tokens) ?? checkSequence(tokens) ?? checkSize(tokens);
}

function checkInvalidTokens(tokens: readonly Token[]): ParseError | undefined {
  const invalid = tokens.find((token) => token.kind === 'invalid');
  if (invalid === undefined) return undefined;

  const what = invalid.lexeme === invalid.char ? 'character' : 'word';
  return parseError(
    'InvalidCharacter',
    `Invalid ${what} '${invalid.lexeme}' at position ${invalid.start + 1}`,
    invalid
  );
}

function checkBrackets(tokens: readonly Token[]): ParseError | undefined {
  const stack: Array<{ readonly token: OpenBracketToken; readonly index: number }> = [];

  for (const [index, token] of tokens.entries()) {
    if (token.kind === 'lparen') {
      stack.push({ token, index });
      if (stack.length > MAX_NESTING_DEPTH) {
        return parseError(
          'FormulaTooComplex',
          `Brackets nested more than ${MAX_NESTING_DEPTH} levels deep at position ${token.start + 1}`,
          token
        );
      }
      continue;
    }
    if (token.kind !== 'rparen') continue;

    const open = stack.pop();
    if (open === undefined) {
      return parseError('UnmatchedClose', `Unmatched closing '${token.lexeme}' at position ${token.start + 1}`, token);
    }
    if (open.token.bracket !== token.bracket) {
      return parseError(
        'MismatchedBracketKind',
        `Mismatched brackets: '${open.token.lexeme}' at position ${open.token.start + 1} closed by '${token.lexeme}' at position ${token.start + 1}`,
        { start: open.token.start, end: token.end }
      );
    }
    if (open.index === index - 1) {
      return parseError(
        'EmptyGroup',
        `Empty brackets '${open.token.lexeme}${token.lexeme}' at position ${open.token.start + 1} must contain an expression`,
        { start: open.token.start, end: token.end }
      );
    }
  }

  const unclosed = stack[0];
  if (unclosed !== undefined) {
    return parseError(
      'UnmatchedOpen',
      `Unclosed '${unclosed.token.lexeme}' at position ${unclosed.token.start + 1}`,
      unclosed.token
    );
  }
  return undefined;
}

function checkSequence(tokens: readonly Token[]): ParseError | undefined {
  const first = tokens[0];
  if (first !== undefined && first.kind === 'operator') {
    return parseError('DanglingOperator', `'${first.operator}' operator at start of formula needs left operand`, first);
  }

  for (let index = 1; index < tokens.length; index++) {
    const previous = tokens[index - 1];
    const current = tokens[index];
    if (previous === undefined || current === undefined) continue;
    const problem = checkPair(previous, current);
    if (problem !== undefined) return problem;
  }

  const last = tokens[tokens.length - 1];
  if (last !== undefined && last.kind === 'operator') {
    return parseError('DanglingOperator', `'${last.operator}' operator at end of formula needs right operand`, last);
  }
  if (last !== undefined && last.kind === 'not') {
    return parseError('MissingNotOperand', `'NOT' operator at end of formula needs operand`, last);
  }
  return undefined;
}

function checkSize(tokens: readonly Token[]): ParseError | undefined {
  let operators = 0;
  for (const token of tokens) {
    if (token.kind !== 'operator' && token.kind !== 'not') continue;
    operators++;
    if (operators > MAX_OPERATORS) {
      return parseError(
        'FormulaTooComplex',
        `Formula has more than ${MAX_OPERATORS} operators; the next one is at position ${token.start + 1}`,
        token
      );
    }
  }
  return undefined;
}

const endsOperand = (token: Token): boolean => token.kind === 'var' || token.kind === 'rparen';
const startsOperand = (token: Token): boolean =>
  token.kind === 'var' || token.kind === 'lparen' || token.kind === 'not';

/** Problem with `current` directly following `previous`, if any. */
function checkPair(previous: Token, current: Token): ParseError | undefined {
  const pair = `'${describeToken(previous)} ${describeToken(current)}'`;
  const span: SourceSpan = { start: previous.start, end: current.end };
  const at = `at position ${previous.start + 1}`;

  if (endsOperand(previous) && startsOperand(current)) {
    return parseError('AdjacentVariables', `Invalid sequence: ${pair} ${at} - missing operator between operands`, span);
  }
  if (previous.kind === 'operator' && current.kind === 'operator') {
    return parseError('ConsecutiveBinaryOperators', `Invalid sequence: ${pair} ${at} - consecutive operators`, span);
  }
  if (previous.kind === 'not' && (current.kind === 'operator' || current.kind === 'rparen')) {
    return parseError('MissingNotOperand', `'NOT' operator ${at} is missing an operand before '${describeToken(current)}'`, span);
  }
  if (previous.kind === 'operator' && current.kind === 'rparen') {
    return parseError(
      'DanglingOperator',
      `'${previous.operator}' operator ${at} needs right operand before '${current.lexeme}'`,
      span
    );
  }
  if (previous.kind === 'lparen' && current.kind === 'operator') {
    return parseError(
      'DanglingOperator',
      `'${current.operator}' operator at position ${current.start + 1} needs left operand after '${previous.lexeme}'`,
      span
    );
  }
  return undefined;
}

// =============================================================================
// Descent
// =============================================================================

class FormulaParser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parseFormula(): Result<FormulaNode, ParseError> {
    const formula = this.parseTier(0);
    if (formula.isErr()) return formula;

    const trailing = this.peek();
    if (trailing !== undefined) {
      return err(this.unexpected(trailing));
    }
    return ok(formula.value);
  }

  private parseTier(level: number): Result<FormulaNode, ParseError> {
    const operators = PRECEDENCE_TIERS[level];
    if (operators === undefined) {
      return this.parseUnary();
    }

    const first = this.parseTier(level + 1);
    if (first.isErr()) return first;

    let node = first.value;
    for (;;) {
      const next = this.peek();
      if (next?.kind !== 'operator' || !operators.includes(next.operator)) break;

      this.index++;
      const right = this.parseTier(level + 1);
      if (right.isErr()) return right;

      node = {
        type: 'binary',
        operator: next.operator,
        left: node,
        right: right.value,
        span: { start: node.span.start, end: right.value.span.end },
      };
    }
    return ok(node);
  }

  private parseUnary(): Result<FormulaNode, ParseError> {
    const token = this.peek();
    if (token?.kind !== 'not') {
      return this.parsePrimary();
    }

    this.index++;
    const operand = this.parseUnary();
    if (operand.isErr()) return operand;

    return ok({
      type: 'not',
      operand: operand.value,
      span: { start: token.start, end: operand.value.span.end },
    });
  }

  private parsePrimary(): Result<FormulaNode, ParseError> {
    const token = this.peek();
    if (token === undefined) {
      return err(this.unexpectedEnd());
    }

    if (token.kind === 'var') {
      this.index++;
      return ok({ type: 'var', letter: token.letter, span: { start: token.start, end: token.end } });
    }

    if (token.kind !== 'lparen') {
      return err(this.unexpected(token));
    }

    this.index++;
    const inner = this.parseTier(0);
    if (inner.isErr()) return inner;

    const close = this.peek();
    if (close === undefined) {
      return err(parseError('UnmatchedOpen', `Unclosed '${token.lexeme}' at position ${token.start + 1}`, token));
    }
    if (close.kind !== 'rparen') {
      return err(this.unexpected(close));
    }
    if (close.bracket !== token.bracket) {
      const expected = BRACKET_SYMBOLS[token.bracket].close;
      return err(
        parseError(
          'MismatchedBracketKind',
          `Mismatched brackets: '${token.lexeme}' at position ${token.start + 1} closed by '${close.lexeme}' (expected '${expected}')`,
          { start: token.start, end: close.end }
        )
      );
    }
    this.index++;
    return ok(inner.value);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private unexpected(token: Token): ParseError {
    const previous = this.tokens[this.index - 1];
    const problem = previous === undefined ? undefined : checkPair(previous, token);
    if (problem !== undefined) return problem;

    switch (token.kind) {
      case 'invalid':
        return parseError('InvalidCharacter', `Invalid character '${token.lexeme}' at position ${token.start + 1}`, token);
      case 'rparen':
        return parseError('UnmatchedClose', `Unmatched closing '${token.lexeme}' at position ${token.start + 1}`, token);
      case 'operator':
        return parseError('DanglingOperator', `'${token.operator}' operator at position ${token.start + 1} needs left operand`, token);
      default:
        return parseError(
          'AdjacentVariables',
          `Unexpected '${describeToken(token)}' at position ${token.start + 1} - missing operator`,
          token
        );
    }
  }

  private unexpectedEnd(): ParseError {
    const previous = this.tokens[this.index - 1];
    if (previous?.kind === 'not') {
      return parseError('MissingNotOperand', `'NOT' operator at end of formula needs operand`, previous);
    }
    if (previous?.kind === 'operator') {
      return parseError('DanglingOperator', `'${previous.operator}' operator at end of formula needs right operand`, previous);
    }
    return parseError('EmptyFormula', 'The formula is empty. Add phrase variables or enter an expression.', undefined);
  }
}

function parseError(kind: ParseErrorKind, message: string, span: SourceSpan | undefined): ParseError {
  return {
    kind,
    message,
    position: span === undefined ? undefined : { start: span.start, end: span.end },
  };
}
