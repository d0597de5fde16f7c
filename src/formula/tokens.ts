/**
 * Token model for normalized formula text.
 *
 * Offsets are `[start, end)` ranges into the normalized string, which is the
 * text every diagnostic is reported against.
 */

export type BracketKind = 'paren' | 'square' | 'curly';

export type BinaryOperator = 'AND' | 'OR' | 'NOR' | 'XOR' | 'XNOR';

export interface SourceSpan {
  readonly start: number;
  readonly end: number;
}

interface TokenBase extends SourceSpan {
  readonly lexeme: string;
}

export interface VarToken extends TokenBase {
  readonly kind: 'var';
  readonly letter: string;
}

export interface BinaryOperatorToken extends TokenBase {
  readonly kind: 'operator';
  readonly operator: BinaryOperator;
}

export interface NotToken extends TokenBase {
  readonly kind: 'not';
}

export interface OpenBracketToken extends TokenBase {
  readonly kind: 'lparen';
  readonly bracket: BracketKind;
}

export interface CloseBracketToken extends TokenBase {
  readonly kind: 'rparen';
  readonly bracket: BracketKind;
}

/** Anything the tokenizer does not recognise; `lexeme` is the whole unrecognised word or symbol. */
export interface InvalidToken extends TokenBase {
  readonly kind: 'invalid';
  readonly char: string;
}

export type Token =
  | VarToken
  | BinaryOperatorToken
  | NotToken
  | OpenBracketToken
  | CloseBracketToken
  | InvalidToken;

export const OPEN_BRACKETS: Readonly<Record<string, BracketKind>> = {
  '(': 'paren',
  '[': 'square',
  '{': 'curly',
};

export const CLOSE_BRACKETS: Readonly<Record<string, BracketKind>> = {
  ')': 'paren',
  ']': 'square',
  '}': 'curly',
};

export const BRACKET_SYMBOLS: Readonly<Record<BracketKind, { readonly open: string; readonly close: string }>> = {
  paren: { open: '(', close: ')' },
  square: { open: '[', close: ']' },
  curly: { open: '{', close: '}' },
};

export const BINARY_OPERATORS: readonly BinaryOperator[] = ['AND', 'OR', 'NOR', 'XOR', 'XNOR'];

export function isBinaryOperator(word: string): word is BinaryOperator {
  return (BINARY_OPERATORS as readonly string[]).includes(word);
}

/** Human-readable form of a token for diagnostics. */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'var':
      return token.letter;
    case 'operator':
      return token.operator;
    case 'not':
      return 'NOT';
    case 'lparen':
    case 'rparen':
    case 'invalid':
      return token.lexeme;
  }
}
