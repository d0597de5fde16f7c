import { describe, it, expect } from 'vitest';
import { tokenize } from '../../../src/formula/tokenizer.js';
import { parseAlphabet } from '../../../src/formula/alphabet.js';

describe('tokenize', () => {
  it('emits variables and operators with offsets', () => {
    expect(tokenize('A AND NOT b')).toEqual([
      { kind: 'var', letter: 'A', lexeme: 'A', start: 0, end: 1 },
      { kind: 'operator', operator: 'AND', lexeme: 'AND', start: 2, end: 5 },
      { kind: 'not', lexeme: 'NOT', start: 6, end: 9 },
      { kind: 'var', letter: 'B', lexeme: 'b', start: 10, end: 11 },
    ]);
  });

  it('matches word operators case-insensitively', () => {
    const kinds = tokenize('a xnor b nor c xor d or a').map((t) => (t.kind === 'operator' ? t.operator : t.kind));
    expect(kinds).toEqual(['var', 'XNOR', 'var', 'NOR', 'var', 'XOR', 'var', 'OR', 'var']);
  });

  it('splits a run of alphabet letters into separate variables', () => {
    expect(tokenize('AB')).toEqual([
      { kind: 'var', letter: 'A', lexeme: 'A', start: 0, end: 1 },
      { kind: 'var', letter: 'B', lexeme: 'B', start: 1, end: 2 },
    ]);
  });

  it('keeps any other word whole as one invalid token', () => {
    expect(tokenize('ANDREW')).toEqual([{ kind: 'invalid', char: 'A', lexeme: 'ANDREW', start: 0, end: 6 }]);
    expect(tokenize('E')).toEqual([{ kind: 'invalid', char: 'E', lexeme: 'E', start: 0, end: 1 }]);
  });

  it('emits one invalid token per code point', () => {
    expect(tokenize('😀 A')).toEqual([
      { kind: 'invalid', char: '😀', lexeme: '😀', start: 0, end: 2 },
      { kind: 'var', letter: 'A', lexeme: 'A', start: 3, end: 4 },
    ]);
  });

  it('marks unknown symbols invalid', () => {
    expect(tokenize('A $ B')[1]).toEqual({ kind: 'invalid', char: '$', lexeme: '$', start: 2, end: 3 });
  });

  it('records the bracket kind', () => {
    const brackets = tokenize('([{}])').map((t) => (t.kind === 'lparen' || t.kind === 'rparen' ? `${t.kind}:${t.bracket}` : t.kind));
    expect(brackets).toEqual([
      'lparen:paren',
      'lparen:square',
      'lparen:curly',
      'rparen:curly',
      'rparen:square',
      'rparen:paren',
    ]);
  });

  it('uses the given alphabet', () => {
    const alphabet = parseAlphabet('XYZ')._unsafeUnwrap();
    expect(tokenize('x or y', alphabet).map((t) => t.kind)).toEqual(['var', 'operator', 'var']);
    expect(tokenize('A', alphabet)[0]?.kind).toBe('invalid');
  });

  it('returns nothing for empty input', () => {
    expect(tokenize('')).toEqual([]);
  });
});
