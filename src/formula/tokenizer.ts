/**
 * Tokenizer for normalized formula text.
 *
 * Word operators are matched case-insensitively as whole words, so `ANDREW`
 * is one invalid word rather than `AND` followed by `REW`.
 */

import type { Alphabet } from './alphabet.js';
import { DEFAULT_ALPHABET, isAlphabetLetter } from './alphabet.js';
import type { Token } from './tokens.js';
import { CLOSE_BRACKETS, OPEN_BRACKETS, isBinaryOperator } from './tokens.js';

const WORD = /[A-Za-z]+/y;
const WHITESPACE = /\s/;

export function tokenize(normalized: string, alphabet: Alphabet = DEFAULT_ALPHABET): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < normalized.length) {
    const char = normalized.charAt(index);

    if (WHITESPACE.test(char)) {
      index++;
      continue;
    }

    const open = OPEN_BRACKETS[char];
    if (open !== undefined) {
      tokens.push({ kind: 'lparen', bracket: open, lexeme: char, start: index, end: index + 1 });
      index++;
      continue;
    }

    const close = CLOSE_BRACKETS[char];
    if (close !== undefined) {
      tokens.push({ kind: 'rparen', bracket: close, lexeme: char, start: index, end: index + 1 });
      index++;
      continue;
    }

    WORD.lastIndex = index;
    const match = WORD.exec(normalized);
    if (match) {
      tokens.push(...wordTokens(match[0], index, alphabet));
      index += match[0].length;
      continue;
    }

    // Whole code point, so a symbol outside the BMP is one token.
    const symbol = String.fromCodePoint(normalized.codePointAt(index) ?? 0);
    tokens.push({ kind: 'invalid', char: symbol, lexeme: symbol, start: index, end: index + symbol.length });
    index += symbol.length;
  }

  return tokens;
}

function wordTokens(word: string, start: number, alphabet: Alphabet): Token[] {
  const upper = word.toUpperCase();
  const end = start + word.length;

  if (upper === 'NOT') {
    return [{ kind: 'not', lexeme: word, start, end }];
  }
  if (isBinaryOperator(upper)) {
    return [{ kind: 'operator', operator: upper, lexeme: word, start, end }];
  }

  // "AB" is two variables missing an operator, which the parser reports precisely.
  if ([...upper].every((letter) => isAlphabetLetter(alphabet, letter))) {
    return [...upper].map((letter, offset) => ({
      kind: 'var' as const,
      letter,
      lexeme: word.charAt(offset),
      start: start + offset,
      end: start + offset + 1,
    }));
  }

  return [{ kind: 'invalid', char: word.charAt(0), lexeme: word, start, end }];
}
