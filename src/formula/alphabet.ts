/**
 * Variable alphabet - the letters a formula may use as phrase variables.
 *
 * Parsed once at a boundary (config, caller input) and carried as a branded
 * type so the tokenizer never has to re-check it.
 */

import { Result, ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';

export type Alphabet = Brand<readonly string[], 'Alphabet'>;

export type AlphabetError = Readonly<{
  readonly _tag: 'AlphabetInvalid';
  readonly message: string;
}>;

const LETTER = /^[A-Z]$/;

function alphabetError(message: string): AlphabetError {
  return { _tag: 'AlphabetInvalid', message };
}

/**
 * Accepts `"ABCD"`, `["a", "b"]` or any iterable of single letters.
 * Letters are upper-cased; order is kept.
 */
export function parseAlphabet(input: string | Iterable<string>): Result<Alphabet, AlphabetError> {
  const entries = typeof input === 'string' ? [...input.replace(/[\s,]+/g, '')] : [...input];

  if (entries.length === 0) {
    return err(alphabetError('Alphabet must contain at least one letter'));
  }

  const letters: string[] = [];
  for (const entry of entries) {
    const letter = entry.trim().toUpperCase();
    if (!LETTER.test(letter)) {
      return err(alphabetError(`Invalid alphabet entry '${entry}': expected a single letter A-Z`));
    }
    if (letters.includes(letter)) {
      return err(alphabetError(`Duplicate alphabet letter '${letter}'`));
    }
    letters.push(letter);
  }

  return ok(Object.freeze(letters) as Alphabet);
}

export const DEFAULT_ALPHABET: Alphabet = Object.freeze(['A', 'B', 'C', 'D']) as Alphabet;

export function isAlphabetLetter(alphabet: Alphabet, candidate: string): boolean {
  return alphabet.includes(candidate.toUpperCase());
}
