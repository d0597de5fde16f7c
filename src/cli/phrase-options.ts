/**
 * `-p A=text` / `-m A` option parsing.
 */

import { Result, ok, err } from 'neverthrow';
import type { Alphabet } from '../formula/alphabet.js';
import { isAlphabetLetter } from '../formula/alphabet.js';
import type { PhraseInputs } from '../formula/bindings.js';

export interface PhraseOptions {
  /** `L=text` entries */
  readonly phrases: readonly string[];
  /** Letters whose phrase is case-sensitive */
  readonly matchCase: readonly string[];
}

export type PhraseOptionError = Readonly<{
  readonly _tag: 'PhraseOptionInvalid';
  readonly message: string;
}>;

const PHRASE_ENTRY = /^([A-Za-z])=(.*)$/s;

export const PHRASE_OPTION_HINTS: readonly string[] = [
  "Bind phrases as -p A=phrase (e.g. -p A=def -p 'B=raise error')",
  'Make a phrase case-sensitive with -m A',
];

export function parsePhraseOptions(options: PhraseOptions, alphabet: Alphabet): Result<PhraseInputs, PhraseOptionError> {
  const letters = alphabet.join(', ');
  const texts = new Map<string, string>();

  for (const entry of options.phrases) {
    const match = PHRASE_ENTRY.exec(entry);
    if (!match) {
      return err(optionError(`Invalid phrase '${entry}': expected LETTER=phrase`));
    }
    const letter = (match[1] ?? '').toUpperCase();
    if (!isAlphabetLetter(alphabet, letter)) {
      return err(optionError(`Unknown variable '${letter}' in '${entry}': use one of ${letters}`));
    }
    if (texts.has(letter)) {
      return err(optionError(`Phrase for ${letter} given more than once`));
    }
    texts.set(letter, match[2] ?? '');
  }

  const sensitive = new Set<string>();
  for (const raw of options.matchCase) {
    const letter = raw.trim().toUpperCase();
    if (!isAlphabetLetter(alphabet, letter)) {
      return err(optionError(`Unknown variable '${raw}' for --match-case: use one of ${letters}`));
    }
    sensitive.add(letter);
  }

  const inputs: Record<string, { text: string; caseSensitive: boolean }> = {};
  for (const [letter, text] of texts) {
    inputs[letter] = { text, caseSensitive: sensitive.has(letter) };
  }
  return ok(inputs);
}

function optionError(message: string): PhraseOptionError {
  return { _tag: 'PhraseOptionInvalid', message };
}
