/**
 * Phrase bindings: what each variable letter searches for.
 *
 * A binding set is an immutable snapshot. Editing a phrase means building a
 * new set; a scan already running keeps the snapshot it started with.
 */

import type { Alphabet } from './alphabet.js';
import { DEFAULT_ALPHABET } from './alphabet.js';

export interface PhraseBinding {
  readonly letter: string;
  /** Literal substring. Blank text never matches. */
  readonly text: string;
  readonly caseSensitive: boolean;
}

export type PhraseBindingSet = ReadonlyMap<string, PhraseBinding>;

/** A bare string binds case-insensitively. */
export type PhraseInput = string | { readonly text: string; readonly caseSensitive?: boolean };

export type PhraseInputs = Readonly<Partial<Record<string, PhraseInput>>>;

/**
 * Build a snapshot with one binding per alphabet letter.
 * Letters are matched case-insensitively; text is trimmed; letters outside
 * the alphabet are ignored.
 */
export function createBindingSet(inputs: PhraseInputs, alphabet: Alphabet = DEFAULT_ALPHABET): PhraseBindingSet {
  const byLetter = new Map<string, PhraseInput>();
  for (const [key, value] of Object.entries(inputs)) {
    if (value !== undefined) byLetter.set(key.toUpperCase(), value);
  }

  const bindings = new Map<string, PhraseBinding>();
  for (const letter of alphabet) {
    const input = byLetter.get(letter);
    bindings.set(letter, toBinding(letter, input));
  }
  return bindings;
}

function toBinding(letter: string, input: PhraseInput | undefined): PhraseBinding {
  if (input === undefined) {
    return Object.freeze({ letter, text: '', caseSensitive: false });
  }
  if (typeof input === 'string') {
    return Object.freeze({ letter, text: input.trim(), caseSensitive: false });
  }
  return Object.freeze({ letter, text: input.text.trim(), caseSensitive: input.caseSensitive ?? false });
}

/** Empty or whitespace-only phrase text: the variable is unbound and never matches. */
export function isBlankPhrase(text: string): boolean {
  return text.trim() === '';
}

/** Letter -> phrase text, as consumed by `validate`. */
export function phraseTextsOf(bindings: PhraseBindingSet): Record<string, string> {
  const texts: Record<string, string> = {};
  for (const [letter, binding] of bindings) {
    texts[letter] = binding.text;
  }
  return texts;
}

/** Letters whose phrase text is non-empty, in binding (alphabet) order. */
export function boundLetters(bindings: PhraseBindingSet): string[] {
  return [...bindings.values()].filter((binding) => !isBlankPhrase(binding.text)).map((binding) => binding.letter);
}

/**
 * Variable summary lines, e.g. for an editor tooltip:
 * `A: 'def' (Any Case)`, `B: 'Foo' (Match Case)`.
 */
export function describeVariables(bindings: PhraseBindingSet): string[] {
  const lines = [...bindings.values()]
    .filter((binding) => !isBlankPhrase(binding.text))
    .map((binding) => `${binding.letter}: '${binding.text}' (${binding.caseSensitive ? 'Match Case' : 'Any Case'})`);

  return lines.length > 0 ? lines : ['(No variables defined)'];
}
