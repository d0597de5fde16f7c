/**
 * Helpers for a formula editor: auto-built formulas and operator casing.
 */

import type { PhraseBindingSet } from './bindings.js';
import { boundLetters } from './bindings.js';

/** `['A', 'C']` -> `'A AND C'`; no letters -> `''`. */
export function autoConstruct(nonEmptyLetters: readonly string[]): string {
  return nonEmptyLetters.join(' AND ');
}

/** AND of every letter that has phrase text, in alphabet order. */
export function autoConstructFromBindings(bindings: PhraseBindingSet): string {
  return autoConstruct(boundLetters(bindings));
}

const OPERATOR_WORDS = /\b(?:xnor|xor|nor|not|and|or)\b/gi;

/** Upper-case whole-word operators; everything else is left as typed. */
export function enforceOperatorCase(text: string): string {
  return text.replace(OPERATOR_WORDS, (word) => word.toUpperCase());
}
