import { describe, it, expect } from 'vitest';
import { DEFAULT_ALPHABET, isAlphabetLetter, parseAlphabet } from '../../../src/formula/alphabet.js';
import { boundLetters, createBindingSet, describeVariables, isBlankPhrase, phraseTextsOf } from '../../../src/formula/bindings.js';

describe('parseAlphabet', () => {
  it('upper-cases and keeps order', () => {
    expect(parseAlphabet('cab')._unsafeUnwrap()).toEqual(['C', 'A', 'B']);
    expect(parseAlphabet('A, B ,C')._unsafeUnwrap()).toEqual(['A', 'B', 'C']);
    expect(parseAlphabet(['x', 'y'])._unsafeUnwrap()).toEqual(['X', 'Y']);
  });

  it('rejects empty, non-letter and duplicate entries', () => {
    expect(parseAlphabet('')._unsafeUnwrapErr().message).toBe('Alphabet must contain at least one letter');
    expect(parseAlphabet('AB1')._unsafeUnwrapErr().message).toBe("Invalid alphabet entry '1': expected a single letter A-Z");
    expect(parseAlphabet(['x', 'YY'])._unsafeUnwrapErr().message).toBe(
      "Invalid alphabet entry 'YY': expected a single letter A-Z"
    );
    expect(parseAlphabet('ABa')._unsafeUnwrapErr()).toEqual({
      _tag: 'AlphabetInvalid',
      message: "Duplicate alphabet letter 'A'",
    });
  });

  it('returns a frozen list', () => {
    expect(Object.isFrozen(parseAlphabet('AB')._unsafeUnwrap())).toBe(true);
  });

  it('checks membership case-insensitively', () => {
    expect(isAlphabetLetter(DEFAULT_ALPHABET, 'c')).toBe(true);
    expect(isAlphabetLetter(DEFAULT_ALPHABET, 'E')).toBe(false);
  });
});

describe('binding sets', () => {
  const bindings = createBindingSet({ a: ' def ', B: { text: 'Foo', caseSensitive: true }, E: 'ignored' });

  it('has one trimmed binding per alphabet letter', () => {
    expect([...bindings.keys()]).toEqual(['A', 'B', 'C', 'D']);
    expect(bindings.get('A')).toEqual({ letter: 'A', text: 'def', caseSensitive: false });
    expect(bindings.get('B')).toEqual({ letter: 'B', text: 'Foo', caseSensitive: true });
    expect(bindings.get('C')).toEqual({ letter: 'C', text: '', caseSensitive: false });
    expect(bindings.has('E')).toBe(false);
  });

  it('exposes phrase texts and bound letters', () => {
    expect(phraseTextsOf(bindings)).toEqual({ A: 'def', B: 'Foo', C: '', D: '' });
    expect(boundLetters(bindings)).toEqual(['A', 'B']);
  });

  it('treats empty and whitespace-only text as blank', () => {
    expect(['', ' ', '\t\n'].map(isBlankPhrase)).toEqual([true, true, true]);
    expect(isBlankPhrase(' a ')).toBe(false);
  });

  it('leaves blank hand-built bindings out of the bound letters', () => {
    const map = new Map([['A', { letter: 'A', text: '  ', caseSensitive: false }]]);
    expect(boundLetters(map)).toEqual([]);
    expect(describeVariables(map)).toEqual(['(No variables defined)']);
  });

  it('describes bound variables', () => {
    expect(describeVariables(bindings)).toEqual(["A: 'def' (Any Case)", "B: 'Foo' (Match Case)"]);
    expect(describeVariables(createBindingSet({}))).toEqual(['(No variables defined)']);
  });
});
