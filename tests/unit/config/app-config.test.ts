import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';
import { formatAppError } from '../../../src/core/errors/formatter.js';
import { resolveLogLevel } from '../../../src/core/logging/index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({ env: {} })._unsafeUnwrap();

    expect(config.formula.alphabet).toEqual(['A', 'B', 'C', 'D']);
    expect(config.search.mode).toBe('line');
    expect(config.search.previewLimit).toBe(1024);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      env: {
        PHRASE_FORMULA_ALPHABET: 'xyz',
        PHRASE_FORMULA_SEARCH_MODE: 'document',
        PHRASE_FORMULA_PREVIEW_LIMIT: '2048',
      },
    })._unsafeUnwrap();

    expect(config.formula.alphabet).toEqual(['X', 'Y', 'Z']);
    expect(config.search.mode).toBe('document');
    expect(config.search.previewLimit).toBe(2048);
  });

  it('reports an invalid alphabet with its reason', () => {
    const error = loadConfig({ env: { PHRASE_FORMULA_ALPHABET: 'A1' } })._unsafeUnwrapErr();

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([
      { path: 'PHRASE_FORMULA_ALPHABET', message: "Invalid alphabet entry '1': expected a single letter A-Z" },
    ]);
  });

  it('rejects an unknown search mode', () => {
    const error = loadConfig({ env: { PHRASE_FORMULA_SEARCH_MODE: 'paragraph' } })._unsafeUnwrapErr();
    expect(error.issues.map((i) => i.path)).toEqual(['PHRASE_FORMULA_SEARCH_MODE']);
  });

  it('rejects an out-of-range preview limit', () => {
    const error = loadConfig({ env: { PHRASE_FORMULA_PREVIEW_LIMIT: '8' } })._unsafeUnwrapErr();

    expect(formatAppError(error)).toBe(
      'Invalid configuration\n\n  - PHRASE_FORMULA_PREVIEW_LIMIT: PHRASE_FORMULA_PREVIEW_LIMIT must be >= 16'
    );
  });

  it('rejects a non-numeric preview limit', () => {
    const error = loadConfig({ env: { PHRASE_FORMULA_PREVIEW_LIMIT: 'lots' } })._unsafeUnwrapErr();
    expect(error.issues.map((i) => i.path)).toEqual(['PHRASE_FORMULA_PREVIEW_LIMIT']);
  });
});

describe('resolveLogLevel', () => {
  it('defaults to silent', () => {
    expect(resolveLogLevel({})).toBe('silent');
    expect(resolveLogLevel({ PHRASE_FORMULA_LOG_LEVEL: 'loud' })).toBe('silent');
  });

  it('accepts known levels in any case', () => {
    expect(resolveLogLevel({ PHRASE_FORMULA_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });
});
