import { describe, it, expect, vi } from 'vitest';
import { errAsync, okAsync } from 'neverthrow';
import { executeAutoCommand, executeCheckCommand, executeMatchCommand } from '../../../src/cli/commands/index.js';
import type { MatchCommandDeps } from '../../../src/cli/commands/index.js';
import { PHRASE_OPTION_HINTS } from '../../../src/cli/phrase-options.js';
import { FormulaService } from '../../../src/application/services/formula-service.js';
import { loadConfig } from '../../../src/config/app-config.js';
import { Err } from '../../../src/core/errors/factories.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';

const service = new FormulaService(loadConfig({ env: {} })._unsafeUnwrap(), new FakeLoggerFactory());

const checkDeps = {
  alphabet: service.alphabet,
  bindings: service.bindings.bind(service),
  check: service.check.bind(service),
};

const PARADOX = "Logical paradox detected: 'A AND NOT A' - this will always be false";
const PARADOX_SUGGESTION = "Remove contradictory terms like 'A AND NOT A', or split them into separate conditions.";

describe('executeCheckCommand', () => {
  it('reports a ready formula with its variables', () => {
    const result = executeCheckCommand('A AND B', { phrases: ['A=def', 'B=class'], matchCase: [] }, checkDeps);

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'No issues detected. Ready to search.',
        details: ['Formula: A AND B', "A: 'def' (Any Case)", "B: 'class' (Any Case)"],
      },
    });
  });

  it('shows case-sensitive phrases', () => {
    const result = executeCheckCommand('B', { phrases: ['B=Foo'], matchCase: ['b'] }, checkDeps);
    expect(result.output?.details).toEqual(['Formula: B', "B: 'Foo' (Match Case)"]);
  });

  it('fails on a parse error with a suggestion', () => {
    const result = executeCheckCommand('A AND', { phrases: ['A=def'], matchCase: [] }, checkDeps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Formula has errors',
        details: ['Formula: A AND', "A: 'def' (Any Case)"],
        errors: ["'AND' operator at end of formula needs right operand"],
        warnings: undefined,
        suggestions: ["Provide values on both sides of each operator, such as 'A OR (B AND C)'."],
      },
    });
  });

  it('fails on a blocked formula', () => {
    const result = executeCheckCommand('A AND NOT A', { phrases: ['A=def'], matchCase: [] }, checkDeps);

    expect(result.kind).toBe('failure');
    expect(result.output).toMatchObject({
      message: 'Formula cannot be executed until the logical conflicts are resolved',
      warnings: [PARADOX],
      suggestions: [PARADOX_SUGGESTION],
    });
  });

  it('succeeds with warnings on advisory findings', () => {
    const result = executeCheckCommand('A AND B', { phrases: ['A=def'], matchCase: [] }, checkDeps);

    expect(result.kind).toBe('success');
    expect(result.output).toMatchObject({
      message: 'Formula is valid with warnings',
      warnings: ['Variable B is used in formula but has no corresponding phrase'],
    });
  });

  it('reports bad phrase options as misuse', () => {
    const result = executeCheckCommand('A', { phrases: ['E=x'], matchCase: [] }, checkDeps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: "Unknown variable 'E' in 'E=x': use one of A, B, C, D", suggestions: PHRASE_OPTION_HINTS },
    });
  });
});

describe('executeMatchCommand', () => {
  const createDeps = (content: string, overrides: Partial<MatchCommandDeps> = {}): MatchCommandDeps => ({
    alphabet: service.alphabet,
    previewLimit: 1024,
    bindings: service.bindings.bind(service),
    search: service.search.bind(service),
    readInput: () => okAsync(content),
    ...overrides,
  });
  const options = { phrases: ['A=foo'], matchCase: [], file: 'notes.txt' };

  it('lists matching lines with their location', async () => {
    const result = await executeMatchCommand('A', options, createDeps('foo 1\nbar\nfoo 2'));

    expect(result).toEqual({
      kind: 'success',
      output: { message: '2 matches in notes.txt', lines: ['notes.txt:1: foo 1', 'notes.txt:3: foo 2'] },
    });
  });

  it('labels stdin when no file is given', async () => {
    const result = await executeMatchCommand('A', { ...options, file: undefined }, createDeps('foo'));
    expect(result.output).toEqual({ message: '1 match in <stdin>', lines: ['<stdin>:1: foo'] });
  });

  it('reports no matches', async () => {
    const result = await executeMatchCommand('A', options, createDeps('bar'));
    expect(result).toEqual({ kind: 'success', output: { message: 'No matches in notes.txt' } });
  });

  it('matches the whole document in document mode', async () => {
    const result = await executeMatchCommand('A', { ...options, mode: 'document' }, createDeps('foo bar'));
    expect(result.output?.lines).toEqual(['notes.txt: foo bar...']);
  });

  it('drops repeated lines with unique', async () => {
    const result = await executeMatchCommand('A', { ...options, unique: true }, createDeps('foo\nfoo'));
    expect(result.output?.message).toBe('1 match in notes.txt');
  });

  it('truncates long lines to the preview limit', async () => {
    const deps = createDeps(`foo ${'x'.repeat(30)}`, { previewLimit: 16 });
    const result = await executeMatchCommand('A', options, deps);
    expect(result.output?.lines).toEqual(['notes.txt:1: foo xxxxxxxxx...']);
  });

  it('rejects an unknown mode before reading input', async () => {
    const readInput = vi.fn<MatchCommandDeps['readInput']>(() => okAsync('foo'));
    const result = await executeMatchCommand('A', { ...options, mode: 'paragraph' }, createDeps('', { readInput }));

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: "Invalid mode 'paragraph'", suggestions: ['Use --mode line or --mode document'] },
    });
    expect(readInput).not.toHaveBeenCalled();
  });

  it('fails when the input cannot be read', async () => {
    const deps = createDeps('', {
      readInput: () => errAsync(Err.inputReadFailed('notes.txt', 'no such file', 'ENOENT')),
    });
    const result = await executeMatchCommand('A', options, deps);

    expect(result.kind).toBe('failure');
    expect(result.output?.message).toBe('Could not read notes.txt (ENOENT): no such file');
  });

  it('refuses a blocked formula with the check findings', async () => {
    const result = await executeMatchCommand('A AND NOT A', options, createDeps('foo'));

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Formula cannot be executed until the logical conflicts are resolved',
        details: ['Formula: A AND NOT A'],
        errors: [],
        warnings: [PARADOX],
        suggestions: [PARADOX_SUGGESTION],
      },
    });
  });
});

describe('executeAutoCommand', () => {
  const deps = { alphabet: service.alphabet, bindings: service.bindings.bind(service) };

  it('joins bound variables in alphabet order', () => {
    const result = executeAutoCommand({ phrases: ['C=x', 'A=y'], matchCase: [] }, deps);
    expect(result).toEqual({ kind: 'success', output: { message: 'Auto-constructed formula', lines: ['A AND C'] } });
  });

  it('fails when nothing is bound', () => {
    const result = executeAutoCommand({ phrases: ['A=   '], matchCase: [] }, deps);

    expect(result.kind).toBe('failure');
    expect(result.output).toMatchObject({
      message: 'No phrases given; nothing to combine',
      suggestions: PHRASE_OPTION_HINTS,
    });
  });
});
