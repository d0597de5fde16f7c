#!/usr/bin/env node
/**
 * phrase-formula CLI - Composition Root
 *
 * Wires dependencies for each command and interprets the CliResult.
 * All command logic lives in src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';
import { ResultAsync } from 'neverthrow';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { FormulaService } from './application/services/formula-service.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { InputReadFailedError } from './core/errors/app-error.js';
import { Err } from './core/errors/factories.js';
import { formatAppError } from './core/errors/formatter.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { executeAutoCommand, executeCheckCommand, executeMatchCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Services {
  readonly config: ValidatedConfig;
  readonly formula: FormulaService;
}

/** Undefined (with exit code set) when config is invalid. */
function resolveServices(): Services | undefined {
  const initialized = initializeContainer();
  if (initialized.isErr()) {
    console.error(formatAppError(initialized.error));
    process.exitCode = 1;
    return undefined;
  }
  return {
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    formula: container.resolve<FormulaService>(DI.Services.Formula),
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function readInput(file: string | undefined): ResultAsync<string, InputReadFailedError> {
  const source = file ?? '<stdin>';
  const read = file === undefined ? readStdin() : fs.promises.readFile(file, 'utf-8');
  return ResultAsync.fromPromise(read, (e) => toReadError(source, e));
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function toReadError(source: string, e: unknown): InputReadFailedError {
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    return Err.inputReadFailed(source, e.message, code);
  }
  return Err.inputReadFailed(source, String(e));
}

interface PhraseFlags {
  phrase: string[];
  matchCase: string[];
}

const phraseOptionsOf = (flags: PhraseFlags) => ({ phrases: flags.phrase, matchCase: flags.matchCase });

function withPhraseOptions(command: Command): Command {
  return command
    .option('-p, --phrase <letter=text>', 'Bind a phrase to a variable (repeatable)', collect, [])
    .option('-m, --match-case <letter>', 'Match that variable case-sensitively (repeatable)', collect, []);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('phrase-formula')
  .description('Validate and run boolean formulas over phrase variables')
  .version('0.1.0');

withPhraseOptions(
  program
    .command('check <formula>')
    .description('Report errors, warnings and suggested changes for a formula')
).action((formula: string, flags: PhraseFlags) => {
  const services = resolveServices();
  if (services === undefined) return;
  const { formula: service } = services;

  const result = executeCheckCommand(formula, phraseOptionsOf(flags), {
    alphabet: service.alphabet,
    bindings: (inputs) => service.bindings(inputs),
    check: (text, bindings) => service.check(text, bindings),
  });

  interpretCliResult(result);
});

withPhraseOptions(
  program
    .command('match <formula> [file]')
    .description('Print the lines (or the document) of a file matching a formula; reads stdin without a file')
    .option('--mode <mode>', 'line or document (default from PHRASE_FORMULA_SEARCH_MODE)')
    .option('--unique', 'Report each matching line only once')
).action(async (formula: string, file: string | undefined, flags: PhraseFlags & { mode?: string; unique?: boolean }) => {
  const services = resolveServices();
  if (services === undefined) return;
  const { config, formula: service } = services;

  const result = await executeMatchCommand(
    formula,
    { ...phraseOptionsOf(flags), file, mode: flags.mode, unique: flags.unique },
    {
      alphabet: service.alphabet,
      previewLimit: config.search.previewLimit,
      bindings: (inputs) => service.bindings(inputs),
      search: (text, bindings, content, options) => service.search(text, bindings, content, options),
      readInput,
    }
  );

  interpretCliResult(result);
});

withPhraseOptions(
  program.command('auto').description('Print the default formula: every bound variable joined with AND')
).action((flags: PhraseFlags) => {
  const services = resolveServices();
  if (services === undefined) return;
  const { formula: service } = services;

  const result = executeAutoCommand(phraseOptionsOf(flags), {
    alphabet: service.alphabet,
    bindings: (inputs) => service.bindings(inputs),
  });

  interpretCliResult(result);
});

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(formatAppError(Err.unexpected('Command failed', e)));
  process.exitCode = 1;
});
