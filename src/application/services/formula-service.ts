/**
 * FormulaService - the engine as callers use it.
 *
 * Binds the configured alphabet, turns validation into suggestions and a
 * readiness verdict, and refuses to scan text with a formula that is invalid
 * or blocked. The engine functions stay pure; logging happens here.
 */

import { inject, injectable } from 'tsyringe';
import { Result, ok, err } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { Alphabet } from '../../formula/alphabet.js';
import type { PhraseBindingSet, PhraseInputs } from '../../formula/bindings.js';
import { createBindingSet, phraseTextsOf } from '../../formula/bindings.js';
import type { CompiledFormula } from '../../formula/compile.js';
import { compile } from '../../formula/compile.js';
import type { ParseError, ValidationResult } from '../../formula/diagnostics.js';
import type { FormulaReadiness } from '../../formula/readiness.js';
import { assessReadiness, canExecute } from '../../formula/readiness.js';
import type { ScanMatch, ScanOptions } from '../../formula/scan.js';
import { scanText } from '../../formula/scan.js';
import { suggest } from '../../formula/suggestions.js';
import { validateCompiled } from '../../formula/validator.js';

export interface FormulaCheck {
  readonly formula: string;
  readonly validation: ValidationResult;
  readonly suggestions: readonly string[];
  readonly readiness: FormulaReadiness;
}

export type SearchRefusedError = Readonly<{
  readonly _tag: 'SearchRefused';
  readonly check: FormulaCheck;
  readonly message: string;
}>;

export type SearchOptions = Partial<ScanOptions>;

@injectable()
export class FormulaService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('formula-service');
  }

  get alphabet(): Alphabet {
    return this.config.formula.alphabet;
  }

  bindings(inputs: PhraseInputs): PhraseBindingSet {
    return createBindingSet(inputs, this.alphabet);
  }

  compile(formula: string): Result<CompiledFormula, ParseError> {
    const compiled = compile(formula, this.alphabet);
    if (compiled.isErr()) {
      this.logger.debug({ formula, kind: compiled.error.kind }, 'Formula failed to compile');
    }
    return compiled;
  }

  check(formula: string, bindings: PhraseBindingSet): FormulaCheck {
    return this.inspect(formula, bindings).check;
  }

  private inspect(
    formula: string,
    bindings: PhraseBindingSet
  ): { readonly check: FormulaCheck; readonly compiled: Result<CompiledFormula, ParseError> } {
    const compiled = this.compile(formula);
    const validation = validateCompiled(compiled, phraseTextsOf(bindings));
    const readiness = assessReadiness(validation);
    const suggestions = suggest([...validation.errors, ...validation.warnings]);

    this.logger.debug(
      {
        formula,
        readiness: readiness.kind,
        errors: validation.errors.length,
        warnings: validation.warnings.length,
      },
      'Formula checked'
    );

    return { check: { formula, validation, suggestions, readiness }, compiled };
  }

  /**
   * Scan one text. Refuses (as a value) when the formula is invalid or
   * blocked.
   */
  search(
    formula: string,
    bindings: PhraseBindingSet,
    content: string,
    options: SearchOptions = {}
  ): Result<ScanMatch[], SearchRefusedError> {
    const { check, compiled } = this.inspect(formula, bindings);
    if (compiled.isErr() || !canExecute(check.readiness)) {
      this.logger.warn({ formula, readiness: check.readiness.kind }, 'Search refused');
      return err({
        _tag: 'SearchRefused',
        check,
        message:
          check.readiness.kind === 'blocked'
            ? 'Formula cannot be executed until the logical conflicts are resolved'
            : 'Cannot search with an invalid formula',
      });
    }

    const mode = options.mode ?? this.config.search.mode;
    const matches = scanText(compiled.value, bindings, content, { ...options, mode });

    this.logger.info(
      { sourceId: options.sourceId, mode, matches: matches.length },
      'Scan finished'
    );
    return ok(matches);
  }
}
