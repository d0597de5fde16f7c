/**
 * Match Command
 *
 * Evaluates a formula over a file (or stdin), line by line or as one
 * document, and lists what matched. Refuses invalid or blocked formulas.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { SearchOptions, SearchRefusedError } from '../../application/services/formula-service.js';
import type { InputReadFailedError } from '../../core/errors/app-error.js';
import { formatAppError } from '../../core/errors/formatter.js';
import type { Alphabet } from '../../formula/alphabet.js';
import type { PhraseBindingSet, PhraseInputs } from '../../formula/bindings.js';
import type { ScanMatch, SearchMode } from '../../formula/scan.js';
import { truncateText } from '../output-formatter.js';
import type { PhraseOptions } from '../phrase-options.js';
import { parsePhraseOptions, PHRASE_OPTION_HINTS } from '../phrase-options.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface MatchCommandDeps {
  readonly alphabet: Alphabet;
  readonly previewLimit: number;
  readonly bindings: (inputs: PhraseInputs) => PhraseBindingSet;
  readonly search: (
    formula: string,
    bindings: PhraseBindingSet,
    content: string,
    options: SearchOptions
  ) => Result<ScanMatch[], SearchRefusedError>;
  /** `undefined` means stdin. */
  readonly readInput: (file: string | undefined) => PromiseLike<Result<string, InputReadFailedError>>;
}

export interface MatchCommandOptions extends PhraseOptions {
  readonly file?: string;
  readonly mode?: string;
  readonly unique?: boolean;
}

const SEARCH_MODES: readonly SearchMode[] = ['line', 'document'];

function isSearchMode(value: string): value is SearchMode {
  return (SEARCH_MODES as readonly string[]).includes(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeMatchCommand(
  formula: string,
  options: MatchCommandOptions,
  deps: MatchCommandDeps
): Promise<CliResult> {
  const inputs = parsePhraseOptions(options, deps.alphabet);
  if (inputs.isErr()) {
    return misuse(inputs.error.message, PHRASE_OPTION_HINTS);
  }

  const mode = options.mode;
  if (mode !== undefined && !isSearchMode(mode)) {
    return misuse(`Invalid mode '${mode}'`, ['Use --mode line or --mode document']);
  }

  const source = options.file ?? '<stdin>';
  const content = await deps.readInput(options.file);
  if (content.isErr()) {
    return failure(formatAppError(content.error));
  }

  const bindings = deps.bindings(inputs.value);
  const searched = deps.search(formula, bindings, content.value, {
    mode,
    sourceId: source,
    unique: options.unique ?? false,
  });

  if (searched.isErr()) {
    const { validation, suggestions } = searched.error.check;
    return failure(searched.error.message, {
      details: [`Formula: ${formula.trim() || '<empty>'}`],
      errors: validation.errors.map((d) => d.message),
      warnings: validation.warnings.map((d) => d.message),
      suggestions,
    });
  }

  const matches = searched.value;
  if (matches.length === 0) {
    return success({ message: `No matches in ${source}` });
  }

  return success({
    message: `${matches.length} ${matches.length === 1 ? 'match' : 'matches'} in ${source}`,
    lines: matches.map((match) => formatMatch(match, source, deps.previewLimit)),
  });
}

function formatMatch(match: ScanMatch, source: string, previewLimit: number): string {
  const location = match.lineNumber > 0 ? `${source}:${match.lineNumber}` : source;
  return `${location}: ${truncateText(match.text, previewLimit)}`;
}
