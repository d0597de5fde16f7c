/**
 * Auto Command
 *
 * Builds the default formula (every bound phrase joined with AND).
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { Alphabet } from '../../formula/alphabet.js';
import type { PhraseBindingSet, PhraseInputs } from '../../formula/bindings.js';
import { autoConstructFromBindings } from '../../formula/editor.js';
import type { PhraseOptions } from '../phrase-options.js';
import { parsePhraseOptions, PHRASE_OPTION_HINTS } from '../phrase-options.js';

export interface AutoCommandDeps {
  readonly alphabet: Alphabet;
  readonly bindings: (inputs: PhraseInputs) => PhraseBindingSet;
}

export function executeAutoCommand(options: PhraseOptions, deps: AutoCommandDeps): CliResult {
  const inputs = parsePhraseOptions(options, deps.alphabet);
  if (inputs.isErr()) {
    return misuse(inputs.error.message, PHRASE_OPTION_HINTS);
  }

  const formula = autoConstructFromBindings(deps.bindings(inputs.value));
  if (formula === '') {
    return failure('No phrases given; nothing to combine', { suggestions: PHRASE_OPTION_HINTS });
  }

  return success({ message: 'Auto-constructed formula', lines: [formula] });
}
