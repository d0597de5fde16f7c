/**
 * CLI Result Interpreter
 *
 * The only place a CliResult becomes process state. Sets `process.exitCode`
 * instead of exiting so pending stdout writes flush.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exitCode = toNumericExitCode(result.exitCode);
  }
}
