/**
 * Typed exit codes for failed commands, following Unix conventions.
 * Success leaves the process exit code untouched (0).
 */
export type ExitCode =
  | { kind: 'general_error' }  // 1 - invalid or blocked formula, unreadable input
  | { kind: 'misuse' };        // 2 - bad arguments

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
