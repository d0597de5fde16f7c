import type {
  AppError,
  ConfigInvalidError,
  ConfigIssue,
  InputReadFailedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  inputReadFailed: (source: string, message: string, code?: string): InputReadFailedError => ({
    _tag: 'InputReadFailed',
    source,
    code,
    message,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
