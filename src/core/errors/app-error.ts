import type { Brand } from '../../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type InputReadFailedError = Readonly<{
  readonly _tag: 'InputReadFailed';
  readonly source: string;
  readonly code?: string;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | InputReadFailedError | UnexpectedError;

/** Config that went through `loadConfig` (or an explicit test constructor). */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
