import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { Result, ok, err } from 'neverthrow';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../core/errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import { FormulaService } from '../application/services/formula-service.js';

export interface ContainerInitOptions {
  /** Skip env parsing and use this config (tests, embedding). */
  readonly config?: ValidatedConfig;
  /** Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

/**
 * Register config, logging and services.
 *
 * Registrations made before this call (e.g. a test's fake logger factory)
 * are left in place. Returns the config error instead of exiting; the
 * composition root decides what to do with it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (!container.isRegistered(DI.Config.App)) {
    if (options.config !== undefined) {
      container.register<ValidatedConfig>(DI.Config.App, { useValue: options.config });
    } else {
      const configResult = loadConfig({ env: options.env ?? process.env });
      if (configResult.isErr()) {
        return err(configResult.error);
      }
      container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
    }
  }

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c: DependencyContainer) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Services.Formula)) {
    container.register(DI.Services.Formula, {
      useFactory: instanceCachingFactory((c: DependencyContainer) => c.resolve(FormulaService)),
    });
  }

  return ok(undefined);
}

/** Tests only: drop every registration and cached instance. */
export function resetContainer(): void {
  container.reset();
}

export { container };
