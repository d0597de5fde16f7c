// Formula engine
export * from './formula/index.js';

// DI container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Services and configuration
export { FormulaService } from './application/services/formula-service.js';
export type { FormulaCheck, SearchOptions, SearchRefusedError } from './application/services/formula-service.js';
export type { AppConfig, ValidatedConfig, PreviewLimit } from './config/app-config.js';
export { loadConfig } from './config/app-config.js';

// Errors
export type { AppError, ConfigInvalidError, InputReadFailedError, UnexpectedError } from './core/errors/index.js';
export { formatAppError } from './core/errors/index.js';
