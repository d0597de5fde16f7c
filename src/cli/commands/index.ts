/**
 * CLI Commands - Public API
 */

export { executeCheckCommand, type CheckCommandDeps, type CheckCommandOptions } from './check.js';
export { executeMatchCommand, type MatchCommandDeps, type MatchCommandOptions } from './match.js';
export { executeAutoCommand, type AutoCommandDeps } from './auto.js';
