/**
 * reforge - rebuild and restart a program when its sources change
 */

// Configuration
export * from './config/types';
export type { ResolveOptions } from './config/config-loader';
export {
  resolveSessionConfig,
  loadConfigFile,
  loadProjectConfig,
  validateFileConfig,
  mergeConfigs,
  buildCargoArgv,
  filesModeConfig,
} from './config/config-loader';

// Errors
export * from './errors/error-codes';
export { ReforgeError, describeError } from './errors/reforge-error';

// Logging
export * from './logging/reload-logger';
export type { ConsoleSinkOptions } from './logging/console-sink';
export { ConsoleSink, clearScreen, formatLine } from './logging/console-sink';

// Core
export * from './core/debouncer';
export * from './core/hook-runner';
export * from './core/build-executor';
export * from './core/artifact-resolver';
export * from './core/orchestrator';

// Process supervision
export * from './process/isolation-group';
export * from './process/process-tree-supervisor';
export type { ExitStatus, CommandOutcome, CommandRunner } from './utils/command-runner';
export { runCommand, describeStatus } from './utils/command-runner';

// Watching
export * from './watch/path-filter';
export * from './watch/watch-source';
export * from './session/watch-session';
