/**
 * CLI argument parsing for reforge
 */

import { ACTIVE_ENV_VAR, FileConfig } from '../config/types';
import { ErrorCode, getErrorMessage } from '../errors/error-codes';
import { ReforgeError } from '../errors/reforge-error';

/**
 * CLI Error class
 */
export class CLIError extends Error {
  public readonly code: ErrorCode;
  public readonly flag?: string;

  constructor(message: string, flag?: string) {
    super(`${getErrorMessage(ErrorCode.E105_INVALID_ARGUMENT)}: ${message}`);
    this.name = 'CLIError';
    this.code = ErrorCode.E105_INVALID_ARGUMENT;
    this.flag = flag;
    Object.setPrototypeOf(this, CLIError.prototype);
  }
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Positional source files (files mode) */
  files: string[];
  configPath?: string;
  /** Flags expressed in config-file shape; merged over the file */
  cli: FileConfig;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

const BOOLEAN_FLAGS = new Map<string, 'all_features' | 'no_default_features' | 'workspace' | 'release'>([
  ['--all-features', 'all_features'],
  ['--no-default-features', 'no_default_features'],
  ['--workspace', 'workspace'],
  ['--release', 'release'],
]);

const LIST_FLAGS = new Map<string, 'watch' | 'ignore' | 'include_ext' | 'exclude_ext' | 'features'>([
  ['--watch', 'watch'],
  ['-w', 'watch'],
  ['--ignore', 'ignore'],
  ['-i', 'ignore'],
  ['--include-ext', 'include_ext'],
  ['--exclude-ext', 'exclude_ext'],
  ['--features', 'features'],
  ['-F', 'features'],
]);

const STRING_FLAGS = new Map<string, 'manifest_path' | 'package' | 'bin'>([
  ['--manifest-path', 'manifest_path'],
  ['--package', 'package'],
  ['-p', 'package'],
  ['--bin', 'bin'],
]);

const NUMBER_FLAGS = new Map<string, 'debounce_ms' | 'grace_ms'>([
  ['--debounce-ms', 'debounce_ms'],
  ['--grace-ms', 'grace_ms'],
]);

/** Comma separated values are split; `--features a,b` equals `--features a --features b` */
function splitList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v !== '');
}

function parseBool(flag: string, value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new CLIError(`${flag} expects true or false, got "${value}"`, flag);
}

function parseNonNegativeInt(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CLIError(`${flag} expects a non-negative integer, got "${value}"`, flag);
  }
  return parseInt(value, 10);
}

/**
 * Parse CLI arguments
 *
 * `--build` and `--run` take every following argument up to `--` (or the end)
 * as the command argv.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { files: [], cli: {} };
  const cli = result.cli;
  let i = 0;

  const valueFor = (flag: string): string => {
    const value = args[i + 1];
    if (value === undefined) {
      throw new CLIError(`${flag} requires a value`, flag);
    }
    i++;
    return value;
  };

  const argvFor = (flag: string): string[] => {
    const argv: string[] = [];
    while (i + 1 < args.length && args[i + 1] !== '--') {
      argv.push(args[++i]);
    }
    if (args[i + 1] === '--') {
      i++;
    }
    if (argv.length === 0) {
      throw new CLIError(`${flag} requires a command`, flag);
    }
    return argv;
  };

  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--config' || arg === '-c') {
      result.configPath = valueFor(arg);
    } else if (arg === '--clear') {
      cli.clear = parseBool(arg, valueFor(arg));
    } else if (arg === '--no-clear') {
      cli.clear = false;
    } else if (arg === '--build') {
      cli.build = argvFor(arg);
    } else if (arg === '--run') {
      cli.run = argvFor(arg);
    } else if (BOOLEAN_FLAGS.has(arg)) {
      const key = BOOLEAN_FLAGS.get(arg);
      if (key) cli[key] = true;
    } else if (LIST_FLAGS.has(arg)) {
      const key = LIST_FLAGS.get(arg);
      if (key) {
        const value = valueFor(arg);
        const values = key === 'watch' || key === 'ignore' ? [value] : splitList(value);
        cli[key] = [...(cli[key] ?? []), ...values];
      }
    } else if (STRING_FLAGS.has(arg)) {
      const key = STRING_FLAGS.get(arg);
      if (key) cli[key] = valueFor(arg);
    } else if (NUMBER_FLAGS.has(arg)) {
      const key = NUMBER_FLAGS.get(arg);
      if (key) cli[key] = parseNonNegativeInt(arg, valueFor(arg));
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new CLIError(`unknown option ${arg}`, arg);
    } else {
      result.files.push(arg);
    }
    i++;
  }

  return result;
}

/**
 * Refuse to start inside a process reforge itself launched.
 */
export function assertNotNested(env: NodeJS.ProcessEnv): void {
  if (env[ACTIVE_ENV_VAR]) {
    throw new ReforgeError(ErrorCode.E403_RECURSIVE_SESSION, `${ACTIVE_ENV_VAR}=${env[ACTIVE_ENV_VAR]}`);
  }
}
