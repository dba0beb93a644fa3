/**
 * Config Loader
 *
 * Precedence (lowest first): defaults, .reforge.yaml, CLI flags.
 * A field set in a higher layer replaces the lower one wholesale.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import * as micromatch from 'micromatch';
import { ReforgeError, describeError } from '../errors/reforge-error';
import { ErrorCode } from '../errors/error-codes';
import type { ReloadLogger } from '../logging/reload-logger';
import {
  Argv,
  BuildPlan,
  CARGO_WATCH_DEFAULTS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_GRACE_MS,
  DEFAULT_IGNORE,
  DEFAULT_INCLUDE_EXT,
  FileConfig,
  HOOK_NAMES,
  HookSpec,
  HookSpecs,
  RunSpec,
  SessionConfig,
  emptyHooks,
} from './types';

// =============================================================================
// Validation
// =============================================================================

const STRING_LIST_KEYS = ['watch', 'ignore', 'include_ext', 'exclude_ext', 'features', 'build', 'run'] as const;
const STRING_KEYS = ['manifest_path', 'package', 'bin'] as const;
const BOOLEAN_KEYS = ['clear', 'all_features', 'no_default_features', 'workspace', 'release'] as const;
const NUMBER_KEYS = ['debounce_ms', 'grace_ms'] as const;

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function schemaError(source: string, key: string, expected: string): ReforgeError {
  return new ReforgeError(ErrorCode.E104_CONFIG_SCHEMA_INVALID, `${source}: "${key}" must be ${expected}`);
}

/**
 * Validate an already-parsed config document. Unknown keys are ignored.
 */
export function validateFileConfig(raw: unknown, source: string): FileConfig {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ReforgeError(ErrorCode.E104_CONFIG_SCHEMA_INVALID, `${source}: top level must be a mapping`);
  }
  const doc = new Map(Object.entries(raw));
  const config: FileConfig = {};

  for (const key of STRING_LIST_KEYS) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (!isStringList(value)) throw schemaError(source, key, 'a list of strings');
    config[key] = value;
  }
  for (const key of STRING_KEYS) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'string') throw schemaError(source, key, 'a string');
    config[key] = value;
  }
  for (const key of BOOLEAN_KEYS) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') throw schemaError(source, key, 'true or false');
    config[key] = value;
  }
  for (const key of NUMBER_KEYS) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw schemaError(source, key, 'a non-negative integer');
    }
    config[key] = value;
  }
  for (const key of HOOK_NAMES) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (!Array.isArray(value) || !value.every(isStringList)) {
      throw schemaError(source, key, 'a list of argv lists');
    }
    config[key] = value;
  }

  return config;
}

// =============================================================================
// Config file
// =============================================================================

export function loadConfigFile(configPath: string): FileConfig {
  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ReforgeError(ErrorCode.E104_CONFIG_SCHEMA_INVALID, `${configPath}: ${describeError(error)}`);
  }
  return validateFileConfig(parsed, configPath);
}

/**
 * Load the project config file.
 *
 * An explicit path that does not exist is an error. Otherwise a broken file
 * is reported and skipped, and the session runs on defaults plus CLI flags.
 */
export function loadProjectConfig(
  cwd: string,
  explicitPath: string | undefined,
  logger?: ReloadLogger
): FileConfig | undefined {
  const configPath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new ReforgeError(ErrorCode.E101_CONFIG_FILE_NOT_FOUND, configPath);
    }
    return undefined;
  }

  try {
    const config = loadConfigFile(configPath);
    logger?.log('debug', 'CONFIG', `loaded ${configPath}`);
    return config;
  } catch (error) {
    logger?.log('warn', 'CONFIG', `failed to load ${configPath}: ${describeError(error)}`);
    return undefined;
  }
}

// =============================================================================
// Merge
// =============================================================================

export function mergeConfigs(base: FileConfig, overlay: FileConfig): FileConfig {
  const merged: FileConfig = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

export function normalizeExt(ext: string): string {
  return ext.trim().replace(/^\.+/, '').toLowerCase();
}

export function validateGlobs(globs: string[]): void {
  for (const glob of globs) {
    if (glob.trim() === '') {
      throw new ReforgeError(ErrorCode.E102_INVALID_COMMAND, 'empty ignore glob');
    }
    try {
      micromatch.makeRe(glob);
    } catch (error) {
      throw new ReforgeError(ErrorCode.E102_INVALID_COMMAND, `bad glob "${glob}": ${describeError(error)}`);
    }
  }
}

// =============================================================================
// Plans
// =============================================================================

export function buildCargoArgv(config: FileConfig): Argv {
  const argv = ['cargo', 'build'];
  if (config.release) argv.push('--release');
  if (config.manifest_path) argv.push('--manifest-path', config.manifest_path);
  if (config.workspace) argv.push('--workspace');
  if (config.package) argv.push('-p', config.package);
  if (config.bin) argv.push('--bin', config.bin);
  if (config.all_features) argv.push('--all-features');
  if (config.no_default_features) argv.push('--no-default-features');
  if (config.features && config.features.length > 0) argv.push('--features', config.features.join(','));
  return argv;
}

function requireArgv(argv: Argv, what: string): [string, string[]] {
  const [program, ...args] = argv;
  if (program === undefined || program === '') {
    throw new ReforgeError(ErrorCode.E102_INVALID_COMMAND, `${what} argv is empty`);
  }
  return [program, args];
}

function validateHook(name: string, spec: HookSpec): HookSpec {
  spec.forEach((argv, i) => requireArgv(argv, `${name}[${i}]`));
  return spec.map((argv) => [...argv]);
}

/** Output binary of files mode */
export function filesModeOutput(tmpDir: string = os.tmpdir()): string {
  const name = process.platform === 'win32' ? 'reforge-out.exe' : 'reforge-out';
  return path.join(tmpDir, name);
}

/**
 * Files mode: compile the given sources directly and run the result.
 */
export function filesModeConfig(files: string[], cwd: string, outputPath: string = filesModeOutput()): FileConfig {
  if (files.length === 0) {
    throw new ReforgeError(ErrorCode.E103_INVALID_SOURCE_FILE, 'no files provided');
  }
  for (const file of files) {
    if (path.extname(file) !== '.rs') {
      throw new ReforgeError(ErrorCode.E103_INVALID_SOURCE_FILE, `not a .rs file: ${file}`);
    }
    if (!fs.existsSync(path.resolve(cwd, file))) {
      throw new ReforgeError(ErrorCode.E103_INVALID_SOURCE_FILE, `file does not exist: ${file}`);
    }
  }

  return {
    watch: ['.'],
    include_ext: ['rs'],
    ignore: [...DEFAULT_IGNORE],
    build: ['rustc', ...files, '-o', outputPath],
    run: [outputPath],
    clear: true,
  };
}

// =============================================================================
// Session config
// =============================================================================

export interface ResolveOptions {
  cwd: string;
  cli: FileConfig;
  files?: string[];
  configPath?: string;
  logger?: ReloadLogger;
  /** Overrides the files-mode output location */
  outputPath?: string;
}

/**
 * Resolve the immutable snapshot for one session.
 */
export function resolveSessionConfig(options: ResolveOptions): SessionConfig {
  const { cwd } = options;
  const files = options.files ?? [];
  const filesMode = files.length > 0;

  const merged = filesMode
    ? mergeConfigs(filesModeConfig(files, cwd, options.outputPath), options.cli)
    : mergeConfigs(loadProjectConfig(cwd, options.configPath, options.logger) ?? {}, options.cli);

  const defaultWatch = fs.existsSync(path.join(cwd, 'Cargo.toml')) ? CARGO_WATCH_DEFAULTS : ['.'];
  const ignore = merged.ignore ?? DEFAULT_IGNORE;
  validateGlobs(ignore);

  const hooks: HookSpecs = emptyHooks();
  for (const name of HOOK_NAMES) {
    hooks[name] = validateHook(name, merged[name] ?? []);
  }

  let run: RunSpec = { kind: 'artifact', args: [] };
  if (merged.run) {
    const [program, args] = requireArgv(merged.run, 'run');
    run = { kind: 'command', program, args };
  }

  const [buildProgram, buildArgs] = requireArgv(merged.build ?? buildCargoArgv(merged), 'build');
  const mode = filesMode ? 'direct' : merged.build ? 'override' : 'package';
  const build: BuildPlan = {
    program: buildProgram,
    args: buildArgs,
    workingDir: cwd,
    mode,
    outputPath: filesMode ? merged.run?.[0] : undefined,
    resolveArtifact: run.kind === 'artifact',
  };

  const config: SessionConfig = {
    workingDir: cwd,
    watch: merged.watch ?? defaultWatch,
    ignore,
    includeExt: [...new Set((merged.include_ext ?? DEFAULT_INCLUDE_EXT).map(normalizeExt))],
    excludeExt: [...new Set((merged.exclude_ext ?? []).map(normalizeExt))],
    debounceMs: merged.debounce_ms ?? DEFAULT_DEBOUNCE_MS,
    graceMs: merged.grace_ms ?? DEFAULT_GRACE_MS,
    clear: merged.clear ?? true,
    build,
    run,
    cargo: {
      manifestPath: merged.manifest_path,
      package: merged.package,
      bin: merged.bin,
      release: merged.release ?? false,
    },
    hooks,
  };

  return Object.freeze(config);
}
