#!/usr/bin/env node
/**
 * reforge - CLI Entry Point
 *
 * Usage:
 *   reforge [options]                 Watch the cargo project in the current directory
 *   reforge [options] <file.rs>...    Compile and run the given files directly
 */

import * as fs from 'fs';
import * as path from 'path';
import { resolveSessionConfig } from '../config/config-loader';
import { ReforgeError, describeError } from '../errors/reforge-error';
import { ConsoleSink } from '../logging/console-sink';
import { ReloadLogger, getReloadLogger } from '../logging/reload-logger';
import { WatchSession } from '../session/watch-session';
import { CLIError, ParsedArgs, assertNotNested, parseArgs } from './cli-interface';

/**
 * Help text
 */
export const HELP_TEXT = `
reforge - rebuild and restart on change

Usage:
  reforge [options]                 Watch the cargo project in the current directory
  reforge [options] <file.rs>...    Compile the given files with rustc and run the result

Watching:
  -w, --watch <path>           Path to watch (repeatable; default: src, Cargo.toml, Cargo.lock)
  -i, --ignore <glob>          Ignore glob (repeatable; default: **/target/**, **/.git/**)
  --include-ext <ext,...>      Extensions that trigger a rebuild (default: rs,toml)
  --exclude-ext <ext,...>      Extensions that never trigger a rebuild
  --debounce-ms <ms>           Quiet period before a rebuild (default: 250)

Build and run:
  --build <argv...> [--]       Build command instead of cargo build
  --run <argv...> [--]         Run command instead of the built binary
  --manifest-path <path>       Path to Cargo.toml
  -p, --package <name>         Package to build
  --bin <name>                 Binary to build and run
  -F, --features <f,...>       Features to enable (repeatable)
  --all-features               Enable all features
  --no-default-features        Disable default features
  --workspace                  Build the whole workspace
  --release                    Build in release mode
  --grace-ms <ms>              Time a process gets to exit before it is killed (default: 5000)
  --clear <true|false>         Clear the screen before each run (default: true)
  --no-clear                   Same as --clear false

General:
  -c, --config <path>          Config file (default: .reforge.yaml)
  --verbose                    Log debug detail
  -h, --help                   Show this help
  -v, --version                Show version

Hooks (pre_build, post_build, pre_run, post_run, on_build_fail) are set in the
config file as lists of argv lists.
`;

/**
 * Version - read from package.json
 */
export function readVersion(packageJsonPath: string = path.join(__dirname, '..', '..', 'package.json')): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    process.stderr.write(`reforge: could not read version: ${describeError(error)}\n`);
  }
  return 'unknown';
}

export interface StoppableSession {
  stop(): Promise<void>;
  forceStop(): Promise<void>;
}

/**
 * SIGINT/SIGTERM handler. The first signal stops the session in order; a
 * second one kills the run process and exits without waiting for the
 * in-flight build.
 */
export function createSignalHandler(
  session: StoppableSession,
  logger: ReloadLogger,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  let received = 0;
  return () => {
    received++;
    if (received === 1) {
      logger.log('info', 'STATE', 'shutting down (signal again to force)');
      session.stop().catch((error: unknown) => {
        logger.logError('shutdown failed', error);
      });
      return;
    }
    if (received === 2) {
      logger.log('warn', 'STATE', 'forcing exit');
      session.forceStop().then(
        () => exit(130),
        (error: unknown) => {
          logger.logError('forced stop failed', error);
          exit(130);
        }
      );
    }
  };
}

/**
 * Start a watch session and keep it running until a signal or fatal error.
 * Resolves with the process exit code.
 */
async function runSession(parsed: ParsedArgs): Promise<number> {
  const logger = getReloadLogger();
  logger.subscribe(new ConsoleSink({ level: parsed.verbose ? 'debug' : 'info' }));

  const config = resolveSessionConfig({
    cwd: process.cwd(),
    cli: parsed.cli,
    files: parsed.files,
    configPath: parsed.configPath,
    logger,
  });

  const session = new WatchSession(config, { logger });

  const shutdown = createSignalHandler(session, logger);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await session.start();
  await session.done();
  return 0;
}

/**
 * Main entry point
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof CLIError) {
      process.stderr.write(`reforge: ${error.message}\n`);
      process.stderr.write(HELP_TEXT);
      return 2;
    }
    throw error;
  }

  if (parsed.help) {
    process.stdout.write(HELP_TEXT);
    return 0;
  }
  if (parsed.version) {
    process.stdout.write(`${readVersion()}\n`);
    return 0;
  }

  try {
    assertNotNested(process.env);
    return await runSession(parsed);
  } catch (error) {
    if (error instanceof ReforgeError) {
      process.stderr.write(`reforge: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`reforge: fatal error: ${describeError(err)}\n`);
      process.exit(1);
    }
  );
}
