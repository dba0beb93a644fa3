/**
 * Command Runner
 *
 * Runs one argv command to completion with stdout/stderr forwarded to the
 * parent's own streams. Shared by the hook runner and the build executor.
 */

import { spawn } from 'child_process';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type CommandOutcome =
  | { kind: 'exited'; status: ExitStatus }
  | { kind: 'spawn-error'; message: string };

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Seam for tests: the hook runner and build executor accept any function of
 * this shape.
 */
export type CommandRunner = (argv: readonly string[], options?: CommandOptions) => Promise<CommandOutcome>;

export function isSuccess(status: ExitStatus): boolean {
  return status.code === 0 && status.signal === null;
}

export function describeStatus(status: ExitStatus): string {
  if (status.signal) {
    return `killed by ${status.signal}`;
  }
  return `exit status ${status.code ?? 'unknown'}`;
}

export const runCommand: CommandRunner = (argv, options = {}) => {
  if (argv.length === 0) {
    return Promise.resolve({ kind: 'spawn-error', message: 'command argv is empty' });
  }
  const [program, ...args] = argv;

  return new Promise((resolve) => {
    let settled = false;
    const settle = (outcome: CommandOutcome) => {
      if (!settled) {
        settled = true;
        resolve(outcome);
      }
    };

    const child = spawn(program, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'inherit', 'inherit'],
    });

    child.once('error', (error) => {
      settle({ kind: 'spawn-error', message: `${program}: ${error.message}` });
    });

    child.once('close', (code, signal) => {
      settle({ kind: 'exited', status: { code, signal } });
    });
  });
};
