/**
 * Isolation Groups
 *
 * A run process is spawned as the root of its own group so that the whole
 * subtree it creates can be terminated through one identity.
 *
 * - POSIX: a dedicated process group (detached spawn), signalled via -pgid
 * - Windows: taskkill /T over the root and its recorded descendants
 */

import { execFile, spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import type { RunPlan } from '../config/types';
import { ErrorCode } from '../errors/error-codes';
import { ReforgeError, describeError } from '../errors/reforge-error';
import type { ReloadLogger } from '../logging/reload-logger';
import type { ExitStatus } from '../utils/command-runner';

const execFileAsync = promisify(execFile);

export type TerminationMode = 'graceful' | 'force';

/**
 * Root of a spawned group
 */
export interface GroupProcess {
  readonly pid: number;
  readonly groupId: number;
  /** Resolves when the root process exits */
  readonly exited: Promise<ExitStatus>;
}

export interface IsolationGroup {
  readonly kind: string;
  /** Rejects with E301 when the program cannot be started */
  spawn(plan: RunPlan, env: NodeJS.ProcessEnv): Promise<GroupProcess>;
  /** Update the known members of the group before a stop */
  refreshMembers(proc: GroupProcess): Promise<void>;
  signal(proc: GroupProcess, mode: TerminationMode): Promise<void>;
  /** True while any member of the group is still alive */
  isAlive(proc: GroupProcess): boolean;
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function spawnRoot(plan: RunPlan, env: NodeJS.ProcessEnv, detached: boolean): Promise<GroupProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(plan.program, [...plan.args], {
      cwd: plan.cwd,
      env,
      stdio: 'inherit',
      detached,
      windowsHide: true,
    });

    const exited = new Promise<ExitStatus>((resolveExit) => {
      child.once('exit', (code, signal) => resolveExit({ code, signal }));
    });

    // Errors after a successful spawn surface through the exit event.
    child.on('error', (error) => {
      reject(new ReforgeError(ErrorCode.E301_SPAWN_FAILED, `${plan.program}: ${error.message}`));
    });

    child.once('spawn', () => {
      if (child.pid === undefined) {
        reject(new ReforgeError(ErrorCode.E301_SPAWN_FAILED, `${plan.program}: no pid assigned`));
        return;
      }
      resolve({ pid: child.pid, groupId: child.pid, exited });
    });
  });
}

/**
 * Members of process group pgid that still run, read from a procfs root.
 * Zombies count as gone.
 */
export function livingGroupMembers(pgid: number, procRoot: string): number[] {
  const living: number[] = [];
  for (const entry of fs.readdirSync(procRoot)) {
    if (!/^\d+$/.test(entry)) {
      continue;
    }
    let stat: string;
    try {
      stat = fs.readFileSync(path.join(procRoot, entry, 'stat'), 'utf-8');
    } catch (error) {
      // exited between readdir and read
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ESRCH') {
        continue;
      }
      throw error;
    }
    // pid (comm) state ppid pgrp ...; comm may contain spaces and parens
    const fields = stat.slice(stat.lastIndexOf(')') + 2).split(' ');
    const state = fields[0];
    if (Number(fields[2]) === pgid && state !== 'Z' && state !== 'X') {
      living.push(Number(entry));
    }
  }
  return living;
}

function defaultProcRoot(): string | null {
  return process.platform === 'linux' && fs.existsSync('/proc/self/stat') ? '/proc' : null;
}

export interface PosixProcessGroupOptions {
  /** procfs mount used for liveness; null falls back to kill(-pgid, 0) */
  procRoot?: string | null;
}

/**
 * POSIX process group: the root is spawned detached, which makes it the
 * leader of a new group whose id equals its pid.
 */
export class PosixProcessGroup implements IsolationGroup {
  readonly kind = 'posix-process-group';
  private readonly procRoot: string | null;

  constructor(options: PosixProcessGroupOptions = {}) {
    this.procRoot = options.procRoot === undefined ? defaultProcRoot() : options.procRoot;
  }

  spawn(plan: RunPlan, env: NodeJS.ProcessEnv): Promise<GroupProcess> {
    return spawnRoot(plan, env, true);
  }

  async refreshMembers(): Promise<void> {
    // the kernel keeps group membership
  }

  async signal(proc: GroupProcess, mode: TerminationMode): Promise<void> {
    try {
      process.kill(-proc.groupId, mode === 'force' ? 'SIGKILL' : 'SIGTERM');
    } catch (error) {
      if (errnoCode(error) !== 'ESRCH') {
        throw error;
      }
    }
  }

  isAlive(proc: GroupProcess): boolean {
    if (this.procRoot !== null) {
      return livingGroupMembers(proc.groupId, this.procRoot).length > 0;
    }
    try {
      process.kill(-proc.groupId, 0);
      return true;
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ESRCH') {
        return false;
      }
      if (code === 'EPERM') {
        return true;
      }
      throw error;
    }
  }
}

/** Runs a program to completion; rejects when it exits nonzero */
export type ExecFile = (file: string, args: string[]) => Promise<{ stdout: string }>;

const execFileHidden: ExecFile = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, { windowsHide: true, maxBuffer: 16 * 1024 * 1024 });
  return { stdout };
};

function pidExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ESRCH') {
      return false;
    }
    if (code === 'EPERM') {
      return true;
    }
    throw error;
  }
}

const LIST_PROCESSES_ARGS = [
  '-NoProfile',
  '-NonInteractive',
  '-Command',
  'Get-CimInstance Win32_Process | ForEach-Object { "$($_.ProcessId) $($_.ParentProcessId)" }',
];

export interface ProcessEntry {
  pid: number;
  ppid: number;
}

/** Parses `<pid> <ppid>` lines */
export function parseProcessTable(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = /^\s*(\d+)\s+(\d+)\s*$/.exec(line);
    if (match) {
      entries.push({ pid: Number(match[1]), ppid: Number(match[2]) });
    }
  }
  return entries;
}

/**
 * Every process below root. Windows does not reparent orphans, so children
 * of an exited root still name it as their parent.
 */
export function descendantsOf(root: number, table: readonly ProcessEntry[]): number[] {
  const found: number[] = [];
  const queue = [root];
  const seen = new Set<number>(queue);
  while (queue.length > 0) {
    const parent = queue.shift();
    for (const entry of table) {
      if (entry.ppid === parent && !seen.has(entry.pid)) {
        seen.add(entry.pid);
        found.push(entry.pid);
        queue.push(entry.pid);
      }
    }
  }
  return found;
}

export interface WindowsTreeGroupOptions {
  exec?: ExecFile;
  /** Liveness of a single pid */
  isRunning?: (pid: number) => boolean;
  logger?: ReloadLogger;
}

/**
 * Windows: no process groups in the POSIX sense. Descendants of the root are
 * recorded from the process table, and taskkill /T is aimed at the root and
 * at every recorded descendant still running. The group is alive while any
 * of them is.
 */
export class WindowsTreeGroup implements IsolationGroup {
  readonly kind = 'windows-process-tree';
  private readonly exec: ExecFile;
  private readonly isRunning: (pid: number) => boolean;
  private readonly logger?: ReloadLogger;
  private readonly members = new Map<number, Set<number>>();

  constructor(options: WindowsTreeGroupOptions = {}) {
    this.exec = options.exec ?? execFileHidden;
    this.isRunning = options.isRunning ?? pidExists;
    this.logger = options.logger;
  }

  spawn(plan: RunPlan, env: NodeJS.ProcessEnv): Promise<GroupProcess> {
    return spawnRoot(plan, env, false);
  }

  async refreshMembers(proc: GroupProcess): Promise<void> {
    let table: ProcessEntry[];
    try {
      const { stdout } = await this.exec('powershell', LIST_PROCESSES_ARGS);
      table = parseProcessTable(stdout);
    } catch (error) {
      this.logger?.logProcess('warn', `could not list descendants of pid ${proc.pid}: ${describeError(error)}`, {
        pid: proc.pid,
      });
      return;
    }
    const known = this.members.get(proc.pid) ?? new Set<number>();
    for (const pid of descendantsOf(proc.pid, table)) {
      known.add(pid);
    }
    this.members.set(proc.pid, known);
  }

  /**
   * Only the forced step fails: a refused graceful taskkill (console
   * programs have no window to close) leaves escalation to the caller.
   */
  async signal(proc: GroupProcess, mode: TerminationMode): Promise<void> {
    await this.refreshMembers(proc);
    for (const pid of [proc.pid, ...this.recorded(proc)]) {
      if (!this.isRunning(pid)) {
        continue;
      }
      const args = ['/PID', String(pid), '/T'];
      if (mode === 'force') {
        args.push('/F');
      }
      try {
        await this.exec('taskkill', args);
      } catch (error) {
        if (!this.isRunning(pid)) {
          continue;
        }
        if (mode === 'force') {
          throw error;
        }
        this.logger?.logProcess('warn', `graceful taskkill of pid ${pid} refused: ${describeError(error)}`, {
          pid,
        });
      }
    }
  }

  isAlive(proc: GroupProcess): boolean {
    if (this.isRunning(proc.pid) || this.recorded(proc).some((pid) => this.isRunning(pid))) {
      return true;
    }
    this.members.delete(proc.pid);
    return false;
  }

  private recorded(proc: GroupProcess): number[] {
    return [...(this.members.get(proc.pid) ?? [])];
  }
}

const POSIX_PLATFORMS: readonly string[] = [
  'aix',
  'android',
  'cygwin',
  'darwin',
  'freebsd',
  'haiku',
  'linux',
  'netbsd',
  'openbsd',
  'sunos',
];

export function createIsolationGroup(
  platform: string = process.platform,
  options: { logger?: ReloadLogger } = {}
): IsolationGroup {
  if (platform === 'win32') {
    return new WindowsTreeGroup({ logger: options.logger });
  }
  if (POSIX_PLATFORMS.includes(platform)) {
    return new PosixProcessGroup();
  }
  throw new ReforgeError(ErrorCode.E303_ISOLATION_UNAVAILABLE, platform);
}
