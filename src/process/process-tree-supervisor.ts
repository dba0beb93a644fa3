/**
 * Process Tree Supervisor
 *
 * Owns the lifecycle of the run process:
 * - start: spawn the target as root of a fresh isolation group
 * - stop: graceful termination of the whole group, escalated to a forced
 *   kill once the grace window runs out
 * - kill: forced termination of the whole group, no grace window
 * - waitExit: observe the root exiting on its own
 *
 * A stopped handle is only reported as stopped once no member of its group
 * is alive any more.
 */

import { ACTIVE_ENV_VAR, RunPlan } from '../config/types';
import { ErrorCode } from '../errors/error-codes';
import { ReforgeError, describeError } from '../errors/reforge-error';
import type { ReloadLogger } from '../logging/reload-logger';
import { ExitStatus, describeStatus } from '../utils/command-runner';
import { GroupProcess, IsolationGroup, createIsolationGroup } from './isolation-group';

/**
 * One supervised run process. Never mutated in place; a restart replaces it.
 */
export class SupervisedProcess {
  readonly id: number;
  readonly plan: RunPlan;
  readonly startedAt: Date;
  readonly process: GroupProcess;
  private exitStatus: ExitStatus | null = null;

  constructor(id: number, plan: RunPlan, proc: GroupProcess) {
    this.id = id;
    this.plan = plan;
    this.process = proc;
    this.startedAt = new Date();
    void proc.exited.then((status) => {
      this.exitStatus = status;
    });
  }

  get pid(): number {
    return this.process.pid;
  }

  get groupId(): number {
    return this.process.groupId;
  }

  /** Null while the root is running */
  getExitStatus(): ExitStatus | null {
    return this.exitStatus;
  }

  hasExited(): boolean {
    return this.exitStatus !== null;
  }
}

export interface StopResult {
  /** The group was already gone when stop was requested */
  alreadyExited: boolean;
  /** Grace window ran out and the group was force-killed */
  forced: boolean;
  durationMs: number;
}

export interface IProcessSupervisor {
  start(plan: RunPlan): Promise<SupervisedProcess>;
  stop(handle: SupervisedProcess, graceMs: number): Promise<StopResult>;
  /** Force-kill the group at once, bypassing the grace window */
  kill(handle: SupervisedProcess): Promise<void>;
  waitExit(handle: SupervisedProcess): Promise<ExitStatus>;
}

export interface ProcessTreeSupervisorOptions {
  group?: IsolationGroup;
  logger?: ReloadLogger;
  /** Extra environment for run processes */
  env?: NodeJS.ProcessEnv;
  pollIntervalMs?: number;
  /** How long to wait for the group to vanish after a forced kill */
  killWaitMs?: number;
}

const DEFAULT_OPTIONS = {
  pollIntervalMs: 25,
  killWaitMs: 2000,
};

export class ProcessTreeSupervisor implements IProcessSupervisor {
  private readonly group: IsolationGroup;
  private readonly logger?: ReloadLogger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly pollIntervalMs: number;
  private readonly killWaitMs: number;
  private readonly stops = new WeakMap<SupervisedProcess, Promise<StopResult>>();
  private nextId = 1;

  constructor(options: ProcessTreeSupervisorOptions = {}) {
    this.group = options.group ?? createIsolationGroup(process.platform, { logger: options.logger });
    this.logger = options.logger;
    this.env = options.env ?? {};
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_OPTIONS.pollIntervalMs;
    this.killWaitMs = options.killWaitMs ?? DEFAULT_OPTIONS.killWaitMs;
  }

  getGroupKind(): string {
    return this.group.kind;
  }

  async start(plan: RunPlan): Promise<SupervisedProcess> {
    const env = { ...process.env, ...this.env, [ACTIVE_ENV_VAR]: '1' };

    let proc: GroupProcess;
    try {
      proc = await this.group.spawn(plan, env);
    } catch (error) {
      if (error instanceof ReforgeError) {
        throw error;
      }
      throw new ReforgeError(ErrorCode.E301_SPAWN_FAILED, `${plan.program}: ${describeError(error)}`);
    }

    const handle = new SupervisedProcess(this.nextId++, plan, proc);
    this.logger?.logProcess('debug', `started pid ${handle.pid} (${this.group.kind} ${handle.groupId})`, {
      pid: handle.pid,
    });
    return handle;
  }

  /**
   * Idempotent: repeated or concurrent calls share one termination, and an
   * already-exited group is reported as such without error.
   */
  stop(handle: SupervisedProcess, graceMs: number): Promise<StopResult> {
    const existing = this.stops.get(handle);
    if (existing) {
      return existing;
    }
    const stopping = this.terminate(handle, graceMs).catch((error: unknown) => {
      this.stops.delete(handle);
      throw error;
    });
    this.stops.set(handle, stopping);
    return stopping;
  }

  async kill(handle: SupervisedProcess): Promise<void> {
    await this.group.refreshMembers(handle.process);
    if (!this.isGroupAlive(handle)) {
      return;
    }
    this.logger?.logProcess('warn', `killing pid ${handle.pid}`, { pid: handle.pid });
    await this.group.signal(handle.process, 'force');
  }

  waitExit(handle: SupervisedProcess): Promise<ExitStatus> {
    return handle.process.exited;
  }

  isGroupAlive(handle: SupervisedProcess): boolean {
    return !handle.hasExited() || this.group.isAlive(handle.process);
  }

  private async terminate(handle: SupervisedProcess, graceMs: number): Promise<StopResult> {
    const startedAt = Date.now();

    await this.group.refreshMembers(handle.process);
    if (!this.isGroupAlive(handle)) {
      return { alreadyExited: true, forced: false, durationMs: 0 };
    }

    this.logger?.logProcess('info', `stopping pid ${handle.pid}`, { pid: handle.pid });
    await this.group.signal(handle.process, 'graceful');

    if (await this.waitForGroupExit(handle, graceMs)) {
      this.logExit(handle);
      return { alreadyExited: false, forced: false, durationMs: Date.now() - startedAt };
    }

    const timeout = new ReforgeError(ErrorCode.E302_TERMINATION_TIMEOUT, `pid ${handle.pid} after ${graceMs}ms`);
    this.logger?.logProcess('warn', `${timeout.message}; forcing`, { pid: handle.pid });
    await this.group.signal(handle.process, 'force');

    if (!(await this.waitForGroupExit(handle, this.killWaitMs))) {
      this.logger?.logProcess('error', `process group ${handle.groupId} still present after forced kill`, {
        pid: handle.pid,
      });
    } else {
      this.logExit(handle);
    }
    return { alreadyExited: false, forced: true, durationMs: Date.now() - startedAt };
  }

  private async waitForGroupExit(handle: SupervisedProcess, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.isGroupAlive(handle)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return false;
      }
      await new Promise((resolve) => setTimeout(resolve, Math.min(this.pollIntervalMs, remaining)));
    }
    return true;
  }

  private logExit(handle: SupervisedProcess): void {
    const status = handle.getExitStatus();
    this.logger?.logProcess('debug', `pid ${handle.pid} stopped (${status ? describeStatus(status) : 'unknown'})`, {
      pid: handle.pid,
    });
  }
}
