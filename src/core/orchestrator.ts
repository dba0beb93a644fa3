/**
 * Orchestrator
 *
 * State machine sequencing one reload cycle:
 *
 *   idle -> building -> starting -> restarting -> running -> idle
 *              |            |
 *              v            v
 *           failed -----> idle
 *
 * Within a cycle the phases run strictly in order:
 *   pre_build, build, post_build, pre_run, stop old / start new, post_run
 *
 * Triggers arriving while a cycle is in flight are counted; exactly one more
 * cycle runs once the current one reaches idle.
 * A failure before the restart phase never touches the running process.
 */

import { EventEmitter } from 'events';
import type { HookName, RunPlan, RunSpec, SessionConfig } from '../config/types';
import { ErrorCode } from '../errors/error-codes';
import { ReforgeError, describeError } from '../errors/reforge-error';
import { ReloadLogger, getReloadLogger } from '../logging/reload-logger';
import type { IProcessSupervisor, SupervisedProcess } from '../process/process-tree-supervisor';
import { ExitStatus, describeStatus } from '../utils/command-runner';
import { Artifact, IBuildExecutor, buildFailureCode, describeBuildFailure } from './build-executor';
import type { Trigger } from './debouncer';
import { HookResult, IHookRunner, describeHookFailure } from './hook-runner';

export type OrchestratorState = 'idle' | 'building' | 'failed' | 'starting' | 'restarting' | 'running';

export type CyclePhase = HookName | 'build' | 'stop' | 'start';

export type CycleOutcome =
  | 'replaced'
  | 'build-failed'
  | 'hook-failed'
  | 'spawn-failed'
  | 'stop-failed'
  | 'aborted';

export interface CycleReport {
  cycle: number;
  outcome: CycleOutcome;
  failedPhase?: CyclePhase;
  code?: ErrorCode;
  reason?: string;
  /** Pid of the process started by this cycle */
  pid?: number;
  /** Number of triggers folded into this cycle */
  triggerCount: number;
  durationMs: number;
}

/**
 * Events emitted by the orchestrator
 */
export interface OrchestratorEvents {
  state: (change: { from: OrchestratorState; to: OrchestratorState; cycle: number }) => void;
  'cycle:complete': (report: CycleReport) => void;
  'process:started': (handle: SupervisedProcess) => void;
  'process:exited': (handle: SupervisedProcess, status: ExitStatus, expected: boolean) => void;
  idle: () => void;
}

export type OrchestratorConfig = Pick<SessionConfig, 'build' | 'run' | 'hooks' | 'graceMs' | 'workingDir'>;

export interface OrchestratorOptions {
  config: OrchestratorConfig;
  hookRunner: IHookRunner;
  buildExecutor: IBuildExecutor;
  supervisor: IProcessSupervisor;
  logger?: ReloadLogger;
  /** Called right before a new run process is started (screen clearing) */
  beforeStart?: () => void;
}

type CycleResult = Omit<CycleReport, 'cycle' | 'durationMs' | 'triggerCount'>;

/**
 * Resolve what to execute for this cycle; null when the run target is a
 * built artifact and the build produced none.
 */
export function resolveRunPlan(run: RunSpec, artifact: Artifact | null, cwd: string): RunPlan | null {
  if (run.kind === 'command') {
    return { program: run.program, args: run.args, cwd };
  }
  if (!artifact) {
    return null;
  }
  return { program: artifact.path, args: run.args, cwd };
}

function codeOf(error: unknown): ErrorCode | undefined {
  return error instanceof ReforgeError ? error.code : undefined;
}

export class Orchestrator extends EventEmitter {
  private readonly config: OrchestratorConfig;
  private readonly hookRunner: IHookRunner;
  private readonly buildExecutor: IBuildExecutor;
  private readonly supervisor: IProcessSupervisor;
  private readonly logger: ReloadLogger;
  private readonly beforeStart?: () => void;

  private state: OrchestratorState = 'idle';
  private current: SupervisedProcess | null = null;
  /** Handle being stopped on purpose; its exit is expected */
  private retiring: SupervisedProcess | null = null;
  private inFlight: Promise<void> | null = null;
  private pendingTriggers = 0;
  private cycleCount = 0;
  private shuttingDown = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: OrchestratorOptions) {
    super();
    this.config = options.config;
    this.hookRunner = options.hookRunner;
    this.buildExecutor = options.buildExecutor;
    this.supervisor = options.supervisor;
    this.logger = options.logger ?? getReloadLogger();
    this.beforeStart = options.beforeStart;
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getCurrent(): SupervisedProcess | null {
    return this.current;
  }

  isPending(): boolean {
    return this.pendingTriggers > 0;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Resolves once no cycle is in flight (pending cycles included)
   */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  /**
   * Request a cycle. Starts one immediately when idle, otherwise marks one
   * as pending.
   */
  trigger(trigger?: Trigger): void {
    if (this.shuttingDown) {
      return;
    }
    if (trigger) {
      this.logger.logTrigger(trigger.eventCount, trigger.paths);
    }
    if (this.inFlight) {
      this.pendingTriggers++;
      this.logger.log('debug', 'TRIGGER', `change during ${this.state}; rebuild queued`, {
        details: { pendingTriggers: this.pendingTriggers },
      });
      return;
    }
    this.inFlight = this.drain();
  }

  /**
   * Let the in-flight cycle finish, drop pending work, then stop the
   * current process group.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  /**
   * Force-kill the current process and any process being retired, without
   * waiting for the in-flight cycle.
   */
  async killProcesses(): Promise<void> {
    this.shuttingDown = true;
    this.pendingTriggers = 0;
    const handles = new Set<SupervisedProcess>();
    for (const handle of [this.retiring, this.current]) {
      if (handle) {
        handles.add(handle);
      }
    }
    for (const handle of handles) {
      await this.supervisor.kill(handle);
    }
  }

  // ===========================================================================
  // Cycle loop
  // ===========================================================================

  private async drain(): Promise<void> {
    let triggerCount = 1;
    try {
      while (!this.shuttingDown) {
        await this.runCycle(triggerCount);
        // Checked and cleared in the same turn that ends the loop, so a
        // trigger can never slip between the last check and inFlight reset.
        if (this.pendingTriggers === 0) {
          break;
        }
        triggerCount = this.pendingTriggers;
        this.pendingTriggers = 0;
      }
    } finally {
      this.inFlight = null;
      this.emitEvent('idle');
    }
  }

  private async runCycle(triggerCount: number): Promise<void> {
    const cycle = ++this.cycleCount;
    const startedAt = Date.now();

    let result: CycleResult;
    try {
      result = await this.executeCycle(cycle);
    } catch (error) {
      this.logger.logError('cycle aborted', error, { cycle });
      result = { outcome: 'aborted', reason: describeError(error) };
    }

    this.transition('idle', cycle);
    this.emitEvent('cycle:complete', {
      cycle,
      triggerCount,
      durationMs: Date.now() - startedAt,
      ...result,
    });
  }

  private async executeCycle(cycle: number): Promise<CycleResult> {
    this.transition('building', cycle);

    const preBuild = await this.runHook('pre_build', cycle);
    if (!preBuild.ok) {
      return this.failBuild(cycle, 'pre_build', ErrorCode.E201_HOOK_FAILED, describeHookFailure(preBuild));
    }

    this.logger.logBuildStart([this.config.build.program, ...this.config.build.args], cycle);
    const build = await this.buildExecutor.build(this.config.build);
    if (!build.success) {
      const reason = describeBuildFailure(build.failure);
      this.logger.logBuildEnd(false, { cycle, durationMs: build.durationMs, reason });
      return this.failBuild(cycle, 'build', buildFailureCode(build.failure), reason);
    }
    this.logger.logBuildEnd(true, { cycle, durationMs: build.durationMs });

    const postBuild = await this.runHook('post_build', cycle);
    if (!postBuild.ok) {
      this.logger.logProcess('info', 'post_build failed; keeping existing process', { cycle });
      return {
        outcome: 'hook-failed',
        failedPhase: 'post_build',
        code: ErrorCode.E201_HOOK_FAILED,
        reason: describeHookFailure(postBuild),
      };
    }

    if (this.shuttingDown) {
      return { outcome: 'aborted', reason: 'shutdown requested' };
    }
    this.transition('starting', cycle);

    const preRun = await this.runHook('pre_run', cycle);
    if (!preRun.ok) {
      return {
        outcome: 'hook-failed',
        failedPhase: 'pre_run',
        code: ErrorCode.E201_HOOK_FAILED,
        reason: describeHookFailure(preRun),
      };
    }

    const plan = resolveRunPlan(this.config.run, build.artifact, this.config.workingDir);
    if (!plan) {
      this.logger.logProcess('error', 'build produced no runnable artifact; keeping existing process', { cycle });
      return {
        outcome: 'spawn-failed',
        failedPhase: 'start',
        code: ErrorCode.E203_ARTIFACT_NOT_FOUND,
        reason: 'no artifact to run',
      };
    }

    if (this.shuttingDown) {
      return { outcome: 'aborted', reason: 'shutdown requested' };
    }
    this.transition('restarting', cycle);

    const previous = this.current;
    if (previous) {
      try {
        await this.retire(previous, cycle);
      } catch (error) {
        this.logger.logError('could not stop previous process; keeping it', error, { cycle });
        return { outcome: 'stop-failed', failedPhase: 'stop', code: codeOf(error), reason: describeError(error) };
      }
    }
    if (this.shuttingDown) {
      return { outcome: 'aborted', reason: 'shutdown requested' };
    }

    this.beforeStart?.();
    let handle: SupervisedProcess;
    try {
      handle = await this.supervisor.start(plan);
    } catch (error) {
      this.logger.logError('run failed', error, { cycle });
      return {
        outcome: 'spawn-failed',
        failedPhase: 'start',
        code: codeOf(error) ?? ErrorCode.E301_SPAWN_FAILED,
        reason: describeError(error),
      };
    }

    this.current = handle;
    this.observeExit(handle);
    this.logger.logProcess('info', `run: ${[plan.program, ...plan.args].join(' ')} (pid ${handle.pid})`, {
      cycle,
      pid: handle.pid,
    });
    this.emitEvent('process:started', handle);
    this.transition('running', cycle);

    const postRun = await this.runHook('post_run', cycle);
    if (!postRun.ok) {
      this.logger.logHookResult('post_run', false, {
        cycle,
        stepIndex: postRun.stepIndex,
        status: describeHookFailure(postRun),
        advisory: true,
      });
    }

    return { outcome: 'replaced', pid: handle.pid };
  }

  /**
   * pre_build or the build failed: report through on_build_fail, leave the
   * process alone.
   */
  private async failBuild(cycle: number, phase: CyclePhase, code: ErrorCode, reason: string): Promise<CycleResult> {
    this.transition('failed', cycle);

    const onFail = await this.runHook('on_build_fail', cycle);
    if (!onFail.ok) {
      this.logger.logHookResult('on_build_fail', false, {
        cycle,
        stepIndex: onFail.stepIndex,
        status: describeHookFailure(onFail),
        advisory: true,
      });
    }

    return {
      outcome: phase === 'build' ? 'build-failed' : 'hook-failed',
      failedPhase: phase,
      code,
      reason,
    };
  }

  private async runHook(name: HookName, cycle: number): Promise<HookResult> {
    const result = await this.hookRunner.run(name, this.config.hooks[name]);
    const advisory = name === 'post_run' || name === 'on_build_fail';
    if (!result.ok && !advisory) {
      this.logger.logHookResult(name, false, {
        cycle,
        stepIndex: result.stepIndex,
        status: describeHookFailure(result),
      });
    }
    return result;
  }

  // ===========================================================================
  // Process ownership
  // ===========================================================================

  private async retire(handle: SupervisedProcess, cycle: number): Promise<void> {
    this.retiring = handle;
    try {
      const result = await this.supervisor.stop(handle, this.config.graceMs);
      if (result.forced) {
        this.logger.logProcess('warn', `pid ${handle.pid} needed a forced kill`, { cycle, pid: handle.pid });
      }
      this.current = null;
    } finally {
      this.retiring = null;
    }
  }

  private observeExit(handle: SupervisedProcess): void {
    this.supervisor.waitExit(handle).then(
      (status) => {
        const expected = handle === this.retiring || handle !== this.current;
        if (!expected) {
          this.logger.logProcess('warn', `process exited (${describeStatus(status)}); waiting for changes`, {
            pid: handle.pid,
          });
        }
        this.emitEvent('process:exited', handle, status, expected);
      },
      (error: unknown) => {
        this.logger.logError(`lost track of pid ${handle.pid}`, error);
      }
    );
  }

  private async performShutdown(): Promise<void> {
    this.shuttingDown = true;
    this.pendingTriggers = 0;

    if (this.inFlight) {
      await this.inFlight;
    }

    const current = this.current;
    if (current) {
      await this.retire(current, this.cycleCount);
    }
    this.logger.log('debug', 'STATE', 'orchestrator shut down');
  }

  private transition(to: OrchestratorState, cycle: number): void {
    const from = this.state;
    if (from === to) {
      return;
    }
    this.state = to;
    this.logger.logStateChange(from, to, cycle);
    this.emitEvent('state', { from, to, cycle });
  }

  private emitEvent<K extends keyof OrchestratorEvents>(event: K, ...args: Parameters<OrchestratorEvents[K]>): boolean {
    return this.emit(event, ...args);
  }
}
