/**
 * Watch Session
 *
 * Wires watch source -> debouncer -> orchestrator for one session and owns
 * its shutdown order: stop watching, drop the timer, then let the
 * orchestrator drain and stop the run process.
 */

import type { SessionConfig } from '../config/types';
import { ReforgeError, describeError } from '../errors/reforge-error';
import { ReloadLogger, getReloadLogger } from '../logging/reload-logger';
import { clearScreen } from '../logging/console-sink';
import { CargoArtifactResolver } from '../core/artifact-resolver';
import { BuildExecutor, IBuildExecutor } from '../core/build-executor';
import { Debouncer } from '../core/debouncer';
import { HookRunner, IHookRunner } from '../core/hook-runner';
import { Orchestrator } from '../core/orchestrator';
import { IProcessSupervisor, ProcessTreeSupervisor } from '../process/process-tree-supervisor';
import { ChokidarWatchSource, IWatchSource } from '../watch/watch-source';
import { PathFilter } from '../watch/path-filter';

export interface WatchSessionDeps {
  watchSource?: IWatchSource;
  hookRunner?: IHookRunner;
  buildExecutor?: IBuildExecutor;
  supervisor?: IProcessSupervisor;
  logger?: ReloadLogger;
  /** Defaults to clearing the terminal when config.clear is set */
  beforeStart?: () => void;
}

export class WatchSession {
  readonly config: SessionConfig;
  readonly orchestrator: Orchestrator;
  readonly debouncer: Debouncer;
  private readonly watchSource: IWatchSource;
  private readonly logger: ReloadLogger;
  private started = false;
  private stopPromise: Promise<void> | null = null;
  private fatalError: ReforgeError | null = null;
  private resolveDone: () => void = () => undefined;
  private rejectDone: (error: ReforgeError) => void = () => undefined;
  private readonly donePromise: Promise<void>;

  constructor(config: SessionConfig, deps: WatchSessionDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? getReloadLogger();

    this.watchSource =
      deps.watchSource ??
      new ChokidarWatchSource({
        root: config.workingDir,
        paths: config.watch,
        filter: new PathFilter({
          root: config.workingDir,
          ignore: config.ignore,
          includeExt: config.includeExt,
          excludeExt: config.excludeExt,
        }),
        logger: this.logger,
      });

    const buildExecutor =
      deps.buildExecutor ??
      new BuildExecutor({
        resolver: new CargoArtifactResolver({ cwd: config.workingDir, selection: config.cargo }),
      });

    this.orchestrator = new Orchestrator({
      config,
      hookRunner: deps.hookRunner ?? new HookRunner({ cwd: config.workingDir, logger: this.logger }),
      buildExecutor,
      supervisor: deps.supervisor ?? new ProcessTreeSupervisor({ logger: this.logger }),
      logger: this.logger,
      beforeStart: deps.beforeStart ?? (config.clear ? () => void clearScreen() : undefined),
    });

    this.debouncer = new Debouncer(config.debounceMs);

    this.donePromise = new Promise<void>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
    // done() callers observe the rejection; this keeps an unobserved one quiet
    this.donePromise.catch(() => undefined);
  }

  /**
   * Start watching, then run the initial cycle. Missing watch paths fail
   * before anything is built.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    this.debouncer.onTrigger((trigger) => this.orchestrator.trigger(trigger));
    this.watchSource.onChange((event) => this.debouncer.ingest(event));
    this.watchSource.onError((error) => this.fail(error));

    try {
      await this.watchSource.start();
    } catch (error) {
      await this.orchestrator.shutdown();
      throw error;
    }
    this.orchestrator.trigger();
  }

  /**
   * Resolves after a clean stop; rejects with the fatal error that ended the
   * session otherwise.
   */
  done(): Promise<void> {
    return this.donePromise;
  }

  getFatalError(): ReforgeError | null {
    return this.fatalError;
  }

  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }
    return this.stopPromise;
  }

  /**
   * Kill the run process group without a grace window. Used when the user
   * insists on quitting while a stop is still draining.
   */
  async forceStop(): Promise<void> {
    this.debouncer.dispose();
    await this.orchestrator.killProcesses();
  }

  private async performStop(): Promise<void> {
    try {
      await this.watchSource.close();
    } catch (error) {
      this.logger.logError('closing watcher failed', error);
    }
    this.debouncer.dispose();
    try {
      await this.orchestrator.shutdown();
    } finally {
      if (this.fatalError) {
        this.rejectDone(this.fatalError);
      } else {
        this.resolveDone();
      }
    }
  }

  private fail(error: ReforgeError): void {
    if (this.fatalError) {
      return;
    }
    this.fatalError = error;
    this.logger.log('error', 'WATCH', describeError(error));
    this.stop().catch((stopError: unknown) => {
      this.logger.logError('shutdown after watcher failure', stopError);
    });
  }
}
