/**
 * Hook Runner
 *
 * Executes a HookSpec one step at a time, stopping at the first failure.
 * No parallelism between steps, no retries.
 */

import type { HookSpec } from '../config/types';
import type { ReloadLogger } from '../logging/reload-logger';
import {
  CommandOptions,
  CommandRunner,
  ExitStatus,
  describeStatus,
  isSuccess,
  runCommand,
} from '../utils/command-runner';

export type HookResult =
  | { ok: true; stepsRun: number }
  | {
      ok: false;
      /** Zero-based index of the failing step */
      stepIndex: number;
      argv: string[];
      /** Present when the step ran and exited unsuccessfully */
      status?: ExitStatus;
      /** Present when the step could not be started */
      spawnError?: string;
    };

export interface IHookRunner {
  run(name: string, spec: HookSpec): Promise<HookResult>;
}

export function describeHookFailure(result: Extract<HookResult, { ok: false }>): string {
  if (result.spawnError) {
    return result.spawnError;
  }
  return result.status ? describeStatus(result.status) : 'unknown failure';
}

export class HookRunner implements IHookRunner {
  private readonly runner: CommandRunner;
  private readonly options: CommandOptions;
  private readonly logger?: ReloadLogger;

  constructor(options: CommandOptions & { runner?: CommandRunner; logger?: ReloadLogger } = {}) {
    const { runner, logger, ...commandOptions } = options;
    this.runner = runner ?? runCommand;
    this.logger = logger;
    this.options = commandOptions;
  }

  async run(name: string, spec: HookSpec): Promise<HookResult> {
    for (let i = 0; i < spec.length; i++) {
      const argv = spec[i];
      if (argv.length === 0) {
        return { ok: false, stepIndex: i, argv, spawnError: 'hook argv is empty' };
      }

      this.logger?.log('debug', 'HOOK', `${name}[${i}]: ${argv.join(' ')}`);
      const outcome = await this.runner(argv, this.options);
      if (outcome.kind === 'spawn-error') {
        return { ok: false, stepIndex: i, argv, spawnError: outcome.message };
      }
      if (!isSuccess(outcome.status)) {
        return { ok: false, stepIndex: i, argv, status: outcome.status };
      }
    }
    return { ok: true, stepsRun: spec.length };
  }
}
