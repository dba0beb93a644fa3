/**
 * Build Executor
 *
 * Runs one build command to completion and classifies the outcome purely by
 * exit status. After a successful build the artifact is located: the known
 * output path in direct mode, the artifact resolver otherwise (when the run
 * command is the artifact).
 */

import type { BuildPlan } from '../config/types';
import { ErrorCode } from '../errors/error-codes';
import { CommandRunner, ExitStatus, describeStatus, isSuccess, runCommand } from '../utils/command-runner';
import type { IArtifactResolver } from './artifact-resolver';

export interface Artifact {
  path: string;
}

export type BuildFailure =
  | { kind: 'exit'; status: ExitStatus }
  | { kind: 'spawn'; message: string }
  | { kind: 'resolver-miss'; message: string };

export type BuildResult =
  | { success: true; artifact: Artifact | null; durationMs: number }
  | { success: false; failure: BuildFailure; durationMs: number };

export interface IBuildExecutor {
  build(plan: BuildPlan): Promise<BuildResult>;
}

export function describeBuildFailure(failure: BuildFailure): string {
  switch (failure.kind) {
    case 'exit':
      return describeStatus(failure.status);
    case 'spawn':
      return `could not start build: ${failure.message}`;
    case 'resolver-miss':
      return `artifact not found: ${failure.message}`;
  }
}

export function buildFailureCode(failure: BuildFailure): ErrorCode {
  switch (failure.kind) {
    case 'exit':
      return ErrorCode.E202_BUILD_FAILED;
    case 'spawn':
      return ErrorCode.E204_BUILD_SPAWN_FAILED;
    case 'resolver-miss':
      return ErrorCode.E203_ARTIFACT_NOT_FOUND;
  }
}

export interface BuildExecutorOptions {
  resolver?: IArtifactResolver;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export class BuildExecutor implements IBuildExecutor {
  private readonly resolver?: IArtifactResolver;
  private readonly runner: CommandRunner;
  private readonly env?: NodeJS.ProcessEnv;

  constructor(options: BuildExecutorOptions = {}) {
    this.resolver = options.resolver;
    this.runner = options.runner ?? runCommand;
    this.env = options.env;
  }

  async build(plan: BuildPlan): Promise<BuildResult> {
    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;

    const outcome = await this.runner([plan.program, ...plan.args], {
      cwd: plan.workingDir,
      env: this.env,
    });

    if (outcome.kind === 'spawn-error') {
      return { success: false, failure: { kind: 'spawn', message: outcome.message }, durationMs: elapsed() };
    }
    if (!isSuccess(outcome.status)) {
      return { success: false, failure: { kind: 'exit', status: outcome.status }, durationMs: elapsed() };
    }

    if (plan.mode === 'direct' && plan.outputPath) {
      return { success: true, artifact: { path: plan.outputPath }, durationMs: elapsed() };
    }
    if (!plan.resolveArtifact) {
      return { success: true, artifact: null, durationMs: elapsed() };
    }
    if (!this.resolver) {
      return {
        success: false,
        failure: { kind: 'resolver-miss', message: 'no artifact resolver configured' },
        durationMs: elapsed(),
      };
    }

    const resolution = await this.resolver.resolve();
    if (!resolution.found) {
      return { success: false, failure: { kind: 'resolver-miss', message: resolution.reason }, durationMs: elapsed() };
    }
    return { success: true, artifact: { path: resolution.path }, durationMs: elapsed() };
  }
}
