/**
 * Tests for HookRunner
 */

import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { HookRunner, describeHookFailure } from '../../../src/core/hook-runner';
import { ReloadLogger } from '../../../src/logging/reload-logger';
import { ScriptedCommandRunner } from '../../helpers/fake-command-runner';

describe('HookRunner', () => {
  let commands: ScriptedCommandRunner;
  let logger: ReloadLogger;
  let hooks: HookRunner;

  beforeEach(() => {
    commands = new ScriptedCommandRunner();
    logger = new ReloadLogger();
    hooks = new HookRunner({ cwd: '/work', runner: commands.run, logger });
  });

  it('should succeed on an empty hook without running anything', async () => {
    const result = await hooks.run('pre_build', []);

    assert.deepEqual(result, { ok: true, stepsRun: 0 });
    assert.equal(commands.calls.length, 0);
  });

  it('should run steps in order in the working directory', async () => {
    const result = await hooks.run('pre_build', [
      ['cargo', 'fmt'],
      ['cargo', 'clippy'],
    ]);

    assert.deepEqual(result, { ok: true, stepsRun: 2 });
    assert.deepEqual(
      commands.calls.map((c) => c.argv),
      [
        ['cargo', 'fmt'],
        ['cargo', 'clippy'],
      ]
    );
    assert.equal(commands.calls[0].options?.cwd, '/work');
  });

  it('should stop at the first failing step', async () => {
    commands.exitWith('check A', 1);

    const result = await hooks.run('pre_build', [
      ['check', 'A'],
      ['check', 'B'],
    ]);

    assert.deepEqual(result, {
      ok: false,
      stepIndex: 0,
      argv: ['check', 'A'],
      status: { code: 1, signal: null },
    });
    assert.equal(commands.count('check B'), 0);
  });

  it('should report a step that cannot be started', async () => {
    commands.failToSpawn('missing-tool', 'missing-tool: spawn missing-tool ENOENT');

    const result = await hooks.run('post_build', [['echo', 'ok'], ['missing-tool']]);

    assert.deepEqual(result, {
      ok: false,
      stepIndex: 1,
      argv: ['missing-tool'],
      spawnError: 'missing-tool: spawn missing-tool ENOENT',
    });
  });

  it('should fail an empty step without spawning', async () => {
    const result = await hooks.run('pre_run', [[]]);

    assert.deepEqual(result, { ok: false, stepIndex: 0, argv: [], spawnError: 'hook argv is empty' });
    assert.equal(commands.calls.length, 0);
  });

  it('should log each step at debug level', async () => {
    await hooks.run('post_run', [['notify', 'done']]);

    const entries = logger.getByCategory('HOOK');
    assert.equal(entries.length, 1);
    assert.equal(entries[0].level, 'debug');
    assert.equal(entries[0].message, 'post_run[0]: notify done');
  });

  it('should run real commands through the default runner', async () => {
    const real = new HookRunner();

    const result = await real.run('pre_build', [
      [process.execPath, '-e', 'process.exit(0)'],
      [process.execPath, '-e', 'process.exit(2)'],
    ]);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.stepIndex, 1);
      assert.deepEqual(result.status, { code: 2, signal: null });
    }
  });
});

describe('describeHookFailure', () => {
  it('should prefer the spawn error', () => {
    assert.equal(describeHookFailure({ ok: false, stepIndex: 0, argv: ['x'], spawnError: 'x: ENOENT' }), 'x: ENOENT');
  });

  it('should describe the exit status', () => {
    assert.equal(
      describeHookFailure({ ok: false, stepIndex: 0, argv: ['x'], status: { code: 4, signal: null } }),
      'exit status 4'
    );
  });
});
