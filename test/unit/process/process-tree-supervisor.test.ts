/**
 * Tests for ProcessTreeSupervisor against an in-memory isolation group
 */

import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import type { RunPlan } from '../../../src/config/types';
import { ErrorCode } from '../../../src/errors/error-codes';
import { ReforgeError } from '../../../src/errors/reforge-error';
import { ReloadLogger } from '../../../src/logging/reload-logger';
import { ProcessTreeSupervisor } from '../../../src/process/process-tree-supervisor';
import { FakeIsolationGroup } from '../../helpers/fake-isolation-group';

const PLAN: RunPlan = { program: 'server', args: ['--port', '0'], cwd: '/work' };

describe('ProcessTreeSupervisor', () => {
  let group: FakeIsolationGroup;
  let logger: ReloadLogger;
  let supervisor: ProcessTreeSupervisor;

  beforeEach(() => {
    group = new FakeIsolationGroup();
    logger = new ReloadLogger();
    supervisor = new ProcessTreeSupervisor({ group, logger, pollIntervalMs: 1, killWaitMs: 50 });
  });

  describe('start', () => {
    it('should spawn the plan in a new group with the active marker set', async () => {
      const handle = await supervisor.start(PLAN);

      assert.equal(handle.id, 1);
      assert.equal(handle.pid, 1000);
      assert.equal(handle.groupId, 1000);
      assert.equal(handle.plan, PLAN);
      assert.equal(handle.hasExited(), false);

      const member = group.member(handle.pid);
      assert.equal(member.env.REFORGE_ACTIVE, '1');
      assert.equal(member.plan, PLAN);
    });

    it('should merge extra environment', async () => {
      const withEnv = new ProcessTreeSupervisor({ group, env: { APP_MODE: 'test' } });

      const handle = await withEnv.start(PLAN);

      assert.equal(group.member(handle.pid).env.APP_MODE, 'test');
    });

    it('should wrap spawn failures as E301', async () => {
      group.nextSpawnError = new Error('spawn server ENOENT');

      await assert.rejects(supervisor.start(PLAN), (err: unknown) => {
        assert.ok(err instanceof ReforgeError);
        assert.equal(err.code, ErrorCode.E301_SPAWN_FAILED);
        assert.equal(err.message, '[E301] Run process could not be spawned: server: spawn server ENOENT');
        return true;
      });
    });

    it('should pass ReforgeErrors through unchanged', async () => {
      const original = new ReforgeError(ErrorCode.E301_SPAWN_FAILED, 'server: EACCES');
      group.nextSpawnError = original;

      await assert.rejects(supervisor.start(PLAN), (err: unknown) => err === original);
    });
  });

  describe('stop', () => {
    it('should stop a group that honours the graceful signal', async () => {
      const handle = await supervisor.start(PLAN);

      const result = await supervisor.stop(handle, 100);

      assert.equal(result.alreadyExited, false);
      assert.equal(result.forced, false);
      assert.deepEqual(group.member(handle.pid).signals, ['graceful']);
      assert.deepEqual(handle.getExitStatus(), { code: null, signal: 'SIGTERM' });
    });

    it('should force-kill a root that ignores the graceful signal', async () => {
      group.nextBehavior = { rootIgnoresGraceful: true };
      const handle = await supervisor.start(PLAN);

      const result = await supervisor.stop(handle, 30);

      assert.equal(result.forced, true);
      assert.ok(result.durationMs >= 30);
      assert.deepEqual(group.member(handle.pid).signals, ['graceful', 'force']);
      assert.equal(group.aliveCount(), 0);

      const warning = logger.getByCategory('PROCESS').find((e) => e.level === 'warn');
      assert.equal(
        warning?.message,
        '[E302] Process group did not exit within the grace window: pid 1000 after 30ms; forcing'
      );
    });

    it('should not report stopped while a descendant survives the root', async () => {
      group.nextBehavior = { withDescendant: true, descendantIgnoresGraceful: true };
      const handle = await supervisor.start(PLAN);

      const result = await supervisor.stop(handle, 30);

      const member = group.member(handle.pid);
      assert.equal(result.forced, true);
      assert.equal(member.rootAlive, false);
      assert.equal(member.descendantAlive, false);
      assert.deepEqual(member.signals, ['graceful', 'force']);
    });

    it('should kill a cooperative descendant with the graceful signal', async () => {
      group.nextBehavior = { withDescendant: true };
      const handle = await supervisor.start(PLAN);

      const result = await supervisor.stop(handle, 100);

      assert.equal(result.forced, false);
      assert.equal(group.member(handle.pid).descendantAlive, false);
    });

    it('should report a group that already exited', async () => {
      const handle = await supervisor.start(PLAN);
      group.member(handle.pid).exit({ code: 0, signal: null });
      await supervisor.waitExit(handle);

      const result = await supervisor.stop(handle, 100);

      assert.deepEqual(result, { alreadyExited: true, forced: false, durationMs: 0 });
      assert.deepEqual(group.member(handle.pid).signals, []);
    });

    it('should still stop descendants left behind by an exited root', async () => {
      group.nextBehavior = { withDescendant: true };
      const handle = await supervisor.start(PLAN);
      group.member(handle.pid).exit({ code: 1, signal: null });
      await supervisor.waitExit(handle);

      const result = await supervisor.stop(handle, 100);

      assert.equal(result.alreadyExited, false);
      assert.deepEqual(group.member(handle.pid).signals, ['graceful']);
      assert.equal(group.aliveCount(), 0);
    });

    it('should share one termination between concurrent calls', async () => {
      const handle = await supervisor.start(PLAN);

      const [a, b] = await Promise.all([supervisor.stop(handle, 100), supervisor.stop(handle, 100)]);

      assert.equal(a, b);
      assert.deepEqual(group.member(handle.pid).signals, ['graceful']);
    });

    it('should be a no-op on a second stop', async () => {
      const handle = await supervisor.start(PLAN);
      const first = await supervisor.stop(handle, 100);

      const second = await supervisor.stop(handle, 100);

      assert.equal(second, first);
      assert.deepEqual(group.member(handle.pid).signals, ['graceful']);
    });

    it('should allow a retry after a failed stop', async () => {
      const handle = await supervisor.start(PLAN);
      group.signalError = new Error('EPERM');

      await assert.rejects(supervisor.stop(handle, 100), /EPERM/);

      group.signalError = null;
      const result = await supervisor.stop(handle, 100);
      assert.equal(result.forced, false);
      assert.equal(group.aliveCount(), 0);
    });
  });

  describe('kill', () => {
    it('should skip the graceful signal', async () => {
      group.nextBehavior = { rootIgnoresGraceful: true, withDescendant: true, descendantIgnoresGraceful: true };
      const handle = await supervisor.start(PLAN);

      await supervisor.kill(handle);

      assert.deepEqual(group.member(handle.pid).signals, ['force']);
      assert.equal(group.aliveCount(), 0);
    });

    it('should leave an exited group alone', async () => {
      const handle = await supervisor.start(PLAN);
      group.member(handle.pid).exit({ code: 0, signal: null });
      await supervisor.waitExit(handle);

      await supervisor.kill(handle);

      assert.deepEqual(group.member(handle.pid).signals, []);
    });
  });

  describe('waitExit', () => {
    it('should resolve with the exit status of the root', async () => {
      const handle = await supervisor.start(PLAN);

      group.member(handle.pid).exit({ code: 3, signal: null });

      assert.deepEqual(await supervisor.waitExit(handle), { code: 3, signal: null });
    });
  });
});
