import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { PackageStateStore, type PackageHandle } from '../../../src/core/packages/package-state-store.js';
import { OperationController } from '../../../src/core/packages/operation-controller.js';
import type { InstalledPackagesInvalidator } from '../../../src/core/packages/installed-packages.js';
import { ChangeFailedError, ChangeWatchAbortedError, PreconditionError } from '../../../src/utils/errors.js';
import {
  FakeDaemon,
  StaticUpdateChecker,
  catalogPackage,
  change,
  channel,
  flush,
  localPackage
} from '../../test-helpers.js';

class CountingInvalidator implements InstalledPackagesInvalidator {
  count = 0;

  invalidate(): void {
    this.count++;
  }
}

function activeChange(handle: PackageHandle): string | undefined {
  const state = handle.state;
  return state.status === 'data' ? state.value.activeChangeId : undefined;
}

describe('OperationController', () => {
  let daemon: FakeDaemon;
  let store: PackageStateStore;
  let installed: CountingInvalidator;
  let updates: StaticUpdateChecker;

  beforeEach(() => {
    daemon = new FakeDaemon();
    installed = new CountingInvalidator();
    updates = new StaticUpdateChecker();
    store = new PackageStateStore({ daemon, updates });
  });

  afterEach(() => {
    store.dispose();
  });

  async function controllerFor(name: string): Promise<{ handle: PackageHandle; controller: OperationController }> {
    const handle = store.acquire(name);
    await handle.ready();
    return { handle, controller: new OperationController(handle, { daemon, installed }) };
  }

  describe('install', () => {
    beforeEach(() => {
      daemon.setCatalog(catalogPackage('foo', {
        'latest/stable': channel(),
        'latest/edge': channel({ confinement: 'classic' })
      }));
    });

    it('installs from the selected channel and rebuilds on success', async () => {
      daemon.startedChanges = ['42'];
      const { handle, controller } = await controllerFor('foo');

      const installing = controller.install();
      await flush();
      assert.equal(activeChange(handle), '42');
      assert.deepEqual(daemon.callsTo('install'), [['foo', 'latest/stable', false]]);

      daemon.setInstalled(localPackage('foo'));
      daemon.emit(change('42', { ready: true }));
      await installing;

      const record = await handle.ready();
      assert.equal(record.activeChangeId, undefined);
      assert.equal(record.localInfo?.version, '1.0');
      assert.equal(installed.count, 0);
    });

    it('requests classic confinement when the channel needs it', async () => {
      daemon.startedChanges = ['42'];
      const { controller } = await controllerFor('foo');

      controller.selectChannel('latest/edge');
      const installing = controller.install();
      daemon.emit(change('42', { ready: true }));
      await installing;

      assert.deepEqual(daemon.callsTo('install'), [['foo', 'latest/edge', true]]);
    });

    it('keeps the failure on the rebuilt record', async () => {
      daemon.startedChanges = ['42'];
      const { handle, controller } = await controllerFor('foo');

      const installing = controller.install();
      const outcome = assert.rejects(installing, ChangeFailedError);
      daemon.emit(change('42', { ready: true, error: { message: 'no space left' } }));
      await outcome;

      const record = await handle.ready();
      assert.equal(record.activeChangeId, undefined);
      assert.equal(record.lastChangeError?.changeId, '42');
      assert.equal(record.lastChangeError?.message, 'no space left');
    });

    it('clears a previous failure when the next request starts', async () => {
      daemon.startedChanges = ['42', '43'];
      const { handle, controller } = await controllerFor('foo');

      const failed = controller.install();
      const outcome = assert.rejects(failed, ChangeFailedError);
      daemon.emit(change('42', { ready: true, error: { message: 'no space left' } }));
      await outcome;

      const retry = controller.install();
      daemon.emit(change('43', { ready: true }));
      await retry;

      assert.equal((await handle.ready()).lastChangeError, undefined);
    });

    it('rejects a second action while a request is outstanding', async () => {
      daemon.startedChanges = ['42'];
      const { controller } = await controllerFor('foo');

      const first = controller.install();
      await assert.rejects(controller.install(), PreconditionError);

      daemon.emit(change('42', { ready: true }));
      await first;
      assert.equal(daemon.callsTo('install').length, 1);
    });

    it('rejects a second action while a change is in progress', async () => {
      daemon.startedChanges = ['42'];
      const { controller } = await controllerFor('foo');

      const first = controller.install();
      await flush();
      await assert.rejects(controller.refresh(), (error: unknown) => {
        assert.ok(error instanceof PreconditionError);
        assert.equal(error.message, "Cannot refresh 'foo': change 42 is already in progress");
        return true;
      });

      const outcome = assert.rejects(first, ChangeWatchAbortedError);
      store.dispose();
      await outcome;
    });

    it('keeps the change id when a rebuild overlaps the install request', async () => {
      daemon.startedChanges = ['42', '43'];
      const { handle, controller } = await controllerFor('foo');
      let answer = (): void => undefined;
      daemon.installGate = new Promise<void>(resolve => { answer = () => resolve(); });

      const installing = controller.install();
      const installOutcome = assert.rejects(installing, ChangeFailedError);
      updates.changed.next();
      assert.equal(handle.state.status, 'loading');

      answer();
      await flush();
      assert.equal(activeChange(handle), '42');
      assert.equal((await handle.ready()).activeChangeId, '42');

      const cancelling = controller.cancel();
      await flush();
      assert.deepEqual(daemon.callsTo('abortChange'), [['42']]);

      daemon.emit(change('43', { ready: true }));
      await cancelling;
      daemon.emit(change('42', { ready: true, error: { message: 'change was aborted' } }));
      await installOutcome;
      assert.equal((await handle.ready()).activeChangeId, undefined);
    });

    it('rejects a selected channel the catalog does not offer', async () => {
      daemon.setInstalled(localPackage('foo', { channel: 'latest/beta' }));
      daemon.setCatalog(catalogPackage('foo', { 'latest/beta': channel() }));
      const { handle, controller } = await controllerFor('foo');
      handle.entry.update(record => ({ ...record, catalogInfo: catalogPackage('foo', { 'latest/stable': channel() }) }));

      await assert.rejects(controller.install(), (error: unknown) => {
        assert.ok(error instanceof PreconditionError);
        assert.equal(error.message, "Invalid channel 'latest/beta' for 'foo'");
        return true;
      });
      assert.equal(daemon.callsTo('install').length, 0);
    });
  });

  describe('refresh', () => {
    it('refreshes to the selected channel', async () => {
      daemon.setInstalled(localPackage('foo', { channel: 'latest/stable' }));
      daemon.setCatalog(catalogPackage('foo', { 'latest/stable': channel({ version: '1.1' }) }));
      daemon.startedChanges = ['50'];
      const { handle, controller } = await controllerFor('foo');

      const refreshing = controller.refresh();
      daemon.setInstalled(localPackage('foo', { version: '1.1' }));
      daemon.emit(change('50', { ready: true }));
      await refreshing;

      assert.deepEqual(daemon.callsTo('refresh'), [['foo', 'latest/stable', false]]);
      assert.equal((await handle.ready()).localInfo?.version, '1.1');
    });

    it('needs catalog data', async () => {
      daemon.setInstalled(localPackage('foo'));
      const { controller } = await controllerFor('foo');

      await assert.rejects(controller.refresh(), (error: unknown) => {
        assert.ok(error instanceof PreconditionError);
        assert.equal(error.message, "'foo' must be loaded from the catalog before you refresh it");
        return true;
      });
      assert.equal(daemon.callsTo('refresh').length, 0);
    });
  });

  describe('remove', () => {
    beforeEach(() => {
      daemon.setInstalled(localPackage('foo'));
    });

    it('removes without catalog data and invalidates the installed view', async () => {
      daemon.startedChanges = ['7'];
      const { handle, controller } = await controllerFor('foo');

      const removing = controller.remove();
      daemon.local.delete('foo');
      daemon.setCatalog(catalogPackage('foo'));
      daemon.emit(change('7', { ready: true }));
      await removing;

      assert.deepEqual(daemon.callsTo('remove'), [['foo']]);
      assert.equal(installed.count, 1);
      assert.equal((await handle.ready()).localInfo, undefined);
    });

    it('does not invalidate the installed view when the removal fails', async () => {
      daemon.startedChanges = ['7'];
      const { handle, controller } = await controllerFor('foo');

      const removing = controller.remove();
      const outcome = assert.rejects(removing, (error: unknown) => {
        assert.ok(error instanceof ChangeFailedError);
        assert.equal(error.changeId, '7');
        assert.equal(error.message, 'boom');
        return true;
      });
      daemon.emit(change('7', { ready: true, error: { message: 'boom' } }));
      await outcome;

      assert.equal(installed.count, 0);
      assert.equal(activeChange(handle), undefined);
    });

    it('needs a loaded record', async () => {
      const handle = store.acquire('foo');
      const controller = new OperationController(handle, { daemon, installed });

      await assert.rejects(controller.remove(), PreconditionError);
      await handle.ready();
    });
  });

  describe('cancel', () => {
    beforeEach(() => {
      daemon.setCatalog(catalogPackage('foo'));
    });

    it('does nothing without an active change', async () => {
      const { controller } = await controllerFor('foo');

      await controller.cancel();

      assert.equal(daemon.callsTo('abortChange').length, 0);
    });

    it('aborts the active change and follows the abort without rebuilding', async () => {
      daemon.startedChanges = ['42', '43'];
      const { handle, controller } = await controllerFor('foo');

      const installing = controller.install();
      const installOutcome = assert.rejects(installing, ChangeFailedError);
      await flush();

      const cancelling = controller.cancel();
      await flush();
      assert.deepEqual(daemon.callsTo('abortChange'), [['42']]);
      assert.equal(activeChange(handle), '43');

      const buildsBefore = daemon.callsTo('getLocalInfo').length;
      daemon.emit(change('43', { ready: true }));
      await cancelling;
      assert.equal(daemon.callsTo('getLocalInfo').length, buildsBefore);
      assert.equal(activeChange(handle), undefined);

      daemon.emit(change('42', { ready: true, error: { message: 'change was aborted' } }));
      await installOutcome;
      assert.equal((await handle.ready()).lastChangeError?.changeId, '42');
    });

    it('needs catalog data', async () => {
      daemon.catalog.delete('foo');
      daemon.setInstalled(localPackage('foo'));
      const { controller } = await controllerFor('foo');

      await assert.rejects(controller.cancel(), PreconditionError);
    });
  });

  describe('selectChannel', () => {
    it('updates the record synchronously without calling the daemon', async () => {
      daemon.setCatalog(catalogPackage('foo', { 'latest/stable': channel(), 'latest/edge': channel() }));
      const { handle, controller } = await controllerFor('foo');
      const callsBefore = daemon.calls.length;

      controller.selectChannel('latest/edge');

      const state = handle.state;
      assert.equal(state.status === 'data' ? state.value.selectedChannel : undefined, 'latest/edge');
      assert.equal(daemon.calls.length, callsBefore);
    });

    it('rejects a channel the catalog does not list', async () => {
      daemon.setCatalog(catalogPackage('foo'));
      const { controller } = await controllerFor('foo');

      assert.throws(() => controller.selectChannel('latest/edge'), PreconditionError);
    });

    it('needs catalog data', async () => {
      daemon.setInstalled(localPackage('foo'));
      const { controller } = await controllerFor('foo');

      assert.throws(
        () => controller.selectChannel('latest/stable'),
        { message: "'foo' must be loaded from the catalog before you change the channel of it" }
      );
    });
  });
});
