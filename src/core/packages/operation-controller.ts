/**
 * Operation Controller
 *
 * Public command surface for one package: install, refresh, remove, cancel
 * and channel selection. Each command checks its preconditions against the
 * current record, issues the daemon request, records the returned change id
 * and follows the change to a terminal state.
 */

import type { ChannelInfo, PackageRecord } from '../../types/index.js';
import { selectedChannelInfo } from './package-record.js';
import type { DaemonClient } from '../daemon/daemon-client.js';
import type { InstalledPackagesInvalidator } from './installed-packages.js';
import type { FollowOptions, PackageHandle } from './package-state-store.js';
import { PreconditionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface OperationControllerDeps {
  daemon: DaemonClient;
  installed: InstalledPackagesInvalidator;
}

type ChannelAction = 'install' | 'refresh';

export class OperationController {
  constructor(
    private readonly handle: PackageHandle,
    private readonly deps: OperationControllerDeps
  ) {}

  get name(): string {
    return this.handle.name;
  }

  /**
   * Installs the package from the selected channel.
   */
  install(): Promise<void> {
    return this.runChannelAction('install');
  }

  /**
   * Refreshes the package to the selected channel's revision.
   */
  refresh(): Promise<void> {
    return this.runChannelAction('refresh');
  }

  /**
   * Removes the package. Only needs a loaded record; catalog data is not required.
   */
  async remove(): Promise<void> {
    this.requireLoaded('remove');
    await this.startAndFollow('remove', () => this.deps.daemon.remove(this.name), {
      rebuild: true,
      recordFailure: false
    });
    this.deps.installed.invalidate();
  }

  /**
   * Aborts the active change, if any. The abort is followed without a
   * rebuild; the aborted change's own watcher handles that.
   */
  async cancel(): Promise<void> {
    const record = this.requireCatalog('abort an action on');
    const changeIdToAbort = record.activeChangeId;
    if (!changeIdToAbort) {
      return;
    }

    const entry = this.handle.entry;
    logger.debug(`Aborting change ${changeIdToAbort} for ${this.name}`);
    const { id } = await this.deps.daemon.abortChange(changeIdToAbort);
    entry.setActiveChange(id);
    await entry.follow(id, { rebuild: false, recordFailure: false });
  }

  /**
   * Changes the selected channel. Local only; nothing is sent to the daemon.
   */
  selectChannel(channel: string): void {
    const record = this.requireCatalog('change the channel of');
    if (!record.catalogInfo?.channels[channel]) {
      throw new PreconditionError(`Channel '${channel}' is not available for '${this.name}'`, {
        packageName: this.name,
        channel,
        available: Object.keys(record.catalogInfo?.channels ?? {})
      });
    }
    this.handle.entry.update(current => ({ ...current, selectedChannel: channel }));
  }

  private async runChannelAction(action: ChannelAction): Promise<void> {
    const record = this.requireCatalog(action);
    const channel = this.requireChannel(record);
    const classic = channel.confinement === 'classic';
    const daemon = this.deps.daemon;

    await this.startAndFollow(action, () => action === 'install'
      ? daemon.install(this.name, record.selectedChannel, classic)
      : daemon.refresh(this.name, record.selectedChannel, classic), {
      rebuild: true,
      recordFailure: true
    });
  }

  /**
   * Issue a change-starting daemon request, record its change id and
   * follow the change. The package counts as busy from the request on.
   */
  private async startAndFollow(
    action: string,
    start: () => Promise<string>,
    options: FollowOptions
  ): Promise<void> {
    const entry = this.handle.entry;
    entry.beginRequest(action);
    let changeId: string;
    try {
      changeId = await start();
      logger.debug(`${action} of ${this.name} started change ${changeId}`);
      entry.setActiveChange(changeId);
    } finally {
      entry.endRequest();
    }
    await entry.follow(changeId, options);
  }

  private requireLoaded(action: string): PackageRecord {
    const state = this.handle.state;
    if (state.status !== 'data') {
      throw new PreconditionError(`The package must be loaded before you ${action} it`, {
        packageName: this.name,
        state: state.status
      });
    }
    return state.value;
  }

  private requireCatalog(action: string): PackageRecord {
    const state = this.handle.state;
    if (state.status !== 'data' || !state.value.catalogInfo) {
      throw new PreconditionError(`'${this.name}' must be loaded from the catalog before you ${action} it`, {
        packageName: this.name,
        state: state.status
      });
    }
    return state.value;
  }

  private requireChannel(record: PackageRecord): ChannelInfo {
    const channel = selectedChannelInfo(record);
    if (!channel) {
      throw new PreconditionError(`Invalid channel '${record.selectedChannel}' for '${this.name}'`, {
        packageName: this.name,
        channel: record.selectedChannel
      });
    }
    return channel;
  }
}
