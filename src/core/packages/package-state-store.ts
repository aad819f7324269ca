/**
 * Package State Store
 *
 * One state machine per package name. Entries are created by the first
 * `acquire()` and disposed when the last handle is released; disposal stops
 * every watcher the entry owns. Each entry is the only writer of its record.
 */

import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';
import type { AsyncValue, PackageRecord } from '../../types/index.js';
import type { DaemonClient } from '../daemon/daemon-client.js';
import { ChangeWatcher, type ChangeTarget } from '../changes/change-watcher.js';
import type { UpdateChecker } from './update-checker.js';
import { defaultSelectedChannel } from './package-record.js';
import {
  ChangeFailedError,
  ChangeWatchAbortedError,
  PackageNotFoundError,
  PreconditionError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PackageStateStoreOptions {
  daemon: DaemonClient;
  updates: UpdateChecker;
  watcher?: ChangeWatcher;
  /** Configured default channel, used when nothing is installed */
  defaultChannel?: string;
}

export interface FollowOptions {
  /** Rebuild the record once the change succeeds */
  rebuild: boolean;
  /** On failure, keep the error on the record and rebuild anyway */
  recordFailure: boolean;
}

export class PackageEntry implements ChangeTarget {
  private readonly subject = new BehaviorSubject<AsyncValue<PackageRecord>>({ status: 'loading' });
  private readonly watched = new Set<string>();
  private readonly disposal = new AbortController();
  private generation = 0;
  private currentBuild: Promise<AsyncValue<PackageRecord>> = Promise.resolve({ status: 'loading' });
  private requestPending: string | null = null;
  /** Last change id recorded for this package, whatever the published state */
  private trackedChange?: string;
  private lastChangeError?: ChangeFailedError;

  refCount = 0;

  constructor(
    readonly name: string,
    private readonly options: PackageStateStoreOptions,
    private readonly watcher: ChangeWatcher
  ) {}

  get state(): AsyncValue<PackageRecord> {
    return this.subject.getValue();
  }

  get state$(): Observable<AsyncValue<PackageRecord>> {
    return this.subject.asObservable();
  }

  get disposed(): boolean {
    return this.disposal.signal.aborted;
  }

  /** Change ids this entry currently has a watcher on */
  get watchedChanges(): string[] {
    return [...this.watched];
  }

  /**
   * Settles with the latest build; rejects with its error, or once the
   * entry has been released.
   */
  async ready(): Promise<PackageRecord> {
    for (;;) {
      const build = this.currentBuild;
      const result = await build;
      if (this.disposed) {
        throw new PreconditionError(`Package '${this.name}' was released`, { packageName: this.name });
      }
      if (build !== this.currentBuild) continue;
      const state = this.state;
      if (state.status === 'data') return state.value;
      if (state.status === 'error') throw state.error;
      if (result.status === 'error') throw result.error;
      throw new PreconditionError(`Package '${this.name}' is no longer loaded`);
    }
  }

  rebuild(): Promise<AsyncValue<PackageRecord>> {
    if (this.disposed) {
      return Promise.resolve(this.state);
    }
    const generation = ++this.generation;
    this.subject.next({ status: 'loading' });
    const build = this.build().then(
      (value): Exclude<AsyncValue<PackageRecord>, { status: 'loading' }> => ({ status: 'data', value }),
      (error: unknown): Exclude<AsyncValue<PackageRecord>, { status: 'loading' }> => ({
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      })
    ).then(result => {
      if (generation !== this.generation || this.disposed) {
        return result;
      }
      if (result.status === 'error') {
        logger.debug(`Build of ${this.name} failed`, result.error);
        this.subject.next(result);
        return result;
      }
      // A change recorded while the build was in flight wins over the daemon's list
      const value = this.withTrackedChange(result.value);
      this.trackedChange = value.activeChangeId;
      const published: AsyncValue<PackageRecord> = { status: 'data', value };
      this.subject.next(published);
      return published;
    });
    this.currentBuild = build;
    return build;
  }

  /**
   * Replace the record when one is loaded; no-op otherwise.
   */
  update(mutate: (record: PackageRecord) => PackageRecord): void {
    const state = this.state;
    if (state.status === 'data' && !this.disposed) {
      this.subject.next({ status: 'data', value: mutate(state.value) });
    }
  }

  /**
   * Records the change now running for this package. Kept across rebuilds,
   * including ones in flight, until the change is cleared.
   */
  setActiveChange(changeId: string): void {
    this.trackedChange = changeId;
    this.update(record => ({ ...record, activeChangeId: changeId }));
  }

  clearActiveChange(changeId: string): void {
    if (this.trackedChange === changeId) {
      this.trackedChange = undefined;
    }
    this.update(record => record.activeChangeId === changeId
      ? { ...record, activeChangeId: undefined }
      : record);
  }

  /**
   * Marks a daemon request as outstanding. Rejects while another request
   * or change is in flight for this package.
   */
  beginRequest(action: string): void {
    const active = this.trackedChange ?? this.watchedChanges[0];
    if (this.requestPending || active) {
      throw new PreconditionError(
        `Cannot ${action} '${this.name}': ${active ? `change ${active}` : this.requestPending} is already in progress`,
        { packageName: this.name, activeChangeId: active }
      );
    }
    this.requestPending = action;
    this.lastChangeError = undefined;
  }

  endRequest(): void {
    this.requestPending = null;
  }

  /**
   * Watch a change on behalf of this entry. Failed changes reject; with
   * `recordFailure` the error is kept on the rebuilt record first.
   */
  async follow(changeId: string, options: FollowOptions): Promise<void> {
    this.watched.add(changeId);
    try {
      await this.watcher.watch(this, changeId, {
        rebuild: options.rebuild,
        signal: this.disposal.signal
      });
    } catch (error) {
      if (options.recordFailure && error instanceof ChangeFailedError) {
        this.lastChangeError = error;
        await this.rebuild();
      }
      throw error;
    } finally {
      this.watched.delete(changeId);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.generation++;
    this.disposal.abort();
    this.subject.complete();
  }

  private async build(): Promise<PackageRecord> {
    const { daemon, defaultChannel } = this.options;
    logger.debug(`Building package record for ${this.name}`);

    const local = await daemon.getLocalInfo(this.name);
    if (local.status === 'error') {
      throw local.error;
    }
    const localInfo = local.status === 'found' ? local.value : undefined;

    const catalog = await daemon.getCatalogInfo(this.name);
    if (catalog.status === 'error') {
      if (!localInfo) {
        throw catalog.error;
      }
      logger.debug(`Catalog lookup for ${this.name} failed, continuing with local data`, catalog.error);
    }
    const catalogInfo = catalog.status === 'found' ? catalog.value : undefined;

    const changes = await daemon.listChanges(this.name);
    const pending = changes.filter(change => !change.ready).map(change => change.id);
    const known = this.trackedChange;
    const activeChangeId = known && (pending.includes(known) || this.watched.has(known)) ? known : pending[0];
    if (activeChangeId && !this.disposed && !this.watched.has(activeChangeId)) {
      this.resume(activeChangeId);
    }

    if (!localInfo && !catalogInfo) {
      throw new PackageNotFoundError(this.name);
    }

    // Recomputed on every build; the checker owns any caching
    const hasUpdate = localInfo ? await this.checkUpdate() : false;

    return {
      name: this.name,
      localInfo,
      catalogInfo,
      selectedChannel: defaultSelectedChannel(localInfo, catalogInfo, defaultChannel),
      activeChangeId,
      hasUpdate,
      lastChangeError: this.lastChangeError
    };
  }

  /**
   * The tracked change stays active while this entry still follows it,
   * even when the daemon's change list does not show it yet.
   */
  private withTrackedChange(record: PackageRecord): PackageRecord {
    const tracked = this.trackedChange;
    if (tracked && tracked !== record.activeChangeId && this.watched.has(tracked)) {
      return { ...record, activeChangeId: tracked };
    }
    return record;
  }

  private async checkUpdate(): Promise<boolean> {
    try {
      return await this.options.updates.hasUpdate(this.name);
    } catch (error) {
      logger.warn(`Could not check updates for ${this.name}`, error);
      return false;
    }
  }

  /**
   * Re-attach to a change that was already running when the record was
   * built (e.g. started by an earlier client process).
   */
  private resume(changeId: string): void {
    logger.debug(`Resuming change ${changeId} for ${this.name}`);
    this.follow(changeId, { rebuild: true, recordFailure: true }).catch((error: unknown) => {
      if (error instanceof ChangeWatchAbortedError) {
        logger.debug(`Stopped following change ${changeId}`, error);
      } else {
        logger.warn(`Change ${changeId} for ${this.name} did not complete`, error);
      }
    });
  }
}

/**
 * A reference to a package's state. Release it when done; the entry is
 * disposed once nothing references it.
 */
export class PackageHandle {
  private released = false;

  constructor(
    readonly entry: PackageEntry,
    private readonly onRelease: (entry: PackageEntry) => void
  ) {}

  get name(): string {
    return this.entry.name;
  }

  get state(): AsyncValue<PackageRecord> {
    return this.entry.state;
  }

  get state$(): Observable<AsyncValue<PackageRecord>> {
    return this.entry.state$;
  }

  ready(): Promise<PackageRecord> {
    return this.entry.ready();
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease(this.entry);
  }
}

export class PackageStateStore {
  private readonly entries = new Map<string, PackageEntry>();
  private readonly watcher: ChangeWatcher;
  private readonly updatesSubscription: Subscription;

  constructor(private readonly options: PackageStateStoreOptions) {
    this.watcher = options.watcher ?? new ChangeWatcher(options.daemon);
    this.updatesSubscription = options.updates.changed$.subscribe(() => this.invalidateAll());
  }

  acquire(name: string): PackageHandle {
    let entry = this.entries.get(name);
    if (!entry) {
      entry = new PackageEntry(name, this.options, this.watcher);
      this.entries.set(name, entry);
      void entry.rebuild();
    }
    entry.refCount++;
    return new PackageHandle(entry, released => this.release(released));
  }

  peek(name: string): AsyncValue<PackageRecord> | undefined {
    return this.entries.get(name)?.state;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  async invalidate(name: string): Promise<void> {
    await this.entries.get(name)?.rebuild();
  }

  invalidateAll(): void {
    for (const entry of this.entries.values()) {
      void entry.rebuild();
    }
  }

  dispose(): void {
    this.updatesSubscription.unsubscribe();
    for (const entry of this.entries.values()) {
      entry.dispose();
    }
    this.entries.clear();
  }

  private release(entry: PackageEntry): void {
    entry.refCount--;
    if (entry.refCount <= 0 && this.entries.get(entry.name) === entry) {
      logger.debug(`Disposing package state for ${entry.name}`);
      this.entries.delete(entry.name);
      entry.dispose();
    }
  }
}
