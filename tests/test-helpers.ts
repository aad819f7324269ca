import { setImmediate } from 'node:timers/promises';
import { Observable, ReplaySubject, Subject } from 'rxjs';
import type {
  CatalogPackageInfo,
  ChangeRecord,
  ChangeSummary,
  ChannelInfo,
  LocalPackageInfo,
  Lookup
} from '../src/types/index.js';
import type { DaemonClient } from '../src/core/daemon/daemon-client.js';
import type { UpdateChecker } from '../src/core/packages/update-checker.js';

/** Let pending promise chains run to completion */
export function flush(): Promise<void> {
  return setImmediate();
}

export function localPackage(name: string, overrides: Partial<LocalPackageInfo> = {}): LocalPackageInfo {
  return {
    name,
    version: '1.0',
    revision: '10',
    channel: 'latest/stable',
    confinement: 'strict',
    ...overrides
  };
}

export function channel(overrides: Partial<ChannelInfo> = {}): ChannelInfo {
  return { version: '1.0', revision: '10', confinement: 'strict', ...overrides };
}

export function catalogPackage(
  name: string,
  channels: Record<string, ChannelInfo> = { 'latest/stable': channel() },
  overrides: Partial<CatalogPackageInfo> = {}
): CatalogPackageInfo {
  return { name, channels, ...overrides };
}

export function change(id: string, overrides: Partial<ChangeRecord> = {}): ChangeRecord {
  return { id, ready: false, tasks: [], ...overrides };
}

export interface DaemonCall {
  method: keyof DaemonClient;
  args: unknown[];
}

/**
 * In-process DaemonClient. Lookups and lists come from plain fields; every
 * change id gets a replaying subject that tests push records into.
 */
export class FakeDaemon implements DaemonClient {
  readonly local = new Map<string, Lookup<LocalPackageInfo>>();
  readonly catalog = new Map<string, Lookup<CatalogPackageInfo>>();
  readonly changes = new Map<string, ChangeSummary[]>();
  installed: LocalPackageInfo[] = [];
  updates: string[] = [];
  /** Change ids returned by install/refresh/remove/abortChange, in order */
  startedChanges: string[] = [];
  /** Errors thrown by the next call of a method */
  readonly failures = new Map<keyof DaemonClient, Error>();
  readonly calls: DaemonCall[] = [];
  /** When set, install requests wait for it before answering */
  installGate?: Promise<void>;

  private readonly streams = new Map<string, ReplaySubject<ChangeRecord>>();
  private readonly watchers = new Map<string, number>();

  setInstalled(info: LocalPackageInfo): void {
    this.local.set(info.name, { status: 'found', value: info });
  }

  setCatalog(info: CatalogPackageInfo): void {
    this.catalog.set(info.name, { status: 'found', value: info });
  }

  /** Push a change record to everyone watching `record.id` */
  emit(record: ChangeRecord): void {
    this.stream(record.id).next(record);
  }

  failStream(id: string, error: Error): void {
    this.stream(id).error(error);
  }

  endStream(id: string): void {
    this.stream(id).complete();
  }

  /** Number of live watchChange subscriptions for a change */
  activeWatchers(id: string): number {
    return this.watchers.get(id) ?? 0;
  }

  callsTo(method: keyof DaemonClient): unknown[][] {
    return this.calls.filter(call => call.method === method).map(call => call.args);
  }

  async getLocalInfo(name: string): Promise<Lookup<LocalPackageInfo>> {
    this.record('getLocalInfo', name);
    return this.local.get(name) ?? { status: 'not-found' };
  }

  async getCatalogInfo(name: string): Promise<Lookup<CatalogPackageInfo>> {
    this.record('getCatalogInfo', name);
    return this.catalog.get(name) ?? { status: 'not-found' };
  }

  async listChanges(name: string): Promise<ChangeSummary[]> {
    this.record('listChanges', name);
    return this.changes.get(name) ?? [];
  }

  async install(name: string, channelName: string, classic: boolean): Promise<string> {
    this.record('install', name, channelName, classic);
    await this.installGate;
    return this.nextChange();
  }

  async refresh(name: string, channelName: string, classic: boolean): Promise<string> {
    this.record('refresh', name, channelName, classic);
    return this.nextChange();
  }

  async remove(name: string): Promise<string> {
    this.record('remove', name);
    return this.nextChange();
  }

  async abortChange(id: string): Promise<{ id: string }> {
    this.record('abortChange', id);
    return { id: this.nextChange() };
  }

  watchChange(id: string): Observable<ChangeRecord> {
    return new Observable<ChangeRecord>(subscriber => {
      this.watchers.set(id, this.activeWatchers(id) + 1);
      const subscription = this.stream(id).subscribe(subscriber);
      return () => {
        this.watchers.set(id, this.activeWatchers(id) - 1);
        subscription.unsubscribe();
      };
    });
  }

  async listInstalled(): Promise<LocalPackageInfo[]> {
    this.record('listInstalled');
    return this.installed;
  }

  async listUpdates(): Promise<string[]> {
    this.record('listUpdates');
    return this.updates;
  }

  private record(method: keyof DaemonClient, ...args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }

  private nextChange(): string {
    const id = this.startedChanges.shift();
    if (id === undefined) {
      throw new Error('FakeDaemon has no change id queued');
    }
    return id;
  }

  private stream(id: string): ReplaySubject<ChangeRecord> {
    let stream = this.streams.get(id);
    if (!stream) {
      stream = new ReplaySubject<ChangeRecord>();
      this.streams.set(id, stream);
    }
    return stream;
  }
}

/**
 * UpdateChecker backed by a fixed set of names.
 */
export class StaticUpdateChecker implements UpdateChecker {
  readonly changed = new Subject<void>();
  readonly changed$ = this.changed.asObservable();
  failure?: Error;

  constructor(public names: string[] = []) {}

  async hasUpdate(name: string): Promise<boolean> {
    if (this.failure) {
      throw this.failure;
    }
    return this.names.includes(name);
  }
}
