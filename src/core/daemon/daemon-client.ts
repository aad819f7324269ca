/**
 * Daemon Client Port
 *
 * The contract between the operation controller and the package daemon.
 * Core logic receives an implementation at construction time; nothing in
 * core looks one up on its own.
 *
 * Implementations:
 *   - HttpDaemonClient: snapd-style REST API over a Unix socket
 *   - FakeDaemon (tests): in-process change streams
 */

import type { Observable } from 'rxjs';
import type {
  CatalogPackageInfo,
  ChangeRecord,
  ChangeSummary,
  LocalPackageInfo,
  Lookup
} from '../../types/index.js';

export interface DaemonClient {
  /** Installed metadata; `not-found` when the package is not installed */
  getLocalInfo(name: string): Promise<Lookup<LocalPackageInfo>>;

  /** Catalog metadata; `not-found` when the catalog has no such package */
  getCatalogInfo(name: string): Promise<Lookup<CatalogPackageInfo>>;

  /** All changes touching `name`, in daemon order */
  listChanges(name: string): Promise<ChangeSummary[]>;

  install(name: string, channel: string, classic: boolean): Promise<string>;
  refresh(name: string, channel: string, classic: boolean): Promise<string>;
  remove(name: string): Promise<string>;

  /** Ask the daemon to abort a change; resolves with the change tracking the abort */
  abortChange(id: string): Promise<{ id: string }>;

  /**
   * Stream of change states. Cold: each subscription has its own feed,
   * and unsubscribing releases it without touching the change itself.
   */
  watchChange(id: string): Observable<ChangeRecord>;

  listInstalled(): Promise<LocalPackageInfo[]>;

  /** Names of installed packages with a pending refresh */
  listUpdates(): Promise<string[]>;
}
