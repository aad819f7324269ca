/**
 * Aggregate view of every installed package.
 *
 * Loaded lazily and kept until invalidated. Removing a package changes the
 * membership of this view, so the operation controller invalidates it after
 * a successful remove.
 */

import { BehaviorSubject } from 'rxjs';
import type { AsyncValue, LocalPackageInfo } from '../../types/index.js';
import type { DaemonClient } from '../daemon/daemon-client.js';
import { logger } from '../../utils/logger.js';

export interface InstalledPackagesInvalidator {
  invalidate(): void;
}

export class InstalledPackagesView implements InstalledPackagesInvalidator {
  private readonly state = new BehaviorSubject<AsyncValue<LocalPackageInfo[]>>({ status: 'loading' });
  private loading: Promise<LocalPackageInfo[]> | null = null;
  private generation = 0;

  constructor(private readonly daemon: DaemonClient) {}

  get current(): AsyncValue<LocalPackageInfo[]> {
    return this.state.getValue();
  }

  /**
   * Installed packages sorted by name; loads on first use.
   */
  load(): Promise<LocalPackageInfo[]> {
    if (!this.loading) {
      const generation = ++this.generation;
      this.state.next({ status: 'loading' });
      this.loading = this.daemon.listInstalled().then(
        packages => {
          const sorted = [...packages].sort((a, b) => a.name.localeCompare(b.name));
          if (generation === this.generation) {
            this.state.next({ status: 'data', value: sorted });
          }
          return sorted;
        },
        (error: unknown) => {
          const failure = error instanceof Error ? error : new Error(String(error));
          if (generation === this.generation) {
            this.state.next({ status: 'error', error: failure });
            this.loading = null;
          }
          throw failure;
        }
      );
    }
    return this.loading;
  }

  invalidate(): void {
    logger.debug('Installed packages view invalidated');
    this.generation++;
    this.loading = null;
    this.state.next({ status: 'loading' });
  }
}
