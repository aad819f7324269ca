/**
 * Update availability for installed packages.
 *
 * The candidate list is fetched from the daemon once and reused until
 * `refresh()`; `changed$` fires after every refresh so that live package
 * records can recompute `hasUpdate`.
 */

import { Subject, type Observable } from 'rxjs';
import type { DaemonClient } from '../daemon/daemon-client.js';
import { logger } from '../../utils/logger.js';

export interface UpdateChecker {
  hasUpdate(name: string): Promise<boolean>;
  readonly changed$: Observable<void>;
}

export class DaemonUpdateChecker implements UpdateChecker {
  private candidates: Promise<Set<string>> | null = null;
  private readonly changed = new Subject<void>();

  readonly changed$: Observable<void> = this.changed.asObservable();

  constructor(private readonly daemon: DaemonClient) {}

  async hasUpdate(name: string): Promise<boolean> {
    const candidates = await this.load();
    return candidates.has(name);
  }

  async listUpdates(): Promise<string[]> {
    return [...(await this.load())].sort();
  }

  async refresh(): Promise<void> {
    this.candidates = null;
    await this.load();
    this.changed.next();
  }

  private load(): Promise<Set<string>> {
    if (!this.candidates) {
      const pending = this.daemon.listUpdates().then(names => new Set(names));
      // Failed lookups are not cached
      pending.catch((error: unknown) => {
        logger.debug('Update check failed', error);
        if (this.candidates === pending) {
          this.candidates = null;
        }
      });
      this.candidates = pending;
    }
    return this.candidates;
  }
}
