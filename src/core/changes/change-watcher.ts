/**
 * Change Watcher
 *
 * Follows one daemon change until it reaches a terminal state and settles
 * exactly once. Whatever the outcome, the target's active change id is
 * cleared afterwards.
 */

import type { Subscription } from 'rxjs';
import type { DaemonClient } from '../daemon/daemon-client.js';
import { ChangeFailedError, ChangeWatchAbortedError, DaemonError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * The per-package state a watcher reports back to.
 */
export interface ChangeTarget {
  readonly name: string;
  /** Clear `activeChangeId` if it still equals `changeId` */
  clearActiveChange(changeId: string): void;
  /** Rebuild the record; never rejects, failures land in the record's state */
  rebuild(): Promise<unknown>;
}

export interface WatchOptions {
  /** Rebuild the target after a successful change (default true) */
  rebuild?: boolean;
  /** Stops the watch. The change keeps running in the daemon. */
  signal?: AbortSignal;
}

export class ChangeWatcher {
  constructor(private readonly daemon: DaemonClient) {}

  async watch(target: ChangeTarget, changeId: string, options: WatchOptions = {}): Promise<void> {
    const { rebuild = true, signal } = options;
    logger.debug(`Watching change ${changeId} for ${target.name}`);

    try {
      await this.untilTerminal(changeId, signal);
    } finally {
      target.clearActiveChange(changeId);
    }

    logger.debug(`Change ${changeId} for ${target.name} completed`);
    if (rebuild) {
      await target.rebuild();
    }
  }

  private untilTerminal(changeId: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let subscription: Subscription | undefined;

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        subscription?.unsubscribe();
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = (): void => settle(new ChangeWatchAbortedError(changeId));

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      subscription = this.daemon.watchChange(changeId).subscribe({
        next: change => {
          if (change.error) {
            logger.debug(`Change ${changeId} failed`, change.error);
            settle(new ChangeFailedError(changeId, change.error.message, change.error.kind));
          } else if (change.ready) {
            settle();
          }
        },
        error: (error: unknown) => {
          settle(error instanceof DaemonError
            ? error
            : new DaemonError(`Lost track of change ${changeId}: ${error instanceof Error ? error.message : String(error)}`, 'stream-error'));
        },
        complete: () => {
          settle(new DaemonError(`Change ${changeId} stream ended before the change was ready`, 'stream-ended'));
        }
      });

      // A synchronous terminal event settles before `subscription` is assigned
      if (settled) {
        subscription.unsubscribe();
      }
    });
  }
}
