/**
 * Progress Aggregator
 *
 * Publishes the mean progress of a set of daemon changes as one stream.
 * One producer subscription per change id feeds a combining step that
 * recomputes the mean on every update; the result fans out to any number
 * of consumers through a single Subject.
 *
 * Every consumer first receives the current mean.
 *
 * The channel is lazy and non-restartable: producers start with the first
 * consumer and are torn down with the last one, after which the channel
 * stays completed.
 */

import { Observable, Subject, Subscription, shareReplay } from 'rxjs';
import type { ChangeRecord } from '../../types/index.js';
import type { DaemonClient } from '../daemon/daemon-client.js';
import { changeProgress } from './change-progress.js';
import { logger } from '../../utils/logger.js';

/** Anything that can stream a change's records */
export type ChangeSource = Pick<DaemonClient, 'watchChange'>;

export class ProgressChannel {
  private readonly fractions: Map<string, number>;
  private readonly output = new Subject<number>();
  private producers: Subscription | null = null;
  private consumers = 0;
  private closed = false;

  readonly progress$: Observable<number>;

  constructor(private readonly source: ChangeSource, changeIds: Iterable<string>) {
    this.fractions = new Map([...new Set(changeIds)].map(id => [id, 0]));
    this.progress$ = new Observable<number>(subscriber => {
      if (this.closed || this.fractions.size === 0) {
        subscriber.complete();
        return;
      }

      subscriber.next(this.current);
      const consumer = this.output.subscribe(subscriber);
      this.consumers++;
      this.start();

      return () => {
        consumer.unsubscribe();
        this.consumers--;
        if (this.consumers === 0) {
          this.close();
        }
      };
    });
  }

  get changeIds(): string[] {
    return [...this.fractions.keys()];
  }

  /** Current mean over all tracked changes */
  get current(): number {
    let sum = 0;
    for (const fraction of this.fractions.values()) {
      sum += fraction;
    }
    return this.fractions.size === 0 ? 0 : sum / this.fractions.size;
  }

  private start(): void {
    if (this.producers) return;
    const producers = new Subscription();
    this.producers = producers;

    for (const id of this.fractions.keys()) {
      producers.add(
        this.source.watchChange(id).subscribe({
          next: change => {
            this.fractions.set(id, changeProgress(change));
            this.output.next(this.current);
          },
          error: (error: unknown) => {
            logger.debug(`Progress stream for change ${id} failed`, error);
            this.output.error(error);
            this.close();
          }
        })
      );
    }
  }

  private close(): void {
    if (this.closed) return;
    this.closed = true;
    this.producers?.unsubscribe();
    this.producers = null;
    this.output.complete();
  }
}

/**
 * Subscribable mean progress for an arbitrary set of change ids.
 */
export function observeProgress(source: ChangeSource, changeIds: Iterable<string>): Observable<number> {
  return new ProgressChannel(source, changeIds).progress$;
}

/**
 * A source that polls each of `changeIds` once however many subscribers
 * it has. Late subscribers get the latest record; other ids go straight
 * to `source`.
 */
export function shareChanges(source: ChangeSource, changeIds: Iterable<string>): ChangeSource {
  const shared = new Map<string, Observable<ChangeRecord>>();
  for (const id of changeIds) {
    if (!shared.has(id)) {
      shared.set(id, source.watchChange(id).pipe(shareReplay({ bufferSize: 1, refCount: true })));
    }
  }
  return {
    watchChange: id => shared.get(id) ?? source.watchChange(id)
  };
}
