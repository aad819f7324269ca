import type { ChangeRecord } from '../../types/index.js';

/**
 * Fraction of a change's work that is done, summed over its tasks.
 * 0 when no task reports a total.
 */
export function changeProgress(change: Pick<ChangeRecord, 'tasks'>): number {
  let done = 0;
  let total = 0;
  for (const task of change.tasks) {
    done += task.done;
    total += task.total;
  }
  return total !== 0 ? done / total : 0;
}

export function formatPercent(fraction: number): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  return `${Math.round(clamped * 100)}%`;
}
