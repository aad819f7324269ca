/**
 * Shows the progress of a package's active change on a spinner while a
 * command runs.
 */

import type { Subscription } from 'rxjs';
import type { ExecutionContext } from '../types/execution-context.js';
import type { PackageHandle } from '../core/packages/package-state-store.js';
import { observeProgress } from '../core/changes/progress-aggregator.js';
import { formatPercent } from '../core/changes/change-progress.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { logger } from '../utils/logger.js';

export async function runWithProgress(
  ctx: ExecutionContext,
  handle: PackageHandle,
  label: string,
  run: () => Promise<void>
): Promise<void> {
  const spinner = resolveOutput(ctx).spinner();
  spinner.start(label);

  let trackedId: string | undefined;
  let progress: Subscription | undefined;
  const state = handle.state$.subscribe(current => {
    const changeId = current.status === 'data' ? current.value.activeChangeId : undefined;
    if (!changeId || changeId === trackedId) return;
    trackedId = changeId;
    progress?.unsubscribe();
    progress = observeProgress(ctx.daemon, [changeId]).subscribe({
      next: fraction => spinner.message(`${label} ${formatPercent(fraction)}`),
      error: (error: unknown) => logger.debug(`Progress for change ${changeId} unavailable`, error)
    });
  });

  try {
    await run();
    spinner.stop(`${label} done`);
  } catch (error) {
    spinner.fail(`${label} failed`);
    throw error;
  } finally {
    state.unsubscribe();
    progress?.unsubscribe();
  }
}
