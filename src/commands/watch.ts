import { Command } from 'commander';
import { lastValueFrom } from 'rxjs';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { observeProgress, shareChanges } from '../core/changes/progress-aggregator.js';
import { formatPercent } from '../core/changes/change-progress.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { logger } from '../utils/logger.js';
import { globalExecutionOptions } from './shared.js';

async function watchCommand(changeIds: string[], command: Command): Promise<void> {
  if (changeIds.length === 0) {
    throw new ValidationError('At least one change id is required');
  }

  await withCliContext(globalExecutionOptions(command), async ctx => {
    const out = resolveOutput(ctx);
    const label = `Waiting for ${changeIds.length === 1 ? `change ${changeIds[0]}` : `${changeIds.length} changes`}`;
    const spinner = out.spinner();
    spinner.start(label);

    const changes = shareChanges(ctx.daemon, changeIds);
    const progress = observeProgress(changes, changeIds).subscribe({
      next: fraction => spinner.message(`${label} ${formatPercent(fraction)}`),
      error: (error: unknown) => logger.debug('Progress stream failed', error)
    });

    try {
      const outcomes = await Promise.allSettled(
        changeIds.map(id => lastValueFrom(changes.watchChange(id)))
      );
      spinner.stop(label.replace('Waiting for', 'Finished'));

      let failed = 0;
      outcomes.forEach((outcome, index) => {
        const id = changeIds[index];
        if (outcome.status === 'rejected') {
          failed++;
          out.error(`change ${id}: ${outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)}`);
        } else if (outcome.value.error) {
          failed++;
          out.error(`change ${id}: ${outcome.value.error.message}`);
        } else {
          out.success(`change ${id}: ${outcome.value.summary ?? 'done'}`);
        }
      });
      if (failed > 0) {
        process.exitCode = 1;
      }
    } finally {
      progress.unsubscribe();
    }
  });
}

export function setupWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Follow daemon changes until they are ready')
    .argument('<change-id...>', 'change ids')
    .action(withErrorHandling(async (changeIds: string[], _options: object, command: Command) => {
      await watchCommand(changeIds, command);
    }));
}
