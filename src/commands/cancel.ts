import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { createOperationController } from '../core/execution-context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { globalExecutionOptions } from './shared.js';

async function cancelCommand(name: string, command: Command): Promise<void> {
  await withCliContext(globalExecutionOptions(command), async ctx => {
    const out = resolveOutput(ctx);
    const handle = ctx.packages.acquire(name);
    try {
      const record = await handle.ready();
      const active = record.activeChangeId;
      if (!active) {
        out.info(`No change in progress for ${name}`);
        return;
      }

      const spinner = out.spinner();
      spinner.start(`Aborting change ${active}`);
      try {
        await createOperationController(ctx, handle).cancel();
      } catch (error) {
        spinner.fail(`Could not abort change ${active}`);
        throw error;
      }
      spinner.stop(`Aborted change ${active}`);
    } finally {
      handle.release();
    }
  });
}

export function setupCancelCommand(program: Command): void {
  program
    .command('cancel')
    .alias('abort')
    .description('Abort the change in progress for a package')
    .argument('<name>', 'package name')
    .action(withErrorHandling(async (name: string, _options: object, command: Command) => {
      await cancelCommand(name, command);
    }));
}
