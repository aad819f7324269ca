import { Command } from 'commander';
import { withErrorHandling, UserCancellationError } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { runWithProgress } from '../cli/change-progress-reporter.js';
import { createOperationController } from '../core/execution-context.js';
import { isInstalled } from '../core/packages/package-record.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { globalExecutionOptions } from './shared.js';

interface RemoveCommandOptions {
  yes?: boolean;
}

async function removeCommand(name: string, options: RemoveCommandOptions, command: Command): Promise<void> {
  await withCliContext(globalExecutionOptions(command), async ctx => {
    const out = resolveOutput(ctx);
    const handle = ctx.packages.acquire(name);
    try {
      const record = await handle.ready();
      if (!isInstalled(record)) {
        out.info(`${name} is not installed`);
        return;
      }

      const confirmed = options.yes || await out.confirm(`Remove ${name}?`);
      if (!confirmed) {
        throw new UserCancellationError(`Kept ${name}`);
      }

      await runWithProgress(ctx, handle, `Removing ${name}`, () =>
        createOperationController(ctx, handle).remove());
      out.success(`${name} removed`);
    } finally {
      handle.release();
    }
  });
}

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .description('Remove an installed package')
    .argument('<name>', 'package name')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(withErrorHandling(async (name: string, options: RemoveCommandOptions, command: Command) => {
      await removeCommand(name, options, command);
    }));
}
