import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPackageRecord } from '../utils/formatters.js';
import { globalExecutionOptions } from './shared.js';

async function infoCommand(name: string, command: Command): Promise<void> {
  await withCliContext(globalExecutionOptions(command), async ctx => {
    const handle = ctx.packages.acquire(name);
    try {
      const record = await handle.ready();
      resolveOutput(ctx).note(formatPackageRecord(record), record.name);
    } finally {
      handle.release();
    }
  });
}

export function setupInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show installed and catalog details of a package')
    .argument('<name>', 'package name')
    .action(withErrorHandling(async (name: string, _options: object, command: Command) => {
      await infoCommand(name, command);
    }));
}
