import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatInstalledPackage } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { globalExecutionOptions } from './shared.js';

interface ListCommandOptions {
  updates?: boolean;
}

async function listCommand(options: ListCommandOptions, command: Command): Promise<void> {
  await withCliContext(globalExecutionOptions(command), async ctx => {
    const out = resolveOutput(ctx);
    const [installed, updates] = await Promise.all([
      ctx.installed.load(),
      ctx.updates.listUpdates().catch((error: unknown) => {
        logger.warn('Could not check for updates', error);
        return [];
      })
    ]);
    const pending = new Set(updates);
    const shown = options.updates ? installed.filter(pkg => pending.has(pkg.name)) : installed;

    if (shown.length === 0) {
      out.info(options.updates ? 'All packages are up to date' : 'No packages installed');
      return;
    }
    for (const pkg of shown) {
      out.message(formatInstalledPackage(pkg, pending.has(pkg.name)));
    }
  });
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed packages')
    .option('-u, --updates', 'only show packages with a pending update')
    .action(withErrorHandling(async (options: ListCommandOptions, command: Command) => {
      await listCommand(options, command);
    }));
}
