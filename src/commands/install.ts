import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { withCliContext } from '../cli/context.js';
import { runWithProgress } from '../cli/change-progress-reporter.js';
import { createOperationController } from '../core/execution-context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { globalExecutionOptions } from './shared.js';

interface ChannelCommandOptions {
  channel?: string;
}

type ChannelAction = 'install' | 'refresh';

const LABELS: Record<ChannelAction, string> = {
  install: 'Installing',
  refresh: 'Refreshing'
};

/**
 * Shared body of `install` and `refresh`: load, optionally pick a channel,
 * then run the action with a progress spinner.
 */
export async function channelActionCommand(
  action: ChannelAction,
  name: string,
  options: ChannelCommandOptions,
  command: Command
): Promise<void> {
  await withCliContext(globalExecutionOptions(command), async ctx => {
    const handle = ctx.packages.acquire(name);
    try {
      await handle.ready();
      const controller = createOperationController(ctx, handle);
      if (options.channel) {
        controller.selectChannel(options.channel);
        resolveOutput(ctx).step(`Using channel ${options.channel}`);
      }

      await runWithProgress(ctx, handle, `${LABELS[action]} ${name}`, () =>
        action === 'install' ? controller.install() : controller.refresh());

      const record = await handle.ready();
      const version = record.localInfo?.version ?? 'unknown version';
      resolveOutput(ctx).success(`${name} ${version} from ${record.selectedChannel}`);
    } finally {
      handle.release();
    }
  });
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a package from the catalog')
    .argument('<name>', 'package name')
    .option('-c, --channel <channel>', 'channel to install from (e.g. latest/edge)')
    .action(withErrorHandling(async (name: string, options: ChannelCommandOptions, command: Command) => {
      await channelActionCommand('install', name, options, command);
    }));
}
