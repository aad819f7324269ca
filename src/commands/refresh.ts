import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { channelActionCommand } from './install.js';

export function setupRefreshCommand(program: Command): void {
  program
    .command('refresh')
    .alias('update')
    .description('Refresh an installed package, optionally switching channel')
    .argument('<name>', 'package name')
    .option('-c, --channel <channel>', 'channel to refresh to')
    .action(withErrorHandling(async (name: string, options: { channel?: string }, command: Command) => {
      await channelActionCommand('refresh', name, options, command);
    }));
}
