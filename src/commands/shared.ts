import { Command } from 'commander';
import type { ExecutionOptions } from '../types/execution-context.js';

/**
 * Global options (--socket) from the root program, for a subcommand.
 */
export function globalExecutionOptions(command: Command): ExecutionOptions {
  const opts = command.parent?.opts<{ socket?: string }>() ?? {};
  return { socket: opts.socket };
}
