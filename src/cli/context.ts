/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output port injected
 * (Clack on a TTY, plain console otherwise). Command handlers use this
 * instead of calling createExecutionContext() directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  if (detectInteractive(options.interactive)) {
    cachedClackOutput ??= createClackOutput();
    ctx.output = cachedClackOutput;
  } else {
    ctx.output = consoleOutput;
  }
  return ctx;
}

/**
 * Run `fn` with a fresh CLI context and always close it afterwards.
 */
export async function withCliContext<T>(
  options: ExecutionOptions,
  fn: (ctx: ExecutionContext) => Promise<T>
): Promise<T> {
  const ctx = await createCliExecutionContext(options);
  try {
    return await fn(ctx);
  } finally {
    await ctx.close();
  }
}
