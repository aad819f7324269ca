/**
 * Port Resolution Helpers
 *
 * Resolve the OutputPort from an ExecutionContext, falling back to the
 * plain console adapter when none was injected.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: Pick<ExecutionContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}
