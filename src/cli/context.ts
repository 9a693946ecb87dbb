/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the console output port injected.
 * Command handlers should use this instead of calling createExecutionContext()
 * directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';

export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.output = consoleOutput;
  return ctx;
}
