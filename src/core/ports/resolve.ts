/**
 * Port Resolution Helper
 *
 * Resolves the OutputPort from a pipeline context, falling back to the
 * console when none is provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
