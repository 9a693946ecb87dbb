/**
 * Core Ports
 *
 * Re-exports the output port and its default implementation.
 */

export type { OutputPort } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
