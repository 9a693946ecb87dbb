/**
 * Console Output Adapter
 *
 * Plain console.log-based implementation of OutputPort.
 * Safe for CI/CD pipelines and headless environments.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  },

  error(message: string): void {
    console.log(`✗ ${message}`);
  }
};
