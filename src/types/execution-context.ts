/**
 * Execution Context Types
 *
 * Everything a pipeline needs to run against one project: where it lives,
 * its configuration and the ports through which it reaches the registry,
 * path packages, the lock file and the user.
 */

import type { DeplockConfig } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { RegistryLookup } from '../core/registry/registry-lookup.js';
import type { PathSourceReader } from '../core/path-source/path-reader.js';
import type { LockStore } from '../core/lock/lock-store.js';

export interface ExecutionContext {
  /** Absolute path of the directory holding deplock.yml */
  projectRoot: string;

  config: DeplockConfig;

  registry: RegistryLookup;

  pathReader: PathSourceReader;

  lockStore: LockStore;

  /**
   * Output port for user-facing messages.
   * When absent, falls back to console output.
   */
  output?: OutputPort;

  /** Aborts resolution between candidate selections */
  signal?: AbortSignal;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Project directory, relative to the process working directory */
  cwd?: string;
}
