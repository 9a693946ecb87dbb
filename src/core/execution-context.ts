/**
 * Execution Context Module
 *
 * Creates the ExecutionContext for commands: resolves the project directory,
 * loads its configuration and wires the directory registry, the file-system
 * path reader and the lock store to it.
 */

import { join, resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import type { ProjectManifest } from '../types/index.js';
import { ConfigManager } from './config.js';
import { DirectoryRegistry } from './registry/directory-registry.js';
import { FileSystemPathReader } from './path-source/path-reader.js';
import { LockStore } from './lock/lock-store.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { exists, isDirectory } from '../utils/fs.js';
import { parseManifestYml } from '../utils/manifest-yml.js';
import { InvalidManifestError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * The project root is `--cwd` resolved against the process working
 * directory, or the working directory itself.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const projectRoot = resolve(process.cwd(), options.cwd ?? '.');
  if (!(await isDirectory(projectRoot))) {
    throw new ValidationError(`Project directory does not exist: ${projectRoot}`, { projectRoot });
  }

  const config = await new ConfigManager(projectRoot).load();
  logger.debug('Execution context created', { projectRoot, config });

  return {
    projectRoot,
    config,
    registry: new DirectoryRegistry(resolve(projectRoot, config.registry)),
    pathReader: new FileSystemPathReader(),
    lockStore: new LockStore(resolve(projectRoot, config.lockfile), projectRoot)
  };
}

/**
 * Read the project's own deplock.yml.
 */
export async function readProjectManifest(projectRoot: string): Promise<ProjectManifest> {
  const manifestPath = join(projectRoot, FILE_PATTERNS.MANIFEST_YML);
  if (!(await exists(manifestPath))) {
    throw new InvalidManifestError(projectRoot, `no ${FILE_PATTERNS.MANIFEST_YML} found`);
  }
  return parseManifestYml(manifestPath);
}
