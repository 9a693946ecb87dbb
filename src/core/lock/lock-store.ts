import type { ResolutionResult } from '../resolution/types.js';
import { lockFromResult, parseLock, serializeLock, type Lock } from './lock-format.js';
import { exists, readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Reads and writes the project's lock file.
 */
export class LockStore {
  constructor(
    private readonly lockPath: string,
    private readonly projectRoot: string
  ) {}

  get path(): string {
    return this.lockPath;
  }

  /**
   * Current lock; empty when no lock file exists yet.
   */
  async read(): Promise<Lock> {
    if (!(await exists(this.lockPath))) {
      logger.debug(`No lock file at ${this.lockPath}`);
      return new Map();
    }
    const content = await readTextFile(this.lockPath);
    return parseLock(content, this.lockPath);
  }

  /**
   * Record a resolution. Returns false when the file already holds
   * exactly this content and nothing was written.
   */
  async write(result: ResolutionResult): Promise<boolean> {
    const content = serializeLock(lockFromResult(result, this.projectRoot));

    if (await exists(this.lockPath)) {
      const current = await readTextFile(this.lockPath);
      if (current === content) {
        logger.debug(`Lock file unchanged: ${this.lockPath}`);
        return false;
      }
    }

    await writeTextFileAtomic(this.lockPath, content);
    return true;
  }
}
