/**
 * Path Source port: reads the manifest of a package that lives on disk.
 */

import { join } from 'path';
import type { ProjectManifest } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory } from '../../utils/fs.js';
import { parseManifestYml } from '../../utils/manifest-yml.js';
import { InvalidManifestError, PathNotFoundError } from '../../utils/errors.js';

export interface PathSourceReader {
  /**
   * Read the manifest of the package at an absolute location.
   * Rejects with PathNotFoundError or InvalidManifestError.
   */
  readManifest(location: string): Promise<ProjectManifest>;
}

export class FileSystemPathReader implements PathSourceReader {
  async readManifest(location: string): Promise<ProjectManifest> {
    if (!(await isDirectory(location))) {
      throw new PathNotFoundError(location);
    }

    const manifestPath = join(location, FILE_PATTERNS.MANIFEST_YML);
    if (!(await exists(manifestPath))) {
      throw new InvalidManifestError(location, `no ${FILE_PATTERNS.MANIFEST_YML} found`);
    }

    return parseManifestYml(manifestPath);
  }
}
