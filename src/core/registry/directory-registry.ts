/**
 * Registry Lookup backed by a directory of YAML index files,
 * one `<registry-name>.yml` per package:
 *
 *   name: ecto
 *   releases:
 *     - version: 0.2.0
 *       checksum: sha256-...
 *       requirements:
 *         - name: postgrex
 *           version: ">= 0.0.0"
 */

import { join } from 'path';
import * as yaml from 'js-yaml';
import semver from 'semver';
import type { ManifestDependency } from '../../types/index.js';
import type { RegistryLookup } from './registry-lookup.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory, readTextFile } from '../../utils/fs.js';
import { coerceDependencyList } from '../../utils/manifest-yml.js';
import {
  MalformedMetadataError,
  RegistryNetworkError,
  RegistryNotFoundError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface RegistryRelease {
  version: string;
  checksum?: string;
  requirements: ManifestDependency[];
}

export interface RegistryEntry {
  name: string;
  releases: RegistryRelease[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate one registry index file.
 */
export function parseRegistryEntry(content: string, registryName: string): RegistryEntry {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new MalformedMetadataError(registryName, error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(parsed)) {
    throw new MalformedMetadataError(registryName, 'expected a mapping at the top level');
  }
  if (parsed.name !== registryName) {
    throw new MalformedMetadataError(registryName, `index names package '${String(parsed.name)}'`);
  }
  if (!Array.isArray(parsed.releases)) {
    throw new MalformedMetadataError(registryName, `'releases' must be a list`);
  }

  const releases = parsed.releases.map((release: unknown, index): RegistryRelease => {
    if (!isRecord(release)) {
      throw new MalformedMetadataError(registryName, `releases[${index}] must be a mapping`);
    }
    const version = typeof release.version === 'number' ? String(release.version) : release.version;
    if (typeof version !== 'string' || semver.valid(version) === null) {
      throw new MalformedMetadataError(registryName, `releases[${index}] has invalid version '${String(version)}'`);
    }
    const checksum = release.checksum;
    if (checksum !== undefined && typeof checksum !== 'string') {
      throw new MalformedMetadataError(registryName, `release ${version} has a non-string checksum`);
    }

    let requirements: ManifestDependency[];
    try {
      requirements = coerceDependencyList(release.requirements, `release ${version} requirements`);
    } catch (error) {
      throw new MalformedMetadataError(registryName, error instanceof Error ? error.message : String(error));
    }

    return {
      version,
      checksum,
      requirements
    };
  });

  return { name: registryName, releases };
}

export class DirectoryRegistry implements RegistryLookup {
  private readonly entries = new Map<string, Promise<RegistryEntry>>();

  constructor(private readonly root: string) {}

  async getVersions(registryName: string): Promise<string[]> {
    const entry = await this.loadEntry(registryName);
    return entry.releases.map(release => release.version);
  }

  async getRequirements(registryName: string, version: string): Promise<ManifestDependency[]> {
    const release = await this.findRelease(registryName, version);
    return release.requirements;
  }

  async getChecksum(registryName: string, version: string): Promise<string | undefined> {
    const release = await this.findRelease(registryName, version);
    return release.checksum;
  }

  private async findRelease(registryName: string, version: string): Promise<RegistryRelease> {
    const entry = await this.loadEntry(registryName);
    const release = entry.releases.find(candidate => candidate.version === version);
    if (!release) {
      throw new RegistryNotFoundError(registryName, version);
    }
    return release;
  }

  private loadEntry(registryName: string): Promise<RegistryEntry> {
    let pending = this.entries.get(registryName);
    if (!pending) {
      pending = this.readEntry(registryName);
      this.entries.set(registryName, pending);
    }
    return pending;
  }

  private async readEntry(registryName: string): Promise<RegistryEntry> {
    if (!(await isDirectory(this.root))) {
      throw new RegistryNetworkError(registryName, new Error(`registry directory ${this.root} is not available`));
    }

    const entryPath = join(this.root, `${registryName}${FILE_PATTERNS.REGISTRY_ENTRY_EXT}`);
    if (!(await exists(entryPath))) {
      throw new RegistryNotFoundError(registryName);
    }

    logger.debug(`Reading registry entry ${entryPath}`);
    const content = await readTextFile(entryPath);
    return parseRegistryEntry(content, registryName);
  }
}
