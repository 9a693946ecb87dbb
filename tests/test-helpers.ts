import { mkdtemp, rm } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { ManifestDependency, ProjectManifest } from '../src/types/index.js';
import type { ExecutionContext } from '../src/types/execution-context.js';
import type { RegistryLookup } from '../src/core/registry/registry-lookup.js';
import type { PathSourceReader } from '../src/core/path-source/path-reader.js';
import type { OutputPort } from '../src/core/ports/output.js';
import { FileSystemPathReader } from '../src/core/path-source/path-reader.js';
import { LockStore } from '../src/core/lock/lock-store.js';
import { PathNotFoundError, RegistryNotFoundError } from '../src/utils/errors.js';

/** registry name -> version -> declared requirements */
export type RegistryFixture = Record<string, Record<string, ManifestDependency[]>>;

/**
 * In-process registry stand-in that records every lookup it answers.
 */
export class InMemoryRegistry implements RegistryLookup {
  readonly versionLookups: string[] = [];
  readonly requirementLookups: string[] = [];

  constructor(
    private readonly packages: RegistryFixture,
    private readonly checksums: Record<string, string> = {}
  ) {}

  async getVersions(registryName: string): Promise<string[]> {
    this.versionLookups.push(registryName);
    const releases = this.packages[registryName];
    if (!releases) {
      throw new RegistryNotFoundError(registryName);
    }
    return Object.keys(releases);
  }

  async getRequirements(registryName: string, version: string): Promise<ManifestDependency[]> {
    this.requirementLookups.push(`${registryName}@${version}`);
    const requirements = this.packages[registryName]?.[version];
    if (!requirements) {
      throw new RegistryNotFoundError(registryName, version);
    }
    return requirements;
  }

  async getChecksum(registryName: string, version: string): Promise<string | undefined> {
    return this.checksums[`${registryName}@${version}`];
  }
}

/**
 * Path source stand-in keyed by absolute location.
 */
export class InMemoryPathReader implements PathSourceReader {
  readonly reads: string[] = [];

  constructor(private readonly manifests: Record<string, ProjectManifest>) {}

  async readManifest(location: string): Promise<ProjectManifest> {
    this.reads.push(location);
    const manifest = this.manifests[location];
    if (!manifest) {
      throw new PathNotFoundError(location);
    }
    return manifest;
  }
}

/**
 * Output port that keeps every message for assertions.
 */
export class RecordingOutput implements OutputPort {
  readonly lines: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];
  readonly successes: string[] = [];

  info(message: string): void {
    this.lines.push(message);
  }

  success(message: string): void {
    this.successes.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export async function makeTempDir(): Promise<string> {
  // Resolve real path (handles /private on macOS)
  return realpathSync(await mkdtemp(join(tmpdir(), 'deplock-test-')));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeContext(
  projectRoot: string,
  registry: RegistryLookup,
  output: OutputPort
): ExecutionContext {
  return {
    projectRoot,
    config: { registry: 'registry', lockfile: 'deplock.lock', allowPrerelease: false },
    registry,
    pathReader: new FileSystemPathReader(),
    lockStore: new LockStore(join(projectRoot, 'deplock.lock'), projectRoot),
    output
  };
}
