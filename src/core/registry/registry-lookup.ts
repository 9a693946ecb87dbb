/**
 * Registry Lookup port.
 *
 * The resolver only needs three questions answered about a registry package;
 * transport, authentication and retries live in the implementation.
 */

import type { ManifestDependency } from '../../types/index.js';

export interface RegistryLookup {
  /**
   * All published versions of a package.
   * Rejects with RegistryNotFoundError when the package does not exist,
   * RegistryNetworkError when the registry could not be asked.
   */
  getVersions(registryName: string): Promise<string[]>;

  /** Raw requirement declarations of one release */
  getRequirements(registryName: string, version: string): Promise<ManifestDependency[]>;

  /** Integrity checksum of one release, when the registry records one */
  getChecksum?(registryName: string, version: string): Promise<string | undefined>;
}

/**
 * Memoizing wrapper so repeated lookups within one resolution run are
 * answered once. Rejected lookups are forgotten, so a later call asks again.
 */
export class CachedRegistry implements RegistryLookup {
  private readonly versions = new Map<string, Promise<string[]>>();
  private readonly requirements = new Map<string, Promise<ManifestDependency[]>>();
  private readonly checksums = new Map<string, Promise<string | undefined>>();

  constructor(private readonly inner: RegistryLookup) {}

  getVersions(registryName: string): Promise<string[]> {
    return this.memoize(this.versions, registryName, () => this.inner.getVersions(registryName));
  }

  getRequirements(registryName: string, version: string): Promise<ManifestDependency[]> {
    return this.memoize(this.requirements, `${registryName}@${version}`, () =>
      this.inner.getRequirements(registryName, version)
    );
  }

  getChecksum(registryName: string, version: string): Promise<string | undefined> {
    const lookup = this.inner.getChecksum?.bind(this.inner);
    if (!lookup) {
      return Promise.resolve(undefined);
    }
    return this.memoize(this.checksums, `${registryName}@${version}`, () => lookup(registryName, version));
  }

  private memoize<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }
    const pending = load();
    cache.set(key, pending);
    pending.catch(() => {
      cache.delete(key);
    });
    return pending;
  }
}
