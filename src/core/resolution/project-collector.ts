/**
 * Collects the project layer of the graph: the root manifest plus every path
 * package that wins its identity, transitively. Path packages are part of the
 * project rather than the registry search, so their declarations (overrides
 * included) are known before any version is chosen.
 *
 * Collection runs to a fixed point: each round rebuilds the override table
 * from everything collected so far and reads the manifests of path winners
 * not seen yet.
 */

import type { ProjectManifest } from '../../types/index.js';
import type { Requirement } from './types.js';
import type { PathSourceReader } from '../path-source/path-reader.js';
import { normalizeDeclarations } from '../requirements/normalize.js';
import { applyOverrides, buildOverrideTable, type OverrideTable } from '../overrides/override-engine.js';
import { ROOT_REQUESTOR } from '../../constants/index.js';
import { DeplockError, ErrorCodes } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

const MAX_COLLECTION_ROUNDS = 64;

export interface PathPackage {
  identity: string;
  /** Absolute directory of the package */
  location: string;
  manifest: ProjectManifest;
  /** Declarations of this package, before overrides */
  requirements: Requirement[];
}

export interface ProjectLayer {
  /** Root and path-package requirements after overrides, in declaration order */
  requirements: Requirement[];
  /** The root manifest's own requirements after overrides */
  root: Requirement[];
  overrides: OverrideTable;
  /**
   * Path packages that won their identity, in discovery order. Winning only
   * fixes the source: the resolver selects a path package once some
   * mandatory requirement reaches it.
   */
  pathPackages: Map<string, PathPackage>;
}

function packageKey(identity: string, location: string): string {
  return `${identity}\u0000${location}`;
}

function pathWinners(table: OverrideTable): Map<string, { identity: string; location: string }> {
  const winners = new Map<string, { identity: string; location: string }>();
  for (const [identity, winner] of table.winners) {
    if (winner.source.type === 'path') {
      const location = winner.source.location;
      winners.set(packageKey(identity, location), { identity, location });
    }
  }
  return winners;
}

export async function collectProjectRequirements(
  manifest: ProjectManifest,
  baseDir: string,
  pathReader: PathSourceReader
): Promise<ProjectLayer> {
  const rootRequirements = normalizeDeclarations(manifest.dependencies, ROOT_REQUESTOR, { baseDir, origin: 'project' });
  const loaded = new Map<string, PathPackage>();
  let active: string[] = [];

  for (let round = 0; round < MAX_COLLECTION_ROUNDS; round++) {
    const requirements = [
      ...rootRequirements,
      ...active.flatMap(key => loaded.get(key)?.requirements ?? [])
    ];
    const overrides = buildOverrideTable(requirements);
    const winners = pathWinners(overrides);
    const next = [...winners.keys()];

    const unchanged = next.length === active.length && next.every(key => active.includes(key));
    if (unchanged) {
      const pathPackages = new Map<string, PathPackage>();
      for (const key of active) {
        const pathPackage = loaded.get(key);
        if (pathPackage) {
          pathPackages.set(pathPackage.identity, pathPackage);
        }
      }
      return {
        requirements: applyOverrides(requirements, overrides),
        root: applyOverrides(rootRequirements, overrides),
        overrides,
        pathPackages
      };
    }

    const toRead = [...winners].filter(([key]) => !loaded.has(key));
    const manifests = await Promise.all(
      toRead.map(async ([key, { identity, location }]) => {
        logger.debug(`Reading path dependency ${identity} at ${location}`);
        return { key, identity, location, manifest: await pathReader.readManifest(location) };
      })
    );

    for (const { key, identity, location, manifest: pathManifest } of manifests) {
      loaded.set(key, {
        identity,
        location,
        manifest: pathManifest,
        requirements: normalizeDeclarations(pathManifest.dependencies, identity, {
          baseDir: location,
          origin: 'project'
        })
      });
    }

    // Keep discovery order stable: previously active packages first
    active = [...active.filter(key => winners.has(key)), ...next.filter(key => !active.includes(key))];
  }

  throw new DeplockError(
    'Path dependency overrides do not converge; check for path packages overriding each other',
    ErrorCodes.CONFLICTING_OVERRIDE
  );
}
