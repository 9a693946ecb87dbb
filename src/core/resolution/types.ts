/**
 * Types for dependency resolution.
 * Shared by requirement normalization, the override engine, the resolver,
 * the lock store and reporting.
 */

import type { ProjectManifest } from '../../types/index.js';
import type { RegistryLookup } from '../registry/registry-lookup.js';
import type { PathSourceReader } from '../path-source/path-reader.js';
import type { Lock } from '../lock/lock-format.js';

/**
 * Where a requirement wants its package to come from.
 * Path locations are absolute.
 */
export type RequirementSource =
  | { type: 'registry' }
  | { type: 'path'; location: string };

/** Where a declaration was read from */
export type RequirementOrigin = 'project' | 'registry';

/**
 * One declared constraint on a package, tagged with its origin and flags.
 * Requirements are never mutated; merging produces new collections.
 */
export interface Requirement {
  /** Identity of the declaring package, or 'root' */
  readonly requestor: string;
  /** Local alias; the key that unifies declarations of the same dependency */
  readonly identity: string;
  /** Name used to query the registry */
  readonly registryName: string;
  /** Constraint as written */
  readonly constraint: string;
  /** Constraint as a semver range */
  readonly range: string;
  readonly source: RequirementSource;
  readonly optional: boolean;
  readonly override: boolean;
}

/**
 * A concrete version of a package together with the requirements
 * its own manifest contributes.
 */
export interface Candidate {
  identity: string;
  registryName: string;
  version: string;
  source: RequirementSource;
  requirements: Requirement[];
}

export interface ResolvedPackage {
  identity: string;
  registryName: string;
  version: string;
  source: RequirementSource;
  /** Registry integrity checksum, when the registry reports one */
  checksum?: string;
  /** Requestors whose requirements this selection satisfies */
  requestedBy: string[];
  requirementsSatisfied: true;
}

export interface ResolutionResult {
  /** Selected packages keyed by identity, in first-declared order */
  packages: Map<string, ResolvedPackage>;
  /** Non-fatal notes gathered during resolution */
  warnings: string[];
}

export interface ResolveOptions {
  /** Root project manifest */
  manifest: ProjectManifest;
  /** Directory the root manifest's relative paths resolve against */
  baseDir: string;
  registry: RegistryLookup;
  pathReader: PathSourceReader;
  /** Previously locked versions, preferred when they still satisfy */
  lock?: Lock;
  /** Ignore the lock for these identities, or for everything */
  unlock?: 'all' | readonly string[];
  /** Consider prerelease versions even when no range names one */
  allowPrerelease?: boolean;
  /** Checked between candidate selections */
  signal?: AbortSignal;
}
