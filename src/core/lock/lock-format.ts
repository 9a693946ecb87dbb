/**
 * Lock file model and its YAML serialization.
 *
 *   # This file is generated by deplock. Do not edit it by hand.
 *   lockfileVersion: 1
 *   packages:
 *     ecto:
 *       source: registry
 *       package: ecto
 *       version: 0.2.0
 *       checksum: sha256-...
 *     local_lib:
 *       source: path
 *       path: ../local_lib
 *       version: 0.1.0
 *
 * Entries are sorted by identity and every field is written in a fixed order,
 * so an unchanged resolution serializes to identical bytes.
 */

import { relative, sep } from 'path';
import * as yaml from 'js-yaml';
import semver from 'semver';
import type { ResolutionResult } from '../resolution/types.js';
import { LOCKFILE_HEADER, LOCKFILE_VERSION } from '../../constants/index.js';
import { InvalidLockfileError } from '../../utils/errors.js';

export interface RegistryLockEntry {
  source: 'registry';
  identity: string;
  registryName: string;
  version: string;
  checksum?: string;
}

export interface PathLockEntry {
  source: 'path';
  identity: string;
  /** Relative to the project root, with forward slashes */
  path: string;
  version: string;
}

export type LockEntry = RegistryLockEntry | PathLockEntry;

export type Lock = ReadonlyMap<string, LockEntry>;

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toPortablePath(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Build the lock that records a resolution result.
 */
export function lockFromResult(result: ResolutionResult, projectRoot: string): Lock {
  const lock = new Map<string, LockEntry>();
  for (const resolved of result.packages.values()) {
    if (resolved.source.type === 'path') {
      lock.set(resolved.identity, {
        source: 'path',
        identity: resolved.identity,
        path: toPortablePath(relative(projectRoot, resolved.source.location)) || '.',
        version: resolved.version
      });
    } else {
      const entry: RegistryLockEntry = {
        source: 'registry',
        identity: resolved.identity,
        registryName: resolved.registryName,
        version: resolved.version
      };
      if (resolved.checksum) {
        entry.checksum = resolved.checksum;
      }
      lock.set(resolved.identity, entry);
    }
  }
  return lock;
}

export function serializeLock(lock: Lock): string {
  const packages: Record<string, Record<string, string>> = {};
  const identities = [...lock.keys()].sort(compareKeys);

  for (const identity of identities) {
    const entry = lock.get(identity);
    if (!entry) continue;
    if (entry.source === 'registry') {
      const record: Record<string, string> = {
        source: 'registry',
        package: entry.registryName,
        version: entry.version
      };
      if (entry.checksum) {
        record.checksum = entry.checksum;
      }
      packages[identity] = record;
    } else {
      packages[identity] = {
        source: 'path',
        path: entry.path,
        version: entry.version
      };
    }
  }

  const body = yaml.dump(
    { lockfileVersion: LOCKFILE_VERSION, packages },
    { indent: 2, sortKeys: false, lineWidth: -1, quotingType: '"' }
  );
  return `${LOCKFILE_HEADER}${body}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField(entry: Record<string, unknown>, key: string, identity: string, path: string): string {
  const value = typeof entry[key] === 'number' ? String(entry[key]) : entry[key];
  if (typeof value !== 'string' || value === '') {
    throw new InvalidLockfileError(path, `entry '${identity}' is missing '${key}'`);
  }
  return value;
}

/**
 * Parse lock file content. `path` is only used in error messages.
 */
export function parseLock(content: string, path: string): Lock {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidLockfileError(path, error instanceof Error ? error.message : String(error));
  }

  if (parsed === undefined || parsed === null) {
    return new Map();
  }
  if (!isRecord(parsed)) {
    throw new InvalidLockfileError(path, 'expected a mapping at the top level');
  }
  if (parsed.lockfileVersion !== LOCKFILE_VERSION) {
    throw new InvalidLockfileError(path, `unsupported lockfileVersion '${String(parsed.lockfileVersion)}'`);
  }

  const packages = parsed.packages ?? {};
  if (!isRecord(packages)) {
    throw new InvalidLockfileError(path, `'packages' must be a mapping`);
  }

  const lock = new Map<string, LockEntry>();
  for (const [identity, raw] of Object.entries(packages)) {
    if (!isRecord(raw)) {
      throw new InvalidLockfileError(path, `entry '${identity}' must be a mapping`);
    }
    const version = readField(raw, 'version', identity, path);
    const source = raw.source;
    if (source === 'registry') {
      if (semver.valid(version) === null) {
        throw new InvalidLockfileError(path, `entry '${identity}' has invalid version '${version}'`);
      }
      const entry: RegistryLockEntry = {
        source: 'registry',
        identity,
        registryName: readField(raw, 'package', identity, path),
        version
      };
      const checksum = raw.checksum;
      if (typeof checksum === 'string') {
        entry.checksum = checksum;
      }
      lock.set(identity, entry);
    } else if (source === 'path') {
      lock.set(identity, { source: 'path', identity, path: readField(raw, 'path', identity, path), version });
    } else {
      throw new InvalidLockfileError(path, `entry '${identity}' has unknown source '${String(source)}'`);
    }
  }

  return lock;
}
