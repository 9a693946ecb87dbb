/**
 * Reporting: what was resolved, and how it relates to the existing lock.
 */

import { relative, sep } from 'path';
import type { ResolutionResult, ResolvedPackage } from '../resolution/types.js';
import type { Lock, LockEntry } from '../lock/lock-format.js';

export type SourceKind = 'registry' | 'path';

export interface DependencyReportEntry {
  name: string;
  registryName: string;
  version: string;
  sourceKind: SourceKind;
  /** Short description of the source, e.g. `registry package` or `path ../lib` */
  sourceLabel: string;
  /** 'locked' when the existing lock already records exactly this selection */
  lockStatus: 'locked' | 'fresh';
  /** Version recorded in the existing lock, when there is an entry */
  lockedVersion?: string;
  /** Registry name recorded in the existing lock, when there is a registry entry */
  lockedRegistryName?: string;
}

function portableRelative(from: string, to: string): string {
  return relative(from, to).split(sep).join('/') || '.';
}

export function formatSourceLabel(resolved: ResolvedPackage, projectRoot: string): string {
  if (resolved.source.type === 'path') {
    return `path ${portableRelative(projectRoot, resolved.source.location)}`;
  }
  return 'registry package';
}

function matchesLock(resolved: ResolvedPackage, entry: LockEntry, projectRoot: string): boolean {
  if (resolved.source.type === 'path') {
    return entry.source === 'path' && entry.path === portableRelative(projectRoot, resolved.source.location);
  }
  return entry.source === 'registry'
    && entry.registryName === resolved.registryName
    && entry.version === resolved.version;
}

export function buildDependencyReport(
  result: ResolutionResult,
  previousLock: Lock,
  projectRoot: string
): DependencyReportEntry[] {
  return [...result.packages.values()].map(resolved => {
    const entry: DependencyReportEntry = {
      name: resolved.identity,
      registryName: resolved.registryName,
      version: resolved.version,
      sourceKind: resolved.source.type,
      sourceLabel: formatSourceLabel(resolved, projectRoot),
      lockStatus: 'fresh'
    };

    const locked = previousLock.get(resolved.identity);
    if (locked) {
      entry.lockedVersion = locked.version;
      if (locked.source === 'registry') {
        entry.lockedRegistryName = locked.registryName;
      }
      if (matchesLock(resolved, locked, projectRoot)) {
        entry.lockStatus = 'locked';
      }
    }

    return entry;
  });
}

/**
 * Lines printed by `deps` for each entry.
 */
export function formatDependencyReport(entries: readonly DependencyReportEntry[]): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(`* ${entry.name} ${entry.version} (${entry.sourceLabel})`);
    if (entry.lockedVersion !== undefined && entry.lockedRegistryName !== undefined) {
      lines.push(`  locked at ${entry.lockedVersion} (${entry.lockedRegistryName})`);
    }
    if (entry.lockStatus === 'locked') {
      lines.push('  ok');
    } else if (entry.lockedVersion === undefined) {
      lines.push('  the dependency is not locked');
    } else {
      lines.push('  the dependency lock is outdated');
    }
  }
  return lines;
}
