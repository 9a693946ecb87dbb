/**
 * Override Engine.
 *
 * Overrides are a flat, order-independent reduction: every project-level
 * requirement is collected first, one winner is chosen per identity, and the
 * resulting table rewrites requirement lists at any depth of the graph.
 *
 * A winner is either an explicit `override: true` requirement or, failing
 * that, a path requirement (path sources never negotiate versions). The
 * winner fixes source and range; whether the package is needed at all is
 * still decided by every requirement on it.
 */

import type { Requirement } from '../resolution/types.js';
import { ConflictingOverrideError } from '../../utils/errors.js';

export interface OverrideTable {
  /** Winning requirement per overridden identity */
  readonly winners: ReadonlyMap<string, Requirement>;
}

/**
 * Human-readable description of where a requirement points
 */
export function describeSource(requirement: Requirement): string {
  if (requirement.source.type === 'path') {
    return `path ${requirement.source.location}`;
  }
  return `registry ${requirement.registryName} ${requirement.constraint}`;
}

/**
 * Two requirements agree when they point at the same place with the same range
 */
function sourceKey(requirement: Requirement): string {
  if (requirement.source.type === 'path') {
    return `path:${requirement.source.location}`;
  }
  return `registry:${requirement.registryName}:${requirement.range}`;
}

function pickSingle(identity: string, requirements: Requirement[]): Requirement {
  const distinct = new Map<string, Requirement>();
  for (const requirement of requirements) {
    const key = sourceKey(requirement);
    if (!distinct.has(key)) {
      distinct.set(key, requirement);
    }
  }

  if (distinct.size > 1) {
    const sources = [...distinct.values()].map(
      requirement => `${describeSource(requirement)} (from ${requirement.requestor})`
    );
    throw new ConflictingOverrideError(identity, sources);
  }

  return requirements[0];
}

/**
 * Partition requirements by identity and pick the winner of each overridden identity.
 */
export function buildOverrideTable(requirements: readonly Requirement[]): OverrideTable {
  const byIdentity = new Map<string, Requirement[]>();
  for (const requirement of requirements) {
    const group = byIdentity.get(requirement.identity);
    if (group) {
      group.push(requirement);
    } else {
      byIdentity.set(requirement.identity, [requirement]);
    }
  }

  const winners = new Map<string, Requirement>();
  for (const [identity, group] of byIdentity) {
    const explicit = group.filter(requirement => requirement.override);
    if (explicit.length > 0) {
      winners.set(identity, pickSingle(identity, explicit));
      continue;
    }

    const paths = group.filter(requirement => requirement.source.type === 'path');
    if (paths.length > 0) {
      winners.set(identity, pickSingle(identity, paths));
    }
  }

  return { winners };
}

/**
 * Point every requirement on an overridden identity at the winner. Each one
 * keeps its requestor and optional flag but takes the winner's source and
 * range, so an override never decides whether a package is needed at all.
 */
export function applyOverrides(requirements: readonly Requirement[], table: OverrideTable): Requirement[] {
  return requirements.map(requirement => {
    const winner = table.winners.get(requirement.identity);
    if (winner === undefined || winner === requirement) {
      return requirement;
    }
    return { ...winner, requestor: requirement.requestor, optional: requirement.optional, override: false };
  });
}
