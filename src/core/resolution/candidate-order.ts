import type { Lock, LockEntry } from '../lock/lock-format.js';
import { satisfiesAll, sortVersionsDescending } from '../../utils/version-ranges.js';

export interface CandidateOrderInput {
  registryName: string;
  /** Every published version, in any order */
  versions: readonly string[];
  /** Merged ranges of all requirements on the identity */
  ranges: readonly string[];
  /** Lock entry that may pin the first candidate */
  locked?: LockEntry;
  allowPrerelease?: boolean;
}

/**
 * Lock entry still allowed to bias resolution for an identity.
 * Unlocked identities and path entries never do.
 */
export function lockedEntryFor(
  identity: string,
  lock: Lock | undefined,
  unlock: 'all' | readonly string[] | undefined
): LockEntry | undefined {
  if (!lock || unlock === 'all' || unlock?.includes(identity)) {
    return undefined;
  }
  const entry = lock.get(identity);
  return entry?.source === 'registry' ? entry : undefined;
}

/**
 * Versions to try for one identity: a still-satisfying locked version first,
 * then every satisfying version newest first.
 */
export function orderCandidates(input: CandidateOrderInput): string[] {
  const { registryName, versions, ranges, locked, allowPrerelease = false } = input;
  const satisfying = sortVersionsDescending(versions).filter(version =>
    satisfiesAll(version, ranges, allowPrerelease)
  );

  if (
    locked?.source === 'registry' &&
    locked.registryName === registryName &&
    satisfying.includes(locked.version)
  ) {
    return [locked.version, ...satisfying.filter(version => version !== locked.version)];
  }

  return satisfying;
}
