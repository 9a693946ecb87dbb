import semver from 'semver';

/**
 * Version constraint parsing on top of semver.
 *
 * Accepted syntax is everything semver accepts plus:
 *   - `~> 1.2`    compatible with 1.x from 1.2.0  (>=1.2.0 <2.0.0)
 *   - `~> 1.2.3`  compatible with 1.2.x from 1.2.3 (>=1.2.3 <1.3.0)
 *   - `== 1.2.3`  exact; a bare `1.2.3`, `1.2` or `1` is exact too
 *   - `and` / `or` keywords joining clauses
 */

export interface ParsedConstraint {
  /** Expression as written in the manifest */
  raw: string;
  /** Equivalent semver range */
  range: string;
}

const COMPATIBLE_OPERAND = /^(\d+)\.(\d+)(?:\.(\d+)(-[0-9A-Za-z.-]+)?)?$/;
const PARTIAL_VERSION = /^(\d+)(?:\.(\d+))?$/;
const WILDCARDS = new Set(['', '*', 'latest']);

export function isWildcardConstraint(expression: string): boolean {
  return WILDCARDS.has(expression.trim().toLowerCase());
}

function translateClause(clause: string): string {
  const trimmed = clause.trim();

  if (trimmed.startsWith('~>')) {
    const operand = trimmed.slice(2).trim();
    const match = operand.match(COMPATIBLE_OPERAND);
    if (!match) {
      throw new Error(`invalid operand for '~>': '${operand}'`);
    }
    const major = Number(match[1]);
    const minor = Number(match[2]);
    if (match[3] === undefined) {
      return `>=${major}.${minor}.0 <${major + 1}.0.0`;
    }
    const patch = Number(match[3]);
    const pre = match[4] ?? '';
    return `>=${major}.${minor}.${patch}${pre} <${major}.${minor + 1}.0`;
  }

  const exact = trimmed.startsWith('==') ? trimmed.slice(2).trim() : trimmed;
  return padPartialVersion(exact);
}

/**
 * A bare `1` or `1.0` names the exact release 1.0.0, where semver
 * would read it as the range 1.x or 1.0.x.
 */
function padPartialVersion(clause: string): string {
  const partial = clause.match(PARTIAL_VERSION);
  if (!partial) {
    return clause;
  }
  return `${partial[1]}.${partial[2] ?? '0'}.0`;
}

/**
 * Translate a constraint expression into a semver range.
 * Throws when the expression cannot be understood.
 */
export function toSemverRange(expression: string): string {
  if (isWildcardConstraint(expression)) {
    return '*';
  }

  const alternatives = expression
    .split(/\s+or\s+|\s*\|\|\s*/)
    .map(alternative => alternative.split(/\s+and\s+/).map(translateClause).join(' '));

  const range = alternatives.join(' || ');
  const valid = semver.validRange(range);
  if (valid === null) {
    throw new Error(`'${expression}' is not a valid version constraint`);
  }
  return range;
}

export function parseConstraint(expression: string): ParsedConstraint {
  const raw = expression.trim();
  return { raw: raw === '' ? '*' : raw, range: toSemverRange(raw) };
}

/**
 * Without `includePrerelease`, a prerelease only satisfies a range that names
 * a prerelease of the same major.minor.patch (semver's own rule).
 */
export function satisfiesAll(version: string, ranges: readonly string[], includePrerelease = false): boolean {
  return ranges.every(range => {
    try {
      return semver.satisfies(version, range, { includePrerelease });
    } catch {
      return false;
    }
  });
}

/**
 * Valid semver versions, newest first. Invalid entries are dropped.
 */
export function sortVersionsDescending(versions: readonly string[]): string[] {
  const valid = versions.filter(version => semver.valid(version) !== null);
  return semver.rsort([...new Set(valid)]);
}
