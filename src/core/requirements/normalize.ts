/**
 * Requirement Source: turns dependency declarations from any manifest into
 * canonical Requirement records. Pure; path locations are resolved against
 * the declaring manifest's directory without touching the file system.
 */

import { resolve } from 'path';
import type { ManifestDependency } from '../../types/index.js';
import type { Requirement, RequirementOrigin, RequirementSource } from '../resolution/types.js';
import { InvalidDeclarationError } from '../../utils/errors.js';
import { checkPackageName, normalizePackageName } from '../../utils/package-name.js';
import { parseConstraint, type ParsedConstraint } from '../../utils/version-ranges.js';
import { logger } from '../../utils/logger.js';

export interface NormalizeOptions {
  /** Directory of the manifest that holds the declaration */
  baseDir: string;
  /** Published registry metadata may not redirect sources (default: 'project') */
  origin?: RequirementOrigin;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function normalizeName(raw: string, field: string, requestor: string): string {
  const name = normalizePackageName(raw);
  const problem = checkPackageName(name);
  if (problem) {
    throw new InvalidDeclarationError(`${problem} (${field} declared by ${requestor})`, { requestor, name: raw });
  }
  return name;
}

/**
 * Normalize a single declaration made by `requestor`.
 */
export function normalizeDeclaration(
  raw: ManifestDependency,
  requestor: string,
  options: NormalizeOptions
): Requirement {
  const origin = options.origin ?? 'project';
  const identity = normalizeName(raw.name, 'name', requestor);
  const label = `'${identity}' (declared by ${requestor})`;

  const hasVersion = !isBlank(raw.version);
  const hasPath = !isBlank(raw.path);

  if (!hasVersion && !hasPath) {
    throw new InvalidDeclarationError(
      raw.override
        ? `override of ${label} has no resolvable source; give it a version or a path`
        : `${label} must specify a version or a path`,
      { requestor, identity }
    );
  }
  if (hasVersion && hasPath) {
    throw new InvalidDeclarationError(`${label} has both a version and a path; choose exactly one`, { requestor, identity });
  }
  if (hasPath && raw.package !== undefined) {
    throw new InvalidDeclarationError(`${label} is a path dependency and cannot set 'package'`, { requestor, identity });
  }
  if (hasPath && origin === 'registry') {
    throw new InvalidDeclarationError(`${label} is a path dependency inside published registry metadata`, { requestor, identity });
  }

  let override = raw.override === true;
  if (override && origin === 'registry') {
    logger.debug(`Ignoring override flag on ${label}: published packages cannot override`);
    override = false;
  }

  const registryName = raw.package !== undefined
    ? normalizeName(raw.package, 'package', requestor)
    : identity;

  let source: RequirementSource;
  let constraint: ParsedConstraint;
  if (raw.path !== undefined && hasPath) {
    source = { type: 'path', location: resolve(options.baseDir, raw.path) };
    constraint = { raw: '*', range: '*' };
  } else {
    source = { type: 'registry' };
    try {
      constraint = parseConstraint(raw.version ?? '');
    } catch (error) {
      throw new InvalidDeclarationError(
        `${label} has an invalid version constraint: ${error instanceof Error ? error.message : String(error)}`,
        { requestor, identity, version: raw.version }
      );
    }
  }

  return {
    requestor,
    identity,
    registryName,
    constraint: constraint.raw,
    range: constraint.range,
    source,
    optional: raw.optional === true,
    override
  };
}

/**
 * Normalize every declaration of one manifest, keeping declaration order.
 * Published registry metadata only contributes registry requirements: its
 * path declarations are skipped.
 */
export function normalizeDeclarations(
  raws: readonly ManifestDependency[] | undefined,
  requestor: string,
  options: NormalizeOptions
): Requirement[] {
  const declarations = (raws ?? []).filter(raw => {
    if (options.origin === 'registry' && !isBlank(raw.path)) {
      logger.debug(`Skipping path dependency '${raw.name}' declared by ${requestor} in registry metadata`);
      return false;
    }
    return true;
  });
  return declarations.map(raw => normalizeDeclaration(raw, requestor, options));
}
