import * as yaml from 'js-yaml';
import type { ManifestDependency, ProjectManifest } from '../types/index.js';
import { readTextFile } from './fs.js';
import { InvalidManifestError } from './errors.js';

/**
 * Parsing of deplock.yml manifests.
 * Only the shape is checked here; source rules for each dependency are
 * enforced when the declaration is normalized into a requirement.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(entry: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  // YAML reads `version: 1.0` as a number
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw new Error(`${where}: '${key}' must be a string`);
  }
  return value;
}

function optionalBoolean(entry: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`${where}: '${key}' must be true or false`);
  }
  return value;
}

/**
 * Coerce a YAML dependency list into ManifestDependency records.
 * Throws a plain Error describing the first problem; callers wrap it.
 */
export function coerceDependencyList(value: unknown, section: string): ManifestDependency[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new Error(`'${section}' must be a list`);
  }

  return value.map((entry: unknown, index) => {
    const where = `${section}[${index}]`;
    if (!isRecord(entry)) {
      throw new Error(`${where} must be a mapping`);
    }
    const name = optionalString(entry, 'name', where);
    if (!name) {
      throw new Error(`${where} is missing 'name'`);
    }

    const dependency: ManifestDependency = { name };
    const version = optionalString(entry, 'version', where);
    const path = optionalString(entry, 'path', where);
    const pkg = optionalString(entry, 'package', where);
    const optional = optionalBoolean(entry, 'optional', where);
    const override = optionalBoolean(entry, 'override', where);
    if (version !== undefined) dependency.version = version;
    if (path !== undefined) dependency.path = path;
    if (pkg !== undefined) dependency.package = pkg;
    if (optional !== undefined) dependency.optional = optional;
    if (override !== undefined) dependency.override = override;
    return dependency;
  });
}

/**
 * Parse manifest text. `location` is only used in error messages.
 */
export function parseManifestContent(content: string, location: string): ProjectManifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidManifestError(location, error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(parsed)) {
    throw new InvalidManifestError(location, 'expected a mapping at the top level');
  }

  try {
    const name = optionalString(parsed, 'name', 'manifest');
    if (!name) {
      throw new Error(`manifest must contain a name field`);
    }
    const manifest: ProjectManifest = {
      name,
      dependencies: coerceDependencyList(parsed.dependencies, 'dependencies')
    };
    const version = optionalString(parsed, 'version', 'manifest');
    const description = optionalString(parsed, 'description', 'manifest');
    if (version !== undefined) manifest.version = version;
    if (description !== undefined) manifest.description = description;
    return manifest;
  } catch (error) {
    throw new InvalidManifestError(location, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Read and parse a deplock.yml file
 */
export async function parseManifestYml(manifestPath: string): Promise<ProjectManifest> {
  const content = await readTextFile(manifestPath);
  return parseManifestContent(content, manifestPath);
}
