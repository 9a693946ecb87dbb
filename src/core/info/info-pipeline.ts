import semver from 'semver';
import type { CommandResult, ManifestDependency } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { resolveOutput } from '../ports/resolve.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { sortVersionsDescending } from '../../utils/version-ranges.js';
import { RegistryNotFoundError } from '../../utils/errors.js';

export interface PackageInfo {
  name: string;
  /** Newest first */
  releases: string[];
  snippet: string;
}

export interface ReleaseInfo {
  name: string;
  version: string;
  snippet: string;
  requirements: ManifestDependency[];
}

/**
 * Constraint to suggest for depending on `version`:
 * `~> 0.m.p` below 1.0, `~> M.m` from 1.0 on, prereleases kept in full.
 */
export function configSnippetVersion(version: string): string {
  const parsed = semver.parse(version);
  if (!parsed) {
    return version;
  }
  const { major, minor, patch, prerelease } = parsed;
  if (prerelease.length > 0) {
    return `~> ${major}.${minor}.${patch}-${prerelease.join('.')}`;
  }
  if (major === 0) {
    return `~> 0.${minor}.${patch}`;
  }
  return `~> ${major}.${minor}`;
}

function configLines(name: string, snippet: string): string[] {
  return ['Config:', `  - name: ${name}`, `    version: "${snippet}"`];
}

function dependencyLine(dependency: ManifestDependency): string {
  const aliased = dependency.package ? ` (package ${dependency.package})` : '';
  const optional = dependency.optional ? ' (optional)' : '';
  return `    ${dependency.name}: ${dependency.version ?? '*'}${aliased}${optional}`;
}

async function packageInfo(ctx: ExecutionContext, name: string): Promise<CommandResult<PackageInfo>> {
  const output = resolveOutput(ctx);
  let releases: string[];
  try {
    releases = sortVersionsDescending(await ctx.registry.getVersions(name));
  } catch (error) {
    if (error instanceof RegistryNotFoundError) {
      output.error(`No package with name ${name}`);
      return { success: false, error: `No package with name ${name}` };
    }
    throw error;
  }

  if (releases.length === 0) {
    output.error(`No releases of ${name}`);
    return { success: false, error: `No releases of ${name}` };
  }

  const snippet = configSnippetVersion(releases[0]);
  output.info(name);
  for (const line of configLines(name, snippet)) {
    output.info(line);
  }
  output.info(`  Releases: ${releases.join(', ')}`);

  return { success: true, data: { name, releases, snippet } };
}

async function releaseInfo(ctx: ExecutionContext, name: string, version: string): Promise<CommandResult<ReleaseInfo>> {
  const output = resolveOutput(ctx);
  let requirements: ManifestDependency[];
  try {
    requirements = await ctx.registry.getRequirements(name, version);
  } catch (error) {
    if (error instanceof RegistryNotFoundError) {
      output.error(`No release with name ${name} v${version}`);
      return { success: false, error: `No release with name ${name} v${version}` };
    }
    throw error;
  }

  const snippet = configSnippetVersion(version);
  output.info(`${name} v${version}`);
  for (const line of configLines(name, snippet)) {
    output.info(line);
  }
  if (requirements.length > 0) {
    output.info('  Dependencies:');
    for (const dependency of requirements) {
      output.info(dependencyLine(dependency));
    }
  }

  return { success: true, data: { name, version, snippet, requirements } };
}

/**
 * `info <package> [version]`: print a package's releases, or one release's dependencies.
 */
export async function runInfoPipeline(
  ctx: ExecutionContext,
  packageName: string,
  version?: string
): Promise<CommandResult<PackageInfo | ReleaseInfo>> {
  const name = normalizePackageName(packageName);
  return version === undefined ? packageInfo(ctx, name) : releaseInfo(ctx, name, version.trim());
}
