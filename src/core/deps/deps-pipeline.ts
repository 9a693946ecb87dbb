import type { CommandResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { ResolutionResult } from '../resolution/types.js';
import type { Lock } from '../lock/lock-format.js';
import { resolveDependencies } from '../resolution/resolver.js';
import {
  buildDependencyReport,
  formatDependencyReport,
  type DependencyReportEntry
} from '../report/dependency-report.js';
import { readProjectManifest } from '../execution-context.js';
import { resolveOutput } from '../ports/resolve.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface DepsPipelineResult {
  result: ResolutionResult;
  report: DependencyReportEntry[];
  /** False when the lock file already held this resolution */
  lockWritten: boolean;
}

export interface UpdateOptions {
  /** Identities to re-resolve ignoring the lock */
  packages?: string[];
  /** Re-resolve everything */
  all?: boolean;
}

async function resolveProject(
  ctx: ExecutionContext,
  lock: Lock,
  unlock?: 'all' | readonly string[]
): Promise<ResolutionResult> {
  const manifest = await readProjectManifest(ctx.projectRoot);
  const result = await resolveDependencies({
    manifest,
    baseDir: ctx.projectRoot,
    registry: ctx.registry,
    pathReader: ctx.pathReader,
    lock,
    unlock,
    allowPrerelease: ctx.config.allowPrerelease,
    signal: ctx.signal
  });

  for (const warning of result.warnings) {
    logger.debug(warning);
  }
  return result;
}

/**
 * Resolve, print what changed against the lock with `verb`, write the lock.
 */
async function resolveAndLock(
  ctx: ExecutionContext,
  verb: 'Getting' | 'Updating',
  unlock?: 'all' | readonly string[]
): Promise<CommandResult<DepsPipelineResult>> {
  const output = resolveOutput(ctx);
  const previous = await ctx.lockStore.read();
  const result = await resolveProject(ctx, previous, unlock);
  const report = buildDependencyReport(result, previous, ctx.projectRoot);

  const changed = report.filter(entry => entry.lockStatus !== 'locked');
  for (const entry of changed) {
    output.info(`* ${verb} ${entry.name} (${entry.sourceLabel})`);
  }
  if (changed.length === 0) {
    output.info('All dependencies are up to date');
  }

  const lockWritten = await ctx.lockStore.write(result);
  logger.debug(lockWritten ? `Wrote ${ctx.lockStore.path}` : 'Lock file already up to date');

  return { success: true, data: { result, report, lockWritten } };
}

/**
 * `get`: resolve honouring the lock and record the result.
 */
export async function runGetPipeline(ctx: ExecutionContext): Promise<CommandResult<DepsPipelineResult>> {
  return resolveAndLock(ctx, 'Getting');
}

/**
 * `update`: resolve with the named packages (or all) unlocked and record the result.
 */
export async function runUpdatePipeline(
  ctx: ExecutionContext,
  options: UpdateOptions
): Promise<CommandResult<DepsPipelineResult>> {
  const names = (options.packages ?? []).map(normalizePackageName);
  if (!options.all && names.length === 0) {
    throw new ValidationError('update requires package names or --all');
  }

  const outcome = await resolveAndLock(ctx, 'Updating', options.all ? 'all' : names);

  const resolved = outcome.data?.result.packages;
  const unknown = names.filter(name => !resolved?.has(name));
  if (unknown.length > 0) {
    const output = resolveOutput(ctx);
    for (const name of unknown) {
      output.warn(`Unknown dependency '${name}'`);
    }
    outcome.warnings = unknown.map(name => `Unknown dependency '${name}'`);
  }

  return outcome;
}

/**
 * `deps`: resolve against the lock without writing and report every package's lock status.
 */
export async function runDepsPipeline(ctx: ExecutionContext): Promise<CommandResult<DependencyReportEntry[]>> {
  const output = resolveOutput(ctx);
  const lock = await ctx.lockStore.read();
  const result = await resolveProject(ctx, lock);
  const report = buildDependencyReport(result, lock, ctx.projectRoot);

  for (const line of formatDependencyReport(report)) {
    output.info(line);
  }

  return { success: true, data: report };
}
