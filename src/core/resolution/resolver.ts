/**
 * Resolver: backtracking search for one version per package identity.
 *
 * The project layer (root manifest plus path packages) is collected and its
 * overrides fixed before the search starts. The search then repeatedly picks
 * the first activated, unselected identity in first-declared order, tries its
 * candidates in order and recurses. Every decision point is an immutable
 * snapshot; undoing a tentative selection means dropping the snapshot.
 *
 * An identity is activated once some requirement on it is mandatory. Optional
 * requirements still narrow the versions of an activated identity, but never
 * pull a package in by themselves. Path packages follow the same rule and are
 * selected ahead of registry identities once activated.
 */

import type {
  Candidate,
  Requirement,
  ResolutionResult,
  ResolvedPackage,
  ResolveOptions
} from './types.js';
import { CachedRegistry, type RegistryLookup } from '../registry/registry-lookup.js';
import { collectProjectRequirements, type PathPackage } from './project-collector.js';
import { normalizeDeclarations } from '../requirements/normalize.js';
import { applyOverrides, type OverrideTable } from '../overrides/override-engine.js';
import { lockedEntryFor, orderCandidates } from './candidate-order.js';
import { ROOT_REQUESTOR } from '../../constants/index.js';
import {
  InvalidDeclarationError,
  MalformedMetadataError,
  NameConflictError,
  RegistryNotFoundError,
  ResolutionAbortedError,
  UnsatisfiableError,
  type RequirementTrace
} from '../../utils/errors.js';
import { satisfiesAll, sortVersionsDescending } from '../../utils/version-ranges.js';
import { logger } from '../../utils/logger.js';

interface SearchState {
  readonly selected: ReadonlyMap<string, Candidate>;
  /** Requirements of the root and of every selected package, post-override */
  readonly requirements: readonly Requirement[];
  /** Identities in first-declared order */
  readonly order: readonly string[];
}

/** Failures an earlier decision may undo */
type Conflict = UnsatisfiableError | NameConflictError;

type MergeResult =
  | { ok: true; state: SearchState }
  | { ok: false; conflict: Conflict };

function isConflict(error: unknown): error is Conflict {
  return error instanceof UnsatisfiableError || error instanceof NameConflictError;
}

function requirementsOn(state: SearchState, identity: string): Requirement[] {
  return state.requirements.filter(requirement => requirement.identity === identity);
}

function isActivated(state: SearchState, identity: string): boolean {
  return state.requirements.some(requirement => requirement.identity === identity && !requirement.optional);
}

/**
 * Path packages go first: they have a single candidate, and their
 * requirements narrow everything chosen after them.
 */
function pickNext(state: SearchState, pathPackages: ReadonlyMap<string, PathPackage>): string | undefined {
  const pending = state.order.filter(identity => !state.selected.has(identity) && isActivated(state, identity));
  return pending.find(identity => pathPackages.has(identity)) ?? pending[0];
}

function extendOrder(order: readonly string[], requirements: readonly Requirement[]): string[] {
  const next = [...order];
  for (const requirement of requirements) {
    if (!next.includes(requirement.identity)) {
      next.push(requirement.identity);
    }
  }
  return next;
}

/**
 * Chain of selections leading from the root to `requestor`, following the
 * first mandatory requirement on each package.
 */
function requestorChain(state: SearchState, requestor: string): string[] {
  const chain: string[] = [];
  const visited = new Set<string>();
  let current = requestor;

  while (current !== ROOT_REQUESTOR && !visited.has(current)) {
    visited.add(current);
    const selection = state.selected.get(current);
    chain.unshift(selection ? `${current} ${selection.version}` : current);

    const onCurrent = requirementsOn(state, current);
    const parent = onCurrent.find(requirement => !requirement.optional) ?? onCurrent[0];
    if (!parent) break;
    current = parent.requestor;
  }

  return [ROOT_REQUESTOR, ...chain];
}

function traceRequirements(state: SearchState, requirements: readonly Requirement[]): RequirementTrace[] {
  return requirements.map(requirement => ({
    chain: requestorChain(state, requirement.requestor),
    constraint: requirement.constraint,
    registryName: requirement.registryName,
    optional: requirement.optional
  }));
}

function pathVersion(version: string | undefined): string {
  return version && version.trim() !== '' ? version.trim() : '0.0.0';
}

class DependencySearch {
  constructor(
    private readonly options: ResolveOptions,
    private readonly overrides: OverrideTable,
    private readonly pathPackages: ReadonlyMap<string, PathPackage>,
    private readonly registry: RegistryLookup
  ) {}

  async run(initial: SearchState): Promise<SearchState> {
    const conflict = await this.findConflict(initial, initial.order);
    if (conflict) {
      throw conflict;
    }
    return this.search(initial);
  }

  private checkAborted(): void {
    const signal = this.options.signal;
    if (signal?.aborted) {
      throw new ResolutionAbortedError(signal.reason);
    }
  }

  private async availableVersions(registryName: string): Promise<string[]> {
    try {
      return sortVersionsDescending(await this.registry.getVersions(registryName));
    } catch (error) {
      if (error instanceof RegistryNotFoundError) {
        logger.debug(`Package '${registryName}' is not in the registry`);
        return [];
      }
      throw error;
    }
  }

  private async search(state: SearchState): Promise<SearchState> {
    this.checkAborted();

    const identity = pickNext(state, this.pathPackages);
    if (identity === undefined) {
      return state;
    }

    const pathPackage = this.pathPackages.get(identity);
    if (pathPackage) {
      return this.selectPath(state, pathPackage);
    }

    const requirements = requirementsOn(state, identity);
    const registryName = requirements[0].registryName;
    const versions = await this.availableVersions(registryName);
    const candidates = orderCandidates({
      registryName,
      versions,
      ranges: requirements.map(requirement => requirement.range),
      locked: lockedEntryFor(identity, this.options.lock, this.options.unlock),
      allowPrerelease: this.options.allowPrerelease
    });

    if (candidates.length === 0) {
      throw new UnsatisfiableError(identity, traceRequirements(state, requirements), versions);
    }

    let firstFailure: Conflict | undefined;
    for (const version of candidates) {
      this.checkAborted();
      logger.debug(`Trying ${identity} ${version}`);

      const candidate = await this.registryCandidate(identity, registryName, version);
      const merged = await this.select(state, candidate);
      if (!merged.ok) {
        logger.debug(`Rejected ${identity} ${version}: ${merged.conflict.message}`);
        firstFailure ??= merged.conflict;
        continue;
      }

      try {
        return await this.search(merged.state);
      } catch (error) {
        if (!isConflict(error)) {
          throw error;
        }
        logger.debug(`Backtracking from ${identity} ${version}`);
        firstFailure ??= error;
      }
    }

    throw firstFailure ?? new UnsatisfiableError(identity, traceRequirements(state, requirements), versions);
  }

  /**
   * A path package has one candidate, the manifest on disk. A conflict it
   * brings in can only be undone by an earlier registry decision.
   */
  private async selectPath(state: SearchState, pathPackage: PathPackage): Promise<SearchState> {
    logger.debug(`Selecting path package ${pathPackage.identity} at ${pathPackage.location}`);
    const merged = await this.select(state, {
      identity: pathPackage.identity,
      registryName: pathPackage.identity,
      version: pathVersion(pathPackage.manifest.version),
      source: { type: 'path', location: pathPackage.location },
      requirements: applyOverrides(pathPackage.requirements, this.overrides)
    });
    if (!merged.ok) {
      throw merged.conflict;
    }
    return this.search(merged.state);
  }

  private async registryCandidate(identity: string, registryName: string, version: string): Promise<Candidate> {
    const declared = await this.registry.getRequirements(registryName, version);

    let normalized: Requirement[];
    try {
      normalized = normalizeDeclarations(declared, identity, { baseDir: this.options.baseDir, origin: 'registry' });
    } catch (error) {
      if (error instanceof InvalidDeclarationError) {
        throw new MalformedMetadataError(registryName, `release ${version}: ${error.message}`);
      }
      throw error;
    }

    return {
      identity,
      registryName,
      version,
      source: { type: 'registry' },
      requirements: applyOverrides(normalized, this.overrides)
    };
  }

  /**
   * Tentatively select a candidate and merge its requirements.
   */
  private async select(state: SearchState, candidate: Candidate): Promise<MergeResult> {
    const selected = new Map(state.selected);
    selected.set(candidate.identity, candidate);

    const next: SearchState = {
      selected,
      requirements: [...state.requirements, ...candidate.requirements],
      order: extendOrder(state.order, candidate.requirements)
    };

    const conflict = await this.findConflict(next, candidate.requirements.map(requirement => requirement.identity));
    return conflict ? { ok: false, conflict } : { ok: true, state: next };
  }

  /**
   * Check every touched identity against the merged requirement set:
   * requirements must agree on the registry name, selections must satisfy
   * every range, and an activated pending registry identity must have at
   * least one version satisfying all of them.
   */
  private async findConflict(state: SearchState, touched: readonly string[]): Promise<Conflict | undefined> {
    const identities = state.order.filter(identity => touched.includes(identity));

    for (const identity of identities) {
      const nameConflict = this.checkNames(state, identity);
      if (nameConflict) {
        return nameConflict;
      }
    }

    const pending = identities.filter(
      identity => !state.selected.has(identity) && !this.pathPackages.has(identity) && isActivated(state, identity)
    );
    const versionLists = await Promise.all(
      pending.map(identity => this.availableVersions(requirementsOn(state, identity)[0].registryName))
    );
    const available = new Map(pending.map((identity, index): [string, string[]] => [identity, versionLists[index]]));

    for (const identity of identities) {
      const requirements = requirementsOn(state, identity);
      const ranges = requirements.map(requirement => requirement.range);
      const selection = state.selected.get(identity);

      if (selection) {
        if (selection.source.type === 'path') continue;
        if (!satisfiesAll(selection.version, ranges, true)) {
          return new UnsatisfiableError(identity, traceRequirements(state, requirements), [selection.version]);
        }
        continue;
      }

      const versions = available.get(identity);
      if (versions === undefined) continue;
      const allowPrerelease = this.options.allowPrerelease ?? false;
      if (!versions.some(version => satisfiesAll(version, ranges, allowPrerelease))) {
        return new UnsatisfiableError(identity, traceRequirements(state, requirements), versions);
      }
    }

    return undefined;
  }

  private checkNames(state: SearchState, identity: string): NameConflictError | undefined {
    const requirements = requirementsOn(state, identity).filter(requirement => requirement.source.type === 'registry');
    const selection = state.selected.get(identity);
    const names = new Set(requirements.map(requirement => requirement.registryName));
    if (selection && selection.source.type === 'registry') {
      names.add(selection.registryName);
    }
    return names.size > 1 ? new NameConflictError(identity, traceRequirements(state, requirements)) : undefined;
  }
}

/**
 * Resolve a project's dependency graph to one version per identity.
 */
export async function resolveDependencies(options: ResolveOptions): Promise<ResolutionResult> {
  const registry = new CachedRegistry(options.registry);
  const layer = await collectProjectRequirements(options.manifest, options.baseDir, options.pathReader);

  const initial: SearchState = {
    selected: new Map<string, Candidate>(),
    requirements: layer.root,
    order: extendOrder([], layer.root)
  };

  logger.debug(`Resolving ${initial.order.length} direct dependencies`);
  const search = new DependencySearch(options, layer.overrides, layer.pathPackages, registry);
  const final = await search.run(initial);

  const selections = final.order.flatMap(identity => {
    const selection = final.selected.get(identity);
    return selection ? [selection] : [];
  });

  const checksums = await Promise.all(
    selections.map(selection =>
      selection.source.type === 'registry'
        ? registry.getChecksum(selection.registryName, selection.version)
        : Promise.resolve(undefined)
    )
  );

  const packages = new Map<string, ResolvedPackage>();
  const warnings: string[] = [];
  selections.forEach((selection, index) => {
    const requestedBy = [...new Set(requirementsOn(final, selection.identity).map(requirement => requirement.requestor))];
    const resolved: ResolvedPackage = {
      identity: selection.identity,
      registryName: selection.registryName,
      version: selection.version,
      source: selection.source,
      requestedBy,
      requirementsSatisfied: true
    };
    const checksum = checksums[index];
    if (checksum !== undefined) {
      resolved.checksum = checksum;
    }
    packages.set(selection.identity, resolved);

    const locked = lockedEntryFor(selection.identity, options.lock, options.unlock);
    if (selection.source.type === 'registry' && locked && locked.version !== selection.version) {
      warnings.push(`'${selection.identity}' moved from locked ${locked.version} to ${selection.version}`);
    }
  });

  return { packages, warnings };
}
