/**
 * Dependency resolution.
 * Public exports for project-layer collection, candidate ordering and the resolver.
 */

export { resolveDependencies } from './resolver.js';
export { collectProjectRequirements } from './project-collector.js';
export { orderCandidates, lockedEntryFor } from './candidate-order.js';

export type { PathPackage, ProjectLayer } from './project-collector.js';
export type { CandidateOrderInput } from './candidate-order.js';
export type {
  Requirement,
  RequirementOrigin,
  RequirementSource,
  Candidate,
  ResolvedPackage,
  ResolutionResult,
  ResolveOptions
} from './types.js';
