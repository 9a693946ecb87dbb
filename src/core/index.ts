/**
 * Library entry point: resolution, overrides, the lock store and the
 * registry and path-source ports, without the CLI.
 */

export * from './resolution/index.js';
export { normalizeDeclaration, normalizeDeclarations } from './requirements/normalize.js';
export type { NormalizeOptions } from './requirements/normalize.js';
export { buildOverrideTable, applyOverrides, describeSource } from './overrides/override-engine.js';
export type { OverrideTable } from './overrides/override-engine.js';
export { CachedRegistry } from './registry/registry-lookup.js';
export type { RegistryLookup } from './registry/registry-lookup.js';
export { DirectoryRegistry, parseRegistryEntry } from './registry/directory-registry.js';
export type { RegistryEntry, RegistryRelease } from './registry/directory-registry.js';
export { FileSystemPathReader } from './path-source/path-reader.js';
export type { PathSourceReader } from './path-source/path-reader.js';
export { LockStore } from './lock/lock-store.js';
export { lockFromResult, parseLock, serializeLock } from './lock/lock-format.js';
export type { Lock, LockEntry, RegistryLockEntry, PathLockEntry } from './lock/lock-format.js';
export { buildDependencyReport, formatDependencyReport, formatSourceLabel } from './report/dependency-report.js';
export type { DependencyReportEntry, SourceKind } from './report/dependency-report.js';
export { ConfigManager } from './config.js';
export { createExecutionContext, readProjectManifest } from './execution-context.js';
export { runGetPipeline, runUpdatePipeline, runDepsPipeline } from './deps/deps-pipeline.js';
export { runInfoPipeline, configSnippetVersion } from './info/info-pipeline.js';
export * from './ports/index.js';
export { DeplockError, ErrorCodes } from '../types/index.js';
export type { DeplockConfig, ManifestDependency, ProjectManifest } from '../types/index.js';
export type { ExecutionContext } from '../types/execution-context.js';
export * from '../utils/errors.js';
