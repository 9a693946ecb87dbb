import { DeplockError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of resolution, locking and I/O
 */

/**
 * One requirement that took part in a failure, with the chain of requestors
 * leading to it from the root (e.g. `['root', 'ecto 0.2.0']`).
 */
export interface RequirementTrace {
  chain: string[];
  constraint: string;
  registryName: string;
  optional: boolean;
}

export function formatTrace(identity: string, trace: RequirementTrace): string {
  const aliased = trace.registryName !== identity ? ` (package ${trace.registryName})` : '';
  const optional = trace.optional ? ' (optional)' : '';
  return `${trace.chain.join(' -> ')} requires ${identity} ${trace.constraint}${aliased}${optional}`;
}

export class InvalidDeclarationError extends DeplockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid dependency declaration: ${message}`, ErrorCodes.INVALID_DECLARATION, details);
    this.name = 'InvalidDeclarationError';
  }
}

export class ConflictingOverrideError extends DeplockError {
  constructor(identity: string, sources: string[]) {
    super(
      `Conflicting overrides for '${identity}': ${sources.join(' vs ')}. Declare at most one overriding source per package.`,
      ErrorCodes.CONFLICTING_OVERRIDE,
      { identity, sources }
    );
    this.name = 'ConflictingOverrideError';
  }
}

export class UnsatisfiableError extends DeplockError {
  readonly identity: string;
  readonly requirements: RequirementTrace[];

  constructor(identity: string, requirements: RequirementTrace[], availableVersions: string[]) {
    const lines = requirements.map(trace => `  ${formatTrace(identity, trace)}`);
    const available = availableVersions.length > 0
      ? `Available versions: ${availableVersions.join(', ')}`
      : 'No versions available in the registry';
    super(
      `Unable to resolve '${identity}': no version satisfies all requirements\n${lines.join('\n')}\n${available}`,
      ErrorCodes.UNSATISFIABLE,
      { identity, requirements, availableVersions }
    );
    this.name = 'UnsatisfiableError';
    this.identity = identity;
    this.requirements = requirements;
  }
}

export class NameConflictError extends DeplockError {
  readonly identity: string;

  constructor(identity: string, requirements: RequirementTrace[]) {
    const lines = requirements.map(trace => `  ${formatTrace(identity, trace)}`);
    super(
      `Dependency '${identity}' refers to different registry packages\n${lines.join('\n')}`,
      ErrorCodes.NAME_CONFLICT,
      { identity, requirements }
    );
    this.name = 'NameConflictError';
    this.identity = identity;
  }
}

export class PathNotFoundError extends DeplockError {
  constructor(location: string) {
    super(`Path dependency not found: ${location}`, ErrorCodes.PATH_NOT_FOUND, { location });
    this.name = 'PathNotFoundError';
  }
}

export class InvalidManifestError extends DeplockError {
  constructor(location: string, reason: string) {
    super(`Invalid manifest at ${location}: ${reason}`, ErrorCodes.INVALID_MANIFEST, { location });
    this.name = 'InvalidManifestError';
  }
}

export class RegistryNotFoundError extends DeplockError {
  constructor(registryName: string, version?: string) {
    const what = version ? `${registryName} ${version}` : registryName;
    super(`Package '${what}' not found in registry`, ErrorCodes.PACKAGE_NOT_FOUND, { registryName, version });
    this.name = 'RegistryNotFoundError';
  }
}

export class RegistryNetworkError extends DeplockError {
  constructor(registryName: string, cause: unknown) {
    super(
      `Could not reach registry for '${registryName}': ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCodes.REGISTRY_NETWORK,
      { registryName }
    );
    this.name = 'RegistryNetworkError';
  }
}

export class MalformedMetadataError extends DeplockError {
  constructor(registryName: string, reason: string) {
    super(`Malformed registry metadata for '${registryName}': ${reason}`, ErrorCodes.MALFORMED_METADATA, { registryName });
    this.name = 'MalformedMetadataError';
  }
}

export class InvalidLockfileError extends DeplockError {
  constructor(path: string, reason: string) {
    super(`Invalid lock file ${path}: ${reason}`, ErrorCodes.INVALID_LOCKFILE, { path });
    this.name = 'InvalidLockfileError';
  }
}

export class ResolutionAbortedError extends DeplockError {
  constructor(reason?: unknown) {
    super(
      `Resolution aborted${reason instanceof Error ? `: ${reason.message}` : ''}`,
      ErrorCodes.RESOLUTION_ABORTED
    );
    this.name = 'ResolutionAbortedError';
  }
}

export class FileSystemError extends DeplockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ConfigError extends DeplockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class ValidationError extends DeplockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DeplockError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exitCode = 1;
    }
  };
}
