/**
 * Common types and interfaces for the deplock CLI application
 */

// Configuration types
export interface DeplockConfig {
  /** Directory holding the registry index (`<name>.yml` per package) */
  registry: string;
  /** Lock file name, relative to the project root */
  lockfile: string;
  /** Consider prerelease versions even when no range names one */
  allowPrerelease: boolean;
}

// Manifest (deplock.yml) types
export interface ManifestDependency {
  /** Local alias; becomes the package identity */
  name: string;

  // === Source fields (mutually exclusive) ===

  /** Registry source: version constraint */
  version?: string;

  /** Local filesystem path, relative to the declaring manifest */
  path?: string;

  // === Other fields ===

  /** Published registry name when it differs from `name` */
  package?: string;

  /** Only constrains resolution when something else needs the package */
  optional?: boolean;

  /** Wins over every other declaration of this package, at any depth */
  override?: boolean;
}

export interface ProjectManifest {
  name: string;
  version?: string;
  description?: string;
  dependencies?: ManifestDependency[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DeplockError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeplockError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_DECLARATION = 'INVALID_DECLARATION',
  CONFLICTING_OVERRIDE = 'CONFLICTING_OVERRIDE',
  UNSATISFIABLE = 'UNSATISFIABLE',
  NAME_CONFLICT = 'NAME_CONFLICT',
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  REGISTRY_NETWORK = 'REGISTRY_NETWORK',
  MALFORMED_METADATA = 'MALFORMED_METADATA',
  INVALID_LOCKFILE = 'INVALID_LOCKFILE',
  RESOLUTION_ABORTED = 'RESOLUTION_ABORTED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
