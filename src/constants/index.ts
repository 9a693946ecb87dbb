/**
 * Shared constants for the deplock CLI application.
 * Single source of truth for file names and reserved identifiers.
 */

export const FILE_PATTERNS = {
  MANIFEST_YML: 'deplock.yml',
  LOCKFILE: 'deplock.lock',
  REGISTRY_ENTRY_EXT: '.yml',
  CONFIG_FILES: ['deplock.config.jsonc', 'deplock.config.json']
} as const;

export const DEFAULT_REGISTRY_DIR = 'registry';

/** Requestor used for declarations in the project's own manifest */
export const ROOT_REQUESTOR = 'root';

export const LOCKFILE_VERSION = 1;

export const LOCKFILE_HEADER =
  '# This file is generated by deplock. Do not edit it by hand.\n';

export const ENV_VARS = {
  REGISTRY: 'DEPLOCK_REGISTRY',
  VERBOSE: 'DEPLOCK_VERBOSE'
} as const;
