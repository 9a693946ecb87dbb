import { ROOT_REQUESTOR } from '../constants/index.js';

/**
 * Package names: lowercase letter first, then lowercase letters, digits,
 * `_`, `-` or `.`. The same rule applies to local aliases and registry names.
 */
export const PACKAGE_NAME_REGEX = /^[a-z][a-z0-9_.-]*$/;

const MAX_NAME_LENGTH = 214;

/**
 * Normalize a declared package name to its canonical form
 */
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Return a reason the normalized name is unusable, or null when it is valid.
 */
export function checkPackageName(name: string): string | null {
  if (name.length === 0) {
    return 'package name cannot be empty';
  }
  if (name.length > MAX_NAME_LENGTH) {
    return `package name '${name}' is too long (max ${MAX_NAME_LENGTH} characters)`;
  }
  if (name === ROOT_REQUESTOR) {
    return `'${ROOT_REQUESTOR}' is reserved for the project itself`;
  }
  if (!PACKAGE_NAME_REGEX.test(name)) {
    return `package name '${name}' may only contain lowercase letters, digits, '_', '-' and '.', and must start with a letter`;
  }
  return null;
}
