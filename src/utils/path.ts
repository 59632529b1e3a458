// Path: src/utils/path.ts
// Path traversal protection and home-directory expansion

import os from 'node:os';
import path from 'node:path';
import { InvalidNameError } from './error.js';

/**
 * Check if a path is safe (no traversal attempts).
 * Detects:
 * - Directory traversal (../)
 * - Null bytes (\0)
 *
 * @param userPath - Path to validate
 * @returns true if path is safe
 */
export function isPathSafe(userPath: string): boolean {
  if (userPath.includes('\0')) {
    return false;
  }

  const normalized = path.normalize(userPath);
  return !normalized.split(/[\\/]/).includes('..');
}

/**
 * Validate an output path for file operations.
 * Throws if the path is invalid or contains traversal attempts.
 *
 * @param filePath - Path to validate
 * @throws Error if path is invalid
 */
export function validateOutputPath(filePath: string): void {
  if (!filePath) {
    throw new Error('Path cannot be empty');
  }

  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  if (!isPathSafe(filePath)) {
    throw new Error(`Invalid path (potential traversal): ${filePath}`);
  }
}

/**
 * Check that an entry name maps to exactly one file directly inside the
 * store directory.
 *
 * @throws InvalidNameError for empty names, separators, NUL, "." and ".."
 */
export function validateEntryName(name: string): void {
  if (!name) {
    throw new InvalidNameError('Config name cannot be empty');
  }
  if (name === '.' || name === '..' || /[\\/\0]/.test(name)) {
    throw new InvalidNameError(`Invalid config name: ${JSON.stringify(name)}`);
  }
}

/**
 * Expand a leading "~" to the current user's home directory.
 */
export function expandHome(input: string): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}
