// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial writes of entry files

import fs from 'node:fs';
import path from 'node:path';
import { validateOutputPath } from './path.js';

export interface AtomicWriteOptions {
  /**
   * File permissions (octal number, e.g., 0o600).
   * Defaults to 0o600.
   */
  mode?: number;

  /**
   * Create parent directories if they don't exist.
   * Defaults to true.
   */
  createDirs?: boolean;

  /**
   * Mode for created parent directories.
   * Defaults to 0o700.
   */
  dirMode?: number;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o600,
  createDirs: true,
  dirMode: 0o700,
};

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all. The final file always carries
 * `mode`, whatever the process umask.
 *
 * @param filePath - Absolute path to target file
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 */
export function writeAtomic(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): void {
  validateOutputPath(filePath);

  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  if (opts.createDirs && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: opts.dirMode });
  }

  try {
    fs.writeFileSync(tempPath, content, { mode: opts.mode });
    fs.renameSync(tempPath, filePath);
    fs.chmodSync(filePath, opts.mode);
  } catch (err) {
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch {
      // Ignore cleanup errors, the original error is rethrown below
    }
    throw err;
  }
}

/**
 * Ensure a directory exists with owner-only permissions.
 *
 * @param dirPath - Directory path
 * @param mode - Directory mode (default: 0o700)
 */
export function ensureDir(dirPath: string, mode: number = 0o700): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true, mode });
  }
}

/**
 * Check whether a directory exists and contains at least one entry.
 */
export function isNonEmptyDir(dirPath: string): boolean {
  try {
    return fs.readdirSync(dirPath).length > 0;
  } catch {
    return false;
  }
}
