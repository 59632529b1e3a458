// Path: src/lib/config/types.ts
// Configuration store type definitions

import type { FormatName } from '../formats/index.js';
import type { ConfigSchema } from '../schema.js';

/**
 * Options for opening a config directory
 */
export interface ConfigManagerOptions {
  /** Directory holding one file per entry ("~" is expanded) */
  directory: string;
  /** File format of every entry (default: toml) */
  format?: FormatName | string;
  /** Validation, defaults and sensitive-field declarations */
  schema?: ConfigSchema;
  /** Encryption password; when absent, files are written in plaintext */
  password?: string;
}

/**
 * Options for copy and rename
 */
export interface CopyOptions {
  /** Replace an existing destination instead of failing */
  overwrite?: boolean;
}

/** Permissions forced on every entry file after a write */
export const ENTRY_FILE_MODE = 0o600;

/** Permissions for a config directory created by the store */
export const CONFIG_DIR_MODE = 0o700;
