// Path: src/lib/config/manager.ts
// Directory of config entries: load, save, obscure, encrypt

import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigExistsError,
  ConfigNotFoundError,
  DecryptionError,
  EncryptionError,
  UnreadableConfigError,
  extractErrorMessage,
  wrapError,
} from '../../utils/error.js';
import { writeAtomic } from '../../utils/file.js';
import { expandHome, validateEntryName } from '../../utils/path.js';
import { decrypt, encrypt, isEncrypted } from '../crypt.js';
import { DEFAULT_FORMAT, getFormat, type ConfigFormat, type FormatName } from '../formats/index.js';
import { storeLogger as log } from '../logger.js';
import { isObscured, obscure } from '../obscure.js';
import type { ConfigSchema } from '../schema.js';
import { cloneMap, getAtPath, setAtPath, splitPath, type ConfigMap } from '../tree.js';
import { ConfigEntry } from './entry.js';
import { CONFIG_DIR_MODE, ENTRY_FILE_MODE, type ConfigManagerOptions, type CopyOptions } from './types.js';

function listEntryFiles(directory: string, extension: string): Array<{ name: string; filePath: string }> {
  if (!fs.existsSync(directory)) {
    return [];
  }

  return fs
    .readdirSync(directory)
    .filter((file) => file.endsWith(extension) && file.length > extension.length)
    .sort()
    .map((file) => ({
      name: file.slice(0, -extension.length),
      filePath: path.join(directory, file),
    }));
}

/**
 * Names of the entries in `directory` whose files are encrypted.
 * Used to decide whether a password must be resolved before opening.
 */
export function findEncryptedEntries(directory: string, format: FormatName | string = DEFAULT_FORMAT): string[] {
  const extension = getFormat(format).getExtension();
  return listEntryFiles(path.resolve(expandHome(directory)), extension)
    .filter(({ filePath }) => {
      try {
        return fs.statSync(filePath).isFile() && isEncrypted(fs.readFileSync(filePath));
      } catch (err) {
        log.warn({ err, path: filePath }, 'Could not inspect config file');
        return false;
      }
    })
    .map(({ name }) => name);
}

/**
 * Owns one directory of entries, all in the same format and the same
 * encryption state.
 *
 * Every file is loaded eagerly on construction. A file that fails to load
 * is logged and skipped so the others stay usable; see getLoadFailures().
 * Its name still counts as taken: writes to it and password changes are
 * refused with UnreadableConfigError until it is reloaded or removed.
 * Reads are in-memory. Writes go to disk first and only then replace the
 * in-memory entry.
 */
export class ConfigManager {
  private readonly directory: string;
  private readonly format: ConfigFormat;
  private readonly schema?: ConfigSchema;
  private password: string | undefined;
  private readonly configs = new Map<string, ConfigEntry>();
  private readonly loadFailures = new Map<string, Error>();

  /**
   * @throws FormatError if the format is not supported
   */
  constructor(options: ConfigManagerOptions) {
    this.directory = path.resolve(expandHome(options.directory));
    this.format = getFormat(options.format ?? DEFAULT_FORMAT);
    this.schema = options.schema;
    this.password = options.password;

    this.loadAll();
  }

  private loadAll(): void {
    if (!fs.existsSync(this.directory)) {
      log.debug({ directory: this.directory }, 'Config directory not found');
      return;
    }

    for (const { name, filePath } of listEntryFiles(this.directory, this.format.getExtension())) {
      try {
        if (!fs.statSync(filePath).isFile()) {
          continue;
        }
        this.configs.set(name, this.loadEntry(name, filePath));
      } catch (err) {
        this.loadFailures.set(name, err instanceof Error ? err : new Error(extractErrorMessage(err)));
        log.error({ err, name, path: filePath }, 'Failed to load config');
      }
    }
  }

  private loadEntry(name: string, filePath: string): ConfigEntry {
    let content: Buffer = fs.readFileSync(filePath);

    if (isEncrypted(content)) {
      if (this.password === undefined) {
        throw new DecryptionError(`Config '${name}' is encrypted but no password was provided`, {
          code: 'PASSWORD_REQUIRED',
        });
      }
      content = decrypt(content, this.password);
    }

    let data = this.format.load(content.toString('utf-8'));
    if (this.schema) {
      data = this.schema.validate(data);
    }

    log.debug({ name, path: filePath }, 'Loaded config');
    return new ConfigEntry(name, data, this.sensitiveFields());
  }

  private saveEntry(entry: ConfigEntry): void {
    const filePath = this.getFilePath(entry.name);

    let content: Buffer = Buffer.from(this.format.dump(entry.getAll(false)), 'utf-8');
    if (this.password !== undefined) {
      content = encrypt(content, this.password);
    }

    try {
      if (!fs.existsSync(this.directory)) {
        fs.mkdirSync(this.directory, { recursive: true, mode: CONFIG_DIR_MODE });
      }
      writeAtomic(filePath, content, { mode: ENTRY_FILE_MODE, dirMode: CONFIG_DIR_MODE });
    } catch (err) {
      throw wrapError(err, 'WRITE_FAILED', { name: entry.name, path: filePath });
    }

    log.debug({ name: entry.name, path: filePath, encrypted: this.password !== undefined }, 'Saved config');
  }

  private sensitiveFields(): Set<string> {
    return this.schema?.getSensitiveFields() ?? new Set();
  }

  getDirectory(): string {
    return this.directory;
  }

  getFormatName(): FormatName {
    return this.format.getName();
  }

  /**
   * Backing file of an entry: `<directory>/<name><extension>`.
   *
   * @throws InvalidNameError if the name cannot be a file in the directory
   */
  getFilePath(name: string): string {
    validateEntryName(name);
    return path.join(this.directory, `${name}${this.format.getExtension()}`);
  }

  listConfigs(): string[] {
    return [...this.configs.keys()];
  }

  getConfig(name: string): ConfigEntry | undefined {
    return this.configs.get(name);
  }

  /**
   * @throws UnreadableConfigError if the entry's file failed to load
   * @throws ConfigNotFoundError
   */
  requireConfig(name: string): ConfigEntry {
    const entry = this.configs.get(name);
    if (!entry) {
      this.assertLoadable(name);
      throw new ConfigNotFoundError(name);
    }
    return entry;
  }

  /**
   * Whether an entry with this name is on disk, loaded or not.
   */
  exists(name: string): boolean {
    return this.configs.has(name) || this.loadFailures.has(name);
  }

  /**
   * @throws UnreadableConfigError if `name` failed to load
   */
  assertLoadable(name: string): void {
    const failure = this.loadFailures.get(name);
    if (failure) {
      throw new UnreadableConfigError(name, failure);
    }
  }

  /**
   * @throws UnreadableConfigError for the first entry that failed to load
   */
  assertAllLoaded(): void {
    const [first] = this.loadFailures.keys();
    if (first !== undefined) {
      this.assertLoadable(first);
    }
  }

  hasConfig(name: string): boolean {
    return this.configs.has(name);
  }

  /** Names of entries skipped during the initial load */
  getFailedEntries(): string[] {
    return [...this.loadFailures.keys()];
  }

  /** Same as getFailedEntries, with the reason for each */
  getLoadFailures(): ReadonlyMap<string, Error> {
    return this.loadFailures;
  }

  /**
   * Read one entry from disk again, replacing the in-memory copy.
   * Unlike the initial load, failures are thrown.
   *
   * @throws ConfigNotFoundError if the file does not exist
   * @throws DecryptionError, InvalidPasswordError, FormatError, SchemaValidationError
   */
  reloadConfig(name: string): ConfigEntry {
    const filePath = this.getFilePath(name);
    if (!fs.existsSync(filePath)) {
      throw new ConfigNotFoundError(name);
    }

    const entry = this.loadEntry(name, filePath);
    this.configs.set(name, entry);
    this.loadFailures.delete(name);
    return entry;
  }

  /**
   * Create or fully replace an entry.
   *
   * The mapping is validated against the schema (defaults filled). With
   * `obscurePasswords`, sensitive string values that are not already
   * obscured get obscured; already-obscured values are left alone.
   *
   * @throws UnreadableConfigError if the existing file failed to load
   * @throws InvalidNameError, InvalidKeyError, SchemaValidationError,
   * FormatError, EncryptionError, or a WRITE_FAILED CfgVaultError. On any
   * failure the previous in-memory entry is kept.
   */
  addConfig(name: string, data: ConfigMap, obscurePasswords = true): void {
    validateEntryName(name);
    this.assertLoadable(name);

    let prepared = cloneMap(data);
    if (this.schema) {
      prepared = this.schema.validate(prepared);
    }

    const sensitive = this.sensitiveFields();
    if (obscurePasswords) {
      for (const field of sensitive) {
        const segments = splitPath(field);
        const value = getAtPath(prepared, segments);
        if (typeof value === 'string' && !isObscured(value)) {
          setAtPath(prepared, segments, obscure(value));
        }
      }
    }

    const entry = new ConfigEntry(name, prepared, sensitive);
    this.saveEntry(entry);
    this.configs.set(name, entry);

    log.info({ name }, 'Added config');
  }

  /**
   * Delete an entry and its file. Entries that failed to load can be
   * removed too.
   *
   * @returns false if there is no such entry
   */
  removeConfig(name: string): boolean {
    if (!this.exists(name)) {
      return false;
    }

    const filePath = this.getFilePath(name);
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
    this.configs.delete(name);
    this.loadFailures.delete(name);

    log.info({ name }, 'Removed config');
    return true;
  }

  /**
   * Copy an entry's stored values (obscured values stay obscured).
   *
   * @throws ConfigNotFoundError, ConfigExistsError, UnreadableConfigError
   */
  copyConfig(source: string, dest: string, options: CopyOptions = {}): ConfigEntry {
    const entry = this.requireConfig(source);
    this.assertLoadable(dest);
    if (this.configs.has(dest) && !options.overwrite) {
      throw new ConfigExistsError(dest);
    }

    this.addConfig(dest, entry.getAll(false), false);
    return this.requireConfig(dest);
  }

  /**
   * Copy to the new name, then remove the old entry.
   *
   * @throws ConfigNotFoundError, ConfigExistsError, UnreadableConfigError
   */
  renameConfig(oldName: string, newName: string, options: CopyOptions = {}): ConfigEntry {
    if (oldName === newName) {
      return this.requireConfig(oldName);
    }

    const entry = this.copyConfig(oldName, newName, options);
    this.removeConfig(oldName);
    return entry;
  }

  /**
   * Set or change the password and rewrite every entry under it.
   *
   * Files are rewritten one at a time. If one fails, the in-memory password
   * goes back to the previous value and EncryptionError is thrown, but the
   * files already rewritten stay encrypted under the new password: the
   * directory is then mixed until the rotation is retried.
   *
   * Refused while any entry failed to load, since that file would keep
   * its old encryption.
   *
   * @throws EncryptionError
   * @throws UnreadableConfigError
   */
  setEncryptionPassword(newPassword: string): void {
    if (!newPassword) {
      throw new EncryptionError('Password cannot be empty');
    }
    this.assertAllLoaded();

    const previous = this.password;
    this.password = newPassword;

    for (const entry of this.configs.values()) {
      try {
        this.saveEntry(entry);
      } catch (err) {
        this.password = previous;
        throw new EncryptionError(`Failed to re-encrypt config '${entry.name}': ${extractErrorMessage(err)}`, {
          cause: err instanceof Error ? err : undefined,
        });
      }
    }

    log.info({ count: this.configs.size }, 'Updated encryption password for all configs');
  }

  /**
   * Forget the password and rewrite every entry in plaintext.
   *
   * @throws UnreadableConfigError while any entry failed to load
   */
  removeEncryption(): void {
    this.assertAllLoaded();
    this.password = undefined;

    for (const entry of this.configs.values()) {
      this.saveEntry(entry);
    }

    log.info({ count: this.configs.size }, 'Removed encryption from all configs');
  }

  /** Whether a password is held, not whether the files on disk are encrypted */
  isEncrypted(): boolean {
    return this.password !== undefined;
  }
}
