// Path: src/lib/settings.ts
// CLI user settings (conf) and config directory / format resolution

import Conf from 'conf';
import os from 'node:os';
import path from 'node:path';
import { expandHome } from '../utils/path.js';
import { detectDirectoryFormat, getFormat, isFormatName, type FormatName } from './formats/index.js';

export const APP_NAME = 'cfgvault';

export const ENV_CONFIG_DIR = 'CFGVAULT_DIR';

/**
 * What `cfgvault init` remembers between runs
 */
export type CliSettings = {
  directory?: string;
  format?: FormatName;
  /** New entries in the recorded directory are written encrypted */
  encrypted?: boolean;
};

let store: Conf<CliSettings> | undefined;

/**
 * User-level settings store. Created on first use so that library users
 * and tests that never touch settings do not create a settings file.
 */
function getStore(): Conf<CliSettings> {
  store ??= new Conf<CliSettings>({ projectName: APP_NAME });
  return store;
}

export function readSettings(): CliSettings {
  const settings = getStore();
  const directory: unknown = settings.get('directory');
  const format: unknown = settings.get('format');
  const encrypted: unknown = settings.get('encrypted');

  return {
    directory: typeof directory === 'string' && directory ? directory : undefined,
    format: typeof format === 'string' && isFormatName(format) ? format : undefined,
    encrypted: encrypted === true,
  };
}

export function saveSettings(update: CliSettings): void {
  const settings = getStore();
  if (update.directory !== undefined) {
    settings.set('directory', update.directory);
  }
  if (update.format !== undefined) {
    settings.set('format', update.format);
  }
  if (update.encrypted !== undefined) {
    settings.set('encrypted', update.encrypted);
  }
}

export function getSettingsPath(): string {
  return getStore().path;
}

/**
 * Platform default config directory:
 * %APPDATA%\cfgvault on Windows, $XDG_CONFIG_HOME/cfgvault or
 * ~/.config/cfgvault elsewhere.
 */
export function defaultConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  if (platform === 'win32') {
    return path.join(env.APPDATA ?? path.join(home, 'AppData', 'Roaming'), APP_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME ?? path.join(home, '.config'), APP_NAME);
}

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  settings?: CliSettings;
}

/**
 * Whether `directory` is the one recorded by `init`.
 */
export function isRecordedDirectory(directory: string, settings: CliSettings = readSettings()): boolean {
  return settings.directory !== undefined && path.resolve(expandHome(settings.directory)) === directory;
}

/**
 * Whether `init --encrypt` (or `encrypt set`) was run for this directory.
 */
export function isRecordedEncrypted(directory: string, settings: CliSettings = readSettings()): boolean {
  return settings.encrypted === true && isRecordedDirectory(directory, settings);
}

/**
 * Directory the CLI works on: explicit option, CFGVAULT_DIR, the directory
 * recorded by `init`, then the platform default.
 */
export function resolveConfigDir(option?: string, options: ResolveOptions = {}): string {
  const env = options.env ?? process.env;
  const chosen =
    option || env[ENV_CONFIG_DIR] || (options.settings ?? readSettings()).directory || defaultConfigDir(env);
  return path.resolve(expandHome(chosen));
}

/**
 * Format the CLI works with: explicit option, the format recorded by
 * `init`, then whatever the directory already holds.
 *
 * @throws FormatError for an unsupported explicit format
 */
export function resolveFormat(directory: string, option?: string, settings?: CliSettings): FormatName {
  if (option) {
    return getFormat(option.toLowerCase()).getName();
  }
  return (settings ?? readSettings()).format ?? detectDirectoryFormat(directory);
}
