// Path: src/commands/helpers.ts
// Shared plumbing for commands: store options, opening the store, passwords, errors

import type { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import fs from 'node:fs';
import {
  CfgVaultError,
  InvalidPasswordError,
  PasswordUnavailableError,
  extractErrorMessage,
} from '../utils/error.js';
import { ConfigManager, findEncryptedEntries } from '../lib/config/index.js';
import { ENV_PASSWORD, ENV_PASSWORD_COMMAND, checkPassword, getPassword } from '../lib/crypt.js';
import { cliLogger as log } from '../lib/logger.js';
import { OBSCURE_SECURITY_NOTICE } from '../lib/obscure.js';
import { isRecordedEncrypted, resolveConfigDir, resolveFormat } from '../lib/settings.js';
import type { FormatName } from '../lib/formats/index.js';
import type { StoreCommandOptions } from './types.js';

/**
 * Add the options every command takes.
 */
export function withStoreOptions(command: Command): Command {
  return command
    .option('-d, --config-dir <dir>', 'Config directory (default: recorded by init, or platform default)')
    .option('-f, --format <format>', 'Config format: toml, ini or yaml (default: detected)');
}

export interface StoreLocation {
  directory: string;
  format: FormatName;
}

export function locateStore(options: StoreCommandOptions): StoreLocation {
  const directory = resolveConfigDir(options.configDir);
  return { directory, format: resolveFormat(directory, options.format) };
}

/**
 * Open the config directory, asking for the password only if some entry
 * is encrypted or `init --encrypt` recorded this directory.
 *
 * Entries that fail to load are reported and skipped, except that a
 * password which does not decrypt some entry fails the whole command.
 *
 * @throws CfgVaultError if the directory does not exist
 * @throws InvalidPasswordError if the password does not decrypt every entry
 */
export async function openStore(options: StoreCommandOptions): Promise<ConfigManager> {
  const { directory, format } = locateStore(options);

  if (!fs.existsSync(directory)) {
    throw new CfgVaultError(
      `Config directory not found: ${directory}. Run 'cfgvault init' first`,
      'DIR_NOT_FOUND'
    );
  }

  const needsPassword = findEncryptedEntries(directory, format).length > 0 || isRecordedEncrypted(directory);
  const password = needsPassword ? await getPassword() : undefined;

  const manager = new ConfigManager({ directory, format, password });
  const failures = [...manager.getLoadFailures()];
  const undecryptable = failures.filter(([, err]) => err instanceof InvalidPasswordError).map(([name]) => name);
  if (undecryptable.length > 0) {
    throw new InvalidPasswordError(`Invalid password: could not decrypt ${undecryptable.join(', ')}`);
  }

  const failed = failures.map(([name]) => name);
  if (failed.length > 0) {
    console.error(chalk.yellow('Warning:'), `Could not load: ${failed.join(', ')}`);
  }
  return manager;
}

let obscureNoticeShown = false;

/**
 * Print the obfuscation notice, once per process.
 */
export function noteObscuring(): void {
  if (obscureNoticeShown) {
    return;
  }
  obscureNoticeShown = true;
  console.error(chalk.yellow('Note:'), OBSCURE_SECURITY_NOTICE);
}

/**
 * Read a new password: from CFGVAULT_PASSWORD / CFGVAULT_PASSWORD_COMMAND
 * when set, else prompted twice on a terminal.
 *
 * @throws CfgVaultError if the prompted passwords differ or the password is empty
 * @throws PasswordUnavailableError with no source and no terminal
 */
export async function readNewPassword(): Promise<string> {
  let password: string;

  if (process.env[ENV_PASSWORD] || process.env[ENV_PASSWORD_COMMAND]) {
    password = await getPassword({ changing: true });
  } else if (process.stdin.isTTY) {
    const answers = await inquirer.prompt<{ password: string; confirm: string }>([
      { type: 'password', name: 'password', message: 'New encryption password:', mask: '*' },
      { type: 'password', name: 'confirm', message: 'Confirm password:', mask: '*' },
    ]);
    if (answers.password !== answers.confirm) {
      throw new CfgVaultError('Passwords do not match', 'PASSWORD_MISMATCH');
    }
    password = answers.password;
  } else {
    throw new PasswordUnavailableError('No password provided and cannot prompt (not a TTY)');
  }

  const checked = checkPassword(password);
  for (const warning of checked.warnings) {
    console.error(chalk.yellow('Warning:'), warning);
  }
  return checked.password;
}

/**
 * Ask a yes/no question; `assumeYes` skips the prompt.
 */
export async function confirm(message: string, assumeYes = false): Promise<boolean> {
  if (assumeYes) {
    return true;
  }
  if (!process.stdin.isTTY) {
    throw new CfgVaultError('Confirmation required: pass --yes when not running in a terminal', 'CONFIRMATION_REQUIRED');
  }

  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    { type: 'confirm', name: 'confirmed', message, default: false },
  ]);
  return confirmed;
}

export function reportError(err: unknown): void {
  log.debug({ err }, 'Command failed');
  console.error(chalk.red('Error:'), extractErrorMessage(err));
  process.exitCode = 1;
}

/**
 * Wrap a command action so that any failure is printed and sets exit code 1.
 */
export function action<Args extends unknown[]>(
  fn: (...args: Args) => Promise<void> | void
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await fn(...args);
    } catch (err) {
      reportError(err);
    }
  };
}
