// Path: src/commands/encrypt.ts
// Encryption management: set, remove, check

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { findEncryptedEntries } from '../lib/config/index.js';
import { isRecordedDirectory, saveSettings } from '../lib/settings.js';
import { action, confirm, locateStore, openStore, readNewPassword, withStoreOptions } from './helpers.js';
import type { ConfirmCommandOptions, StoreCommandOptions } from './types.js';

/**
 * Keep the recorded encryption flag in step with the recorded directory.
 */
function recordEncryption(directory: string, encrypted: boolean): void {
  if (isRecordedDirectory(directory)) {
    saveSettings({ encrypted });
  }
}

export function registerEncryptCommands(program: Command): void {
  const encryptCmd = program
    .command('encrypt')
    .description('Manage config encryption');

  // Set or change the password
  withStoreOptions(
    encryptCmd
      .command('set')
      .description('Set or change the encryption password and re-encrypt every config')
  )
    .addHelpText('after', `
The current password (if any) is read first, then the new one.
CFGVAULT_PASSWORD_COMMAND is run with CFGVAULT_PASSWORD_CHANGE=1 for the new password.
`)
    .action(action(async (options: StoreCommandOptions) => {
      const manager = await openStore(options);
      manager.assertAllLoaded();
      const password = await readNewPassword();

      const spinner = ora('Encrypting configs...').start();
      try {
        manager.setEncryptionPassword(password);
        spinner.succeed(`Encryption password updated (${manager.listConfigs().length} configs)`);
      } catch (err) {
        spinner.fail('Failed to update encryption password');
        throw err;
      }

      recordEncryption(manager.getDirectory(), true);
    }));

  // Remove encryption
  withStoreOptions(
    encryptCmd
      .command('remove')
      .description('Remove encryption from every config')
  )
    .option('-y, --yes', 'Skip confirmation')
    .action(action(async (options: ConfirmCommandOptions) => {
      const manager = await openStore(options);
      manager.assertAllLoaded();

      if (!(await confirm('Remove encryption? Configs will be stored in plaintext.', options.yes))) {
        console.log('Cancelled');
        return;
      }

      const spinner = ora('Decrypting configs...').start();
      try {
        manager.removeEncryption();
        spinner.succeed('Encryption removed');
      } catch (err) {
        spinner.fail('Failed to remove encryption');
        throw err;
      }

      recordEncryption(manager.getDirectory(), false);
    }));

  // Report the encryption state without asking for a password
  withStoreOptions(
    encryptCmd
      .command('check')
      .description('Check whether configs are encrypted')
  )
    .action(action((options: StoreCommandOptions) => {
      const { directory, format } = locateStore(options);
      const encrypted = findEncryptedEntries(directory, format);

      if (encrypted.length > 0) {
        console.log(chalk.green('✓') + ' Configs are encrypted');
      } else {
        console.log(chalk.yellow('!') + ' Configs are NOT encrypted');
      }
    }));
}
