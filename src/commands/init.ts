// Path: src/commands/init.ts
// Initialize a config directory

import type { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from '../lib/config/index.js';
import { CONFIG_DIR_MODE } from '../lib/config/types.js';
import { DEFAULT_FORMAT, getFormat } from '../lib/formats/index.js';
import { getSettingsPath, resolveConfigDir, saveSettings } from '../lib/settings.js';
import { ensureDir, isNonEmptyDir } from '../utils/file.js';
import { action, confirm, readNewPassword, withStoreOptions } from './helpers.js';
import type { InitCommandOptions } from './types.js';

export function registerInitCommand(program: Command): void {
  withStoreOptions(
    program
      .command('init')
      .description('Initialize a config directory and make it the default')
  )
    .option('-e, --encrypt', 'Encrypt entries written to this directory')
    .addHelpText('after', `
Examples:
  cfgvault init                          # Default directory, TOML
  cfgvault init -d ./configs -f yaml     # Project-local YAML configs
  cfgvault init --encrypt                # Prompt for an encryption password
`)
    .action(action(async (options: InitCommandOptions) => {
      const directory = resolveConfigDir(options.configDir);
      const format = getFormat((options.format ?? DEFAULT_FORMAT).toLowerCase()).getName();

      if (isNonEmptyDir(directory)) {
        console.log(chalk.yellow('Warning:'), `Directory ${directory} already exists and is not empty`);
        if (!(await confirm('Continue?'))) {
          console.log('Cancelled');
          return;
        }
      }

      const password = options.encrypt ? await readNewPassword() : undefined;

      ensureDir(directory, CONFIG_DIR_MODE);
      const manager = new ConfigManager({ directory, format, password });
      if (password !== undefined && manager.listConfigs().length > 0) {
        manager.setEncryptionPassword(password);
      }

      saveSettings({ directory, format, encrypted: password !== undefined });

      console.log(chalk.green('✓') + ` Initialized config directory: ${directory}`);
      console.log(`  Format: ${format}`);
      console.log(`  Encrypted: ${password !== undefined ? 'Yes' : 'No'}`);
      console.log(chalk.gray(`  Settings saved to ${getSettingsPath()}`));
    }));
}
