// Path: src/commands/values.ts
// Value commands: set, get, unset

import type { Command } from 'commander';
import chalk from 'chalk';
import { formatValue, parseAssignment, parseValue } from '../lib/cli-helpers.js';
import { obscure } from '../lib/obscure.js';
import { getAtPath, setAtPath, splitPath, unsetAtPath, type ConfigMap } from '../lib/tree.js';
import { CfgVaultError } from '../utils/error.js';
import { action, noteObscuring, openStore, withStoreOptions } from './helpers.js';
import type { GetCommandOptions, SetCommandOptions, StoreCommandOptions } from './types.js';

export function registerValueCommands(program: Command): void {
  // Set values
  withStoreOptions(
    program
      .command('set <name> <assignments...>')
      .description('Set configuration values (key=value, dotted keys for nesting)')
  )
    .option('-o, --obscure', 'Store the values obscured (for passwords)')
    .option('-c, --create', "Create the config if it doesn't exist")
    .addHelpText('after', `
Examples:
  cfgvault set database host=localhost port=5432
  cfgvault set database password=s3cret --obscure
  cfgvault set app server.port=8080 --create
`)
    .action(action(async (name: string, assignments: string[], options: SetCommandOptions) => {
      const manager = await openStore(options);
      // With --create a missing entry starts empty; addConfig still refuses one that failed to load
      const entry = options.create ? manager.getConfig(name) : manager.requireConfig(name);

      const data: ConfigMap = entry ? entry.getAll(false) : {};
      for (const assignment of assignments) {
        const { key, value } = parseAssignment(assignment);
        setAtPath(data, splitPath(key), options.obscure ? obscure(value) : parseValue(value));
      }

      manager.addConfig(name, data, false);
      if (options.obscure) {
        noteObscuring();
      }
      console.log(chalk.green('✓') + ` Updated config: ${name}`);
    }));

  // Get one value
  withStoreOptions(
    program
      .command('get <name> <key>')
      .description('Print one configuration value')
  )
    .option('-r, --reveal', 'Reveal the value if it is obscured')
    .option('-D, --default <value>', 'Printed when the key is missing')
    .action(action(async (name: string, key: string, options: GetCommandOptions) => {
      const manager = await openStore(options);
      const entry = manager.requireConfig(name);

      const value = getAtPath(entry.getAll(options.reveal === true), splitPath(key));
      if (value !== undefined) {
        console.log(formatValue(value));
      } else if (options.default !== undefined) {
        console.log(options.default);
      } else {
        throw new CfgVaultError(`Key '${key}' not found`, 'KEY_NOT_FOUND');
      }
    }));

  // Remove keys
  withStoreOptions(
    program
      .command('unset <name> <keys...>')
      .description('Remove configuration keys')
  )
    .action(action(async (name: string, keys: string[], options: StoreCommandOptions) => {
      const manager = await openStore(options);
      const data = manager.requireConfig(name).getAll(false);

      const removed = keys.filter(key => unsetAtPath(data, splitPath(key)));
      const missing = keys.filter(key => !removed.includes(key));

      if (removed.length > 0) {
        manager.addConfig(name, data, false);
        console.log(chalk.green('✓') + ` Removed keys from config '${name}': ${removed.join(', ')}`);
      }
      if (missing.length > 0) {
        console.log(chalk.yellow('Warning:'), `Keys not found: ${missing.join(', ')}`);
      }
    }));
}
