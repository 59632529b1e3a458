// Path: src/commands/entries.ts
// Entry lifecycle commands: list, show, create, delete, copy, rename

import type { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import fs from 'node:fs';
import {
  exchangeFormatFromPath,
  parseExchange,
  parseValue,
  prettyLines,
  serializeExchange,
  toExchangeFormat,
} from '../lib/cli-helpers.js';
import { findEncryptedEntries } from '../lib/config/index.js';
import { obscure } from '../lib/obscure.js';
import type { ConfigMap } from '../lib/tree.js';
import { ConfigExistsError, ConfigNotFoundError } from '../utils/error.js';
import { action, confirm, locateStore, noteObscuring, openStore, withStoreOptions } from './helpers.js';
import type {
  ConfirmCommandOptions,
  CopyCommandOptions,
  CreateCommandOptions,
  ListCommandOptions,
  ShowCommandOptions,
} from './types.js';

interface ListedEntry {
  name: string;
  encrypted: boolean;
  error?: string;
}

interface InteractiveEntry {
  data: ConfigMap;
  sensitive: boolean;
}

/**
 * Ask for key/value pairs until an empty key is entered. Values marked
 * sensitive are read hidden and stored obscured.
 */
async function promptForEntries(): Promise<InteractiveEntry> {
  const data: ConfigMap = {};
  let sensitive = false;

  for (;;) {
    const { key } = await inquirer.prompt<{ key: string }>([
      { type: 'input', name: 'key', message: 'Key (empty to finish):' },
    ]);
    if (!key.trim()) {
      break;
    }

    const { secret } = await inquirer.prompt<{ secret: boolean }>([
      { type: 'confirm', name: 'secret', message: `Is '${key}' a sensitive value (password)?`, default: false },
    ]);
    const { value } = await inquirer.prompt<{ value: string }>([
      secret
        ? { type: 'password', name: 'value', message: `Value for '${key}':`, mask: '*' }
        : { type: 'input', name: 'value', message: `Value for '${key}':` },
    ]);

    data[key.trim()] = secret ? obscure(value) : parseValue(value);
    sensitive ||= secret;
  }

  return { data, sensitive };
}

export function registerEntryCommands(program: Command): void {
  // List entries
  withStoreOptions(
    program
      .command('list')
      .description('List all configurations')
  )
    .option('--json', 'Output as JSON')
    .option('--plain', 'One name per line')
    .action(action(async (options: ListCommandOptions) => {
      const { directory } = locateStore(options);
      if (!fs.existsSync(directory)) {
        if (options.json) {
          console.log('[]');
        } else {
          console.log(chalk.yellow('No config directory found.'));
          console.log(`Run ${chalk.cyan('cfgvault init')} to create one at: ${directory}`);
        }
        return;
      }

      const manager = await openStore(options);
      // State of each file on disk, which can differ from the password held
      const encryptedFiles = new Set(findEncryptedEntries(directory, manager.getFormatName()));
      const failures = manager.getLoadFailures();
      const entries: ListedEntry[] = [...manager.listConfigs(), ...failures.keys()]
        .sort()
        .map(name => ({ name, encrypted: encryptedFiles.has(name), error: failures.get(name)?.message }));

      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log('No configurations found');
        return;
      }

      if (options.plain) {
        for (const entry of entries) console.log(entry.name);
        return;
      }

      console.log(chalk.bold('Configurations'));
      console.log();
      for (const entry of entries) {
        const state = entry.encrypted ? chalk.green('encrypted') : chalk.gray('plaintext');
        const line = `  ${chalk.cyan(entry.name)}  ${state}`;
        console.log(entry.error ? `${line}  ${chalk.red(`unreadable: ${entry.error}`)}` : line);
      }
    }));

  // Show one entry
  withStoreOptions(
    program
      .command('show <name>')
      .description('Show a configuration')
  )
    .option('-r, --reveal', 'Reveal obscured values')
    .option('-o, --output <format>', 'Output format: pretty, json, yaml or toml', 'pretty')
    .action(action(async (name: string, options: ShowCommandOptions) => {
      const manager = await openStore(options);
      const data = manager.requireConfig(name).getAll(options.reveal === true);
      const output = options.output ?? 'pretty';

      if (output !== 'pretty') {
        process.stdout.write(serializeExchange(data, toExchangeFormat(output)));
        return;
      }

      console.log(chalk.bold('Configuration:'), name);
      console.log();
      for (const line of prettyLines(data)) console.log(line);

      if (!options.reveal) {
        console.log();
        console.log(chalk.yellow('Note:'), 'Use --reveal to show obscured values');
      }
    }));

  // Create an entry
  withStoreOptions(
    program
      .command('create <name>')
      .description('Create a new configuration')
  )
    .option('--from-file <path>', 'Import values from a JSON, YAML, TOML or INI file')
    .option('--no-interactive', 'Do not prompt for values')
    .addHelpText('after', `
Examples:
  cfgvault create database                      # Prompt for key/value pairs
  cfgvault create database --from-file db.json  # Values from a file
`)
    .action(action(async (name: string, options: CreateCommandOptions) => {
      const manager = await openStore(options);
      manager.assertLoadable(name);
      if (manager.hasConfig(name)) {
        throw new ConfigExistsError(name);
      }

      let data: ConfigMap = {};
      let obscured = false;

      if (options.fromFile) {
        data = parseExchange(fs.readFileSync(options.fromFile, 'utf-8'), exchangeFormatFromPath(options.fromFile));
      } else if (options.interactive && process.stdin.isTTY) {
        console.log(chalk.bold('Creating configuration:'), name);
        const entered = await promptForEntries();
        data = entered.data;
        obscured = entered.sensitive;
      } else {
        console.log(chalk.yellow('Warning:'), 'No values given; creating an empty configuration.');
        console.log(`Use ${chalk.cyan(`cfgvault set ${name} key=value`)} to add values.`);
      }

      manager.addConfig(name, data);
      if (obscured) {
        noteObscuring();
      }
      console.log(chalk.green('✓') + ` Created config: ${name}`);
    }));

  // Delete an entry
  withStoreOptions(
    program
      .command('delete <name>')
      .description('Delete a configuration')
  )
    .option('-y, --yes', 'Skip confirmation')
    .action(action(async (name: string, options: ConfirmCommandOptions) => {
      const manager = await openStore(options);
      if (!manager.exists(name)) {
        throw new ConfigNotFoundError(name);
      }

      if (!(await confirm(`Delete config '${name}'?`, options.yes))) {
        console.log('Cancelled');
        return;
      }

      manager.removeConfig(name);
      console.log(chalk.green('✓') + ` Deleted config: ${name}`);
    }));

  // Copy an entry
  withStoreOptions(
    program
      .command('copy <source> <dest>')
      .description('Copy a configuration')
  )
    .option('--overwrite', 'Replace the destination if it exists')
    .action(action(async (source: string, dest: string, options: CopyCommandOptions) => {
      const manager = await openStore(options);
      manager.copyConfig(source, dest, { overwrite: options.overwrite });
      console.log(chalk.green('✓') + ` Copied '${source}' to '${dest}'`);
    }));

  // Rename an entry
  withStoreOptions(
    program
      .command('rename <old> <new>')
      .description('Rename a configuration')
  )
    .option('--overwrite', 'Replace the destination if it exists')
    .action(action(async (oldName: string, newName: string, options: CopyCommandOptions) => {
      const manager = await openStore(options);
      manager.renameConfig(oldName, newName, { overwrite: options.overwrite });
      console.log(chalk.green('✓') + ` Renamed '${oldName}' to '${newName}'`);
    }));
}
