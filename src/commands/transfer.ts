// Path: src/commands/transfer.ts
// Exchange commands: export, import, export-env

import type { Command } from 'commander';
import chalk from 'chalk';
import fs from 'node:fs';
import path from 'node:path';
import {
  exchangeFormatFromPath,
  parseExchange,
  serializeExchange,
  toEnvLines,
  toExchangeFormat,
} from '../lib/cli-helpers.js';
import { ConfigExistsError } from '../utils/error.js';
import { writeAtomic } from '../utils/file.js';
import { action, openStore, withStoreOptions } from './helpers.js';
import type { ExportCommandOptions, ExportEnvCommandOptions, ImportCommandOptions } from './types.js';

export function registerTransferCommands(program: Command): void {
  // Export to a file or stdout
  withStoreOptions(
    program
      .command('export <name>')
      .description('Export a configuration to a file or stdout')
  )
    .option('-o, --output <file>', 'Output file (stdout if not specified)')
    .option('-e, --export-format <format>', 'Export format: json, yaml, toml or ini', 'json')
    .option('-r, --reveal', 'Reveal obscured values')
    .addHelpText('after', `
Examples:
  cfgvault export database
  cfgvault export database -e yaml -o database.yaml
  cfgvault export database -o database.json --reveal
`)
    .action(action(async (name: string, options: ExportCommandOptions) => {
      const manager = await openStore(options);
      const data = manager.requireConfig(name).getAll(options.reveal === true);
      const content = serializeExchange(data, toExchangeFormat(options.exportFormat));

      if (!options.output) {
        process.stdout.write(content);
        return;
      }

      const outputPath = path.resolve(options.output);
      writeAtomic(outputPath, content, { mode: 0o600 });
      console.log(chalk.green('✓') + ` Exported to: ${outputPath}`);
    }));

  // Import from a file
  withStoreOptions(
    program
      .command('import <name>')
      .description('Import a configuration from a file')
  )
    .requiredOption('--from-file <path>', 'File to import from')
    .option('-i, --import-format <format>', 'Import format: json, yaml, toml or ini (default: from extension)')
    .option('--overwrite', 'Replace the config if it already exists')
    .addHelpText('after', `
Examples:
  cfgvault import database --from-file database.json
  cfgvault import database --from-file settings.conf -i ini --overwrite
`)
    .action(action(async (name: string, options: ImportCommandOptions) => {
      const manager = await openStore(options);
      manager.assertLoadable(name);
      if (manager.hasConfig(name) && !options.overwrite) {
        throw new ConfigExistsError(name);
      }

      const format = options.importFormat
        ? toExchangeFormat(options.importFormat)
        : exchangeFormatFromPath(options.fromFile);
      const data = parseExchange(fs.readFileSync(options.fromFile, 'utf-8'), format);

      manager.addConfig(name, data);
      console.log(chalk.green('✓') + ` Imported config: ${name}`);
    }));

  // Export as shell environment
  withStoreOptions(
    program
      .command('export-env <name>')
      .description('Print a configuration as shell export statements')
  )
    .option('-p, --prefix <prefix>', 'Environment variable prefix', '')
    .option('-r, --reveal', 'Reveal obscured values')
    .option('--no-uppercase', 'Keep key case as stored')
    .addHelpText('after', `
Examples:
  cfgvault export-env database --prefix DB_
  eval "$(cfgvault export-env database --prefix DB_ --reveal)"
`)
    .action(action(async (name: string, options: ExportEnvCommandOptions) => {
      const manager = await openStore(options);
      const data = manager.requireConfig(name).getAll(options.reveal === true);

      for (const line of toEnvLines(data, { prefix: options.prefix, uppercase: options.uppercase })) {
        console.log(line);
      }
    }));
}
