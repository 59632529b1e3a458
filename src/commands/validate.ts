// Path: src/commands/validate.ts
// Validate a configuration against a schema file

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadSchemaFile } from '../lib/schema.js';
import { action, openStore, withStoreOptions } from './helpers.js';
import type { ValidateCommandOptions } from './types.js';

export function registerValidateCommand(program: Command): void {
  withStoreOptions(
    program
      .command('validate <name>')
      .description('Validate a configuration against a schema')
  )
    .requiredOption('-s, --schema <file>', 'Schema file (YAML or JSON)')
    .addHelpText('after', `
Schema file:
  fields:
    host: { type: str, default: localhost }
    port: { type: int }
    password: { type: str, sensitive: true, required: true }

Examples:
  cfgvault validate database --schema schema.yaml
`)
    .action(action(async (name: string, options: ValidateCommandOptions) => {
      const schema = loadSchemaFile(options.schema);
      const manager = await openStore(options);
      const result = schema.check(manager.requireConfig(name).getAll(false));

      if (result.valid) {
        console.log(chalk.green('✓') + ` Config '${name}' is valid`);
        return;
      }

      console.log(chalk.red('✗') + ` Config '${name}' failed validation:`);
      for (const error of result.errors) {
        console.log(`  ${chalk.bold(error.field)}: ${error.message}`);
      }
      process.exitCode = 1;
    }));
}
