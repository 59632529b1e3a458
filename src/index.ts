#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerInitCommand } from './commands/init.js';
import { registerEntryCommands } from './commands/entries.js';
import { registerValueCommands } from './commands/values.js';
import { registerTransferCommands } from './commands/transfer.js';
import { registerEncryptCommands } from './commands/encrypt.js';
import { registerValidateCommand } from './commands/validate.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // dist/../package.json when installed, src/../package.json under a loader
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('cfgvault')
  .description('Manage configuration files with obscured secrets and optional encryption')
  .version(version);

// Register commands
registerInitCommand(program);
registerEntryCommands(program);
registerValueCommands(program);
registerTransferCommands(program);
registerEncryptCommands(program);
registerValidateCommand(program);

// Parse arguments
await program.parseAsync();
