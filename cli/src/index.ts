#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { bootstrapServices } from '@minidrive/shared';
import { shellCommand } from './commands/shell.js';
import { usageCommand } from './commands/usage.js';
import { usersCommand } from './commands/users.js';

async function main() {
  // Bootstrap all services (registers singletons with ServiceProvider)
  await bootstrapServices();

  const program = new Command();

  program
    .name('minidrive')
    .description('Quota-bounded personal file storage')
    .version('1.0.0');

  program.addCommand(shellCommand);
  program.addCommand(usersCommand);
  program.addCommand(usageCommand);

  await program.parseAsync();
}

main().catch((error) => {
  console.error('CLI error:', error);
  process.exit(1);
});
