import { Command } from 'commander';
import * as readline from 'readline/promises';
import { DriveSession } from '@minidrive/shared';

import { DriveShell } from '../shell/DriveShell.js';
import { wrapCommand } from '../utils/errorHandler.js';

interface ShellOptions {
  username: string;
  password?: string;
}

async function promptPassword(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question('Password: ');
  } finally {
    rl.close();
  }
}

export const shellCommand = new Command('shell')
  .description('Sign in and browse your storage interactively')
  .requiredOption('-u, --username <username>', 'Username')
  .option('-p, --password <password>', 'Password (prompted when omitted)')
  .action(
    wrapCommand('opening shell', async (options: ShellOptions) => {
      const password = options.password ?? (await promptPassword());
      const session = await DriveSession.open({ username: options.username, password });
      await new DriveShell(session).run();
    })
  );
