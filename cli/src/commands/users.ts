import { Command } from 'commander';
import { FileCredentialStore } from '@minidrive/shared';

import { wrapCommand } from '../utils/errorHandler.js';

export const usersCommand = new Command('users')
  .description('Credential management');

usersCommand
  .command('add <username> <password>')
  .description('Add a user; the password is stored as a bcrypt hash')
  .action(
    wrapCommand('adding user', async (username: string, password: string) => {
      const store = new FileCredentialStore();
      await store.addUser(username, password);
      console.log(`User '${username}' added to ${store.filePath}`);
    })
  );
