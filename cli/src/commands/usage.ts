import { Command } from 'commander';
import { QuotaTracker, STORAGE_BASE_DIR, resolveUserRoot } from '@minidrive/shared';

import { wrapCommand } from '../utils/errorHandler.js';

interface UsageOptions {
  json?: boolean;
}

export const usageCommand = new Command('usage')
  .description('Show how much of a user\'s quota is in use')
  .argument('<username>', 'Owner of the storage root')
  .option('--json', 'Output as JSON')
  .action(
    wrapCommand(
      'reading usage',
      async (username: string, options: UsageOptions) => {
        const root = resolveUserRoot(STORAGE_BASE_DIR, username);
        const usage = await new QuotaTracker().getUsage(root);

        if (options.json) {
          console.log(JSON.stringify({ username, root, ...usage }, null, 2));
          return;
        }

        console.log(`${username}: ${usage.label} (${usage.percentUsed}%)`);
        console.log(`  Used:      ${QuotaTracker.formatBytes(usage.usedBytes)}`);
        console.log(`  Available: ${QuotaTracker.formatBytes(usage.availableBytes)}`);
      },
      (_username, options) => ({ json: options.json })
    )
  );
