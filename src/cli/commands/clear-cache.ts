import { Command } from 'commander';
import type { CpcRuntime, RuntimeProvider } from '../runtime.js';
import { failCommand, formatSuccess, print } from '../formatter.js';

/**
 * Create the clear-cache command.
 */
export function createClearCacheCommand(getRuntime: RuntimeProvider): Command {
  return new Command('clear-cache')
    .description('Delete the active workspace status caches and generated inventory')
    .action(async () => {
      try {
        await executeClearCache(getRuntime());
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeClearCache(runtime: CpcRuntime): Promise<void> {
  const context = await runtime.activeContext();
  const removed = await runtime.store.clearCaches(context.name);
  print(formatSuccess(`Removed ${removed} cache file(s) for ${context.name}`));
}
