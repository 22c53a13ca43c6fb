import { Command } from 'commander';
import { createStatusAggregator, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { failCommand, formatFastStatus, formatFullStatus, formatJson, print } from '../formatter.js';

interface StatusOptions {
  full?: boolean;
  json?: boolean;
}

/**
 * Create the status command.
 */
export function createStatusCommand(getRuntime: RuntimeProvider): Command {
  return new Command('status')
    .description('Show cluster health (cached counts by default)')
    .option('--full', 'Query every system without caches', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: StatusOptions) => {
      try {
        await executeStatus(getRuntime(), options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeStatus(runtime: CpcRuntime, options: StatusOptions): Promise<void> {
  const context = await runtime.activeContext();
  const aggregator = createStatusAggregator(runtime);

  if (options.full) {
    const status = await aggregator.full(context);
    print(options.json ? formatJson(status) : formatFullStatus(status));
    return;
  }
  const status = await aggregator.fast(context);
  print(options.json ? formatJson(status) : formatFastStatus(status));
}
