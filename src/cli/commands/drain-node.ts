import { Command } from 'commander';
import { createNodeMaintenance, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, failCommand, formatJson, formatSuccess, print } from '../formatter.js';

interface DrainNodeOptions {
  force?: boolean;
  deleteEmptydirData?: boolean;
  json?: boolean;
}

/**
 * Create the drain-node command.
 */
export function createDrainNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('drain-node')
    .description('Cordon a node and evict its pods')
    .argument('<name>', 'Node name or address, e.g. worker-3')
    .option('--force', 'Also evict pods that no controller manages', false)
    .option('--delete-emptydir-data', 'Evict pods that use emptyDir volumes', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (name: string, options: DrainNodeOptions) => {
      try {
        await executeDrainNode(getRuntime(), name, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeDrainNode(
  runtime: CpcRuntime,
  name: string,
  options: DrainNodeOptions
): Promise<void> {
  const context = await runtime.activeContext();
  const result = await createNodeMaintenance(runtime).drain(context, name, {
    force: options.force ?? false,
    deleteEmptyDirData: options.deleteEmptydirData ?? false,
  });

  if (options.json) {
    print(formatJson(result));
    return;
  }
  print(formatSuccess(`Drained ${bold(result.clusterName)}; run 'kubectl uncordon ${result.clusterName}' to schedule pods again`));
}
