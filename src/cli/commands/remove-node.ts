import { Command } from 'commander';
import { createNodeLifecycle, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, failCommand, formatJson, formatSuccess, print, printWarnings } from '../formatter.js';

interface RemoveNodeOptions {
  json?: boolean;
}

/**
 * Create the remove-node command.
 */
export function createRemoveNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('remove-node')
    .description('Drain a node, drop it from the roster and destroy its VM')
    .argument('<name>', 'Node name, e.g. worker-3')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (name: string, options: RemoveNodeOptions) => {
      try {
        await executeRemoveNode(getRuntime(), name, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeRemoveNode(
  runtime: CpcRuntime,
  name: string,
  options: RemoveNodeOptions
): Promise<void> {
  const context = await runtime.activeContext();
  const result = await createNodeLifecycle(runtime).remove(context, name);

  printWarnings(result.warnings);
  if (options.json) {
    const { context: updated, ...rest } = result;
    print(formatJson({ ...rest, workspace: updated.name }));
    return;
  }
  print(
    formatSuccess(`Removed ${bold(result.name)} (VMs: ${result.countBefore} -> ${result.countAfter})`)
  );
}
