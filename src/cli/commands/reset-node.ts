import { Command } from 'commander';
import { ValidationError } from '../../types/errors.js';
import { createNodeMaintenance, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatJson, formatSuccess, print, printWarnings } from '../formatter.js';

interface ResetNodeOptions {
  yes?: boolean;
  json?: boolean;
}

/**
 * Create the reset-node command.
 */
export function createResetNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('reset-node')
    .description("Wipe a node's Kubernetes state with kubeadm reset so it can join again")
    .argument('<name>', 'Node name or address, e.g. worker-3')
    .option('-y, --yes', 'Confirm the reset', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (name: string, options: ResetNodeOptions) => {
      try {
        await executeResetNode(getRuntime(), name, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeResetNode(
  runtime: CpcRuntime,
  name: string,
  options: ResetNodeOptions
): Promise<void> {
  if (!options.yes) {
    throw new ValidationError(
      `Resetting ${name} removes it from the cluster; pass --yes to confirm`,
      'yes',
      `cpc reset-node ${name} --yes`
    );
  }

  const context = await runtime.activeContext();
  const result = await createNodeMaintenance(runtime).reset(context, name);

  if (options.json) {
    const { context: updated, ...report } = result;
    print(formatJson({ workspace: updated.name, ...report }));
    return;
  }
  printWarnings(result.warnings);
  print(formatSuccess(`Reset ${bold(result.name)}`));
  print(dim(`  Next: ${result.nextStep}`));
}
