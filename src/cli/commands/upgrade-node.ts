import { Command } from 'commander';
import { createNodeMaintenance, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatJson, formatSuccess, print, printWarnings } from '../formatter.js';

interface UpgradeNodeOptions {
  targetVersion?: string;
  skipDrain?: boolean;
  json?: boolean;
}

/**
 * Create the upgrade-node command.
 */
export function createUpgradeNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('upgrade-node')
    .description("Upgrade one node's kubelet and kubeadm to the cluster's Kubernetes version")
    .argument('<name>', 'Node name or address, e.g. worker-3')
    .option('-t, --target-version <version>', 'Kubernetes version (default: the workspace pin)')
    .option('--skip-drain', 'Upgrade without draining the node first', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (name: string, options: UpgradeNodeOptions) => {
      try {
        await executeUpgradeNode(getRuntime(), name, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeUpgradeNode(
  runtime: CpcRuntime,
  name: string,
  options: UpgradeNodeOptions
): Promise<void> {
  const context = await runtime.activeContext();
  const result = await createNodeMaintenance(runtime).upgrade(context, name, {
    targetVersion: options.targetVersion,
    skipDrain: options.skipDrain ?? false,
  });

  if (options.json) {
    print(formatJson(result));
    return;
  }
  printWarnings(result.warnings);
  print(formatSuccess(`Upgraded ${bold(result.name)} to ${result.targetVersion}`));
  if (!result.ready) {
    print(dim(`  ${result.name} is not Ready yet; check 'cpc status --full'`));
  }
}
