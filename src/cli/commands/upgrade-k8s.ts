import { Command } from 'commander';
import { K8sUpgradeOutcome } from '../../orchestrator/k8s-upgrade.js';
import { ValidationError } from '../../types/errors.js';
import { createK8sUpgrade, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatJson, formatSuccess, print, printWarnings } from '../formatter.js';

interface UpgradeK8sOptions {
  targetVersion?: string;
  skipEtcdBackup?: boolean;
  yes?: boolean;
  json?: boolean;
}

/**
 * Create the upgrade-k8s command.
 */
export function createUpgradeK8sCommand(getRuntime: RuntimeProvider): Command {
  return new Command('upgrade-k8s')
    .description('Upgrade the Kubernetes control plane by one minor or patch release')
    .option('-t, --target-version <version>', 'Kubernetes version (default: the workspace pin)')
    .option('--skip-etcd-backup', 'Do not snapshot etcd before upgrading', false)
    .option('-y, --yes', 'Confirm the upgrade', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: UpgradeK8sOptions) => {
      try {
        await executeUpgradeK8s(getRuntime(), options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeUpgradeK8s(runtime: CpcRuntime, options: UpgradeK8sOptions): Promise<void> {
  const context = await runtime.activeContext();
  if (!options.yes) {
    throw new ValidationError(
      `Upgrading the control plane of ${context.name} restarts its API server; pass --yes to confirm`,
      'yes',
      'cpc upgrade-k8s --yes'
    );
  }

  const report = await createK8sUpgrade(runtime).upgrade(context, {
    targetVersion: options.targetVersion,
    skipEtcdBackup: options.skipEtcdBackup ?? false,
  });

  if (options.json) {
    const { context: updated, ...rest } = report;
    print(formatJson({ workspace: updated.name, ...rest }));
    return;
  }
  printWarnings(report.warnings);
  if (report.outcome === K8sUpgradeOutcome.ALREADY_CURRENT) {
    print(formatSuccess(`Control plane already runs ${bold(report.fromVersion)}`));
    return;
  }
  print(formatSuccess(`Control plane upgraded from ${report.fromVersion} to ${bold(report.toVersion)}`));
  for (const step of report.nextSteps) {
    print(dim(`  Next: ${step}`));
  }
}
