import { Command } from 'commander';
import { BootstrapState } from '../../orchestrator/bootstrap-state-machine.js';
import { createBootstrap, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import {
  failCommand,
  formatBootstrapReport,
  formatInfo,
  formatJson,
  formatSuccess,
  print,
  printWarnings,
} from '../formatter.js';

interface BootstrapCommandOptions {
  force?: boolean;
  json?: boolean;
}

/**
 * Create the bootstrap command.
 */
export function createBootstrapCommand(getRuntime: RuntimeProvider): Command {
  return new Command('bootstrap')
    .description('Install Kubernetes on the workspace VMs, join all nodes and validate the cluster')
    .option('-f, --force', 'Run even if the control plane is already initialized', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: BootstrapCommandOptions) => {
      try {
        await executeBootstrap(getRuntime(), options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeBootstrap(runtime: CpcRuntime, options: BootstrapCommandOptions): Promise<void> {
  const context = await runtime.activeContext();
  const report = await createBootstrap(runtime).run(context, { force: options.force });

  printWarnings(report.warnings);
  if (options.json) {
    print(formatJson({ ...report, context: context.name }));
    return;
  }

  print(formatBootstrapReport(report));
  if (report.state === BootstrapState.VALIDATED) {
    print(formatSuccess(`Cluster ${context.name} bootstrapped`));
    print(formatInfo('Next: cpc get-credentials, then cpc upgrade-addons'));
  }
}
