import { Command } from 'commander';
import { JoinOutcome } from '../../nodes/node-lifecycle.js';
import { approveServingCertificates } from '../../orchestrator/csr-approval.js';
import { FatalError, toError } from '../../types/errors.js';
import { createNodeLifecycle, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { failCommand, formatJson, formatSuccess, print, printWarnings } from '../formatter.js';

interface JoinNodeOptions {
  json?: boolean;
}

/**
 * Create the join-node command.
 */
export function createJoinNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('join-node')
    .description('Join provisioned VMs to the cluster and approve their serving certificates')
    .argument('<names...>', 'Node names, e.g. worker-3')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (names: string[], options: JoinNodeOptions) => {
      try {
        await executeJoinNode(getRuntime(), names, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeJoinNode(
  runtime: CpcRuntime,
  names: string[],
  options: JoinNodeOptions
): Promise<void> {
  const context = await runtime.activeContext();
  const result = await createNodeLifecycle(runtime).joinByName(context, names);

  const warnings: string[] = [];
  let approved: string[] = [];
  try {
    approved = await approveServingCertificates(
      runtime.controlPlane,
      runtime.config.csrPattern,
      runtime.retryPolicy,
      runtime.clock
    );
  } catch (error) {
    warnings.push(`Serving certificate approval failed: ${toError(error).message}`);
  }
  printWarnings(warnings);

  if (options.json) {
    print(formatJson({ nodes: result.nodes, approvedCsrs: approved }));
  } else {
    for (const node of result.nodes) {
      if (node.outcome !== JoinOutcome.FAILED) {
        print(formatSuccess(`${node.name}: ${node.outcome}${node.ready ? '' : ' (not ready yet)'}`));
      }
    }
  }

  const failed = result.nodes.filter(node => node.outcome === JoinOutcome.FAILED);
  if (failed.length > 0) {
    throw new FatalError(
      `Join failed for ${failed.map(node => `${node.name}: ${node.error ?? 'unknown error'}`).join('; ')}`,
      `cpc join-node ${failed.map(node => node.name).join(' ')}`
    );
  }
}
