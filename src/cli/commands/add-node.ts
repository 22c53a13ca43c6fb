import { Command } from 'commander';
import { isNodeRole, NodeRole } from '../../types/node.js';
import { ValidationError } from '../../types/errors.js';
import { createNodeLifecycle, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import {
  bold,
  failCommand,
  formatInfo,
  formatJson,
  formatMembershipState,
  formatSuccess,
  print,
} from '../formatter.js';

interface AddNodeOptions {
  role: string;
  name?: string;
  json?: boolean;
}

/**
 * Create the add-node command.
 */
export function createAddNodeCommand(getRuntime: RuntimeProvider): Command {
  return new Command('add-node')
    .description('Add a node to the roster and create its VM (join it with join-node)')
    .option('-r, --role <role>', 'Node role: worker or control-plane', NodeRole.WORKER)
    .option('-n, --name <name>', 'Explicit node name instead of the next free one')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: AddNodeOptions) => {
      try {
        await executeAddNode(getRuntime(), options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeAddNode(runtime: CpcRuntime, options: AddNodeOptions): Promise<void> {
  if (!isNodeRole(options.role)) {
    throw new ValidationError(`Unknown role '${options.role}'`, 'role', 'cpc add-node --role worker');
  }
  const context = await runtime.activeContext();
  const result = await createNodeLifecycle(runtime).add(context, options.role, options.name);

  if (options.json) {
    print(formatJson({ node: result.node, nextStep: result.nextStep }));
    return;
  }
  print(formatSuccess(`Added ${bold(result.node.name)} (${formatMembershipState(result.node.state)})`));
  print(formatInfo(`Next: ${result.nextStep}`));
}
