import { Command } from 'commander';
import { ValidationError } from '../../types/errors.js';
import type { CpcRuntime, RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatSuccess, print } from '../formatter.js';

interface DeleteOptions {
  yes?: boolean;
}

/**
 * Create the delete-workspace command.
 */
export function createDeleteWorkspaceCommand(getRuntime: RuntimeProvider): Command {
  return new Command('delete-workspace')
    .description('Destroy all VMs of a workspace and remove its configuration and state')
    .argument('<workspace>', 'Workspace to delete')
    .option('-y, --yes', 'Confirm destruction', false)
    .action(async (workspace: string, options: DeleteOptions) => {
      try {
        await executeDelete(getRuntime(), workspace, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeDelete(
  runtime: CpcRuntime,
  workspace: string,
  options: DeleteOptions
): Promise<void> {
  if (!options.yes) {
    throw new ValidationError(
      `Deleting ${workspace} destroys all of its VMs; pass --yes to confirm`,
      'yes',
      `cpc delete-workspace ${workspace} --yes`
    );
  }

  const report = await runtime.store.deleteContext(workspace);
  for (const step of report.completedSteps) {
    print(dim(`  ${step}`));
  }
  print(formatSuccess(`Deleted workspace ${bold(workspace)}; active workspace is ${report.activeWorkspace}`));
}
