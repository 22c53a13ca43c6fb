import { Command } from 'commander';
import type { CpcRuntime, RuntimeProvider } from '../runtime.js';
import { bold, failCommand, formatSuccess, print } from '../formatter.js';

/**
 * Create the clone-workspace command.
 */
export function createCloneWorkspaceCommand(getRuntime: RuntimeProvider): Command {
  return new Command('clone-workspace')
    .description('Copy a workspace configuration into a new workspace and switch to it')
    .argument('<source>', 'Workspace to copy')
    .argument('<dest>', 'New workspace name')
    .argument('[release-letter]', 'Single letter distinguishing the new cluster hostnames')
    .action(async (source: string, dest: string, releaseLetter: string | undefined) => {
      try {
        await executeClone(getRuntime(), source, dest, releaseLetter);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeClone(
  runtime: CpcRuntime,
  source: string,
  dest: string,
  releaseLetter: string | undefined
): Promise<void> {
  await runtime.store.cloneContext(source, dest, releaseLetter);
  await runtime.store.setActiveContext(dest);
  print(formatSuccess(`Cloned ${bold(source)} into ${bold(dest)} and switched to it`));
}
