import { Command } from 'commander';
import { createCredentialsManager, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatSuccess, print } from '../formatter.js';

/**
 * Create the get-credentials command.
 */
export function createGetCredentialsCommand(getRuntime: RuntimeProvider): Command {
  return new Command('get-credentials')
    .description('Merge the cluster admin credentials into the local kubeconfig')
    .action(async () => {
      try {
        await executeGetCredentials(getRuntime());
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeGetCredentials(runtime: CpcRuntime): Promise<void> {
  const context = await runtime.activeContext();
  const result = await createCredentialsManager(runtime).fetch(context);
  print(formatSuccess(`Context ${bold(result.workspace)} points at ${result.server}`));
  if (result.backupPath) {
    print(dim(`previous kubeconfig saved to ${result.backupPath}`));
  }
}
