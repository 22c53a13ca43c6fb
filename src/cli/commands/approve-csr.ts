import { Command } from 'commander';
import { approveServingCertificates } from '../../orchestrator/csr-approval.js';
import type { CpcRuntime, RuntimeProvider } from '../runtime.js';
import { failCommand, formatInfo, formatSuccess, print } from '../formatter.js';

/**
 * Create the approve-csr command.
 */
export function createApproveCsrCommand(getRuntime: RuntimeProvider): Command {
  return new Command('approve-csr')
    .description('Approve pending kubelet serving certificate requests')
    .action(async () => {
      try {
        await executeApproveCsr(getRuntime());
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeApproveCsr(runtime: CpcRuntime): Promise<void> {
  const approved = await approveServingCertificates(
    runtime.controlPlane,
    runtime.config.csrPattern,
    runtime.retryPolicy,
    runtime.clock
  );
  if (approved.length === 0) {
    print(formatInfo('No pending serving certificate requests'));
    return;
  }
  for (const name of approved) {
    print(formatSuccess(`Approved ${name}`));
  }
}
