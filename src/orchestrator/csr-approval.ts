/**
 * Serving-certificate approval.
 *
 * Kubelets request serving certificates shortly after joining, so the
 * requests may not exist on the first look. Polls with backoff until at
 * least one matching pending request was approved or attempts run out;
 * finding none is not an error.
 */

import type { ControlPlaneAdapter } from '../adapters/types.js';
import { asCsrs, isPendingCsr } from '../adapters/kube-resources.js';
import { RetryPolicyEngine, type RetryPolicy } from '../recovery/retry-policy.js';
import { TransientError } from '../types/errors.js';
import type { Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('csr-approval');

export async function findPendingRequests(
  controlPlane: ControlPlaneAdapter,
  pattern: string
): Promise<string[]> {
  const requests = asCsrs(await controlPlane.query({ resource: 'csr' }));
  return requests
    .filter(isPendingCsr)
    .filter(
      csr =>
        csr.metadata.name.includes(pattern) || (csr.spec.signerName ?? '').includes(pattern)
    )
    .map(csr => csr.metadata.name);
}

class NoPendingRequestsError extends TransientError {
  constructor(pattern: string) {
    super(`No pending certificate requests matching '${pattern}' yet`);
    Object.setPrototypeOf(this, NoPendingRequestsError.prototype);
  }
}

/**
 * Approve every pending request matching `pattern`. Returns the approved
 * request names, possibly none.
 */
export async function approveServingCertificates(
  controlPlane: ControlPlaneAdapter,
  pattern: string,
  policy: RetryPolicy,
  clock?: Clock
): Promise<string[]> {
  const engine = new RetryPolicyEngine(policy, clock);

  const outcome = await engine.execute(
    async () => {
      const pending = await findPendingRequests(controlPlane, pattern);
      if (pending.length === 0) {
        throw new NoPendingRequestsError(pattern);
      }
      await controlPlane.apply({ kind: 'approve-csr', names: pending });
      return pending;
    },
    { description: 'approve serving certificates' }
  );

  if (outcome.success && outcome.result) {
    log.info({ approved: outcome.result }, 'Approved serving certificate requests');
    return outcome.result;
  }
  if (outcome.finalError instanceof NoPendingRequestsError) {
    log.info({ pattern }, 'No pending serving certificate requests');
    return [];
  }
  throw outcome.finalError ?? new Error('Certificate approval failed');
}
