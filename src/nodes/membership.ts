/**
 * Roster membership state machine.
 *
 * ```
 * planned     → provisioned, removed
 * provisioned → joined, removed
 * joined      → ready, provisioned, removed
 * ready       → joined, provisioned, removed
 * removed     → (terminal)
 * ```
 *
 * A node only reaches `joined` from `provisioned`: the VM has to exist
 * before the control plane can confirm it. Resetting a node's Kubernetes
 * state sends it back to `provisioned`.
 */

import { MembershipState } from '../types/node.js';

export const VALID_TRANSITIONS: Record<MembershipState, readonly MembershipState[]> = {
  [MembershipState.PLANNED]: [MembershipState.PROVISIONED, MembershipState.REMOVED],
  [MembershipState.PROVISIONED]: [MembershipState.JOINED, MembershipState.REMOVED],
  [MembershipState.JOINED]: [
    MembershipState.READY,
    MembershipState.PROVISIONED,
    MembershipState.REMOVED,
  ],
  [MembershipState.READY]: [
    MembershipState.JOINED,
    MembershipState.PROVISIONED,
    MembershipState.REMOVED,
  ],
  [MembershipState.REMOVED]: [],
};

export function isValidTransition(from: MembershipState, to: MembershipState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';

  constructor(
    public readonly nodeName: string,
    public readonly from: MembershipState,
    public readonly to: MembershipState
  ) {
    super(`Invalid membership transition for ${nodeName}: ${from} -> ${to}`);
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}
