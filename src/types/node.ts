/**
 * Node roles and roster membership states.
 */

export const NodeRole = {
  CONTROL_PLANE: 'control-plane',
  WORKER: 'worker',
} as const;

export type NodeRole = (typeof NodeRole)[keyof typeof NodeRole];

export const NODE_ROLES: readonly NodeRole[] = [NodeRole.CONTROL_PLANE, NodeRole.WORKER];

export function isNodeRole(value: string): value is NodeRole {
  return value === NodeRole.CONTROL_PLANE || value === NodeRole.WORKER;
}

export const MembershipState = {
  PLANNED: 'planned',
  PROVISIONED: 'provisioned',
  JOINED: 'joined',
  READY: 'ready',
  REMOVED: 'removed',
} as const;

export type MembershipState = (typeof MembershipState)[keyof typeof MembershipState];

export const MEMBERSHIP_STATES: readonly MembershipState[] = Object.values(MembershipState);

export function isMembershipState(value: string): value is MembershipState {
  return MEMBERSHIP_STATES.some(state => state === value);
}

/**
 * A node tracked by a workspace roster.
 */
export interface NodeSpec {
  name: string;
  role: NodeRole;
  state: MembershipState;
}
