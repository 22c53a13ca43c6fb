/**
 * Node naming rules.
 *
 * Canonical names are "<prefix>-<n>" (worker-3, controlplane-2). Older
 * workspaces used "<prefix><n>" (worker3); both forms occupy the same slot.
 * Indices below the role's base offset belong to the initial nodes and are
 * never generated, added or removed through the node lifecycle.
 */

import { NodeRole } from '../types/node.js';

export const ROLE_PREFIX: Record<NodeRole, string> = {
  [NodeRole.CONTROL_PLANE]: 'controlplane',
  [NodeRole.WORKER]: 'worker',
};

export const ROLE_BASE_OFFSET: Record<NodeRole, number> = {
  [NodeRole.CONTROL_PLANE]: 2,
  [NodeRole.WORKER]: 3,
};

const NODE_NAME_PATTERN = /^(controlplane|worker)(-)?(\d+)?$/;

export interface ParsedNodeName {
  role: NodeRole;
  index: number;
  /** True for the no-dash form */
  legacy: boolean;
}

/**
 * Parse a node name. A bare prefix ("controlplane") is index 1.
 */
export function parseNodeName(name: string): ParsedNodeName | null {
  const match = NODE_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [, prefix, dash, digits] = match;
  if (dash !== undefined && digits === undefined) {
    return null;
  }
  const role = prefix === 'controlplane' ? NodeRole.CONTROL_PLANE : NodeRole.WORKER;
  return {
    role,
    index: digits === undefined ? 1 : Number.parseInt(digits, 10),
    legacy: dash === undefined,
  };
}

export function canonicalNodeName(role: NodeRole, index: number): string {
  return `${ROLE_PREFIX[role]}-${index}`;
}

/**
 * Identity shared by both naming variants, or null for unparseable names.
 */
export function nodeSlotKey(name: string): string | null {
  const parsed = parseNodeName(name);
  return parsed ? `${parsed.role}:${parsed.index}` : null;
}

export function sameNodeSlot(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  const slotA = nodeSlotKey(a);
  return slotA !== null && slotA === nodeSlotKey(b);
}

export function isBaseNode(name: string): boolean {
  const parsed = parseNodeName(name);
  return parsed !== null && parsed.index < ROLE_BASE_OFFSET[parsed.role];
}

/**
 * Next name for a role: one past the highest index seen in `occupied`,
 * never below the base offset. Retired names are passed in as well, so a
 * removed node's index is never handed out again.
 */
export function nextNodeName(role: NodeRole, occupied: Iterable<string>): string {
  let highest = ROLE_BASE_OFFSET[role] - 1;
  for (const name of occupied) {
    const parsed = parseNodeName(name);
    if (parsed && parsed.role === role && parsed.index > highest) {
      highest = parsed.index;
    }
  }
  return canonicalNodeName(role, highest + 1);
}
