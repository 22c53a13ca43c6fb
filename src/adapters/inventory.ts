import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NodeRole } from '../types/node.js';
import type { ClusterNode, ClusterSummary } from '../types/cluster.js';

export const InventoryGroup = {
  CONTROL_PLANE: 'control_plane',
  WORKERS: 'workers',
} as const;

export type InventoryGroup = (typeof InventoryGroup)[keyof typeof InventoryGroup];

export interface InventoryHostVars {
  ansible_host: string;
  node_name: string;
  hostname: string;
  vm_id: string;
  k8s_role: NodeRole;
}

interface InventoryGroupHosts {
  hosts: Record<string, InventoryHostVars>;
}

/**
 * Static inventory in the configuration runner's YAML/JSON format, keyed
 * by host address.
 */
export interface Inventory {
  workspace: string;
  all: {
    vars: Record<string, string>;
    children: Record<InventoryGroup, InventoryGroupHosts>;
  };
}

function hostVars(node: ClusterNode): InventoryHostVars {
  return {
    ansible_host: node.address,
    node_name: node.name,
    hostname: node.hostname,
    vm_id: node.infraId,
    k8s_role: node.role,
  };
}

export function buildInventory(
  workspace: string,
  summary: ClusterSummary,
  sshUser: string
): Inventory {
  const controlPlane: Record<string, InventoryHostVars> = {};
  const workers: Record<string, InventoryHostVars> = {};

  for (const node of summary) {
    const target = node.role === NodeRole.CONTROL_PLANE ? controlPlane : workers;
    target[node.address] = hostVars(node);
  }

  return {
    workspace,
    all: {
      vars: { ansible_user: sshUser },
      children: {
        [InventoryGroup.CONTROL_PLANE]: { hosts: controlPlane },
        [InventoryGroup.WORKERS]: { hosts: workers },
      },
    },
  };
}

export function inventoryHosts(inventory: Inventory, group?: InventoryGroup): string[] {
  const groups = group ? [group] : Object.values(InventoryGroup);
  return groups.flatMap(name => Object.keys(inventory.all.children[name].hosts));
}

export function renderInventory(inventory: Inventory): string {
  return `${JSON.stringify({ all: inventory.all }, null, 2)}\n`;
}

export async function writeInventory(inventory: Inventory, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderInventory(inventory), 'utf-8');
}
