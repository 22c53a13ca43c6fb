import type { NodeRole } from './node.js';

/**
 * One VM as reported by the provisioner.
 */
export interface ClusterNode {
  /** Provisioner key, e.g. "worker-3" */
  name: string;
  role: NodeRole;
  address: string;
  hostname: string;
  infraId: string;
}

/**
 * The provisioner's view of which nodes exist. Control-plane nodes first,
 * then workers, each ordered by name. Other systems are reconciled against
 * this, never the reverse.
 */
export type ClusterSummary = ClusterNode[];

export function controlPlaneNodes(summary: ClusterSummary): ClusterNode[] {
  return summary.filter(node => node.role === 'control-plane');
}

export function workerNodes(summary: ClusterSummary): ClusterNode[] {
  return summary.filter(node => node.role === 'worker');
}
