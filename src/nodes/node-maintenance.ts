/**
 * Node Maintenance
 *
 * Drain, in-place Kubernetes upgrade and reset of a single cluster node.
 * None of these change which VMs exist; only a reset moves a roster entry
 * (back to provisioned, so it can be joined again).
 */

import { buildInventory } from '../adapters/inventory.js';
import { asNodes, isNodeReady } from '../adapters/kube-resources.js';
import type {
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  InfraAdapter,
} from '../adapters/types.js';
import type { RecoveryLog } from '../recovery/recovery-log.js';
import type { ClusterNode, ClusterSummary } from '../types/cluster.js';
import { FatalError, TimeoutError, ValidationError, toError } from '../types/errors.js';
import {
  KUBERNETES_VERSION_KEY,
  formatKubernetesVersion,
  kubernetesVersionVars,
  parseKubernetesVersion,
} from '../types/kubernetes-version.js';
import { MembershipState, NodeRole } from '../types/node.js';
import { withRoster, type WorkspaceContext } from '../types/workspace.js';
import { createLogger } from '../utils/logger.js';
import {
  JOIN_MARKER_PATH,
  matchesClusterNode,
  type WorkspaceRepository,
} from './node-lifecycle.js';
import { sameNodeSlot } from './node-names.js';

const log = createLogger('node-maintenance');

export const MaintenancePlaybook = {
  UPGRADE_NODE: 'pb_upgrade_node.yml',
  RESET_NODE: 'pb_reset_node.yml',
} as const;

export interface NodeMaintenanceDeps {
  repository: WorkspaceRepository;
  infra: InfraAdapter;
  configRunner: ConfigRunnerAdapter;
  controlPlane: ControlPlaneAdapter;
  recovery: RecoveryLog;
}

export interface NodeMaintenanceOptions {
  sshUser: string;
  drainTimeoutSeconds: number;
  /** Wait for an upgraded node to report Ready */
  readyTimeoutMs: number;
  pollIntervalMs: number;
}

export interface DrainOptions {
  force?: boolean;
  deleteEmptyDirData?: boolean;
}

export interface DrainResult {
  name: string;
  /** Node name as the cluster knows it */
  clusterName: string;
}

export interface UpgradeNodeOptions {
  /** Defaults to the workspace's KUBERNETES_VERSION pin */
  targetVersion?: string;
  skipDrain?: boolean;
}

export interface UpgradeNodeResult {
  name: string;
  targetVersion: string;
  drained: boolean;
  ready: boolean;
  warnings: string[];
}

export interface ResetNodeResult {
  context: WorkspaceContext;
  name: string;
  /** True when the stale Node object was deleted from the cluster */
  deletedFromCluster: boolean;
  warnings: string[];
  nextStep: string;
}

interface ResolvedNode {
  vm: ClusterNode;
  summary: ClusterSummary;
  isPrimary: boolean;
}

export class NodeMaintenance {
  constructor(
    private readonly deps: NodeMaintenanceDeps,
    private readonly options: NodeMaintenanceOptions
  ) {}

  /**
   * Cordon the node and evict its pods. DaemonSet pods always stay.
   */
  async drain(
    context: WorkspaceContext,
    name: string,
    options: DrainOptions = {}
  ): Promise<DrainResult> {
    const { vm } = await this.resolve(context, name);
    const clusterName = await this.registeredName(vm);
    if (!clusterName) {
      throw new ValidationError(
        `${vm.name} is not registered with the cluster`,
        'name',
        `cpc join-node ${vm.name}`
      );
    }

    await this.drainRegistered(vm, clusterName, {
      force: options.force ?? false,
      deleteEmptyDirData: options.deleteEmptyDirData ?? false,
    });
    log.info({ node: vm.name, clusterName }, 'Node drained');
    return { name: vm.name, clusterName };
  }

  /**
   * Upgrade kubeadm and the kubelet on one node: drain (never the primary
   * control plane), run the upgrade playbook, uncordon, then wait for the
   * node to report Ready. A node that stays unready is a warning.
   */
  async upgrade(
    context: WorkspaceContext,
    name: string,
    options: UpgradeNodeOptions = {}
  ): Promise<UpgradeNodeResult> {
    const requested = options.targetVersion ?? context.versions[KUBERNETES_VERSION_KEY];
    if (!requested) {
      throw new ValidationError(
        `No target version given and workspace ${context.name} has no ${KUBERNETES_VERSION_KEY}`,
        'targetVersion',
        `cpc upgrade-node ${name} --target-version 1.31.9`
      );
    }
    const version = parseKubernetesVersion(requested, 'targetVersion');
    const targetVersion = formatKubernetesVersion(version);

    const { vm, summary, isPrimary } = await this.resolve(context, name);
    const clusterName = await this.registeredName(vm);
    if (!clusterName) {
      throw new ValidationError(
        `${vm.name} is not registered with the cluster`,
        'name',
        `cpc join-node ${vm.name}`
      );
    }

    const warnings: string[] = [];
    const drained = !options.skipDrain && !isPrimary;
    if (drained) {
      await this.drainRegistered(vm, clusterName, { force: true, deleteEmptyDirData: true });
    }

    const upgraded = await this.deps.recovery.executeWithRecovery({
      name: `upgrade_node_${vm.name}`,
      action: async () => {
        await this.deps.configRunner.apply({
          playbook: MaintenancePlaybook.UPGRADE_NODE,
          inventory: buildInventory(context.name, summary, this.options.sshUser),
          limit: vm.address,
          extraVars: {
            target_node: vm.address,
            // cpc drains before the playbook runs
            skip_drain: true,
            ...kubernetesVersionVars(version),
          },
        });
      },
      onFailureHint: `Upgrade of ${vm.name} to ${targetVersion} failed; the node may still be cordoned`,
    });
    if (!upgraded) {
      const cause = this.deps.recovery.lastFailure()?.error?.message ?? 'unknown error';
      throw new FatalError(
        `Upgrading ${vm.name} to ${targetVersion} failed: ${cause}`,
        drained ? `kubectl uncordon ${clusterName}` : `cpc upgrade-node ${vm.name}`
      );
    }

    if (drained) {
      await this.deps.controlPlane.apply({ kind: 'uncordon', node: clusterName });
    }

    let ready = false;
    try {
      await this.deps.controlPlane.waitUntil(
        { resource: 'nodes', name: clusterName },
        objects => asNodes(objects).some(isNodeReady),
        {
          timeoutMs: this.options.readyTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: `${clusterName} to report Ready`,
        }
      );
      ready = true;
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      warnings.push(error.message);
    }

    log.info({ node: vm.name, targetVersion, ready }, 'Node upgraded');
    return { name: vm.name, targetVersion, drained, ready, warnings };
  }

  /**
   * Wipe the node's Kubernetes state with kubeadm reset. The stale Node
   * object is deleted from the cluster when the API still lists it, and a
   * roster entry goes back to provisioned.
   */
  async reset(context: WorkspaceContext, name: string): Promise<ResetNodeResult> {
    const { vm, summary, isPrimary } = await this.resolve(context, name);
    const inventory = buildInventory(context.name, summary, this.options.sshUser);
    const warnings: string[] = [];

    const reset = await this.deps.recovery.executeWithRecovery({
      name: `reset_node_${vm.name}`,
      action: async () => {
        await this.deps.configRunner.apply({
          playbook: MaintenancePlaybook.RESET_NODE,
          inventory,
          limit: vm.address,
          extraVars: { target_node: vm.address },
        });
      },
      onFailureHint: `Reset of ${vm.name} failed; check SSH access to ${vm.address}`,
      validation: async () => {
        const markers = await this.deps.configRunner.query({
          kind: 'file-exists',
          inventory,
          hosts: vm.address,
          path: JOIN_MARKER_PATH,
        });
        return markers[vm.address] === false;
      },
    });
    if (!reset) {
      const failure = this.deps.recovery.lastFailure();
      throw new FatalError(
        failure?.error
          ? `Resetting ${vm.name} failed: ${failure.error.message}`
          : `Resetting ${vm.name} failed: ${JOIN_MARKER_PATH} is still present`,
        `ssh ${this.options.sshUser}@${vm.address} kubeadm reset -f`
      );
    }

    let deletedFromCluster = false;
    if (!isPrimary) {
      try {
        const clusterName = await this.registeredName(vm);
        if (clusterName) {
          await this.deps.controlPlane.apply({ kind: 'delete', resource: 'node', name: clusterName });
          deletedFromCluster = true;
        }
      } catch (error) {
        const message = `Could not delete node ${vm.name} from the cluster: ${toError(error).message}`;
        log.warn({ node: vm.name }, message);
        warnings.push(message);
      }
    }

    let updated = context;
    const spec = context.roster.find(vm.name);
    if (spec && (spec.state === MembershipState.JOINED || spec.state === MembershipState.READY)) {
      updated = withRoster(context, context.roster.withState(spec.name, MembershipState.PROVISIONED));
      await this.deps.repository.save(updated);
    }

    log.info({ node: vm.name, deletedFromCluster }, 'Node reset');
    return {
      context: updated,
      name: vm.name,
      deletedFromCluster,
      warnings,
      nextStep: isPrimary ? 'cpc bootstrap --force' : `cpc join-node ${vm.name}`,
    };
  }

  /**
   * Find the VM for a node name (either naming variant) or address.
   */
  private async resolve(context: WorkspaceContext, name: string): Promise<ResolvedNode> {
    const summary = (await this.deps.infra.query({ workspace: context.name })).nodes;
    const vm = summary.find(node => node.address === name || sameNodeSlot(node.name, name));
    if (!vm) {
      throw new ValidationError(`No VM named ${name} in workspace ${context.name}`, 'name', 'cpc status');
    }
    const primary = summary.find(node => node.role === NodeRole.CONTROL_PLANE);
    return { vm, summary, isPrimary: vm === primary };
  }

  private async registeredName(vm: ClusterNode): Promise<string | undefined> {
    const nodes = asNodes(await this.deps.controlPlane.query({ resource: 'nodes' }));
    return nodes.find(kubeNode => matchesClusterNode(kubeNode, vm))?.metadata.name;
  }

  private async drainRegistered(
    vm: ClusterNode,
    clusterName: string,
    flags: { force: boolean; deleteEmptyDirData: boolean }
  ): Promise<void> {
    const drained = await this.deps.recovery.executeWithRecovery({
      name: `drain_${vm.name}`,
      action: async () => {
        await this.deps.controlPlane.apply({
          kind: 'drain',
          node: clusterName,
          timeoutSeconds: this.options.drainTimeoutSeconds,
          ...flags,
        });
      },
      onFailureHint: `Drain of ${clusterName} failed; pods without a controller need --force`,
    });
    if (!drained) {
      const cause = this.deps.recovery.lastFailure()?.error?.message ?? 'unknown error';
      throw new FatalError(
        `Draining ${clusterName} failed: ${cause}`,
        flags.force ? `kubectl uncordon ${clusterName}` : `cpc drain-node ${vm.name} --force`
      );
    }
  }
}
