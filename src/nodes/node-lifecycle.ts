/**
 * Node Lifecycle Manager
 *
 * Adds and removes VMs through the provisioner and joins them to the
 * cluster. Adding a node never joins it: a fresh VM may not be reachable
 * yet, so joining is an explicit later step.
 */

import { asNodes, isNodeReady, type KubeNode } from '../adapters/kube-resources.js';
import { buildInventory, type Inventory } from '../adapters/inventory.js';
import type {
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  InfraAdapter,
} from '../adapters/types.js';
import { infraVariables } from '../context/context-store.js';
import type { RecoveryLog } from '../recovery/recovery-log.js';
import type { ClusterNode, ClusterSummary } from '../types/cluster.js';
import {
  DestructiveOperationError,
  FatalError,
  TimeoutError,
  ValidationError,
  toError,
} from '../types/errors.js';
import { MembershipState, NodeRole, type NodeSpec } from '../types/node.js';
import { withRoster, type WorkspaceContext } from '../types/workspace.js';
import { createLogger } from '../utils/logger.js';
import { isBaseNode, parseNodeName, sameNodeSlot } from './node-names.js';

const log = createLogger('node-lifecycle');

/** Present on a host once its kubelet has joined a cluster */
export const JOIN_MARKER_PATH = '/etc/kubernetes/kubelet.conf';

export const JOIN_PLAYBOOK = 'pb_add_nodes.yml';

/**
 * Persistence the manager needs from the context store.
 */
export interface WorkspaceRepository {
  load(name: string): Promise<WorkspaceContext>;
  save(context: WorkspaceContext): Promise<void>;
}

export interface NodeLifecycleOptions {
  sshUser: string;
  /** Wait for a joined node to register with the API server */
  joinTimeoutMs: number;
  pollIntervalMs: number;
  drainTimeoutSeconds: number;
  /** Extra variables for the join playbook (version pins) */
  playbookVars?: (context: WorkspaceContext) => Record<string, string>;
}

export interface NodeLifecycleDeps {
  repository: WorkspaceRepository;
  infra: InfraAdapter;
  configRunner: ConfigRunnerAdapter;
  controlPlane: ControlPlaneAdapter;
  recovery: RecoveryLog;
}

export interface AddNodeResult {
  context: WorkspaceContext;
  node: NodeSpec;
  /** Command that joins the new node */
  nextStep: string;
}

export interface RemoveNodeResult {
  context: WorkspaceContext;
  name: string;
  countBefore: number;
  countAfter: number;
  /** False when the VM count did not drop as expected */
  verified: boolean;
  warnings: string[];
}

export const JoinOutcome = {
  JOINED: 'joined',
  ALREADY_JOINED: 'already-joined',
  FAILED: 'failed',
} as const;

export type JoinOutcome = (typeof JoinOutcome)[keyof typeof JoinOutcome];

export interface NodeJoinResult {
  name: string;
  outcome: JoinOutcome;
  ready: boolean;
  error?: string;
}

export interface JoinResult {
  context: WorkspaceContext;
  nodes: NodeJoinResult[];
}

/**
 * Whether a Kubernetes node object is the VM described by `node`.
 */
export function matchesClusterNode(kubeNode: KubeNode, node: ClusterNode): boolean {
  const name = kubeNode.metadata.name;
  const shortHostname = node.hostname.split('.')[0] ?? node.hostname;
  return (
    name === node.hostname ||
    name === shortHostname ||
    name === node.name ||
    (kubeNode.status.addresses ?? []).some(address => address.address === node.address)
  );
}

export class NodeLifecycleManager {
  constructor(
    private readonly deps: NodeLifecycleDeps,
    private readonly options: NodeLifecycleOptions
  ) {}

  nextName(context: WorkspaceContext, role: NodeRole): string {
    return context.roster.nextName(role);
  }

  /**
   * Add a node to the roster and create its VM.
   */
  async add(
    context: WorkspaceContext,
    role: NodeRole,
    explicitName?: string
  ): Promise<AddNodeResult> {
    const name = explicitName ?? this.nextName(context, role);
    // validates format, role, base slots, uniqueness and retired names
    const planned = withRoster(context, context.roster.add(name, role));

    const before = await this.deps.infra.query({ workspace: context.name });
    const existing = before.nodes.find(node => sameNodeSlot(node.name, name));
    if (existing) {
      throw new ValidationError(
        `A VM named ${existing.name} already exists in workspace ${context.name}`,
        'name'
      );
    }

    await this.saveRoster(planned, name);

    const applied = await this.deps.recovery.executeWithRecovery({
      name: `infra_add_${name}`,
      action: async () => {
        await this.deps.infra.apply({
          workspace: context.name,
          action: 'apply',
          variables: infraVariables(planned),
        });
      },
      onFailureHint: `VM creation for ${name} failed; the roster keeps ${name} as planned. Fix the provisioner error and apply again, or run 'cpc remove-node ${name}' to drop it`,
    });
    if (!applied) {
      throw this.stepError(
        `Creating VM ${name} failed`,
        `cd terraform && TF_WORKSPACE=${context.name} tofu apply`
      );
    }

    let updated = planned;
    const after = await this.deps.infra.query({ workspace: context.name });
    if (after.nodes.some(node => sameNodeSlot(node.name, name))) {
      updated = withRoster(planned, planned.roster.withState(name, MembershipState.PROVISIONED));
      await this.deps.repository.save(updated);
    } else {
      log.warn({ node: name }, 'Provisioner output does not list the new VM yet');
    }

    const node = updated.roster.find(name);
    if (!node) {
      throw new FatalError(`Node ${name} missing from roster after add`);
    }
    log.info({ node: name, state: node.state }, 'Node added');

    return { context: updated, node, nextStep: `cpc join-node ${name}` };
  }

  /**
   * Drain and delete a node from the cluster, drop it from the roster and
   * destroy its VM. A VM count that does not drop is reported, not fatal.
   */
  async remove(context: WorkspaceContext, name: string): Promise<RemoveNodeResult> {
    if (!parseNodeName(name)) {
      throw new ValidationError(`Invalid node name '${name}'`, 'name');
    }
    if (isBaseNode(name)) {
      throw new ValidationError(
        `${name} is a base node and cannot be removed with remove-node`,
        'name'
      );
    }
    const spec = context.roster.find(name);
    if (!spec) {
      throw new ValidationError(
        `Node ${name} is not in the roster of workspace ${context.name}`,
        'name',
        'cpc status'
      );
    }

    const warnings: string[] = [];
    const completed: string[] = [];
    const before = await this.deps.infra.query({ workspace: context.name });
    const countBefore = before.nodes.length;

    const vm = before.nodes.find(node => sameNodeSlot(node.name, spec.name));
    if (vm) {
      const drainWarnings = await this.evict(vm);
      warnings.push(...drainWarnings);
      completed.push(`drained and deleted ${spec.name} from the cluster`);
    }

    const updated = withRoster(context, context.roster.remove(spec.name));
    await this.saveRoster(updated, spec.name, true);
    completed.push(`removed ${spec.name} from the roster`);

    const destroyed = await this.deps.recovery.executeWithRecovery({
      name: `infra_remove_${spec.name}`,
      action: async () => {
        await this.deps.infra.apply({
          workspace: context.name,
          action: 'apply',
          variables: infraVariables(updated),
        });
      },
      onFailureHint: `VM ${spec.name} may still exist; apply the provisioner manually`,
    });
    if (!destroyed) {
      const failure = this.deps.recovery.lastFailure();
      throw new DestructiveOperationError(
        `Destroying VM ${spec.name} failed: ${failure?.error?.message ?? 'unknown error'}`,
        completed,
        [`destroy VM ${spec.name}`],
        `cd terraform && TF_WORKSPACE=${context.name} tofu apply -auto-approve`
      );
    }

    const after = await this.deps.infra.query({ workspace: context.name });
    const countAfter = after.nodes.length;
    const verified = countAfter < countBefore;
    if (!verified) {
      const message = `VM count unchanged after removing ${spec.name} (${countBefore} -> ${countAfter}); run 'cd terraform && TF_WORKSPACE=${context.name} tofu apply' if the VM still exists`;
      log.warn({ node: spec.name, countBefore, countAfter }, 'VM count unchanged');
      warnings.push(message);
    }

    log.info({ node: spec.name, countBefore, countAfter }, 'Node removed');
    return { context: updated, name: spec.name, countBefore, countAfter, verified, warnings };
  }

  /**
   * Join provisioned nodes to the cluster. Nodes whose join marker already
   * exists are skipped. Roster entries move to joined (and ready) only
   * once the control plane lists them.
   */
  async join(
    context: WorkspaceContext,
    summary: ClusterSummary,
    targets: readonly ClusterNode[]
  ): Promise<JoinResult> {
    let current = context;
    const results: NodeJoinResult[] = [];
    const inventory = buildInventory(context.name, summary, this.options.sshUser);

    for (const node of targets) {
      const result = await this.joinOne(current, inventory, node);
      results.push(result);
      if (result.outcome !== JoinOutcome.FAILED) {
        current = await this.recordJoined(current, node, result.ready);
      }
    }

    return { context: current, nodes: results };
  }

  /**
   * Join VMs by name. Every name must be a provisioned VM other than the
   * primary control plane, which only bootstrap initializes.
   */
  async joinByName(context: WorkspaceContext, names: readonly string[]): Promise<JoinResult> {
    const summary = (await this.deps.infra.query({ workspace: context.name })).nodes;
    const primary = summary.find(node => node.role === NodeRole.CONTROL_PLANE);

    const targets: ClusterNode[] = [];
    for (const name of names) {
      const node = summary.find(candidate => sameNodeSlot(candidate.name, name));
      if (!node) {
        throw new ValidationError(
          `No VM named ${name} in workspace ${context.name}`,
          'name',
          `cpc add-node --name ${name}`
        );
      }
      if (node === primary) {
        throw new ValidationError(
          `${node.name} is the primary control plane; it is initialized by bootstrap`,
          'name',
          'cpc bootstrap'
        );
      }
      targets.push(node);
    }
    return this.join(context, summary, targets);
  }

  private async joinOne(
    context: WorkspaceContext,
    inventory: Inventory,
    node: ClusterNode
  ): Promise<NodeJoinResult> {
    const markers = await this.deps.configRunner.query({
      kind: 'file-exists',
      inventory,
      hosts: node.address,
      path: JOIN_MARKER_PATH,
    });

    if (markers[node.address] === true) {
      const registered = asNodes(await this.deps.controlPlane.query({ resource: 'nodes' })).filter(
        kubeNode => matchesClusterNode(kubeNode, node)
      );
      if (registered.length > 0) {
        log.info({ node: node.name }, 'Node already joined, skipping');
        return {
          name: node.name,
          outcome: JoinOutcome.ALREADY_JOINED,
          ready: registered.some(isNodeReady),
        };
      }
      // kubelet.conf left over from an earlier cluster
      log.warn({ node: node.name }, 'Join marker present but node is not registered');
      return {
        name: node.name,
        outcome: JoinOutcome.FAILED,
        ready: false,
        error: `${node.name} has ${JOIN_MARKER_PATH} but is not registered with the cluster; run 'cpc reset-node ${node.name}' and join again`,
      };
    }

    const joined = await this.deps.recovery.executeWithRecovery({
      name: `join_${node.name}`,
      action: async () => {
        await this.deps.configRunner.apply({
          playbook: JOIN_PLAYBOOK,
          inventory,
          limit: node.address,
          extraVars: this.options.playbookVars?.(context) ?? {},
        });
      },
      onFailureHint: `Join of ${node.name} failed; check SSH access to ${node.address} and re-run 'cpc join-node ${node.name}'`,
    });
    if (!joined) {
      return {
        name: node.name,
        outcome: JoinOutcome.FAILED,
        ready: false,
        error: this.deps.recovery.lastFailure()?.error?.message ?? 'join failed',
      };
    }

    try {
      const nodes = await this.deps.controlPlane.waitUntil(
        { resource: 'nodes' },
        objects => asNodes(objects).some(kubeNode => matchesClusterNode(kubeNode, node)),
        {
          timeoutMs: this.options.joinTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: `${node.name} to register with the API server`,
        }
      );
      const ready = asNodes(nodes).some(
        kubeNode => matchesClusterNode(kubeNode, node) && isNodeReady(kubeNode)
      );
      return { name: node.name, outcome: JoinOutcome.JOINED, ready };
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { name: node.name, outcome: JoinOutcome.FAILED, ready: false, error: error.message };
      }
      throw error;
    }
  }

  private async recordJoined(
    context: WorkspaceContext,
    node: ClusterNode,
    ready: boolean
  ): Promise<WorkspaceContext> {
    const spec = context.roster.find(node.name);
    if (!spec) {
      return context;
    }
    let roster = context.roster;
    // the VM is listed by the provisioner, so a planned entry is provisioned
    if (spec.state === MembershipState.PLANNED) {
      roster = roster.withState(spec.name, MembershipState.PROVISIONED);
    }
    if (spec.state === MembershipState.PLANNED || spec.state === MembershipState.PROVISIONED) {
      roster = roster.withState(spec.name, MembershipState.JOINED);
    }
    if (ready) {
      roster = roster.withState(spec.name, MembershipState.READY);
    }
    if (roster === context.roster) {
      return context;
    }
    const updated = withRoster(context, roster);
    await this.deps.repository.save(updated);
    return updated;
  }

  private async evict(vm: ClusterNode): Promise<string[]> {
    const warnings: string[] = [];
    let kubeName: string | undefined;
    try {
      const nodes = asNodes(await this.deps.controlPlane.query({ resource: 'nodes' }));
      kubeName = nodes.find(kubeNode => matchesClusterNode(kubeNode, vm))?.metadata.name;
    } catch (error) {
      const message = `Could not list cluster nodes before removing ${vm.name}: ${toError(error).message}`;
      log.warn({ node: vm.name }, message);
      warnings.push(message);
      return warnings;
    }
    if (!kubeName) {
      log.info({ node: vm.name }, 'Node is not registered with the cluster');
      return warnings;
    }

    try {
      await this.deps.controlPlane.apply({
        kind: 'drain',
        node: kubeName,
        timeoutSeconds: this.options.drainTimeoutSeconds,
        force: true,
        deleteEmptyDirData: true,
      });
    } catch (error) {
      const message = `Drain of ${kubeName} failed: ${toError(error).message}`;
      log.warn({ node: kubeName }, message);
      warnings.push(message);
    }
    try {
      await this.deps.controlPlane.apply({ kind: 'delete', resource: 'node', name: kubeName });
    } catch (error) {
      const message = `Deleting node ${kubeName} from the cluster failed: ${toError(error).message}`;
      log.warn({ node: kubeName }, message);
      warnings.push(message);
    }
    return warnings;
  }

  private async saveRoster(context: WorkspaceContext, name: string, removed = false): Promise<void> {
    const saved = await this.deps.recovery.executeWithRecovery({
      name: `roster_${removed ? 'remove' : 'add'}_${name}`,
      action: () => this.deps.repository.save(context),
      onFailureHint: `Could not update the env file of workspace ${context.name}`,
      validation: async () => {
        const reloaded = await this.deps.repository.load(context.name);
        return reloaded.roster.has(name) !== removed;
      },
    });
    if (!saved) {
      throw this.stepError(`Updating the roster for ${name} failed`, `check envs/${context.name}.env`);
    }
  }

  private stepError(message: string, suggestion: string): FatalError {
    const failure = this.deps.recovery.lastFailure();
    const cause = failure?.error;
    if (cause instanceof FatalError) {
      return new FatalError(`${message}: ${cause.message}`, cause.suggestion ?? suggestion, cause.details);
    }
    return new FatalError(cause ? `${message}: ${cause.message}` : message, suggestion);
  }
}
