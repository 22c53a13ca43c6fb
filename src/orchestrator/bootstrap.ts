/**
 * Bootstrap Orchestrator
 *
 * Drives a fresh set of VMs to a validated cluster:
 *   components → control plane → networking → workers → validation
 *
 * Every stage checks current state before it mutates so that re-running bootstrap on a
 * partially or fully bootstrapped cluster converges. Validation problems
 * are warnings; everything before validation is fatal.
 */

import { customAlphabet } from 'nanoid';
import {
  InventoryGroup,
  buildInventory,
  inventoryHosts,
  type Inventory,
} from '../adapters/inventory.js';
import { asNodes, asPods, isControlPlaneNode, isPodReady } from '../adapters/kube-resources.js';
import type {
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  InfraAdapter,
} from '../adapters/types.js';
import { ADDON_CATALOG } from '../addons/catalog.js';
import { playbookVersionVars } from '../context/context-store.js';
import { JoinOutcome, type NodeJoinResult, type NodeLifecycleManager } from '../nodes/node-lifecycle.js';
import type { RecoveryLog } from '../recovery/recovery-log.js';
import type { RetryPolicy } from '../recovery/retry-policy.js';
import { heartbeat, runTaskGroup } from '../recovery/task-group.js';
import { controlPlaneNodes, type ClusterNode, type ClusterSummary } from '../types/cluster.js';
import { FatalError, TimeoutError, ValidationError, toError } from '../types/errors.js';
import type { WorkspaceContext } from '../types/workspace.js';
import type { Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';
import { AddonOutcome, type AddonUpgradeOrchestrator } from './addon-upgrade.js';
import {
  BootstrapEvent,
  BootstrapState,
  BootstrapStateMachine,
  canTransition,
  type BootstrapTransition,
} from './bootstrap-state-machine.js';
import { approveServingCertificates } from './csr-approval.js';
import { ADMIN_KUBECONFIG_PATH, type CredentialsResult } from './credentials.js';

const log = createLogger('bootstrap');

export const BootstrapPlaybook = {
  INSTALL_COMPONENTS: 'install_kubernetes_cluster.yml',
  INIT_CONTROL_PLANE: 'initialize_kubernetes_cluster_with_dns.yml',
  VALIDATE: 'validate_cluster.yml',
} as const;

export const SMOKE_TEST_IMAGE = 'nginx:alpine';
export const SMOKE_TEST_REPLICAS = 2;
export const SMOKE_TEST_NAMESPACE = 'default';

const smokeSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 6);

export interface CredentialsFetcher {
  fetch(context: WorkspaceContext, summary?: ClusterSummary): Promise<CredentialsResult>;
}

export interface BootstrapDeps {
  infra: InfraAdapter;
  configRunner: ConfigRunnerAdapter;
  controlPlane: ControlPlaneAdapter;
  nodes: NodeLifecycleManager;
  addons: AddonUpgradeOrchestrator;
  credentials: CredentialsFetcher;
  recovery: RecoveryLog;
  clock?: Clock;
}

export interface BootstrapOptions {
  sshUser: string;
  csrPattern: string;
  csrRetryPolicy: RetryPolicy;
  controlPlaneInitTimeoutMs: number;
  smokeTestTimeoutMs: number;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
}

export interface BootstrapRunOptions {
  /** Skip the existing-cluster guard */
  force?: boolean;
}

export const NetworkingOutcome = {
  INSTALLED: 'installed',
  ALREADY_PRESENT: 'already-present',
} as const;

export type NetworkingOutcome = (typeof NetworkingOutcome)[keyof typeof NetworkingOutcome];

export interface BootstrapReport {
  workspace: string;
  state: BootstrapState;
  transitions: readonly BootstrapTransition[];
  context: WorkspaceContext;
  networking: NetworkingOutcome | null;
  joins: NodeJoinResult[];
  approvedCsrs: string[];
  warnings: string[];
  runId: string;
}

interface RunState {
  context: WorkspaceContext;
  summary: ClusterSummary;
  inventory: Inventory;
  primary: ClusterNode;
  report: BootstrapReport;
}

export class BootstrapOrchestrator {
  constructor(
    private readonly deps: BootstrapDeps,
    private readonly options: BootstrapOptions
  ) {}

  async run(context: WorkspaceContext, runOptions: BootstrapRunOptions = {}): Promise<BootstrapReport> {
    const machine = new BootstrapStateMachine(context.name);
    const report: BootstrapReport = {
      workspace: context.name,
      state: machine.current,
      transitions: machine.transitions,
      context,
      networking: null,
      joins: [],
      approvedCsrs: [],
      warnings: [],
      runId: this.deps.recovery.runId,
    };

    const summary = (await this.deps.infra.query({ workspace: context.name })).nodes;
    const [primary] = controlPlaneNodes(summary);
    if (!primary) {
      throw new ValidationError(
        summary.length === 0
          ? `No VMs found in workspace ${context.name}`
          : `No control plane VM found in workspace ${context.name}`,
        'workspace',
        `cd terraform && TF_WORKSPACE=${context.name} tofu apply`
      );
    }
    const inventory = buildInventory(context.name, summary, this.options.sshUser);
    const state: RunState = { context, summary, inventory, primary, report };

    if (!runOptions.force && (await this.hasAdminConfig(inventory, primary))) {
      const message = `Kubernetes already appears to be initialized on ${primary.address}; use --force to run bootstrap anyway`;
      log.warn({ workspace: context.name, host: primary.address }, message);
      report.warnings.push(message);
      machine.apply(BootstrapEvent.EXISTING_CLUSTER);
      report.state = machine.current;
      return report;
    }

    await this.deps.recovery.checkpoint('bootstrap_start', `workspace=${context.name} force=${runOptions.force === true}`);
    try {
      await this.installComponents(state);
      machine.apply(BootstrapEvent.COMPONENTS_INSTALLED);

      await this.initializeControlPlane(state);
      machine.apply(BootstrapEvent.CONTROL_PLANE_READY);

      report.networking = await this.installNetworking(state);
      machine.apply(BootstrapEvent.NETWORKING_READY);

      await this.joinWorkers(state);
      machine.apply(BootstrapEvent.WORKERS_JOINED);
    } catch (error) {
      if (canTransition(machine.current, BootstrapEvent.STEP_FAILED)) {
        machine.apply(BootstrapEvent.STEP_FAILED);
      }
      report.state = machine.current;
      await this.deps.recovery.checkpoint('bootstrap_failed', toError(error).message);
      throw error;
    }

    await this.validate(state);
    machine.apply(BootstrapEvent.VALIDATION_DONE);
    report.state = machine.current;
    await this.deps.recovery.checkpoint('bootstrap_complete', `warnings=${report.warnings.length}`);
    return report;
  }

  private async hasAdminConfig(inventory: Inventory, primary: ClusterNode): Promise<boolean> {
    const facts = await this.deps.configRunner.query({
      kind: 'file-exists',
      inventory,
      hosts: primary.address,
      path: ADMIN_KUBECONFIG_PATH,
    });
    return facts[primary.address] === true;
  }

  private async installComponents(state: RunState): Promise<void> {
    const { configRunner, recovery } = this.deps;
    const { inventory, summary } = state;

    await recovery.checkpoint('inventory', `${summary.length} hosts`);
    const reachability = await configRunner.query({ kind: 'reachable', inventory, hosts: 'all' });
    const unreachable = summary
      .filter(node => reachability[node.address] !== true)
      .map(node => `${node.name} (${node.address})`);
    if (unreachable.length > 0) {
      throw new FatalError(
        `Hosts not reachable over SSH: ${unreachable.join(', ')}`,
        'check that the VMs are running and accept SSH, then re-run cpc bootstrap'
      );
    }

    // control plane and worker installs touch disjoint hosts
    const groups = Object.values(InventoryGroup).filter(
      group => inventoryHosts(inventory, group).length > 0
    );
    const installed = await runTaskGroup(
      groups.map(
        group => () =>
          recovery.executeWithRecovery({
            name: `install_components_${group}`,
            action: async () => {
              await configRunner.apply({
                playbook: BootstrapPlaybook.INSTALL_COMPONENTS,
                inventory,
                limit: group,
                extraVars: playbookVersionVars(state.context),
              });
            },
            onFailureHint: `Installing Kubernetes components on ${group} failed; re-running cpc bootstrap --force is safe`,
          })
      ),
      heartbeat('component installation', this.options.heartbeatIntervalMs)
    );
    if (!installed.every(Boolean)) {
      throw this.failure('Installing Kubernetes components failed', 'cpc bootstrap --force');
    }
  }

  /**
   * Run the init playbook, fetch credentials and wait for the API server.
   * A failed init is reported differently depending on whether the control
   * plane already holds an admin kubeconfig.
   */
  private async initializeControlPlane(state: RunState): Promise<void> {
    const { configRunner, controlPlane, credentials, recovery } = this.deps;
    const { inventory, primary } = state;

    const initialized = await recovery.executeWithRecovery({
      name: 'init_control_plane',
      action: async () => {
        await configRunner.apply({
          playbook: BootstrapPlaybook.INIT_CONTROL_PLANE,
          inventory,
          extraVars: playbookVersionVars(state.context),
        });
      },
      onFailureHint: `Control plane initialization failed; inspect kubelet logs on ${primary.address}`,
    });
    if (!initialized) {
      const cause = recovery.lastFailure()?.error?.message ?? 'unknown error';
      if (await this.hasAdminConfig(inventory, primary)) {
        throw new FatalError(
          `Control plane on ${primary.address} is initialized but the init step failed (${cause}); the cluster may be broken`,
          `ssh ${this.options.sshUser}@${primary.address} journalctl -u kubelet`
        );
      }
      throw new FatalError(
        `Control plane on ${primary.address} was not initialized: ${cause}`,
        'cpc bootstrap --force'
      );
    }

    await credentials.fetch(state.context, state.summary);

    try {
      await controlPlane.waitUntil(
        { resource: 'nodes' },
        objects => asNodes(objects).some(isControlPlaneNode),
        {
          timeoutMs: this.options.controlPlaneInitTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: 'the API server to list a control plane node',
        }
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new FatalError(error.message, 'cpc status --full');
      }
      throw error;
    }
    await recovery.checkpoint('control_plane_ready', primary.address);
  }

  private async installNetworking(state: RunState): Promise<NetworkingOutcome> {
    const calico = ADDON_CATALOG.calico;
    const pods = asPods(
      await this.deps.controlPlane.query({
        resource: 'pods',
        namespace: calico.namespace,
        labelSelector: calico.podSelector,
      })
    );
    if (pods.length > 0) {
      log.info({ pods: pods.length }, 'Networking plugin already present, skipping');
      return NetworkingOutcome.ALREADY_PRESENT;
    }

    const { reports } = await this.deps.addons.upgrade(state.context, calico.name);
    const [result] = reports;
    if (!result || result.outcome === AddonOutcome.FAILED) {
      throw new FatalError(
        `Installing ${calico.name} failed: ${result?.error ?? 'no result'}`,
        `cpc upgrade-addons ${calico.name}`
      );
    }
    state.report.warnings.push(...result.warnings);
    return NetworkingOutcome.INSTALLED;
  }

  /**
   * Join every node besides the primary control plane, then approve the
   * kubelets' serving certificates. Nodes that already carry a join marker
   * are skipped.
   */
  private async joinWorkers(state: RunState): Promise<void> {
    const targets = state.summary.filter(node => node !== state.primary);
    const result = await this.deps.nodes.join(state.context, state.summary, targets);
    state.context = result.context;
    state.report.context = result.context;
    state.report.joins = result.nodes;

    try {
      state.report.approvedCsrs = await approveServingCertificates(
        this.deps.controlPlane,
        this.options.csrPattern,
        this.options.csrRetryPolicy,
        this.deps.clock
      );
    } catch (error) {
      const message = `Serving certificate approval failed: ${toError(error).message}`;
      log.warn(message);
      state.report.warnings.push(message);
    }

    const failed = result.nodes.filter(node => node.outcome === JoinOutcome.FAILED);
    if (failed.length > 0) {
      const [first] = failed;
      throw new FatalError(
        `Joining ${failed.map(node => `${node.name} (${node.error ?? 'failed'})`).join(', ')} failed`,
        first ? `cpc join-node ${first.name}` : undefined
      );
    }
  }

  private async validate(state: RunState): Promise<void> {
    const { configRunner, recovery } = this.deps;

    const validated = await recovery.executeWithRecovery({
      name: 'validate_cluster',
      action: async () => {
        await configRunner.apply({
          playbook: BootstrapPlaybook.VALIDATE,
          inventory: state.inventory,
          limit: 'control_plane',
        });
      },
      onFailureHint: 'Cluster validation playbook failed; the cluster may still be usable',
    });
    if (!validated) {
      state.report.warnings.push(
        `Validation playbook failed: ${recovery.lastFailure()?.error?.message ?? 'unknown error'}`
      );
    }

    try {
      state.report.warnings.push(...(await this.smokeTest()));
    } catch (error) {
      const message = `Smoke test failed: ${toError(error).message}`;
      log.warn(message);
      state.report.warnings.push(message);
    }
  }

  /**
   * Schedule a throwaway deployment and check that its replicas land on at
   * least two distinct hosts. Returns warnings.
   */
  private async smokeTest(): Promise<string[]> {
    const { controlPlane } = this.deps;
    const name = `cpc-smoke-${smokeSuffix()}`;
    const warnings: string[] = [];

    await controlPlane.apply({
      kind: 'create-deployment',
      namespace: SMOKE_TEST_NAMESPACE,
      name,
      image: SMOKE_TEST_IMAGE,
      replicas: SMOKE_TEST_REPLICAS,
    });

    try {
      const objects = await controlPlane.waitUntil(
        { resource: 'pods', namespace: SMOKE_TEST_NAMESPACE, labelSelector: `app=${name}` },
        found => asPods(found).filter(isPodReady).length >= SMOKE_TEST_REPLICAS,
        {
          timeoutMs: this.options.smokeTestTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: `smoke test deployment ${name} to become ready`,
        }
      );
      const hosts = new Set(
        asPods(objects)
          .filter(isPodReady)
          .map(pod => pod.status.hostIP)
          .filter((hostIP): hostIP is string => hostIP !== undefined)
      );
      if (hosts.size < 2) {
        warnings.push(`Smoke test pods were scheduled on ${hosts.size} host(s), expected at least 2`);
      } else {
        log.info({ hosts: [...hosts] }, 'Smoke test passed');
      }
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      warnings.push(error.message);
    } finally {
      try {
        await controlPlane.apply({
          kind: 'delete',
          resource: 'deployment',
          name,
          namespace: SMOKE_TEST_NAMESPACE,
        });
      } catch (error) {
        warnings.push(`Could not delete smoke test deployment ${name}: ${toError(error).message}`);
      }
    }
    return warnings;
  }

  private failure(message: string, suggestion: string): FatalError {
    const cause = this.deps.recovery.lastFailure()?.error;
    if (cause instanceof FatalError) {
      return new FatalError(`${message}: ${cause.message}`, cause.suggestion ?? suggestion, cause.details);
    }
    return new FatalError(cause ? `${message}: ${cause.message}` : message, suggestion);
  }
}
