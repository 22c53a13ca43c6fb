/**
 * Kubernetes Control Plane Upgrade
 *
 * Runs `kubeadm upgrade apply` on the control plane through the upgrade
 * playbook (with an etcd snapshot first unless skipped), then waits for
 * the API server to report the new release. Workers are upgraded one at a
 * time afterwards with `cpc upgrade-node`.
 */

import { InventoryGroup, buildInventory } from '../adapters/inventory.js';
import type { KubeVersion } from '../adapters/kube-resources.js';
import type {
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  InfraAdapter,
} from '../adapters/types.js';
import { pollUntil } from '../adapters/wait.js';
import type { WorkspaceRepository } from '../nodes/node-lifecycle.js';
import type { RecoveryLog } from '../recovery/recovery-log.js';
import { workerNodes } from '../types/cluster.js';
import { FatalError, TimeoutError, ValidationError } from '../types/errors.js';
import {
  KUBERNETES_VERSION_KEY,
  formatKubernetesVersion,
  kubernetesVersionVars,
  parseKubernetesVersion,
  serverMatchesVersion,
  type KubernetesVersion,
} from '../types/kubernetes-version.js';
import type { WorkspaceContext } from '../types/workspace.js';
import type { Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('k8s-upgrade');

export const CONTROL_PLANE_UPGRADE_PLAYBOOK = 'pb_upgrade_k8s_control_plane.yml';

export const K8sUpgradeOutcome = {
  ALREADY_CURRENT: 'already-current',
  UPGRADED: 'upgraded',
} as const;

export type K8sUpgradeOutcome = (typeof K8sUpgradeOutcome)[keyof typeof K8sUpgradeOutcome];

export interface K8sUpgradeDeps {
  repository: WorkspaceRepository;
  infra: InfraAdapter;
  configRunner: ConfigRunnerAdapter;
  controlPlane: ControlPlaneAdapter;
  recovery: RecoveryLog;
  clock: Clock;
}

export interface K8sUpgradeOptions {
  sshUser: string;
  /** Wait for the API server to report the new release */
  versionTimeoutMs: number;
  pollIntervalMs: number;
}

export interface K8sUpgradeRequest {
  /** Defaults to the workspace's KUBERNETES_VERSION pin */
  targetVersion?: string;
  skipEtcdBackup?: boolean;
}

export interface K8sUpgradeReport {
  context: WorkspaceContext;
  fromVersion: string;
  toVersion: string;
  outcome: K8sUpgradeOutcome;
  warnings: string[];
  nextSteps: string[];
}

function patchOf(server: KubeVersion): number | null {
  const match = /^v?\d+\.\d+\.(\d+)/.exec(server.gitVersion);
  return match ? Number(match[1]) : null;
}

/**
 * kubeadm moves one minor release at a time and never backwards.
 */
export function assertUpgradePath(server: KubeVersion, target: KubernetesVersion): void {
  const targetLabel = formatKubernetesVersion(target);
  if (target.major !== server.major) {
    throw new ValidationError(
      `Cannot upgrade from ${server.gitVersion} to ${targetLabel}: major version change`,
      'targetVersion'
    );
  }
  const serverPatch = patchOf(server);
  const older =
    target.minor < server.minor ||
    (target.minor === server.minor &&
      target.patch !== null &&
      serverPatch !== null &&
      target.patch < serverPatch);
  if (older) {
    throw new ValidationError(
      `Cannot downgrade from ${server.gitVersion} to ${targetLabel}`,
      'targetVersion'
    );
  }
  if (target.minor > server.minor + 1) {
    throw new ValidationError(
      `Cannot upgrade from ${server.gitVersion} to ${targetLabel}: minor versions cannot be skipped`,
      'targetVersion',
      `cpc upgrade-k8s --target-version ${server.major}.${server.minor + 1}`
    );
  }
}

export class K8sUpgradeOrchestrator {
  constructor(
    private readonly deps: K8sUpgradeDeps,
    private readonly options: K8sUpgradeOptions
  ) {}

  async upgrade(
    context: WorkspaceContext,
    request: K8sUpgradeRequest = {}
  ): Promise<K8sUpgradeReport> {
    const requested = request.targetVersion ?? context.versions[KUBERNETES_VERSION_KEY];
    if (!requested) {
      throw new ValidationError(
        `No target version given and workspace ${context.name} has no ${KUBERNETES_VERSION_KEY}`,
        'targetVersion',
        'cpc upgrade-k8s --target-version 1.31.9 --yes'
      );
    }
    const target = parseKubernetesVersion(requested, 'targetVersion');
    const toVersion = formatKubernetesVersion(target);

    const server = await this.deps.controlPlane.serverVersion();
    if (!server) {
      throw new FatalError('The cluster API is not reachable', 'cpc status --full');
    }
    if (serverMatchesVersion(server, target)) {
      log.info({ version: server.gitVersion }, 'Control plane already at target version');
      return {
        context,
        fromVersion: server.gitVersion,
        toVersion,
        outcome: K8sUpgradeOutcome.ALREADY_CURRENT,
        warnings: [],
        nextSteps: [],
      };
    }
    assertUpgradePath(server, target);

    const summary = (await this.deps.infra.query({ workspace: context.name })).nodes;
    const upgraded = await this.deps.recovery.executeWithRecovery({
      name: 'upgrade_control_plane',
      action: async () => {
        await this.deps.configRunner.apply({
          playbook: CONTROL_PLANE_UPGRADE_PLAYBOOK,
          inventory: buildInventory(context.name, summary, this.options.sshUser),
          limit: InventoryGroup.CONTROL_PLANE,
          extraVars: {
            skip_etcd_backup: request.skipEtcdBackup ?? false,
            ...kubernetesVersionVars(target),
          },
        });
      },
      onFailureHint: request.skipEtcdBackup
        ? 'Control plane upgrade failed and no etcd snapshot was taken'
        : 'Control plane upgrade failed; an etcd snapshot is in /opt/etcd-backup on the first control plane',
    });
    if (!upgraded) {
      const cause = this.deps.recovery.lastFailure()?.error?.message ?? 'unknown error';
      throw new FatalError(
        `Upgrading the control plane to ${toVersion} failed: ${cause}`,
        'cpc status --full'
      );
    }

    const warnings: string[] = [];
    try {
      await pollUntil(
        () => this.deps.controlPlane.serverVersion(),
        version => version !== null && serverMatchesVersion(version, target),
        {
          timeoutMs: this.options.versionTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: `API server to report ${toVersion}`,
        },
        this.deps.clock
      );
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      warnings.push(error.message);
    }

    let updated = context;
    if (target.patch !== null && context.versions[KUBERNETES_VERSION_KEY] !== toVersion) {
      updated = {
        ...context,
        versions: { ...context.versions, [KUBERNETES_VERSION_KEY]: toVersion },
      };
      await this.deps.repository.save(updated);
    }

    log.info({ from: server.gitVersion, to: toVersion }, 'Control plane upgraded');
    return {
      context: updated,
      fromVersion: server.gitVersion,
      toVersion,
      outcome: K8sUpgradeOutcome.UPGRADED,
      warnings,
      nextSteps: workerNodes(summary).map(
        node => `cpc upgrade-node ${node.name} --target-version ${toVersion}`
      ),
    };
  }
}
