/**
 * Status Aggregator
 *
 * Fast mode answers from short-lived caches and produces counts only.
 * Full mode queries everything and isolates each check, so one failing
 * check is reported inline while the rest still run.
 */

import { getInfraCachePath, getSshCachePath, type CpcPaths } from '../artifacts/paths.js';
import {
  asNodes,
  asWorkloads,
  isControlPlaneNode,
  isNodeReady,
  isWorkloadReady,
} from '../adapters/kube-resources.js';
import type { SshClient } from '../adapters/ssh-client.js';
import type { ControlPlaneAdapter, InfraAdapter } from '../adapters/types.js';
import { ADDON_CATALOG } from '../addons/catalog.js';
import type { ClusterSummary } from '../types/cluster.js';
import { toError } from '../types/errors.js';
import type { NodeSpec } from '../types/node.js';
import type { WorkspaceContext } from '../types/workspace.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';
import {
  TtlFileCache,
  clusterSummarySchema,
  reachabilitySchema,
  type Reachability,
} from './status-cache.js';

const log = createLogger('status');

export const StatusMode = {
  FAST: 'fast',
  FULL: 'full',
} as const;

export type StatusMode = (typeof StatusMode)[keyof typeof StatusMode];

export type CacheResult = 'hit' | 'miss';

export interface FastStatus {
  mode: typeof StatusMode.FAST;
  workspace: string;
  vmsDeployed: number;
  nodesReachable: number;
  /** Null when the API server could not be queried */
  k8sNodes: number | null;
  cache: { infra: CacheResult; ssh: CacheResult };
}

export interface StatusCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface HostReachability {
  name: string;
  address: string;
  reachable: boolean;
}

export interface FullStatus {
  mode: typeof StatusMode.FULL;
  workspace: string;
  roster: readonly NodeSpec[];
  vms: ClusterSummary;
  hosts: HostReachability[];
  checks: StatusCheck[];
}

export type ClusterStatus = FastStatus | FullStatus;

export interface StatusOptions {
  sshCacheTtlMs: number;
  infraCacheTtlMs: number;
}

export interface StatusDeps {
  paths: CpcPaths;
  infra: InfraAdapter;
  ssh: SshClient;
  controlPlane: ControlPlaneAdapter;
  clock?: Clock;
}

export class StatusAggregator {
  private readonly clock: Clock;

  constructor(
    private readonly deps: StatusDeps,
    private readonly options: StatusOptions
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  async fast(context: WorkspaceContext): Promise<FastStatus> {
    const infraCache = new TtlFileCache(
      getInfraCachePath(this.deps.paths, context.name),
      clusterSummarySchema,
      this.options.infraCacheTtlMs,
      this.clock
    );
    const sshCache = new TtlFileCache(
      getSshCachePath(this.deps.paths, context.name),
      reachabilitySchema,
      this.options.sshCacheTtlMs,
      this.clock
    );

    let infraResult: CacheResult = 'hit';
    let summary = await infraCache.get();
    if (summary === null) {
      infraResult = 'miss';
      summary = (await this.deps.infra.query({ workspace: context.name })).nodes;
      // "not deployed" is not cached, so a deploy shows up on the next call
      if (summary.length > 0) {
        await infraCache.set(summary);
      }
    }

    let sshResult: CacheResult = 'hit';
    const cached = await sshCache.get();
    let reachability: Reachability;
    // a VM added since the last check invalidates the cached answer
    if (cached !== null && summary.every(node => node.address in cached)) {
      reachability = cached;
    } else {
      sshResult = 'miss';
      reachability = await this.checkReachability(summary);
      await sshCache.set(reachability);
    }

    let k8sNodes: number | null = null;
    try {
      k8sNodes = (await this.deps.controlPlane.query({ resource: 'nodes' })).length;
    } catch (error) {
      log.debug({ error: toError(error).message }, 'API server not reachable for status');
    }

    return {
      mode: StatusMode.FAST,
      workspace: context.name,
      vmsDeployed: summary.length,
      nodesReachable: summary.filter(node => reachability[node.address] === true).length,
      k8sNodes,
      cache: { infra: infraResult, ssh: sshResult },
    };
  }

  async full(context: WorkspaceContext): Promise<FullStatus> {
    const checks: StatusCheck[] = [];
    let vms: ClusterSummary = [];

    await this.check(checks, 'infrastructure', async () => {
      vms = (await this.deps.infra.query({ workspace: context.name })).nodes;
      return { ok: vms.length > 0, detail: `${vms.length} VMs deployed` };
    });

    const hosts: HostReachability[] = [];
    for (const node of vms) {
      hosts.push({
        name: node.name,
        address: node.address,
        reachable: await this.reachable(node.address),
      });
    }

    await this.check(checks, 'control-plane nodes', async () => {
      const nodes = asNodes(await this.deps.controlPlane.query({ resource: 'nodes' }));
      const controlPlanes = nodes.filter(isControlPlaneNode);
      const ready = controlPlanes.filter(isNodeReady).length;
      return {
        ok: controlPlanes.length > 0 && ready === controlPlanes.length,
        detail: `${ready}/${controlPlanes.length} ready`,
      };
    });

    await this.check(checks, 'worker nodes', async () => {
      const nodes = asNodes(await this.deps.controlPlane.query({ resource: 'nodes' }));
      const workers = nodes.filter(node => !isControlPlaneNode(node));
      const ready = workers.filter(isNodeReady).length;
      return { ok: ready === workers.length, detail: `${ready}/${workers.length} ready` };
    });

    const coredns = ADDON_CATALOG.coredns;
    const calico = ADDON_CATALOG.calico;
    for (const addon of [coredns, calico]) {
      await this.check(checks, addon.name, async () => {
        const results: string[] = [];
        let ok = true;
        for (const workload of addon.workloads) {
          const [object] = asWorkloads(
            await this.deps.controlPlane.query({
              resource: workload.resource,
              name: workload.name,
              namespace: addon.namespace,
            })
          );
          const ready = object !== undefined && isWorkloadReady(object);
          ok = ok && ready;
          results.push(`${workload.resource}/${workload.name} ${object ? (ready ? 'ready' : 'not ready') : 'missing'}`);
        }
        return { ok, detail: results.join(', ') };
      });
    }

    return {
      mode: StatusMode.FULL,
      workspace: context.name,
      roster: context.roster.list(),
      vms,
      hosts,
      checks,
    };
  }

  private async check(
    checks: StatusCheck[],
    name: string,
    run: () => Promise<{ ok: boolean; detail: string }>
  ): Promise<void> {
    try {
      const result = await run();
      checks.push({ name, ...result });
    } catch (error) {
      const detail = toError(error).message;
      log.warn({ check: name, error: detail }, 'Status check failed');
      checks.push({ name, ok: false, detail });
    }
  }

  private async checkReachability(summary: ClusterSummary): Promise<Reachability> {
    const results: Reachability = {};
    for (const node of summary) {
      results[node.address] = await this.reachable(node.address);
    }
    return results;
  }

  private async reachable(address: string): Promise<boolean> {
    try {
      return await this.deps.ssh.isReachable(address);
    } catch (error) {
      log.debug({ address, error: toError(error).message }, 'Reachability check failed');
      return false;
    }
  }
}
