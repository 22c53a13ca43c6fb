/**
 * In-process stand-ins for the provisioner, the configuration runner, the
 * cluster API and SSH.
 */

import { InventoryGroup, inventoryHosts, type Inventory } from '../../src/adapters/inventory.js';
import type { KubeObject, KubeVersion } from '../../src/adapters/kube-resources.js';
import type { SshClient } from '../../src/adapters/ssh-client.js';
import type {
  ApplyOutcome,
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  ControlPlaneDelta,
  HostFactSelector,
  HostFacts,
  InfraAdapter,
  InfraDelta,
  InfraSelector,
  InfraSnapshot,
  PlaybookRun,
  ResourceSelector,
} from '../../src/adapters/types.js';
import { pollUntil, type WaitOptions } from '../../src/adapters/wait.js';
import type { WorkspaceRepository } from '../../src/nodes/node-lifecycle.js';
import { parseNodeName } from '../../src/nodes/node-names.js';
import { Roster } from '../../src/nodes/roster.js';
import type { ClusterNode, ClusterSummary } from '../../src/types/cluster.js';
import { NodeRole } from '../../src/types/node.js';
import type { VersionSet, WorkspaceContext } from '../../src/types/workspace.js';
import type { Clock } from '../../src/utils/clock.js';
import { FakeClock } from './clock.js';

const APPLIED: ApplyOutcome = { changed: true, output: '' };

/**
 * VM as the provisioner would report it. Control planes get 10.10.0.1x,
 * workers 10.10.0.2x.
 */
export function clusterNode(name: string): ClusterNode {
  const parsed = parseNodeName(name);
  const role = parsed?.role ?? NodeRole.WORKER;
  const index = parsed?.index ?? 0;
  const octet = (role === NodeRole.CONTROL_PLANE ? 10 : 20) + index;
  return {
    name,
    role,
    address: `10.10.0.${octet}`,
    hostname: `${name}.lab.internal`,
    infraId: String(100 + octet),
  };
}

export const BASE_NODES: ClusterSummary = ['controlplane-1', 'worker-1', 'worker-2'].map(
  clusterNode
);

export function makeContext(
  name = 'lab',
  options: { roster?: Roster; versions?: VersionSet; settings?: Record<string, string> } = {}
): WorkspaceContext {
  return {
    name,
    roster: options.roster ?? Roster.empty(),
    versions: options.versions ?? {},
    settings: options.settings ?? {},
    isFallback: false,
  };
}

function splitNames(value: string | undefined): string[] {
  return (value ?? '').split(',').filter(name => name.length > 0);
}

/**
 * Provisioner stand-in. By default an apply recomputes the VM list from
 * the base nodes plus the additional node variables, and a destroy
 * removes every VM.
 */
export class FakeInfra implements InfraAdapter {
  readonly system = 'infra';
  readonly applyCalls: InfraDelta[] = [];
  nodes: ClusterSummary;
  workspaces: string[] = ['default'];
  selected = 'default';
  deleted: string[] = [];
  queryCount = 0;
  failApply: Error | null = null;
  onApply: ((delta: InfraDelta) => void) | null = null;

  constructor(
    private readonly base: ClusterSummary = BASE_NODES,
    private readonly clock: Clock = new FakeClock()
  ) {
    this.nodes = [...base];
  }

  async query(selector: InfraSelector): Promise<InfraSnapshot> {
    this.queryCount++;
    return { workspace: selector.workspace, nodes: [...this.nodes] };
  }

  async apply(delta: InfraDelta): Promise<ApplyOutcome> {
    this.applyCalls.push(delta);
    if (this.failApply) {
      throw this.failApply;
    }
    if (this.onApply) {
      this.onApply(delta);
    } else if (delta.action === 'destroy') {
      this.nodes = [];
    } else {
      const additional = [
        ...splitNames(delta.variables?.['additional_controlplanes']),
        ...splitNames(delta.variables?.['additional_workers']),
      ];
      this.nodes = [...this.base, ...additional.map(clusterNode)];
    }
    return APPLIED;
  }

  waitUntil(
    selector: InfraSelector,
    condition: (snapshot: InfraSnapshot) => boolean,
    options: WaitOptions
  ): Promise<InfraSnapshot> {
    return pollUntil(() => this.query(selector), condition, options, this.clock);
  }

  async readOutput(): Promise<unknown> {
    return null;
  }

  async selectWorkspace(name: string): Promise<void> {
    if (!this.workspaces.includes(name)) {
      this.workspaces.push(name);
    }
    this.selected = name;
  }

  async listWorkspaces(): Promise<string[]> {
    return [...this.workspaces];
  }

  async deleteWorkspace(name: string): Promise<void> {
    this.deleted.push(name);
    this.workspaces = this.workspaces.filter(workspace => workspace !== name);
  }
}

function matchHosts(inventory: Inventory, pattern: string): string[] {
  if (pattern === 'all') {
    return inventoryHosts(inventory);
  }
  if (pattern === InventoryGroup.CONTROL_PLANE || pattern === InventoryGroup.WORKERS) {
    return inventoryHosts(inventory, pattern);
  }
  return pattern.split(',').filter(host => inventoryHosts(inventory).includes(host));
}

/**
 * Configuration runner stand-in keyed by host address.
 */
export class FakeConfigRunner implements ConfigRunnerAdapter {
  readonly system = 'config-runner';
  readonly playbookRuns: PlaybookRun[] = [];
  readonly files = new Map<string, Set<string>>();
  readonly unreachable = new Set<string>();
  readonly failPlaybooks = new Map<string, Error>();
  onPlaybook: ((run: PlaybookRun) => void) | null = null;

  constructor(private readonly clock: Clock = new FakeClock()) {}

  addFile(address: string, path: string): void {
    const files = this.files.get(address) ?? new Set<string>();
    files.add(path);
    this.files.set(address, files);
  }

  async query(selector: HostFactSelector): Promise<HostFacts> {
    const facts: HostFacts = {};
    for (const host of matchHosts(selector.inventory, selector.hosts)) {
      if (selector.kind === 'reachable') {
        facts[host] = !this.unreachable.has(host);
      } else if (!this.unreachable.has(host)) {
        facts[host] = this.files.get(host)?.has(selector.path) ?? false;
      }
    }
    return facts;
  }

  async apply(run: PlaybookRun): Promise<ApplyOutcome> {
    this.playbookRuns.push(run);
    const failure = this.failPlaybooks.get(run.playbook);
    if (failure) {
      throw failure;
    }
    this.onPlaybook?.(run);
    return APPLIED;
  }

  waitUntil(
    selector: HostFactSelector,
    condition: (snapshot: HostFacts) => boolean,
    options: WaitOptions
  ): Promise<HostFacts> {
    return pollUntil(() => this.query(selector), condition, options, this.clock);
  }

  runsOf(playbook: string): PlaybookRun[] {
    return this.playbookRuns.filter(run => run.playbook === playbook);
  }
}

function matchesLabels(object: KubeObject, selector: string): boolean {
  const labels = object.metadata.labels ?? {};
  return selector
    .split(',')
    .map(term => term.split('='))
    .every(([key, value]) => key !== undefined && labels[key] === value);
}

/**
 * Cluster API stand-in holding objects by resource type.
 */
export class FakeControlPlane implements ControlPlaneAdapter {
  readonly system = 'control-plane';
  readonly applies: ControlPlaneDelta[] = [];
  readonly objects = new Map<string, KubeObject[]>();
  readonly failQueries = new Map<string, Error>();
  readonly backups: string[] = [];
  version: KubeVersion | null = { major: 1, minor: 30, gitVersion: 'v1.30.4' };
  credentials: string | null = null;
  failApply: ((delta: ControlPlaneDelta) => Error | undefined) | null = null;
  onApply: ((delta: ControlPlaneDelta) => void) | null = null;

  constructor(private readonly clock: Clock = new FakeClock()) {}

  add(resource: string, ...objects: KubeObject[]): void {
    this.objects.set(resource, [...(this.objects.get(resource) ?? []), ...objects]);
  }

  async query(selector: ResourceSelector): Promise<KubeObject[]> {
    const failure = this.failQueries.get(selector.resource);
    if (failure) {
      throw failure;
    }
    return (this.objects.get(selector.resource) ?? []).filter(
      object =>
        (selector.name === undefined || object.metadata.name === selector.name) &&
        (selector.allNamespaces === true ||
          selector.namespace === undefined ||
          object.metadata.namespace === selector.namespace) &&
        (selector.labelSelector === undefined || matchesLabels(object, selector.labelSelector))
    );
  }

  async apply(delta: ControlPlaneDelta): Promise<ApplyOutcome> {
    this.applies.push(delta);
    const failure = this.failApply?.(delta);
    if (failure) {
      throw failure;
    }
    if (delta.kind === 'approve-csr') {
      this.objects.set(
        'csr',
        (this.objects.get('csr') ?? []).map(object =>
          delta.names.includes(object.metadata.name)
            ? { ...object, status: { conditions: [{ type: 'Approved', status: 'True' }] } }
            : object
        )
      );
    } else if (delta.kind === 'remove-annotation') {
      this.objects.set(
        delta.resource,
        (this.objects.get(delta.resource) ?? []).map(object =>
          object.metadata.name === delta.name
            ? { ...object, metadata: { ...object.metadata, annotations: {} } }
            : object
        )
      );
    } else if (delta.kind === 'delete') {
      this.objects.set(
        delta.resource,
        (this.objects.get(delta.resource) ?? []).filter(
          object => object.metadata.name !== delta.name
        )
      );
    }
    this.onApply?.(delta);
    return APPLIED;
  }

  waitUntil(
    selector: ResourceSelector,
    condition: (snapshot: KubeObject[]) => boolean,
    options: WaitOptions
  ): Promise<KubeObject[]> {
    return pollUntil(() => this.query(selector), condition, options, this.clock);
  }

  async serverVersion(): Promise<KubeVersion | null> {
    return this.version;
  }

  async readCredentials(): Promise<string | null> {
    return this.credentials;
  }

  async writeCredentials(content: string): Promise<void> {
    this.credentials = content;
  }

  async backupCredentials(): Promise<string | null> {
    if (this.credentials === null) {
      return null;
    }
    const path = `/tmp/kubeconfig.backup.${this.backups.length + 1}`;
    this.backups.push(path);
    return path;
  }

  appliesOf<K extends ControlPlaneDelta['kind']>(
    kind: K
  ): Extract<ControlPlaneDelta, { kind: K }>[] {
    return this.applies.filter(
      (delta): delta is Extract<ControlPlaneDelta, { kind: K }> => delta.kind === kind
    );
  }
}

export class FakeSsh implements SshClient {
  readonly checks = new Map<string, number>();
  readonly unreachable = new Set<string>();
  readonly files = new Map<string, string>();

  async isReachable(address: string): Promise<boolean> {
    this.checks.set(address, (this.checks.get(address) ?? 0) + 1);
    return !this.unreachable.has(address);
  }

  async readFile(address: string, path: string): Promise<string> {
    const content = this.files.get(`${address}:${path}`);
    if (content === undefined) {
      throw new Error(`cat: ${path}: No such file or directory`);
    }
    return content;
  }
}

/**
 * Workspace persistence kept in memory.
 */
export class InMemoryRepository implements WorkspaceRepository {
  readonly saved: WorkspaceContext[] = [];
  private readonly contexts = new Map<string, WorkspaceContext>();

  constructor(...initial: WorkspaceContext[]) {
    for (const context of initial) {
      this.contexts.set(context.name, context);
    }
  }

  async load(name: string): Promise<WorkspaceContext> {
    return this.contexts.get(name) ?? makeContext(name);
  }

  async save(context: WorkspaceContext): Promise<void> {
    this.saved.push(context);
    this.contexts.set(context.name, context);
  }
}
