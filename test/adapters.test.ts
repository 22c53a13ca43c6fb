/**
 * Provisioner, configuration runner and control-plane adapters driven
 * through a scripted command runner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TofuInfraAdapter, parseClusterSummary } from '../src/adapters/infra-adapter.js';
import {
  AnsibleConfigRunner,
  countChangedTasks,
  parseOneLineOutput,
} from '../src/adapters/config-runner-adapter.js';
import {
  KubectlControlPlane,
  deltaArgs,
  reportsChange,
} from '../src/adapters/control-plane-adapter.js';
import { buildInventory } from '../src/adapters/inventory.js';
import { imageTag, isWorkloadReady, parseServerVersion, asWorkloads } from '../src/adapters/kube-resources.js';
import { NO_RETRY_POLICY, RetryPolicyEngine } from '../src/recovery/retry-policy.js';
import { NodeRole } from '../src/types/node.js';
import { FatalError } from '../src/types/errors.js';
import { FakeClock } from './fakes/clock.js';
import { FakeCommandRunner } from './fakes/command-runner.js';
import { BASE_NODES } from './fakes/adapters.js';
import { daemonset, deployment } from './fakes/kube.js';

function adapterDeps(runner: FakeCommandRunner, clock = new FakeClock()) {
  return { runner, retry: new RetryPolicyEngine(NO_RETRY_POLICY, clock), clock };
}

const SUMMARY_OUTPUT = JSON.stringify({
  sensitive: false,
  type: ['object', {}],
  value: {
    'worker-1': { IP: '10.10.0.21', hostname: 'worker-1.lab.internal', VM_ID: 121 },
    'controlplane-1': { IP: '10.10.0.11', hostname: 'controlplane-1.lab.internal', VM_ID: 111 },
    worker10: { IP: '10.10.0.30', hostname: 'worker10.lab.internal', VM_ID: '130' },
    'worker-3': { IP: '10.10.0.23', hostname: 'worker-3.lab.internal', VM_ID: 123 },
  },
});

describe('TofuInfraAdapter', () => {
  let runner: FakeCommandRunner;
  let adapter: TofuInfraAdapter;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    adapter = new TofuInfraAdapter(adapterDeps(runner), {
      binary: 'tofu',
      workingDir: '/repo/terraform',
      applyTimeoutMs: 3600000,
      commandTimeoutMs: 300000,
    });
  });

  it('should read the cluster summary for an explicit workspace', async () => {
    runner.enqueue({ stdout: SUMMARY_OUTPUT });

    const snapshot = await adapter.query({ workspace: 'lab' });

    expect(snapshot.nodes.map(node => node.name)).toEqual([
      'controlplane-1',
      'worker-1',
      'worker-3',
      'worker10',
    ]);
    expect(snapshot.nodes[0]).toEqual({
      name: 'controlplane-1',
      role: NodeRole.CONTROL_PLANE,
      address: '10.10.0.11',
      hostname: 'controlplane-1.lab.internal',
      infraId: '111',
    });
    expect(runner.calls[0]?.args).toEqual(['output', '-json', 'cluster_summary']);
    expect(runner.calls[0]?.options.env).toEqual({ TF_IN_AUTOMATION: '1', TF_WORKSPACE: 'lab' });
    expect(runner.calls[0]?.options.cwd).toBe('/repo/terraform');
  });

  it('should return an empty snapshot before anything is deployed', async () => {
    runner.enqueue({ exitCode: 1, stderr: 'Warning: No outputs found' });

    const snapshot = await adapter.query({ workspace: 'fresh' });

    expect(snapshot).toEqual({ workspace: 'fresh', nodes: [] });
  });

  it('should reject a malformed summary', () => {
    expect(() => parseClusterSummary({ 'worker-1': { IP: 5 } })).toThrow(FatalError);
    expect(parseClusterSummary(null)).toEqual([]);
  });

  it('should pass variables and detect unchanged applies', async () => {
    runner.enqueue({ stdout: 'Apply complete! Resources: 0 added, 0 changed, 0 destroyed.' });

    const outcome = await adapter.apply({
      workspace: 'lab',
      action: 'apply',
      variables: { additional_workers: 'worker-3' },
    });

    expect(outcome.changed).toBe(false);
    expect(runner.calls[0]?.args).toEqual([
      'apply',
      '-auto-approve',
      '-input=false',
      '-var',
      'additional_workers=worker-3',
    ]);
    expect(runner.calls[0]?.options.timeoutMs).toBe(3600000);
  });

  it('should create a workspace that does not exist yet', async () => {
    runner.enqueue({ exitCode: 1, stderr: 'Workspace "lab" doesn\'t exist.' }, { exitCode: 0 });

    await adapter.selectWorkspace('lab');

    expect(runner.calls.map(call => call.args)).toEqual([
      ['workspace', 'select', 'lab'],
      ['workspace', 'new', 'lab'],
    ]);
    expect(runner.calls[0]?.options.env).toEqual({ TF_IN_AUTOMATION: '1' });
  });

  it('should list workspaces without the selection marker', async () => {
    runner.enqueue({ stdout: '  default\n* lab\n  prod\n' });

    expect(await adapter.listWorkspaces()).toEqual(['default', 'lab', 'prod']);
  });

  it('should treat deleting a missing workspace as done', async () => {
    runner.enqueue({ exitCode: 1, stderr: 'Workspace "old" doesn\'t exist.' });

    await expect(adapter.deleteWorkspace('old')).resolves.toBeUndefined();
  });
});

describe('AnsibleConfigRunner', () => {
  let dir: string;
  let runner: FakeCommandRunner;
  let adapter: AnsibleConfigRunner;
  const inventory = buildInventory('lab', BASE_NODES, 'root');

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cpc-ansible-'));
    runner = new FakeCommandRunner();
    adapter = new AnsibleConfigRunner(adapterDeps(runner), {
      ansibleBinary: 'ansible',
      playbookBinary: 'ansible-playbook',
      workingDir: '/repo/ansible',
      inventoryPath: workspace => join(dir, `inventory_${workspace}.json`),
      playbookTimeoutMs: 1800000,
      commandTimeoutMs: 300000,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should parse one-line ad-hoc output', () => {
    const lines = parseOneLineOutput(
      [
        '10.10.0.11 | SUCCESS => {"changed": false, "ping": "pong"}',
        '10.10.0.21 | UNREACHABLE! => {"changed": false, "unreachable": true}',
        'noise',
      ].join('\n')
    );

    expect(lines).toEqual([
      { host: '10.10.0.11', status: 'SUCCESS', payload: { changed: false, ping: 'pong' } },
      { host: '10.10.0.21', status: 'UNREACHABLE!', payload: { changed: false, unreachable: true } },
    ]);
  });

  it('should sum changed tasks across the recap', () => {
    expect(
      countChangedTasks(
        '10.10.0.11 : ok=5 changed=2 unreachable=0 failed=0\n10.10.0.21 : ok=4 changed=1 unreachable=0 failed=0'
      )
    ).toBe(3);
  });

  it('should report reachability per host and write the inventory', async () => {
    runner.enqueue({
      exitCode: 4,
      stdout: [
        '10.10.0.11 | SUCCESS => {"changed": false, "ping": "pong"}',
        '10.10.0.21 | SUCCESS => {"changed": false, "ping": "pong"}',
        '10.10.0.22 | UNREACHABLE! => {"changed": false, "unreachable": true}',
      ].join('\n'),
    });

    const facts = await adapter.query({ kind: 'reachable', inventory, hosts: 'all' });

    expect(facts).toEqual({ '10.10.0.11': true, '10.10.0.21': true, '10.10.0.22': false });
    expect(runner.calls[0]?.args).toEqual([
      'all',
      '-i',
      join(dir, 'inventory_lab.json'),
      '-o',
      '-m',
      'ansible.builtin.ping',
    ]);
    const written: unknown = JSON.parse(await readFile(join(dir, 'inventory_lab.json'), 'utf-8'));
    expect(written).toMatchObject({
      all: {
        vars: { ansible_user: 'root' },
        children: {
          control_plane: { hosts: { '10.10.0.11': { node_name: 'controlplane-1' } } },
        },
      },
    });
  });

  it('should check file existence with stat', async () => {
    runner.enqueue({
      stdout: '10.10.0.11 | SUCCESS => {"changed": false, "stat": {"exists": true, "mode": "0600"}}',
    });

    const facts = await adapter.query({
      kind: 'file-exists',
      inventory,
      hosts: '10.10.0.11',
      path: '/etc/kubernetes/admin.conf',
    });

    expect(facts).toEqual({ '10.10.0.11': true });
    expect(runner.calls[0]?.args.slice(-5)).toEqual([
      '-b',
      '-m',
      'ansible.builtin.stat',
      '-a',
      'path=/etc/kubernetes/admin.conf',
    ]);
  });

  it('should run playbooks with the workspace and limit', async () => {
    runner.enqueue({ stdout: 'PLAY RECAP\n10.10.0.23 : ok=9 changed=0 unreachable=0 failed=0' });

    const outcome = await adapter.apply({
      playbook: 'pb_add_nodes.yml',
      inventory,
      limit: '10.10.0.23',
      extraVars: { kubernetes_version: 'v1.30.4' },
    });

    expect(outcome.changed).toBe(false);
    expect(runner.calls[0]?.args).toEqual([
      '-i',
      join(dir, 'inventory_lab.json'),
      'playbooks/pb_add_nodes.yml',
      '-e',
      '{"current_cluster_context":"lab","kubernetes_version":"v1.30.4"}',
      '--limit',
      '10.10.0.23',
    ]);
  });

  it('should name the manual command when a playbook fails', async () => {
    runner.enqueue({ exitCode: 2, stderr: 'fatal: [10.10.0.11]: FAILED!' });

    await expect(
      adapter.apply({ playbook: 'validate_cluster.yml', inventory })
    ).rejects.toMatchObject({
      name: 'FatalError',
      suggestion: `cd /repo/ansible && ansible-playbook -i ${join(dir, 'inventory_lab.json')} playbooks/validate_cluster.yml`,
    });
  });
});

describe('KubectlControlPlane', () => {
  let dir: string;
  let runner: FakeCommandRunner;
  let clock: FakeClock;
  let adapter: KubectlControlPlane;
  let kubeconfigPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cpc-kubectl-'));
    kubeconfigPath = join(dir, 'config');
    runner = new FakeCommandRunner();
    clock = new FakeClock();
    adapter = new KubectlControlPlane(adapterDeps(runner, clock), {
      binary: 'kubectl',
      kubeconfigPath,
      timeoutMs: 120000,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should build arguments for each delta', () => {
    expect(
      deltaArgs({ kind: 'manifest', source: 'calico.yaml', strategy: 'server-side', namespace: 'argocd' })
    ).toEqual(['apply', '-n', 'argocd', '--server-side=true', '--force-conflicts', '-f', 'calico.yaml']);
    expect(
      deltaArgs({
        kind: 'remove-annotation',
        resource: 'crd',
        name: 'installations.operator.tigera.io',
        annotation: 'kubectl.kubernetes.io/last-applied-configuration',
      })
    ).toEqual([
      'annotate',
      'crd',
      'installations.operator.tigera.io',
      'kubectl.kubernetes.io/last-applied-configuration-',
    ]);
    expect(
      deltaArgs({
        kind: 'drain',
        node: 'worker-3',
        timeoutSeconds: 120,
        force: true,
        deleteEmptyDirData: true,
      })
    ).toEqual([
      'drain',
      'worker-3',
      '--ignore-daemonsets',
      '--delete-emptydir-data',
      '--force',
      '--timeout=120s',
    ]);
    expect(
      deltaArgs({
        kind: 'drain',
        node: 'worker-3',
        timeoutSeconds: 60,
        force: false,
        deleteEmptyDirData: false,
      })
    ).toEqual(['drain', 'worker-3', '--ignore-daemonsets', '--timeout=60s']);
    expect(deltaArgs({ kind: 'uncordon', node: 'worker-3' })).toEqual(['uncordon', 'worker-3']);
  });

  it('should query with selectors against the configured kubeconfig', async () => {
    runner.enqueue({ stdout: JSON.stringify({ items: [deployment('coredns', 'kube-system', true)] }) });

    const objects = await adapter.query({
      resource: 'deployment',
      namespace: 'kube-system',
      labelSelector: 'k8s-app=kube-dns',
    });

    expect(objects.map(object => object.metadata.name)).toEqual(['coredns']);
    expect(runner.calls[0]?.args).toEqual([
      '--kubeconfig',
      kubeconfigPath,
      'get',
      'deployment',
      '-n',
      'kube-system',
      '-l',
      'k8s-app=kube-dns',
      '-o',
      'json',
    ]);
  });

  it('should return nothing for a missing resource', async () => {
    runner.enqueue({ exitCode: 1, stderr: 'Error from server (NotFound): deployments.apps "x" not found' });

    expect(await adapter.query({ resource: 'deployment', name: 'x' })).toEqual([]);
  });

  it('should treat an existing namespace as unchanged', async () => {
    runner.enqueue({ exitCode: 1, stderr: 'Error from server (AlreadyExists): namespaces "argocd" already exists' });

    const outcome = await adapter.apply({ kind: 'create-namespace', name: 'argocd' });

    expect(outcome.changed).toBe(false);
  });

  it('should skip approving an empty request list', async () => {
    await adapter.apply({ kind: 'approve-csr', names: [] });

    expect(runner.calls).toHaveLength(0);
  });

  it('should detect changes from apply output', () => {
    expect(reportsChange('deployment.apps/coredns unchanged\n')).toBe(false);
    expect(reportsChange('namespace/argocd created\nservice/argocd unchanged')).toBe(true);
    expect(reportsChange('')).toBe(false);
  });

  it('should parse the server version', async () => {
    runner.enqueue({
      stdout: JSON.stringify({ serverVersion: { major: '1', minor: '28+', gitVersion: 'v1.28.3' } }),
    });

    expect(await adapter.serverVersion()).toEqual({ major: 1, minor: 28, gitVersion: 'v1.28.3' });
  });

  it('should return null when the API server is unreachable', async () => {
    runner.enqueue({ exitCode: 1, stdout: '', stderr: 'connection refused' });

    expect(await adapter.serverVersion()).toBeNull();
  });

  it('should back up an existing kubeconfig', async () => {
    expect(await adapter.backupCredentials()).toBeNull();

    await writeFile(kubeconfigPath, 'apiVersion: v1\n', 'utf-8');
    const backupPath = await adapter.backupCredentials();

    expect(backupPath).toBe(`${kubeconfigPath}.backup.${clock.now()}`);
    expect(await readFile(`${kubeconfigPath}.backup.${clock.now()}`, 'utf-8')).toBe('apiVersion: v1\n');
  });

  it('should write credentials and read them back', async () => {
    expect(await adapter.readCredentials()).toBeNull();

    await adapter.writeCredentials('kind: Config\n');

    expect(await adapter.readCredentials()).toBe('kind: Config\n');
  });
});

describe('kube resource helpers', () => {
  it('should take the tag from image references', () => {
    expect(imageTag('registry.k8s.io/coredns/coredns:v1.11.3')).toBe('v1.11.3');
    expect(imageTag('localhost:5000/calico/node')).toBe('latest');
    expect(imageTag('quay.io/metallb/controller:v0.14.8@sha256:abc')).toBe('v0.14.8');
  });

  it('should judge deployments and daemonsets ready', () => {
    const [readyDeployment, notReadyDaemonset] = asWorkloads([
      deployment('coredns', 'kube-system', true),
      daemonset('calico-node', 'calico-system', false),
    ]);

    expect(readyDeployment && isWorkloadReady(readyDeployment)).toBe(true);
    expect(notReadyDaemonset && isWorkloadReady(notReadyDaemonset)).toBe(false);
  });

  it('should ignore malformed version payloads', () => {
    expect(parseServerVersion({ clientVersion: {} })).toBeNull();
  });
});
