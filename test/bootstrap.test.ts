/**
 * Bootstrap Orchestrator and its state machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ADDON_CATALOG } from '../src/addons/catalog.js';
import { JOIN_MARKER_PATH, JOIN_PLAYBOOK, JoinOutcome, NodeLifecycleManager } from '../src/nodes/node-lifecycle.js';
import { AddonUpgradeOrchestrator } from '../src/orchestrator/addon-upgrade.js';
import {
  BootstrapOrchestrator,
  BootstrapPlaybook,
  NetworkingOutcome,
  type CredentialsFetcher,
} from '../src/orchestrator/bootstrap.js';
import {
  BootstrapEvent,
  BootstrapState,
  BootstrapStateMachine,
  InvalidBootstrapTransitionError,
  canTransition,
  getNextState,
  isTerminalBootstrapState,
} from '../src/orchestrator/bootstrap-state-machine.js';
import { ADMIN_KUBECONFIG_PATH, type CredentialsResult } from '../src/orchestrator/credentials.js';
import { RecoveryLog } from '../src/recovery/recovery-log.js';
import { approveServingCertificates } from '../src/orchestrator/csr-approval.js';
import { NO_RETRY_POLICY, fixedBackoff, type RetryPolicy } from '../src/recovery/retry-policy.js';
import type { KubeObject } from '../src/adapters/kube-resources.js';
import type { ResourceSelector } from '../src/adapters/types.js';
import { FatalError, ValidationError, isRetryableError } from '../src/types/errors.js';
import type { WorkspaceContext } from '../src/types/workspace.js';
import {
  FakeConfigRunner,
  FakeControlPlane,
  FakeInfra,
  InMemoryRepository,
  clusterNode,
  makeContext,
} from './fakes/adapters.js';
import { FakeClock } from './fakes/clock.js';
import { csr, kubeNode, pod } from './fakes/kube.js';

const PRIMARY = clusterNode('controlplane-1');

class RecordingCredentials implements CredentialsFetcher {
  readonly fetched: string[] = [];

  async fetch(context: WorkspaceContext): Promise<CredentialsResult> {
    this.fetched.push(context.name);
    return { workspace: context.name, server: `https://${PRIMARY.address}:6443`, backupPath: null };
  }
}

describe('BootstrapStateMachine', () => {
  it('should walk the stages in order', () => {
    const machine = new BootstrapStateMachine('lab');

    machine.apply(BootstrapEvent.COMPONENTS_INSTALLED);
    machine.apply(BootstrapEvent.CONTROL_PLANE_READY);
    machine.apply(BootstrapEvent.NETWORKING_READY);
    machine.apply(BootstrapEvent.WORKERS_JOINED);
    machine.apply(BootstrapEvent.VALIDATION_DONE);

    expect(machine.current).toBe(BootstrapState.VALIDATED);
    expect(machine.transitions.map(t => t.to)).toEqual([
      BootstrapState.COMPONENTS_INSTALLED,
      BootstrapState.CONTROL_PLANE_INITIALIZED,
      BootstrapState.NETWORKING_INSTALLED,
      BootstrapState.WORKERS_JOINED,
      BootstrapState.VALIDATED,
    ]);
  });

  it('should reject skipping a stage', () => {
    const machine = new BootstrapStateMachine('lab');

    expect(() => machine.apply(BootstrapEvent.NETWORKING_READY)).toThrow(
      InvalidBootstrapTransitionError
    );
    expect(machine.current).toBe(BootstrapState.NOT_STARTED);
  });

  it('should only abort before the first stage', () => {
    expect(getNextState(BootstrapState.NOT_STARTED, BootstrapEvent.EXISTING_CLUSTER)).toBe(
      BootstrapState.ABORTED
    );
    expect(canTransition(BootstrapState.COMPONENTS_INSTALLED, BootstrapEvent.EXISTING_CLUSTER)).toBe(
      false
    );
  });

  it('should have no failure edge once workers are joined', () => {
    expect(canTransition(BootstrapState.NETWORKING_INSTALLED, BootstrapEvent.STEP_FAILED)).toBe(true);
    expect(canTransition(BootstrapState.WORKERS_JOINED, BootstrapEvent.STEP_FAILED)).toBe(false);
  });

  it('should treat validated, aborted and failed as terminal', () => {
    expect(isTerminalBootstrapState(BootstrapState.VALIDATED)).toBe(true);
    expect(isTerminalBootstrapState(BootstrapState.ABORTED)).toBe(true);
    expect(isTerminalBootstrapState(BootstrapState.FAILED)).toBe(true);
    expect(isTerminalBootstrapState(BootstrapState.WORKERS_JOINED)).toBe(false);
  });
});

describe('BootstrapOrchestrator', () => {
  let clock: FakeClock;
  let infra: FakeInfra;
  let configRunner: FakeConfigRunner;
  let controlPlane: FakeControlPlane;
  let credentials: RecordingCredentials;
  let recovery: RecoveryLog;
  let orchestrator: BootstrapOrchestrator;
  let context: WorkspaceContext;
  let smokeHosts: string[];

  beforeEach(() => {
    clock = new FakeClock();
    infra = new FakeInfra(undefined, clock);
    configRunner = new FakeConfigRunner(clock);
    controlPlane = new FakeControlPlane(clock);
    credentials = new RecordingCredentials();
    recovery = new RecoveryLog({ clock });
    context = makeContext('lab', { versions: { KUBERNETES_VERSION: 'v1.30.4' } });
    smokeHosts = ['10.10.0.21', '10.10.0.22'];

    // the init playbook creates admin.conf and registers the control plane
    configRunner.onPlaybook = run => {
      if (run.playbook === BootstrapPlaybook.INIT_CONTROL_PLANE) {
        configRunner.addFile(PRIMARY.address, ADMIN_KUBECONFIG_PATH);
        if ((controlPlane.objects.get('nodes') ?? []).length === 0) {
          controlPlane.add('nodes', kubeNode('controlplane-1', { controlPlane: true, address: PRIMARY.address }));
        }
      }
      if (run.playbook === JOIN_PLAYBOOK && run.limit) {
        const node = infra.nodes.find(candidate => candidate.address === run.limit);
        configRunner.addFile(run.limit, JOIN_MARKER_PATH);
        if (node) {
          controlPlane.add('nodes', kubeNode(node.name, { address: node.address }));
        }
      }
    };

    controlPlane.onApply = delta => {
      if (delta.kind === 'manifest' && delta.source.includes('custom-resources')) {
        controlPlane.add(
          'pods',
          pod('calico-node-a', {
            namespace: 'calico-system',
            labels: { 'k8s-app': 'calico-node' },
            container: 'calico-node',
            image: 'docker.io/calico/node:v3.28.0',
          })
        );
        controlPlane.add('csr', csr('csr-7x2kq', 'kubernetes.io/kubelet-serving'));
      }
      if (delta.kind === 'create-deployment') {
        const { name, namespace, image } = delta;
        smokeHosts.forEach((hostIP, index) => {
          controlPlane.add(
            'pods',
            pod(`${name}-${index}`, { namespace, labels: { app: name }, image, hostIP })
          );
        });
      }
    };

    const nodes = new NodeLifecycleManager(
      { repository: new InMemoryRepository(context), infra, configRunner, controlPlane, recovery },
      { sshUser: 'root', joinTimeoutMs: 60000, pollIntervalMs: 5000, drainTimeoutSeconds: 120 }
    );
    const addons = new AddonUpgradeOrchestrator(
      { controlPlane, recovery },
      { readyTimeoutMs: 60000, pollIntervalMs: 5000, annotationLimitBytes: 200000 }
    );
    orchestrator = new BootstrapOrchestrator(
      { infra, configRunner, controlPlane, nodes, addons, credentials, recovery, clock },
      {
        sshUser: 'root',
        csrPattern: 'kubelet-serving',
        csrRetryPolicy: NO_RETRY_POLICY,
        controlPlaneInitTimeoutMs: 60000,
        smokeTestTimeoutMs: 60000,
        pollIntervalMs: 5000,
        heartbeatIntervalMs: 60000,
      }
    );
  });

  it('should bootstrap a fresh cluster to validated', async () => {
    const report = await orchestrator.run(context);

    expect(report.state).toBe(BootstrapState.VALIDATED);
    expect(report.warnings).toEqual([]);
    expect(report.networking).toBe(NetworkingOutcome.INSTALLED);
    expect(report.joins.map(join => [join.name, join.outcome])).toEqual([
      ['worker-1', JoinOutcome.JOINED],
      ['worker-2', JoinOutcome.JOINED],
    ]);
    expect(report.approvedCsrs).toEqual(['csr-7x2kq']);
    expect(credentials.fetched).toEqual(['lab']);
    expect(configRunner.playbookRuns.map(run => run.playbook)).toEqual([
      BootstrapPlaybook.INSTALL_COMPONENTS,
      BootstrapPlaybook.INSTALL_COMPONENTS,
      BootstrapPlaybook.INIT_CONTROL_PLANE,
      JOIN_PLAYBOOK,
      JOIN_PLAYBOOK,
      BootstrapPlaybook.VALIDATE,
    ]);
    expect(
      configRunner.runsOf(BootstrapPlaybook.INSTALL_COMPONENTS).map(run => run.limit).sort()
    ).toEqual(['control_plane', 'workers']);
    expect(configRunner.playbookRuns[0]?.extraVars).toEqual({ kubernetes_version: 'v1.30.4' });
    expect(controlPlane.appliesOf('delete')).toHaveLength(1);
  });

  it('should converge when re-run with force', async () => {
    await orchestrator.run(context, { force: true });
    const manifestsAfterFirst = controlPlane.appliesOf('manifest').length;

    const second = await orchestrator.run(context, { force: true });

    expect(second.state).toBe(BootstrapState.VALIDATED);
    expect(second.networking).toBe(NetworkingOutcome.ALREADY_PRESENT);
    expect(second.joins.map(join => join.outcome)).toEqual([
      JoinOutcome.ALREADY_JOINED,
      JoinOutcome.ALREADY_JOINED,
    ]);
    expect(second.approvedCsrs).toEqual([]);
    expect(controlPlane.appliesOf('manifest')).toHaveLength(manifestsAfterFirst);
    expect(configRunner.runsOf(JOIN_PLAYBOOK)).toHaveLength(2);
    expect(infra.applyCalls).toEqual([]);
  });

  it('should abort without changes when the cluster is already initialized', async () => {
    configRunner.addFile(PRIMARY.address, ADMIN_KUBECONFIG_PATH);

    const report = await orchestrator.run(context);

    expect(report.state).toBe(BootstrapState.ABORTED);
    expect(report.warnings).toEqual([
      'Kubernetes already appears to be initialized on 10.10.0.11; use --force to run bootstrap anyway',
    ]);
    expect(configRunner.playbookRuns).toEqual([]);
    expect(controlPlane.applies).toEqual([]);
  });

  it('should warn when smoke test pods share one host', async () => {
    smokeHosts = ['10.10.0.21', '10.10.0.21'];

    const report = await orchestrator.run(context);

    expect(report.state).toBe(BootstrapState.VALIDATED);
    expect(report.warnings).toEqual([
      'Smoke test pods were scheduled on 1 host(s), expected at least 2',
    ]);
  });

  it('should record a failed validation playbook as a warning', async () => {
    configRunner.failPlaybooks.set(BootstrapPlaybook.VALIDATE, new FatalError('dns lookup failed'));

    const report = await orchestrator.run(context);

    expect(report.state).toBe(BootstrapState.VALIDATED);
    expect(report.warnings).toEqual(['Validation playbook failed: dns lookup failed']);
  });

  it('should fail before installing anything when a host is unreachable', async () => {
    configRunner.unreachable.add('10.10.0.22');

    await expect(orchestrator.run(context)).rejects.toThrow(
      'Hosts not reachable over SSH: worker-2 (10.10.0.22)'
    );
    expect(configRunner.playbookRuns).toEqual([]);
    expect(recovery.getCheckpoints().map(checkpoint => checkpoint.name)).toContain('bootstrap_failed');
  });

  it('should tell an uninitialized control plane from a broken one', async () => {
    configRunner.failPlaybooks.set(BootstrapPlaybook.INIT_CONTROL_PLANE, new FatalError('kubeadm init failed'));

    await expect(orchestrator.run(context)).rejects.toMatchObject({
      message: 'Control plane on 10.10.0.11 was not initialized: kubeadm init failed',
      suggestion: 'cpc bootstrap --force',
    });

    configRunner.addFile(PRIMARY.address, ADMIN_KUBECONFIG_PATH);
    await expect(orchestrator.run(context, { force: true })).rejects.toMatchObject({
      suggestion: 'ssh root@10.10.0.11 journalctl -u kubelet',
    });
  });

  it('should fail when a worker cannot join', async () => {
    configRunner.failPlaybooks.set(JOIN_PLAYBOOK, new FatalError('kubeadm join timed out'));

    await expect(orchestrator.run(context)).rejects.toMatchObject({
      message: 'Joining worker-1 (kubeadm join timed out), worker-2 (kubeadm join timed out) failed',
      suggestion: 'cpc join-node worker-1',
    });
  });

  it('should require a control plane VM', async () => {
    infra.nodes = [clusterNode('worker-1')];

    await expect(orchestrator.run(context)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should keep an existing networking plugin', async () => {
    controlPlane.add(
      'pods',
      pod('calico-node-z', {
        namespace: ADDON_CATALOG.calico.namespace,
        labels: { 'k8s-app': 'calico-node' },
        container: 'calico-node',
        image: 'docker.io/calico/node:v3.27.0',
      })
    );

    const report = await orchestrator.run(context);

    expect(report.networking).toBe(NetworkingOutcome.ALREADY_PRESENT);
    expect(controlPlane.appliesOf('manifest')).toEqual([]);
  });
});

/** Control plane whose serving certificate requests show up on the second listing */
class LateCsrControlPlane extends FakeControlPlane {
  csrQueries = 0;

  override async query(selector: ResourceSelector): Promise<KubeObject[]> {
    if (selector.resource === 'csr') {
      this.csrQueries++;
      if (this.csrQueries === 2) {
        this.add(
          'csr',
          csr('csr-m4p8d', 'kubernetes.io/kubelet-serving'),
          csr('csr-q9w2e', 'kubernetes.io/kubelet-serving'),
          csr('csr-client', 'kubernetes.io/kube-apiserver-client-kubelet')
        );
      }
    }
    return super.query(selector);
  }
}

describe('approveServingCertificates', () => {
  let clock: FakeClock;
  let controlPlane: LateCsrControlPlane;
  let policy: RetryPolicy;

  beforeEach(() => {
    clock = new FakeClock();
    controlPlane = new LateCsrControlPlane(clock);
    policy = { maxAttempts: 3, backoff: fixedBackoff(5000), isRetryable: isRetryableError };
  });

  it('should retry until requests appear and approve them', async () => {
    const approved = await approveServingCertificates(controlPlane, 'kubelet-serving', policy, clock);

    expect(approved).toEqual(['csr-m4p8d', 'csr-q9w2e']);
    expect(controlPlane.appliesOf('approve-csr')).toEqual([
      { kind: 'approve-csr', names: ['csr-m4p8d', 'csr-q9w2e'] },
    ]);
    expect(controlPlane.csrQueries).toBe(2);
    expect(clock.sleeps).toEqual([5000]);
  });

  it('should return nothing once attempts run out without requests', async () => {
    const approved = await approveServingCertificates(
      controlPlane,
      'kubelet-serving',
      { ...policy, maxAttempts: 1 },
      clock
    );

    expect(approved).toEqual([]);
    expect(controlPlane.appliesOf('approve-csr')).toEqual([]);
    expect(clock.sleeps).toEqual([]);
  });
});
