/**
 * Kubernetes Control Plane Upgrade Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CONTROL_PLANE_UPGRADE_PLAYBOOK,
  K8sUpgradeOrchestrator,
  K8sUpgradeOutcome,
} from '../src/orchestrator/k8s-upgrade.js';
import { RecoveryLog } from '../src/recovery/recovery-log.js';
import { FatalError, ValidationError } from '../src/types/errors.js';
import type { WorkspaceContext } from '../src/types/workspace.js';
import {
  FakeConfigRunner,
  FakeControlPlane,
  FakeInfra,
  InMemoryRepository,
  makeContext,
} from './fakes/adapters.js';
import { FakeClock } from './fakes/clock.js';

describe('K8sUpgradeOrchestrator', () => {
  let clock: FakeClock;
  let configRunner: FakeConfigRunner;
  let controlPlane: FakeControlPlane;
  let repository: InMemoryRepository;
  let orchestrator: K8sUpgradeOrchestrator;
  let context: WorkspaceContext;

  beforeEach(() => {
    clock = new FakeClock();
    configRunner = new FakeConfigRunner(clock);
    controlPlane = new FakeControlPlane(clock);
    context = makeContext('lab', { versions: { KUBERNETES_VERSION: 'v1.30.4', CALICO_VERSION: 'v3.28.0' } });
    repository = new InMemoryRepository(context);
    orchestrator = new K8sUpgradeOrchestrator(
      {
        repository,
        infra: new FakeInfra(undefined, clock),
        configRunner,
        controlPlane,
        recovery: new RecoveryLog({ clock }),
        clock,
      },
      { sshUser: 'root', versionTimeoutMs: 600000, pollIntervalMs: 10000 }
    );
    configRunner.onPlaybook = run => {
      if (run.playbook === CONTROL_PLANE_UPGRADE_PLAYBOOK) {
        controlPlane.version = { major: 1, minor: 31, gitVersion: 'v1.31.2' };
      }
    };
  });

  it('should upgrade the control plane and pin the new release', async () => {
    const report = await orchestrator.upgrade(context, { targetVersion: '1.31.2' });

    expect(report).toMatchObject({
      fromVersion: 'v1.30.4',
      toVersion: 'v1.31.2',
      outcome: K8sUpgradeOutcome.UPGRADED,
      warnings: [],
      nextSteps: [
        'cpc upgrade-node worker-1 --target-version v1.31.2',
        'cpc upgrade-node worker-2 --target-version v1.31.2',
      ],
    });
    const runs = configRunner.runsOf(CONTROL_PLANE_UPGRADE_PLAYBOOK);
    expect(runs.map(run => [run.limit, run.extraVars])).toEqual([
      [
        'control_plane',
        { skip_etcd_backup: false, target_k8s_version: '1.31', kubernetes_patch_version: '2' },
      ],
    ]);
    expect(clock.sleeps).toEqual([]);
    expect((await repository.load('lab')).versions).toEqual({
      KUBERNETES_VERSION: 'v1.31.2',
      CALICO_VERSION: 'v3.28.0',
    });
  });

  it('should do nothing when the server already runs the pinned release', async () => {
    const report = await orchestrator.upgrade(context);

    expect(report.outcome).toBe(K8sUpgradeOutcome.ALREADY_CURRENT);
    expect(report.context).toBe(context);
    expect(configRunner.playbookRuns).toEqual([]);
    expect(repository.saved).toEqual([]);
  });

  it('should treat a minor-only target as any patch of that line', async () => {
    const report = await orchestrator.upgrade(context, { targetVersion: 'v1.30' });

    expect(report.outcome).toBe(K8sUpgradeOutcome.ALREADY_CURRENT);
    expect(report.fromVersion).toBe('v1.30.4');
  });

  it('should refuse to skip a minor release', async () => {
    await expect(orchestrator.upgrade(context, { targetVersion: '1.32' })).rejects.toMatchObject({
      message: 'Cannot upgrade from v1.30.4 to v1.32: minor versions cannot be skipped',
      suggestion: 'cpc upgrade-k8s --target-version 1.31',
    });
    expect(configRunner.playbookRuns).toEqual([]);
  });

  it.each([
    ['1.29.9', 'Cannot downgrade from v1.30.4 to v1.29.9'],
    ['1.30.2', 'Cannot downgrade from v1.30.4 to v1.30.2'],
    ['2.0', 'Cannot upgrade from v1.30.4 to v2.0: major version change'],
  ])('should reject %s', async (targetVersion, message) => {
    const upgrade = orchestrator.upgrade(context, { targetVersion });

    await expect(upgrade).rejects.toBeInstanceOf(ValidationError);
    await expect(upgrade).rejects.toThrow(message);
  });

  it('should fail when the cluster API is unreachable', async () => {
    controlPlane.version = null;

    await expect(orchestrator.upgrade(context, { targetVersion: '1.31' })).rejects.toMatchObject({
      message: 'The cluster API is not reachable',
      suggestion: 'cpc status --full',
    });
  });

  it('should report the playbook failure and keep the old pin', async () => {
    configRunner.failPlaybooks.set(
      CONTROL_PLANE_UPGRADE_PLAYBOOK,
      new FatalError('kubeadm upgrade apply exited with 1')
    );

    const upgrade = orchestrator.upgrade(context, { targetVersion: '1.31.2' });

    await expect(upgrade).rejects.toBeInstanceOf(FatalError);
    await expect(upgrade).rejects.toThrow(
      'Upgrading the control plane to v1.31.2 failed: kubeadm upgrade apply exited with 1'
    );
    expect(repository.saved).toEqual([]);
  });

  it('should warn when the API server does not report the new release in time', async () => {
    configRunner.onPlaybook = null;

    const report = await orchestrator.upgrade(context, {
      targetVersion: '1.31',
      skipEtcdBackup: true,
    });

    expect(report.outcome).toBe(K8sUpgradeOutcome.UPGRADED);
    expect(report.warnings).toEqual(['Timed out after 600s waiting for API server to report v1.31']);
    expect(configRunner.runsOf(CONTROL_PLANE_UPGRADE_PLAYBOOK)[0]?.extraVars).toEqual({
      skip_etcd_backup: true,
      target_k8s_version: '1.31',
    });
    expect(report.context).toBe(context);
    expect(repository.saved).toEqual([]);
  });
});
