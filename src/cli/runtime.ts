/**
 * Wiring for one CLI invocation: adapters built from configuration, the
 * checkpoint log for this run, and the active workspace resolved once.
 */

import { nanoid } from 'nanoid';
import {
  getInventoryPath,
  getRecoveryLogPath,
  resolvePaths,
  type CpcPaths,
} from '../artifacts/paths.js';
import { ExecaCommandRunner, type CommandRunner } from '../adapters/command-runner.js';
import { AnsibleConfigRunner } from '../adapters/config-runner-adapter.js';
import { KubectlControlPlane } from '../adapters/control-plane-adapter.js';
import { TofuInfraAdapter } from '../adapters/infra-adapter.js';
import { OpenSshClient, type SshClient } from '../adapters/ssh-client.js';
import type {
  ConfigRunnerAdapter,
  ControlPlaneAdapter,
  InfraAdapter,
} from '../adapters/types.js';
import { getConfig, type CpcConfig } from '../config/index.js';
import { ContextStore, playbookVersionVars } from '../context/context-store.js';
import { NodeLifecycleManager } from '../nodes/node-lifecycle.js';
import { NodeMaintenance } from '../nodes/node-maintenance.js';
import { AddonUpgradeOrchestrator } from '../orchestrator/addon-upgrade.js';
import { BootstrapOrchestrator } from '../orchestrator/bootstrap.js';
import { CredentialsManager } from '../orchestrator/credentials.js';
import { K8sUpgradeOrchestrator } from '../orchestrator/k8s-upgrade.js';
import { StatusAggregator } from '../orchestrator/status.js';
import { RecoveryLog } from '../recovery/recovery-log.js';
import {
  RetryPolicyEngine,
  retryPolicyFromConfig,
  type RetryPolicy,
} from '../recovery/retry-policy.js';
import type { WorkspaceContext } from '../types/workspace.js';
import { systemClock, type Clock } from '../utils/clock.js';

const SSH_CONNECT_TIMEOUT_SECONDS = 10;
const HEARTBEAT_INTERVAL_MS = 60_000;

export interface CpcRuntime {
  config: CpcConfig;
  paths: CpcPaths;
  clock: Clock;
  retryPolicy: RetryPolicy;
  infra: InfraAdapter;
  configRunner: ConfigRunnerAdapter;
  controlPlane: ControlPlaneAdapter;
  ssh: SshClient;
  store: ContextStore;
  recovery: RecoveryLog;
  /** The active workspace, read from disk on first use */
  activeContext(): Promise<WorkspaceContext>;
}

export type RuntimeProvider = () => CpcRuntime;

export interface RuntimeOverrides {
  runner?: CommandRunner;
  clock?: Clock;
}

export function createRuntime(
  config: CpcConfig = getConfig(),
  overrides: RuntimeOverrides = {}
): CpcRuntime {
  const clock = overrides.clock ?? systemClock;
  const runner = overrides.runner ?? new ExecaCommandRunner();
  const paths = resolvePaths(config);
  const retryPolicy = retryPolicyFromConfig(config.retry);
  const deps = { runner, retry: new RetryPolicyEngine(retryPolicy, clock), clock };
  const { binaries, timeouts } = config;

  const infra = new TofuInfraAdapter(deps, {
    binary: binaries.tofu,
    workingDir: paths.terraformDir,
    applyTimeoutMs: timeouts.infra * 1000,
    commandTimeoutMs: timeouts.command * 1000,
  });
  const configRunner = new AnsibleConfigRunner(deps, {
    ansibleBinary: binaries.ansible,
    playbookBinary: binaries.ansiblePlaybook,
    workingDir: paths.ansibleDir,
    inventoryPath: workspace => getInventoryPath(paths, workspace),
    playbookTimeoutMs: timeouts.playbook * 1000,
    commandTimeoutMs: timeouts.command * 1000,
  });
  const controlPlane = new KubectlControlPlane(deps, {
    binary: binaries.kubectl,
    kubeconfigPath: paths.kubeconfigPath,
    timeoutMs: timeouts.kubectl * 1000,
  });
  const ssh = new OpenSshClient(runner, {
    binary: binaries.ssh,
    user: config.sshUser,
    connectTimeoutSeconds: SSH_CONNECT_TIMEOUT_SECONDS,
    timeoutMs: timeouts.command * 1000,
  });

  const runId = nanoid(10);
  const recovery = new RecoveryLog({ runId, logPath: getRecoveryLogPath(paths, runId), clock });
  const store = new ContextStore(paths, infra);

  let active: Promise<WorkspaceContext> | null = null;

  return {
    config,
    paths,
    clock,
    retryPolicy,
    infra,
    configRunner,
    controlPlane,
    ssh,
    store,
    recovery,
    activeContext: () => {
      active ??= store.getActiveContext();
      return active;
    },
  };
}

export function createNodeLifecycle(runtime: CpcRuntime): NodeLifecycleManager {
  const { timeouts } = runtime.config;
  return new NodeLifecycleManager(
    {
      repository: runtime.store,
      infra: runtime.infra,
      configRunner: runtime.configRunner,
      controlPlane: runtime.controlPlane,
      recovery: runtime.recovery,
    },
    {
      sshUser: runtime.config.sshUser,
      joinTimeoutMs: timeouts.controlPlaneInit * 1000,
      pollIntervalMs: timeouts.pollInterval * 1000,
      drainTimeoutSeconds: timeouts.kubectl,
      playbookVars: playbookVersionVars,
    }
  );
}

export function createNodeMaintenance(runtime: CpcRuntime): NodeMaintenance {
  const { timeouts } = runtime.config;
  return new NodeMaintenance(
    {
      repository: runtime.store,
      infra: runtime.infra,
      configRunner: runtime.configRunner,
      controlPlane: runtime.controlPlane,
      recovery: runtime.recovery,
    },
    {
      sshUser: runtime.config.sshUser,
      drainTimeoutSeconds: timeouts.kubectl,
      readyTimeoutMs: timeouts.controlPlaneInit * 1000,
      pollIntervalMs: timeouts.pollInterval * 1000,
    }
  );
}

export function createK8sUpgrade(runtime: CpcRuntime): K8sUpgradeOrchestrator {
  const { timeouts } = runtime.config;
  return new K8sUpgradeOrchestrator(
    {
      repository: runtime.store,
      infra: runtime.infra,
      configRunner: runtime.configRunner,
      controlPlane: runtime.controlPlane,
      recovery: runtime.recovery,
      clock: runtime.clock,
    },
    {
      sshUser: runtime.config.sshUser,
      versionTimeoutMs: timeouts.controlPlaneInit * 1000,
      pollIntervalMs: timeouts.pollInterval * 1000,
    }
  );
}

export function createAddonUpgrade(runtime: CpcRuntime): AddonUpgradeOrchestrator {
  return new AddonUpgradeOrchestrator(
    { controlPlane: runtime.controlPlane, recovery: runtime.recovery },
    {
      readyTimeoutMs: runtime.config.timeouts.addonReady * 1000,
      pollIntervalMs: runtime.config.timeouts.pollInterval * 1000,
      annotationLimitBytes: runtime.config.crdAnnotationLimitBytes,
    }
  );
}

export function createCredentialsManager(runtime: CpcRuntime): CredentialsManager {
  return new CredentialsManager({
    infra: runtime.infra,
    ssh: runtime.ssh,
    controlPlane: runtime.controlPlane,
  });
}

export function createBootstrap(runtime: CpcRuntime): BootstrapOrchestrator {
  const { timeouts } = runtime.config;
  return new BootstrapOrchestrator(
    {
      infra: runtime.infra,
      configRunner: runtime.configRunner,
      controlPlane: runtime.controlPlane,
      nodes: createNodeLifecycle(runtime),
      addons: createAddonUpgrade(runtime),
      credentials: createCredentialsManager(runtime),
      recovery: runtime.recovery,
      clock: runtime.clock,
    },
    {
      sshUser: runtime.config.sshUser,
      csrPattern: runtime.config.csrPattern,
      csrRetryPolicy: runtime.retryPolicy,
      controlPlaneInitTimeoutMs: timeouts.controlPlaneInit * 1000,
      smokeTestTimeoutMs: timeouts.addonReady * 1000,
      pollIntervalMs: timeouts.pollInterval * 1000,
      heartbeatIntervalMs: HEARTBEAT_INTERVAL_MS,
    }
  );
}

export function createStatusAggregator(runtime: CpcRuntime): StatusAggregator {
  return new StatusAggregator(
    {
      paths: runtime.paths,
      infra: runtime.infra,
      ssh: runtime.ssh,
      controlPlane: runtime.controlPlane,
      clock: runtime.clock,
    },
    {
      sshCacheTtlMs: runtime.config.status.sshCacheTtl * 1000,
      infraCacheTtlMs: runtime.config.status.infraCacheTtl * 1000,
    }
  );
}
