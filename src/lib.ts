/**
 * cpc Library API
 *
 * Exports the orchestration engine for programmatic usage.
 */

// Types
export * from './types/errors.js';
export * from './types/node.js';
export * from './types/cluster.js';
export * from './types/workspace.js';
export * from './types/kubernetes-version.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type CpcConfig } from './config/index.js';
export { resolvePaths, type CpcPaths } from './artifacts/paths.js';

// Context Store
export { ContextStore, infraVariables, playbookVersionVars } from './context/context-store.js';
export { decodeWorkspaceFile, encodeWorkspaceFile } from './context/roster-codec.js';

// Adapters
export * from './adapters/types.js';
export { ExecaCommandRunner, type CommandRunner, type CommandResult } from './adapters/command-runner.js';
export { TofuInfraAdapter } from './adapters/infra-adapter.js';
export { AnsibleConfigRunner } from './adapters/config-runner-adapter.js';
export { KubectlControlPlane } from './adapters/control-plane-adapter.js';
export { OpenSshClient, type SshClient } from './adapters/ssh-client.js';

// Checkpoint/Recovery
export { RecoveryLog } from './recovery/recovery-log.js';
export { RetryPolicyEngine, DEFAULT_RETRY_POLICY, type RetryPolicy } from './recovery/retry-policy.js';

// Nodes
export { Roster } from './nodes/roster.js';
export { NodeLifecycleManager } from './nodes/node-lifecycle.js';
export { NodeMaintenance } from './nodes/node-maintenance.js';

// Orchestrators
export { BootstrapOrchestrator, type BootstrapReport } from './orchestrator/bootstrap.js';
export { BootstrapState } from './orchestrator/bootstrap-state-machine.js';
export { AddonUpgradeOrchestrator, AddonOutcome } from './orchestrator/addon-upgrade.js';
export { K8sUpgradeOrchestrator, K8sUpgradeOutcome } from './orchestrator/k8s-upgrade.js';
export { StatusAggregator } from './orchestrator/status.js';
export { CredentialsManager } from './orchestrator/credentials.js';
export { ADDON_CATALOG, ADDON_NAMES } from './addons/catalog.js';

// CLI
export { createProgram, runCli } from './cli/cli.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
