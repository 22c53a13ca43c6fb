/**
 * Adapter contracts for the three systems of record.
 *
 * Every adapter has the same three operation shapes:
 *   query(selector)      read-only snapshot; "not deployed yet" is an empty snapshot
 *   apply(delta)         idempotent mutation
 *   waitUntil(...)       bounded polling over query
 */

import type { ClusterSummary } from '../types/cluster.js';
import type { Inventory } from './inventory.js';
import type { KubeObject, KubeVersion } from './kube-resources.js';
import type { WaitOptions } from './wait.js';

export interface SystemAdapter<TSelector, TSnapshot, TDelta, TOutcome> {
  readonly system: string;
  query(selector: TSelector): Promise<TSnapshot>;
  apply(delta: TDelta): Promise<TOutcome>;
  waitUntil(
    selector: TSelector,
    condition: (snapshot: TSnapshot) => boolean,
    options: WaitOptions
  ): Promise<TSnapshot>;
}

export interface ApplyOutcome {
  /** False when the target was already in the requested state */
  changed: boolean;
  output: string;
}

// Infrastructure provisioner

export interface InfraSelector {
  workspace: string;
}

export interface InfraSnapshot {
  workspace: string;
  nodes: ClusterSummary;
}

export interface InfraDelta {
  workspace: string;
  action: 'apply' | 'destroy';
  /** Override variables passed as -var key=value */
  variables?: Record<string, string>;
  /** Declarative delta file passed as -var-file */
  varFile?: string;
}

export interface InfraAdapter
  extends SystemAdapter<InfraSelector, InfraSnapshot, InfraDelta, ApplyOutcome> {
  /** JSON value of one provisioner output, or null when it does not exist yet */
  readOutput(workspace: string, key: string): Promise<unknown>;
  /** Switch the persistent state partition; creates it when missing */
  selectWorkspace(name: string): Promise<void>;
  listWorkspaces(): Promise<string[]>;
  deleteWorkspace(name: string): Promise<void>;
}

// Configuration runner

export type HostFactSelector =
  | { kind: 'reachable'; inventory: Inventory; hosts: string }
  | { kind: 'file-exists'; inventory: Inventory; hosts: string; path: string };

/**
 * Per-host answer keyed by host address. Hosts that could not be reached
 * for a file check are absent.
 */
export type HostFacts = Record<string, boolean>;

export type ExtraVarValue = string | number | boolean;

export interface PlaybookRun {
  playbook: string;
  inventory: Inventory;
  /** Host pattern passed as --limit */
  limit?: string;
  extraVars?: Record<string, ExtraVarValue>;
}

export type ConfigRunnerAdapter = SystemAdapter<
  HostFactSelector,
  HostFacts,
  PlaybookRun,
  ApplyOutcome
>;

// Cluster control plane

export interface ResourceSelector {
  /** Resource type as kubectl names it, e.g. "pods", "csr", "crd" */
  resource: string;
  name?: string;
  namespace?: string;
  allNamespaces?: boolean;
  labelSelector?: string;
  fieldSelector?: string;
}

export type ApplyStrategy = 'server-side' | 'client-side';

export type ControlPlaneDelta =
  | { kind: 'manifest'; source: string; strategy: ApplyStrategy; namespace?: string }
  | { kind: 'create-namespace'; name: string }
  | { kind: 'approve-csr'; names: string[] }
  | { kind: 'remove-annotation'; resource: string; name: string; annotation: string }
  | {
      kind: 'set-image';
      namespace: string;
      workload: string;
      container: string;
      image: string;
    }
  | {
      kind: 'create-deployment';
      namespace: string;
      name: string;
      image: string;
      replicas: number;
    }
  | { kind: 'delete'; resource: string; name: string; namespace?: string }
  | {
      kind: 'drain';
      node: string;
      timeoutSeconds: number;
      /** Evict pods that no controller manages */
      force: boolean;
      deleteEmptyDirData: boolean;
    }
  | { kind: 'uncordon'; node: string };

export interface ControlPlaneAdapter
  extends SystemAdapter<ResourceSelector, KubeObject[], ControlPlaneDelta, ApplyOutcome> {
  /** Server version, or null when the API is unreachable */
  serverVersion(): Promise<KubeVersion | null>;
  /** Local credentials file contents, or null when absent */
  readCredentials(): Promise<string | null>;
  writeCredentials(content: string): Promise<void>;
  /** Copy the credentials file aside; returns the copy's path, or null when absent */
  backupCredentials(): Promise<string | null>;
}
