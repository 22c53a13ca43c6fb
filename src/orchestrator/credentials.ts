/**
 * Cluster credentials: fetch the control plane's admin kubeconfig, point it
 * at the control plane's address, name it after the workspace and merge it
 * into the local kubeconfig.
 */

import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { SshClient } from '../adapters/ssh-client.js';
import type { ControlPlaneAdapter, InfraAdapter } from '../adapters/types.js';
import { controlPlaneNodes, type ClusterSummary } from '../types/cluster.js';
import { FatalError, ValidationError, toError } from '../types/errors.js';
import type { WorkspaceContext } from '../types/workspace.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('credentials');

/** Present on a control plane once kubeadm init has completed */
export const ADMIN_KUBECONFIG_PATH = '/etc/kubernetes/admin.conf';

export const API_SERVER_PORT = 6443;

const namedClusterSchema = z
  .object({
    name: z.string(),
    cluster: z.object({ server: z.string() }).passthrough(),
  })
  .passthrough();

const namedUserSchema = z
  .object({
    name: z.string(),
    user: z.record(z.unknown()).default({}),
  })
  .passthrough();

const namedContextSchema = z
  .object({
    name: z.string(),
    context: z
      .object({
        cluster: z.string(),
        user: z.string(),
        namespace: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

// kubectl writes `clusters: null` for an emptied config
const listOf = <S extends z.ZodTypeAny>(schema: S) =>
  z
    .array(schema)
    .nullish()
    .transform(items => items ?? []);

export const kubeconfigSchema = z
  .object({
    apiVersion: z.string().default('v1'),
    kind: z.string().default('Config'),
    clusters: listOf(namedClusterSchema),
    users: listOf(namedUserSchema),
    contexts: listOf(namedContextSchema),
    'current-context': z.string().optional(),
  })
  .passthrough();

export type Kubeconfig = z.infer<typeof kubeconfigSchema>;

export function parseKubeconfig(text: string, source: string): Kubeconfig {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new FatalError(`${source} is not valid YAML: ${toError(error).message}`);
  }
  const result = kubeconfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new FatalError(
      `${source} is not a valid kubeconfig: ${result.error.issues.map(issue => issue.message).join('; ')}`
    );
  }
  return result.data;
}

/**
 * Reduce an admin kubeconfig to one cluster, user and context, all named
 * after the workspace, with the server pointing at `address`.
 */
export function rewriteAdminKubeconfig(
  config: Kubeconfig,
  workspace: string,
  address: string
): Kubeconfig {
  const context =
    config.contexts.find(entry => entry.name === config['current-context']) ?? config.contexts[0];
  const cluster =
    config.clusters.find(entry => entry.name === context?.context.cluster) ?? config.clusters[0];
  const user = config.users.find(entry => entry.name === context?.context.user) ?? config.users[0];
  if (!cluster || !user) {
    throw new FatalError('Admin kubeconfig has no cluster or user entry');
  }

  return {
    ...config,
    clusters: [
      {
        ...cluster,
        name: workspace,
        cluster: { ...cluster.cluster, server: `https://${address}:${API_SERVER_PORT}` },
      },
    ],
    users: [{ ...user, name: workspace }],
    contexts: [{ name: workspace, context: { cluster: workspace, user: workspace } }],
    'current-context': workspace,
  };
}

/**
 * Replace same-named entries of `local` with those of `incoming` and select
 * the incoming context.
 */
export function mergeKubeconfig(local: Kubeconfig | null, incoming: Kubeconfig): Kubeconfig {
  if (!local) {
    return incoming;
  }
  const replace = <T extends { name: string }>(existing: T[], added: T[]): T[] => {
    const names = new Set(added.map(entry => entry.name));
    return [...existing.filter(entry => !names.has(entry.name)), ...added];
  };
  return {
    ...local,
    clusters: replace(local.clusters, incoming.clusters),
    users: replace(local.users, incoming.users),
    contexts: replace(local.contexts, incoming.contexts),
    'current-context': incoming['current-context'],
  };
}

export interface CredentialsResult {
  workspace: string;
  server: string;
  /** Copy of the previous local kubeconfig, if there was one */
  backupPath: string | null;
}

export interface CredentialsDeps {
  infra: InfraAdapter;
  ssh: SshClient;
  controlPlane: ControlPlaneAdapter;
}

export class CredentialsManager {
  constructor(private readonly deps: CredentialsDeps) {}

  /**
   * Fetch and merge the workspace's admin credentials. Uses `summary`
   * when given, otherwise queries the provisioner.
   */
  async fetch(context: WorkspaceContext, summary?: ClusterSummary): Promise<CredentialsResult> {
    const nodes = summary ?? (await this.deps.infra.query({ workspace: context.name })).nodes;
    const [controlPlane] = controlPlaneNodes(nodes);
    if (!controlPlane) {
      throw new ValidationError(
        `No control plane VM found in workspace ${context.name}`,
        'workspace',
        `cd terraform && TF_WORKSPACE=${context.name} tofu apply`
      );
    }

    let adminText: string;
    try {
      adminText = await this.deps.ssh.readFile(controlPlane.address, ADMIN_KUBECONFIG_PATH);
    } catch (error) {
      throw new FatalError(
        `Could not read ${ADMIN_KUBECONFIG_PATH} on ${controlPlane.address}: ${toError(error).message}`,
        'cpc bootstrap'
      );
    }

    const incoming = rewriteAdminKubeconfig(
      parseKubeconfig(adminText, `${controlPlane.address}:${ADMIN_KUBECONFIG_PATH}`),
      context.name,
      controlPlane.address
    );

    const localText = await this.deps.controlPlane.readCredentials();
    const local = localText === null ? null : parseKubeconfig(localText, 'local kubeconfig');
    const backupPath = localText === null ? null : await this.deps.controlPlane.backupCredentials();

    await this.deps.controlPlane.writeCredentials(stringify(mergeKubeconfig(local, incoming)));

    const server = `https://${controlPlane.address}:${API_SERVER_PORT}`;
    log.info({ workspace: context.name, server, backupPath }, 'Credentials merged');
    return { workspace: context.name, server, backupPath };
  }
}
