/**
 * Infrastructure provisioner adapter (OpenTofu).
 *
 * Queries and applies run against an explicit workspace through
 * TF_WORKSPACE, so reading another workspace never switches the persisted
 * selection. Only selectWorkspace changes it.
 */

import { z } from 'zod';
import { FatalError } from '../types/errors.js';
import { NodeRole } from '../types/node.js';
import type { ClusterNode, ClusterSummary } from '../types/cluster.js';
import { parseNodeName } from '../nodes/node-names.js';
import { createLogger } from '../utils/logger.js';
import { BaseAdapter, type AdapterDeps } from './base-adapter.js';
import {
  CommandOutcome,
  classifyResult,
  failureDetails,
  type CommandResult,
  type FailurePatterns,
} from './command-runner.js';
import type {
  ApplyOutcome,
  InfraAdapter,
  InfraDelta,
  InfraSelector,
  InfraSnapshot,
} from './types.js';

const log = createLogger('infra-adapter');

export const CLUSTER_SUMMARY_OUTPUT = 'cluster_summary';

const NOT_DEPLOYED_PATTERNS = [
  /No outputs found/i,
  /Output "[^"]+" not found/i,
  /output variable requested could not be found/i,
  /workspace "[^"]+" does not exist/i,
];

const MISSING_WORKSPACE_PATTERNS = [/doesn't exist/i, /does not exist/i];

const TRANSIENT_PATTERNS = [
  /Error acquiring the state lock/i,
  /connection (refused|reset)/i,
  /TLS handshake timeout/i,
  /i\/o timeout/i,
  /503 Service Unavailable/i,
];

const summaryEntrySchema = z
  .object({
    IP: z.string(),
    hostname: z.string(),
    VM_ID: z.union([z.string(), z.number()]),
  })
  .passthrough();

const clusterSummarySchema = z.record(summaryEntrySchema);

const wrappedOutputSchema = z.object({ value: z.unknown(), type: z.unknown() });

export interface InfraAdapterOptions {
  binary: string;
  workingDir: string;
  /** Timeout for plan/apply/destroy, in milliseconds */
  applyTimeoutMs: number;
  /** Timeout for reads and workspace commands, in milliseconds */
  commandTimeoutMs: number;
}

function nodeRoleFor(name: string): NodeRole {
  const parsed = parseNodeName(name);
  if (parsed) {
    return parsed.role;
  }
  return name.includes('controlplane') ? NodeRole.CONTROL_PLANE : NodeRole.WORKER;
}

function compareNodes(a: ClusterNode, b: ClusterNode): number {
  if (a.role !== b.role) {
    return a.role === NodeRole.CONTROL_PLANE ? -1 : 1;
  }
  const indexA = parseNodeName(a.name)?.index ?? Number.MAX_SAFE_INTEGER;
  const indexB = parseNodeName(b.name)?.index ?? Number.MAX_SAFE_INTEGER;
  return indexA - indexB || a.name.localeCompare(b.name);
}

/**
 * Convert the provisioner's cluster_summary output into a ClusterSummary.
 * Accepts both the bare value and the `{ value, type }` wrapper.
 */
export function parseClusterSummary(raw: unknown): ClusterSummary {
  if (raw === null || raw === undefined) {
    return [];
  }
  const wrapped = wrappedOutputSchema.safeParse(raw);
  const value = wrapped.success && wrapped.data.value !== undefined ? wrapped.data.value : raw;

  const parsed = clusterSummarySchema.safeParse(value);
  if (!parsed.success) {
    throw new FatalError(
      `Unexpected ${CLUSTER_SUMMARY_OUTPUT} output: ${parsed.error.errors[0]?.message ?? 'invalid shape'}`,
      `tofu output -json ${CLUSTER_SUMMARY_OUTPUT}`
    );
  }

  return Object.entries(parsed.data)
    .map(([name, entry]) => ({
      name,
      role: nodeRoleFor(name),
      address: entry.IP,
      hostname: entry.hostname,
      infraId: String(entry.VM_ID),
    }))
    .sort(compareNodes);
}

export class TofuInfraAdapter
  extends BaseAdapter<InfraSelector, InfraSnapshot, InfraDelta, ApplyOutcome>
  implements InfraAdapter
{
  readonly system = 'infra';

  constructor(
    deps: AdapterDeps,
    private readonly options: InfraAdapterOptions
  ) {
    super(deps);
  }

  async query(selector: InfraSelector): Promise<InfraSnapshot> {
    const raw = await this.readOutput(selector.workspace, CLUSTER_SUMMARY_OUTPUT);
    return { workspace: selector.workspace, nodes: parseClusterSummary(raw) };
  }

  async readOutput(workspace: string, key: string): Promise<unknown> {
    return this.retry.run(async () => {
      const result = await this.tofu(['output', '-json', key], {
        workspace,
        timeoutMs: this.options.commandTimeoutMs,
      });
      if (result.exitCode !== 0 && NOT_DEPLOYED_PATTERNS.some(p => p.test(result.stderr))) {
        log.debug({ workspace, key }, 'Output not available yet');
        return null;
      }
      classifyResult(result, { transient: TRANSIENT_PATTERNS });
      const text = result.stdout.trim();
      if (text.length === 0 || text === 'null') {
        return null;
      }
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        throw new FatalError(`tofu output ${key} is not valid JSON`, undefined, failureDetails(result));
      }
    }, `tofu output ${key}`);
  }

  async apply(delta: InfraDelta): Promise<ApplyOutcome> {
    const args: string[] = [delta.action, '-auto-approve', '-input=false'];
    if (delta.varFile) {
      args.push(`-var-file=${delta.varFile}`);
    }
    for (const [key, value] of Object.entries(delta.variables ?? {})) {
      args.push('-var', `${key}=${value}`);
    }

    log.info({ workspace: delta.workspace, action: delta.action }, 'Applying infrastructure');

    const result = await this.retry.run(async () => {
      const run = await this.tofu(args, {
        workspace: delta.workspace,
        timeoutMs: this.options.applyTimeoutMs,
      });
      classifyResult(
        run,
        { transient: TRANSIENT_PATTERNS },
        `cd ${this.options.workingDir} && TF_WORKSPACE=${delta.workspace} tofu ${delta.action} -auto-approve`
      );
      return run;
    }, `tofu ${delta.action}`);

    const unchanged =
      /No changes\./.test(result.stdout) ||
      /Resources: 0 added, 0 changed, 0 destroyed/.test(result.stdout);
    return { changed: !unchanged, output: result.stdout };
  }

  async selectWorkspace(name: string): Promise<void> {
    const selected = await this.tofu(['workspace', 'select', name], {
      timeoutMs: this.options.commandTimeoutMs,
    });
    if (selected.exitCode === 0) {
      return;
    }
    if (!MISSING_WORKSPACE_PATTERNS.some(pattern => pattern.test(selected.stderr))) {
      classifyResult(selected, { transient: TRANSIENT_PATTERNS });
    }

    log.info({ workspace: name }, 'Workspace not found, creating it');
    const created = await this.tofu(['workspace', 'new', name], {
      timeoutMs: this.options.commandTimeoutMs,
    });
    classifyResult(created, { alreadyDesired: [/already exists/i], transient: TRANSIENT_PATTERNS });
  }

  async listWorkspaces(): Promise<string[]> {
    const result = await this.tofu(['workspace', 'list'], {
      timeoutMs: this.options.commandTimeoutMs,
    });
    classifyResult(result, { transient: TRANSIENT_PATTERNS });
    return result.stdout
      .split('\n')
      .map(line => line.replace('*', '').trim())
      .filter(line => line.length > 0);
  }

  async deleteWorkspace(name: string): Promise<void> {
    const result = await this.tofu(['workspace', 'delete', name], {
      timeoutMs: this.options.commandTimeoutMs,
    });
    const patterns: FailurePatterns = {
      alreadyDesired: MISSING_WORKSPACE_PATTERNS,
      transient: TRANSIENT_PATTERNS,
    };
    const outcome = classifyResult(result, patterns, `tofu workspace delete ${name}`);
    if (outcome === CommandOutcome.ALREADY_DESIRED) {
      log.info({ workspace: name }, 'Workspace already deleted');
    }
  }

  private tofu(
    args: string[],
    options: { workspace?: string; timeoutMs: number }
  ): Promise<CommandResult> {
    const env: Record<string, string> = { TF_IN_AUTOMATION: '1' };
    if (options.workspace) {
      env['TF_WORKSPACE'] = options.workspace;
    }
    return this.exec(this.options.binary, args, {
      cwd: this.options.workingDir,
      env,
      timeoutMs: options.timeoutMs,
    });
  }
}
