/**
 * Configuration runner adapter (Ansible).
 *
 * The inventory always comes from the provisioner's ClusterSummary and is
 * written to the cache directory before each call.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { BaseAdapter, type AdapterDeps } from './base-adapter.js';
import { classifyResult } from './command-runner.js';
import { writeInventory, type Inventory } from './inventory.js';
import type {
  ApplyOutcome,
  ConfigRunnerAdapter,
  ExtraVarValue,
  HostFactSelector,
  HostFacts,
  PlaybookRun,
} from './types.js';

const log = createLogger('config-runner');

const TRANSIENT_PATTERNS = [
  /UNREACHABLE!/,
  /Failed to connect to the host via ssh/i,
  /Connection timed out/i,
  /Could not get lock/i,
];

const HOST_LINE_PATTERN = /^(\S+)\s+\|\s+(SUCCESS|CHANGED|FAILED!|UNREACHABLE!)(.*)$/;

const statResultSchema = z.object({
  stat: z.object({ exists: z.boolean() }).passthrough(),
});

export interface ConfigRunnerOptions {
  ansibleBinary: string;
  playbookBinary: string;
  /** Directory holding ansible.cfg and playbooks/ */
  workingDir: string;
  inventoryPath: (workspace: string) => string;
  playbookTimeoutMs: number;
  commandTimeoutMs: number;
}

interface HostLine {
  host: string;
  status: string;
  payload: unknown;
}

/**
 * Parse one-line (`-o`) ad-hoc output into per-host records.
 */
export function parseOneLineOutput(output: string): HostLine[] {
  const lines: HostLine[] = [];
  for (const line of output.split('\n')) {
    const match = HOST_LINE_PATTERN.exec(line.trim());
    if (!match) {
      continue;
    }
    const [, host, status, rest] = match;
    const arrow = rest.indexOf('=>');
    let payload: unknown = null;
    if (arrow >= 0) {
      try {
        payload = JSON.parse(rest.slice(arrow + 2).trim());
      } catch {
        payload = null;
      }
    }
    lines.push({ host, status, payload });
  }
  return lines;
}

/**
 * Sum of changed tasks across the PLAY RECAP.
 */
export function countChangedTasks(output: string): number {
  let changed = 0;
  for (const match of output.matchAll(/\bchanged=(\d+)/g)) {
    changed += Number.parseInt(match[1] ?? '0', 10);
  }
  return changed;
}

export class AnsibleConfigRunner
  extends BaseAdapter<HostFactSelector, HostFacts, PlaybookRun, ApplyOutcome>
  implements ConfigRunnerAdapter
{
  readonly system = 'config-runner';

  constructor(
    deps: AdapterDeps,
    private readonly options: ConfigRunnerOptions
  ) {
    super(deps);
  }

  async query(selector: HostFactSelector): Promise<HostFacts> {
    const inventoryPath = await this.prepareInventory(selector.inventory);
    const args = [selector.hosts, '-i', inventoryPath, '-o'];
    if (selector.kind === 'reachable') {
      args.push('-m', 'ansible.builtin.ping');
    } else {
      args.push('-b', '-m', 'ansible.builtin.stat', '-a', `path=${selector.path}`);
    }

    const result = await this.exec(this.options.ansibleBinary, args, {
      cwd: this.options.workingDir,
      env: { ANSIBLE_HOST_KEY_CHECKING: 'False' },
      timeoutMs: this.options.commandTimeoutMs,
    });

    const lines = parseOneLineOutput(result.stdout);
    if (lines.length === 0) {
      if (result.stdout.includes('No hosts matched') || result.stderr.includes('No hosts matched')) {
        return {};
      }
      classifyResult(result, { transient: TRANSIENT_PATTERNS });
    }

    const facts: HostFacts = {};
    for (const line of lines) {
      const ok = line.status === 'SUCCESS' || line.status === 'CHANGED';
      if (selector.kind === 'reachable') {
        facts[line.host] = ok;
        continue;
      }
      const stat = statResultSchema.safeParse(line.payload);
      if (ok && stat.success) {
        facts[line.host] = stat.data.stat.exists;
      } else {
        log.warn({ host: line.host, status: line.status, path: selector.path }, 'File check failed on host');
      }
    }
    return facts;
  }

  async apply(run: PlaybookRun): Promise<ApplyOutcome> {
    const inventoryPath = await this.prepareInventory(run.inventory);
    const extraVars: Record<string, ExtraVarValue> = {
      current_cluster_context: run.inventory.workspace,
      ...run.extraVars,
    };

    const args = [
      '-i',
      inventoryPath,
      join('playbooks', run.playbook),
      '-e',
      JSON.stringify(extraVars),
    ];
    if (run.limit) {
      args.push('--limit', run.limit);
    }

    log.info({ playbook: run.playbook, limit: run.limit }, 'Running playbook');

    const result = await this.retry.run(async () => {
      const outcome = await this.exec(this.options.playbookBinary, args, {
        cwd: this.options.workingDir,
        env: { ANSIBLE_HOST_KEY_CHECKING: 'False' },
        timeoutMs: this.options.playbookTimeoutMs,
      });
      classifyResult(
        outcome,
        { transient: TRANSIENT_PATTERNS },
        this.manualCommand(run)
      );
      return outcome;
    }, `playbook ${run.playbook}`);

    return { changed: countChangedTasks(result.stdout) > 0, output: result.stdout };
  }

  private manualCommand(run: PlaybookRun): string {
    const limit = run.limit ? ` --limit ${run.limit}` : '';
    return `cd ${this.options.workingDir} && ansible-playbook -i ${this.options.inventoryPath(run.inventory.workspace)} playbooks/${run.playbook}${limit}`;
  }

  private async prepareInventory(inventory: Inventory): Promise<string> {
    const path = this.options.inventoryPath(inventory.workspace);
    await writeInventory(inventory, path);
    return path;
  }
}

