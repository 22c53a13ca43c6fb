/**
 * Cluster control-plane adapter (kubectl).
 */

import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FatalError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';
import { BaseAdapter, type AdapterDeps } from './base-adapter.js';
import {
  CommandOutcome,
  classifyResult,
  failureDetails,
  type CommandResult,
  type FailurePatterns,
} from './command-runner.js';
import {
  kubeListSchema,
  kubeObjectSchema,
  parseServerVersion,
  type KubeObject,
  type KubeVersion,
} from './kube-resources.js';
import type {
  ApplyOutcome,
  ControlPlaneAdapter,
  ControlPlaneDelta,
  ResourceSelector,
} from './types.js';

const log = createLogger('control-plane-adapter');

const TRANSIENT_PATTERNS = [
  /connection refused/i,
  /Unable to connect to the server/i,
  /i\/o timeout/i,
  /TLS handshake timeout/i,
  /etcdserver: request timed out/i,
  /the server is currently unable to handle the request/i,
  /ServiceUnavailable/,
  /no matches for kind/i,
  /ensure CRDs are installed first/i,
];

const ABSENT_PATTERNS = [
  /\(NotFound\)/,
  /the server doesn't have a resource type/i,
];

export interface ControlPlaneOptions {
  binary: string;
  kubeconfigPath: string;
  timeoutMs: number;
}

/**
 * kubectl arguments for a delta.
 */
export function deltaArgs(delta: ControlPlaneDelta): string[] {
  switch (delta.kind) {
    case 'manifest': {
      const args = ['apply'];
      if (delta.namespace) {
        args.push('-n', delta.namespace);
      }
      if (delta.strategy === 'server-side') {
        args.push('--server-side=true', '--force-conflicts');
      }
      args.push('-f', delta.source);
      return args;
    }
    case 'create-namespace':
      return ['create', 'namespace', delta.name];
    case 'approve-csr':
      return ['certificate', 'approve', ...delta.names];
    case 'remove-annotation':
      return ['annotate', delta.resource, delta.name, `${delta.annotation}-`];
    case 'set-image':
      return [
        'set',
        'image',
        '-n',
        delta.namespace,
        delta.workload,
        `${delta.container}=${delta.image}`,
      ];
    case 'create-deployment':
      return [
        'create',
        'deployment',
        delta.name,
        `--image=${delta.image}`,
        `--replicas=${delta.replicas}`,
        '-n',
        delta.namespace,
      ];
    case 'delete': {
      const args = ['delete', delta.resource, delta.name, '--ignore-not-found=true'];
      if (delta.namespace) {
        args.push('-n', delta.namespace);
      }
      return args;
    }
    case 'drain': {
      const args = ['drain', delta.node, '--ignore-daemonsets'];
      if (delta.deleteEmptyDirData) {
        args.push('--delete-emptydir-data');
      }
      if (delta.force) {
        args.push('--force');
      }
      args.push(`--timeout=${delta.timeoutSeconds}s`);
      return args;
    }
    case 'uncordon':
      return ['uncordon', delta.node];
  }
}

function deltaPatterns(delta: ControlPlaneDelta): FailurePatterns {
  switch (delta.kind) {
    case 'create-namespace':
    case 'create-deployment':
      return { alreadyDesired: [/AlreadyExists/, /already exists/i], transient: TRANSIENT_PATTERNS };
    case 'remove-annotation':
    case 'drain':
    case 'uncordon':
      return { alreadyDesired: [/not found/i], transient: TRANSIENT_PATTERNS };
    default:
      return { transient: TRANSIENT_PATTERNS };
  }
}

/**
 * Whether kubectl reported a change. "unchanged" lines and empty output
 * mean nothing was modified.
 */
export function reportsChange(output: string): boolean {
  const lines = output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
  return lines.some(line => !/\bunchanged$/.test(line));
}

export class KubectlControlPlane
  extends BaseAdapter<ResourceSelector, KubeObject[], ControlPlaneDelta, ApplyOutcome>
  implements ControlPlaneAdapter
{
  readonly system = 'control-plane';

  constructor(
    deps: AdapterDeps,
    private readonly options: ControlPlaneOptions
  ) {
    super(deps);
  }

  async query(selector: ResourceSelector): Promise<KubeObject[]> {
    const args = ['get', selector.resource];
    if (selector.name) {
      args.push(selector.name);
    }
    if (selector.allNamespaces) {
      args.push('--all-namespaces');
    } else if (selector.namespace) {
      args.push('-n', selector.namespace);
    }
    if (selector.labelSelector) {
      args.push('-l', selector.labelSelector);
    }
    if (selector.fieldSelector) {
      args.push('--field-selector', selector.fieldSelector);
    }
    args.push('-o', 'json');

    return this.retry.run(async () => {
      const result = await this.kubectl(args);
      if (result.exitCode !== 0 && ABSENT_PATTERNS.some(p => p.test(result.stderr))) {
        return [];
      }
      classifyResult(result, { transient: TRANSIENT_PATTERNS }, 'cpc get-credentials');
      return this.parseObjects(result);
    }, `kubectl get ${selector.resource}`);
  }

  async apply(delta: ControlPlaneDelta): Promise<ApplyOutcome> {
    if (delta.kind === 'approve-csr' && delta.names.length === 0) {
      return { changed: false, output: '' };
    }
    const args = deltaArgs(delta);

    return this.retry.run(async () => {
      const result = await this.kubectl(args);
      const outcome = classifyResult(result, deltaPatterns(delta), `kubectl ${args.join(' ')}`);
      if (outcome === CommandOutcome.ALREADY_DESIRED) {
        return { changed: false, output: result.stderr };
      }
      return { changed: reportsChange(result.stdout), output: result.stdout };
    }, `kubectl ${delta.kind}`);
  }

  async serverVersion(): Promise<KubeVersion | null> {
    const result = await this.kubectl(['version', '-o', 'json']);
    try {
      const parsed: unknown = JSON.parse(result.stdout);
      return parseServerVersion(parsed);
    } catch {
      log.warn({ exitCode: result.exitCode, stderr: result.stderr }, 'Could not read server version');
      return null;
    }
  }

  async readCredentials(): Promise<string | null> {
    try {
      return await readFile(this.options.kubeconfigPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async writeCredentials(content: string): Promise<void> {
    await mkdir(dirname(this.options.kubeconfigPath), { recursive: true });
    await writeFile(this.options.kubeconfigPath, content, { encoding: 'utf-8', mode: 0o600 });
  }

  async backupCredentials(): Promise<string | null> {
    const backupPath = `${this.options.kubeconfigPath}.backup.${this.clock.now()}`;
    try {
      await copyFile(this.options.kubeconfigPath, backupPath);
      return backupPath;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private parseObjects(result: CommandResult): KubeObject[] {
    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch {
      throw new FatalError('kubectl returned invalid JSON', undefined, failureDetails(result));
    }
    const list = kubeListSchema.safeParse(raw);
    if (list.success) {
      return list.data.items;
    }
    const single = kubeObjectSchema.safeParse(raw);
    if (single.success) {
      return [single.data];
    }
    throw new FatalError('kubectl returned an unexpected object shape', undefined, failureDetails(result));
  }

  private kubectl(args: string[]): Promise<CommandResult> {
    return this.exec(this.options.binary, ['--kubeconfig', this.options.kubeconfigPath, ...args], {
      timeoutMs: this.options.timeoutMs,
    });
  }
}
