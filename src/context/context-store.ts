/**
 * Context Store
 *
 * Persists the active workspace name and each workspace's env file. The
 * active workspace is resolved once per invocation and then passed around
 * as a WorkspaceContext value.
 */

import { readFile, writeFile, unlink, readdir, mkdir, rename, access } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  getEnvFilePath,
  getWorkspaceCachePaths,
  type CpcPaths,
} from '../artifacts/paths.js';
import type { InfraAdapter } from '../adapters/types.js';
import { Roster } from '../nodes/roster.js';
import { NodeRole } from '../types/node.js';
import { DestructiveOperationError, ValidationError, toError } from '../types/errors.js';
import { FALLBACK_WORKSPACE, type WorkspaceContext } from '../types/workspace.js';
import { createLogger } from '../utils/logger.js';
import {
  RELEASE_LETTER_KEY,
  decodeWorkspaceFile,
  encodeWorkspaceFile,
} from './roster-codec.js';
import { assertWorkspaceName, isValidWorkspaceName } from './workspace-name.js';

const log = createLogger('context-store');

export interface DeleteContextReport {
  workspace: string;
  completedSteps: string[];
  /** Workspace that is active after the delete */
  activeWorkspace: string;
}

/**
 * Provisioner variables derived from a workspace's roster and settings.
 */
export function infraVariables(context: WorkspaceContext): Record<string, string> {
  const variables: Record<string, string> = {
    additional_workers: context.roster.names(NodeRole.WORKER).join(','),
    additional_controlplanes: context.roster.names(NodeRole.CONTROL_PLANE).join(','),
  };
  const releaseLetter = context.settings[RELEASE_LETTER_KEY];
  if (releaseLetter) {
    variables['release_letter'] = releaseLetter;
  }
  return variables;
}

/**
 * Version pins as playbook extra variables: KUBERNETES_VERSION becomes
 * kubernetes_version.
 */
export function playbookVersionVars(context: WorkspaceContext): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(context.versions)) {
    vars[key.toLowerCase()] = value;
  }
  return vars;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class ContextStore {
  constructor(
    private readonly paths: CpcPaths,
    private readonly infra: InfraAdapter
  ) {}

  /**
   * Name recorded in the context file, or the fallback.
   */
  async getActiveName(): Promise<{ name: string; isFallback: boolean }> {
    let recorded = '';
    try {
      recorded = (await readFile(this.paths.contextFile, 'utf-8')).trim();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }

    if (recorded.length === 0) {
      return { name: FALLBACK_WORKSPACE, isFallback: true };
    }
    if (!isValidWorkspaceName(recorded)) {
      log.warn({ recorded, fallback: FALLBACK_WORKSPACE }, 'Recorded workspace name is invalid, using fallback');
      return { name: FALLBACK_WORKSPACE, isFallback: true };
    }
    return { name: recorded, isFallback: false };
  }

  async getActiveContext(): Promise<WorkspaceContext> {
    const { name, isFallback } = await this.getActiveName();
    const context = await this.load(name);
    return { ...context, isFallback };
  }

  /**
   * Load a workspace's env file. A workspace without one has an empty
   * roster and no version pins.
   */
  async load(name: string): Promise<WorkspaceContext> {
    let text = '';
    try {
      text = await readFile(getEnvFilePath(this.paths, name), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
      log.debug({ workspace: name }, 'No env file for workspace');
    }

    const contents = decodeWorkspaceFile(text);
    return {
      name,
      roster: contents.roster,
      versions: contents.versions,
      settings: contents.settings,
      isFallback: false,
    };
  }

  async exists(name: string): Promise<boolean> {
    return fileExists(getEnvFilePath(this.paths, name));
  }

  async save(context: WorkspaceContext): Promise<void> {
    const path = getEnvFilePath(this.paths, context.name);
    await mkdir(dirname(path), { recursive: true });
    const text = encodeWorkspaceFile({
      roster: context.roster,
      versions: { ...context.versions },
      settings: { ...context.settings },
    });
    const tmpPath = `${path}.tmp`;
    await writeFile(tmpPath, text, 'utf-8');
    await rename(tmpPath, path);
    log.debug({ workspace: context.name, path }, 'Saved workspace');
  }

  /**
   * Record `name` as active and switch the provisioner's state partition,
   * creating it when missing.
   */
  async setActiveContext(name: string): Promise<WorkspaceContext> {
    assertWorkspaceName(name);

    await mkdir(dirname(this.paths.contextFile), { recursive: true });
    await writeFile(this.paths.contextFile, `${name}\n`, 'utf-8');
    log.info({ workspace: name }, 'Active workspace set');

    await this.infra.selectWorkspace(name);
    return this.load(name);
  }

  /**
   * Copy a workspace's configuration (versions and settings, not the
   * roster) into a new workspace.
   */
  async cloneContext(source: string, dest: string, tag?: string): Promise<WorkspaceContext> {
    if (source === dest) {
      throw new ValidationError('Source and destination workspace must differ', 'dest');
    }
    assertWorkspaceName(dest, 'dest');
    if (tag !== undefined && !/^[a-z]$/i.test(tag)) {
      throw new ValidationError(`Release letter must be a single letter, got '${tag}'`, 'tag');
    }
    if (!(await this.exists(source))) {
      throw new ValidationError(
        `Source workspace '${source}' not found`,
        'source',
        'cpc ctx --list'
      );
    }
    if (await this.exists(dest)) {
      throw new ValidationError(`Workspace '${dest}' already exists`, 'dest');
    }

    const original = await this.load(source);
    const settings: Record<string, string> = { ...original.settings };
    if (tag !== undefined) {
      settings[RELEASE_LETTER_KEY] = tag;
    }

    const clone: WorkspaceContext = {
      name: dest,
      roster: Roster.empty(),
      versions: { ...original.versions },
      settings,
      isFallback: false,
    };
    await this.save(clone);
    log.info({ source, dest, tag }, 'Workspace cloned');
    return clone;
  }

  /**
   * Destroy a workspace: its VMs, then its env file and caches, then its
   * state partition. Completed steps are never rolled back; a failure
   * reports what remains.
   */
  async deleteContext(name: string): Promise<DeleteContextReport> {
    assertWorkspaceName(name);

    const hasEnvFile = await this.exists(name);
    const workspaces = await this.infra.listWorkspaces();
    if (!hasEnvFile && !workspaces.includes(name)) {
      throw new ValidationError(`Workspace '${name}' not found`, 'workspace', 'cpc ctx --list');
    }

    const context = await this.load(name);
    const active = await this.getActiveName();
    const steps: Array<{ label: string; run: () => Promise<void> }> = [
      {
        label: `destroy all VMs of workspace ${name}`,
        run: async () => {
          await this.infra.apply({
            workspace: name,
            action: 'destroy',
            variables: infraVariables(context),
          });
        },
      },
      {
        label: `remove env file ${getEnvFilePath(this.paths, name)} and caches`,
        run: async () => {
          await removeFile(getEnvFilePath(this.paths, name));
          await this.clearCaches(name);
        },
      },
      {
        label: `delete provisioner workspace ${name}`,
        run: async () => {
          // the selected workspace cannot be deleted; keep the active one selected
          await this.infra.selectWorkspace(active.name === name ? FALLBACK_WORKSPACE : active.name);
          await this.infra.deleteWorkspace(name);
        },
      },
    ];
    if (!active.isFallback && active.name === name) {
      steps.push({
        label: `reset active workspace to ${FALLBACK_WORKSPACE}`,
        run: async () => {
          await removeFile(this.paths.contextFile);
        },
      });
    }

    const completedSteps: string[] = [];
    for (const [index, step] of steps.entries()) {
      try {
        await step.run();
        completedSteps.push(step.label);
        log.info({ workspace: name, step: step.label }, 'Delete step completed');
      } catch (error) {
        const remainingSteps = steps.slice(index).map(remaining => remaining.label);
        log.error(
          { workspace: name, step: step.label, error: toError(error).message },
          'Workspace delete stopped'
        );
        throw new DestructiveOperationError(
          `Deleting workspace '${name}' failed at: ${step.label} (${toError(error).message})`,
          completedSteps,
          remainingSteps,
          index === 0 ? `cd terraform && TF_WORKSPACE=${name} tofu destroy` : `cpc delete-workspace ${name} --yes`
        );
      }
    }

    return {
      workspace: name,
      completedSteps,
      activeWorkspace: active.name === name ? FALLBACK_WORKSPACE : active.name,
    };
  }

  /**
   * Workspaces that have an env file.
   */
  async listContexts(): Promise<string[]> {
    try {
      const entries = await readdir(this.paths.envsDir);
      return entries
        .filter(entry => entry.endsWith('.env'))
        .map(entry => entry.slice(0, -'.env'.length))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  async clearCaches(name: string): Promise<number> {
    let removed = 0;
    for (const path of getWorkspaceCachePaths(this.paths, name)) {
      if (await removeFile(path)) {
        removed++;
      }
    }
    return removed;
  }
}
