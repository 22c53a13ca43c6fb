import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';
import type { CpcConfig } from '../config/index.js';

/**
 * File locations used by cpc. Everything under cacheDir is short-lived and
 * safe to delete at any time.
 */
export interface CpcPaths {
  repoPath: string;
  configDir: string;
  cacheDir: string;
  kubeconfigPath: string;
  /** Holds the active workspace name */
  contextFile: string;
  /** Per-workspace roster/version files */
  envsDir: string;
  /** Provisioner working directory */
  terraformDir: string;
  /** Configuration runner working directory */
  ansibleDir: string;
}

export function resolvePaths(
  config: Pick<CpcConfig, 'repoPath' | 'configDir' | 'cacheDir' | 'kubeconfigPath'>
): CpcPaths {
  return {
    repoPath: config.repoPath,
    configDir: config.configDir,
    cacheDir: config.cacheDir,
    kubeconfigPath: config.kubeconfigPath,
    contextFile: join(config.configDir, 'current_cluster_context'),
    envsDir: join(config.repoPath, 'envs'),
    terraformDir: join(config.repoPath, 'terraform'),
    ansibleDir: join(config.repoPath, 'ansible'),
  };
}

// Workspace paths
export function getEnvFilePath(paths: CpcPaths, workspace: string): string {
  return join(paths.envsDir, `${workspace}.env`);
}

// Cache paths
export function getSshCachePath(paths: CpcPaths, workspace: string): string {
  return join(paths.cacheDir, `cpc_ssh_cache_${workspace}.json`);
}

export function getInfraCachePath(paths: CpcPaths, workspace: string): string {
  return join(paths.cacheDir, `cpc_tofu_output_cache_${workspace}.json`);
}

export function getInventoryPath(paths: CpcPaths, workspace: string): string {
  return join(paths.cacheDir, `inventory_${workspace}.json`);
}

export function getRecoveryLogPath(paths: CpcPaths, runId: string): string {
  return join(paths.cacheDir, `recovery-${runId}.log`);
}

/**
 * Cache files that belong to one workspace.
 */
export function getWorkspaceCachePaths(paths: CpcPaths, workspace: string): string[] {
  return [
    getSshCachePath(paths, workspace),
    getInfraCachePath(paths, workspace),
    getInventoryPath(paths, workspace),
  ];
}

export async function ensureAllDirs(paths: CpcPaths): Promise<void> {
  await mkdir(paths.configDir, { recursive: true });
  await mkdir(paths.cacheDir, { recursive: true });
  await mkdir(paths.envsDir, { recursive: true });
}
