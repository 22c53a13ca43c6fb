/**
 * Kubernetes release numbers as operators type them ("1.31", "v1.31.9")
 * and as the upgrade playbooks take them.
 */

import type { KubeVersion } from '../adapters/kube-resources.js';
import { ValidationError } from './errors.js';

/** Env-file key of a workspace's Kubernetes version pin */
export const KUBERNETES_VERSION_KEY = 'KUBERNETES_VERSION';

export interface KubernetesVersion {
  major: number;
  minor: number;
  /** Null when only major.minor was given */
  patch: number | null;
}

const VERSION_PATTERN = /^v?(\d+)\.(\d+)(?:\.(\d+))?$/;
const GIT_VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)/;

export function parseKubernetesVersion(input: string, field = 'version'): KubernetesVersion {
  const match = VERSION_PATTERN.exec(input.trim());
  if (!match) {
    throw new ValidationError(
      `Invalid Kubernetes version '${input}': expected 1.31 or 1.31.9`,
      field
    );
  }
  const [, major, minor, patch] = match;
  return {
    major: Number(major),
    minor: Number(minor),
    patch: patch === undefined ? null : Number(patch),
  };
}

export function formatKubernetesVersion(version: KubernetesVersion): string {
  const base = `v${version.major}.${version.minor}`;
  return version.patch === null ? base : `${base}.${version.patch}`;
}

/**
 * Extra variables for the upgrade playbooks: the minor line, plus the
 * patch release when one was given.
 */
export function kubernetesVersionVars(version: KubernetesVersion): Record<string, string> {
  const vars: Record<string, string> = {
    target_k8s_version: `${version.major}.${version.minor}`,
  };
  if (version.patch !== null) {
    vars['kubernetes_patch_version'] = String(version.patch);
  }
  return vars;
}

/**
 * Whether a running API server is at `version`. Without a patch number
 * any release of the minor line matches.
 */
export function serverMatchesVersion(server: KubeVersion, version: KubernetesVersion): boolean {
  if (server.major !== version.major || server.minor !== version.minor) {
    return false;
  }
  if (version.patch === null) {
    return true;
  }
  const match = GIT_VERSION_PATTERN.exec(server.gitVersion);
  return match !== null && Number(match[3]) === version.patch;
}
