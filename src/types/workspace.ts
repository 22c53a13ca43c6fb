import type { Roster } from '../nodes/roster.js';

/**
 * Workspace used when no active workspace has been recorded.
 */
export const FALLBACK_WORKSPACE = 'default';

export const RESERVED_WORKSPACE_NAMES: readonly string[] = [
  'default',
  'null',
  'none',
  'test',
  'temp',
  'tmp',
];

/**
 * Version pins keyed by their env-file key, e.g. KUBERNETES_VERSION.
 */
export type VersionSet = Readonly<Record<string, string>>;

/**
 * One cluster's identity and configuration. Passed explicitly to every
 * orchestrator call.
 */
export interface WorkspaceContext {
  readonly name: string;
  readonly roster: Roster;
  readonly versions: VersionSet;
  /** Remaining env-file keys (RELEASE_LETTER, network parameters, ...) */
  readonly settings: Readonly<Record<string, string>>;
  /** True when no workspace was recorded and the fallback is in use */
  readonly isFallback: boolean;
}

export function withRoster(context: WorkspaceContext, roster: Roster): WorkspaceContext {
  return { ...context, roster };
}
