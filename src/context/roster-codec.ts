/**
 * Encode/decode boundary for the per-workspace env file.
 *
 * The file is KEY=value lines. Node lists are comma-joined:
 *
 *   ADDITIONAL_WORKERS="worker-3,worker-4"
 *   ADDITIONAL_CONTROLPLANES="controlplane-2"
 *   NODE_STATES="worker-3:ready,worker-4:provisioned,controlplane-2:joined"
 *   RETIRED_NODES="worker-5"
 *
 * Keys ending in _VERSION form the version set; every other key is kept as
 * a workspace setting and written back unchanged.
 */

import { ValidationError } from '../types/errors.js';
import {
  MembershipState,
  NodeRole,
  isMembershipState,
  type NodeSpec,
} from '../types/node.js';
import type { VersionSet } from '../types/workspace.js';
import { Roster } from '../nodes/roster.js';

export const ADDITIONAL_WORKERS_KEY = 'ADDITIONAL_WORKERS';
export const ADDITIONAL_CONTROLPLANES_KEY = 'ADDITIONAL_CONTROLPLANES';
export const NODE_STATES_KEY = 'NODE_STATES';
export const RETIRED_NODES_KEY = 'RETIRED_NODES';
export const RELEASE_LETTER_KEY = 'RELEASE_LETTER';

const MULTI_VALUE_KEYS = new Set([
  ADDITIONAL_WORKERS_KEY,
  ADDITIONAL_CONTROLPLANES_KEY,
  NODE_STATES_KEY,
  RETIRED_NODES_KEY,
]);

const VERSION_KEY_SUFFIX = '_VERSION';

export interface WorkspaceFileContents {
  roster: Roster;
  versions: VersionSet;
  settings: Record<string, string>;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if (first === '"' && last === '"') {
      return value.slice(1, -1).replace(/\\"/g, '"');
    }
    if (first === "'" && last === "'") {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Drop a trailing `# comment` that sits outside quotes and follows
 * whitespace (or opens the value).
 */
export function stripInlineComment(value: string): string {
  let quote: string | null = null;
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (quote) {
      if (char === '\\' && quote === '"') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '#' && (i === 0 || /\s/.test(value[i - 1] ?? ''))) {
      return value.slice(0, i).trimEnd();
    }
  }
  return value;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Parse KEY=value lines. Multi-value keys repeated on several lines are
 * merged; for other keys the last line wins.
 */
export function parseEnvLines(text: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }
    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const key = line.slice(0, separator).replace(/^export\s+/, '').trim();
    const value = unquote(stripInlineComment(line.slice(separator + 1).trim()));

    const previous = entries.get(key);
    if (MULTI_VALUE_KEYS.has(key) && previous) {
      entries.set(key, value ? `${previous},${value}` : previous);
    } else {
      entries.set(key, value);
    }
  }

  return entries;
}

function parseNodeStates(value: string | undefined): Map<string, MembershipState> {
  const states = new Map<string, MembershipState>();
  for (const pair of splitList(value ?? '')) {
    const [name, state] = pair.split(':').map(part => part.trim());
    if (!name || !state || !isMembershipState(state)) {
      throw new ValidationError(`Malformed ${NODE_STATES_KEY} entry '${pair}'`, NODE_STATES_KEY);
    }
    states.set(name, state);
  }
  return states;
}

export function decodeWorkspaceFile(text: string): WorkspaceFileContents {
  const entries = parseEnvLines(text);
  const states = parseNodeStates(entries.get(NODE_STATES_KEY));

  const toSpecs = (key: string, role: NodeRole): NodeSpec[] =>
    splitList(entries.get(key) ?? '').map(name => ({
      name,
      role,
      state: states.get(name) ?? MembershipState.PROVISIONED,
    }));

  const roster = Roster.from(
    [
      ...toSpecs(ADDITIONAL_CONTROLPLANES_KEY, NodeRole.CONTROL_PLANE),
      ...toSpecs(ADDITIONAL_WORKERS_KEY, NodeRole.WORKER),
    ],
    splitList(entries.get(RETIRED_NODES_KEY) ?? '')
  );

  const versions: Record<string, string> = {};
  const settings: Record<string, string> = {};
  for (const [key, value] of entries) {
    if (MULTI_VALUE_KEYS.has(key)) {
      continue;
    }
    if (key.endsWith(VERSION_KEY_SUFFIX)) {
      versions[key] = value;
    } else {
      settings[key] = value;
    }
  }

  return { roster, versions, settings };
}

function formatValue(value: string): string {
  return /[\s#"']/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value;
}

export function encodeWorkspaceFile(contents: WorkspaceFileContents): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(contents.settings)) {
    lines.push(`${key}=${formatValue(value)}`);
  }
  for (const [key, value] of Object.entries(contents.versions)) {
    lines.push(`${key}=${formatValue(value)}`);
  }

  const { roster } = contents;
  lines.push(`${ADDITIONAL_WORKERS_KEY}="${roster.names(NodeRole.WORKER).join(',')}"`);
  lines.push(
    `${ADDITIONAL_CONTROLPLANES_KEY}="${roster.names(NodeRole.CONTROL_PLANE).join(',')}"`
  );
  if (roster.size > 0) {
    const states = roster.list().map(node => `${node.name}:${node.state}`);
    lines.push(`${NODE_STATES_KEY}="${states.join(',')}"`);
  }
  if (roster.retiredNames().length > 0) {
    lines.push(`${RETIRED_NODES_KEY}="${roster.retiredNames().join(',')}"`);
  }

  return `${lines.join('\n')}\n`;
}
