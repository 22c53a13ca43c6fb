/**
 * Subcommand dispatch table. Every declared command name maps to exactly
 * one factory; the Record type makes a missing handler a compile error.
 */

import type { Command } from 'commander';
import { createAddNodeCommand } from './commands/add-node.js';
import { createApproveCsrCommand } from './commands/approve-csr.js';
import { createBootstrapCommand } from './commands/bootstrap.js';
import { createClearCacheCommand } from './commands/clear-cache.js';
import { createCloneWorkspaceCommand } from './commands/clone-workspace.js';
import { createCtxCommand } from './commands/ctx.js';
import { createDeleteWorkspaceCommand } from './commands/delete-workspace.js';
import { createDrainNodeCommand } from './commands/drain-node.js';
import { createGetCredentialsCommand } from './commands/get-credentials.js';
import { createJoinNodeCommand } from './commands/join-node.js';
import { createRemoveNodeCommand } from './commands/remove-node.js';
import { createResetNodeCommand } from './commands/reset-node.js';
import { createStatusCommand } from './commands/status.js';
import { createUpgradeAddonsCommand } from './commands/upgrade-addons.js';
import { createUpgradeK8sCommand } from './commands/upgrade-k8s.js';
import { createUpgradeNodeCommand } from './commands/upgrade-node.js';
import type { RuntimeProvider } from './runtime.js';

export const COMMAND_NAMES = [
  'ctx',
  'clone-workspace',
  'delete-workspace',
  'bootstrap',
  'add-node',
  'join-node',
  'remove-node',
  'drain-node',
  'upgrade-node',
  'reset-node',
  'upgrade-k8s',
  'upgrade-addons',
  'approve-csr',
  'status',
  'get-credentials',
  'clear-cache',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type CommandFactory = (getRuntime: RuntimeProvider) => Command;

export const COMMAND_REGISTRY: Record<CommandName, CommandFactory> = {
  ctx: createCtxCommand,
  'clone-workspace': createCloneWorkspaceCommand,
  'delete-workspace': createDeleteWorkspaceCommand,
  bootstrap: createBootstrapCommand,
  'add-node': createAddNodeCommand,
  'join-node': createJoinNodeCommand,
  'remove-node': createRemoveNodeCommand,
  'drain-node': createDrainNodeCommand,
  'upgrade-node': createUpgradeNodeCommand,
  'reset-node': createResetNodeCommand,
  'upgrade-k8s': createUpgradeK8sCommand,
  'upgrade-addons': createUpgradeAddonsCommand,
  'approve-csr': createApproveCsrCommand,
  status: createStatusCommand,
  'get-credentials': createGetCredentialsCommand,
  'clear-cache': createClearCacheCommand,
};

/**
 * Build every subcommand, checking that each factory produces the command
 * it is registered under.
 */
export function buildCommands(getRuntime: RuntimeProvider): Command[] {
  return COMMAND_NAMES.map(name => {
    const command = COMMAND_REGISTRY[name](getRuntime);
    if (command.name() !== name) {
      throw new Error(`Command registered as '${name}' is named '${command.name()}'`);
    }
    return command;
  });
}
