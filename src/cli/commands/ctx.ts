import { Command } from 'commander';
import type { CpcRuntime, RuntimeProvider } from '../runtime.js';
import { bold, dim, failCommand, formatInfo, formatJson, formatSuccess, green, print } from '../formatter.js';

interface CtxOptions {
  list?: boolean;
  json?: boolean;
}

/**
 * Create the ctx command.
 */
export function createCtxCommand(getRuntime: RuntimeProvider): Command {
  return new Command('ctx')
    .description('Show, switch or list cluster workspaces')
    .argument('[workspace]', 'Workspace to make active')
    .option('-l, --list', 'List known workspaces', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (workspace: string | undefined, options: CtxOptions) => {
      try {
        await executeCtx(getRuntime(), workspace, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeCtx(
  runtime: CpcRuntime,
  workspace: string | undefined,
  options: CtxOptions
): Promise<void> {
  if (workspace !== undefined) {
    const context = await runtime.store.setActiveContext(workspace);
    print(formatSuccess(`Switched to workspace ${bold(context.name)}`));
    if (!(await runtime.store.exists(context.name))) {
      print(formatInfo(`No env file for ${context.name} yet; create envs/${context.name}.env to pin versions`));
    }
    return;
  }

  const active = await runtime.store.getActiveName();

  if (options.list) {
    const fromFiles = await runtime.store.listContexts();
    const fromInfra = await runtime.infra.listWorkspaces();
    const names = [...new Set([...fromFiles, ...fromInfra])].sort();
    if (options.json) {
      print(formatJson({ active: active.name, workspaces: names }));
      return;
    }
    for (const name of names) {
      const marker = name === active.name ? green('*') : ' ';
      const env = fromFiles.includes(name) ? '' : dim(' (no env file)');
      print(`${marker} ${name}${env}`);
    }
    return;
  }

  if (options.json) {
    print(formatJson(active));
    return;
  }
  print(active.isFallback ? `${active.name} ${dim('(fallback, no workspace selected)')}` : active.name);
}
