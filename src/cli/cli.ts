import { Command } from 'commander';
import { ensureAllDirs } from '../artifacts/paths.js';
import { buildCommands } from './command-registry.js';
import { createRuntime, type CpcRuntime, type RuntimeProvider } from './runtime.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program. The runtime is built lazily, on
 * the first command that needs it.
 */
export function createProgram(getRuntime?: RuntimeProvider): Command {
  let runtime: CpcRuntime | null = null;
  const provide: RuntimeProvider =
    getRuntime ??
    (() => {
      runtime ??= createRuntime();
      return runtime;
    });

  const program = new Command();

  program
    .name('cpc')
    .description('cpc - provision and maintain self-hosted Kubernetes clusters')
    .version(VERSION, '-v, --version', 'Output the current version')
    .hook('preAction', async () => {
      // Ensure all required directories exist before any command runs
      await ensureAllDirs(provide().paths);
    });

  for (const command of buildCommands(provide)) {
    program.addCommand(command);
  }

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}
