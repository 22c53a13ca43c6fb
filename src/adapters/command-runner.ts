/**
 * Subprocess seam shared by all adapters.
 *
 * Adapters never spawn processes directly; they go through a CommandRunner
 * so that tests can substitute a scripted runner.
 */

import { execa } from 'execa';
import { createLogger } from '../utils/logger.js';
import { FatalError, TransientError, type CommandFailureDetails } from '../types/errors.js';

const log = createLogger('command-runner');

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  input?: string;
}

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * CommandRunner backed by execa. Never rejects: a command that could not
 * be started comes back as exit code 127.
 */
export class ExecaCommandRunner implements CommandRunner {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const startTime = Date.now();
    log.debug({ command, args, cwd: options.cwd }, 'Running command');

    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeoutMs,
      input: options.input,
      reject: false,
    });

    const captured = asText(result.stderr);
    const stderr =
      result.exitCode === undefined && !result.timedOut && captured.length === 0
        ? `Failed to start ${command}`
        : captured;

    return {
      command,
      args,
      exitCode: result.exitCode ?? (result.timedOut ? 124 : 127),
      stdout: asText(result.stdout),
      stderr,
      durationMs: Date.now() - startTime,
      timedOut: result.timedOut,
    };
  }
}

export function formatCommandLine(result: Pick<CommandResult, 'command' | 'args'>): string {
  return [result.command, ...result.args].join(' ');
}

export function failureDetails(result: CommandResult): CommandFailureDetails {
  return {
    command: formatCommandLine(result),
    exitCode: result.exitCode,
    output: [result.stdout, result.stderr].filter(part => part.length > 0).join('\n'),
  };
}

/**
 * Output patterns an adapter recognises on a non-zero exit.
 */
export interface FailurePatterns {
  /** The target was already in the requested state */
  alreadyDesired?: readonly RegExp[];
  /** Retrying may succeed */
  transient?: readonly RegExp[];
}

export const CommandOutcome = {
  SUCCEEDED: 'succeeded',
  ALREADY_DESIRED: 'already-desired',
} as const;

export type CommandOutcome = (typeof CommandOutcome)[keyof typeof CommandOutcome];

/**
 * Classify a finished command. Returns the outcome for success and
 * "already in desired state"; throws TransientError or FatalError
 * otherwise, after logging the command and its output.
 */
export function classifyResult(
  result: CommandResult,
  patterns: FailurePatterns = {},
  suggestion?: string
): CommandOutcome {
  if (result.exitCode === 0 && !result.timedOut) {
    return CommandOutcome.SUCCEEDED;
  }

  const details = failureDetails(result);

  if (!result.timedOut && patterns.alreadyDesired?.some(pattern => pattern.test(details.output))) {
    log.info({ command: details.command }, 'Target already in desired state');
    return CommandOutcome.ALREADY_DESIRED;
  }

  const transient =
    result.timedOut || (patterns.transient?.some(pattern => pattern.test(details.output)) ?? false);

  log.error(
    { command: details.command, exitCode: details.exitCode, output: details.output, transient },
    'Command failed'
  );

  const summary = lastLine(details.output) ?? `exit code ${result.exitCode}`;
  if (transient) {
    throw new TransientError(
      result.timedOut
        ? `${details.command} timed out after ${result.durationMs}ms`
        : `${details.command} failed: ${summary}`,
      details
    );
  }
  throw new FatalError(`${details.command} failed: ${summary}`, suggestion, details);
}

function lastLine(output: string): string | undefined {
  const lines = output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
  return lines[lines.length - 1];
}
