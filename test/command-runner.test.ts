/**
 * Command result classification
 */

import { describe, it, expect } from 'vitest';
import {
  CommandOutcome,
  classifyResult,
  failureDetails,
  formatCommandLine,
  type CommandResult,
} from '../src/adapters/command-runner.js';
import { FatalError, TransientError } from '../src/types/errors.js';

function result(overrides: Partial<CommandResult>): CommandResult {
  return {
    command: 'kubectl',
    args: ['create', 'namespace', 'argocd'],
    exitCode: 0,
    stdout: '',
    stderr: '',
    durationMs: 12,
    timedOut: false,
    ...overrides,
  };
}

describe('classifyResult', () => {
  it('should report success for exit code 0', () => {
    expect(classifyResult(result({}))).toBe(CommandOutcome.SUCCEEDED);
  });

  it('should recognise an already-desired target', () => {
    const outcome = classifyResult(
      result({ exitCode: 1, stderr: 'Error from server (AlreadyExists): namespaces "argocd" already exists' }),
      { alreadyDesired: [/AlreadyExists/] }
    );

    expect(outcome).toBe(CommandOutcome.ALREADY_DESIRED);
  });

  it('should raise a transient error for matching output', () => {
    const failed = result({ exitCode: 1, stderr: 'The connection to the server was refused\nconnection refused' });

    expect(() => classifyResult(failed, { transient: [/connection refused/] })).toThrow(
      new TransientError('kubectl create namespace argocd failed: connection refused')
    );
  });

  it('should treat a timeout as transient', () => {
    expect(() => classifyResult(result({ exitCode: 124, timedOut: true, durationMs: 5000 }))).toThrow(
      'kubectl create namespace argocd timed out after 5000ms'
    );
  });

  it('should raise a fatal error with the suggestion and output', () => {
    const failed = result({ exitCode: 2, stdout: 'partial', stderr: 'forbidden' });

    let caught: unknown;
    try {
      classifyResult(failed, {}, 'cpc get-credentials');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FatalError);
    if (caught instanceof FatalError) {
      expect(caught.message).toBe('kubectl create namespace argocd failed: forbidden');
      expect(caught.suggestion).toBe('cpc get-credentials');
      expect(caught.details).toEqual({
        command: 'kubectl create namespace argocd',
        exitCode: 2,
        output: 'partial\nforbidden',
      });
    }
  });
});

describe('command formatting', () => {
  it('should join the command line and combined output', () => {
    const failed = result({ exitCode: 1, stdout: '', stderr: 'boom' });

    expect(formatCommandLine(failed)).toBe('kubectl create namespace argocd');
    expect(failureDetails(failed).output).toBe('boom');
  });
});
