/**
 * Checkpoint log and execute-with-recovery for workflow steps.
 *
 * There is no automatic undo across systems: a failed step records what
 * failed and what the operator should check, and re-running the whole
 * workflow is the recovery path.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { nanoid } from 'nanoid';
import { toError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('recovery');

export interface Checkpoint {
  name: string;
  note: string;
  timestamp: Date;
}

export interface RecoveryStep {
  name: string;
  action: () => Promise<void>;
  /** Operator-facing message logged when the step fails */
  onFailureHint: string;
  /** Runs after a successful action; false counts as failure */
  validation?: () => Promise<boolean>;
}

export interface StepFailure {
  name: string;
  hint: string;
  /** Null when the action succeeded but validation returned false */
  error: Error | null;
}

export interface RecoveryLogOptions {
  /** File to append checkpoints to; in-memory only when omitted */
  logPath?: string;
  runId?: string;
  clock?: Clock;
}

export class RecoveryLog {
  readonly runId: string;
  private readonly checkpoints: Checkpoint[] = [];
  private readonly failures: StepFailure[] = [];
  private readonly logPath: string | undefined;
  private readonly clock: Clock;

  constructor(options: RecoveryLogOptions = {}) {
    this.runId = options.runId ?? nanoid(10);
    this.logPath = options.logPath;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Append a checkpoint. Never throws; a failed file write is logged and
   * the in-memory record is kept.
   */
  async checkpoint(name: string, note = ''): Promise<void> {
    const entry: Checkpoint = { name, note, timestamp: new Date(this.clock.now()) };
    this.checkpoints.push(entry);
    log.debug({ runId: this.runId, checkpoint: name, note }, 'Checkpoint');

    if (!this.logPath) {
      return;
    }
    try {
      await mkdir(dirname(this.logPath), { recursive: true });
      await appendFile(
        this.logPath,
        `${entry.timestamp.toISOString()}|${name}|${note.replace(/\n/g, ' ')}\n`,
        'utf-8'
      );
    } catch (error) {
      log.warn({ logPath: this.logPath, error: toError(error).message }, 'Could not write checkpoint log');
    }
  }

  /**
   * Run a step: action, then validation. On failure the hint is logged,
   * the failure recorded, and false returned.
   */
  async executeWithRecovery(step: RecoveryStep): Promise<boolean> {
    await this.checkpoint(`pre_${step.name}`, 'starting');

    let error: Error | null = null;
    try {
      await step.action();
      if (step.validation && !(await step.validation())) {
        log.error({ step: step.name }, 'Step validation failed');
        return await this.recordFailure(step, null);
      }
    } catch (caught) {
      error = toError(caught);
      log.error({ step: step.name, error: error.message }, 'Step failed');
      return await this.recordFailure(step, error);
    }

    await this.checkpoint(`post_${step.name}`, 'completed');
    return true;
  }

  getCheckpoints(): readonly Checkpoint[] {
    return this.checkpoints;
  }

  getFailures(): readonly StepFailure[] {
    return this.failures;
  }

  lastFailure(): StepFailure | undefined {
    return this.failures[this.failures.length - 1];
  }

  /**
   * Last completed step, as a hint for where a re-run will pick up work.
   */
  lastCompleted(): Checkpoint | undefined {
    for (let i = this.checkpoints.length - 1; i >= 0; i--) {
      const checkpoint = this.checkpoints[i];
      if (checkpoint && checkpoint.name.startsWith('post_')) {
        return checkpoint;
      }
    }
    return undefined;
  }

  private async recordFailure(step: RecoveryStep, error: Error | null): Promise<false> {
    log.warn({ step: step.name }, step.onFailureHint);
    this.failures.push({ name: step.name, hint: step.onFailureHint, error });
    await this.checkpoint(`failed_${step.name}`, error?.message ?? 'validation failed');
    return false;
  }
}
