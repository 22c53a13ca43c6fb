import type { RetryPolicyEngine } from '../recovery/retry-policy.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { CommandResult, CommandRunner, RunOptions } from './command-runner.js';
import type { SystemAdapter } from './types.js';
import { pollUntil, type WaitOptions } from './wait.js';

export interface AdapterDeps {
  runner: CommandRunner;
  retry: RetryPolicyEngine;
  clock?: Clock;
}

/**
 * Shared plumbing for adapters: the command runner, the injected retry
 * policy, and waitUntil implemented once over query.
 */
export abstract class BaseAdapter<TSelector, TSnapshot, TDelta, TOutcome>
  implements SystemAdapter<TSelector, TSnapshot, TDelta, TOutcome>
{
  abstract readonly system: string;

  protected readonly runner: CommandRunner;
  protected readonly retry: RetryPolicyEngine;
  protected readonly clock: Clock;

  constructor(deps: AdapterDeps) {
    this.runner = deps.runner;
    this.retry = deps.retry;
    this.clock = deps.clock ?? systemClock;
  }

  abstract query(selector: TSelector): Promise<TSnapshot>;

  abstract apply(delta: TDelta): Promise<TOutcome>;

  waitUntil(
    selector: TSelector,
    condition: (snapshot: TSnapshot) => boolean,
    options: WaitOptions
  ): Promise<TSnapshot> {
    return pollUntil(() => this.query(selector), condition, options, this.clock);
  }

  protected exec(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    return this.runner.run(command, args, options);
  }
}
