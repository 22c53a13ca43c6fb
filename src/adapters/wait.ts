import { TimeoutError, TransientError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('wait');

export interface WaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  /** Used in logs and the timeout message */
  description: string;
}

/**
 * Bounded polling: re-run `read` every pollIntervalMs until `condition`
 * holds or timeoutMs has elapsed. Transient read failures count as "not
 * yet"; any other error ends the wait.
 */
export async function pollUntil<T>(
  read: () => Promise<T>,
  condition: (value: T) => boolean,
  options: WaitOptions,
  clock: Clock = systemClock
): Promise<T> {
  const deadline = clock.now() + options.timeoutMs;
  let polls = 0;

  for (;;) {
    polls++;
    try {
      const value = await read();
      if (condition(value)) {
        log.debug({ description: options.description, polls }, 'Condition met');
        return value;
      }
    } catch (error) {
      if (!(error instanceof TransientError)) {
        throw error;
      }
      log.debug({ description: options.description, error: error.message }, 'Not ready yet');
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      throw new TimeoutError(
        `Timed out after ${Math.round(options.timeoutMs / 1000)}s waiting for ${options.description}`,
        options.timeoutMs
      );
    }
    await clock.sleep(Math.min(options.pollIntervalMs, remaining));
  }
}
