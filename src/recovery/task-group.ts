/**
 * Short-lived task group: independent preparatory tasks run together while
 * an optional monitor runs alongside; the monitor is cancelled once every
 * task has settled.
 */

import { toError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('task-group');

export type TaskMonitor = (signal: AbortSignal) => Promise<void>;

export async function runTaskGroup<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  monitor?: TaskMonitor
): Promise<T[]> {
  const controller = new AbortController();
  const monitoring = monitor
    ? monitor(controller.signal).catch((error: unknown) => {
        log.warn({ error: toError(error).message }, 'Task monitor failed');
      })
    : Promise.resolve();

  try {
    return await Promise.all(tasks.map(task => task()));
  } finally {
    controller.abort();
    await monitoring;
  }
}

/**
 * Monitor that logs progress every intervalMs until cancelled.
 */
export function heartbeat(description: string, intervalMs: number): TaskMonitor {
  return signal =>
    new Promise<void>(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const started = Date.now();
      const timer = setInterval(() => {
        log.info(
          { description, elapsedSeconds: Math.round((Date.now() - started) / 1000) },
          'Still running'
        );
      }, intervalMs);
      signal.addEventListener(
        'abort',
        () => {
          clearInterval(timer);
          resolve();
        },
        { once: true }
      );
    });
}
