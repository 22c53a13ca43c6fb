/**
 * Time source used by polling loops, retries and caches.
 * Tests substitute a fake clock so that no real time passes.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise(resolve => {
      setTimeout(resolve, ms);
    }),
};
