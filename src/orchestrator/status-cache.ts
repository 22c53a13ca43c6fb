/**
 * Short-lived JSON caches for the fast status path. A missing, unreadable
 * or expired entry is a miss; cache files can be deleted at any time.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { NodeRole } from '../types/node.js';
import { toError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('status-cache');

const entrySchema = z.object({
  storedAt: z.number(),
  value: z.unknown(),
});

export const clusterSummarySchema = z.array(
  z.object({
    name: z.string(),
    role: z.nativeEnum(NodeRole),
    address: z.string(),
    hostname: z.string(),
    infraId: z.string(),
  })
);

export const reachabilitySchema = z.record(z.boolean());

export type Reachability = z.infer<typeof reachabilitySchema>;

export class TtlFileCache<T> {
  constructor(
    private readonly path: string,
    private readonly schema: z.ZodType<T>,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Cached value if younger than the TTL.
   */
  async get(): Promise<T | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        log.debug({ path: this.path, error: toError(error).message }, 'Cache unreadable');
      }
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      log.debug({ path: this.path }, 'Cache is not valid JSON');
      return null;
    }
    const entry = entrySchema.safeParse(raw);
    if (!entry.success) {
      return null;
    }

    const age = this.clock.now() - entry.data.storedAt;
    if (age < 0 || age >= this.ttlMs) {
      log.debug({ path: this.path, ageMs: age }, 'Cache expired');
      return null;
    }
    const value = this.schema.safeParse(entry.data.value);
    return value.success ? value.data : null;
  }

  async set(value: T): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    await writeFile(tmpPath, JSON.stringify({ storedAt: this.clock.now(), value }), 'utf-8');
    await rename(tmpPath, this.path);
  }
}
