/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { resolveLogLevel } from '../src/utils/logger.js';

describe('resolveLogLevel', () => {
  it('should pick the level from the environment', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({})).toBe('debug');
  });

  it('should let CPC_LOG_LEVEL override the default', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production', CPC_LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('should load .env before any module that creates a logger', async () => {
    const entry = await readFile(new URL('../src/index.ts', import.meta.url), 'utf-8');
    const imports = entry.split('\n').filter(line => line.startsWith('import '));

    expect(imports[0]).toBe("import 'dotenv/config';");
  });
});
