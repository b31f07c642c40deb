import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isLocked, withLock } from '../lock.js';

describe('withLock', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'trellis-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('holds the lock while the callback runs and releases it afterwards', async () => {
    const filePath = join(tempDir, 'graph.yaml');
    const during = await withLock(filePath, () => isLocked(filePath));
    expect(during).toBe(true);
    expect(await isLocked(filePath)).toBe(false);
  });

  it('releases the lock when the callback throws', async () => {
    const filePath = join(tempDir, 'graph.yaml');
    await expect(withLock(filePath, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(await isLocked(filePath)).toBe(false);
  });
});
