import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FilePolicyCacheStore, MemoryPolicyCacheStore } from '../../src/cache/backing-store.js';

describe('MemoryPolicyCacheStore', () => {
  it('returns what was saved', async () => {
    const store = new MemoryPolicyCacheStore();
    expect(await store.load()).toBeNull();

    await store.save({ kind: 'unmanaged', timestamp: 10, storedAt: 20 });
    expect(await store.load()).toEqual({ kind: 'unmanaged', timestamp: 10, storedAt: 20 });
  });
});

describe('FilePolicyCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'policy-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when nothing was stored', async () => {
    const store = new FilePolicyCacheStore(join(dir, 'user.json'));
    expect(await store.load()).toBeNull();
  });

  it('writes and reads a policy record', async () => {
    const path = join(dir, 'nested', 'user.json');
    const store = new FilePolicyCacheStore(path);
    const record = {
      kind: 'policy' as const,
      response: { policyData: '{"timestamp":1,"policies":{}}', errorCode: 200 },
      storedAt: 42,
    };

    await store.save(record);

    expect(await store.load()).toEqual(record);
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(record);
  });

  it('overwrites the previous record', async () => {
    const store = new FilePolicyCacheStore(join(dir, 'user.json'));
    await store.save({ kind: 'unmanaged', timestamp: 1, storedAt: 1 });
    await store.save({ kind: 'unmanaged', timestamp: 2, storedAt: 2 });

    expect(await store.load()).toEqual({ kind: 'unmanaged', timestamp: 2, storedAt: 2 });
  });

  it('keeps the last of several overlapping saves', async () => {
    const store = new FilePolicyCacheStore(join(dir, 'user.json'));
    const saves: Promise<void>[] = [];
    for (let i = 1; i <= 20; i++) {
      saves.push(
        store.save({
          kind: 'policy',
          response: { policyData: `{"timestamp":${i},"policies":{}}`, errorCode: 200 },
          storedAt: i,
        })
      );
    }
    saves.push(store.save({ kind: 'unmanaged', timestamp: 21, storedAt: 21 }));

    await Promise.all(saves);

    expect(await store.load()).toEqual({ kind: 'unmanaged', timestamp: 21, storedAt: 21 });
    expect(await readdir(dir)).toEqual(['user.json']);
  });

  it('runs later saves after a failed one', async () => {
    const blocker = join(dir, 'nested');
    await writeFile(blocker, '', 'utf-8');
    const store = new FilePolicyCacheStore(join(blocker, 'user.json'));

    await expect(store.save({ kind: 'unmanaged', timestamp: 1, storedAt: 1 })).rejects.toThrow();

    await rm(blocker);
    await store.save({ kind: 'unmanaged', timestamp: 2, storedAt: 2 });
    expect(await store.load()).toEqual({ kind: 'unmanaged', timestamp: 2, storedAt: 2 });
  });

  it('rejects a file of the wrong shape', async () => {
    const path = join(dir, 'user.json');
    await writeFile(path, JSON.stringify({ kind: 'something-else' }), 'utf-8');

    await expect(new FilePolicyCacheStore(path).load()).rejects.toThrow(`Corrupt policy cache file ${path}`);
  });
});
