/**
 * Persistence for a policy cache between runs.
 *
 * @module cache/backing-store
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { PolicyFetchResponse } from '../types/protocol.js';

/**
 * What a cache keeps on disk: either the last accepted fetch response, or
 * the fact that the domain is unmanaged.
 */
export type PersistedPolicy =
  | { kind: 'policy'; response: PolicyFetchResponse; storedAt: number }
  | { kind: 'unmanaged'; timestamp: number; storedAt: number };

export interface PolicyCacheStore {
  /** Resolves to null when nothing was stored yet. */
  load(): Promise<PersistedPolicy | null>;
  save(record: PersistedPolicy): Promise<void>;
}

const fetchResponseSchema = z.object({
  policyData: z.string().optional(),
  policyDataSignature: z.string().optional(),
  newPublicKey: z.string().optional(),
  errorCode: z.number().optional(),
  errorMessage: z.string().optional(),
});

const persistedSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('policy'), response: fetchResponseSchema, storedAt: z.number() }),
  z.object({ kind: z.literal('unmanaged'), timestamp: z.number(), storedAt: z.number() }),
]);

export class MemoryPolicyCacheStore implements PolicyCacheStore {
  private record: PersistedPolicy | null;

  constructor(initial: PersistedPolicy | null = null) {
    this.record = initial;
  }

  async load(): Promise<PersistedPolicy | null> {
    return this.record;
  }

  async save(record: PersistedPolicy): Promise<void> {
    this.record = record;
  }

  peek(): PersistedPolicy | null {
    return this.record;
  }
}

/**
 * Stores the record as JSON at `path`. Writes go through a temporary file
 * that is renamed into place, one at a time and in the order `save` was
 * called.
 */
export class FilePolicyCacheStore implements PolicyCacheStore {
  private queue: Promise<void> = Promise.resolve();
  private writeCount = 0;

  constructor(private readonly path: string) {}

  async load(): Promise<PersistedPolicy | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const parsed = persistedSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Corrupt policy cache file ${this.path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  save(record: PersistedPolicy): Promise<void> {
    const write = this.queue.then(() => this.write(record));
    // The caller sees the failure; later saves still run.
    this.queue = write.catch(() => undefined);
    return write;
  }

  private async write(record: PersistedPolicy): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.${++this.writeCount}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    await rename(tmp, this.path);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
