/**
 * Policy values and the immutable map that carries them.
 *
 * @module types/policy
 */

import { isDeepStrictEqual } from 'node:util';

export type PolicyLevel = 'mandatory' | 'recommended';

export type PolicyScope = 'machine' | 'user';

export interface PolicyEntry {
  level: PolicyLevel;
  scope: PolicyScope;
  value: unknown;
}

/**
 * Server-side signing key generation the cached policy was signed with.
 */
export interface PublicKeyVersion {
  version: number;
  valid: boolean;
}

/**
 * Immutable mapping from policy name to entry. Entries are frozen copies.
 *
 * Every operation that changes content returns a new map.
 */
export class PolicyMap implements Iterable<[string, Readonly<PolicyEntry>]> {
  static readonly EMPTY = new PolicyMap();

  private readonly entries: ReadonlyMap<string, Readonly<PolicyEntry>>;

  constructor(entries?: Iterable<readonly [string, PolicyEntry]>) {
    const copy = new Map<string, Readonly<PolicyEntry>>();
    if (entries) {
      for (const [name, entry] of entries) {
        copy.set(name, Object.freeze({ ...entry }));
      }
    }
    this.entries = copy;
  }

  static fromRecord(record: Record<string, PolicyEntry>): PolicyMap {
    return new PolicyMap(Object.entries(record));
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string): Readonly<PolicyEntry> | undefined {
    return this.entries.get(name);
  }

  getValue(name: string): unknown {
    return this.entries.get(name)?.value;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  [Symbol.iterator](): Iterator<[string, Readonly<PolicyEntry>]> {
    return this.entries[Symbol.iterator]();
  }

  with(name: string, entry: PolicyEntry): PolicyMap {
    const next = new Map(this.entries);
    next.set(name, entry);
    return new PolicyMap(next);
  }

  /**
   * Returns a map holding every entry of this map plus the entries of
   * `other` whose names are not present yet. The first writer wins.
   */
  mergeFrom(other: PolicyMap): PolicyMap {
    const next = new Map(this.entries);
    for (const [name, entry] of other) {
      if (!next.has(name)) {
        next.set(name, entry);
      }
    }
    return new PolicyMap(next);
  }

  filterLevel(level: PolicyLevel): PolicyMap {
    return new PolicyMap([...this.entries].filter(([, entry]) => entry.level === level));
  }

  equals(other: PolicyMap): boolean {
    if (other.size !== this.size) return false;
    for (const [name, entry] of this.entries) {
      const theirs = other.get(name);
      if (!theirs || !isDeepStrictEqual(entry, theirs)) {
        return false;
      }
    }
    return true;
  }

  toRecord(): Record<string, Readonly<PolicyEntry>> {
    return Object.fromEntries(this.entries);
  }
}
