/**
 * Read-only view of a {@link CaseInsensitiveMap}.
 */
export interface ReadonlyCaseInsensitiveMap<V> extends Iterable<[string, V]> {
  readonly size: number;
  get(key: string): V | undefined;
  has(key: string): boolean;
  keyOf(key: string): string | undefined;
  entries(): IterableIterator<[string, V]>;
  keys(): IterableIterator<string>;
  values(): IterableIterator<V>;
  forEach(callback: (value: V, key: string) => void): void;
  toJSON(): Record<string, V>;
}

/**
 * A map whose string keys compare case-insensitively.
 *
 * The casing of the first key written is kept for iteration.
 */
export class CaseInsensitiveMap<V> implements ReadonlyCaseInsensitiveMap<V> {
  private readonly entriesByKey = new Map<string, [string, V]>();
  private frozen = false;

  constructor(entries?: Iterable<readonly [string, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: string): V | undefined {
    return this.entriesByKey.get(key.toLowerCase())?.[1];
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key.toLowerCase());
  }

  /** Get the key as first written, for any casing of it. */
  keyOf(key: string): string | undefined {
    return this.entriesByKey.get(key.toLowerCase())?.[0];
  }

  /** Reject every later write. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Write a value, keeping the casing of an existing key. */
  set(key: string, value: V): this {
    if (this.frozen) {
      throw new TypeError(`Cannot set '${key}' on a frozen map`);
    }
    const normalized = key.toLowerCase();
    const existing = this.entriesByKey.get(normalized);
    this.entriesByKey.set(normalized, [existing ? existing[0] : key, value]);
    return this;
  }

  /** Write a value only when the key is not present yet. Returns whether it was written. */
  setIfAbsent(key: string, value: V): boolean {
    if (this.has(key)) return false;
    this.set(key, value);
    return true;
  }

  *entries(): IterableIterator<[string, V]> {
    for (const [key, value] of this.entriesByKey.values()) {
      yield [key, value];
    }
  }

  *keys(): IterableIterator<string> {
    for (const [key] of this.entriesByKey.values()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entriesByKey.values()) {
      yield value;
    }
  }

  forEach(callback: (value: V, key: string) => void): void {
    for (const [key, value] of this.entries()) {
      callback(value, key);
    }
  }

  [Symbol.iterator](): IterableIterator<[string, V]> {
    return this.entries();
  }

  toJSON(): Record<string, V> {
    return Object.fromEntries(this.entries());
  }
}
