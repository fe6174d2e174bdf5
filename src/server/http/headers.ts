/**
 * Case-insensitive, insertion-ordered HTTP header map.
 *
 * Lookups ignore case, while iteration yields headers in the order they were
 * first added, spelled the way they were first added.
 */

import type { IncomingHttpHeaders } from "node:http";

/** Anything that can seed a HeaderMap. */
export type HeaderInit =
  | HeaderMap
  | Record<string, string | string[] | undefined>
  | Array<[string, string]>;

interface HeaderEntry {
  name: string;
  values: string[];
}

export class HeaderMap implements Iterable<[string, string]> {
  private readonly entriesByKey = new Map<string, HeaderEntry>();

  constructor(init?: HeaderInit) {
    if (init) {
      this.merge(init);
    }
  }

  /**
   * Builds a map from the header object undici (and node:http) return.
   */
  static fromIncoming(headers: IncomingHttpHeaders): HeaderMap {
    return new HeaderMap(headers);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /**
   * Returns the header value, joining repeated values with ", ".
   */
  get(name: string): string | undefined {
    const entry = this.entriesByKey.get(name.toLowerCase());
    return entry ? entry.values.join(", ") : undefined;
  }

  getAll(name: string): string[] {
    return [...(this.entriesByKey.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.entriesByKey.has(name.toLowerCase());
  }

  /**
   * Replaces every value of the header. The original spelling and position
   * are kept when the header already exists.
   */
  set(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entriesByKey.get(key);
    if (existing) {
      existing.values = [value];
    } else {
      this.entriesByKey.set(key, { name, values: [value] });
    }
    return this;
  }

  append(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entriesByKey.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      this.entriesByKey.set(key, { name, values: [value] });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.entriesByKey.delete(name.toLowerCase());
  }

  /**
   * Overrides headers with those from `other`, matching names without
   * regard to case.
   */
  merge(other: HeaderInit): this {
    if (other instanceof HeaderMap) {
      for (const entry of other.entriesByKey.values()) {
        this.entriesByKey.delete(entry.name.toLowerCase());
        this.entriesByKey.set(entry.name.toLowerCase(), {
          name: entry.name,
          values: [...entry.values],
        });
      }
      return this;
    }

    if (Array.isArray(other)) {
      const seen = new Set<string>();
      for (const [name, value] of other) {
        const key = name.toLowerCase();
        if (seen.has(key)) {
          this.append(name, value);
        } else {
          seen.add(key);
          this.set(name, value);
        }
      }
      return this;
    }

    for (const [name, value] of Object.entries(other)) {
      if (value === undefined) continue;
      const values = Array.isArray(value) ? value : [value];
      if (values.length === 0) continue;
      this.set(name, values[0]);
      for (const extra of values.slice(1)) {
        this.append(name, extra);
      }
    }
    return this;
  }

  *entries(): IterableIterator<[string, string]> {
    for (const entry of this.entriesByKey.values()) {
      yield [entry.name, entry.values.join(", ")];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /**
   * Plain object form, suitable for passing to an HTTP client.
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, value] of this.entries()) {
      record[name] = value;
    }
    return record;
  }
}
