import type { FandomRecord } from "./types.js";

/**
 * Create a frozen fandom record.
 *
 * @example
 * createRecord("Foo", 42, "https://archiveofourown.org/tags/Foo/works")
 */
export function createRecord(name: string, count: number, url: string): FandomRecord {
  return Object.freeze({ name, count, url });
}

/**
 * Two records are the same fandom entry only when name, count and URL all match.
 * A fandom listed with different counts in two categories stays as two entries.
 */
export function recordsEqual(a: FandomRecord, b: FandomRecord): boolean {
  return a.name === b.name && a.count === b.count && a.url === b.url;
}

/** Key for set-based deduplication; equal keys iff {@link recordsEqual} */
export function recordKey(record: FandomRecord): string {
  return JSON.stringify([record.name, record.count, record.url]);
}
