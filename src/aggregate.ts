/**
 * Merge, filter and sort fandom lists fetched from several categories
 */

import { recordKey } from "./record.js";
import type { FandomRecord } from "./types.js";

export interface MergeResult {
  records: FandomRecord[];
  /** Records dropped because an identical record was already present */
  duplicateCount: number;
}

export interface FilterResult {
  records: FandomRecord[];
  /** Records dropped for having fewer works than the minimum */
  filteredCount: number;
}

/**
 * Concatenate record lists, keeping the first occurrence of each record.
 * Records are identical only when name, count and URL all match.
 *
 * @param lists - Record lists in fetch order
 */
export function mergeRecords(lists: readonly (readonly FandomRecord[])[]): MergeResult {
  const seen = new Set<string>();
  const records: FandomRecord[] = [];
  let duplicateCount = 0;

  for (const list of lists) {
    for (const record of list) {
      const key = recordKey(record);
      if (seen.has(key)) {
        duplicateCount++;
        continue;
      }
      seen.add(key);
      records.push(record);
    }
  }

  return { records, duplicateCount };
}

/**
 * Keep records with at least `minCount` works, most works first.
 * The sort is stable: equal counts keep their input order.
 */
export function filterAndSort(records: readonly FandomRecord[], minCount = 0): FilterResult {
  const kept = records.filter((record) => record.count >= minCount);
  kept.sort((a, b) => b.count - a.count);
  return { records: kept, filteredCount: records.length - kept.length };
}
