/**
 * Index projection over a finalized inventory
 */

import type { MetaIndexes, MetaRecord } from '../types/index.js';

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Case-insensitive key order; keys differing only in case fall back to
 * exact comparison so the order stays total.
 */
export function compareKeys(a: string, b: string): number {
  return compareCodeUnits(a.toLowerCase(), b.toLowerCase()) || compareCodeUnits(a, b);
}

/**
 * Canonical record order: symbol, then source file (both case-insensitive),
 * then line number. Returns a new array.
 */
export function sortRecords(records: readonly MetaRecord[]): MetaRecord[] {
  return [...records].sort(
    (a, b) =>
      compareCodeUnits(a.symbol.toLowerCase(), b.symbol.toLowerCase()) ||
      compareCodeUnits(a.source_file.toLowerCase(), b.source_file.toLowerCase()) ||
      a.line_number - b.line_number
  );
}

function sortedMap<T>(buckets: Map<string, T>): Map<string, T> {
  return new Map(Array.from(buckets.entries()).sort(([a], [b]) => compareKeys(a, b)));
}

function bySymbol(sorted: readonly MetaRecord[]): Map<string, MetaRecord> {
  const counts = new Map<string, number>();
  const buckets = new Map<string, MetaRecord>();

  for (const record of sorted) {
    const n = (counts.get(record.symbol) ?? 0) + 1;
    counts.set(record.symbol, n);
    buckets.set(n === 1 ? record.symbol : `${record.symbol} (${n})`, record);
  }

  return sortedMap(buckets);
}

function groupBy(
  sorted: readonly MetaRecord[],
  keysOf: (record: MetaRecord) => Iterable<string>
): Map<string, MetaRecord[]> {
  const buckets = new Map<string, MetaRecord[]>();

  for (const record of sorted) {
    for (const key of keysOf(record)) {
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(record);
      } else {
        buckets.set(key, [record]);
      }
    }
  }

  return sortedMap(buckets);
}

/**
 * Build every index from a record list. Pure: the input is not modified and
 * equal inputs give equal outputs.
 */
export function buildIndexes(records: readonly MetaRecord[]): MetaIndexes {
  const sorted = sortRecords(records);

  return {
    'by-symbol': bySymbol(sorted),
    'by-file': groupBy(sorted, record => [record.source_file]),
    'by-module': groupBy(sorted, record => new Set(record.systems)),
    'by-thread': groupBy(sorted, record => new Set(record.threads)),
    'by-flag': groupBy(sorted, record => new Set(Array.from(record.flags))),
  };
}
