/**
 * Symbol lookup over an inventory
 *
 * Exact symbol names are answered from the by-symbol index; anything else
 * falls back to Fuse.js fuzzy matching over symbol, id and file.
 */

import Fuse from 'fuse.js';
import type { MetaIndexes, MetaRecord, SymbolType } from '../types/index.js';
import { buildIndexes, sortRecords } from '../indexes/index.js';

export interface QueryOptions {
  file?: string;
  module?: string;
  thread?: string;
  flag?: string;
  type?: SymbolType;
  limit?: number;
}

export interface QueryResult {
  record: MetaRecord;
  score: number;
  exact: boolean;
}

function bucketOf(index: Map<string, MetaRecord[]>, key: string): MetaRecord[] {
  return index.get(key) ?? [];
}

/**
 * Records that pass every filter, taken from the matching index buckets.
 */
export function filterRecords(indexes: MetaIndexes, options: QueryOptions = {}): MetaRecord[] {
  let candidates: MetaRecord[] = sortRecords(Array.from(indexes['by-symbol'].values()));

  const narrow = (bucket: MetaRecord[]) => {
    const allowed = new Set(bucket);
    candidates = candidates.filter(record => allowed.has(record));
  };

  if (options.file !== undefined) narrow(bucketOf(indexes['by-file'], options.file));
  if (options.module !== undefined) narrow(bucketOf(indexes['by-module'], options.module.toLowerCase()));
  if (options.thread !== undefined) narrow(bucketOf(indexes['by-thread'], options.thread.toLowerCase()));
  if (options.flag !== undefined) narrow(bucketOf(indexes['by-flag'], options.flag));
  if (options.type !== undefined) {
    const type = options.type;
    candidates = candidates.filter(record => record.symbol_type === type);
  }

  return candidates;
}

export function queryRecords(
  records: readonly MetaRecord[],
  pattern: string,
  options: QueryOptions = {}
): QueryResult[] {
  const indexes = buildIndexes(records);
  const candidates = filterRecords(indexes, options);
  const limit = options.limit ?? 20;

  const exact = candidates.filter(record => record.symbol === pattern);
  if (exact.length > 0) {
    return exact.slice(0, limit).map(record => ({ record, score: 1, exact: true }));
  }

  const fuse = new Fuse(candidates, {
    keys: ['symbol', 'id', 'source_file'],
    threshold: 0.4,
    includeScore: true,
  });

  return fuse.search(pattern, { limit }).map(result => ({
    record: result.item,
    score: 1 - (result.score ?? 0),
    exact: false,
  }));
}
