/**
 * Core record types for the metanote scanner
 */

export type SymbolType = 'function' | 'class' | 'variable' | 'anchor';

/**
 * Expected callers of a symbol: `'*'` for anyone, a call count,
 * or the caller names in declaration order.
 */
export type Callers = '*' | number | string[];

export const WILDCARD_CALLERS = '*';

/**
 * A finalized annotated symbol. Field names and order match the
 * inventory artifact.
 */
export interface MetaRecord {
  id: string;
  symbol: string;
  symbol_type: SymbolType;
  source_file: string;
  line_number: number;
  raw: string[];
  doc: string[];
  systems: string[];
  roles: string[];
  threads: string[];
  callers: Callers;
  flags: string;
  assign_type: string;
  custom: Record<string, string[]>;
}

/**
 * Lookup indexes over an inventory. Buckets are Maps so the sorted key
 * order survives serialization; plain objects list integer-like keys first.
 */
export interface MetaIndexes {
  'by-symbol': Map<string, MetaRecord>;
  'by-file': Map<string, MetaRecord[]>;
  'by-module': Map<string, MetaRecord[]>;
  'by-thread': Map<string, MetaRecord[]>;
  'by-flag': Map<string, MetaRecord[]>;
}

/**
 * The indexes artifact as it reads back from JSON.
 */
export interface SerializedIndexes {
  'by-symbol': Record<string, MetaRecord>;
  'by-file': Record<string, MetaRecord[]>;
  'by-module': Record<string, MetaRecord[]>;
  'by-thread': Record<string, MetaRecord[]>;
  'by-flag': Record<string, MetaRecord[]>;
}
