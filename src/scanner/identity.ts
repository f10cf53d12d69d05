/**
 * Record identity: explicit `#id` tokens or ids derived from the locator
 */

import type { MetaRecord, SymbolType } from '../types/index.js';
import { InternalError } from '../errors.js';
import type { EventLog } from '../events/index.js';

const ID_PREFIXES: Record<SymbolType, string> = {
  function: 'fn:',
  class: 'class:',
  variable: 'var:',
  anchor: 'anchor:',
};

export interface Locator {
  symbol: string;
  symbolType: SymbolType;
  sourceFile: string;
  lineNumber: number;
}

export function deriveId(locator: Locator): string {
  const { symbol, symbolType, sourceFile, lineNumber } = locator;
  if (!symbol || !sourceFile || !Number.isInteger(lineNumber) || lineNumber < 1) {
    throw new InternalError(
      `cannot derive id from incomplete locator: ${JSON.stringify(locator)}`
    );
  }
  return `${ID_PREFIXES[symbolType]}${sourceFile}:${symbol}:${lineNumber}`;
}

export function resolveId(explicitId: string | null, locator: Locator): string {
  return explicitId ?? deriveId(locator);
}

export interface DuplicateId {
  id: string;
  firstIndex: number;
  secondIndex: number;
}

/**
 * Every pair of inventory positions that share an id, in inventory order.
 */
export function findDuplicateIds(records: readonly MetaRecord[]): DuplicateId[] {
  const positions = new Map<string, number[]>();
  records.forEach((record, index) => {
    const seen = positions.get(record.id);
    if (seen) {
      seen.push(index);
    } else {
      positions.set(record.id, [index]);
    }
  });

  const duplicates: DuplicateId[] = [];
  for (const [id, indices] of positions) {
    for (let i = 0; i < indices.length; i++) {
      for (let j = i + 1; j < indices.length; j++) {
        duplicates.push({ id, firstIndex: indices[i] ?? 0, secondIndex: indices[j] ?? 0 });
      }
    }
  }
  duplicates.sort((a, b) => a.secondIndex - b.secondIndex || a.firstIndex - b.firstIndex);
  return duplicates;
}

function describe(record: MetaRecord | undefined): string {
  if (!record) return '(missing)';
  return `${record.source_file}:${record.line_number} ${record.symbol} (${record.symbol_type})`;
}

/**
 * Report duplicate ids to the event log. Records are left untouched.
 */
export function checkForDuplicateIds(records: readonly MetaRecord[], events: EventLog): number {
  const duplicates = findDuplicateIds(records);
  for (const dup of duplicates) {
    events.append('duplicate-note-id', {
      id: dup.id,
      first: describe(records[dup.firstIndex]),
      second: describe(records[dup.secondIndex]),
      firstIndex: dup.firstIndex,
      secondIndex: dup.secondIndex,
    });
  }
  return duplicates.length;
}
