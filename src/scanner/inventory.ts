/**
 * Shared, append-only list of finalized records for one scan run
 */

import type { MetaRecord } from '../types/index.js';

export class Inventory {
  private readonly records: MetaRecord[] = [];

  append(record: MetaRecord): void {
    this.records.push(record);
  }

  /**
   * Most recently appended anchor record for `name` in `sourceFile`.
   * A reverse linear scan; a map keyed by (file, name) would replace this
   * if inventories grow large.
   */
  findAnchor(sourceFile: string, name: string): MetaRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (
        record &&
        record.symbol_type === 'anchor' &&
        record.source_file === sourceFile &&
        record.symbol === name
      ) {
        return record;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.records.length;
  }

  toArray(): MetaRecord[] {
    return [...this.records];
  }
}
