/**
 * Draining a note into the inventory, either onto a declaration or onto
 * a named anchor (which may merge into an earlier anchor block).
 */

import type { MetaRecord } from '../types/index.js';
import { WILDCARD_CALLERS } from '../types/index.js';
import type { Declaration } from './declarations.js';
import { deriveId, resolveId, type Locator } from './identity.js';
import type { Inventory } from './inventory.js';
import { extendCustom, unionLowercase, uniqueFlags, type Note } from './note.js';

function toRecord(note: Note, locator: Locator): MetaRecord {
  return {
    id: resolveId(note.explicitId, locator),
    symbol: locator.symbol,
    symbol_type: locator.symbolType,
    source_file: locator.sourceFile,
    line_number: locator.lineNumber,
    raw: [...note.raw],
    doc: [...note.doc],
    systems: [...note.systems],
    roles: [...note.roles],
    threads: [...note.threads],
    callers: note.callers ?? WILDCARD_CALLERS,
    flags: note.flags,
    assign_type: note.assignType,
    custom: Object.fromEntries(note.custom),
  };
}

/**
 * Fold a later anchor block into an existing anchor record.
 */
export function mergeIntoAnchor(record: MetaRecord, note: Note, lineNumber: number): void {
  record.raw.push(...note.raw);
  record.doc.push(...note.doc);
  record.systems = unionLowercase(record.systems, note.systems);
  record.roles = unionLowercase(record.roles, note.roles);
  record.threads = unionLowercase(record.threads, note.threads);

  if (note.callers !== undefined) {
    record.callers = note.callers;
  }

  record.flags = uniqueFlags(record.flags + note.flags);

  if (note.assignType !== '') {
    record.assign_type = note.assignType;
  }

  const custom = new Map(Object.entries(record.custom));
  extendCustom(custom, note.custom);
  record.custom = Object.fromEntries(custom);

  record.line_number = lineNumber;

  if (note.explicitId !== null) {
    record.id = note.explicitId;
  } else if (!record.id) {
    record.id = deriveId({
      symbol: record.symbol,
      symbolType: record.symbol_type,
      sourceFile: record.source_file,
      lineNumber: record.line_number,
    });
  }
}

export type DrainOutcome = 'created' | 'merged';

export function drainToAnchor(
  inventory: Inventory,
  note: Note,
  sourceFile: string,
  anchor: string,
  lineNumber: number
): DrainOutcome {
  const existing = inventory.findAnchor(sourceFile, anchor);
  if (existing) {
    mergeIntoAnchor(existing, note, lineNumber);
    return 'merged';
  }

  inventory.append(
    toRecord(note, { symbol: anchor, symbolType: 'anchor', sourceFile, lineNumber })
  );
  return 'created';
}

/**
 * Declarations never merge: each bound declaration is its own record.
 */
export function drainToDeclaration(
  inventory: Inventory,
  note: Note,
  sourceFile: string,
  declaration: Declaration,
  lineNumber: number
): DrainOutcome {
  inventory.append(
    toRecord(note, {
      symbol: declaration.symbol,
      symbolType: declaration.symbolType,
      sourceFile,
      lineNumber,
    })
  );
  return 'created';
}
