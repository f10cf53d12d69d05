/**
 * Note-in-progress: the mutable accumulator that becomes a MetaRecord
 * when it drains.
 */

import { WILDCARD_CALLERS, type Callers } from '../types/index.js';
import type { ParsedMetaLine } from './grammar.js';

export interface Note {
  /** Line of the first meta/doc line absorbed, used for orphan reports */
  firstLine: number;
  explicitId: string | null;
  raw: string[];
  doc: string[];
  systems: string[];
  roles: string[];
  threads: string[];
  /** undefined until a `callers=` token is seen */
  callers: Callers | undefined;
  flags: string;
  assignType: string;
  custom: Map<string, string[]>;
}

export function createNote(firstLine: number): Note {
  return {
    firstLine,
    explicitId: null,
    raw: [],
    doc: [],
    systems: [],
    roles: [],
    threads: [],
    callers: undefined,
    flags: '',
    assignType: '',
    custom: new Map(),
  };
}

/**
 * Lowercase and dedupe, keeping first-occurrence order.
 */
export function unionLowercase(existing: readonly string[], additions: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of [...existing, ...additions]) {
    const lower = value.toLowerCase();
    if (seen.has(lower)) continue;
    seen.add(lower);
    out.push(lower);
  }
  return out;
}

/**
 * Distinct characters in first-occurrence order (case-sensitive).
 */
export function uniqueFlags(flags: string): string {
  return Array.from(new Set(Array.from(flags))).join('');
}

/**
 * Interpret a `callers=` value list.
 *
 * - `[]`          -> `[]` (explicitly no callers)
 * - `['*']`       -> `'*'`
 * - `['3']`       -> `3`
 * - `['a']`       -> `['a']`
 * - `['a', 'b']`  -> `['a', 'b']` (never coerced to numbers)
 */
export function parseCallers(values: readonly string[]): Callers {
  if (values.length === 1) {
    const only = values[0] ?? '';
    if (only === WILDCARD_CALLERS) return WILDCARD_CALLERS;
    if (/^[0-9]+$/.test(only)) return Number.parseInt(only, 10);
  }
  return [...values];
}

/**
 * Append each key's values, never replacing what is already there.
 */
export function extendCustom(
  target: Map<string, string[]>,
  additions: ReadonlyMap<string, readonly string[]>
): void {
  for (const [key, values] of additions) {
    const current = target.get(key);
    if (current) {
      current.push(...values);
    } else {
      target.set(key, [...values]);
    }
  }
}

export function applyDocLine(note: Note, rawLine: string, payload: string): void {
  note.raw.push(rawLine);
  note.doc.push(payload);
}

/**
 * Fold one parsed meta line into the note. Anchor handling is left to
 * the caller since it drains the note.
 */
export function applyMetaLine(note: Note, rawLine: string, parsed: ParsedMetaLine): void {
  note.raw.push(rawLine);

  const { reserved } = parsed;
  if (reserved.systems) note.systems = unionLowercase(note.systems, reserved.systems);
  if (reserved.roles) note.roles = unionLowercase(note.roles, reserved.roles);
  if (reserved.threads) note.threads = unionLowercase(note.threads, reserved.threads);

  if (reserved.callers) {
    note.callers = parseCallers(reserved.callers);
  }

  // A later flags token replaces the pending set; only anchor merges concatenate.
  if (reserved.flags && reserved.flags.length > 0) {
    note.flags = uniqueFlags(reserved.flags.join(''));
  }

  if (reserved.assign_type) {
    const assignType = reserved.assign_type.join(',');
    if (assignType !== '') {
      note.assignType = assignType;
    }
  }

  extendCustom(note.custom, parsed.custom);

  if (parsed.explicitId !== null) {
    note.explicitId = parsed.explicitId;
  }
}
