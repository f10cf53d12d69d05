/**
 * Meta comment grammar
 *
 *   # meta: [@anchor] [#id] key=value[,value...] ...
 *
 * Tokens are whitespace separated. Keys in RESERVED_KEYS are routed to
 * `reserved`, everything else to `custom`. A key repeated on one line keeps
 * its last value list.
 */

export const META_RE = /^\s*#\s*meta:(.*)$/;

const ANCHOR_TOKEN_RE = /^@([A-Za-z0-9_-]+)$/;
const KEY_RE = /^[A-Za-z0-9_-]+$/;

export type ReservedKey = 'systems' | 'roles' | 'threads' | 'callers' | 'flags' | 'assign_type';

export const RESERVED_KEYS: readonly ReservedKey[] = [
  'systems',
  'roles',
  'threads',
  'callers',
  'flags',
  'assign_type',
];

const KEY_ALIASES: ReadonlyMap<string, ReservedKey> = new Map<string, ReservedKey>([['modules', 'systems']]);

export interface ParsedMetaLine {
  anchor: string | null;
  explicitId: string | null;
  reserved: Partial<Record<ReservedKey, string[]>>;
  custom: Map<string, string[]>;
}

export interface GrammarError {
  reason: string;
  token: string;
}

export type ParseMetaResult =
  | { success: true; value: ParsedMetaLine }
  | { success: false; error: GrammarError };

export function isMetaLine(line: string): boolean {
  return META_RE.test(line);
}

function toReservedKey(key: string): ReservedKey | null {
  const aliased = KEY_ALIASES.get(key);
  if (aliased) return aliased;
  return RESERVED_KEYS.find(k => k === key) ?? null;
}

function fail(reason: string, token: string): ParseMetaResult {
  return { success: false, error: { reason, token } };
}

/**
 * Parse a `# meta:` line into its anchor, explicit id and key/value groups.
 */
export function parseMetaLine(line: string): ParseMetaResult {
  const match = META_RE.exec(line);
  if (!match) {
    return fail('not a meta line', line);
  }

  const parsed: ParsedMetaLine = {
    anchor: null,
    explicitId: null,
    reserved: {},
    custom: new Map(),
  };

  const body = (match[1] ?? '').trim();
  if (body === '') {
    return { success: true, value: parsed };
  }

  for (const token of body.split(/\s+/)) {
    if (token.startsWith('@')) {
      const anchorMatch = ANCHOR_TOKEN_RE.exec(token);
      if (!anchorMatch?.[1]) {
        return fail(`bad anchor token: ${token}`, token);
      }
      parsed.anchor = anchorMatch[1];
      continue;
    }

    if (token.startsWith('#')) {
      const id = token.slice(1);
      if (id === '') {
        return fail('empty id token', token);
      }
      parsed.explicitId = id;
      continue;
    }

    const sides = token.split('=');
    if (sides.length !== 2) {
      return fail(
        sides.length < 2
          ? `bad entry (missing '='): ${token}`
          : `bad entry (more than one '='): ${token}`,
        token
      );
    }

    const [key = '', rhs = ''] = sides;
    if (!KEY_RE.test(key)) {
      return fail(`bad key: ${key === '' ? '(empty)' : key} in ${token}`, token);
    }

    const values = rhs === '' ? [] : rhs.split(',');
    if (values.some(v => v === '')) {
      return fail(`empty value in: ${token}`, token);
    }

    const reservedKey = toReservedKey(key);
    if (reservedKey) {
      parsed.reserved[reservedKey] = values;
    } else {
      parsed.custom.set(key, values);
    }
  }

  return { success: true, value: parsed };
}
