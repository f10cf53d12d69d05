/**
 * Bindable declaration detection
 */

import type { SymbolType } from '../types/index.js';

const DEF_RE = /^\s*(?:async\s+)?def\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(/;
const CLASS_RE = /^\s*class\s+([A-Za-z_][A-Za-z0-9_]*)\s*[(:]/;
// `name = ...` but not `name == ...`
const ASSIGN_RE = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)/;

export type DeclarationType = Exclude<SymbolType, 'anchor'>;

export interface Declaration {
  symbol: string;
  symbolType: DeclarationType;
}

const PATTERNS: ReadonlyArray<[RegExp, DeclarationType]> = [
  [DEF_RE, 'function'],
  [CLASS_RE, 'class'],
  [ASSIGN_RE, 'variable'],
];

/**
 * Find the symbol declared on a line, if any. Functions win over classes,
 * classes over assignments.
 */
export function findDeclaration(line: string): Declaration | null {
  for (const [pattern, symbolType] of PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1]) {
      return { symbol: match[1], symbolType };
    }
  }
  return null;
}
