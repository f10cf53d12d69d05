/**
 * Line classification for the binding state machine
 */

import { isMetaLine } from './grammar.js';
import { findDeclaration, type Declaration } from './declarations.js';

export const DOC_MARKER = '# doc:';

const BLANK_RE = /^\s*$/;
const DECORATOR_RE = /^\s*@/;
const COMMENT_RE = /^\s*#/;

export type LineClass =
  | { kind: 'doc'; payload: string }
  | { kind: 'meta' }
  | { kind: 'skippable' }
  | { kind: 'declaration'; declaration: Declaration }
  | { kind: 'other' };

/**
 * Extract the doc payload from a `# doc:` line, or null for any other line.
 * At most one space after the marker is dropped.
 */
export function docPayload(line: string): string | null {
  const body = line.trimStart();
  if (!body.startsWith(DOC_MARKER)) {
    return null;
  }
  const rest = body.slice(DOC_MARKER.length);
  return rest.startsWith(' ') ? rest.slice(1) : rest;
}

export function classifyLine(line: string): LineClass {
  const payload = docPayload(line);
  if (payload !== null) {
    return { kind: 'doc', payload };
  }

  if (isMetaLine(line)) {
    return { kind: 'meta' };
  }

  if (BLANK_RE.test(line) || DECORATOR_RE.test(line) || COMMENT_RE.test(line)) {
    return { kind: 'skippable' };
  }

  const declaration = findDeclaration(line);
  if (declaration) {
    return { kind: 'declaration', declaration };
  }

  return { kind: 'other' };
}
