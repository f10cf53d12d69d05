/**
 * Per-file binding state machine
 *
 * Lines are consumed in order. Meta and doc lines accumulate into a single
 * pending note; the note drains when a meta line names an anchor or when a
 * bindable declaration is reached. Blank lines, decorators, plain comments
 * and unrelated statements never close the pending window. A note still
 * pending at end of file is reported as an orphan and dropped.
 */

import type { EventLog } from '../events/index.js';
import { classifyLine } from './classifier.js';
import { drainToAnchor, drainToDeclaration } from './drain.js';
import { parseMetaLine } from './grammar.js';
import type { Inventory } from './inventory.js';
import { applyDocLine, applyMetaLine, createNote, type Note } from './note.js';

export interface ScanContext {
  /** Path relative to the scan root, `/`-separated */
  sourceFile: string;
  inventory: Inventory;
  events: EventLog;
}

export type FileScanStatus = 'complete' | 'halted';

export interface FileScanResult {
  status: FileScanStatus;
  linesRead: number;
  recordsCreated: number;
  anchorMerges: number;
  grammarErrors: number;
  orphaned: boolean;
}

/**
 * Split file text into lines without terminators. A trailing newline does
 * not start another line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

export function scanLines(context: ScanContext, lines: Iterable<string>): FileScanResult {
  const { sourceFile, inventory, events } = context;
  const result: FileScanResult = {
    status: 'complete',
    linesRead: 0,
    recordsCreated: 0,
    anchorMerges: 0,
    grammarErrors: 0,
    orphaned: false,
  };

  let pending: Note | null = null;
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    result.linesRead = lineNumber;

    const lineClass = classifyLine(line);

    switch (lineClass.kind) {
      case 'doc': {
        if (!pending) pending = createNote(lineNumber);
        applyDocLine(pending, line, lineClass.payload);
        break;
      }

      case 'meta': {
        const parsed = parseMetaLine(line);
        if (!parsed.success) {
          result.grammarErrors++;
          events.append('meta-grammar-error', {
            file: sourceFile,
            line: lineNumber,
            reason: parsed.error.reason,
            token: parsed.error.token,
            text: line.trim(),
          });
          break;
        }

        if (!pending) pending = createNote(lineNumber);
        applyMetaLine(pending, line, parsed.value);

        if (parsed.value.anchor !== null) {
          const outcome = drainToAnchor(inventory, pending, sourceFile, parsed.value.anchor, lineNumber);
          if (outcome === 'merged') result.anchorMerges++;
          else result.recordsCreated++;
          pending = null;
        }
        break;
      }

      case 'declaration': {
        if (pending) {
          drainToDeclaration(inventory, pending, sourceFile, lineClass.declaration, lineNumber);
          result.recordsCreated++;
          pending = null;
        }
        break;
      }

      case 'skippable':
      case 'other':
        break;
    }

    if (events.shouldHalt()) {
      result.status = 'halted';
      return result;
    }
  }

  if (pending) {
    result.orphaned = true;
    events.append('orphan-note', { file: sourceFile, line: pending.firstLine });
  }

  return result;
}

export function scanSource(context: ScanContext, text: string): FileScanResult {
  return scanLines(context, splitLines(text));
}
