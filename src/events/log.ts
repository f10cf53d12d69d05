/**
 * Event log: collects diagnostics, applies the fail policy and derives
 * the process exit code.
 */

import type {
  EventContext,
  EventKind,
  FailPolicy,
  MetaEvent,
} from '../types/index.js';
import { InternalError } from '../errors.js';
import { EVENT_KINDS } from './catalog.js';

const TOKEN_RE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Exit codes:
 *   0 success, 1 usage, 2 parse/schema, 3 fail policy halt, 4 io, 5 internal
 */
export const EXIT_CODES = {
  success: 0,
  usage: 1,
  schema: 2,
  halt: 3,
  io: 4,
  internal: 5,
} as const;

export function resolveTemplate(template: string, context: EventContext): string {
  return template.replace(TOKEN_RE, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}

export class EventLog {
  readonly events: MetaEvent[] = [];
  private stopRequested = false;

  constructor(readonly failPolicy: FailPolicy = 'warn') {}

  append(kind: EventKind, context: EventContext = {}): MetaEvent {
    const spec = EVENT_KINDS[kind];
    if (!spec) {
      throw new InternalError(`Unknown event kind: ${String(kind)}`);
    }

    const data: Record<string, string> = {};
    for (const [key, template] of Object.entries(spec.dataTemplate)) {
      data[key] = resolveTemplate(template, context);
    }

    const event: MetaEvent = {
      level: spec.level,
      kind,
      tags: [...spec.tags],
      err: spec.err,
      msg: resolveTemplate(spec.msgTemplate, context),
      data,
    };
    this.events.push(event);

    // fail policy hook
    if (event.level === 'error' && this.failPolicy !== 'warn') {
      this.stopRequested = true;
    } else if (event.level === 'warning' && this.failPolicy === 'strict') {
      this.stopRequested = true;
    }

    return event;
  }

  shouldHalt(): boolean {
    return this.stopRequested;
  }

  count(kind: EventKind): number {
    return this.events.filter(e => e.kind === kind).length;
  }

  ofKind(kind: EventKind): MetaEvent[] {
    return this.events.filter(e => e.kind === kind);
  }

  calculateExitCode(): number {
    if (this.stopRequested) {
      return EXIT_CODES.halt;
    }

    let hasInternal = false;
    let hasUsage = false;
    let hasSchema = false;
    let hasIo = false;

    for (const event of this.events) {
      if (event.level !== 'error') continue;

      if (event.err === 'internal') hasInternal = true;
      else if (event.err === 'usage') hasUsage = true;
      else if (event.err === 'schema') hasSchema = true;
      else if (event.err === 'io') hasIo = true;
    }

    if (hasInternal) return EXIT_CODES.internal;
    if (hasUsage) return EXIT_CODES.usage;
    if (hasSchema) return EXIT_CODES.schema;
    if (hasIo) return EXIT_CODES.io;

    return EXIT_CODES.success;
  }

  /**
   * Human readable summary lines, one block per event.
   */
  presentationLines(): string[] {
    const out: string[] = [];

    for (const event of this.events) {
      let prefix: string;
      if (event.level === 'info') prefix = '[info]';
      else if (event.level === 'warning') prefix = '[warn]';
      else prefix = '[err]';

      const indent = ' '.repeat(prefix.length + 1);
      event.msg.split('\n').forEach((line, i) => {
        out.push(i === 0 ? `${prefix} ${line}` : `${indent}${line}`);
      });
    }

    return out;
  }
}
