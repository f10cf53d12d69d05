/**
 * Diagnostic event types
 */

export type EventLevel = 'info' | 'warning' | 'error';

/** Error category used for exit code calculation */
export type EventErrorClass = 'none' | 'usage' | 'schema' | 'io' | 'internal';

export type EventKind =
  | 'path-does-not-exist'
  | 'cannot-glob-a-file'
  | 'cannot-antiglob-a-file'
  | 'meta-grammar-error'
  | 'orphan-note'
  | 'duplicate-note-id'
  | 'file-read-failed'
  | 'file-too-large'
  | 'inventory-invalid'
  | 'scan-halted';

export type FailPolicy = 'warn' | 'halt' | 'strict';

export type EventContext = Record<string, string | number>;

export interface EventKindSpec {
  level: EventLevel;
  err: EventErrorClass;
  tags: string[];
  msgTemplate: string;
  dataTemplate: Record<string, string>;
}

export interface MetaEvent {
  level: EventLevel;
  kind: EventKind;
  tags: string[];
  err: EventErrorClass;
  msg: string;
  data: Record<string, string>;
}
