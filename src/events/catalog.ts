/**
 * Event kind catalog
 *
 * Message and data templates use `{name}` placeholders filled from the
 * context passed to `EventLog.append`.
 */

import type { EventKind, EventKindSpec } from '../types/index.js';

export const EVENT_KINDS: Record<EventKind, EventKindSpec> = {
  'path-does-not-exist': {
    level: 'error',
    err: 'usage',
    tags: ['scan', 'paths'],
    msgTemplate: 'Scan path does not exist: {path}',
    dataTemplate: { path: '{path}' },
  },
  'cannot-glob-a-file': {
    level: 'warning',
    err: 'none',
    tags: ['scan', 'paths'],
    msgTemplate: '--files ignored: scan path is a single file ({path})',
    dataTemplate: { path: '{path}' },
  },
  'cannot-antiglob-a-file': {
    level: 'warning',
    err: 'none',
    tags: ['scan', 'paths'],
    msgTemplate: '--exclude ignored: scan path is a single file ({path})',
    dataTemplate: { path: '{path}' },
  },
  'meta-grammar-error': {
    level: 'error',
    err: 'schema',
    tags: ['scan', 'grammar'],
    msgTemplate: '{file}:{line}: {reason}\n{text}',
    dataTemplate: { file: '{file}', line: '{line}', token: '{token}', text: '{text}' },
  },
  'orphan-note': {
    level: 'warning',
    err: 'none',
    tags: ['scan', 'binding'],
    msgTemplate: '{file}:{line}: meta note never bound to a symbol (reached end of file)',
    dataTemplate: { file: '{file}', line: '{line}' },
  },
  'duplicate-note-id': {
    level: 'info',
    err: 'none',
    tags: ['db', 'identity'],
    msgTemplate: 'Duplicate id {id}\nfirst:  {first}\nsecond: {second}',
    dataTemplate: { id: '{id}', first: '{first}', second: '{second}', firstIndex: '{firstIndex}', secondIndex: '{secondIndex}' },
  },
  'file-read-failed': {
    level: 'error',
    err: 'io',
    tags: ['scan', 'io'],
    msgTemplate: 'Cannot read {file}: {reason}',
    dataTemplate: { file: '{file}', reason: '{reason}' },
  },
  'file-too-large': {
    level: 'warning',
    err: 'none',
    tags: ['scan', 'io'],
    msgTemplate: 'Skipped {file}: size {size} bytes exceeds limit {limit} bytes',
    dataTemplate: { file: '{file}', size: '{size}', limit: '{limit}' },
  },
  'inventory-invalid': {
    level: 'error',
    err: 'schema',
    tags: ['indexes', 'schema'],
    msgTemplate: 'Invalid inventory {file}:\n{reason}',
    dataTemplate: { file: '{file}', reason: '{reason}' },
  },
  'scan-halted': {
    level: 'info',
    err: 'none',
    tags: ['scan', 'policy'],
    msgTemplate: 'Scan halted by fail policy "{policy}" after {file}',
    dataTemplate: { policy: '{policy}', file: '{file}' },
  },
};
