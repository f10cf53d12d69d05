/**
 * Event module exports
 */

export { EVENT_KINDS } from './catalog.js';
export { EventLog, EXIT_CODES, resolveTemplate } from './log.js';
