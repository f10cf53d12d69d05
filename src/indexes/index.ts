/**
 * Index exports
 */

export { buildIndexes, sortRecords, compareKeys } from './builder.js';
