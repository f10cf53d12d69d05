/**
 * metanote - extract structured meta comments and index the symbols they annotate
 *
 * The scanner binds `# meta:` and `# doc:` comment blocks to the declaration
 * or anchor they describe, producing an ordered inventory of records and a
 * set of lookup indexes derived from it.
 */

// Types
export * from './types/index.js';

// Errors
export { MetanoteError, UsageError, InternalError } from './errors.js';

// Scanner
export {
  MetaScanner,
  Inventory,
  scanLines,
  scanSource,
  splitLines,
  classifyLine,
  docPayload,
  findDeclaration,
  parseMetaLine,
  isMetaLine,
  deriveId,
  resolveId,
  findDuplicateIds,
  checkForDuplicateIds,
  type ScannerConfig,
  type ScanResult,
  type SourceFile,
  type ScanContext,
  type FileScanResult,
  type FileScanStatus,
  type LineClass,
  type Declaration,
  type ParsedMetaLine,
  type ParseMetaResult,
  type GrammarError,
  type Locator,
  type DuplicateId,
} from './scanner/index.js';

// Indexes
export { buildIndexes, sortRecords } from './indexes/index.js';

// Inventory
export {
  metaRecordSchema,
  inventorySchema,
  loadInventory,
  validateInventory,
  toJsonText,
  writeJson,
  writeTextAtomic,
  type LoadInventoryResult,
} from './inventory/index.js';

// Query
export { queryRecords, filterRecords, type QueryOptions, type QueryResult } from './query/index.js';

// Events
export { EventLog, EVENT_KINDS, EXIT_CODES } from './events/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  resolveScanSetup,
  type Config,
  type LocatedConfig,
  type ScanSetup,
} from './config/index.js';
