export { metaRecordSchema, inventorySchema, callersSchema } from './schema.js';
export { loadInventory, validateInventory, type LoadInventoryResult } from './loader.js';
export { toJsonText, writeTextAtomic, writeJson } from './serialize.js';
