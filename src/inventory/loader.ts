/**
 * Inventory file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import type { MetaRecord } from '../types/index.js';
import { inventorySchema } from './schema.js';

export type LoadInventoryResult =
  | { success: true; records: MetaRecord[] }
  | { success: false; error: string };

/**
 * Validate parsed JSON against the strict record schema. Issues are
 * reported with their path, e.g. `[3].line_number: ...`.
 */
export function validateInventory(data: unknown): LoadInventoryResult {
  const result = inventorySchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors
      .map(e => {
        const [index, ...rest] = e.path;
        const where = index === undefined ? '(root)' : `[${index}]${rest.map(p => `.${p}`).join('')}`;
        return `  - ${where}: ${e.message}`;
      })
      .join('\n');
    return { success: false, error: errors };
  }
  return { success: true, records: result.data };
}

export async function loadInventory(inventoryPath: string): Promise<LoadInventoryResult> {
  const absolutePath = path.resolve(inventoryPath);

  if (!fs.existsSync(absolutePath)) {
    return { success: false, error: `Inventory file not found: ${absolutePath}` };
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return { success: false, error: `Invalid JSON in inventory file: ${absolutePath}` };
  }

  return validateInventory(data);
}
