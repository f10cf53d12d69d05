/**
 * Strict inventory schema for re-loading a previously written inventory
 */

import { z } from 'zod';

export const callersSchema = z.union([
  z.literal('*'),
  z.number().int().min(0),
  z.array(z.string()),
]);

export const metaRecordSchema = z
  .object({
    id: z.string().min(1),
    symbol: z.string().min(1),
    symbol_type: z.enum(['function', 'class', 'variable', 'anchor']),
    source_file: z.string().min(1),
    line_number: z.number().int().positive(),
    raw: z.array(z.string()),
    doc: z.array(z.string()),
    systems: z.array(z.string()),
    roles: z.array(z.string()),
    threads: z.array(z.string()),
    callers: callersSchema,
    flags: z.string(),
    assign_type: z.string(),
    custom: z.record(z.string(), z.array(z.string())),
  })
  .strict();

export const inventorySchema = z.array(metaRecordSchema);
