/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const DEFAULT_INCLUDE = ['**/*.py', '**/*.pyw'];

export const DEFAULT_EXCLUDE = [
  '**/.git/**',
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/build/**',
  '**/dist/**',
  '**/node_modules/**',
];

export const failPolicySchema = z.enum(['warn', 'halt', 'strict']);
export const outputFormatSchema = z.enum(['compact', 'pretty']);

export const scannerConfigSchema = z.object({
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
});

export const outputConfigSchema = z.object({
  inventory: z.string().min(1).default('inventory.json'),
  indexes: z.string().min(1).default('indexes.json'),
});

export const configSchema = z.object({
  include: z.array(z.string()).default(() => [...DEFAULT_INCLUDE]),
  exclude: z.array(z.string()).default(() => [...DEFAULT_EXCLUDE]),
  output: outputConfigSchema.default({}),
  format: outputFormatSchema.default('compact'),
  fail: failPolicySchema.default('warn'),
  scanner: scannerConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type ScannerConfigOptions = z.infer<typeof scannerConfigSchema>;
export type OutputFormat = Config['format'];
