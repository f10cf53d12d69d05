/**
 * query command - Look up annotated symbols in an inventory
 */

import { Command, Option } from 'commander';
import { loadInventory } from '../../inventory/index.js';
import { queryRecords } from '../../query/index.js';
import type { SymbolType } from '../../types/index.js';
import { EXIT_CODES } from '../../events/index.js';
import { UsageError } from '../../errors.js';
import { reportError } from '../errors.js';

export interface QueryCommandOptions {
  inventory: string;
  file?: string;
  module?: string;
  thread?: string;
  flag?: string;
  type?: SymbolType;
  limit: string;
  json: boolean;
}

function parseLimit(value: string): number {
  const limit = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!(limit >= 1)) {
    throw new UsageError(`Invalid --limit "${value}": expected a positive integer`);
  }
  return limit;
}

export async function runQuery(pattern: string, options: QueryCommandOptions): Promise<number> {
  const limit = parseLimit(options.limit);
  const loaded = await loadInventory(options.inventory);
  if (!loaded.success) {
    console.error(`Error: ${loaded.error}`);
    return EXIT_CODES.schema;
  }

  const results = queryRecords(loaded.records, pattern, {
    file: options.file,
    module: options.module,
    thread: options.thread,
    flag: options.flag,
    type: options.type,
    limit,
  });

  if (options.json) {
    console.log(JSON.stringify(results.map(r => r.record), null, 2));
    return EXIT_CODES.success;
  }

  if (results.length === 0) {
    console.log(`No records found matching "${pattern}"`);
    return EXIT_CODES.success;
  }

  console.log(`Found ${results.length} records matching "${pattern}":\n`);

  for (const { record, score, exact } of results) {
    console.log(`${record.symbol} (${record.symbol_type})`);
    console.log(`  Id:        ${record.id}`);
    console.log(`  File:      ${record.source_file}:${record.line_number}`);
    if (!exact) {
      console.log(`  Relevance: ${Math.round(score * 100)}%`);
    }
    if (record.systems.length > 0) console.log(`  Modules:   ${record.systems.join(', ')}`);
    if (record.threads.length > 0) console.log(`  Threads:   ${record.threads.join(', ')}`);
    if (record.flags) console.log(`  Flags:     ${record.flags}`);
    const callers = Array.isArray(record.callers) ? record.callers.join(', ') || '(none)' : String(record.callers);
    console.log(`  Callers:   ${callers}`);
    for (const line of record.doc) {
      console.log(`  | ${line}`);
    }
    console.log('');
  }

  return EXIT_CODES.success;
}

export const queryCommand = new Command('query')
  .description('Look up annotated symbols (exact name first, then fuzzy matching)')
  .argument('<pattern>', 'Symbol name or search pattern')
  .option('-i, --inventory <path>', 'Path to the inventory file', 'inventory.json')
  .option('--file <path>', 'Only records from this source file')
  .option('--module <name>', 'Only records in this module/system')
  .option('--thread <name>', 'Only records on this thread')
  .option('--flag <char>', 'Only records carrying this flag')
  .addOption(
    new Option('-t, --type <type>', 'Filter by symbol type').choices(['function', 'class', 'variable', 'anchor'])
  )
  .option('-n, --limit <number>', 'Maximum number of results', '20')
  .option('--json', 'Output as JSON', false)
  .action(async (pattern: string, options: QueryCommandOptions) => {
    let exitCode: number;
    try {
      exitCode = await runQuery(pattern, options);
    } catch (error) {
      exitCode = reportError(error);
    }
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
