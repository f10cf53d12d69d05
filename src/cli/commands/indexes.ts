/**
 * indexes command - Build indexes from an existing inventory file
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadInventory } from '../../inventory/index.js';
import { buildIndexes } from '../../indexes/index.js';
import { EventLog, EXIT_CODES } from '../../events/index.js';
import { emitArtifact, resolveFormat, routeOne, type OutputOption } from '../output.js';
import { reportError } from '../errors.js';

export interface IndexesCommandOptions {
  indexes?: OutputOption;
  pretty?: boolean;
  compact?: boolean;
}

export async function runIndexes(inventoryFile: string, options: IndexesCommandOptions): Promise<number> {
  const format = resolveFormat(options.pretty, options.compact, 'compact');
  const inventoryPath = path.resolve(inventoryFile);
  const destination = routeOne(
    options.indexes,
    path.join(path.dirname(inventoryPath), 'indexes.json')
  );

  const loaded = await loadInventory(inventoryPath);
  if (!loaded.success) {
    const events = new EventLog();
    events.append('inventory-invalid', { file: inventoryPath, reason: loaded.error });
    for (const line of events.presentationLines()) {
      console.error(line);
    }
    return events.calculateExitCode();
  }

  await emitArtifact(destination, buildIndexes(loaded.records), format);
  return EXIT_CODES.success;
}

export const indexesCommand = new Command('indexes')
  .description('Generate indexes from an existing inventory file')
  .argument('<inventory-file>', 'Path to an inventory JSON file')
  .option('--indexes [dest]', 'Indexes destination (a file path or "stdout")')
  .option('--pretty', 'Pretty-print JSON output')
  .option('--compact', 'Minified JSON output')
  .action(async (inventoryFile: string, options: IndexesCommandOptions) => {
    let exitCode: number;
    try {
      exitCode = await runIndexes(inventoryFile, options);
    } catch (error) {
      exitCode = reportError(error);
    }
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
