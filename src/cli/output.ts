/**
 * Output routing for CLI commands
 *
 * `--inventory` / `--indexes` take an optional value:
 *   - omitted entirely: emitted to the default path only when neither flag is given
 *   - given without a value: default path
 *   - `stdout`: standard output
 *   - anything else: that file path
 */

import path from 'node:path';
import type { OutputFormat } from '../config/index.js';
import { UsageError } from '../errors.js';
import { toJsonText, writeJson } from '../inventory/index.js';

export type OutputOption = string | boolean | undefined;

export type Destination = { kind: 'stdout' } | { kind: 'file'; path: string };

export interface ScanEmits {
  inventory: boolean;
  indexes: boolean;
}

export interface ScanDestinations {
  inventory: Destination | null;
  indexes: Destination | null;
}

export function decideScanEmits(inventory: OutputOption, indexes: OutputOption): ScanEmits {
  const inventorySpecified = inventory !== undefined && inventory !== false;
  const indexesSpecified = indexes !== undefined && indexes !== false;

  if (!inventorySpecified && !indexesSpecified) {
    return { inventory: true, indexes: true };
  }
  return { inventory: inventorySpecified, indexes: indexesSpecified };
}

export function routeOne(option: OutputOption, defaultPath: string): Destination {
  if (typeof option === 'string') {
    if (option === 'stdout') return { kind: 'stdout' };
    return { kind: 'file', path: path.resolve(option) };
  }
  return { kind: 'file', path: defaultPath };
}

/**
 * Route each emitted artifact independently; at most one may go to stdout.
 */
export function decideDestinations(
  options: { inventory?: OutputOption; indexes?: OutputOption },
  defaults: { inventory: string; indexes: string }
): ScanDestinations {
  const emits = decideScanEmits(options.inventory, options.indexes);

  const destinations: ScanDestinations = {
    inventory: emits.inventory ? routeOne(options.inventory, defaults.inventory) : null,
    indexes: emits.indexes ? routeOne(options.indexes, defaults.indexes) : null,
  };

  if (destinations.inventory?.kind === 'stdout' && destinations.indexes?.kind === 'stdout') {
    throw new UsageError('At most one output may be routed to stdout per invocation.');
  }

  return destinations;
}

export function resolveFormat(
  pretty: boolean | undefined,
  compact: boolean | undefined,
  fallback: OutputFormat
): OutputFormat {
  if (pretty && compact) {
    throw new UsageError('Cannot combine --pretty and --compact');
  }
  if (pretty) return 'pretty';
  if (compact) return 'compact';
  return fallback;
}

export function usesStdout(...destinations: Array<Destination | null>): boolean {
  return destinations.some(d => d?.kind === 'stdout');
}

export async function emitArtifact(
  destination: Destination,
  value: unknown,
  format: OutputFormat
): Promise<void> {
  if (destination.kind === 'stdout') {
    process.stdout.write(toJsonText(value, format));
    return;
  }
  await writeJson(destination.path, value, format);
}

export function describeDestination(destination: Destination): string {
  return destination.kind === 'stdout' ? 'stdout' : destination.path;
}
