/**
 * scan command - Scan source files and emit inventory and indexes
 */

import { Command, Option } from 'commander';
import { MetaScanner } from '../../scanner/index.js';
import { buildIndexes } from '../../indexes/index.js';
import { resolveScanSetup, failPolicySchema } from '../../config/index.js';
import {
  decideDestinations,
  describeDestination,
  emitArtifact,
  resolveFormat,
  usesStdout,
  type OutputOption,
} from '../output.js';
import { reportError } from '../errors.js';

export interface ScanCommandOptions {
  config?: string;
  inventory?: OutputOption;
  indexes?: OutputOption;
  pretty?: boolean;
  compact?: boolean;
  files?: string[];
  exclude?: string[];
  fail?: string;
  verbose?: boolean;
}

/**
 * Run a scan and return the process exit code.
 */
export async function runScan(target: string, options: ScanCommandOptions): Promise<number> {
  const { rootPath, isFile, config, configSource, outputs } = await resolveScanSetup(target, options.config);

  const format = resolveFormat(options.pretty, options.compact, config.format);
  const failPolicy = failPolicySchema.parse(options.fail ?? config.fail);
  const destinations = decideDestinations(options, outputs);

  // keep stdout clean when an artifact is written there
  const log = usesStdout(destinations.inventory, destinations.indexes) ? console.error : console.log;

  const scanner = new MetaScanner({
    rootPath,
    include: isFile ? options.files : options.files ?? config.include,
    exclude: isFile ? options.exclude : options.exclude ?? config.exclude,
    failPolicy,
    maxFileSize: config.scanner.maxFileSize,
  });

  if (options.verbose) {
    log(`Scanning ${rootPath}...`);
    log(`Config: ${configSource ?? '(defaults)'}\n`);
  }

  const result = await scanner.scan();

  for (const line of result.events.presentationLines()) {
    console.error(line);
  }

  if (!result.halted) {
    if (destinations.inventory) {
      await emitArtifact(destinations.inventory, result.records, format);
    }
    if (destinations.indexes) {
      await emitArtifact(destinations.indexes, buildIndexes(result.records), format);
    }
  }

  if (options.verbose) {
    log(`Scan ${result.halted ? 'halted' : 'complete'}!\n`);
    log(`  Total files:   ${result.totalFiles}`);
    log(`  Scanned:       ${result.scannedFiles}`);
    log(`  Skipped:       ${result.skippedFiles}`);
    log(`  Records:       ${result.records.length}`);
    log(`  Events:        ${result.events.events.length}`);
    log(`  Duration:      ${result.durationMs}ms`);
    if (!result.halted) {
      if (destinations.inventory) log(`  Inventory:     ${describeDestination(destinations.inventory)}`);
      if (destinations.indexes) log(`  Indexes:       ${describeDestination(destinations.indexes)}`);
    }
  }

  return result.events.calculateExitCode();
}

export const scanCommand = new Command('scan')
  .description('Scan source files for meta comments')
  .argument('<path>', 'File or directory to scan')
  .option('-c, --config <path>', 'Path to config file')
  .option('--inventory [dest]', 'Emit the inventory (default path, a file path, or "stdout")')
  .option('--indexes [dest]', 'Emit the indexes (default path, a file path, or "stdout")')
  .option('--pretty', 'Pretty-print JSON output')
  .option('--compact', 'Minified JSON output')
  .option('--files <patterns...>', 'Glob patterns restricting which files are scanned')
  .option('--exclude <patterns...>', 'Glob patterns excluding files or directories')
  .addOption(new Option('--fail <policy>', 'Failure policy').choices(['warn', 'halt', 'strict']))
  .option('--verbose', 'Show verbose output', false)
  .action(async (target: string, options: ScanCommandOptions) => {
    let exitCode: number;
    try {
      exitCode = await runScan(target, options);
    } catch (error) {
      exitCode = reportError(error);
    }
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
