#!/usr/bin/env node

/**
 * metanote CLI
 */

import { Command } from 'commander';
import { scanCommand } from './commands/scan.js';
import { indexesCommand } from './commands/indexes.js';
import { queryCommand } from './commands/query.js';
import { VERSION } from '../version.js';

const program = new Command();

program
  .name('metanote')
  .description('metanote - extract meta comments and index the symbols they annotate')
  .version(VERSION);

// Register commands
program.addCommand(scanCommand);
program.addCommand(indexesCommand);
program.addCommand(queryCommand);

await program.parseAsync(process.argv);
