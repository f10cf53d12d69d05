/**
 * Scan orchestration: discover files, run the per-file state machine over
 * each one, then check identities across the whole inventory.
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import type { FailPolicy, MetaRecord } from '../types/index.js';
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE } from '../config/schema.js';
import { EventLog } from '../events/index.js';
import { scanSource, type FileScanResult } from './file-scanner.js';
import { checkForDuplicateIds } from './identity.js';
import { Inventory } from './inventory.js';

export interface ScannerConfig {
  /** File or directory to scan */
  rootPath: string;
  include?: string[];
  exclude?: string[];
  failPolicy?: FailPolicy;
  /** Bytes; 0 disables the limit */
  maxFileSize?: number;
  /** Shared event log; a fresh one is created when omitted */
  events?: EventLog;
}

export interface SourceFile {
  absolutePath: string;
  /** Path relative to the scan root, `/`-separated */
  sourceFile: string;
}

export interface ScanResult {
  records: MetaRecord[];
  events: EventLog;
  totalFiles: number;
  scannedFiles: number;
  skippedFiles: number;
  halted: boolean;
  durationMs: number;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

interface ResolvedScannerConfig {
  rootPath: string;
  include: string[] | undefined;
  exclude: string[] | undefined;
  maxFileSize: number;
}

export class MetaScanner {
  private config: ResolvedScannerConfig;
  readonly events: EventLog;

  constructor(config: ScannerConfig) {
    this.config = {
      rootPath: path.resolve(config.rootPath),
      include: config.include,
      exclude: config.exclude,
      maxFileSize: config.maxFileSize ?? 1024 * 1024,
    };
    this.events = config.events ?? new EventLog(config.failPolicy ?? 'warn');
  }

  /**
   * Files to scan in deterministic order, or null when the scan path is
   * missing (reported to the event log).
   */
  async discoverFiles(): Promise<SourceFile[] | null> {
    const { rootPath, include, exclude } = this.config;

    if (!fs.existsSync(rootPath)) {
      this.events.append('path-does-not-exist', { path: rootPath });
      return null;
    }

    if (fs.statSync(rootPath).isFile()) {
      if (include) this.events.append('cannot-glob-a-file', { path: rootPath });
      if (exclude) this.events.append('cannot-antiglob-a-file', { path: rootPath });
      return [{ absolutePath: rootPath, sourceFile: path.basename(rootPath) }];
    }

    const files = await fg(include ?? DEFAULT_INCLUDE, {
      cwd: rootPath,
      ignore: exclude ?? DEFAULT_EXCLUDE,
      onlyFiles: true,
      absolute: false,
    });

    return files
      .sort(compareStrings)
      .map(relativePath => ({
        absolutePath: path.join(rootPath, relativePath),
        sourceFile: relativePath.replace(/\\/g, '/'),
      }));
  }

  async scan(): Promise<ScanResult> {
    const startTime = Date.now();
    const inventory = new Inventory();
    let scannedFiles = 0;
    let skippedFiles = 0;
    let halted = false;

    const files = await this.discoverFiles();
    if (files === null) {
      return {
        records: [],
        events: this.events,
        totalFiles: 0,
        scannedFiles: 0,
        skippedFiles: 0,
        halted: true,
        durationMs: Date.now() - startTime,
      };
    }

    for (const file of files) {
      const outcome = await this.scanFile(file, inventory);
      if (outcome === null) {
        skippedFiles++;
      } else {
        scannedFiles++;
      }

      if (this.events.shouldHalt()) {
        halted = true;
        this.events.append('scan-halted', { policy: this.events.failPolicy, file: file.sourceFile });
        break;
      }
    }

    const records = inventory.toArray();
    checkForDuplicateIds(records, this.events);

    return {
      records,
      events: this.events,
      totalFiles: files.length,
      scannedFiles,
      skippedFiles,
      halted,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Read one file and run it through the state machine. Oversized files
   * are skipped on their stat size without being read. Returns null when
   * the file was skipped.
   */
  private async scanFile(file: SourceFile, inventory: Inventory): Promise<FileScanResult | null> {
    const { maxFileSize } = this.config;
    let content: string;
    try {
      if (maxFileSize > 0) {
        const { size } = await fs.promises.stat(file.absolutePath);
        if (size > maxFileSize) {
          this.events.append('file-too-large', { file: file.sourceFile, size, limit: maxFileSize });
          return null;
        }
      }
      content = await fs.promises.readFile(file.absolutePath, 'utf-8');
    } catch (error) {
      this.events.append('file-read-failed', {
        file: file.sourceFile,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    return scanSource({ sourceFile: file.sourceFile, inventory, events: this.events }, content);
  }
}

export { scanLines, scanSource, splitLines, type ScanContext, type FileScanResult, type FileScanStatus } from './file-scanner.js';
export { classifyLine, docPayload, DOC_MARKER, type LineClass } from './classifier.js';
export { findDeclaration, type Declaration, type DeclarationType } from './declarations.js';
export {
  parseMetaLine,
  isMetaLine,
  META_RE,
  RESERVED_KEYS,
  type ParsedMetaLine,
  type ParseMetaResult,
  type GrammarError,
  type ReservedKey,
} from './grammar.js';
export { deriveId, resolveId, findDuplicateIds, checkForDuplicateIds, type Locator, type DuplicateId } from './identity.js';
export { Inventory } from './inventory.js';
export { drainToAnchor, drainToDeclaration, mergeIntoAnchor, type DrainOutcome } from './drain.js';
export { createNote, applyMetaLine, applyDocLine, parseCallers, unionLowercase, uniqueFlags, type Note } from './note.js';
