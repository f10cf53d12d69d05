/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { MetaRecord } from '../../src/types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'metanote-project-'));

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Build a record with sensible defaults for index and query tests
 */
export function makeRecord(overrides: Partial<MetaRecord> & Pick<MetaRecord, 'symbol'>): MetaRecord {
  const symbolType = overrides.symbol_type ?? 'function';
  const sourceFile = overrides.source_file ?? 'main.py';
  const lineNumber = overrides.line_number ?? 1;
  return {
    id: `${symbolType}:${sourceFile}:${overrides.symbol}:${lineNumber}`,
    symbol_type: symbolType,
    source_file: sourceFile,
    line_number: lineNumber,
    raw: [],
    doc: [],
    systems: [],
    roles: [],
    threads: [],
    callers: '*',
    flags: '',
    assign_type: '',
    custom: {},
    ...overrides,
  };
}

/**
 * Annotated module used by scan tests
 */
export const SAMPLE_SOURCE = `import os

# doc: Open a connection to the store.
# meta: systems=DB threads=main callers=1 flags=D
def connect(url):
    return url

# meta: @retry systems=net flags=R
print("setup")

# meta: roles=api
@dataclass
class Session:
    pass

# meta: @retry threads=worker flags=RT
TIMEOUT = 30
`;
