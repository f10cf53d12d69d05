import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'node:fs';
import { runIndexes } from '../../../src/cli/commands/indexes.js';
import type { SerializedIndexes } from '../../../src/types/index.js';
import { createTempProject, makeRecord, type TempProjectResult } from '../../helpers/fixtures.js';

describe('CLI indexes command', () => {
  let project: TempProjectResult;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    project = createTempProject({
      'data/inventory.json': JSON.stringify([
        makeRecord({ symbol: 'load', source_file: 'io.py', systems: ['storage'], flags: 'IO' }),
        makeRecord({ symbol: 'save', source_file: 'io.py', systems: ['storage'] }),
      ]),
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    project.cleanup();
  });

  it('should write indexes beside the inventory by default', async () => {
    const exitCode = await runIndexes(project.getFilePath('data/inventory.json'), {});

    expect(exitCode).toBe(0);
    const indexes: SerializedIndexes = JSON.parse(fs.readFileSync(project.getFilePath('data/indexes.json'), 'utf-8'));
    expect(Object.keys(indexes['by-symbol'])).toEqual(['load', 'save']);
    expect(indexes['by-module']['storage']?.map(r => r.symbol)).toEqual(['load', 'save']);
    expect(Object.keys(indexes['by-flag'])).toEqual(['I', 'O']);
  });

  it('should pretty-print to an explicit path', async () => {
    const target = project.getFilePath('out/idx.json');

    await runIndexes(project.getFilePath('data/inventory.json'), { indexes: target, pretty: true });

    expect(fs.readFileSync(target, 'utf-8').startsWith('{\n  "by-symbol": {')).toBe(true);
  });

  it('should reject an invalid inventory with the schema exit code', async () => {
    const inventoryPath = project.addFile('bad.json', JSON.stringify([{ symbol: 'x' }]));

    const exitCode = await runIndexes(inventoryPath, {});

    expect(exitCode).toBe(2);
    expect(errorSpy.mock.calls[0]?.[0]).toBe(`[err] Invalid inventory ${inventoryPath}:`);
    expect(fs.existsSync(project.getFilePath('indexes.json'))).toBe(false);
  });
});
