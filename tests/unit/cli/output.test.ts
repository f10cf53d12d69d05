import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'node:path';
import {
  decideDestinations,
  decideScanEmits,
  describeDestination,
  emitArtifact,
  resolveFormat,
  routeOne,
  usesStdout,
} from '../../../src/cli/output.js';
import { UsageError } from '../../../src/errors.js';

const defaults = { inventory: '/proj/inventory.json', indexes: '/proj/indexes.json' };

describe('CLI output routing', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('decideScanEmits', () => {
    it('should emit both artifacts when neither flag is given', () => {
      expect(decideScanEmits(undefined, undefined)).toEqual({ inventory: true, indexes: true });
    });

    it('should emit only the flagged artifacts otherwise', () => {
      expect(decideScanEmits(true, undefined)).toEqual({ inventory: true, indexes: false });
      expect(decideScanEmits(undefined, 'stdout')).toEqual({ inventory: false, indexes: true });
    });
  });

  describe('routeOne', () => {
    it('should use the default path for a bare flag', () => {
      expect(routeOne(true, defaults.inventory)).toEqual({ kind: 'file', path: '/proj/inventory.json' });
      expect(routeOne(undefined, defaults.inventory)).toEqual({ kind: 'file', path: '/proj/inventory.json' });
    });

    it('should recognise stdout and resolve file paths', () => {
      expect(routeOne('stdout', defaults.inventory)).toEqual({ kind: 'stdout' });
      expect(routeOne('out/inv.json', defaults.inventory)).toEqual({
        kind: 'file',
        path: path.resolve('out/inv.json'),
      });
    });
  });

  describe('decideDestinations', () => {
    it('should route both artifacts to their defaults', () => {
      expect(decideDestinations({}, defaults)).toEqual({
        inventory: { kind: 'file', path: '/proj/inventory.json' },
        indexes: { kind: 'file', path: '/proj/indexes.json' },
      });
    });

    it('should leave an unrequested artifact out', () => {
      expect(decideDestinations({ indexes: 'stdout' }, defaults)).toEqual({
        inventory: null,
        indexes: { kind: 'stdout' },
      });
    });

    it('should refuse two artifacts on stdout', () => {
      expect(() => decideDestinations({ inventory: 'stdout', indexes: 'stdout' }, defaults)).toThrow(
        new UsageError('At most one output may be routed to stdout per invocation.')
      );
    });
  });

  describe('resolveFormat', () => {
    it('should prefer flags over the configured format', () => {
      expect(resolveFormat(true, undefined, 'compact')).toBe('pretty');
      expect(resolveFormat(undefined, true, 'pretty')).toBe('compact');
      expect(resolveFormat(undefined, undefined, 'pretty')).toBe('pretty');
    });

    it('should reject both flags together', () => {
      expect(() => resolveFormat(true, true, 'compact')).toThrow(UsageError);
    });
  });

  describe('emitArtifact', () => {
    it('should write to stdout', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await emitArtifact({ kind: 'stdout' }, [1, 2], 'compact');

      expect(writeSpy).toHaveBeenCalledWith('[1,2]');
    });
  });

  it('should describe and detect destinations', () => {
    expect(usesStdout(null, { kind: 'stdout' })).toBe(true);
    expect(usesStdout(null, { kind: 'file', path: '/a' })).toBe(false);
    expect(describeDestination({ kind: 'file', path: '/a' })).toBe('/a');
    expect(describeDestination({ kind: 'stdout' })).toBe('stdout');
  });
});
