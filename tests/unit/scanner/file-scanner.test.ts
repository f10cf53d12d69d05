import { describe, it, expect, beforeEach } from 'vitest';
import { scanSource, splitLines, type ScanContext } from '../../../src/scanner/file-scanner.js';
import { Inventory } from '../../../src/scanner/inventory.js';
import { EventLog } from '../../../src/events/index.js';
import type { FailPolicy } from '../../../src/types/index.js';

function createContext(failPolicy: FailPolicy = 'warn'): ScanContext {
  return { sourceFile: 'mod.py', inventory: new Inventory(), events: new EventLog(failPolicy) };
}

describe('File scanner', () => {
  describe('splitLines', () => {
    it('should drop terminators and a trailing newline', () => {
      expect(splitLines('a\r\nb\n')).toEqual(['a', 'b']);
      expect(splitLines('a')).toEqual(['a']);
      expect(splitLines('a\n\n')).toEqual(['a', '']);
      expect(splitLines('')).toEqual([]);
    });
  });

  describe('scanSource', () => {
    let context: ScanContext;

    beforeEach(() => {
      context = createContext();
    });

    it('should bind a meta line to the following function', () => {
      const text = '# meta: modules=db,conversation threads=main callers=1 flags=D#X\ndef foo(x):\n    pass\n';
      const result = scanSource(context, text);

      expect(result).toEqual({
        status: 'complete',
        linesRead: 3,
        recordsCreated: 1,
        anchorMerges: 0,
        grammarErrors: 0,
        orphaned: false,
      });
      expect(context.inventory.toArray()).toEqual([
        {
          id: 'fn:mod.py:foo:2',
          symbol: 'foo',
          symbol_type: 'function',
          source_file: 'mod.py',
          line_number: 2,
          raw: ['# meta: modules=db,conversation threads=main callers=1 flags=D#X'],
          doc: [],
          systems: ['db', 'conversation'],
          roles: [],
          threads: ['main'],
          callers: 1,
          flags: 'D#X',
          assign_type: '',
          custom: {},
        },
      ]);
      expect(context.events.events).toEqual([]);
    });

    it('should keep the note open across blank lines, decorators and other code', () => {
      const text = [
        '# doc: Adds numbers.',
        '# doc:  indented',
        'import os',
        '',
        '@cache',
        '# ordinary comment',
        'def add(a, b):',
      ].join('\n');
      scanSource(context, text);

      const [record] = context.inventory.toArray();
      expect(record?.symbol).toBe('add');
      expect(record?.line_number).toBe(7);
      expect(record?.doc).toEqual(['Adds numbers.', ' indented']);
      expect(record?.raw).toEqual(['# doc: Adds numbers.', '# doc:  indented']);
      expect(record?.callers).toBe('*');
      expect(record?.id).toBe('fn:mod.py:add:7');
    });

    it('should ignore declarations without a pending note', () => {
      const result = scanSource(context, 'def a():\n    pass\nclass B:\n    pass\n');

      expect(result.recordsCreated).toBe(0);
      expect(context.inventory.size).toBe(0);
    });

    it('should never merge two declarations of the same name', () => {
      scanSource(context, '# meta: roles=a\ndef run():\n# meta: roles=b\ndef run():\n');

      expect(context.inventory.toArray().map(r => r.id)).toEqual(['fn:mod.py:run:2', 'fn:mod.py:run:4']);
    });

    it('should derive ids for classes and variables', () => {
      scanSource(context, '# meta: roles=api\nclass Service(Base):\n# meta: flags=ab\n# meta: flags=bc\nVALUE = 1\n');

      const records = context.inventory.toArray();
      expect(records.map(r => r.id)).toEqual(['class:mod.py:Service:2', 'var:mod.py:VALUE:5']);
      expect(records[1]?.flags).toBe('bc');
    });

    it('should bind only the last flags token of a note to the declaration', () => {
      scanSource(context, '# meta: flags=ab\n# meta: flags=c\ndef f():\n');

      expect(context.inventory.toArray()[0]?.flags).toBe('c');
    });

    it('should use an explicit id as given', () => {
      scanSource(context, '# meta: #core.loop systems=x\ndef run():\n');

      expect(context.inventory.toArray()[0]?.id).toBe('core.loop');
    });

    it('should parse every callers form', () => {
      const text = [
        '# meta: callers=',
        'def a():',
        '# meta: callers=*',
        'def b():',
        '# meta: callers=foo,bar',
        'def c():',
        '# meta: callers=foo',
        'def d():',
        '# meta: systems=x',
        'def e():',
      ].join('\n');
      scanSource(context, text);

      expect(context.inventory.toArray().map(r => r.callers)).toEqual([[], '*', ['foo', 'bar'], ['foo'], '*']);
    });

    it('should extend custom keys across lines', () => {
      scanSource(context, '# meta: owner=alice\n# meta: owner=bob tier=1\ndef f():\n');

      expect(context.inventory.toArray()[0]?.custom).toEqual({ owner: ['alice', 'bob'], tier: ['1'] });
    });

    describe('anchors', () => {
      it('should aggregate blocks naming the same anchor into one record', () => {
        const text = [
          '# meta: @helper flags=aab systems=A',
          'x = compute()',
          '# doc: second block',
          '# meta: @helper flags=cba threads=T',
        ].join('\n');
        const result = scanSource(context, text);

        expect(result.recordsCreated).toBe(1);
        expect(result.anchorMerges).toBe(1);

        const records = context.inventory.toArray();
        expect(records).toHaveLength(1);
        expect(records[0]).toMatchObject({
          id: 'anchor:mod.py:helper:1',
          symbol: 'helper',
          symbol_type: 'anchor',
          line_number: 4,
          raw: ['# meta: @helper flags=aab systems=A', '# doc: second block', '# meta: @helper flags=cba threads=T'],
          doc: ['second block'],
          systems: ['a'],
          threads: ['t'],
          flags: 'abc',
        });
      });

      it('should keep anchors with the same name in different files apart', () => {
        scanSource(context, '# meta: @shared\n');
        scanSource({ ...context, sourceFile: 'other.py' }, '# meta: @shared\n');

        expect(context.inventory.toArray().map(r => r.id)).toEqual([
          'anchor:mod.py:shared:1',
          'anchor:other.py:shared:1',
        ]);
      });

      it('should apply callers, assign_type and id overrides on merge', () => {
        const text = [
          '# meta: @cfg callers=main assign_type=dict owner=a',
          '# meta: @cfg callers=',
          '# meta: @cfg #settings owner=b',
        ].join('\n');
        scanSource(context, text);

        const [record] = context.inventory.toArray();
        expect(record?.callers).toEqual([]);
        expect(record?.assign_type).toBe('dict');
        expect(record?.id).toBe('settings');
        expect(record?.custom).toEqual({ owner: ['a', 'b'] });
        expect(record?.line_number).toBe(3);
      });

      it('should not bind a pending note to a declaration after an anchor drains it', () => {
        scanSource(context, '# meta: @marker\ndef f():\n');

        expect(context.inventory.toArray().map(r => r.symbol)).toEqual(['marker']);
      });
    });

    describe('diagnostics', () => {
      it('should report an orphaned note at its first line and drop it', () => {
        const result = scanSource(context, 'def a():\n    pass\n# meta: systems=x\n');

        expect(result.orphaned).toBe(true);
        expect(context.inventory.size).toBe(0);
        expect(context.events.events).toHaveLength(1);
        expect(context.events.events[0]).toMatchObject({
          kind: 'orphan-note',
          level: 'warning',
          msg: 'mod.py:3: meta note never bound to a symbol (reached end of file)',
          data: { file: 'mod.py', line: '3' },
        });
      });

      it('should skip only the bad meta line', () => {
        const result = scanSource(context, '# meta: systems=a\n# meta: broken\ndef f():\n');

        expect(result.grammarErrors).toBe(1);
        expect(result.status).toBe('complete');
        expect(context.events.events[0]?.msg).toBe("mod.py:2: bad entry (missing '='): broken\n# meta: broken");

        const [record] = context.inventory.toArray();
        expect(record?.raw).toEqual(['# meta: systems=a']);
        expect(record?.systems).toEqual(['a']);
      });

      it('should stop the file when the halt policy sees a grammar error', () => {
        context = createContext('halt');
        const result = scanSource(context, '# meta: systems=a\n# meta: broken\ndef f():\n');

        expect(result.status).toBe('halted');
        expect(result.linesRead).toBe(2);
        expect(context.inventory.size).toBe(0);
        expect(context.events.events.map(e => e.kind)).toEqual(['meta-grammar-error']);
      });

      it('should finish the file but request a halt for a strict orphan', () => {
        context = createContext('strict');
        const result = scanSource(context, '# meta: systems=x\n');

        expect(result.status).toBe('complete');
        expect(result.orphaned).toBe(true);
        expect(context.events.shouldHalt()).toBe(true);
      });
    });
  });
});
