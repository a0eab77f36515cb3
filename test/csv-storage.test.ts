import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CsvStorage, encodeRow, parseRows } from '../src/csv-storage.js';

describe('CSV Storage', () => {
  describe('encodeRow', () => {
    it('should join plain fields with a space', () => {
      assert.strictEqual(encodeRow(['a1', 'http://example.com', 'desc']), 'a1 http://example.com desc\n');
    });

    it('should quote fields containing spaces', () => {
      assert.strictEqual(
        encodeRow(['a1', 'http://example.com', 'My Site']),
        'a1 http://example.com "My Site"\n'
      );
    });

    it('should double embedded quotes', () => {
      assert.strictEqual(encodeRow(['q', 'u', 'say "hi"']), 'q u "say ""hi"""\n');
    });

    it('should quote fields containing newlines', () => {
      assert.strictEqual(encodeRow(['n', 'u', 'two\nlines']), 'n u "two\nlines"\n');
    });

    it('should leave empty fields bare', () => {
      assert.strictEqual(encodeRow(['e', 'u', '']), 'e u \n');
    });
  });

  describe('parseRows', () => {
    it('should split unquoted fields on spaces', () => {
      assert.deepStrictEqual([...parseRows('a b c\n')], [['a', 'b', 'c']]);
    });

    it('should read quoted fields with spaces and doubled quotes', () => {
      assert.deepStrictEqual(
        [...parseRows('q u "say ""hi"" now"\n')],
        [['q', 'u', 'say "hi" now']]
      );
    });

    it('should accept CRLF line endings', () => {
      assert.deepStrictEqual(
        [...parseRows('a b c\r\nd e f\r\n')],
        [['a', 'b', 'c'], ['d', 'e', 'f']]
      );
    });

    it('should read a last line without a newline', () => {
      assert.deepStrictEqual([...parseRows('a b c')], [['a', 'b', 'c']]);
    });

    it('should skip blank lines', () => {
      assert.deepStrictEqual([...parseRows('\na b c\n\n')], [['a', 'b', 'c']]);
    });

    it('should keep newlines inside quoted fields', () => {
      assert.deepStrictEqual([...parseRows('n u "two\nlines"\n')], [['n', 'u', 'two\nlines']]);
    });

    it('should read an empty trailing field', () => {
      assert.deepStrictEqual([...parseRows('e u \n')], [['e', 'u', '']]);
      assert.deepStrictEqual([...parseRows('e u ""\n')], [['e', 'u', '']]);
    });

    it('should treat a quote inside an unquoted field as text', () => {
      assert.deepStrictEqual([...parseRows('a b"c d\n')], [['a', 'b"c', 'd']]);
    });

    it('should report the real field count of short rows', () => {
      assert.deepStrictEqual([...parseRows('only two\n')], [['only', 'two']]);
    });
  });

  describe('CsvStorage', () => {
    let tmpDir: string;
    let filename: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webmark-storage-'));
      filename = path.join(tmpDir, 'bookmarks');
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should load nothing when the file does not exist', () => {
      const storage = new CsvStorage(filename);
      assert.deepStrictEqual([...storage.load()], []);
    });

    it('should round-trip rows with spaces and quotes in order', () => {
      const rows = [
        ['z', 'http://z.example', 'plain'],
        ['a', 'http://a.example/?q=1 2', 'with spaces'],
        ['m', 'http://m.example', 'a "quoted" word'],
        ['"x"', 'http://x.example', '" leading quote']
      ];

      const storage = new CsvStorage(filename);
      storage.save(rows);

      assert.deepStrictEqual([...storage.load()], rows);
    });

    it('should truncate the file on save', () => {
      const storage = new CsvStorage(filename);
      storage.save([['a', 'b', 'c'], ['d', 'e', 'f']]);
      storage.save([['g', 'h', 'i']]);

      assert.strictEqual(fs.readFileSync(filename, 'utf-8'), 'g h i\n');
    });

    it('should write an empty file for no rows', () => {
      const storage = new CsvStorage(filename);
      storage.save([['a', 'b', 'c']]);
      storage.save([]);

      assert.strictEqual(fs.readFileSync(filename, 'utf-8'), '');
    });

    it('should propagate errors when the path is a directory', () => {
      const storage = new CsvStorage(tmpDir);
      assert.throws(() => [...storage.load()], { code: 'EISDIR' });
      assert.throws(() => storage.save([]), { code: 'EISDIR' });
    });
  });
});
