import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  compilePattern,
  escapeRegExp,
  findSpans,
  replaceLiteral,
  replaceText,
  searchText,
} from '../../../../src/runtime/search/search-engine.js';
import { createTempWorkspace } from '../../../helpers/factories.js';

// Paths whose readdir/readFile fail with EACCES; tests run as root, so chmod cannot do this
const deniedPaths = vi.hoisted(() => new Set<string>());

function permissionDenied(syscall: string, path: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, ${syscall} '${path}'`), {
    code: 'EACCES',
    syscall,
    path,
  });
}

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readdir: vi.fn((path: unknown, ...rest: unknown[]) =>
      typeof path === 'string' && deniedPaths.has(path)
        ? Promise.reject(permissionDenied('scandir', path))
        : Reflect.apply(actual.readdir, undefined, [path, ...rest])
    ),
    readFile: vi.fn((path: unknown, ...rest: unknown[]) =>
      typeof path === 'string' && deniedPaths.has(path)
        ? Promise.reject(permissionDenied('open', path))
        : Reflect.apply(actual.readFile, undefined, [path, ...rest])
    ),
  };
});

describe('search engine', () => {
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ root, cleanup } = await createTempWorkspace());
  });

  afterEach(async () => {
    deniedPaths.clear();
    await cleanup();
  });

  describe('patterns', () => {
    it('escapes regex metacharacters', () => {
      expect(escapeRegExp('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
    });

    it('rejects empty and invalid patterns', () => {
      expect(() => compilePattern('', false, false)).toThrow('pattern must not be empty');
      expect(() => compilePattern('(', true, false)).toThrow(/^invalid regular expression: /);
    });

    it('uses case-insensitive matching unless asked otherwise', () => {
      expect(compilePattern('x', false, false).flags).toBe('gi');
      expect(compilePattern('x', false, true).flags).toBe('g');
    });

    it('skips empty matches', () => {
      expect(findSpans(compilePattern('x*', true, true), 'axxb')).toEqual([[1, 3]]);
    });
  });

  describe('searchText', () => {
    beforeEach(async () => {
      await writeFile(join(root, 'a.txt'), 'foo a.b bar\naxb\nA.B end');
      await mkdir(join(root, 'sub'));
      await writeFile(join(root, 'sub', 'b.txt'), 'nothing\r\nmore a.b here');
      await mkdir(join(root, '.git'));
      await writeFile(join(root, '.git', 'c.txt'), 'a.b');
      await mkdir(join(root, 'node_modules'));
      await writeFile(join(root, 'node_modules', 'd.txt'), 'a.b');
      await writeFile(join(root, 'bin.dat'), Buffer.from([0x61, 0x2e, 0x62, 0x00]));
    });

    it('matches the literal text only in literal mode', async () => {
      const result = await searchText({ pattern: 'a.b', scope: root });

      expect(result.matches).toEqual([
        { file_path: join(root, 'a.txt'), line_number: 1, line_text: 'foo a.b bar', match_span: [4, 7] },
        { file_path: join(root, 'a.txt'), line_number: 3, line_text: 'A.B end', match_span: [0, 3] },
        {
          file_path: join(root, 'sub', 'b.txt'),
          line_number: 2,
          line_text: 'more a.b here',
          match_span: [5, 8],
        },
      ]);
      expect(result.total_matches).toBe(3);
      expect(result.files_scanned).toBe(2);
      expect(result.skipped).toEqual([join(root, 'bin.dat')]);
      expect(result.errors).toEqual([]);
      expect(result.truncated).toBe(false);
    });

    it('records an unreadable directory and keeps scanning its siblings', async () => {
      const locked = join(root, 'sub');
      deniedPaths.add(locked);

      const result = await searchText({ pattern: 'a.b', scope: root });

      expect(result.errors).toEqual([{ path: locked, error: `permission denied: ${locked}` }]);
      expect(result.matches.map((m) => [m.file_path, m.line_number])).toEqual([
        [join(root, 'a.txt'), 1],
        [join(root, 'a.txt'), 3],
      ]);
      expect(result.total_matches).toBe(2);
      expect(result.files_scanned).toBe(1);
      expect(result.skipped).toEqual([join(root, 'bin.dat')]);
    });

    it('records an unreadable file and keeps scanning', async () => {
      const locked = join(root, 'a.txt');
      deniedPaths.add(locked);

      const result = await searchText({ pattern: 'a.b', scope: root });

      expect(result.errors).toEqual([{ path: locked, error: `permission denied: ${locked}` }]);
      expect(result.matches.map((m) => m.file_path)).toEqual([join(root, 'sub', 'b.txt')]);
      expect(result.files_scanned).toBe(1);
    });

    it('honors case sensitivity', async () => {
      const result = await searchText({ pattern: 'a.b', scope: root, caseSensitive: true });
      expect(result.matches.map((m) => m.line_text)).toEqual(['foo a.b bar', 'more a.b here']);
    });

    it('treats the pattern as a regular expression in regex mode', async () => {
      const result = await searchText({ pattern: 'a.b', scope: root, regex: true, caseSensitive: true });
      expect(result.matches.map((m) => m.line_text)).toEqual(['foo a.b bar', 'axb', 'more a.b here']);
    });

    it('truncates at max results', async () => {
      const result = await searchText({ pattern: 'a.b', scope: root, maxResults: 2 });

      expect(result.matches).toHaveLength(2);
      expect(result.total_matches).toBe(2);
      expect(result.truncated).toBe(true);
    });

    it('does not flag truncation when the cap is met exactly', async () => {
      const result = await searchText({ pattern: 'a.b', scope: root, maxResults: 3 });
      expect(result.truncated).toBe(false);
    });

    it('searches a single file', async () => {
      const result = await searchText({ pattern: 'bar', scope: join(root, 'a.txt') });

      expect(result.files_scanned).toBe(1);
      expect(result.matches).toEqual([
        { file_path: join(root, 'a.txt'), line_number: 1, line_text: 'foo a.b bar', match_span: [8, 11] },
      ]);
    });

    it('fails with NOT_FOUND for a missing scope', async () => {
      const scope = join(root, 'missing');
      await expect(searchText({ pattern: 'x', scope })).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: `path not found: ${scope}`,
      });
    });

    it('rejects a non-positive result cap', async () => {
      await expect(searchText({ pattern: 'x', scope: root, maxResults: 0 })).rejects.toThrow(
        'max_results must be a positive integer'
      );
    });
  });

  describe('replaceLiteral', () => {
    it('replaces left to right without overlap', () => {
      expect(replaceLiteral('aaaa', 'aa', 'x', -1)).toEqual({ text: 'xx', replacements: 2 });
    });

    it('stops at count', () => {
      expect(replaceLiteral('aaa', 'a', 'b', 2)).toEqual({ text: 'bba', replacements: 2 });
      expect(replaceLiteral('aaa', 'a', 'b', 0)).toEqual({ text: 'aaa', replacements: 0 });
    });

    it('rejects empty old text', () => {
      expect(() => replaceLiteral('abc', '', 'x', -1)).toThrow('old_text must not be empty');
    });
  });

  describe('replaceText', () => {
    it('replaces every occurrence and keeps a backup', async () => {
      const path = join(root, 'code.py');
      await writeFile(path, 'x = 1\nprint(x)\n');

      const result = await replaceText(path, 'x', 'value');

      expect(result).toEqual({
        file_path: path,
        replacements: 2,
        backup_created: true,
        backup_path: `${path}.bak`,
      });
      expect(await readFile(path, 'utf8')).toBe('value = 1\nprint(value)\n');
      expect(await readFile(`${path}.bak`, 'utf8')).toBe('x = 1\nprint(x)\n');
    });

    it('is idempotent once applied', async () => {
      const path = join(root, 'greeting.txt');
      await writeFile(path, 'hello world, hello again');

      await replaceText(path, 'hello', 'goodbye');
      const second = await replaceText(path, 'hello', 'goodbye');

      expect(second).toEqual({
        file_path: path,
        replacements: 0,
        backup_created: false,
        backup_path: null,
      });
      expect(await readFile(path, 'utf8')).toBe('goodbye world, goodbye again');
    });

    it('writes nothing when there is no match', async () => {
      const path = join(root, 'plain.txt');
      await writeFile(path, 'unchanged');

      const result = await replaceText(path, 'absent', 'x');

      expect(result.replacements).toBe(0);
      expect(await readdir(root)).toEqual(['plain.txt']);
    });

    it('limits replacements to count', async () => {
      const path = join(root, 'list.txt');
      await writeFile(path, 'a a a');

      const result = await replaceText(path, 'a', 'b', 1, false);

      expect(result.replacements).toBe(1);
      expect(result.backup_created).toBe(false);
      expect(await readFile(path, 'utf8')).toBe('b a a');
    });

    it('fails with NOT_FOUND for a missing file', async () => {
      const path = join(root, 'nope.txt');
      await expect(replaceText(path, 'a', 'b')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: `file not found: ${path}`,
      });
    });

    it('fails with DECODE_ERROR for a non-UTF-8 file', async () => {
      const path = join(root, 'latin.txt');
      await writeFile(path, Buffer.from([0x63, 0x61, 0x66, 0xe9]));
      await expect(replaceText(path, 'caf', 'x')).rejects.toMatchObject({ code: 'DECODE_ERROR' });
    });

    it('rejects a count below -1', async () => {
      const path = join(root, 'f.txt');
      await writeFile(path, 'a');
      await expect(replaceText(path, 'a', 'b', -2)).rejects.toThrow(
        'count must be -1 or a non-negative integer'
      );
    });
  });
});
