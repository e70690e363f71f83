/**
 * Search/Replace Engine
 *
 * Line-oriented text search over a file or a directory tree, and literal
 * in-place replacement built on the File Mutator's backup and atomic write.
 */

import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  IsADirectoryError,
  NotFoundError,
  ValidationError,
  fromFsError,
} from '../../gateway/errors.js';
import { decodeStrict, encodeText, isUtf8Text } from '../files/encoding.js';
import { atomicWrite, createBackup } from '../files/file-mutator.js';

export const DEFAULT_MAX_RESULTS = 1000;

/** Directory names never descended into */
export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(['.git', 'node_modules']);

export interface SearchOptions {
  pattern: string;
  /** File or directory to search */
  scope: string;
  caseSensitive?: boolean | undefined;
  /** Treat `pattern` as a regular expression instead of literal text */
  regex?: boolean | undefined;
  maxResults?: number | undefined;
}

export interface SearchMatch {
  file_path: string;
  /** 1-based */
  line_number: number;
  line_text: string;
  /** 0-based, end-exclusive column range in `line_text` */
  match_span: [number, number];
}

export interface SearchFailure {
  path: string;
  error: string;
}

export interface SearchResult {
  matches: SearchMatch[];
  total_matches: number;
  files_scanned: number;
  /** Binary files passed over */
  skipped: string[];
  /** Paths that could not be read; the scan continued past them */
  errors: SearchFailure[];
  truncated: boolean;
}

export interface ReplaceResult {
  file_path: string;
  replacements: number;
  backup_created: boolean;
  backup_path: string | null;
}

// ─── Pattern ─────────────────────────────────────────────────────

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the global matcher for a search.
 *
 * @throws ValidationError for an empty pattern or invalid regular expression
 */
export function compilePattern(pattern: string, regex: boolean, caseSensitive: boolean): RegExp {
  if (!pattern) {
    throw new ValidationError('pattern must not be empty');
  }
  const source = regex ? pattern : escapeRegExp(pattern);
  const flags = caseSensitive ? 'g' : 'gi';
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`invalid regular expression: ${reason}`);
  }
}

/**
 * Every non-empty match of `matcher` in `line`, as [start, end) spans.
 */
export function findSpans(matcher: RegExp, line: string): [number, number][] {
  const spans: [number, number][] = [];
  matcher.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = matcher.exec(line)) !== null) {
    if (match[0].length === 0) {
      matcher.lastIndex++;
      continue;
    }
    spans.push([match.index, match.index + match[0].length]);
  }
  return spans;
}

function describeFailure(error: unknown, path: string): string {
  const mapped = fromFsError(error, path, 'read');
  return mapped.message;
}

// ─── Search ──────────────────────────────────────────────────────

class SearchRun {
  readonly result: SearchResult = {
    matches: [],
    total_matches: 0,
    files_scanned: 0,
    skipped: [],
    errors: [],
    truncated: false,
  };

  constructor(
    private readonly matcher: RegExp,
    private readonly maxResults: number
  ) {}

  get done(): boolean {
    return this.result.truncated;
  }

  async scanFile(path: string): Promise<void> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      this.result.errors.push({ path, error: describeFailure(error, path) });
      return;
    }

    if (!isUtf8Text(buffer)) {
      this.result.skipped.push(path);
      return;
    }

    this.result.files_scanned++;
    const lines = buffer.toString('utf8').split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index] ?? '';
      for (const span of findSpans(this.matcher, line)) {
        if (this.result.matches.length >= this.maxResults) {
          this.result.truncated = true;
          return;
        }
        this.result.matches.push({
          file_path: path,
          line_number: index + 1,
          line_text: line,
          match_span: span,
        });
      }
    }
  }

  async walk(directory: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.result.errors.push({ path: directory, error: describeFailure(error, directory) });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (this.done) return;
      const entryPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          await this.walk(entryPath);
        }
      } else if (entry.isFile()) {
        await this.scanFile(entryPath);
      }
    }
  }
}

/**
 * Search a file or directory tree for `pattern`.
 *
 * Directories are walked in code-unit order of entry names and symlinks are
 * not followed, so results are stable across runs.
 */
export async function searchText(options: SearchOptions): Promise<SearchResult> {
  const matcher = compilePattern(
    options.pattern,
    options.regex ?? false,
    options.caseSensitive ?? false
  );
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  if (!Number.isInteger(maxResults) || maxResults < 1) {
    throw new ValidationError('max_results must be a positive integer');
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(options.scope)).isDirectory();
  } catch (error) {
    const mapped = fromFsError(error, options.scope, 'read');
    throw mapped instanceof NotFoundError ? new NotFoundError(options.scope, 'path') : mapped;
  }

  const run = new SearchRun(matcher, maxResults);
  if (isDirectory) {
    await run.walk(options.scope);
  } else {
    await run.scanFile(options.scope);
  }

  run.result.total_matches = run.result.matches.length;
  return run.result;
}

// ─── Replace ─────────────────────────────────────────────────────

/**
 * Literal, non-overlapping, left-to-right replacement.
 *
 * @param count - maximum replacements; -1 for all
 */
export function replaceLiteral(
  text: string,
  oldText: string,
  newText: string,
  count: number
): { text: string; replacements: number } {
  if (!oldText) {
    throw new ValidationError('old_text must not be empty');
  }

  const parts: string[] = [];
  let replacements = 0;
  let cursor = 0;
  while (count < 0 || replacements < count) {
    const found = text.indexOf(oldText, cursor);
    if (found === -1) break;
    parts.push(text.slice(cursor, found), newText);
    cursor = found + oldText.length;
    replacements++;
  }
  parts.push(text.slice(cursor));
  return { text: parts.join(''), replacements };
}

/**
 * Replace occurrences of `oldText` in a UTF-8 file.
 *
 * Zero replacements is a success that writes nothing and takes no backup.
 */
export async function replaceText(
  path: string,
  oldText: string,
  newText: string,
  count = -1,
  backup = true
): Promise<ReplaceResult> {
  if (!oldText) {
    throw new ValidationError('old_text must not be empty');
  }
  if (!Number.isInteger(count) || count < -1) {
    throw new ValidationError('count must be -1 or a non-negative integer');
  }

  let buffer: Buffer;
  let mode: number;
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) {
      throw new IsADirectoryError(path);
    }
    mode = stats.mode;
    buffer = await readFile(path);
  } catch (error) {
    throw fromFsError(error, path, 'read');
  }

  const original = decodeStrict(buffer, 'utf-8', path);
  const { text, replacements } = replaceLiteral(original, oldText, newText, count);
  if (replacements === 0) {
    return { file_path: path, replacements: 0, backup_created: false, backup_path: null };
  }

  const backupPath = backup ? await createBackup(path) : null;
  await atomicWrite(path, encodeText(text, 'utf-8'), mode);

  return {
    file_path: path,
    replacements,
    backup_created: backupPath !== null,
    backup_path: backupPath,
  };
}
