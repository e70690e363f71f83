/**
 * File Mutator
 *
 * Reads, writes and lists files for the gateway. Writes never leave a
 * half-written target: new bytes go to a temporary sibling that is fsynced
 * and renamed over the target, and the optional backup is made the same way
 * before the target is touched.
 */

import { randomUUID } from 'node:crypto';
import type { Stats } from 'node:fs';
import {
  chmod,
  copyFile,
  lstat,
  mkdir,
  open,
  readFile as fsReadFile,
  readdir,
  rename,
  rm,
  stat,
} from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { IsADirectoryError, NotADirectoryError, fromFsError } from '../../gateway/errors.js';
import { DEFAULT_ENCODING, decodeStrict, encodeText, normalizeEncoding } from './encoding.js';

export const BACKUP_SUFFIX = '.bak';

export interface ReadFileResult {
  file_path: string;
  content: string;
  /** Size in bytes */
  size: number;
  encoding: string;
}

export interface WriteFileOptions {
  encoding?: string | undefined;
  /** Copy the current content to `<path>.bak` first (default true) */
  backup?: boolean | undefined;
}

export interface WriteFileResult {
  file_path: string;
  bytes_written: number;
  backup_created: boolean;
  backup_path: string | null;
  encoding: string;
}

export type EntryType = 'file' | 'directory' | 'other';

export interface DirectoryEntry {
  name: string;
  /** Absolute path */
  path: string;
  type: EntryType;
  size: number;
  /** ISO-8601 modification time */
  modified: string;
}

export interface ListDirectoryResult {
  directory: string;
  entries: DirectoryEntry[];
  count: number;
}

// ─── Helpers ─────────────────────────────────────────────────────

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && (error as NodeJS.ErrnoException).code === code;
}

function tempSibling(path: string): string {
  return join(dirname(path), `.${basename(path)}.${randomUUID().slice(0, 8)}.tmp`);
}

/**
 * Best-effort removal of a temporary file after a failed write.
 */
async function removeTemp(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch {
    // the original write error is the one worth reporting
  }
}

async function fsyncPath(path: string): Promise<void> {
  const handle = await open(path, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Persist a rename: the new directory entry is durable only once the parent
 * directory itself is synced.
 */
async function fsyncDirectory(directory: string): Promise<void> {
  const handle = await open(directory, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return null;
    throw fromFsError(error, path, 'write');
  }
}

/**
 * Copy `path` to `<path>.bak` through a fsynced temporary file.
 * Overwrites any earlier backup of the same path.
 */
export async function createBackup(path: string): Promise<string> {
  const backupPath = `${path}${BACKUP_SUFFIX}`;
  const tempPath = tempSibling(backupPath);
  try {
    await copyFile(path, tempPath);
    await fsyncPath(tempPath);
    await rename(tempPath, backupPath);
    await fsyncDirectory(dirname(backupPath));
  } catch (error) {
    await removeTemp(tempPath);
    throw fromFsError(error, backupPath, 'write');
  }
  return backupPath;
}

/**
 * Replace `path` with `data` via write-to-temp, fsync and rename.
 *
 * @param mode - permission bits to carry over from the file being replaced
 */
export async function atomicWrite(path: string, data: Buffer, mode?: number): Promise<void> {
  const tempPath = tempSibling(path);
  try {
    const handle = await open(tempPath, 'wx');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    if (mode !== undefined) {
      await chmod(tempPath, mode & 0o7777);
    }
    await rename(tempPath, path);
    await fsyncDirectory(dirname(path));
  } catch (error) {
    await removeTemp(tempPath);
    throw fromFsError(error, path, 'write');
  }
}

// ─── Read ────────────────────────────────────────────────────────

export async function readFile(
  path: string,
  encoding: string = DEFAULT_ENCODING
): Promise<ReadFileResult> {
  const label = normalizeEncoding(encoding);

  let buffer: Buffer;
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) {
      throw new IsADirectoryError(path);
    }
    buffer = await fsReadFile(path);
  } catch (error) {
    throw fromFsError(error, path, 'read');
  }

  return {
    file_path: path,
    content: decodeStrict(buffer, label, path),
    size: buffer.length,
    encoding: label,
  };
}

// ─── Write ───────────────────────────────────────────────────────

/**
 * Create or overwrite `path`, creating missing parent directories.
 */
export async function writeFile(
  path: string,
  content: string,
  options: WriteFileOptions = {}
): Promise<WriteFileResult> {
  const label = normalizeEncoding(options.encoding ?? DEFAULT_ENCODING);
  const backup = options.backup ?? true;
  const data = encodeText(content, label);

  const existing = await statOrNull(path);
  if (existing?.isDirectory()) {
    throw new IsADirectoryError(path);
  }

  if (!existing) {
    const parent = dirname(path);
    try {
      await mkdir(parent, { recursive: true });
    } catch (error) {
      throw fromFsError(error, parent, 'write');
    }
  }

  const backupPath = backup && existing ? await createBackup(path) : null;
  await atomicWrite(path, data, existing?.mode);

  return {
    file_path: path,
    bytes_written: data.length,
    backup_created: backupPath !== null,
    backup_path: backupPath,
    encoding: label,
  };
}

// ─── List ────────────────────────────────────────────────────────

async function describeEntry(directory: string, name: string): Promise<DirectoryEntry | null> {
  const entryPath = join(directory, name);
  let stats: Stats;
  try {
    stats = await stat(entryPath);
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) throw error;
    // dangling symlink, or removed since readdir
    try {
      stats = await lstat(entryPath);
    } catch (inner) {
      if (isErrno(inner, 'ENOENT')) return null;
      throw inner;
    }
  }

  const type: EntryType = stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : 'other';
  return {
    name,
    path: entryPath,
    type,
    size: stats.size,
    modified: stats.mtime.toISOString(),
  };
}

function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  const aDir = a.type === 'directory';
  const bDir = b.type === 'directory';
  if (aDir !== bDir) return aDir ? -1 : 1;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Immediate entries of `directory`, directories first, then by name.
 */
export async function listDirectory(directory: string): Promise<ListDirectoryResult> {
  const described: (DirectoryEntry | null)[] = [];
  try {
    const stats = await stat(directory);
    if (!stats.isDirectory()) {
      throw new NotADirectoryError(directory);
    }
    const names = await readdir(directory);
    for (const name of names) {
      described.push(await describeEntry(directory, name));
    }
  } catch (error) {
    throw fromFsError(error, directory, 'list');
  }

  const entries = described
    .filter((entry): entry is DirectoryEntry => entry !== null)
    .sort(compareEntries);
  return { directory, entries, count: entries.length };
}
