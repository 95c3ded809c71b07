/**
 * File Operations
 *
 * Small wrappers around fs/promises used by the remux step and the CLI.
 */

import { mkdir, readFile, rename, stat, unlink } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, extname, join } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Read a UTF-8 file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Delete a file if present. Returns whether something was removed.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Get file size in bytes, or 0 when the file is missing
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  try {
    const stats = await stat(filePath);
    return stats.size;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}

/**
 * Move a file into place. Within one filesystem this is an atomic rename.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}

/**
 * Build a unique hidden path next to `filePath`.
 *
 * The original extension is kept last (or replaced by `extension` when given)
 * so tools that pick a format from the file name still recognise it.
 */
export function tempSiblingPath(filePath: string, tag: string, extension?: string): string {
  const ext = extname(filePath);
  const stem = basename(filePath, ext);
  const unique = `${process.pid}-${randomBytes(4).toString('hex')}`;
  return join(dirname(filePath), `.${stem}.${tag}-${unique}${extension ?? ext}`);
}
