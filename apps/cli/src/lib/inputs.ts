/**
 * Input Collection
 *
 * Gathers the files to process from positional arguments, a list file
 * and a directory scan, in that order, without duplicates.
 */

import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { ConfigError } from '@chaptify/core';
import { safeReadFile } from '@chaptify/utils';

export interface InputSources {
  files?: readonly string[];
  list?: string;
  dir?: string;
  /** Extensions picked up by the directory scan */
  extensions?: readonly string[];
}

export const DEFAULT_SCAN_EXTENSIONS = ['.m4b'] as const;

export async function collectInputs(sources: InputSources): Promise<string[]> {
  const collected: string[] = [...(sources.files ?? [])];

  if (sources.list) {
    const content = await safeReadFile(sources.list);
    if (content === null) {
      throw new ConfigError(`The list file '${sources.list}' does not exist`);
    }
    collected.push(
      ...content.split(/\r?\n/).map(line => line.trim()).filter(Boolean)
    );
  }

  if (sources.dir) {
    const stats = await stat(sources.dir).catch(() => null);
    if (!stats?.isDirectory()) {
      throw new ConfigError(`The directory '${sources.dir}' does not exist`);
    }
    const extensions = (sources.extensions ?? DEFAULT_SCAN_EXTENSIONS).map(ext => ext.toLowerCase());
    const entries = await readdir(sources.dir, { withFileTypes: true });
    collected.push(
      ...entries
        .filter(entry => entry.isFile() && extensions.includes(extname(entry.name).toLowerCase()))
        .map(entry => join(sources.dir ?? '', entry.name))
        .sort()
    );
  }

  const seen = new Set<string>();
  return collected.filter(file => {
    const key = resolve(file);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
