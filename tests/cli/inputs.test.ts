/**
 * Component: Input Collection Tests
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@chaptify/core';
import { collectInputs } from '../../apps/cli/src/lib/inputs.js';

describe('collectInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chaptify-inputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads one path per line from a list, ignoring blank lines', async () => {
    const list = join(dir, 'list.txt');
    await writeFile(list, '/books/a.m4b\r\n\n  /books/b.m4b  \n\n');

    await expect(collectInputs({ list })).resolves.toEqual(['/books/a.m4b', '/books/b.m4b']);
  });

  it('scans a directory for m4b files only', async () => {
    const library = join(dir, 'library');
    await mkdir(join(library, 'nested.m4b'), { recursive: true });
    await writeFile(join(library, 'b.M4B'), '');
    await writeFile(join(library, 'a.m4b'), '');
    await writeFile(join(library, 'c.mp3'), '');

    await expect(collectInputs({ dir: library })).resolves.toEqual([
      join(library, 'a.m4b'),
      join(library, 'b.M4B'),
    ]);
  });

  it('keeps positional files first and drops duplicates', async () => {
    const list = join(dir, 'list.txt');
    await writeFile(list, '/books/b.m4b\n/books/a.m4b\n');

    await expect(
      collectInputs({ files: ['/books/a.m4b', '/books/c.m4b'], list })
    ).resolves.toEqual(['/books/a.m4b', '/books/c.m4b', '/books/b.m4b']);
  });

  it('fails for a missing list file', async () => {
    await expect(collectInputs({ list: join(dir, 'missing.txt') })).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails for a missing directory', async () => {
    await expect(collectInputs({ dir: join(dir, 'missing') })).rejects.toThrow(ConfigError);
  });
});
