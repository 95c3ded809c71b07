/**
 * Identity Extractor
 *
 * Derives the (author, title) key used to query the catalog, from container
 * tags when both are present, otherwise from a file name of the form
 *
 *   [Optional Tag] Author Name - Title Of The Book.m4b
 *
 * Only the first " - " separates author from title, so titles that contain
 * " - " themselves survive intact.
 */

import { basename, extname } from 'node:path';
import {
  IdentityError,
  normalizeText,
  normalizeTitle,
  type EmbeddedTags,
  type IdentityKey,
} from '@chaptify/core';

export interface IdentityInput {
  filePath: string;
  tags?: EmbeddedTags;
}

export interface ParsedFileName {
  author: string;
  title: string;
}

const SEPARATOR = ' - ';
const LEADING_TAG = /^\[[^\]]*\]\s*/;

/**
 * Split a file name into raw author and title. Returns null when the name
 * does not follow the "<author> - <title>.<ext>" grammar.
 */
export function parseFileName(filePath: string): ParsedFileName | null {
  const name = basename(filePath);
  const stem = basename(name, extname(name)).replace(LEADING_TAG, '');

  const at = stem.indexOf(SEPARATOR);
  if (at < 0) {
    return null;
  }

  const author = stem.slice(0, at).trim();
  const title = stem.slice(at + SEPARATOR.length).trim();
  if (!author || !title) {
    return null;
  }
  return { author, title };
}

export function extractIdentity({ filePath, tags }: IdentityInput): IdentityKey {
  const tagAuthor = normalizeText(tags?.author ?? '');
  const tagTitle = normalizeTitle(tags?.title ?? '');
  if (tagAuthor && tagTitle) {
    return { author: tagAuthor, title: tagTitle, source: 'tags' };
  }

  const parsed = parseFileName(filePath);
  if (!parsed) {
    throw new IdentityError(
      filePath,
      'tags lack author or title and the file name is not "<author> - <title>"'
    );
  }

  const author = normalizeText(parsed.author);
  const title = normalizeTitle(parsed.title);
  if (!author || !title) {
    throw new IdentityError(filePath, 'author or title is empty after normalization');
  }

  return { author, title, source: 'filename' };
}
