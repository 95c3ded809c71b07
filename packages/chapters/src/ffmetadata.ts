/**
 * FFMETADATA Chapter Files
 *
 * Serializes chapter markers into the metadata file ffmpeg reads with
 * `-i chapters.txt -map_chapters 1`:
 *
 *   ;FFMETADATA1
 *
 *   [CHAPTER]
 *   TIMEBASE=1/1000
 *   START=0
 *   END=734211
 *   title=Chapter 1
 *
 * Special characters in values ('=', ';', '#', '\' and newline) are
 * escaped with a backslash.
 */

import { writeFile } from 'node:fs/promises';
import type { ChapterMarker } from '@chaptify/core';

export const FFMETADATA_HEADER = ';FFMETADATA1';

export function escapeValue(value: string): string {
  return value.replace(/\r\n?/g, '\n').replace(/[=;#\\\n]/g, ch => `\\${ch}`);
}

/**
 * Serialize markers. The output depends only on the markers, so the same
 * input always yields byte-identical text.
 */
export function serializeChapters(markers: readonly ChapterMarker[]): string {
  let output = `${FFMETADATA_HEADER}\n`;

  for (const marker of markers) {
    output += '\n[CHAPTER]\n';
    output += 'TIMEBASE=1/1000\n';
    output += `START=${marker.startMs}\n`;
    output += `END=${marker.endMs}\n`;
    output += `title=${escapeValue(marker.title)}\n`;
  }

  return output;
}

export async function writeChapterFile(
  markers: readonly ChapterMarker[],
  destination: string
): Promise<void> {
  await writeFile(destination, serializeChapters(markers), 'utf8');
}

interface MetadataLine {
  section: string | null;
  sectionId: number;
  key: string;
  value: string;
}

/**
 * Split the file into key/value entries, honouring backslash escapes
 * (including escaped newlines) and skipping comment lines.
 */
function readEntries(content: string): MetadataLine[] {
  const entries: MetadataLine[] = [];
  const text = content.replace(/\r\n?/g, '\n');
  let section: string | null = null;
  let sectionId = 0;
  let i = 0;

  while (i < text.length) {
    const lineEnd = text.indexOf('\n', i);
    const physicalEnd = lineEnd < 0 ? text.length : lineEnd;
    const first = text[i];

    if (first === ';' || first === '#' || i === physicalEnd) {
      i = physicalEnd + 1;
      continue;
    }

    if (first === '[') {
      section = text.slice(i + 1, physicalEnd).replace(/\]\s*$/, '').trim().toUpperCase();
      sectionId++;
      i = physicalEnd + 1;
      continue;
    }

    let key = '';
    let value: string | null = null;
    while (i < text.length && text[i] !== '\n') {
      let ch = text[i] ?? '';
      if (ch === '\\' && i + 1 < text.length) {
        i++;
        ch = text[i] ?? '';
      } else if (ch === '=' && value === null) {
        value = '';
        i++;
        continue;
      }
      if (value === null) {
        key += ch;
      } else {
        value += ch;
      }
      i++;
    }
    i++;

    if (value !== null) {
      entries.push({ section, sectionId, key: key.trim(), value });
    }
  }

  return entries;
}

function parseTimebase(value: string | undefined): { num: number; den: number } {
  const match = value?.match(/^\s*(\d+)\s*\/\s*(\d+)\s*$/);
  const num = Number(match?.[1]);
  const den = Number(match?.[2]);
  if (!match || !num || !den) {
    // ffmpeg assumes nanoseconds when TIMEBASE is absent
    return { num: 1, den: 1_000_000_000 };
  }
  return { num, den };
}

/**
 * Read chapter sections back into markers (milliseconds). Global metadata
 * before the first [CHAPTER] is ignored.
 */
export function parseChapterFile(content: string): ChapterMarker[] {
  const chapters: Array<Map<string, string>> = [];
  let current: Map<string, string> | null = null;
  let currentSection = -1;

  for (const entry of readEntries(content)) {
    if (entry.sectionId !== currentSection) {
      currentSection = entry.sectionId;
      current = null;
    }
    if (entry.section !== 'CHAPTER') {
      continue;
    }
    if (!current) {
      current = new Map();
      chapters.push(current);
    }
    current.set(entry.key.toLowerCase(), entry.value);
  }

  return chapters.map((fields, index) => {
    const { num, den } = parseTimebase(fields.get('timebase'));
    const toMs = (raw: string | undefined): number =>
      Math.round((Number(raw ?? 0) * num * 1000) / den);

    return {
      index,
      title: fields.get('title') ?? `Chapter ${index + 1}`,
      startMs: toMs(fields.get('start')),
      endMs: toMs(fields.get('end')),
    };
  });
}
