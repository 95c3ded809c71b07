/**
 * Name Normalization
 *
 * One normalization shared by the identity extractor and the work matcher,
 * so that both sides of a comparison are folded the same way.
 */

/**
 * Case-fold, strip accents and punctuation, collapse whitespace.
 * Apostrophes are dropped rather than turned into spaces ("Howl's" -> "howls").
 */
export function normalizeText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['\u2018\u2019`]/g, '')
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const EDITION_NOISE: readonly RegExp[] = [
  /\s*[([]\s*(un)?abridged\s*[)\]]\s*/gi,
  /\s*[([]\s*full[- ]cast( edition)?\s*[)\]]\s*/gi,
  /\s*[([]\s*dramati[sz]ed( edition)?\s*[)\]]\s*/gi,
  /\s*[([]\s*narrated by[^)\]]*[)\]]\s*/gi,
  /\s*[([]\s*audiobook\s*[)\]]\s*/gi,
];

/**
 * Normalize a title for comparison, dropping edition markers that
 * catalogs and file names add inconsistently.
 */
export function normalizeTitle(title: string): string {
  let cleaned = title;
  for (const pattern of EDITION_NOISE) {
    cleaned = cleaned.replace(pattern, ' ');
  }
  return normalizeText(cleaned);
}

/**
 * Order-insensitive author key: "Jones, Diana Wynne" and "Diana Wynne Jones"
 * produce the same value.
 */
export function authorKey(author: string): string {
  return normalizeText(author).split(' ').filter(Boolean).sort().join(' ');
}
