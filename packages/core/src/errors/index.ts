/**
 * Custom Error Classes
 *
 * Every failure the pipeline can report is one of these. The `code` is
 * stable and is what the CLI prints as the failure kind.
 */

import type { CatalogWork } from '../types/catalog.js';

export type ChaptifyErrorCode =
  | 'IDENTITY_ERROR'
  | 'CATALOG_ERROR'
  | 'NO_MATCH'
  | 'AMBIGUOUS_MATCH'
  | 'UNRESOLVABLE_TIMECODES'
  | 'DURATION_MISMATCH'
  | 'PROBE_ERROR'
  | 'REMUX_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base error class for all chaptify errors
 */
export class ChaptifyError extends Error {
  public readonly code: ChaptifyErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ChaptifyErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChaptifyError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * No usable author/title could be derived from tags or file name
 */
export class IdentityError extends ChaptifyError {
  constructor(filePath: string, reason: string) {
    super(
      `Cannot determine author and title for ${filePath}: ${reason}`,
      'IDENTITY_ERROR',
      { filePath, reason }
    );
    this.name = 'IdentityError';
  }
}

export type CatalogErrorKind = 'transient' | 'notFound' | 'unauthorized' | 'invalidResponse';

/**
 * Catalog call failed. Only `transient` is worth retrying.
 */
export class CatalogError extends ChaptifyError {
  public readonly kind: CatalogErrorKind;
  public readonly statusCode?: number;

  constructor(
    kind: CatalogErrorKind,
    message: string,
    details: { statusCode?: number; url?: string } = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'CATALOG_ERROR', { kind, ...details }, options);
    this.name = 'CatalogError';
    this.kind = kind;
    this.statusCode = details.statusCode;
  }
}

export function isTransientCatalogError(error: unknown): boolean {
  return error instanceof CatalogError && error.kind === 'transient';
}

interface CandidateSummary {
  id: string;
  author: string;
  title: string;
}

function summarize(candidates: readonly CatalogWork[]): CandidateSummary[] {
  return candidates.map(({ id, author, title }) => ({ id, author, title }));
}

/**
 * No catalog candidate survived the author/title filter
 */
export class NoMatchError extends ChaptifyError {
  public readonly candidates: readonly CatalogWork[];

  constructor(author: string, title: string, candidates: readonly CatalogWork[]) {
    super(
      `No catalog match for "${title}" by ${author} (${candidates.length} candidate(s) rejected)`,
      'NO_MATCH',
      { author, title, candidates: summarize(candidates) }
    );
    this.name = 'NoMatchError';
    this.candidates = candidates;
  }
}

/**
 * Two or more candidates tie on every criterion; picking one would be a guess
 */
export class AmbiguousMatchError extends ChaptifyError {
  public readonly candidates: readonly CatalogWork[];

  constructor(author: string, title: string, candidates: readonly CatalogWork[]) {
    super(
      `Ambiguous catalog match for "${title}" by ${author}: ${candidates.map(c => c.id).join(', ')}`,
      'AMBIGUOUS_MATCH',
      { author, title, candidates: summarize(candidates) }
    );
    this.name = 'AmbiguousMatchError';
    this.candidates = candidates;
  }
}

/**
 * The track list cannot be turned into a valid chapter partition
 */
export class UnresolvableTimecodesError extends ChaptifyError {
  constructor(reason: string, details: Record<string, unknown> = {}) {
    super(`Cannot resolve chapter timecodes: ${reason}`, 'UNRESOLVABLE_TIMECODES', details);
    this.name = 'UnresolvableTimecodesError';
  }
}

/**
 * Catalog total and file duration disagree by more than the tolerance
 */
export class DurationMismatchError extends ChaptifyError {
  public readonly nominalTotalMs: number;
  public readonly actualDurationMs: number;
  public readonly drift: number;

  constructor(nominalTotalMs: number, actualDurationMs: number, tolerance: number) {
    const drift = Math.abs(actualDurationMs - nominalTotalMs) / nominalTotalMs;
    super(
      `Catalog duration ${nominalTotalMs}ms differs from file duration ${actualDurationMs}ms ` +
        `by ${(drift * 100).toFixed(1)}% (tolerance ${(tolerance * 100).toFixed(1)}%)`,
      'DURATION_MISMATCH',
      { nominalTotalMs, actualDurationMs, drift, tolerance }
    );
    this.name = 'DurationMismatchError';
    this.nominalTotalMs = nominalTotalMs;
    this.actualDurationMs = actualDurationMs;
    this.drift = drift;
  }
}

/**
 * The input file could not be inspected
 */
export class ProbeError extends ChaptifyError {
  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot probe ${filePath}: ${reason}`, 'PROBE_ERROR', { filePath, reason }, options);
    this.name = 'ProbeError';
  }
}

export type RemuxFailureReason =
  | 'spawn'
  | 'timeout'
  | 'exit'
  | 'emptyOutput'
  | 'durationMismatch'
  | 'probe'
  | 'io';

/**
 * The remux step failed; the original file was left untouched
 */
export class RemuxError extends ChaptifyError {
  public readonly reason: RemuxFailureReason;

  constructor(
    reason: RemuxFailureReason,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'REMUX_ERROR', { reason, ...details }, options);
    this.name = 'RemuxError';
    this.reason = reason;
  }
}

/**
 * Invalid environment or command-line configuration
 */
export class ConfigError extends ChaptifyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}
