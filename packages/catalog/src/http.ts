/**
 * HTTP helpers for catalog calls
 *
 * Thin wrapper around undici that turns transport failures and HTTP status
 * codes into CatalogError kinds, and zod failures into `invalidResponse`.
 */

import { request, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { CatalogError, type CatalogErrorKind } from '@chaptify/core';

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  dispatcher?: Dispatcher;
  timeout?: number;
}

/**
 * Which CatalogError kind a non-2xx status maps to
 */
export function classifyStatus(statusCode: number): CatalogErrorKind {
  if (statusCode === 401 || statusCode === 403) {
    return 'unauthorized';
  }
  if (statusCode === 404) {
    return 'notFound';
  }
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return 'transient';
  }
  return 'invalidResponse';
}

/**
 * Perform a request and validate the JSON body against `schema`
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: HttpRequest = {}
): Promise<z.infer<S>> {
  const timeout = options.timeout ?? 30000;

  let statusCode: number;
  let text: string;
  try {
    const response = await request(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      dispatcher: options.dispatcher,
      headersTimeout: timeout,
      bodyTimeout: timeout,
    });
    statusCode = response.statusCode;
    text = await response.body.text();
  } catch (error) {
    throw new CatalogError(
      'transient',
      `Catalog request failed: ${error instanceof Error ? error.message : String(error)}`,
      { url },
      { cause: error }
    );
  }

  if (statusCode < 200 || statusCode >= 300) {
    throw new CatalogError(
      classifyStatus(statusCode),
      `Catalog responded ${statusCode}: ${text.substring(0, 200)}`,
      { statusCode, url }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new CatalogError('invalidResponse', 'Catalog response is not JSON', { statusCode, url }, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogError(
      'invalidResponse',
      `Unexpected catalog response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      { statusCode, url }
    );
  }
  return parsed.data;
}
