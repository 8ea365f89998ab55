/**
 * Paginated Fetcher
 * Walks an @odata.nextLink-linked collection one request at a time.
 */

import { z } from 'zod';
import { GraphTransport } from './graph';
import { describeIssues, pageSchema } from './schemas';
import { Page } from '../types';
import { DEFAULT_AUDIT_OPTIONS } from '../utils/constants';
import { CancelledError, FetchError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ItemSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface PageOptions {
  signal?: AbortSignal;
  /** Fail rather than return a truncated set when more pages remain */
  maxPages?: number;
  headers?: Record<string, string>;
}

/**
 * A start URL is either a Graph path ("/users?...") or an absolute https URL
 */
export function assertStartUrl(startUrl: string): void {
  if (startUrl.startsWith('/') && !startUrl.startsWith('//')) {
    return;
  }
  let parsed: URL;
  try {
    parsed = new URL(startUrl);
  } catch {
    throw new TypeError(`Malformed start URL: "${startUrl}"`);
  }
  if (parsed.protocol !== 'https:') {
    throw new TypeError(`Start URL must use https: "${startUrl}"`);
  }
}

/**
 * Fetch and decode one page. Every failure becomes a FetchError.
 */
export async function fetchPage<T>(
  transport: GraphTransport,
  url: string,
  itemSchema: ItemSchema<T>,
  headers?: Record<string, string>,
  signal?: AbortSignal
): Promise<Page<T>> {
  let status: number;
  let ok: boolean;
  let text: string;
  try {
    const response = await transport.get(url, headers, signal);
    status = response.status;
    ok = response.ok;
    text = await response.text();
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError('fetching');
    }
    throw new FetchError(url, { kind: 'RemoteError', status: 0, body: errorMessage(error) }, { cause: error });
  }

  if (status === 401) {
    throw new FetchError(url, { kind: 'Unauthorized', body: text });
  }
  if (!ok) {
    throw new FetchError(url, { kind: 'RemoteError', status, body: text });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new FetchError(url, { kind: 'DecodeError', detail: errorMessage(error) }, { cause: error });
  }

  const parsed = pageSchema(itemSchema).safeParse(json);
  if (!parsed.success) {
    throw new FetchError(url, { kind: 'DecodeError', detail: describeIssues(parsed.error) });
  }

  return { value: parsed.data.value, nextLink: parsed.data['@odata.nextLink'] };
}

/**
 * Lazily yield every record of every page, in server order.
 * The sequence is finite and cannot be restarted.
 */
export async function* paginate<T>(
  transport: GraphTransport,
  startUrl: string,
  itemSchema: ItemSchema<T>,
  options: PageOptions = {}
): AsyncGenerator<T, void, undefined> {
  assertStartUrl(startUrl);

  const maxPages = options.maxPages ?? DEFAULT_AUDIT_OPTIONS.maxPages;
  const visited = new Set<string>();
  let url: string | undefined = startUrl;
  let pageCount = 0;

  while (url) {
    if (options.signal?.aborted) {
      throw new CancelledError('fetching');
    }
    if (pageCount >= maxPages) {
      throw new FetchError(url, { kind: 'PageLimit', maxPages });
    }

    visited.add(url);
    pageCount++;
    logger.debug(`Fetching ${url} (page ${pageCount})`);

    const page: Page<T> = await fetchPage(transport, url, itemSchema, options.headers, options.signal);
    logger.debug(`Page ${pageCount}: ${page.value.length} record(s)`);

    for (const item of page.value) {
      yield item;
    }

    if (page.nextLink && visited.has(page.nextLink)) {
      throw new FetchError(page.nextLink, {
        kind: 'DecodeError',
        detail: 'next link points at a page already fetched',
      });
    }
    url = page.nextLink;
  }

  logger.debug(`No more pages after ${pageCount} page(s)`);
}

/**
 * Materialize the whole collection. Either every record is returned or a
 * FetchError is thrown and nothing collected so far escapes.
 */
export async function fetchAll<T>(
  transport: GraphTransport,
  startUrl: string,
  itemSchema: ItemSchema<T>,
  options: PageOptions = {}
): Promise<T[]> {
  const records: T[] = [];
  for await (const record of paginate(transport, startUrl, itemSchema, options)) {
    records.push(record);
  }
  logger.debug(`Fetched ${records.length} record(s) from ${startUrl}`);
  return records;
}
