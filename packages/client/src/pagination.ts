/**
 * Walks paginated api/v0 listings.
 *
 * The first request carries the query parameters; later pages are read from
 * the absolute `next` URL the platform returns, which already holds them.
 * The client refuses `next` links on another origin.
 */

import { paginatedResponseSchema, type PaginatedResponse } from '@valohai-flow/shared';
import type { RequestFn, ResponseSchema } from './types.js';

export interface ListingRequest<T> {
  path: string;
  item: ResponseSchema<T>;
  params?: Record<string, string>;
}

/**
 * Yield the results of each page in order
 */
export async function* iteratePages<T>(
  request: RequestFn,
  listing: ListingRequest<T>
): AsyncGenerator<T[], void, undefined> {
  const pageSchema = paginatedResponseSchema(listing.item);
  const visited = new Set<string>();

  let next: string | null | undefined = listing.path;
  let params: Record<string, string> | undefined = listing.params;

  while (next && !visited.has(next)) {
    visited.add(next);
    const page: PaginatedResponse<T> = await request('GET', next, pageSchema, params ? { params } : {});
    yield page.results;
    next = page.next;
    params = undefined;
  }
}

/**
 * Collect every item of a listing
 */
export async function listAll<T>(request: RequestFn, listing: ListingRequest<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const results of iteratePages(request, listing)) {
    items.push(...results);
  }
  return items;
}

/**
 * First item matching `predicate`, reading no further pages once found
 */
export async function findFirst<T>(
  request: RequestFn,
  listing: ListingRequest<T>,
  predicate: (item: T) => boolean
): Promise<T | undefined> {
  for await (const results of iteratePages(request, listing)) {
    const match = results.find(predicate);
    if (match !== undefined) {
      return match;
    }
  }
  return undefined;
}
