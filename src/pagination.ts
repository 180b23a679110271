import type { JsonObject } from './models/common.js';
import type { QueryParams } from './windows.js';

/**
 * Function type for fetching one page of a paged endpoint.
 */
export type PageFetcher = (params: QueryParams) => Promise<JsonObject>;

/**
 * Request every page of one query, in order.
 *
 * Starts as if page 0 of 1 had been seen, so at least one request is made.
 * Each request asks for the page after the one the previous response
 * reported, and the loop ends once a response's `page` reaches its
 * `total_pages`. A response without numeric paging fields is the last one.
 *
 * @param fetchPage - Performs the request for one set of params
 * @param params - Query parameters shared by every page; never mutated
 */
export async function* iterPages(
  fetchPage: PageFetcher,
  params: QueryParams
): AsyncGenerator<JsonObject, void, undefined> {
  let page = 0;
  let totalPages = 1;
  while (page < totalPages) {
    const response = await fetchPage({ ...params, page: String(page + 1) });
    yield response;

    const reportedPage = response['page'];
    const reportedTotal = response['total_pages'];
    if (typeof reportedPage !== 'number' || typeof reportedTotal !== 'number') {
      break;
    }
    page = reportedPage;
    totalPages = reportedTotal;
  }
}

/**
 * Lazy async iterator for paginated API responses.
 *
 * Fetches pages on demand as you iterate. The underlying requests happen
 * once: iterating again resumes where the previous loop stopped.
 *
 * @example
 * // Iterate through all transactions
 * for await (const txn of client.iterTransactions(start, end)) {
 *   console.log(txn.transactionId());
 * }
 *
 * @example
 * // Get the first 10 transactions
 * const top10 = await client.iterTransactions(start, end).take(10);
 */
export class PageIterator<T> implements AsyncIterable<T> {
  private readonly source: AsyncIterator<T, void, undefined>;
  private exhausted = false;

  /**
   * Create a new PageIterator.
   *
   * @param source - Async generator producing the items
   */
  constructor(source: AsyncGenerator<T, void, undefined>) {
    this.source = source;
  }

  /**
   * Async iterator implementation for `for await...of` loops.
   *
   * Breaking out of the loop stops further requests but leaves the
   * remaining items available to a later loop.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (!this.exhausted) {
      const result = await this.source.next();
      if (result.done) {
        this.exhausted = true;
        break;
      }
      yield result.value;
    }
  }

  /**
   * Get the next item, or undefined when there are none left.
   */
  async first(): Promise<T | undefined> {
    const [item] = await this.take(1);
    return item;
  }

  /**
   * Get all remaining items across all pages.
   *
   * Warning: This loads all items into memory. For large date ranges,
   * consider iterating with `for await...of` instead.
   */
  async all(): Promise<T[]> {
    const results: T[] = [];
    for await (const item of this) {
      results.push(item);
    }
    return results;
  }

  /**
   * Get up to the next N items.
   */
  async take(n: number): Promise<T[]> {
    const results: T[] = [];
    if (n <= 0) {
      return results;
    }
    for await (const item of this) {
      results.push(item);
      if (results.length >= n) break;
    }
    return results;
  }
}
