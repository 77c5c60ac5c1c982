/**
 * Lazy listing over continuation-token pages
 * @module listing/iterator
 */

import type { ListingPage, ObjectEntry } from '../xml/list-objects.js';

/**
 * - `needs-next-page`: the buffer is empty and another page must be fetched
 * - `has-buffered-entries`: entries of the current page remain
 * - `exhausted`: nothing more will be yielded or fetched
 */
export type ListingState = 'needs-next-page' | 'has-buffered-entries' | 'exhausted';

export interface ListObjectsOptions {
  /**
   * Page size asked of the store (1-1000)
   */
  maxKeys?: number;
  /**
   * Start listing after this key
   */
  startAfter?: string;
}

/**
 * Fetches one page; `continuationToken` is undefined for the first page.
 */
export type PageFetcher = (continuationToken: string | undefined) => Promise<ListingPage>;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Walks a listing one page at a time, fetching a page only once the previous
 * one has been drained.
 *
 * The iterator is single-pass. A failed page fetch rejects the `next()` call
 * that needed it and leaves the iterator exhausted. Calls to `next()` made
 * before the previous one settled are queued, so at most one page request is
 * in flight.
 *
 * @example
 * ```typescript
 * for await (const entry of bucket.listObjects('photos/')) {
 *   console.log(entry.key, entry.size);
 * }
 * ```
 */
export class ListObjectsIterator implements AsyncIterableIterator<ObjectEntry> {
  private currentState: ListingState = 'needs-next-page';
  private buffer: ObjectEntry[] = [];
  private position = 0;
  private continuationToken?: string;
  private fetched = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly fetchPage: PageFetcher) {}

  get state(): ListingState {
    return this.currentState;
  }

  /**
   * Page requests made so far
   */
  get pagesFetched(): number {
    return this.fetched;
  }

  next(): Promise<IteratorResult<ObjectEntry, undefined>> {
    const result = this.tail.then(() => this.advance());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Stops the iteration; called by `for await` on `break`. A page already in
   * flight is discarded when it arrives.
   */
  async return(): Promise<IteratorResult<ObjectEntry, undefined>> {
    this.exhaust();
    return DONE;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Drains the remaining entries into an array.
   */
  async collect(): Promise<ObjectEntry[]> {
    const entries: ObjectEntry[] = [];
    for (;;) {
      const result = await this.next();
      if (result.done) {
        return entries;
      }
      entries.push(result.value);
    }
  }

  private async advance(): Promise<IteratorResult<ObjectEntry, undefined>> {
    for (;;) {
      switch (this.currentState) {
        case 'exhausted':
          return DONE;

        case 'has-buffered-entries': {
          const entry = this.buffer[this.position];
          this.position += 1;
          if (this.position >= this.buffer.length) {
            this.buffer = [];
            this.position = 0;
            this.currentState = this.continuationToken === undefined ? 'exhausted' : 'needs-next-page';
          }
          if (entry === undefined) {
            continue;
          }
          return { done: false, value: entry };
        }

        case 'needs-next-page':
          await this.loadPage();
          continue;
      }
    }
  }

  private async loadPage(): Promise<void> {
    let page: ListingPage;
    try {
      this.fetched += 1;
      page = await this.fetchPage(this.continuationToken);
    } catch (error) {
      this.exhaust();
      throw error;
    }

    // return() may have ended the listing while the page was in flight
    if (this.currentState === 'exhausted') {
      return;
    }

    this.continuationToken = page.nextContinuationToken;
    if (page.entries.length > 0) {
      this.buffer = page.entries;
      this.position = 0;
      this.currentState = 'has-buffered-entries';
    } else {
      this.currentState = this.continuationToken === undefined ? 'exhausted' : 'needs-next-page';
    }
  }

  private exhaust(): void {
    this.currentState = 'exhausted';
    this.buffer = [];
    this.position = 0;
    this.continuationToken = undefined;
  }
}
