import { vi } from 'vitest';
import { z } from 'zod';
import {
  defineSource,
  err,
  ok,
  ExtractionError,
  FetchError,
  RAW_FIELD_NAMES,
  type CatalogSource,
  type RawFields,
} from '@shelfscan/scraper-sdk';
import type { FetchRequestOptions, Fetcher } from '../src/types.js';

const listingSchema = z.object({
  bookUrls: z.array(z.string()),
  next: z.string().optional(),
});

const bookSchema = z.object({
  book: z.record(z.enum(RAW_FIELD_NAMES), z.string()),
});

export function listingPage(bookUrls: string[], next?: string): string {
  return JSON.stringify({ bookUrls, next });
}

export function bookPage(fields: RawFields): string {
  return JSON.stringify({ book: fields });
}

export function validBook(id: number, overrides: RawFields = {}): RawFields {
  return {
    title: `Book ${id}`,
    author: 'Ada Example',
    price: '10.00',
    currency: 'GBP',
    availability: 'In stock',
    upc: `upc-${id}`,
    ...overrides,
  };
}

/**
 * Pages are JSON documents so that runner tests do not depend on any real
 * markup. Book pages carry a `book` object, anything else is not a book.
 */
export const jsonSource: CatalogSource = defineSource({
  manifest: {
    id: 'json-test',
    name: 'JSON test source',
    version: '0.0.0',
    schedule: '0 0 * * *',
  },
  parseListing(raw: string) {
    const parsed = listingSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) return { bookUrls: [] };
    return { bookUrls: parsed.data.bookUrls, nextPageUrl: parsed.data.next };
  },
  extract(raw: string) {
    const parsed = bookSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) return err(new ExtractionError('book'));
    return ok(parsed.data.book);
  },
});

export type PageBehaviour = string | FetchError | 'hang';

/**
 * Serves canned pages. Unknown URLs answer 404; `hang` pages only settle when
 * the request is aborted.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly pages: Map<string, PageBehaviour>,
    private readonly delayMs = 0,
  ) {}

  async fetch(url: string, options: FetchRequestOptions = {}): Promise<string> {
    this.calls.push(url);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }

      const page = this.pages.get(url);
      if (page === undefined) {
        throw new FetchError('permanent', url, `GET ${url} returned 404`, 404);
      }
      if (page instanceof FetchError) {
        throw page;
      }
      if (page === 'hang') {
        return await new Promise<string>((_, reject) => {
          options.signal?.addEventListener('abort', () => reject(new FetchError('transient', url, 'aborted')), {
            once: true,
          });
        });
      }
      return page;
    } finally {
      this.active -= 1;
    }
  }
}

export function silentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
