import { describe, it, expect, vi } from 'vitest';
import { EnumerationError, FetchError } from '@shelfscan/scraper-sdk';
import { enumerateBookUrls, type EnumerateOptions } from '../src/enumerate.js';
import type { EnumerationWarning } from '../src/types.js';
import { FakeFetcher, jsonSource, listingPage, silentLogger, type PageBehaviour } from './fakes.js';

const SHOP_A = 'https://shop-a.test/catalogue/page-1.html';
const SHOP_B = 'https://shop-b.test/catalogue/page-1.html';
const SHOP_C = 'https://shop-c.test/catalogue/page-1.html';

function books(host: string, from: number, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `https://${host}/catalogue/book-${from + i}.html`);
}

async function collect(entryPoints: string[], options: EnumerateOptions): Promise<string[]> {
  const urls: string[] = [];
  for await (const url of enumerateBookUrls(entryPoints, options)) {
    urls.push(url);
  }
  return urls;
}

function optionsFor(fetcher: FakeFetcher, warnings: EnumerationWarning[], maxPagesPerSource = 50): EnumerateOptions {
  return {
    fetcher,
    source: jsonSource,
    maxPagesPerSource,
    logger: silentLogger(),
    onWarning: (warning) => warnings.push(warning),
  };
}

describe('enumerateBookUrls', () => {
  it('skips an unreachable entry point after the first and keeps going', async () => {
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage(books('shop-a.test', 1, 10))],
        [SHOP_B, new FetchError('transient', SHOP_B, 'connect ECONNREFUSED')],
        [SHOP_C, listingPage(books('shop-c.test', 1, 5))],
      ]),
    );
    const warnings: EnumerationWarning[] = [];

    const urls = await collect([SHOP_A, SHOP_B, SHOP_C], optionsFor(fetcher, warnings));

    expect(urls).toHaveLength(15);
    expect(warnings).toEqual([{ entryPoint: SHOP_B, pageUrl: SHOP_B, reason: 'connect ECONNREFUSED' }]);
  });

  it('follows next links until the last page', async () => {
    const page2 = 'https://shop-a.test/catalogue/page-2.html';
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage(books('shop-a.test', 1, 2), page2)],
        [page2, listingPage(books('shop-a.test', 3, 1))],
      ]),
    );

    const urls = await collect([SHOP_A], optionsFor(fetcher, []));

    expect(urls).toEqual(books('shop-a.test', 1, 3));
    expect(fetcher.calls).toEqual([SHOP_A, page2]);
  });

  it('yields a URL linked from several pages only once', async () => {
    const page2 = 'https://shop-a.test/catalogue/page-2.html';
    const shared = 'https://shop-a.test/catalogue/book-1.html';
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage([shared, `${shared}#reviews`], page2)],
        [page2, listingPage([shared, 'https://shop-a.test/catalogue/book-2.html'])],
      ]),
    );

    const urls = await collect([SHOP_A], optionsFor(fetcher, []));

    expect(urls).toEqual([shared, 'https://shop-a.test/catalogue/book-2.html']);
  });

  it('throws EnumerationError when the first entry point is unreachable', async () => {
    const fetcher = new FakeFetcher(new Map([[SHOP_B, listingPage(books('shop-b.test', 1, 3))]]));

    await expect(collect([SHOP_A, SHOP_B], optionsFor(fetcher, []))).rejects.toBeInstanceOf(EnumerationError);
    expect(fetcher.calls).toEqual([SHOP_A]);
  });

  it('treats a 404 past the first page as the end of pagination', async () => {
    const missing = 'https://shop-a.test/catalogue/page-2.html';
    const fetcher = new FakeFetcher(new Map([[SHOP_A, listingPage(books('shop-a.test', 1, 2), missing)]]));
    const warnings: EnumerationWarning[] = [];

    const urls = await collect([SHOP_A], optionsFor(fetcher, warnings));

    expect(urls).toHaveLength(2);
    expect(warnings).toEqual([]);
  });

  it('warns when a later listing page fails for another reason', async () => {
    const broken = 'https://shop-a.test/catalogue/page-2.html';
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage(books('shop-a.test', 1, 2), broken)],
        [broken, new FetchError('transient', broken, 'GET returned 503', 503)],
      ]),
    );
    const warnings: EnumerationWarning[] = [];

    await collect([SHOP_A], optionsFor(fetcher, warnings));

    expect(warnings).toEqual([{ entryPoint: SHOP_A, pageUrl: broken, reason: 'GET returned 503' }]);
  });

  it('stops at maxPagesPerSource and says so', async () => {
    const page2 = 'https://shop-a.test/catalogue/page-2.html';
    const page3 = 'https://shop-a.test/catalogue/page-3.html';
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage(books('shop-a.test', 1, 1), page2)],
        [page2, listingPage(books('shop-a.test', 2, 1), page3)],
        [page3, listingPage(books('shop-a.test', 3, 1))],
      ]),
    );
    const warnings: EnumerationWarning[] = [];

    const urls = await collect([SHOP_A], optionsFor(fetcher, warnings, 2));

    expect(urls).toHaveLength(2);
    expect(fetcher.calls).not.toContain(page3);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.pageUrl).toBe(page3);
  });

  it('does not loop on a next link pointing back to a visited page', async () => {
    const fetcher = new FakeFetcher(new Map([[SHOP_A, listingPage(books('shop-a.test', 1, 1), SHOP_A)]]));

    const urls = await collect([SHOP_A], optionsFor(fetcher, []));

    expect(urls).toHaveLength(1);
    expect(fetcher.calls).toEqual([SHOP_A]);
  });

  it('stops on an empty listing page', async () => {
    const page2 = 'https://shop-a.test/catalogue/page-2.html';
    const page3 = 'https://shop-a.test/catalogue/page-3.html';
    const fetcher = new FakeFetcher(
      new Map<string, PageBehaviour>([
        [SHOP_A, listingPage(books('shop-a.test', 1, 1), page2)],
        [page2, listingPage([], page3)],
      ]),
    );

    await collect([SHOP_A], optionsFor(fetcher, []));

    expect(fetcher.calls).toEqual([SHOP_A, page2]);
  });

  it('is lazy: nothing is fetched until the first URL is requested', async () => {
    const fetcher = new FakeFetcher(new Map([[SHOP_A, listingPage(books('shop-a.test', 1, 1))]]));
    const fetchSpy = vi.spyOn(fetcher, 'fetch');

    const iterator = enumerateBookUrls([SHOP_A], optionsFor(fetcher, []));
    expect(fetchSpy).not.toHaveBeenCalled();

    await iterator.next();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('stops without error once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new FakeFetcher(new Map([[SHOP_A, listingPage(books('shop-a.test', 1, 3))]]));

    const urls = await collect([SHOP_A], { ...optionsFor(fetcher, []), signal: controller.signal });

    expect(urls).toEqual([]);
    expect(fetcher.calls).toEqual([]);
  });
});
