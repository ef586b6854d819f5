import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parseListing } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function fixture(name: string): string {
  return readFileSync(resolve(__dirname, '../fixtures', name), 'utf-8');
}

describe('Books to Scrape listing parser', () => {
  it('resolves book links against the listing page', () => {
    const page = parseListing(fixture('listing-page-1.html'), 'https://books.toscrape.com/catalogue/page-1.html');

    expect(page.bookUrls).toEqual([
      'https://books.toscrape.com/catalogue/the-lantern-keeper_12/index.html',
      'https://books.toscrape.com/catalogue/salt-and-ledger_11/index.html',
      'https://books.toscrape.com/catalogue/quiet-orchard_10/index.html',
    ]);
    expect(page.nextPageUrl).toBe('https://books.toscrape.com/catalogue/page-2.html');
  });

  it('reports no next page on the last listing page', () => {
    const page = parseListing(fixture('listing-page-2.html'), 'https://books.toscrape.com/catalogue/page-2.html');

    expect(page.bookUrls).toEqual(['https://books.toscrape.com/catalogue/paper-harbors_9/index.html']);
    expect(page.nextPageUrl).toBeUndefined();
  });

  it('returns an empty page for unrelated markup', () => {
    expect(parseListing('<html><body><p>maintenance</p></body></html>', 'https://books.toscrape.com/')).toEqual({
      bookUrls: [],
      nextPageUrl: undefined,
    });
  });
});
