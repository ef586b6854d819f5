import { booksToScrapeSource } from '@shelfscan/source-books-toscrape';
import { defineScrapeSource } from './define-source.js';

export const booksToScrapeDefinition = defineScrapeSource({
  id: booksToScrapeSource.manifest.id,
  source: booksToScrapeSource,
  entryPoints: ['https://books.toscrape.com/catalogue/page-1.html'],
  runtime: {
    attempts: 2,
    backoffMs: 60_000,
  },
  settings: {
    workerCount: 5,
    batchSize: 25,
  },
});
