import { closeDatabase, createDatabase } from '@shelfscan/db';
import { booksToScrapeSource } from '@shelfscan/source-books-toscrape';
import { ConfigurationError, EnumerationError } from '@shelfscan/scraper-sdk';
import { readFetcherSettingsFromEnv, readRunOptionsFromEnv } from './config.js';
import { HttpFetcher } from './fetcher.js';
import { MemoryBookSink } from './memory-sink.js';
import { run } from './pipeline.js';
import { summarizeRunReport } from './report.js';
import { DrizzleBookSink } from './store.js';
import type { UpsertSink } from './types.js';

const DEFAULT_ENTRY_POINT = 'https://books.toscrape.com/catalogue/page-1.html';

const dryRun = process.argv.includes('--dry-run');
const databaseUrl = process.env.DATABASE_URL;
if (!dryRun && !databaseUrl) {
  console.error('DATABASE_URL environment variable is required (or pass --dry-run)');
  process.exit(1);
}

const db = !dryRun && databaseUrl ? createDatabase(databaseUrl) : undefined;
const sink: UpsertSink = db
  ? new DrizzleBookSink({ db, sourceId: booksToScrapeSource.manifest.id })
  : new MemoryBookSink();

let exitCode = 0;
try {
  const { entryPoints, ...settings } = readRunOptionsFromEnv();
  const report = await run(entryPoints ?? [DEFAULT_ENTRY_POINT], settings, {
    source: booksToScrapeSource,
    fetcher: new HttpFetcher(readFetcherSettingsFromEnv()),
    sink,
  });

  console.log(JSON.stringify(summarizeRunReport(report), null, 2));
  exitCode = report.status === 'aborted' ? 1 : 0;
} catch (error) {
  if (error instanceof ConfigurationError || error instanceof EnumerationError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  exitCode = 1;
} finally {
  if (db) {
    await closeDatabase(db);
  }
}

process.exit(exitCode);
