import type { Job } from 'bullmq';
import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { MemoryBookSink, type UpsertSink } from '@shelfscan/ingestion';
import { StoreError } from '@shelfscan/scraper-sdk';
import { handleScrapeRunJob, runSource } from '../src/jobs/scrape-run.js';
import type { ScrapeRunJobData } from '../src/queues.js';
import { booksToScrapeDefinition } from '../src/sources/books-toscrape.js';
import { catalogueSite, CATALOGUE, FIRST_PAGE, FixtureFetcher, stub } from './test-helpers.js';

const logger = pino({ level: 'silent' });

function scrapeJob(data: ScrapeRunJobData): Job<ScrapeRunJobData> {
  return stub<Job<ScrapeRunJobData>>({ id: 'job-1', name: 'books-scrape', data });
}

describe('handleScrapeRunJob', () => {
  it('scrapes every catalogue page and stores the valid books', async () => {
    const sink = new MemoryBookSink();
    const fetcher = new FixtureFetcher(catalogueSite());

    const summary = await handleScrapeRunJob(scrapeJob({ sourceId: 'books-toscrape', traceId: 'trace-1' }), {
      sinkFor: () => sink,
      fetcher,
      logger,
    });

    expect(summary.runId).toBe('trace-1');
    expect(summary.status).toBe('completed');
    expect(summary.fatal).toBe(false);
    expect(summary.counts).toEqual({
      discovered: 4,
      fetchFailed: 1,
      extractedOk: 2,
      extractedFailed: 1,
      validatedOk: 2,
      validatedFailed: 0,
      persistedOk: 2,
      persistedFailed: 0,
    });
    expect(summary.warnings).toEqual([]);
    expect(summary.failures.map((failure) => [failure.stage, failure.code, failure.url]).sort()).toEqual([
      ['extract', 'missing_required_field', `${CATALOGUE}/quiet-orchard_10/index.html`],
      ['fetch', 'http_404', `${CATALOGUE}/paper-harbors_9/index.html`],
    ]);
    expect(
      sink
        .all()
        .map((record) => record.title)
        .sort(),
    ).toEqual(['The Lantern Keeper', 'Untitled Draft']);
  });

  it('passes the source id to the sink factory', async () => {
    const sinkFor = vi.fn((_sourceId: string): UpsertSink => new MemoryBookSink());

    await handleScrapeRunJob(scrapeJob({ sourceId: 'books-toscrape', traceId: 'trace-2' }), {
      sinkFor,
      fetcher: new FixtureFetcher(catalogueSite()),
      logger,
    });

    expect(sinkFor).toHaveBeenCalledWith('books-toscrape');
  });

  it('fails the job when the run aborts on an unusable store', async () => {
    const sink: UpsertSink = {
      upsert: vi.fn().mockRejectedValue(new StoreError('fatal', 'password authentication failed', '28P01')),
    };

    await expect(
      handleScrapeRunJob(scrapeJob({ sourceId: 'books-toscrape', traceId: 'trace-3' }), {
        sinkFor: () => sink,
        fetcher: new FixtureFetcher(catalogueSite()),
        logger,
      }),
    ).rejects.toThrow('[books.scrape:books-toscrape] run trace-3 aborted: password authentication failed');
  });

  it('rejects jobs for unknown sources', async () => {
    await expect(
      handleScrapeRunJob(scrapeJob({ sourceId: 'nope' }), {
        sinkFor: () => new MemoryBookSink(),
        fetcher: new FixtureFetcher(new Map()),
        logger,
      }),
    ).rejects.toThrow('Unknown source id: nope');
  });
});

describe('runSource', () => {
  it('lets request settings override environment and source settings', async () => {
    const sink = new MemoryBookSink();

    const summary = await runSource(
      booksToScrapeDefinition,
      { runId: 'trace-4', settings: { maxPagesPerSource: 1 } },
      { sinkFor: () => sink, fetcher: new FixtureFetcher(catalogueSite()), logger, settings: { maxPagesPerSource: 5 } },
    );

    expect(summary.counts.discovered).toBe(3);
    expect(summary.warnings).toEqual([
      {
        entryPoint: FIRST_PAGE,
        pageUrl: `${CATALOGUE}/page-2.html`,
        reason: 'stopped after 1 listing pages; more pages were linked',
      },
    ]);
  });

  it('applies the source definition settings beneath environment settings', async () => {
    const definition = { ...booksToScrapeDefinition, settings: { maxPagesPerSource: 1 } };

    const fromDefinition = await runSource(
      definition,
      { runId: 'trace-6' },
      { sinkFor: () => new MemoryBookSink(), fetcher: new FixtureFetcher(catalogueSite()), logger },
    );
    const fromEnvironment = await runSource(
      definition,
      { runId: 'trace-7' },
      {
        sinkFor: () => new MemoryBookSink(),
        fetcher: new FixtureFetcher(catalogueSite()),
        logger,
        settings: { maxPagesPerSource: 5 },
      },
    );

    expect(fromDefinition.counts.discovered).toBe(3);
    expect(fromDefinition.warnings).toHaveLength(1);
    expect(fromEnvironment.counts.discovered).toBe(4);
    expect(fromEnvironment.warnings).toEqual([]);
  });

  it('uses the entry points given by the request', async () => {
    const fetcher = new FixtureFetcher(catalogueSite());

    const summary = await runSource(
      booksToScrapeDefinition,
      { runId: 'trace-5', entryPoints: [`${CATALOGUE}/page-2.html`] },
      { sinkFor: () => new MemoryBookSink(), fetcher, logger },
    );

    expect(fetcher.calls[0]).toBe(`${CATALOGUE}/page-2.html`);
    expect(summary.counts.discovered).toBe(1);
    expect(summary.counts.fetchFailed).toBe(1);
  });
});
