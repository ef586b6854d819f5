import { EnumerationError, FetchError, type CatalogSource } from '@shelfscan/scraper-sdk';
import { canonicalizeUrl } from './fingerprint.js';
import type { EnumerationWarning, Fetcher, IngestionLogger } from './types.js';

export interface EnumerateOptions {
  fetcher: Fetcher;
  source: Pick<CatalogSource, 'parseListing'>;
  maxPagesPerSource: number;
  logger: IngestionLogger;
  onWarning: (warning: EnumerationWarning) => void;
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof FetchError && error.kind === 'permanent' && error.status === 404;
}

/**
 * Lazily discover book URLs from each entry point, following pagination.
 *
 * - Same URL linked from several listing pages → yielded once per run
 * - First entry point unreachable → EnumerationError (nothing can be scraped)
 * - Later entry point unreachable → warning, next entry point
 * - 404 past the first page → end of that source's pagination
 */
export async function* enumerateBookUrls(
  entryPoints: readonly string[],
  options: EnumerateOptions,
): AsyncGenerator<string, void, undefined> {
  const { fetcher, source, maxPagesPerSource, logger, onWarning, signal } = options;
  const seen = new Set<string>();

  for (const [index, entryPoint] of entryPoints.entries()) {
    const visited = new Set<string>();
    let pageUrl: string | undefined = entryPoint;
    let pagesRead = 0;
    let discoveredHere = 0;

    while (pageUrl !== undefined) {
      if (signal?.aborted) return;

      if (pagesRead >= maxPagesPerSource) {
        onWarning({
          entryPoint,
          pageUrl,
          reason: `stopped after ${maxPagesPerSource} listing pages; more pages were linked`,
        });
        break;
      }

      visited.add(pageUrl);
      let raw: string;
      try {
        raw = await fetcher.fetch(pageUrl, { signal });
      } catch (error) {
        if (signal?.aborted) return;

        if (pagesRead === 0 && index === 0) {
          throw new EnumerationError(entryPoint, errorMessage(error), { cause: error });
        }

        if (pagesRead > 0 && isNotFound(error)) {
          logger.debug(`[enumerate] ${pageUrl} not found; end of pagination`, { stage: 'enumerate', entryPoint });
        } else {
          onWarning({ entryPoint, pageUrl, reason: errorMessage(error) });
        }
        break;
      }

      pagesRead += 1;
      const listing = source.parseListing(raw, pageUrl);
      if (listing.bookUrls.length === 0) {
        logger.debug(`[enumerate] ${pageUrl} lists no books; end of pagination`, { stage: 'enumerate', entryPoint });
        break;
      }

      for (const bookUrl of listing.bookUrls) {
        const canonical = canonicalizeUrl(bookUrl);
        if (canonical === undefined || seen.has(canonical)) continue;
        seen.add(canonical);
        discoveredHere += 1;
        yield canonical;
      }

      const next = listing.nextPageUrl === undefined ? undefined : canonicalizeUrl(listing.nextPageUrl);
      pageUrl = next !== undefined && !visited.has(next) ? next : undefined;
    }

    logger.info(`[enumerate] ${entryPoint}: ${discoveredHere} new book URLs over ${pagesRead} pages`, {
      stage: 'enumerate',
      entryPoint,
      pagesRead,
      discovered: discoveredHere,
    });
  }
}
