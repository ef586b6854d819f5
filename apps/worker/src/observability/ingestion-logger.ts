import type { IngestionLogger } from '@shelfscan/ingestion';
import type { Logger } from 'pino';

/**
 * Route runner events onto pino. Per-page chatter stays at debug; the
 * runner's own info lines (run start, totals) are kept at info.
 */
export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    debug: (message, fields) => logger.debug({ event: 'scrape_page', ...fields }, message),
    info: (message, fields) => logger.info({ event: 'scrape_run', ...fields }, message),
    warn: (message, fields) => logger.warn({ event: 'scrape_run', ...fields }, message),
    error: (message, fields) => logger.error({ event: 'scrape_run', ...fields }, message),
  };
}
