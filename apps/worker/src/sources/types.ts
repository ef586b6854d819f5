import type { CatalogSource } from '@shelfscan/scraper-sdk';
import type { RunSettings } from '@shelfscan/ingestion';

export interface SourceRuntimePolicy {
  /** BullMQ attempts for a scheduled run of this source. */
  attempts: number;
  backoffMs: number;
}

export interface ScrapeSourceDefinition {
  id: string;
  source: CatalogSource;
  entryPoints: string[];
  runtime: SourceRuntimePolicy;
  /** Base run settings; environment settings override them, and request settings override both. */
  settings?: RunSettings;
  /** Cron pattern; defaults to the source manifest's schedule. */
  schedule?: string;
}
