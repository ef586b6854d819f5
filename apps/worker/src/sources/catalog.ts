import type { ScrapeSourceDefinition } from './types.js';
import { booksToScrapeDefinition } from './books-toscrape.js';

const allSources: ScrapeSourceDefinition[] = [booksToScrapeDefinition];

function buildSourceMap(sources: ScrapeSourceDefinition[]): Map<string, ScrapeSourceDefinition> {
  const sourceMap = new Map<string, ScrapeSourceDefinition>();

  for (const source of sources) {
    if (sourceMap.has(source.id)) {
      throw new Error(`Duplicate source id: ${source.id}`);
    }

    sourceMap.set(source.id, source);
  }

  return sourceMap;
}

const sourceMap = buildSourceMap(allSources);

export function getAllSources(): ScrapeSourceDefinition[] {
  return [...allSources];
}

export function hasSource(sourceId: string): boolean {
  return sourceMap.has(sourceId);
}

export function getSourceById(sourceId: string): ScrapeSourceDefinition {
  const source = sourceMap.get(sourceId);
  if (!source) {
    throw new Error(`Unknown source id: ${sourceId}`);
  }

  return source;
}
