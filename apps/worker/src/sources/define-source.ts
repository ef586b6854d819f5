import type { ScrapeSourceDefinition } from './types.js';

/**
 * Typed helper for source definitions used by worker orchestration.
 * The definition id must match the catalog source's manifest id.
 */
export function defineScrapeSource<T extends ScrapeSourceDefinition>(definition: T): T {
  if (definition.id !== definition.source.manifest.id) {
    throw new Error(`Source definition ${definition.id} wraps source ${definition.source.manifest.id}`);
  }
  if (definition.entryPoints.length === 0) {
    throw new Error(`Source definition ${definition.id} has no entry points`);
  }

  return definition;
}
