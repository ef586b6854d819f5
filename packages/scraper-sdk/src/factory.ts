import type { CatalogSource } from './types.js';

/**
 * Typed helper for catalog source definitions.
 * Keeps source declarations consistent without runtime overhead.
 */
export function defineSource<T extends CatalogSource>(source: T): T {
  return source;
}
