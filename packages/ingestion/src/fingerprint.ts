import { createHash } from 'node:crypto';

/**
 * Canonical form of a discovered URL: absolute, fragment dropped.
 * Returns undefined for strings that are not URLs.
 */
export function canonicalizeUrl(url: string): string | undefined {
  try {
    const parsed = new URL(url.trim());
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return undefined;
  }
}

/**
 * Natural key of a book. The UPC identifies a book on its own; without one,
 * a SHA-256 over lowercased title and author stands in.
 */
export function computeBookKey(title: string, author: string, upc?: string | null): string {
  const normalizedUpc = upc?.trim().toLowerCase();
  if (normalizedUpc) {
    return `upc:${normalizedUpc}`;
  }

  const input = [title, author].map((part) => part.toLowerCase().replace(/\s+/g, ' ').trim()).join('|');
  return `book:${createHash('sha256').update(input).digest('hex')}`;
}
