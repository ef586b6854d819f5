/**
 * Books to Scrape catalog source.
 *
 * Listing pages are paginated through the "next" link; each book page carries
 * a `.product_main` block plus a product information table. The live catalogue
 * has no author row in that table, so its pages fail validation on `author`
 * unless a mirror adds one.
 */

import * as cheerio from 'cheerio';
import {
  defineSource,
  err,
  ok,
  ExtractionError,
  type ListingPage,
  type RawFieldName,
  type RawFields,
  type Result,
} from '@shelfscan/scraper-sdk';
import { CATEGORY_BREADCRUMB_INDEX, CURRENCY_SYMBOLS, SELECTORS } from './selectors.js';

const DEFAULT_CURRENCY = 'GBP';

function resolveUrl(href: string | undefined, base: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed) return undefined;

  try {
    return new URL(trimmed, base).toString();
  } catch {
    return undefined;
  }
}

function cleanText(value: string | undefined): string | undefined {
  const normalized = value?.replace(/\s+/g, ' ').trim();
  return normalized ? normalized : undefined;
}

/**
 * Split "£51.77" into amount text and ISO currency. The amount is left
 * unparsed so the validator decides whether it is a number.
 */
export function splitPrice(text: string | undefined, defaultCurrency: string): { price?: string; currency?: string } {
  const cleaned = cleanText(text);
  if (!cleaned) return {};

  const symbol = Object.keys(CURRENCY_SYMBOLS).find((candidate) => cleaned.includes(candidate));
  const code = cleaned.match(/\b[A-Z]{3}\b/)?.[0];
  const amount = cleaned
    .replace(symbol ?? '', '')
    .replace(code ?? '', '')
    .trim();

  return {
    price: amount || undefined,
    currency: (symbol ? CURRENCY_SYMBOLS[symbol] : code) ?? defaultCurrency,
  };
}

/**
 * "In stock (22 available)" → label "In stock", units "22".
 */
export function splitAvailability(text: string | undefined): { availability?: string; stockUnits?: string } {
  const cleaned = cleanText(text);
  if (!cleaned) return {};

  const units = cleaned.match(/\((\d+)\s+available\)/i)?.[1];
  const label = cleanText(cleaned.replace(/\(.*\)/, ''));

  return { availability: label, stockUnits: units };
}

function readRatingWord(classAttr: string | undefined): string | undefined {
  if (!classAttr) return undefined;
  return classAttr.split(/\s+/).find((name) => name && name !== 'star-rating');
}

function readInfoTable($: cheerio.CheerioAPI): Map<string, string> {
  const rows = new Map<string, string>();

  $(SELECTORS.infoRows).each((_, row) => {
    const label = cleanText($(row).find('th').first().text())?.toLowerCase();
    const value = cleanText($(row).find('td').first().text());
    if (label && value && !rows.has(label)) {
      rows.set(label, value);
    }
  });

  return rows;
}

function compact(entries: Array<[RawFieldName, string | undefined]>): RawFields {
  const fields: Partial<Record<RawFieldName, string>> = {};
  for (const [name, value] of entries) {
    if (value !== undefined) {
      fields[name] = value;
    }
  }
  return fields;
}

export function parseListing(raw: string, pageUrl: string): ListingPage {
  const $ = cheerio.load(raw);

  const bookUrls = $(SELECTORS.bookLink)
    .toArray()
    .map((link) => resolveUrl($(link).attr('href'), pageUrl))
    .filter((url): url is string => url !== undefined);

  return {
    bookUrls,
    nextPageUrl: resolveUrl($(SELECTORS.nextPage).first().attr('href'), pageUrl),
  };
}

export function extract(raw: string, pageUrl: string): Result<RawFields, ExtractionError> {
  const $ = cheerio.load(raw);
  const main = $(SELECTORS.productMain).first();
  if (main.length === 0) {
    return err(new ExtractionError('product_main'));
  }

  const info = readInfoTable($);
  const { price, currency } = splitPrice(main.find(SELECTORS.price).first().text(), DEFAULT_CURRENCY);
  const { availability, stockUnits } = splitAvailability(main.find(SELECTORS.availability).first().text());
  const description = $(SELECTORS.descriptionHeading).nextAll('p').first().text();

  return ok(
    compact([
      ['title', cleanText(main.find(SELECTORS.title).first().text())],
      ['author', info.get('author') ?? cleanText($(SELECTORS.authorFallback).first().text())],
      ['price', price],
      ['currency', currency],
      ['availability', availability ?? info.get('availability')],
      ['stockUnits', stockUnits],
      ['rating', readRatingWord(main.find(SELECTORS.starRating).first().attr('class'))],
      ['category', cleanText($(SELECTORS.breadcrumbItems).eq(CATEGORY_BREADCRUMB_INDEX).text())],
      ['upc', info.get('upc')],
      ['description', description.trim() || undefined],
      ['imageUrl', resolveUrl($(SELECTORS.image).first().attr('src'), pageUrl)],
      ['sourceUrl', pageUrl],
    ]),
  );
}

export const booksToScrapeSource = defineSource({
  manifest: {
    id: 'books-toscrape',
    name: 'Books to Scrape',
    version: '0.1.0',
    schedule: '0 3 * * *',
    defaultCurrency: DEFAULT_CURRENCY,
  },
  parseListing,
  extract,
});
