import type { ExtractionError } from './errors.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export const RAW_FIELD_NAMES = [
  'title',
  'author',
  'price',
  'currency',
  'availability',
  'stockUnits',
  'rating',
  'category',
  'upc',
  'description',
  'imageUrl',
  'sourceUrl',
] as const;

export type RawFieldName = (typeof RAW_FIELD_NAMES)[number];

/**
 * Field values as found on one book page, untrimmed and unchecked.
 * A missing key means the page did not carry that field.
 */
export type RawFields = { readonly [K in RawFieldName]?: string };

export const AVAILABILITY_VALUES = ['InStock', 'OutOfStock', 'PreOrder', 'Unknown'] as const;

export type Availability = (typeof AVAILABILITY_VALUES)[number];

export interface Price {
  amount: number;
  currency: string | null;
}

/**
 * Fields of a book that passed every validation rule, before a natural key is assigned.
 */
export interface CheckedBookFields {
  title: string;
  author: string;
  price: Price | null;
  availability: Availability;
  stockUnits: number | null;
  rating: number | null;
  category: string | null;
  upc: string | null;
  description: string | null;
  imageUrl: string | null;
  sourceUrl: string;
}

export interface BookRecord extends Readonly<CheckedBookFields> {
  readonly key: string;
}

export interface ListingPage {
  bookUrls: string[];
  nextPageUrl?: string;
}

export interface SourceManifest {
  id: string;
  name: string;
  version: string;
  schedule: string;
  defaultCurrency?: string;
}

/**
 * A catalog site: how to read its listing pages and its book pages.
 * Both functions are pure over the fetched content.
 */
export interface CatalogSource {
  manifest: SourceManifest;
  parseListing(raw: string, pageUrl: string): ListingPage;
  extract(raw: string, pageUrl: string): Result<RawFields, ExtractionError>;
}
