import { z } from 'zod';
import { ValidationError } from './errors.js';
import { err, ok, type Availability, type CheckedBookFields, type Price, type RawFieldName, type RawFields, type Result } from './types.js';

export const textSchema = z
  .string()
  .transform((value) => value.replace(/\s+/g, ' ').trim())
  .pipe(z.string().min(1));

export const priceAmountSchema = z
  .string()
  .transform((value) => value.replace(/,/g, '').trim())
  .pipe(z.string().regex(/^\d+(?:\.\d+)?$/, 'expected a non-negative number'))
  .transform((value) => Math.round(Number(value) * 100) / 100)
  .pipe(z.number().finite().nonnegative());

export const currencySchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{3}$/, 'expected an ISO 4217 code'));

const RATING_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
};

export const ratingSchema = z
  .string()
  .transform((value) => {
    const normalized = value.trim().toLowerCase();
    return RATING_WORDS[normalized] ?? Number(normalized);
  })
  .pipe(z.number().int().min(1).max(5));

export const stockUnitsSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().regex(/^\d+$/, 'expected a non-negative integer'))
  .transform(Number);

export const httpUrlSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().url())
  .refine((value) => /^https?:\/\//i.test(value), 'expected an http(s) URL');

const AVAILABILITY_VOCABULARY = new Map<string, Availability>([
  ['instock', 'InStock'],
  ['available', 'InStock'],
  ['outofstock', 'OutOfStock'],
  ['soldout', 'OutOfStock'],
  ['unavailable', 'OutOfStock'],
  ['preorder', 'PreOrder'],
  ['unknown', 'Unknown'],
]);

/**
 * Case- and punctuation-insensitive lookup. Unrecognized labels degrade to
 * Unknown instead of failing the record.
 */
export function toAvailability(raw: string | undefined): Availability {
  if (raw === undefined) return 'Unknown';
  const normalized = raw.toLowerCase().replace(/[^a-z]/g, '');
  return AVAILABILITY_VOCABULARY.get(normalized) ?? 'Unknown';
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? issue.message : 'invalid value';
}

function parseField<T>(
  field: RawFieldName,
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
): Result<T, ValidationError> {
  const parsed = schema.safeParse(raw);
  return parsed.success ? ok(parsed.data) : err(new ValidationError('malformed_field', field, describeIssue(parsed.error)));
}

function requiredField<T>(
  fields: RawFields,
  field: RawFieldName,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
): Result<T, ValidationError> {
  const raw = fields[field];
  if (raw === undefined || raw.trim() === '') {
    return err(new ValidationError('missing_field', field));
  }

  return parseField(field, raw, schema);
}

function optionalField<T>(
  fields: RawFields,
  field: RawFieldName,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
): Result<T | null, ValidationError> {
  const raw = fields[field];
  if (raw === undefined || raw.trim() === '') {
    return ok(null);
  }

  return parseField(field, raw, schema);
}

function checkPrice(fields: RawFields): Result<Price | null, ValidationError> {
  const amount = optionalField(fields, 'price', priceAmountSchema);
  if (!amount.ok) return amount;
  if (amount.value === null) return ok(null);

  // Currency qualifies a price; an unreadable code is dropped, not fatal.
  const currency = currencySchema.safeParse(fields.currency ?? '');
  return ok({ amount: amount.value, currency: currency.success ? currency.data : null });
}

/**
 * Ordered rule chain over extracted fields. Stops at the first failing rule:
 * title, author, price, availability, rating, stock units, source URL, image URL.
 */
export function checkRawFields(fields: RawFields): Result<CheckedBookFields, ValidationError> {
  const title = requiredField(fields, 'title', textSchema);
  if (!title.ok) return title;

  const author = requiredField(fields, 'author', textSchema);
  if (!author.ok) return author;

  const price = checkPrice(fields);
  if (!price.ok) return price;

  const availability = toAvailability(fields.availability);

  const rating = optionalField(fields, 'rating', ratingSchema);
  if (!rating.ok) return rating;

  const stockUnits = optionalField(fields, 'stockUnits', stockUnitsSchema);
  if (!stockUnits.ok) return stockUnits;

  const sourceUrl = requiredField(fields, 'sourceUrl', httpUrlSchema);
  if (!sourceUrl.ok) return sourceUrl;

  const imageUrl = optionalField(fields, 'imageUrl', httpUrlSchema);
  if (!imageUrl.ok) return imageUrl;

  const category = textSchema.safeParse(fields.category ?? '');
  const upc = textSchema.safeParse(fields.upc ?? '');
  const description = fields.description?.trim();

  return ok({
    title: title.value,
    author: author.value,
    price: price.value,
    availability,
    stockUnits: stockUnits.value,
    rating: rating.value,
    category: category.success ? category.data : null,
    upc: upc.success ? upc.data : null,
    description: description ? description : null,
    imageUrl: imageUrl.value,
    sourceUrl: sourceUrl.value,
  });
}
