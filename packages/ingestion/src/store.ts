import { createHash } from 'node:crypto';
import type { Database } from '@shelfscan/db';
import { books } from '@shelfscan/db';
import { ok, err, StoreError, type BookRecord } from '@shelfscan/scraper-sdk';
import { sql } from 'drizzle-orm';
import type { UpsertResult, UpsertSink } from './types.js';

/**
 * SHA-256 over the fields that change between scrapes of the same book.
 */
export function computeContentHash(record: BookRecord): string {
  const input = [
    record.title,
    record.author,
    record.price ? `${record.price.amount.toFixed(2)} ${record.price.currency ?? ''}` : '',
    record.availability,
    String(record.stockUnits ?? ''),
    String(record.rating ?? ''),
    record.category ?? '',
    record.description ?? '',
    record.imageUrl ?? '',
  ].join('|');
  return createHash('sha256').update(input).digest('hex');
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

// Credentials rejected, database or table missing, insufficient privilege.
const FATAL_SQLSTATES = new Set(['28000', '28P01', '3D000', '42P01', '42501']);

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map a driver error onto the store error taxonomy by SQLSTATE class.
 *
 * 08 (connection), 40 (serialization/deadlock), 53 (resources), 57 (operator
 * intervention) and socket errors → transient; 22 (data) and 23 (constraint)
 * → permanent; authentication and missing schema → fatal.
 */
export function classifyStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) return error;

  const code = readCode(error) ?? readCode(error instanceof Error ? error.cause : undefined);
  const message = error instanceof Error ? error.message : String(error);

  if (code === undefined) {
    return new StoreError('transient', message, undefined, { cause: error });
  }
  if (FATAL_SQLSTATES.has(code)) {
    return new StoreError('fatal', message, code, { cause: error });
  }
  if (CONNECTION_ERROR_CODES.has(code)) {
    return new StoreError('transient', message, code, { cause: error });
  }

  const sqlClass = code.slice(0, 2);
  if (sqlClass === '22' || sqlClass === '23') {
    return new StoreError('permanent', message, code, { cause: error });
  }
  if (sqlClass === '08' || sqlClass === '40' || sqlClass === '53' || sqlClass === '57') {
    return new StoreError('transient', message, code, { cause: error });
  }

  return new StoreError('permanent', message, code, { cause: error });
}

export interface DrizzleBookSinkOptions {
  db: Database;
  sourceId: string;
}

function dedupByKey(batch: readonly BookRecord[]): BookRecord[] {
  const seen = new Set<string>();
  const unique: BookRecord[] = [];
  for (const record of batch) {
    if (seen.has(record.key)) continue;
    seen.add(record.key);
    unique.push(record);
  }
  return unique;
}

/**
 * Postgres-backed sink. One INSERT … ON CONFLICT (key) DO UPDATE per batch;
 * a permanent failure of a multi-row statement is retried row by row so one
 * bad record does not sink its neighbours.
 */
export class DrizzleBookSink implements UpsertSink {
  private readonly db: Database;
  private readonly sourceId: string;

  constructor(options: DrizzleBookSinkOptions) {
    this.db = options.db;
    this.sourceId = options.sourceId;
  }

  async upsert(batch: readonly BookRecord[]): Promise<UpsertResult[]> {
    if (batch.length === 0) return [];

    // Postgres rejects a statement that touches the same conflict key twice.
    const unique = dedupByKey(batch);

    let stored: Set<string>;
    try {
      stored = await this.write(unique);
    } catch (error) {
      const storeError = classifyStoreError(error);
      if (storeError.kind !== 'permanent' || unique.length === 1) {
        throw storeError;
      }
      return this.upsertOneByOne(unique, batch);
    }

    return batch.map((record) => ({
      key: record.key,
      result: stored.has(record.key)
        ? ok(undefined)
        : err(new StoreError('permanent', `row for key ${record.key} was not written`, 'not_returned')),
    }));
  }

  private async upsertOneByOne(unique: readonly BookRecord[], batch: readonly BookRecord[]): Promise<UpsertResult[]> {
    const outcomes = new Map<string, UpsertResult['result']>();

    for (const record of unique) {
      try {
        const stored = await this.write([record]);
        outcomes.set(
          record.key,
          stored.has(record.key)
            ? ok(undefined)
            : err(new StoreError('permanent', `row for key ${record.key} was not written`, 'not_returned')),
        );
      } catch (error) {
        const storeError = classifyStoreError(error);
        if (storeError.kind !== 'permanent') {
          throw storeError;
        }
        outcomes.set(record.key, err(storeError));
      }
    }

    return batch.map((record) => ({
      key: record.key,
      result: outcomes.get(record.key) ?? err(new StoreError('permanent', `no outcome for key ${record.key}`)),
    }));
  }

  private async write(records: readonly BookRecord[]): Promise<Set<string>> {
    const now = new Date();
    const rows = records.map((record) => ({
      key: record.key,
      sourceId: this.sourceId,
      title: record.title,
      author: record.author,
      priceAmount: record.price ? record.price.amount.toFixed(2) : null,
      priceCurrency: record.price?.currency ?? null,
      availability: record.availability,
      stockUnits: record.stockUnits,
      rating: record.rating,
      category: record.category,
      upc: record.upc,
      description: record.description,
      imageUrl: record.imageUrl,
      sourceUrl: record.sourceUrl,
      contentHash: computeContentHash(record),
      firstSeenAt: now,
      lastSeenAt: now,
    }));

    const returned = await this.db
      .insert(books)
      .values(rows)
      .onConflictDoUpdate({
        target: books.key,
        set: {
          sourceId: sql.raw(`excluded.source_id`),
          title: sql.raw(`excluded.title`),
          author: sql.raw(`excluded.author`),
          priceAmount: sql.raw(`excluded.price_amount`),
          priceCurrency: sql.raw(`excluded.price_currency`),
          availability: sql.raw(`excluded.availability`),
          stockUnits: sql.raw(`excluded.stock_units`),
          rating: sql.raw(`excluded.rating`),
          category: sql.raw(`excluded.category`),
          upc: sql.raw(`excluded.upc`),
          description: sql.raw(`excluded.description`),
          imageUrl: sql.raw(`excluded.image_url`),
          sourceUrl: sql.raw(`excluded.source_url`),
          contentHash: sql.raw(`excluded.content_hash`),
          lastSeenAt: sql.raw(`excluded.last_seen_at`),
          updatedAt: sql`now()`,
        },
      })
      .returning({ key: books.key });

    return new Set(returned.map((row) => row.key));
  }
}
