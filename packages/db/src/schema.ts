import { pgTable, uuid, text, varchar, timestamp, integer, numeric, index, uniqueIndex } from 'drizzle-orm/pg-core';

export const books = pgTable(
  'books',
  {
    id: uuid().primaryKey().defaultRandom(),
    key: varchar({ length: 128 }).notNull(),
    sourceId: varchar('source_id', { length: 100 }).notNull(),
    title: text().notNull(),
    author: text().notNull(),
    priceAmount: numeric('price_amount', { precision: 12, scale: 2 }),
    priceCurrency: varchar('price_currency', { length: 3 }),
    availability: varchar({ length: 20 }).default('Unknown').notNull(),
    stockUnits: integer('stock_units'),
    rating: integer(),
    category: varchar({ length: 255 }),
    upc: varchar({ length: 64 }),
    description: text(),
    imageUrl: text('image_url'),
    sourceUrl: text('source_url').notNull(),
    contentHash: varchar('content_hash', { length: 64 }).notNull(),
    firstSeenAt: timestamp('first_seen_at').defaultNow().notNull(),
    lastSeenAt: timestamp('last_seen_at').defaultNow().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [
    uniqueIndex('uq_books_key').on(t.key),
    index('idx_books_source_id').on(t.sourceId),
    index('idx_books_source_url').on(t.sourceUrl),
    index('idx_books_availability').on(t.availability),
  ],
);

export type BookRow = typeof books.$inferSelect;
export type NewBookRow = typeof books.$inferInsert;
