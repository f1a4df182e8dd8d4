import {
  pgTable,
  serial,
  varchar,
  text,
  jsonb,
  integer,
  bigint,
  timestamp,
} from 'drizzle-orm/pg-core';

/**
 * Arbitrary key-value metadata attached to a document
 * (case number, decision date, parties, court, ...)
 */
export type DocumentMetadata = Record<string, unknown>;

/**
 * Documents table - Ingested source documents
 * One row per distinct source locator; re-ingestion updates the row in place
 */
export const documents = pgTable('documents', {
  id: serial('id').primaryKey(),
  filename: varchar('filename', { length: 255 }).notNull(),
  /** URL or filesystem path the bytes were read from */
  sourceLocator: text('source_locator').notNull().unique(),
  metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
  sizeBytes: bigint('size_bytes', { mode: 'number' }),
  /** sha-256 of the source bytes at the last ingestion */
  contentHash: varchar('content_hash', { length: 64 }),
  /** Incremented every time a full chunk set is committed */
  version: integer('version').notNull().default(0),
  chunkCount: integer('chunk_count').notNull().default(0),
  ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;
