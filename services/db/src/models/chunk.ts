import {
  pgTable,
  serial,
  integer,
  text,
  varchar,
  jsonb,
  timestamp,
  vector,
  index,
  unique,
} from 'drizzle-orm/pg-core';
import { documents } from './document.js';

/** Dimension of the embedding column; changing it requires a schema push */
export const EMBEDDING_DIMENSIONS = 1536;

/**
 * EmbeddingStatus - TypeScript constraint, database uses varchar
 */
export type EmbeddingStatus = 'pending' | 'embedded' | 'failed';

/**
 * Chunk-level metadata computed during extraction
 */
export interface ChunkMetadata {
  wordCount: number;
  charCount: number;
  /** Occurrences of citation markers such as "Art." and "§" */
  citationCount: number;
  /** Ordinal of the section this chunk belongs to, in traversal order */
  sectionIndex: number;
  /** 0-based part number when a section was split, 0 otherwise */
  splitPart: number;
  /** Number of leading characters repeated from the previous chunk */
  overlapChars: number;
  [key: string]: unknown;
}

/**
 * Chunks table - Document chunks table
 * Stores hierarchy-annotated chunks and their vector embeddings
 */
export const chunks = pgTable(
  'chunks',
  {
    id: serial('id').primaryKey(),
    documentId: integer('document_id')
      .notNull()
      .references(() => documents.id, { onDelete: 'cascade' }),
    /** 0-based, contiguous within a document */
    position: integer('position').notNull(),
    content: text('content').notNull(),
    /** Section titles from the document root down to this chunk */
    hierarchyPath: jsonb('hierarchy_path').$type<string[]>().notNull().default([]),
    pageStart: integer('page_start').notNull(),
    pageEnd: integer('page_end').notNull(),
    metadata: jsonb('metadata').$type<ChunkMetadata>().notNull(),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
    embeddingStatus: varchar('embedding_status', { length: 20 })
      .$type<EmbeddingStatus>()
      .notNull()
      .default('pending'),
    embeddingModel: varchar('embedding_model', { length: 100 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('chunks_document_position_unique').on(table.documentId, table.position),
    index('chunks_document_idx').on(table.documentId),
    index('chunks_embedding_hnsw_idx').using('hnsw', table.embedding.op('vector_cosine_ops')),
  ]
);

export type ChunkRow = typeof chunks.$inferSelect;
export type NewChunkRow = typeof chunks.$inferInsert;
