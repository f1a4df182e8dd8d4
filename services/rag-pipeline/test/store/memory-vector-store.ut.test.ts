/**
 * MemoryVectorStore Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError, ConsistencyError, ServiceUnavailableError } from '../../src/errors.js';
import { MemoryVectorStore } from '../../src/store/memory-vector-store.js';
import type { ChunkWithEmbedding } from '../../src/types/index.js';
import { createSampleChunk } from '../helpers/mock-factory.js';

/** Unit vector whose cosine similarity with [1, 0] is exactly s */
function at(s: number): number[] {
  return [s, Math.sqrt(1 - s * s)];
}

function embedded(position: number, embedding: number[], content = `Chunk ${position}`): ChunkWithEmbedding {
  return {
    ...createSampleChunk({ position, content }),
    embedding,
    embeddingStatus: 'embedded',
    embeddingModel: 'fake-embedding',
  };
}

function pending(position: number): ChunkWithEmbedding {
  return {
    ...createSampleChunk({ position, content: `Pending ${position}` }),
    embedding: null,
    embeddingStatus: 'failed',
    embeddingModel: null,
  };
}

describe('MemoryVectorStore', () => {
  let store: MemoryVectorStore;

  beforeEach(() => {
    store = new MemoryVectorStore(2);
  });

  describe('storeDocument', () => {
    it('should create a document once per source locator', async () => {
      const first = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      const second = await store.storeDocument({
        filename: 'a-renamed.pdf',
        sourceLocator: '/docs/a.pdf',
      });

      expect(first).toEqual({ id: 1, created: true, version: 0 });
      expect(second).toEqual({ id: 1, created: false, version: 0 });
      expect((await store.getDocument(1))?.filename).toBe('a.pdf');
    });

    it('should resolve concurrent calls for one locator to the same row', async () => {
      const [first, second] = await Promise.all([
        store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' }),
        store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' }),
      ]);

      expect(first).toEqual({ id: 1, created: true, version: 0 });
      expect(second).toEqual({ id: 1, created: false, version: 0 });
    });

    it('should keep existing metadata when none is given', async () => {
      await store.storeDocument({
        filename: 'a.pdf',
        sourceLocator: '/docs/a.pdf',
        metadata: { court: 'supreme' },
        sizeBytes: 1200,
      });
      await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });

      const document = await store.findDocumentBySource('/docs/a.pdf');
      expect(document?.metadata).toEqual({ court: 'supreme' });
      expect(document?.sizeBytes).toBe(1200);
    });
  });

  describe('storeChunks', () => {
    it('should replace the chunk set and bump the version', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });

      const first = await store.storeChunks(id, [embedded(0, at(1)), pending(1)], {
        contentHash: 'hash-1',
      });
      const second = await store.storeChunks(id, [embedded(0, at(0.5))], { contentHash: 'hash-2' });

      expect(first).toEqual({ documentId: id, version: 1, chunkCount: 2, embeddedCount: 1 });
      expect(second).toEqual({ documentId: id, version: 2, chunkCount: 1, embeddedCount: 1 });
      const chunks = await store.listChunks(id);
      expect(chunks.map((c) => c.position)).toEqual([0]);
      expect(chunks[0].embedding).toEqual(at(0.5));
      const document = await store.getDocument(id);
      expect(document?.contentHash).toBe('hash-2');
      expect(document?.chunkCount).toBe(1);
    });

    it('should update the document fields together with the chunk set', async () => {
      const { id } = await store.storeDocument({
        filename: 'a.pdf',
        sourceLocator: '/docs/a.pdf',
        metadata: { rev: 1 },
        sizeBytes: 100,
      });

      await store.storeChunks(id, [embedded(0, at(1))], {
        document: { filename: 'a-v2.pdf', metadata: { rev: 2 } },
      });

      const document = await store.getDocument(id);
      expect(document?.filename).toBe('a-v2.pdf');
      expect(document?.metadata).toEqual({ rev: 2 });
      expect(document?.sizeBytes).toBe(100);
    });

    it('should write nothing once the caller has given up', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      const controller = new AbortController();
      controller.abort();

      const promise = store.storeChunks(id, [embedded(0, at(1))], {
        contentHash: 'hash-1',
        signal: controller.signal,
      });

      await expect(promise).rejects.toBeInstanceOf(ServiceUnavailableError);
      await expect(promise).rejects.toThrow(`Chunk write for document ${id} aborted`);
      expect(await store.listChunks(id)).toEqual([]);
      expect((await store.getDocument(id))?.version).toBe(0);
    });

    it('should reject positions that are not contiguous', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });

      await expect(store.storeChunks(id, [embedded(0, at(1)), embedded(2, at(1))])).rejects.toThrow(
        ConsistencyError
      );
      expect(await store.listChunks(id)).toEqual([]);
    });

    it('should reject an embedding of the wrong dimension', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });

      await expect(store.storeChunks(id, [embedded(0, [1, 0, 0])])).rejects.toThrow(
        ConfigurationError
      );
    });

    it('should reject chunks for an unknown document', async () => {
      await expect(store.storeChunks(42, [embedded(0, at(1))])).rejects.toThrow(
        'Document 42 does not exist'
      );
    });

    it('should leave the previous set visible when a write fails midway', async () => {
      const { id } = await store.storeDocument({
        filename: 'a.pdf',
        sourceLocator: '/docs/a.pdf',
        metadata: { rev: 1 },
      });
      await store.storeChunks(id, [embedded(0, at(1)), embedded(1, at(0.9))], {
        contentHash: 'hash-1',
      });

      const faulty = embedded(2, at(0.8));
      Object.defineProperty(faulty, 'content', {
        get() {
          throw new Error('disk full');
        },
      });

      await expect(
        store.storeChunks(id, [embedded(0, at(0.5)), embedded(1, at(0.5)), faulty], {
          contentHash: 'hash-2',
          document: { filename: 'a-v2.pdf', metadata: { rev: 2 } },
        })
      ).rejects.toThrow(`Chunk write for document ${id} rolled back: disk full`);

      const chunks = await store.listChunks(id);
      expect(chunks.map((c) => c.embedding)).toEqual([at(1), at(0.9)]);
      const document = await store.getDocument(id);
      expect(document?.version).toBe(1);
      expect(document?.contentHash).toBe('hash-1');
      expect(document?.filename).toBe('a.pdf');
      expect(document?.metadata).toEqual({ rev: 1 });
    });
  });

  describe('query', () => {
    it('should return chunks above the threshold, most similar first', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(
        id,
        [0.9, 0.8, 0.6, 0.5, 0.95].map((s, i) => embedded(i, at(s)))
      );

      const results = await store.query([1, 0], 10, 0.7);

      expect(results.map((r) => r.position)).toEqual([4, 0, 1]);
      expect(results[0].similarity).toBeCloseTo(0.95);
      expect(results[1].similarity).toBeCloseTo(0.9);
      expect(results[2].similarity).toBeCloseTo(0.8);
      expect(results[0].document).toEqual({
        filename: 'a.pdf',
        sourceLocator: '/docs/a.pdf',
        metadata: {},
      });
    });

    it('should return at most k results', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(id, [0.9, 0.8, 0.95].map((s, i) => embedded(i, at(s))));

      const results = await store.query([1, 0], 2, 0);

      expect(results.map((r) => r.position)).toEqual([2, 0]);
    });

    it('should break ties by document then position', async () => {
      const b = await store.storeDocument({ filename: 'b.pdf', sourceLocator: '/docs/b.pdf' });
      const a = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(a.id, [embedded(0, [1, 0]), embedded(1, [1, 0])]);
      await store.storeChunks(b.id, [embedded(0, [1, 0])]);

      const results = await store.query([1, 0], 10, 0.5);

      expect(results.map((r) => [r.documentId, r.position])).toEqual([
        [b.id, 0],
        [a.id, 0],
        [a.id, 1],
      ]);
    });

    it('should skip chunks without an embedding', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(id, [pending(0), embedded(1, [1, 0])]);

      const results = await store.query([1, 0], 10, 0);

      expect(results.map((r) => r.position)).toEqual([1]);
    });

    it('should reject a query vector of the wrong dimension', async () => {
      await expect(store.query([1, 0, 0], 10, 0.5)).rejects.toThrow(
        'Query: embedding has 3 dimensions, store expects 2'
      );
    });
  });

  describe('deleteDocument', () => {
    it('should remove the document and its chunks', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(id, [embedded(0, [1, 0])]);

      expect(await store.deleteDocument(id)).toBe(true);
      expect(await store.deleteDocument(id)).toBe(false);
      expect(await store.listChunks(id)).toEqual([]);
      expect(await store.query([1, 0], 10, 0)).toEqual([]);
    });
  });

  describe('updateDocumentMetadata', () => {
    it('should replace the metadata of an existing document', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });

      expect(await store.updateDocumentMetadata(id, { jurisdiction: 'federal' })).toBe(true);
      expect((await store.getDocument(id))?.metadata).toEqual({ jurisdiction: 'federal' });
      expect(await store.updateDocumentMetadata(99, {})).toBe(false);
    });
  });

  describe('re-embedding', () => {
    it('should list chunks needing embedding and attach new vectors', async () => {
      const { id } = await store.storeDocument({ filename: 'a.pdf', sourceLocator: '/docs/a.pdf' });
      await store.storeChunks(id, [embedded(0, [1, 0]), pending(1), pending(2)]);

      const needing = await store.listChunksNeedingEmbedding(10);
      expect(needing.map((c) => c.position)).toEqual([1, 2]);
      expect(await store.listChunksNeedingEmbedding(1)).toHaveLength(1);

      const updated = await store.attachEmbeddings(
        needing.map((c) => ({ chunkId: c.chunkId, embedding: [0, 1], embeddingModel: 'fake-embedding' }))
      );

      expect(updated).toBe(2);
      expect(await store.listChunksNeedingEmbedding(10)).toEqual([]);
      const chunks = await store.listChunks(id);
      expect(chunks.map((c) => c.embeddingStatus)).toEqual(['embedded', 'embedded', 'embedded']);
    });

    it('should reject a new vector of the wrong dimension', async () => {
      await expect(
        store.attachEmbeddings([{ chunkId: 1, embedding: [1], embeddingModel: 'fake-embedding' }])
      ).rejects.toThrow(ConfigurationError);
    });
  });
});
