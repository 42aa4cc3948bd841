/**
 * Exact Vector Store Tests
 *
 * Covers the add/search contract, persistence round trips and the ways a
 * persisted pair can fail to load.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as fc from 'fast-check';
import { ExactVectorStore, createExactVectorStore } from '../exactVectorStore';
import { VectorStoreError, VectorStoreErrorCode } from '../vectorStore';

/**
 * Code of the VectorStoreError thrown by fn, or undefined.
 */
function loadError(fn: () => unknown): VectorStoreErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof VectorStoreError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('ExactVectorStore', () => {
  let dir: string;
  let indexPath: string;
  let metadataPath: string;

  const openStore = (dimension = 3) => createExactVectorStore({ dimension, indexPath, metadataPath });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exact-store-'));
    indexPath = path.join(dir, 'index', 'index.bin');
    metadataPath = path.join(dir, 'index', 'index_meta.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function seed(store: ExactVectorStore): Promise<void> {
    await store.add(
      ['alpha text', 'beta text', 'gamma text'],
      [
        [1, 0, 0],
        [0, 1, 0],
        [0.5, 0.5, 0],
      ],
      [{ documentName: 'a.md' }, { documentName: 'b.md' }, { documentName: 'c.md' }]
    );
  }

  describe('search', () => {
    it('should return [] for an empty store', async () => {
      expect(await openStore().search([1, 0, 0], 4, 0)).toEqual([]);
    });

    it('should return hits best first with text copied into metadata', async () => {
      const store = openStore();
      await seed(store);

      const hits = await store.search([1, 0, 0], 2, 0);

      expect(hits).toEqual([
        { text: 'alpha text', score: 1, metadata: { documentName: 'a.md', text: 'alpha text' } },
        { text: 'gamma text', score: 0.5, metadata: { documentName: 'c.md', text: 'gamma text' } },
      ]);
    });

    it('should drop hits below the threshold and keep those equal to it', async () => {
      const store = openStore();
      await seed(store);

      const hits = await store.search([1, 0, 0], 10, 0.5);
      expect(hits.map((hit) => hit.text)).toEqual(['alpha text', 'gamma text']);
    });

    it('should break score ties by insertion order', async () => {
      const store = openStore();
      await store.add(
        ['first', 'second'],
        [
          [0, 0, 1],
          [0, 0, 1],
        ],
        [{}, {}]
      );

      const hits = await store.search([0, 0, 1], 2, 0);
      expect(hits.map((hit) => hit.text)).toEqual(['first', 'second']);
    });

    it('should return [] when topK is zero', async () => {
      const store = openStore();
      await seed(store);
      expect(await store.search([1, 0, 0], 0, 0)).toEqual([]);
    });

    it('should reject a query of the wrong dimension', async () => {
      const store = openStore();
      await seed(store);
      await expect(store.search([1, 0], 1, 0)).rejects.toMatchObject({
        code: VectorStoreErrorCode.DIMENSION_MISMATCH,
      });
    });

    it('should not let callers modify stored metadata through a hit', async () => {
      const store = openStore();
      await seed(store);

      const [hit] = await store.search([1, 0, 0], 1, 0);
      hit.metadata.documentName = 'changed.md';

      const [again] = await store.search([1, 0, 0], 1, 0);
      expect(again.metadata.documentName).toBe('a.md');
    });

    it('should not share nested metadata with the caller or with hits', async () => {
      const store = openStore();
      const tags = ['v1'];
      await store.add(
        ['first', 'second'],
        [
          [1, 0, 0],
          [0, 1, 0],
        ],
        [
          { documentName: 'a.md', tags },
          { documentName: 'b.md', tags },
        ]
      );

      tags.push('changed-by-caller');
      const [hit] = await store.search([1, 0, 0], 1, 0);
      const hitTags = hit.metadata.tags;
      if (Array.isArray(hitTags)) {
        hitTags.push('changed-through-hit');
      }

      const hits = await store.search([1, 1, 0], 2, 0);
      expect(hits.map((h) => h.metadata.tags)).toEqual([['v1'], ['v1']]);

      await store.persist();
      const persisted = JSON.parse(fs.readFileSync(metadataPath, 'utf-8'));
      expect(persisted.map((m: { tags: string[] }) => m.tags)).toEqual([['v1'], ['v1']]);
    });
  });

  describe('Property-Based Tests', () => {
    const vector = fc.array(fc.integer({ min: -4, max: 4 }), { minLength: 3, maxLength: 3 });

    it('should return at most topK hits, sorted, all at or above the threshold', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(vector, { minLength: 1, maxLength: 20 }),
          vector,
          fc.integer({ min: 1, max: 8 }),
          fc.integer({ min: -10, max: 10 }),
          async (vectors, query, topK, threshold) => {
            const store = new ExactVectorStore({
              dimension: 3,
              indexPath: path.join(dir, 'p.bin'),
              metadataPath: path.join(dir, 'p.json'),
            });
            await store.add(
              vectors.map((_, i) => `t${i}`),
              vectors,
              vectors.map(() => ({}))
            );

            const hits = await store.search(query, topK, threshold);
            const expectedCount = vectors.filter(
              (v) => v[0] * query[0] + v[1] * query[1] + v[2] * query[2] >= threshold
            ).length;

            expect(hits.length).toBe(Math.min(topK, expectedCount));
            for (let i = 0; i < hits.length; i++) {
              expect(hits[i].score).toBeGreaterThanOrEqual(threshold);
              if (i > 0) {
                expect(hits[i - 1].score).toBeGreaterThanOrEqual(hits[i].score);
              }
            }
          }
        ),
        { numRuns: 50 }
      );
    });
  });

  describe('co-indexing', () => {
    type BatchKind = 'valid' | 'mismatched' | 'wrongDimension';

    it('should keep vectors, metadata and persisted entries aligned across any sequence of adds', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(
            fc.record({
              size: fc.integer({ min: 0, max: 4 }),
              kind: fc.constantFrom<BatchKind>('valid', 'mismatched', 'wrongDimension'),
            }),
            { maxLength: 8 }
          ),
          async (batches) => {
            const runDir = fs.mkdtempSync(path.join(os.tmpdir(), 'exact-coindex-'));
            try {
              const store = createExactVectorStore({
                dimension: 2,
                indexPath: path.join(runDir, 'index.bin'),
                metadataPath: path.join(runDir, 'index_meta.json'),
              });
              const added: string[] = [];

              for (const [b, { size, kind }] of batches.entries()) {
                const texts = Array.from({ length: size }, (_, i) => `batch ${b} item ${i}`);
                const vectors = texts.map(() => (kind === 'wrongDimension' ? [1, 0, 0] : [1, 0]));
                const metadatas = Array.from({ length: kind === 'mismatched' ? size + 1 : size }, () => ({
                  documentName: `batch-${b}.md`,
                }));

                const rejected = kind === 'mismatched' || (kind === 'wrongDimension' && size > 0);
                if (rejected) {
                  await expect(store.add(texts, vectors, metadatas)).rejects.toBeInstanceOf(VectorStoreError);
                } else {
                  await store.add(texts, vectors, metadatas);
                  added.push(...texts);
                }

                await store.persist();
                const count = await store.count();
                const persisted = JSON.parse(fs.readFileSync(path.join(runDir, 'index_meta.json'), 'utf-8'));
                expect(count).toBe(added.length);
                expect(persisted.map((m: { text: string }) => m.text)).toEqual(added);

                // Every vector is identical, so ties return all records in insertion order
                const hits = await store.search([1, 0], count, -1);
                expect(hits.map((hit) => hit.text)).toEqual(added);
              }
            } finally {
              fs.rmSync(runDir, { recursive: true, force: true });
            }
          }
        ),
        { numRuns: 30 }
      );
    });
  });

  describe('add', () => {
    it('should treat an empty batch as a no-op', async () => {
      const store = openStore();
      await store.add([], [], []);
      expect(await store.count()).toBe(0);
    });

    it('should reject mismatched batch lengths and leave the store unchanged', async () => {
      const store = openStore();
      await seed(store);

      await expect(store.add(['one', 'two'], [[1, 0, 0]], [{}, {}])).rejects.toMatchObject({
        code: VectorStoreErrorCode.LENGTH_MISMATCH,
      });
      expect(await store.count()).toBe(3);
    });

    it('should reject a wrong-dimension vector and leave the store unchanged', async () => {
      const store = openStore();
      await seed(store);

      await expect(
        store.add(['ok', 'bad'], [[1, 0, 0], [1, 0]], [{}, {}])
      ).rejects.toBeInstanceOf(VectorStoreError);
      expect(await store.count()).toBe(3);

      // Positions still line up with metadata
      const [hit] = await store.search([0, 1, 0], 1, 0.9);
      expect(hit.text).toBe('beta text');
    });
  });

  describe('persistence', () => {
    it('should reload the same records after persist', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();

      const reloaded = openStore();
      expect(await reloaded.count()).toBe(3);
      expect(await reloaded.search([0, 1, 0], 1, 0)).toEqual(await store.search([0, 1, 0], 1, 0));
    });

    it('should write the metadata file as a JSON array in insertion order', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();

      const written = JSON.parse(fs.readFileSync(metadataPath, 'utf-8'));
      expect(written.map((entry: { text: string }) => entry.text)).toEqual([
        'alpha text',
        'beta text',
        'gamma text',
      ]);
      expect(fs.existsSync(`${metadataPath}.tmp`)).toBe(false);
    });

    it('should be safe to persist twice', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();
      await store.persist();
      expect(await openStore().count()).toBe(3);
    });

    it('should let overlapping persists both succeed and keep the latest state', async () => {
      const store = openStore(2);
      const batch = (n: number, offset: number) => ({
        texts: Array.from({ length: n }, (_, i) => `text ${offset + i}`),
        vectors: Array.from({ length: n }, (_, i) => [1, offset + i]),
        metadatas: Array.from({ length: n }, () => ({ documentName: 'bulk.md' })),
      });

      const first = batch(500, 0);
      await store.add(first.texts, first.vectors, first.metadatas);
      const firstPersist = store.persist();
      const second = batch(2000, 500);
      await store.add(second.texts, second.vectors, second.metadatas);
      const secondPersist = store.persist();

      const results = await Promise.allSettled([firstPersist, secondPersist]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(fs.readdirSync(path.dirname(indexPath)).sort()).toEqual(['index.bin', 'index_meta.json']);
      expect(await openStore(2).count()).toBe(2500);
    });

    it('should not let a queued persist recreate files after clear', async () => {
      const store = openStore();
      await seed(store);

      const persisting = store.persist();
      const clearing = store.clear();
      await Promise.all([persisting, clearing]);

      expect(fs.existsSync(indexPath)).toBe(false);
      expect(fs.existsSync(metadataPath)).toBe(false);
    });

    it('should start empty when only one of the files exists', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();
      fs.unlinkSync(metadataPath);

      expect(await openStore().count()).toBe(0);
    });

    it('should fail to load when the counts disagree', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();
      fs.writeFileSync(metadataPath, JSON.stringify([{ text: 'only one' }]));

      expect(loadError(() => openStore())).toBe(VectorStoreErrorCode.CORRUPT_INDEX);
    });

    it('should fail to load metadata that is not JSON', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();
      fs.writeFileSync(metadataPath, '{oops');

      expect(loadError(() => openStore())).toBe(VectorStoreErrorCode.CORRUPT_INDEX);
    });

    it('should fail to load metadata that is not an array of objects', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();
      fs.writeFileSync(metadataPath, JSON.stringify(['a', 'b', 'c']));

      expect(loadError(() => openStore())).toBe(VectorStoreErrorCode.CORRUPT_INDEX);
    });

    it('should fail to load an index of another dimension', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();

      expect(loadError(() => openStore(4))).toBe(VectorStoreErrorCode.DIMENSION_MISMATCH);
    });
  });

  describe('clear', () => {
    it('should remove every record and both files', async () => {
      const store = openStore();
      await seed(store);
      await store.persist();

      await store.clear();

      expect(await store.count()).toBe(0);
      expect(fs.existsSync(indexPath)).toBe(false);
      expect(fs.existsSync(metadataPath)).toBe(false);
    });

    it('should succeed when nothing was persisted', async () => {
      const store = openStore();
      await expect(store.clear()).resolves.toBeUndefined();
    });
  });
});
