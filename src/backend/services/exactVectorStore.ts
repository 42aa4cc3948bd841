/**
 * Exact In-Process Vector Store
 *
 * Holds every vector in a flat float32 index and answers queries with a full
 * inner-product scan (brute force, O(n · d) per query). Persistence is two
 * files kept side by side:
 * - a binary vector index (see vectorIndexFile.ts)
 * - a JSON array of metadata objects
 *
 * The position of a vector in the index is its position in the metadata
 * array. add() updates both before returning control, so no search ever sees
 * one without the other.
 *
 * Only one process may write the files at a time. Readers racing a write may
 * see a mismatched pair and will fail to load with CORRUPT_INDEX.
 */

import * as fs from 'fs';
import * as path from 'path';
import { RetrievalHit } from '../../shared/types';
import { createLogger } from '../utils/logger';
import {
  IVectorStore,
  VectorMetadata,
  VectorStoreError,
  VectorStoreErrorCode,
  assertBatchLengths,
  isVectorMetadata,
  metadataString,
} from './vectorStore';
import { FlatVectorIndex, readIndexFile, writeIndexFile } from './vectorIndexFile';

const logger = createLogger('exactVectorStore');

export interface ExactVectorStoreConfig {
  dimension: number;
  indexPath: string;
  metadataPath: string;
}

export class ExactVectorStore implements IVectorStore {
  readonly kind = 'exact' as const;
  readonly dimension: number;
  private readonly indexPath: string;
  private readonly metadataPath: string;
  private index: FlatVectorIndex;
  private metadata: VectorMetadata[] = [];
  /** Tail of the file operation queue; writes to the temp siblings never overlap */
  private persisting: Promise<void> = Promise.resolve();

  /**
   * Loads the persisted pair when both files exist, otherwise starts empty.
   *
   * @throws VectorStoreError DIMENSION_MISMATCH or CORRUPT_INDEX when the
   *         persisted files cannot be used
   */
  constructor(config: ExactVectorStoreConfig) {
    this.dimension = config.dimension;
    this.indexPath = config.indexPath;
    this.metadataPath = config.metadataPath;

    if (fs.existsSync(this.indexPath) && fs.existsSync(this.metadataPath)) {
      logger.info(`Loading existing index from ${this.indexPath}`);
      this.index = readIndexFile(this.indexPath, this.dimension);
      this.metadata = readMetadataFile(this.metadataPath);

      if (this.metadata.length !== this.index.count) {
        throw new VectorStoreError(
          `Index holds ${this.index.count} vectors but metadata holds ${this.metadata.length} entries`,
          VectorStoreErrorCode.CORRUPT_INDEX
        );
      }
    } else {
      logger.info(`Initialising new index (dim=${this.dimension})`);
      this.index = new FlatVectorIndex(this.dimension);
    }
  }

  async add(texts: string[], vectors: number[][], metadatas: VectorMetadata[]): Promise<void> {
    assertBatchLengths(texts, vectors, metadatas);
    if (vectors.length === 0) {
      return;
    }

    // The index validates every vector before writing any of them.
    this.index.add(vectors);
    metadatas.forEach((metadata, i) => {
      this.metadata.push({ ...structuredClone(metadata), text: texts[i] });
    });
  }

  async search(queryVector: number[], topK: number, scoreThreshold: number): Promise<RetrievalHit[]> {
    if (this.index.count === 0 || topK <= 0) {
      return [];
    }

    const scores = this.index.scores(queryVector);
    const candidates: { position: number; score: number }[] = [];

    scores.forEach((score, position) => {
      if (score >= scoreThreshold) {
        candidates.push({ position, score });
      }
    });

    candidates.sort((a, b) => b.score - a.score || a.position - b.position);

    return candidates.slice(0, topK).map(({ position, score }) => {
      const metadata = structuredClone(this.metadata[position]);
      return {
        text: metadataString(metadata, 'text', ''),
        score,
        metadata,
      };
    });
  }

  /**
   * Queues a write of the current state. Concurrent calls run one after
   * another, each writing the state as it is when its turn comes.
   */
  persist(): Promise<void> {
    return this.enqueue(() => this.writeFiles());
  }

  private async writeFiles(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.indexPath), { recursive: true });
    await fs.promises.mkdir(path.dirname(this.metadataPath), { recursive: true });

    // Both halves are serialized before the next await so they describe the same state.
    const metadataJson = JSON.stringify(this.metadata, null, 2);
    await writeIndexFile(this.indexPath, this.index);

    const tempPath = `${this.metadataPath}.tmp`;
    await fs.promises.writeFile(tempPath, metadataJson, 'utf-8');
    await fs.promises.rename(tempPath, this.metadataPath);
  }

  async count(): Promise<number> {
    return this.index.count;
  }

  async clear(): Promise<void> {
    this.index.reset();
    this.metadata = [];
    await this.enqueue(async () => {
      await fs.promises.rm(this.indexPath, { force: true });
      await fs.promises.rm(this.metadataPath, { force: true });
    });
    logger.info('Index cleared');
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.persisting.then(task);
    this.persisting = run.catch((error: unknown) => {
      logger.warn('Index file operation failed', error);
    });
    return run;
  }

  getIndexPath(): string {
    return this.indexPath;
  }

  getMetadataPath(): string {
    return this.metadataPath;
  }
}

function readMetadataFile(filePath: string): VectorMetadata[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new VectorStoreError(
      `Metadata file ${filePath} is not valid JSON`,
      VectorStoreErrorCode.CORRUPT_INDEX,
      error instanceof Error ? error : undefined
    );
  }

  if (!Array.isArray(parsed) || !parsed.every(isVectorMetadata)) {
    throw new VectorStoreError(
      `Metadata file ${filePath} must hold an array of objects`,
      VectorStoreErrorCode.CORRUPT_INDEX
    );
  }

  return parsed;
}

export function createExactVectorStore(config: ExactVectorStoreConfig): ExactVectorStore {
  return new ExactVectorStore(config);
}
