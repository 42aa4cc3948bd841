/**
 * Vector Store Abstraction
 *
 * Every backend stores (vector, metadata) records and answers thresholded
 * top-k similarity queries:
 * - add: append a batch of records
 * - search: best-first hits whose score is at least the threshold
 * - persist: flush durable state (no-op where writes are already durable)
 *
 * Backends are chosen once, at startup, by createVectorStore in
 * vectorStoreFactory.ts.
 *
 * SCORES:
 * Both backends report cosine similarity. Vectors arrive L2-normalized from
 * the embedding provider, so the exact backend's inner product is the cosine,
 * and the remote backend's collection is created with cosine distance.
 */

import { RetrievalHit } from '../../shared/types';

export type VectorStoreKind = 'exact' | 'remote';

export type VectorMetadata = Record<string, unknown>;

/**
 * Interface for vector store operations.
 */
export interface IVectorStore {
  readonly kind: VectorStoreKind;
  readonly dimension: number;

  /**
   * Appends records. The three arrays must have equal length; an empty batch
   * is a no-op. A rejected batch leaves the store unchanged.
   */
  add(texts: string[], vectors: number[][], metadatas: VectorMetadata[]): Promise<void>;

  /**
   * Returns at most topK hits, highest score first, each scoring at least
   * scoreThreshold. An empty store yields [].
   */
  search(queryVector: number[], topK: number, scoreThreshold: number): Promise<RetrievalHit[]>;

  /** Flushes durable state. Safe to call repeatedly. */
  persist(): Promise<void>;

  /** Number of stored records. */
  count(): Promise<number>;

  /** Removes every record. The only deletion path. */
  clear(): Promise<void>;
}

/**
 * Error codes for vector store failures.
 */
export enum VectorStoreErrorCode {
  /** Unknown backend kind or a missing backend parameter */
  CONFIGURATION = 'CONFIGURATION',
  /** A vector, loaded index or remote collection has the wrong dimension */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** texts, vectors and metadatas passed to add differ in length */
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  /** Persisted index or metadata cannot be read back consistently */
  CORRUPT_INDEX = 'CORRUPT_INDEX',
  /** The managed vector service failed or was unreachable */
  REMOTE_ERROR = 'REMOTE_ERROR',
}

export class VectorStoreError extends Error {
  constructor(
    message: string,
    public readonly code: VectorStoreErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'VectorStoreError';
  }
}

/**
 * Throws LENGTH_MISMATCH unless the three batch arrays line up.
 */
export function assertBatchLengths(
  texts: string[],
  vectors: number[][],
  metadatas: VectorMetadata[]
): void {
  if (texts.length !== vectors.length || texts.length !== metadatas.length) {
    throw new VectorStoreError(
      `Length mismatch between texts (${texts.length}), vectors (${vectors.length}) and metadatas (${metadatas.length})`,
      VectorStoreErrorCode.LENGTH_MISMATCH
    );
  }
}

/**
 * Throws DIMENSION_MISMATCH for a vector of the wrong length.
 */
export function assertDimension(vector: ArrayLike<number>, dimension: number, label: string): void {
  if (vector.length !== dimension) {
    throw new VectorStoreError(
      `${label} has dimension ${vector.length}, expected ${dimension}`,
      VectorStoreErrorCode.DIMENSION_MISMATCH
    );
  }
}

/**
 * Inner product of two equal-length vectors.
 *
 * For L2-normalized inputs this equals cosine similarity:
 * 1.0 = same direction, 0.0 = unrelated, -1.0 = opposite.
 */
export function innerProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function isVectorMetadata(value: unknown): value is VectorMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a string field from hit metadata, or the fallback when the field is
 * absent or not a string.
 */
export function metadataString(metadata: VectorMetadata, key: string, fallback: string): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : fallback;
}
