/**
 * Remote Vector Store (Qdrant)
 *
 * Delegates storage and similarity search to a Qdrant server over its REST
 * API. Writes are acknowledged only once applied (`wait=true`), so persist()
 * has nothing left to flush.
 *
 * The collection is set up lazily on first use: created with cosine distance
 * when absent, checked against the configured dimension when present.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { RetrievalHit } from '../../shared/types';
import { describeErrorBody, fetchJson } from '../clients/llmClient';
import { createLogger } from '../utils/logger';
import {
  IVectorStore,
  VectorMetadata,
  VectorStoreError,
  VectorStoreErrorCode,
  assertBatchLengths,
  assertDimension,
  metadataString,
} from './vectorStore';

const logger = createLogger('remoteVectorStore');

export interface RemoteVectorStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
  dimension: number;
  timeoutMs: number;
}

export const DEFAULT_REMOTE_TIMEOUT_MS = 30000;

const collectionsSchema = z.object({
  result: z.object({
    collections: z.array(z.object({ name: z.string() })),
  }),
});

const collectionInfoSchema = z.object({
  result: z.object({
    config: z.object({
      params: z.object({
        vectors: z.object({ size: z.number() }).passthrough(),
      }),
    }),
  }),
});

const searchSchema = z.object({
  result: z.array(
    z.object({
      score: z.number(),
      payload: z.record(z.unknown()).nullish(),
    })
  ),
});

const countSchema = z.object({
  result: z.object({ count: z.number() }),
});

export class RemoteVectorStore implements IVectorStore {
  readonly kind = 'remote' as const;
  readonly dimension: number;
  private readonly config: RemoteVectorStoreConfig;
  private collectionReady: Promise<void> | null = null;

  constructor(config: Omit<RemoteVectorStoreConfig, 'timeoutMs'> & { timeoutMs?: number }) {
    this.config = {
      ...config,
      url: config.url.replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS,
    };
    this.dimension = config.dimension;
    logger.info(`Qdrant store configured: url=${this.config.url} collection=${this.config.collection}`);
  }

  async add(texts: string[], vectors: number[][], metadatas: VectorMetadata[]): Promise<void> {
    assertBatchLengths(texts, vectors, metadatas);
    if (vectors.length === 0) {
      return;
    }
    vectors.forEach((vector, i) => assertDimension(vector, this.dimension, `Vector ${i}`));

    await this.ensureCollection();

    const points = vectors.map((vector, i) => ({
      id: uuidv4(),
      vector,
      payload: { ...metadatas[i], text: texts[i] },
    }));

    await this.request('PUT', `${this.collectionPath()}/points?wait=true`, { points });
  }

  async search(queryVector: number[], topK: number, scoreThreshold: number): Promise<RetrievalHit[]> {
    assertDimension(queryVector, this.dimension, 'Query vector');
    if (topK <= 0) {
      return [];
    }

    await this.ensureCollection();

    const body = await this.request('POST', `${this.collectionPath()}/points/search`, {
      vector: queryVector,
      limit: topK,
      score_threshold: scoreThreshold,
      with_payload: true,
    });

    const parsed = this.parse(searchSchema, body, 'search');
    return parsed.result
      .filter((point) => point.score >= scoreThreshold)
      .map((point) => {
        const metadata = point.payload ?? {};
        return {
          text: metadataString(metadata, 'text', ''),
          score: point.score,
          metadata,
        };
      });
  }

  async persist(): Promise<void> {
    // Qdrant has already applied every acknowledged write
  }

  async count(): Promise<number> {
    await this.ensureCollection();
    const body = await this.request('POST', `${this.collectionPath()}/points/count`, { exact: true });
    return this.parse(countSchema, body, 'count').result.count;
  }

  async clear(): Promise<void> {
    await this.request('DELETE', this.collectionPath(), undefined, [404]);
    this.collectionReady = null;
    logger.info(`Collection ${this.config.collection} dropped`);
  }

  /**
   * Runs collection setup once per instance. A failed attempt is forgotten so
   * the next call retries it.
   */
  private ensureCollection(): Promise<void> {
    if (!this.collectionReady) {
      this.collectionReady = this.setupCollection().catch((error: unknown) => {
        this.collectionReady = null;
        throw error;
      });
    }
    return this.collectionReady;
  }

  private async setupCollection(): Promise<void> {
    const listing = this.parse(collectionsSchema, await this.request('GET', '/collections'), 'list collections');
    const exists = listing.result.collections.some((c) => c.name === this.config.collection);

    if (!exists) {
      logger.info(`Creating collection ${this.config.collection} (size=${this.dimension}, distance=Cosine)`);
      await this.request('PUT', this.collectionPath(), {
        vectors: { size: this.dimension, distance: 'Cosine' },
      });
      return;
    }

    const info = this.parse(collectionInfoSchema, await this.request('GET', this.collectionPath()), 'collection info');
    const size = info.result.config.params.vectors.size;
    if (size !== this.dimension) {
      throw new VectorStoreError(
        `Collection ${this.config.collection} has dimension ${size}, expected ${this.dimension}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }
  }

  private collectionPath(): string {
    return `/collections/${encodeURIComponent(this.config.collection)}`;
  }

  private async request(
    method: string,
    pathname: string,
    payload?: unknown,
    allowedStatuses: number[] = []
  ): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['api-key'] = this.config.apiKey;
    }

    let result: { response: Response; body: unknown };
    try {
      result = await fetchJson(
        `${this.config.url}${pathname}`,
        {
          method,
          headers,
          body: payload === undefined ? undefined : JSON.stringify(payload),
        },
        this.config.timeoutMs
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new VectorStoreError(
        `Qdrant request ${method} ${pathname} failed: ${message}`,
        VectorStoreErrorCode.REMOTE_ERROR,
        error instanceof Error ? error : undefined
      );
    }

    const { response, body } = result;
    if (!response.ok && !allowedStatuses.includes(response.status)) {
      throw new VectorStoreError(
        `Qdrant ${method} ${pathname} returned ${response.status}: ${describeErrorBody(body, response)}`,
        VectorStoreErrorCode.REMOTE_ERROR
      );
    }
    return body;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, operation: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new VectorStoreError(
        `Unexpected Qdrant response for ${operation}`,
        VectorStoreErrorCode.REMOTE_ERROR
      );
    }
    return parsed.data;
  }
}
