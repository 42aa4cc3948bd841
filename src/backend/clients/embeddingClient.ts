/**
 * Embedding Provider
 *
 * Turns text into fixed-length vectors for similarity search. Every vector
 * handed out is L2-normalized, so an inner product between two of them is
 * their cosine similarity.
 *
 * The Ollama implementation uses POST /api/embed, which accepts a list of
 * inputs and returns one vector per input in the same order.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { RequestTimeoutError, describeErrorBody, fetchJson } from './llmClient';

const logger = createLogger('embeddingClient');

/**
 * Interface for embedding generation.
 */
export interface IEmbeddingProvider {
    /** Output dimension, fixed for the provider's lifetime */
    readonly dimension: number;

    /** Batch embedding; order-preserving. */
    embedDocuments(texts: string[]): Promise<number[][]>;

    embedQuery(text: string): Promise<number[]>;
}

export enum EmbeddingErrorCode {
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    TIMEOUT = 'TIMEOUT',
    API_ERROR = 'API_ERROR',
    /** The model returned vectors of a different length than configured */
    DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
    UNKNOWN = 'UNKNOWN',
}

export class EmbeddingError extends Error {
    constructor(
        message: string,
        public readonly code: EmbeddingErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'EmbeddingError';
    }
}

export interface OllamaEmbeddingConfig {
    baseUrl: string;
    model: string;
    dimension: number;
    /** Maximum texts per request */
    batchSize: number;
    timeoutMs: number;
}

export const DEFAULT_EMBEDDING_CONFIG: OllamaEmbeddingConfig = {
    baseUrl: 'http://localhost:11434',
    model: 'nomic-embed-text',
    dimension: 768,
    batchSize: 32,
    timeoutMs: 120000,
};

const embedResponseSchema = z.object({
    embeddings: z.array(z.array(z.number())),
});

/**
 * Scales a vector to unit length. A zero vector is returned unchanged.
 */
export function normalizeVector(vector: number[]): number[] {
    let sumOfSquares = 0;
    for (const value of vector) {
        sumOfSquares += value * value;
    }

    const norm = Math.sqrt(sumOfSquares);
    if (norm === 0) {
        return [...vector];
    }
    return vector.map((value) => value / norm);
}

export class OllamaEmbeddingProvider implements IEmbeddingProvider {
    readonly dimension: number;
    private readonly config: OllamaEmbeddingConfig;

    constructor(config: Partial<OllamaEmbeddingConfig> = {}) {
        this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
        this.config.baseUrl = this.config.baseUrl.replace(/\/+$/, '');
        this.dimension = this.config.dimension;

        if (!Number.isInteger(this.config.batchSize) || this.config.batchSize < 1) {
            throw new RangeError(`Embedding batch size must be a positive integer, got ${this.config.batchSize}`);
        }

        logger.info(
            `Embedding provider initialised: model=${this.config.model} dim=${this.dimension} batch=${this.config.batchSize}`
        );
    }

    get model(): string {
        return this.config.model;
    }

    /**
     * Embeds texts in sequential requests of at most batchSize inputs.
     *
     * @throws EmbeddingError if a request fails or a vector has the wrong length
     */
    async embedDocuments(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (let start = 0; start < texts.length; start += this.config.batchSize) {
            const batch = texts.slice(start, start + this.config.batchSize);
            vectors.push(...(await this.embedBatch(batch)));
        }

        return vectors;
    }

    async embedQuery(text: string): Promise<number[]> {
        const [vector] = await this.embedBatch([text]);
        return vector;
    }

    private async embedBatch(batch: string[]): Promise<number[][]> {
        let result: { response: Response; body: unknown };
        try {
            result = await fetchJson(
                `${this.config.baseUrl}/api/embed`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({ model: this.config.model, input: batch }),
                },
                this.config.timeoutMs
            );
        } catch (error) {
            throw toEmbeddingError(error);
        }

        const { response, body } = result;
        if (!response.ok) {
            throw new EmbeddingError(
                `Embedding API error: ${describeErrorBody(body, response)}`,
                EmbeddingErrorCode.API_ERROR
            );
        }

        const parsed = embedResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new EmbeddingError('Malformed embedding response', EmbeddingErrorCode.API_ERROR);
        }

        const { embeddings } = parsed.data;
        if (embeddings.length !== batch.length) {
            throw new EmbeddingError(
                `Expected ${batch.length} embeddings, received ${embeddings.length}`,
                EmbeddingErrorCode.API_ERROR
            );
        }

        return embeddings.map((vector) => {
            if (vector.length !== this.dimension) {
                throw new EmbeddingError(
                    `Model ${this.config.model} returned dimension ${vector.length}, expected ${this.dimension}`,
                    EmbeddingErrorCode.DIMENSION_MISMATCH
                );
            }
            return normalizeVector(vector);
        });
    }
}

function toEmbeddingError(error: unknown): EmbeddingError {
    if (error instanceof RequestTimeoutError) {
        return new EmbeddingError(error.message, EmbeddingErrorCode.TIMEOUT, error);
    }
    if (error instanceof TypeError && error.message.includes('fetch')) {
        return new EmbeddingError(
            'Cannot connect to the embedding service',
            EmbeddingErrorCode.CONNECTION_REFUSED,
            error
        );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new EmbeddingError(
        `Failed to generate embeddings: ${message}`,
        EmbeddingErrorCode.UNKNOWN,
        error instanceof Error ? error : undefined
    );
}

export function createEmbeddingProvider(config?: Partial<OllamaEmbeddingConfig>): OllamaEmbeddingProvider {
    return new OllamaEmbeddingProvider(config);
}
