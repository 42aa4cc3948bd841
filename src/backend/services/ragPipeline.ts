/**
 * RAG Pipeline
 *
 * Retrieval-Augmented Generation:
 * 1. RETRIEVE: embed the query and search the vector store
 * 2. AUGMENT: join the hits into a context block inside the user prompt
 * 3. GENERATE: ask the LLM to answer from that context only
 *
 * When retrieval finds nothing above the similarity threshold the pipeline
 * answers with REFUSAL_MESSAGE and never calls the LLM. That is the normal
 * "no evidence" outcome, not an error.
 *
 * Failures from the embedder, the store or the LLM propagate unchanged. The
 * pipeline never retries and never returns a partial answer.
 */

import { RAGAnswer, RAGStreamEvent, RetrievalHit, SourceContext } from '../../shared/types';
import { IEmbeddingProvider } from '../clients/embeddingClient';
import { ILLMClient } from '../clients/llmClient';
import { createLogger } from '../utils/logger';
import { IPromptProvider } from './promptStore';
import { buildUserPrompt, validateQuery } from './queryProcessor';
import { IVectorStore, metadataString } from './vectorStore';

const logger = createLogger('ragPipeline');

export const REFUSAL_MESSAGE =
  'I can only help with questions related to Nexa. This information is not available in the documentation.';

/** Characters of chunk text included in a context preview */
export const CONTEXT_PREVIEW_LENGTH = 500;

const UNKNOWN_DOCUMENT = 'unknown';

/**
 * Retrieval settings, adjustable at runtime.
 */
export interface RetrievalOptions {
  topK: number;
  similarityThreshold: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: 4,
  similarityThreshold: 0.35,
};

export enum RAGPipelineErrorCode {
  INVALID_QUERY = 'INVALID_QUERY',
}

export class RAGPipelineError extends Error {
  constructor(message: string, public readonly code: RAGPipelineErrorCode) {
    super(message);
    this.name = 'RAGPipelineError';
  }
}

/**
 * Interface for the RAG pipeline.
 */
export interface IRAGPipeline {
  generate(query: string): Promise<RAGAnswer>;
  generateStream(query: string): AsyncGenerator<RAGStreamEvent>;
}

export class RAGPipeline implements IRAGPipeline {
  private retrieval: RetrievalOptions;

  constructor(
    private readonly embedder: IEmbeddingProvider,
    private readonly store: IVectorStore,
    private readonly llm: ILLMClient,
    private readonly prompts: IPromptProvider,
    retrieval: Partial<RetrievalOptions> = {}
  ) {
    this.retrieval = mergeRetrievalOptions(DEFAULT_RETRIEVAL_OPTIONS, retrieval);
  }

  getRetrievalOptions(): RetrievalOptions {
    return { ...this.retrieval };
  }

  /**
   * Applies to the next request.
   */
  updateRetrievalOptions(update: Partial<RetrievalOptions>): RetrievalOptions {
    this.retrieval = mergeRetrievalOptions(this.retrieval, update);
    return this.getRetrievalOptions();
  }

  /**
   * Answers a query from retrieved context.
   *
   * @returns the LLM output verbatim and the distinct source document names,
   *          or the refusal message and no sources when nothing was retrieved
   * @throws RAGPipelineError INVALID_QUERY for an empty or whitespace query
   */
  async generate(query: string): Promise<RAGAnswer> {
    const hits = await this.retrieve(query);
    if (hits.length === 0) {
      logger.info('No context above threshold, refusing');
      return { answer: REFUSAL_MESSAGE, sources: [] };
    }

    const userPrompt = this.buildPrompt(query, hits);
    const answer = await this.llm.generate(userPrompt, this.prompts.getSystemPrompt());

    return { answer, sources: distinctSources(hits) };
  }

  /**
   * Streaming variant of generate.
   *
   * Event order: one `sources`, then one `contexts` (only when there are
   * hits), then `token` events, then one `done`. Each call retrieves afresh.
   * A consumer that stops iterating simply ends the LLM stream early.
   *
   * @throws RAGPipelineError INVALID_QUERY on the first iteration
   */
  async *generateStream(query: string): AsyncGenerator<RAGStreamEvent> {
    const hits = await this.retrieve(query);

    if (hits.length === 0) {
      logger.info('No context above threshold, refusing');
      yield { type: 'sources', data: [] };
      yield { type: 'token', data: REFUSAL_MESSAGE };
      yield { type: 'done', data: '' };
      return;
    }

    yield { type: 'sources', data: distinctSources(hits) };
    yield { type: 'contexts', data: hits.map(toSourceContext) };

    const userPrompt = this.buildPrompt(query, hits);
    for await (const fragment of this.llm.generateStream(userPrompt, this.prompts.getSystemPrompt())) {
      yield { type: 'token', data: fragment };
    }

    yield { type: 'done', data: '' };
  }

  private async retrieve(query: string): Promise<RetrievalHit[]> {
    const validation = validateQuery(query);
    if (!validation.valid) {
      throw new RAGPipelineError(
        validation.error ?? 'Invalid query',
        RAGPipelineErrorCode.INVALID_QUERY
      );
    }

    const queryVector = await this.embedder.embedQuery(query);
    const hits = await this.store.search(
      queryVector,
      this.retrieval.topK,
      this.retrieval.similarityThreshold
    );
    logger.debug(`Retrieved ${hits.length} chunks (topK=${this.retrieval.topK})`);
    return hits;
  }

  private buildPrompt(query: string, hits: RetrievalHit[]): string {
    return buildUserPrompt(
      this.prompts.getRagPrompt(),
      query,
      hits.map((hit) => hit.text)
    );
  }
}

function documentNameOf(hit: RetrievalHit): string {
  return metadataString(hit.metadata, 'documentName', UNKNOWN_DOCUMENT);
}

/**
 * Distinct document names in first-seen (ranked) order.
 */
function distinctSources(hits: RetrievalHit[]): string[] {
  return [...new Set(hits.map(documentNameOf))];
}

function toSourceContext(hit: RetrievalHit): SourceContext {
  return {
    document: documentNameOf(hit),
    chunkId: metadataString(hit.metadata, 'id', ''),
    text: hit.text.slice(0, CONTEXT_PREVIEW_LENGTH),
    score: Math.round(hit.score * 1000) / 1000,
  };
}

/**
 * Checks retrieval values and merges them over the current ones.
 */
export function mergeRetrievalOptions(
  current: RetrievalOptions,
  update: Partial<RetrievalOptions>
): RetrievalOptions {
  const next = { ...current, ...update };
  if (!Number.isInteger(next.topK) || next.topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${next.topK}`);
  }
  if (!Number.isFinite(next.similarityThreshold)) {
    throw new RangeError(`similarityThreshold must be a finite number, got ${next.similarityThreshold}`);
  }
  return next;
}

export function createRAGPipeline(
  embedder: IEmbeddingProvider,
  store: IVectorStore,
  llm: ILLMClient,
  prompts: IPromptProvider,
  retrieval?: Partial<RetrievalOptions>
): RAGPipeline {
  return new RAGPipeline(embedder, store, llm, prompts, retrieval);
}
