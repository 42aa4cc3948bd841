/**
 * Service Container
 *
 * The composition root: every long-lived service is built here exactly once
 * and handed to the HTTP layer by reference. Nothing else in the backend
 * constructs services or keeps them in module-level state.
 *
 * Construction fails fast. An unknown vector store kind, a corrupt index or
 * an index with the wrong dimension throws here, before the server listens.
 */

import { createLLMClient } from './clients/llmFactory';
import { ILLMClient, mergeSamplingOptions } from './clients/llmClient';
import { IEmbeddingProvider, OllamaEmbeddingProvider } from './clients/embeddingClient';
import { IModelManager, OllamaClient } from './clients/ollamaClient';
import { AppSettings } from './config/settings';
import { ChunkingConfig, validateChunkingConfig } from './services/documentChunker';
import { IngestionService } from './services/ingestionService';
import { PromptStore } from './services/promptStore';
import { RAGPipeline, RetrievalOptions, mergeRetrievalOptions } from './services/ragPipeline';
import { SessionManager } from './services/sessionManager';
import { UploadStore } from './services/uploadStore';
import { IVectorStore } from './services/vectorStore';
import { createVectorStore } from './services/vectorStoreFactory';
import { SamplingOptions } from '../shared/types';
import { createLogger } from './utils/logger';

const logger = createLogger('container');

/**
 * Settings that can be changed while the server runs.
 */
export type RuntimeSettings = SamplingOptions & ChunkingConfig & RetrievalOptions;

/**
 * Pre-built services that replace the ones the container would create.
 * Tests use these to plug in fakes.
 */
export interface ServiceOverrides {
  llm?: ILLMClient;
  /** Ollama model management; null disables the Ollama-only routes */
  modelManager?: IModelManager | null;
  embedder?: IEmbeddingProvider;
  vectorStore?: IVectorStore;
  prompts?: PromptStore;
  sessions?: SessionManager;
  uploads?: UploadStore;
}

export class ServiceContainer {
  readonly llm: ILLMClient;
  readonly modelManager: IModelManager | null;
  readonly embedder: IEmbeddingProvider;
  readonly vectorStore: IVectorStore;
  readonly prompts: PromptStore;
  readonly pipeline: RAGPipeline;
  readonly ingestion: IngestionService;
  readonly sessions: SessionManager;
  readonly uploads: UploadStore;

  constructor(readonly settings: AppSettings, overrides: ServiceOverrides = {}) {
    this.llm = overrides.llm ?? createLLMClient(settings);
    this.modelManager =
      overrides.modelManager !== undefined
        ? overrides.modelManager
        : this.llm instanceof OllamaClient
          ? this.llm
          : null;

    this.embedder =
      overrides.embedder ??
      new OllamaEmbeddingProvider({
        baseUrl: settings.embeddingBaseUrl,
        model: settings.embeddingModel,
        dimension: settings.embeddingDimension,
        batchSize: settings.embeddingBatchSize,
        timeoutMs: settings.llmTimeoutMs,
      });

    this.vectorStore =
      overrides.vectorStore ??
      createVectorStore({
        kind: settings.vectorStore,
        dimension: this.embedder.dimension,
        indexPath: settings.indexPath,
        metadataPath: settings.metadataPath,
        qdrantUrl: settings.qdrantUrl,
        qdrantApiKey: settings.qdrantApiKey,
        qdrantCollection: settings.qdrantCollection,
      });

    this.prompts =
      overrides.prompts ??
      new PromptStore({
        systemPromptPath: settings.systemPromptPath,
        ragPromptPath: settings.ragPromptPath,
      });

    this.pipeline = new RAGPipeline(this.embedder, this.vectorStore, this.llm, this.prompts, {
      topK: settings.topK,
      similarityThreshold: settings.similarityThreshold,
    });

    this.ingestion = new IngestionService(this.embedder, this.vectorStore, {
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
    });

    this.sessions =
      overrides.sessions ??
      new SessionManager({ storagePath: settings.historyDir, uploadDir: settings.uploadDir });
    this.uploads = overrides.uploads ?? new UploadStore(settings.uploadDir);

    logger.info(
      `Services ready: llm=${this.llm.provider}/${this.llm.model} store=${this.vectorStore.kind} dim=${this.embedder.dimension}`
    );
  }

  getRuntimeSettings(): RuntimeSettings {
    return {
      ...this.llm.getSamplingOptions(),
      ...this.ingestion.getChunkingConfig(),
      ...this.pipeline.getRetrievalOptions(),
    };
  }

  /**
   * Validates the whole update first, then pushes each part to the service
   * that owns it. A rejected update changes nothing.
   *
   * @throws RangeError or ChunkingError for invalid values
   */
  updateRuntimeSettings(update: Partial<RuntimeSettings>): RuntimeSettings {
    const sampling = pickDefined(update, ['temperature', 'topP', 'maxTokens']);
    const chunking = pickDefined(update, ['chunkSize', 'chunkOverlap']);
    const retrieval = pickDefined(update, ['topK', 'similarityThreshold']);

    mergeSamplingOptions(this.llm.getSamplingOptions(), sampling);
    validateChunkingConfig({ ...this.ingestion.getChunkingConfig(), ...chunking });
    mergeRetrievalOptions(this.pipeline.getRetrievalOptions(), retrieval);

    this.llm.updateSamplingOptions(sampling);
    this.ingestion.updateChunkingConfig(chunking);
    this.pipeline.updateRetrievalOptions(retrieval);

    const current = this.getRuntimeSettings();
    logger.info('Runtime settings updated', current);
    return current;
  }
}

/**
 * Copies the listed keys whose values are not undefined.
 */
function pickDefined<T extends object, K extends keyof T>(source: T, keys: K[]): Partial<Pick<T, K>> {
  const picked: Partial<Pick<T, K>> = {};
  for (const key of keys) {
    if (source[key] !== undefined) {
      picked[key] = source[key];
    }
  }
  return picked;
}

export function createServiceContainer(
  settings: AppSettings,
  overrides?: ServiceOverrides
): ServiceContainer {
  return new ServiceContainer(settings, overrides);
}
