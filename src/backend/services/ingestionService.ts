/**
 * Ingestion Service
 *
 * Loads documents, chunks them, embeds every chunk and adds the batch to the
 * vector store in one call, then persists.
 *
 * Chunk order follows document order, and document order follows the
 * lexicographic directory walk, so re-ingesting the same tree produces the
 * same sequence of records (with fresh ids).
 */

import { v4 as uuidv4 } from 'uuid';
import { ChunkMetadata } from '../../shared/types';
import { IEmbeddingProvider } from '../clients/embeddingClient';
import { createLogger } from '../utils/logger';
import { ChunkingConfig, DocumentChunker } from './documentChunker';
import { gatherDocuments } from './documentLoader';
import { IVectorStore } from './vectorStore';

const logger = createLogger('ingestionService');

export interface IngestOptions {
  tags?: string[];
  version?: string | null;
}

export class IngestionService {
  private readonly chunker: DocumentChunker;

  constructor(
    private readonly embedder: IEmbeddingProvider,
    private readonly store: IVectorStore,
    chunking: Partial<ChunkingConfig> = {}
  ) {
    this.chunker = new DocumentChunker(chunking);
  }

  /**
   * Ingests files and directories.
   *
   * Missing paths are skipped with a warning. An unsupported file named
   * explicitly, or a failure from the embedder or the store, fails the whole
   * call before anything is added.
   *
   * @returns the number of chunks indexed
   */
  async ingest(paths: string[], options: IngestOptions = {}): Promise<number> {
    const documents = await gatherDocuments(paths);
    const texts: string[] = [];
    const metadatas: ChunkMetadata[] = [];

    for (const document of documents) {
      for (const chunk of this.chunker.chunk(document.text)) {
        texts.push(chunk);
        metadatas.push({
          id: uuidv4(),
          documentName: baseName(document.path),
          sourcePath: document.path,
          version: options.version ?? null,
          tags: [...(options.tags ?? [])],
          text: chunk,
        });
      }
    }

    if (texts.length > 0) {
      const vectors = await this.embedder.embedDocuments(texts);
      await this.store.add(texts, vectors, metadatas);
      await this.store.persist();
    }

    logger.info(`Ingested ${texts.length} chunks from ${paths.length} paths`);
    return texts.length;
  }

  getChunkingConfig(): ChunkingConfig {
    return this.chunker.getConfig();
  }

  /**
   * Applies to the next ingest call.
   *
   * @throws ChunkingError if the resulting config is invalid
   */
  updateChunkingConfig(update: Partial<ChunkingConfig>): ChunkingConfig {
    this.chunker.updateConfig(update);
    return this.chunker.getConfig();
  }
}

/**
 * Final path segment, accepting either separator.
 */
function baseName(filePath: string): string {
  const segments = filePath.replace(/\\/g, '/').split('/');
  return segments[segments.length - 1];
}

export function createIngestionService(
  embedder: IEmbeddingProvider,
  store: IVectorStore,
  chunking?: Partial<ChunkingConfig>
): IngestionService {
  return new IngestionService(embedder, store, chunking);
}
