/**
 * Vector Store Factory
 *
 * Builds the backend named by the VECTOR_STORE setting. Called once at
 * startup, so an unknown kind, a missing parameter or an unusable exact
 * index stops the process before it serves requests.
 */

import { ExactVectorStore } from './exactVectorStore';
import { RemoteVectorStore } from './remoteVectorStore';
import { IVectorStore, VectorStoreError, VectorStoreErrorCode } from './vectorStore';

export interface VectorStoreOptions {
  /** 'exact' or 'remote' (case-insensitive) */
  kind: string;
  dimension: number;
  indexPath?: string;
  metadataPath?: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  qdrantCollection?: string;
  timeoutMs?: number;
}

/**
 * @throws VectorStoreError CONFIGURATION for an unknown kind or a missing
 *         backend parameter; any load error from the exact backend
 */
export function createVectorStore(options: VectorStoreOptions): IVectorStore {
  const kind = options.kind.trim().toLowerCase();

  switch (kind) {
    case 'exact': {
      if (!options.indexPath || !options.metadataPath) {
        throw new VectorStoreError(
          'The exact vector store needs both an index path and a metadata path',
          VectorStoreErrorCode.CONFIGURATION
        );
      }
      return new ExactVectorStore({
        dimension: options.dimension,
        indexPath: options.indexPath,
        metadataPath: options.metadataPath,
      });
    }

    case 'remote': {
      if (!options.qdrantUrl) {
        throw new VectorStoreError(
          'The remote vector store needs a Qdrant URL',
          VectorStoreErrorCode.CONFIGURATION
        );
      }
      if (!options.qdrantCollection) {
        throw new VectorStoreError(
          'The remote vector store needs a collection name',
          VectorStoreErrorCode.CONFIGURATION
        );
      }
      return new RemoteVectorStore({
        url: options.qdrantUrl,
        apiKey: options.qdrantApiKey,
        collection: options.qdrantCollection,
        dimension: options.dimension,
        timeoutMs: options.timeoutMs,
      });
    }

    default:
      throw new VectorStoreError(
        `Unknown vector store kind: '${options.kind}'. Use 'exact' or 'remote'`,
        VectorStoreErrorCode.CONFIGURATION
      );
  }
}
