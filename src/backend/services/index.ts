/**
 * Backend services
 *
 * Core business logic components:
 * - DocumentChunker / DocumentLoader: Turn files into overlapping text chunks
 * - Vector stores: Exact in-process index or a remote Qdrant collection
 * - IngestionService: Load, chunk, embed and index documents
 * - RAGPipeline: Retrieve, augment and generate (plain and streamed)
 * - SessionManager, PromptStore, UploadStore: File-backed stores
 */

export {
    validateQuery,
    buildContextBlock,
    buildUserPrompt,
    CONTEXT_SEPARATOR,
} from './queryProcessor';

export { SessionManager, createSessionManager } from './sessionManager';

export type { SessionManagerConfig } from './sessionManager';

export {
    SUPPORTED_EXTENSIONS,
    UnsupportedFormatError,
    DocumentLoadError,
    MarkdownParser,
    PlainTextParser,
    PdfParser,
    getParser,
    detectDocumentType,
    isSupportedFile,
    loadFile,
    gatherDocuments,
} from './documentLoader';

export type { DocumentParser } from './documentLoader';

export {
    DocumentChunker,
    createDocumentChunker,
    chunkText,
    validateChunkingConfig,
    ChunkingError,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig } from './documentChunker';

export {
    VectorStoreError,
    VectorStoreErrorCode,
    innerProduct,
    metadataString,
} from './vectorStore';

export type { IVectorStore, VectorStoreKind, VectorMetadata } from './vectorStore';

export { FlatVectorIndex, readIndexFile, writeIndexFile } from './vectorIndexFile';

export { ExactVectorStore, createExactVectorStore } from './exactVectorStore';

export type { ExactVectorStoreConfig } from './exactVectorStore';

export { RemoteVectorStore, DEFAULT_REMOTE_TIMEOUT_MS } from './remoteVectorStore';

export type { RemoteVectorStoreConfig } from './remoteVectorStore';

export { createVectorStore } from './vectorStoreFactory';

export type { VectorStoreOptions } from './vectorStoreFactory';

export { IngestionService, createIngestionService } from './ingestionService';

export type { IngestOptions } from './ingestionService';

export {
    RAGPipeline,
    createRAGPipeline,
    RAGPipelineError,
    RAGPipelineErrorCode,
    REFUSAL_MESSAGE,
    CONTEXT_PREVIEW_LENGTH,
    DEFAULT_RETRIEVAL_OPTIONS,
    mergeRetrievalOptions,
} from './ragPipeline';

export type { IRAGPipeline, RetrievalOptions } from './ragPipeline';

export { PromptStore, createPromptStore } from './promptStore';

export type { IPromptProvider, PromptStoreConfig, PromptUpdate, Prompts } from './promptStore';

export {
    UploadStore,
    createUploadStore,
    UploadTooLargeError,
    MAX_UPLOAD_BYTES,
} from './uploadStore';

export type { IncomingFile } from './uploadStore';
