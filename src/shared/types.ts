/**
 * Shared type definitions for the Nexa Support backend
 *
 * These types define the contract between the retrieval core and the
 * layers around it. They're organized by domain:
 * - Chunks: Ingested text and its provenance
 * - Retrieval: Search hits and pipeline events
 * - Sessions: Conversation history persistence
 * - API: Request/response shapes
 */

// ============================================================================
// Chunk Types
// ============================================================================

/**
 * Provenance metadata stored beside every vector.
 *
 * The chunk text is duplicated here so that a search hit carries the text
 * without a second lookup.
 */
export type ChunkMetadata = {
    /** Fresh unique id, independent of any vector store handle */
    id: string;
    /** Base filename of the source document */
    documentName: string;
    /** Full path the document was read from */
    sourcePath: string;
    version: string | null;
    tags: string[];
    text: string;
};

/**
 * Supported document formats for the knowledge base.
 * Each format requires a specific parser implementation.
 */
export type DocumentType = 'markdown' | 'text' | 'pdf';

/**
 * A document read from disk, ready to be chunked.
 */
export interface LoadedDocument {
    path: string;
    text: string;
}

// ============================================================================
// Retrieval Types
// ============================================================================

/**
 * A single search result. Higher scores are better.
 *
 * Metadata is whatever the store holds for the record; for anything written
 * by the ingestion service it has the ChunkMetadata fields.
 */
export interface RetrievalHit {
    text: string;
    score: number;
    metadata: Record<string, unknown>;
}

/**
 * Per-hit preview sent to clients for hover cards.
 */
export interface SourceContext {
    document: string;
    chunkId: string;
    text: string;
    score: number;
}

/**
 * Events produced by the streaming pipeline, in this order:
 * sources, then contexts (only when there are hits), then tokens, then done.
 */
export type RAGStreamEvent =
    | { type: 'sources'; data: string[] }
    | { type: 'contexts'; data: SourceContext[] }
    | { type: 'token'; data: string }
    | { type: 'done'; data: '' };

/**
 * Result of a synchronous generation.
 */
export interface RAGAnswer {
    answer: string;
    sources: string[];
}

// ============================================================================
// Query Processing Types
// ============================================================================

/**
 * Result of query validation.
 * Invalid queries are rejected before processing.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

// ============================================================================
// LLM Types
// ============================================================================

/**
 * Sampling parameters owned by an LLM client.
 */
export interface SamplingOptions {
    temperature: number;
    topP: number;
    maxTokens: number;
}

export type LLMProvider = 'ollama' | 'cloud';

// ============================================================================
// Session Types
// ============================================================================

/**
 * A single message in a saved conversation.
 */
export interface HistoryMessage {
    role: 'user' | 'assistant';
    content: string;
    sources?: string[];
}

/**
 * Input for creating or updating a session.
 */
export interface SessionInput {
    id?: string;
    title?: string;
    messages: HistoryMessage[];
    /** Paths of documents uploaded during this conversation */
    documents: string[];
}

/**
 * A saved conversation session. Timestamps are ISO strings.
 */
export interface SessionDetail {
    id: string;
    title: string;
    messages: HistoryMessage[];
    documents: string[];
    createdAt: string;
    updatedAt: string;
}

/**
 * Session listing entry (without messages).
 */
export interface SessionSummary {
    id: string;
    title: string;
    messageCount: number;
    documentCount: number;
    createdAt: string;
    updatedAt: string;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Response body for POST /api/chat
 */
export interface ChatResponse {
    answer: string;
    sources: string[];
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'degraded';
    llmConnected: boolean;
    detail: string;
}

/**
 * Response body for POST /api/ingest
 */
export interface IngestResponse {
    chunksIndexed: number;
}

/**
 * A file accepted by POST /api/upload
 */
export interface UploadedFileInfo {
    originalName: string;
    savedPath: string;
    size: number;
}

/**
 * Response body for POST /api/upload
 */
export interface UploadResponse {
    files: UploadedFileInfo[];
    chunksIndexed: number;
}

/**
 * Entry returned by GET /api/uploads
 */
export interface UploadedFileEntry {
    name: string;
    path: string;
    size: number;
    modifiedAt: string;
}

/**
 * Response body for GET /api/index/stats
 */
export interface IndexStatsResponse {
    kind: string;
    totalVectors: number;
    indexPath: string | null;
    metadataPath: string | null;
    indexSizeBytes: number;
    metadataSizeBytes: number;
}
