/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OllamaClient: Local Ollama instance (chat/generate, streaming, model management)
 * - CloudLLMClient: Any OpenAI-compatible chat-completion API
 * - OllamaEmbeddingProvider: Normalized text embeddings via Ollama
 */

export {
    LLMError,
    LLMErrorCode,
    RequestTimeoutError,
    fetchWithTimeout,
    readLines,
    type ILLMClient,
} from './llmClient';

export {
    OllamaClient,
    createOllamaClient,
    DEFAULT_OLLAMA_CONFIG,
    type OllamaClientConfig,
    type OllamaModel,
    type IModelManager,
} from './ollamaClient';

export {
    CloudLLMClient,
    createCloudLLMClient,
    DEFAULT_CLOUD_CONFIG,
    type CloudClientConfig,
} from './cloudClient';

export {
    OllamaEmbeddingProvider,
    createEmbeddingProvider,
    normalizeVector,
    EmbeddingError,
    EmbeddingErrorCode,
    DEFAULT_EMBEDDING_CONFIG,
    type IEmbeddingProvider,
    type OllamaEmbeddingConfig,
} from './embeddingClient';

export { createLLMClient } from './llmFactory';
