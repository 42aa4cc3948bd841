/**
 * Settings Tests
 */

import * as path from 'path';
import { ConfigError, loadSettings } from '../settings';

const load = (env: NodeJS.ProcessEnv) => loadSettings(env, { skipDotenv: true });

describe('loadSettings', () => {
    it('should apply defaults to an empty environment', () => {
        const settings = load({});

        expect(settings.appName).toBe('Nexa Support');
        expect(settings.port).toBe(8000);
        expect(settings.logLevel).toBe('info');
        expect(settings.llmProvider).toBe('ollama');
        expect(settings.ollamaUseChatApi).toBe(true);
        expect(settings.vectorStore).toBe('exact');
        expect(settings.chunkSize).toBe(400);
        expect(settings.chunkOverlap).toBe(80);
        expect(settings.topK).toBe(4);
        expect(settings.similarityThreshold).toBe(0.35);
        expect(settings.embeddingDimension).toBe(768);
        expect(settings.qdrantUrl).toBeUndefined();
    });

    it('should place history and uploads under the data directory', () => {
        const settings = load({ DATA_DIR: '/var/nexa' });
        expect(settings.historyDir).toBe(path.join('/var/nexa', 'history'));
        expect(settings.uploadDir).toBe(path.join('/var/nexa', 'uploads'));
    });

    it('should coerce numbers and booleans', () => {
        const settings = load({ PORT: '9100', TOP_K: '6', SIMILARITY_THRESHOLD: '0.5', OLLAMA_USE_CHAT_API: 'no' });
        expect(settings.port).toBe(9100);
        expect(settings.topK).toBe(6);
        expect(settings.similarityThreshold).toBe(0.5);
        expect(settings.ollamaUseChatApi).toBe(false);
    });

    it('should lowercase the log level and store kind', () => {
        const settings = load({ LOG_LEVEL: 'DEBUG', VECTOR_STORE: 'Exact' });
        expect(settings.logLevel).toBe('debug');
        expect(settings.vectorStore).toBe('exact');
    });

    it('should fall back to the Ollama URL for embeddings', () => {
        expect(load({ OLLAMA_BASE_URL: 'http://gpu-box:11434' }).embeddingBaseUrl).toBe('http://gpu-box:11434');
        expect(
            load({ OLLAMA_BASE_URL: 'http://gpu-box:11434', EMBEDDING_BASE_URL: 'http://embedder:11434' }).embeddingBaseUrl
        ).toBe('http://embedder:11434');
    });

    it('should treat a blank Qdrant URL as unset', () => {
        expect(load({ QDRANT_URL: '  ' }).qdrantUrl).toBeUndefined();
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
        expect(() => load({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
            'CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)'
        );
    });

    it('should require a Qdrant URL for the remote store', () => {
        expect(() => load({ VECTOR_STORE: 'remote' })).toThrow(ConfigError);
        expect(load({ VECTOR_STORE: 'remote', QDRANT_URL: 'http://qdrant:6333' }).qdrantUrl).toBe('http://qdrant:6333');
    });

    it('should require an API key for the cloud provider', () => {
        expect(() => load({ LLM_PROVIDER: 'cloud' })).toThrow('CLOUD_API_KEY must be set when LLM_PROVIDER=cloud');
        expect(load({ LLM_PROVIDER: 'cloud', CLOUD_API_KEY: 'test-secret' }).cloudApiKey).toBe('test-secret');
    });

    it('should reject malformed values', () => {
        expect(() => load({ PORT: 'eighty' })).toThrow(ConfigError);
        expect(() => load({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
        expect(() => load({ LLM_PROVIDER: 'azure' })).toThrow(ConfigError);
        expect(() => load({ OLLAMA_BASE_URL: 'not a url' })).toThrow(ConfigError);
    });

    it('should name the offending variable', () => {
        expect(() => load({ MAX_TOKENS: '0' })).toThrow(/^Invalid configuration: MAX_TOKENS: /);
    });
});
