/**
 * Application Settings
 *
 * Settings are read once at startup from environment variables, optionally
 * seeded from a .env file. Every value is validated and coerced by a zod
 * schema so the rest of the backend works with typed, trusted values.
 *
 * Invalid settings throw ConfigError before any service is constructed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

/**
 * Configuration error.
 * Raised at startup; never surfaced per request.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

const optionalString = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().optional()
);

const envBoolean = (defaultValue: boolean) =>
    z
        .enum(['true', 'false', '1', '0', 'yes', 'no'])
        .default(defaultValue ? 'true' : 'false')
        .transform((value) => value === 'true' || value === '1' || value === 'yes');

const settingsSchema = z.object({
    APP_NAME: z.string().default('Nexa Support'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z
        .string()
        .default('info')
        .transform((value) => value.toLowerCase())
        .pipe(z.enum(['debug', 'info', 'warn', 'error'])),

    LLM_PROVIDER: z.enum(['ollama', 'cloud']).default('ollama'),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_MODEL: z.string().min(1).default('mistral'),
    OLLAMA_USE_CHAT_API: envBoolean(true),
    CLOUD_API_KEY: z.string().default(''),
    CLOUD_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    CLOUD_MODEL: z.string().min(1).default('gpt-4'),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    TOP_P: z.coerce.number().min(0).max(1).default(0.9),
    MAX_TOKENS: z.coerce.number().int().positive().default(512),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),

    EMBEDDING_BASE_URL: optionalString.pipe(z.string().url().optional()),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),

    VECTOR_STORE: z
        .string()
        .default('exact')
        .transform((value) => value.toLowerCase()),
    INDEX_PATH: z.string().default('data/index.bin'),
    METADATA_PATH: z.string().default('data/index_meta.json'),
    QDRANT_URL: optionalString,
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: z.string().min(1).default('nexa_support'),

    CHUNK_SIZE: z.coerce.number().int().positive().default(400),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(80),
    TOP_K: z.coerce.number().int().positive().default(4),
    SIMILARITY_THRESHOLD: z.coerce.number().default(0.35),

    SYSTEM_PROMPT_PATH: z.string().default('config/prompts/system.txt'),
    RAG_PROMPT_PATH: z.string().default('config/prompts/rag_addon.txt'),
    DATA_DIR: z.string().default('data'),
});

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

/**
 * Typed application settings.
 */
export interface AppSettings {
    appName: string;
    host: string;
    port: number;
    corsOrigin: string;
    logLevel: LogLevelSetting;

    llmProvider: 'ollama' | 'cloud';
    ollamaBaseUrl: string;
    ollamaModel: string;
    ollamaUseChatApi: boolean;
    cloudApiKey: string;
    cloudBaseUrl: string;
    cloudModel: string;
    temperature: number;
    topP: number;
    maxTokens: number;
    llmTimeoutMs: number;

    embeddingBaseUrl: string;
    embeddingModel: string;
    embeddingDimension: number;
    embeddingBatchSize: number;

    /** Vector store kind; validated by the store factory */
    vectorStore: string;
    indexPath: string;
    metadataPath: string;
    qdrantUrl?: string;
    qdrantApiKey?: string;
    qdrantCollection: string;

    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    similarityThreshold: number;

    systemPromptPath: string;
    ragPromptPath: string;
    dataDir: string;
    historyDir: string;
    uploadDir: string;
}

export interface LoadSettingsOptions {
    /** Path of a .env file to load before reading the environment */
    envPath?: string;
    /** Skip .env loading entirely (tests) */
    skipDotenv?: boolean;
}

/**
 * Loads and validates settings from an environment map.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError when a value is missing, malformed, or inconsistent
 */
export function loadSettings(
    env: NodeJS.ProcessEnv = process.env,
    options: LoadSettingsOptions = {}
): AppSettings {
    if (!options.skipDotenv && env === process.env) {
        loadEnv({ path: options.envPath });
    }

    const parsed = settingsSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const raw = parsed.data;

    if (raw.CHUNK_OVERLAP >= raw.CHUNK_SIZE) {
        throw new ConfigError(
            `CHUNK_OVERLAP (${raw.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${raw.CHUNK_SIZE})`
        );
    }

    if (raw.VECTOR_STORE === 'remote' && !raw.QDRANT_URL) {
        throw new ConfigError('QDRANT_URL must be set when VECTOR_STORE=remote');
    }

    if (raw.LLM_PROVIDER === 'cloud' && !raw.CLOUD_API_KEY) {
        throw new ConfigError('CLOUD_API_KEY must be set when LLM_PROVIDER=cloud');
    }

    return {
        appName: raw.APP_NAME,
        host: raw.HOST,
        port: raw.PORT,
        corsOrigin: raw.CORS_ORIGIN,
        logLevel: raw.LOG_LEVEL,

        llmProvider: raw.LLM_PROVIDER,
        ollamaBaseUrl: raw.OLLAMA_BASE_URL,
        ollamaModel: raw.OLLAMA_MODEL,
        ollamaUseChatApi: raw.OLLAMA_USE_CHAT_API,
        cloudApiKey: raw.CLOUD_API_KEY,
        cloudBaseUrl: raw.CLOUD_BASE_URL,
        cloudModel: raw.CLOUD_MODEL,
        temperature: raw.TEMPERATURE,
        topP: raw.TOP_P,
        maxTokens: raw.MAX_TOKENS,
        llmTimeoutMs: raw.LLM_TIMEOUT_MS,

        embeddingBaseUrl: raw.EMBEDDING_BASE_URL ?? raw.OLLAMA_BASE_URL,
        embeddingModel: raw.EMBEDDING_MODEL,
        embeddingDimension: raw.EMBEDDING_DIMENSION,
        embeddingBatchSize: raw.EMBEDDING_BATCH_SIZE,

        vectorStore: raw.VECTOR_STORE,
        indexPath: raw.INDEX_PATH,
        metadataPath: raw.METADATA_PATH,
        qdrantUrl: raw.QDRANT_URL,
        qdrantApiKey: raw.QDRANT_API_KEY,
        qdrantCollection: raw.QDRANT_COLLECTION,

        chunkSize: raw.CHUNK_SIZE,
        chunkOverlap: raw.CHUNK_OVERLAP,
        topK: raw.TOP_K,
        similarityThreshold: raw.SIMILARITY_THRESHOLD,

        systemPromptPath: raw.SYSTEM_PROMPT_PATH,
        ragPromptPath: raw.RAG_PROMPT_PATH,
        dataDir: raw.DATA_DIR,
        historyDir: path.join(raw.DATA_DIR, 'history'),
        uploadDir: path.join(raw.DATA_DIR, 'uploads'),
    };
}

/**
 * Creates the data directories the services write into.
 */
export function ensureDataDirectories(settings: AppSettings): void {
    const directories = [
        settings.dataDir,
        settings.historyDir,
        settings.uploadDir,
        path.dirname(settings.indexPath),
        path.dirname(settings.metadataPath),
    ];

    for (const directory of directories) {
        if (!fs.existsSync(directory)) {
            fs.mkdirSync(directory, { recursive: true });
        }
    }
}
