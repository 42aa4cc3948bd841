/**
 * Ollama Client
 *
 * Wrapper for communicating with a local Ollama instance.
 * Ollama provides local LLM inference without external API calls.
 *
 * Ollama API endpoints used:
 * - POST /api/chat - Chat completion with system/user roles (default)
 * - POST /api/generate - Legacy raw-prompt completion
 * - GET /api/tags - List available models (also the health check)
 * - POST /api/show - Model details
 *
 * With `stream: true` both completion endpoints answer with newline-delimited
 * JSON objects; the last one carries `done: true`.
 */

import { z } from 'zod';
import { SamplingOptions } from '../../shared/types';
import { createLogger } from '../utils/logger';
import {
    ILLMClient,
    LLMError,
    LLMErrorCode,
    describeErrorBody,
    fetchJson,
    fetchWithTimeout,
    mergeSamplingOptions,
    parseJsonOrText,
    readLines,
    toLLMError,
} from './llmClient';

const logger = createLogger('ollamaClient');

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    model: string;
    /** Use /api/chat; false falls back to /api/generate */
    useChatApi: boolean;
    /** Request timeout in milliseconds */
    timeoutMs: number;
    sampling: SamplingOptions;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    model: 'mistral',
    useChatApi: true,
    timeoutMs: 120000,
    sampling: {
        temperature: 0.2,
        topP: 0.9,
        maxTokens: 512,
    },
};

/** Health checks should answer quickly even when generation timeouts are long */
const HEALTH_CHECK_TIMEOUT_MS = 5000;

const chatChunkSchema = z.object({
    message: z.object({ content: z.string().default('') }).partial().optional(),
    done: z.boolean().default(false),
});

const generateChunkSchema = z.object({
    response: z.string().default(''),
    done: z.boolean().default(false),
});

const ollamaModelSchema = z
    .object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
    })
    .passthrough();

const tagsResponseSchema = z.object({
    models: z.array(ollamaModelSchema).default([]),
});

export type OllamaModel = z.infer<typeof ollamaModelSchema>;

/**
 * Model management available on a local Ollama server.
 */
export interface IModelManager {
    readonly baseUrl: string;
    readonly model: string;
    healthCheck(): Promise<boolean>;
    listModels(): Promise<OllamaModel[]>;
    modelInfo(modelName?: string): Promise<Record<string, unknown>>;
    setModel(model: string): string;
}

/**
 * Ollama Client Implementation
 */
export class OllamaClient implements ILLMClient, IModelManager {
    readonly provider = 'ollama' as const;
    readonly baseUrl: string;
    private readonly useChatApi: boolean;
    private readonly timeoutMs: number;
    private currentModel: string;
    private sampling: SamplingOptions;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        const merged = { ...DEFAULT_OLLAMA_CONFIG, ...config };
        this.baseUrl = merged.baseUrl.replace(/\/+$/, '');
        this.currentModel = merged.model;
        this.useChatApi = merged.useChatApi;
        this.timeoutMs = merged.timeoutMs;
        this.sampling = mergeSamplingOptions(DEFAULT_OLLAMA_CONFIG.sampling, merged.sampling);

        logger.info(
            `OllamaClient initialised: url=${this.baseUrl} model=${this.currentModel} chat_api=${this.useChatApi}`
        );
    }

    get model(): string {
        return this.currentModel;
    }

    /**
     * Switches the model used for subsequent requests.
     *
     * @returns the previous model
     */
    setModel(model: string): string {
        const previous = this.currentModel;
        this.currentModel = model;
        logger.info(`Model switched: ${previous} -> ${model}`);
        return previous;
    }

    getSamplingOptions(): SamplingOptions {
        return { ...this.sampling };
    }

    updateSamplingOptions(update: Partial<SamplingOptions>): SamplingOptions {
        this.sampling = mergeSamplingOptions(this.sampling, update);
        return this.getSamplingOptions();
    }

    /**
     * Check if Ollama is available and responding.
     * Uses /api/tags because it's lightweight.
     */
    async healthCheck(): Promise<boolean> {
        try {
            const { response } = await fetchJson(
                `${this.baseUrl}/api/tags`,
                { method: 'GET' },
                HEALTH_CHECK_TIMEOUT_MS
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Generate a whole response. Output is trimmed.
     *
     * @throws LLMError if generation fails
     */
    async generate(prompt: string, systemPrompt: string): Promise<string> {
        const model = this.currentModel;

        try {
            const { response, body } = await fetchJson(
                this.endpoint(),
                this.requestInit(prompt, systemPrompt, false),
                this.timeoutMs
            );

            if (!response.ok) {
                throw this.errorFromResponse(response, body, model);
            }

            return this.contentOf(body).trim();
        } catch (error) {
            throw toLLMError(error, 'Failed to generate completion', 'Ollama');
        }
    }

    /**
     * Stream a response, one fragment per NDJSON line.
     *
     * @throws LLMError if the request fails or Ollama reports an error mid-stream
     */
    async *generateStream(prompt: string, systemPrompt: string): AsyncGenerator<string> {
        const model = this.currentModel;
        let done: (() => void) | undefined;

        try {
            const request = await fetchWithTimeout(
                this.endpoint(),
                this.requestInit(prompt, systemPrompt, true),
                this.timeoutMs
            );
            done = request.done;
            const { response } = request;

            if (!response.ok) {
                const text = await response.text();
                throw this.errorFromResponse(response, parseJsonOrText(text), model);
            }
            if (!response.body) {
                throw new LLMError('Ollama returned an empty stream', LLMErrorCode.API_ERROR);
            }

            for await (const line of readLines(response.body)) {
                if (line.trim() === '') {
                    continue;
                }

                const parsed = parseJsonOrText(line);
                const streamError = z.object({ error: z.string() }).safeParse(parsed);
                if (streamError.success) {
                    throw new LLMError(`Ollama API error: ${streamError.data.error}`, LLMErrorCode.API_ERROR);
                }

                const fragment = this.contentOf(parsed);
                if (fragment) {
                    yield fragment;
                }
                if (this.isDone(parsed)) {
                    break;
                }
            }
        } catch (error) {
            throw toLLMError(error, 'Failed to stream completion', 'Ollama');
        } finally {
            done?.();
        }
    }

    /**
     * Models installed on the Ollama server.
     * Returns an empty list when the server is unreachable.
     */
    async listModels(): Promise<OllamaModel[]> {
        try {
            const { response, body } = await fetchJson(
                `${this.baseUrl}/api/tags`,
                { method: 'GET' },
                HEALTH_CHECK_TIMEOUT_MS
            );
            if (!response.ok) {
                throw new Error(describeErrorBody(body, response));
            }
            return tagsResponseSchema.parse(body).models;
        } catch (error) {
            logger.warn('Failed to list Ollama models', error);
            return [];
        }
    }

    /**
     * Details for a model (defaults to the current one) via /api/show.
     * Returns an empty object on failure.
     */
    async modelInfo(modelName?: string): Promise<Record<string, unknown>> {
        const name = modelName || this.currentModel;
        try {
            const { response, body } = await fetchJson(
                `${this.baseUrl}/api/show`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({ name }),
                },
                this.timeoutMs
            );
            if (!response.ok) {
                throw new Error(describeErrorBody(body, response));
            }
            return z.record(z.unknown()).parse(body);
        } catch (error) {
            logger.warn(`Failed to fetch model info for '${name}'`, error);
            return {};
        }
    }

    private endpoint(): string {
        return `${this.baseUrl}${this.useChatApi ? '/api/chat' : '/api/generate'}`;
    }

    private requestInit(prompt: string, systemPrompt: string, stream: boolean): RequestInit {
        const options = {
            temperature: this.sampling.temperature,
            top_p: this.sampling.topP,
            num_predict: this.sampling.maxTokens,
        };

        const payload: Record<string, unknown> = this.useChatApi
            ? {
                  model: this.currentModel,
                  messages: [
                      ...(systemPrompt ? [{ role: 'system', content: systemPrompt }] : []),
                      { role: 'user', content: prompt },
                  ],
                  stream,
                  options,
              }
            : {
                  model: this.currentModel,
                  prompt,
                  stream,
                  options,
                  ...(systemPrompt ? { system: systemPrompt } : {}),
              };

        return {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(payload),
        };
    }

    private contentOf(body: unknown): string {
        if (this.useChatApi) {
            const parsed = chatChunkSchema.safeParse(body);
            return parsed.success ? parsed.data.message?.content ?? '' : '';
        }
        const parsed = generateChunkSchema.safeParse(body);
        return parsed.success ? parsed.data.response : '';
    }

    private isDone(body: unknown): boolean {
        const parsed = z.object({ done: z.boolean() }).safeParse(body);
        return parsed.success && parsed.data.done;
    }

    /**
     * Different status codes indicate different problems:
     * - 404: Model not found (user needs to pull it)
     * - Others: Various API errors
     */
    private errorFromResponse(response: Response, body: unknown, model: string): LLMError {
        const errorMessage = describeErrorBody(body, response);

        if (response.status === 404 || errorMessage.includes('not found')) {
            return new LLMError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                LLMErrorCode.MODEL_NOT_FOUND
            );
        }

        return new LLMError(`Ollama API error: ${errorMessage}`, LLMErrorCode.API_ERROR);
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
