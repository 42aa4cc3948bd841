/**
 * Cloud LLM Client
 *
 * Talks to any OpenAI-compatible chat-completion API with bearer auth.
 *
 * Endpoints used:
 * - POST /chat/completions - whole responses, or server-sent events with `stream: true`
 * - GET /models - health check
 *
 * A streamed response is a series of `data: <json>` lines, each carrying the
 * next fragment in `choices[0].delta.content`, and ends with `data: [DONE]`.
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

const logger = createLogger('cloudClient');

export interface CloudClientConfig {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    sampling: SamplingOptions;
}

export const DEFAULT_CLOUD_CONFIG: Omit<CloudClientConfig, 'apiKey'> = {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4',
    timeoutMs: 60000,
    sampling: {
        temperature: 0.2,
        topP: 0.9,
        maxTokens: 512,
    },
};

const completionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
});

const streamChunkSchema = z.object({
    choices: z.array(
        z.object({
            delta: z.object({ content: z.string().nullish() }).optional(),
        })
    ),
});

const STREAM_DONE = '[DONE]';

export class CloudLLMClient implements ILLMClient {
    readonly provider = 'cloud' as const;
    readonly model: string;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private sampling: SamplingOptions;

    constructor(config: Partial<CloudClientConfig> & Pick<CloudClientConfig, 'apiKey'>) {
        const merged = { ...DEFAULT_CLOUD_CONFIG, ...config };
        this.apiKey = merged.apiKey;
        this.baseUrl = merged.baseUrl.replace(/\/+$/, '');
        this.model = merged.model;
        this.timeoutMs = merged.timeoutMs;
        this.sampling = mergeSamplingOptions(DEFAULT_CLOUD_CONFIG.sampling, merged.sampling);

        logger.info(`CloudLLMClient initialised: url=${this.baseUrl} model=${this.model}`);
    }

    getSamplingOptions(): SamplingOptions {
        return { ...this.sampling };
    }

    updateSamplingOptions(update: Partial<SamplingOptions>): SamplingOptions {
        this.sampling = mergeSamplingOptions(this.sampling, update);
        return this.getSamplingOptions();
    }

    async healthCheck(): Promise<boolean> {
        try {
            const { response } = await fetchJson(
                `${this.baseUrl}/models`,
                { method: 'GET', headers: this.headers() },
                this.timeoutMs
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * @throws LLMError if the request fails or the response has no choices
     */
    async generate(prompt: string, systemPrompt: string): Promise<string> {
        try {
            const { response, body } = await fetchJson(
                `${this.baseUrl}/chat/completions`,
                this.requestInit(prompt, systemPrompt, false),
                this.timeoutMs
            );

            if (!response.ok) {
                throw this.errorFromResponse(response, body);
            }

            const parsed = completionSchema.safeParse(body);
            if (!parsed.success) {
                throw new LLMError('Malformed completion response', LLMErrorCode.API_ERROR);
            }
            return (parsed.data.choices[0].message.content ?? '').trim();
        } catch (error) {
            throw toLLMError(error, 'Failed to generate completion', 'the LLM API');
        }
    }

    async *generateStream(prompt: string, systemPrompt: string): AsyncGenerator<string> {
        let done: (() => void) | undefined;

        try {
            const request = await fetchWithTimeout(
                `${this.baseUrl}/chat/completions`,
                this.requestInit(prompt, systemPrompt, true),
                this.timeoutMs
            );
            done = request.done;
            const { response } = request;

            if (!response.ok) {
                const text = await response.text();
                throw this.errorFromResponse(response, parseJsonOrText(text));
            }
            if (!response.body) {
                throw new LLMError('LLM API returned an empty stream', LLMErrorCode.API_ERROR);
            }

            for await (const line of readLines(response.body)) {
                if (!line.startsWith('data:')) {
                    continue;
                }

                const data = line.slice('data:'.length).trim();
                if (data === STREAM_DONE) {
                    break;
                }

                const parsed = streamChunkSchema.safeParse(parseJsonOrText(data));
                const fragment = parsed.success ? parsed.data.choices[0]?.delta?.content : undefined;
                if (fragment) {
                    yield fragment;
                }
            }
        } catch (error) {
            throw toLLMError(error, 'Failed to stream completion', 'the LLM API');
        } finally {
            done?.();
        }
    }

    private headers(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
        };
    }

    private requestInit(prompt: string, systemPrompt: string, stream: boolean): RequestInit {
        const messages = [
            ...(systemPrompt ? [{ role: 'system', content: systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        return {
            method: 'POST',
            headers: this.headers(),
            body: JSON.stringify({
                model: this.model,
                messages,
                temperature: this.sampling.temperature,
                top_p: this.sampling.topP,
                max_tokens: this.sampling.maxTokens,
                stream,
            }),
        };
    }

    private errorFromResponse(response: Response, body: unknown): LLMError {
        const message = describeErrorBody(body, response);
        if (response.status === 404) {
            return new LLMError(
                `Model "${this.model}" not found: ${message}`,
                LLMErrorCode.MODEL_NOT_FOUND
            );
        }
        return new LLMError(`LLM API error: ${message}`, LLMErrorCode.API_ERROR);
    }
}

export function createCloudLLMClient(
    config: Partial<CloudClientConfig> & Pick<CloudClientConfig, 'apiKey'>
): CloudLLMClient {
    return new CloudLLMClient(config);
}
