/**
 * LLM Client Contract
 *
 * The RAG pipeline talks to a language model only through ILLMClient, so the
 * local Ollama client and the hosted OpenAI-compatible client are
 * interchangeable. This module also holds the HTTP plumbing both share:
 * timeouts, error mapping and line-by-line reading of streamed bodies.
 */

import { LLMProvider, SamplingOptions } from '../../shared/types';

/**
 * Interface defining the LLM client contract.
 */
export interface ILLMClient {
    readonly provider: LLMProvider;
    readonly model: string;

    /** Whole-response generation. */
    generate(prompt: string, systemPrompt: string): Promise<string>;

    /** Text fragments in order, ending when the provider reports completion. */
    generateStream(prompt: string, systemPrompt: string): AsyncIterable<string>;

    /** Liveness probe; never throws. */
    healthCheck(): Promise<boolean>;

    getSamplingOptions(): SamplingOptions;

    updateSamplingOptions(update: Partial<SamplingOptions>): SamplingOptions;
}

/**
 * Error codes for LLM failures.
 */
export enum LLMErrorCode {
    /** The service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** The service returned an error response */
    API_ERROR = 'API_ERROR',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

export class LLMError extends Error {
    constructor(
        message: string,
        public readonly code: LLMErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'LLMError';
    }
}

/**
 * Raised by fetchWithTimeout when the abort timer fires.
 * Each client converts it into its own error type.
 */
export class RequestTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

/**
 * Fetch with a timeout.
 *
 * The timer covers the whole exchange, body included, so a stream that stalls
 * is cut off as well. The returned `done` callback must be called once the
 * body has been consumed.
 */
export async function fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeoutMs: number
): Promise<{ response: Response; done: () => void }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const done = () => clearTimeout(timeoutId);

    try {
        const response = await fetch(url, {
            ...options,
            signal: controller.signal,
        });
        return { response, done };
    } catch (error) {
        done();
        if (error instanceof Error && error.name === 'AbortError') {
            throw new RequestTimeoutError(timeoutMs);
        }
        throw error;
    }
}

/**
 * Fetch with a timeout for requests whose body is read right away.
 */
export async function fetchJson(
    url: string,
    options: RequestInit,
    timeoutMs: number
): Promise<{ response: Response; body: unknown }> {
    const { response, done } = await fetchWithTimeout(url, options, timeoutMs);
    try {
        const text = await response.text();
        return { response, body: parseJsonOrText(text) };
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new RequestTimeoutError(timeoutMs);
        }
        throw error;
    } finally {
        done();
    }
}

/**
 * Parses JSON, falling back to the raw text (empty text reads as null).
 */
export function parseJsonOrText(text: string): unknown {
    if (text.trim() === '') {
        return null;
    }
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Yields the body of a streamed response one line at a time (without the
 * line terminator). A trailing line with no newline is yielded as well.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffered = '';

    try {
        while (true) {
            const { value, done } = await reader.read();
            if (done) {
                break;
            }
            buffered += decoder.decode(value, { stream: true });

            let newline = buffered.indexOf('\n');
            while (newline !== -1) {
                yield buffered.slice(0, newline).replace(/\r$/, '');
                buffered = buffered.slice(newline + 1);
                newline = buffered.indexOf('\n');
            }
        }

        buffered += decoder.decode();
        if (buffered.length > 0) {
            yield buffered.replace(/\r$/, '');
        }
    } finally {
        // Releasing on early exit lets the connection close when a consumer stops iterating.
        await reader.cancel().catch(() => undefined);
        reader.releaseLock();
    }
}

/**
 * Pulls a readable message out of an error response body.
 */
export function describeErrorBody(body: unknown, response: Response): string {
    if (typeof body === 'string' && body.trim() !== '') {
        return body.trim();
    }
    if (typeof body === 'object' && body !== null && 'error' in body) {
        const error = body.error;
        if (typeof error === 'string') {
            return error;
        }
        if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
            return error.message;
        }
    }
    return `HTTP ${response.status}: ${response.statusText}`;
}

/**
 * Maps any failure from a request into an LLMError.
 */
export function toLLMError(error: unknown, context: string, serviceName: string): LLMError {
    if (error instanceof LLMError) {
        return error;
    }

    if (error instanceof RequestTimeoutError) {
        return new LLMError(error.message, LLMErrorCode.TIMEOUT, error);
    }

    // A stalled stream body is aborted by the same timer
    if (error instanceof Error && error.name === 'AbortError') {
        return new LLMError('Stream timed out', LLMErrorCode.TIMEOUT, error);
    }

    // Node's fetch reports refused connections as TypeError('fetch failed')
    if (error instanceof TypeError && error.message.includes('fetch')) {
        return new LLMError(
            `Cannot connect to ${serviceName}. Please ensure it is running and reachable`,
            LLMErrorCode.CONNECTION_REFUSED,
            error
        );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new LLMError(
        `${context}: ${message}`,
        LLMErrorCode.UNKNOWN,
        error instanceof Error ? error : undefined
    );
}

/**
 * Checks sampling values and merges them over the current ones.
 */
export function mergeSamplingOptions(
    current: SamplingOptions,
    update: Partial<SamplingOptions>
): SamplingOptions {
    const next = { ...current, ...update };

    if (!(next.temperature >= 0 && next.temperature <= 2)) {
        throw new RangeError(`temperature must be between 0 and 2, got ${next.temperature}`);
    }
    if (!(next.topP >= 0 && next.topP <= 1)) {
        throw new RangeError(`topP must be between 0 and 1, got ${next.topP}`);
    }
    if (!Number.isInteger(next.maxTokens) || next.maxTokens < 1) {
        throw new RangeError(`maxTokens must be a positive integer, got ${next.maxTokens}`);
    }

    return next;
}
