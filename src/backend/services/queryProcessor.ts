/**
 * Query Processor Service
 *
 * Query validation and prompt assembly for the RAG pipeline.
 *
 * Key responsibilities:
 * - Validate user queries before any embedding or LLM call (reject empty/whitespace)
 * - Join retrieved chunks into a context block
 * - Build the user prompt that confines the model to that context
 */

import { ValidationResult } from '../../shared/types';

/** Separator placed between retrieved chunks in the context block */
export const CONTEXT_SEPARATOR = '\n---\n';

/**
 * Validates a user query before processing.
 *
 * @returns ValidationResult indicating if the query is valid
 */
export function validateQuery(query: string | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs, newlines and Unicode whitespace
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

/**
 * Joins chunk texts, in ranked order, into one context block.
 */
export function buildContextBlock(contexts: string[]): string {
    return contexts.join(CONTEXT_SEPARATOR);
}

/**
 * Builds the user prompt sent alongside the system prompt.
 *
 * Layout:
 * ```
 * <rag instructions>
 * Context:
 * <chunk 1>
 * ---
 * <chunk 2>
 *
 * User question: <query>
 * Answer concisely using only the context.
 * ```
 */
export function buildUserPrompt(ragPrompt: string, query: string, contexts: string[]): string {
    return (
        `${ragPrompt}\n` +
        `Context:\n${buildContextBlock(contexts)}\n\n` +
        `User question: ${query}\n` +
        'Answer concisely using only the context.'
    );
}
