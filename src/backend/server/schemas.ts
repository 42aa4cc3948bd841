/**
 * Request body schemas for the HTTP API.
 */

import { z } from 'zod';

export const chatRequestSchema = z.object({
    message: z.string().min(1, 'message is required'),
    sessionId: z.string().optional(),
});

export const ingestRequestSchema = z.object({
    paths: z.array(z.string().min(1)).min(1, 'at least one path is required'),
    tags: z.array(z.string()).optional(),
    version: z.string().nullish(),
});

/** Multipart fields sent alongside uploaded files */
export const uploadFieldsSchema = z.object({
    tags: z.string().optional(),
    version: z.string().optional(),
});

export const switchModelSchema = z.object({
    model: z.string().trim().min(1, 'model is required'),
});

const historyMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    sources: z.array(z.string()).optional(),
});

export const sessionSaveSchema = z.object({
    id: z.string().optional(),
    title: z.string().optional(),
    messages: z.array(historyMessageSchema).default([]),
    documents: z.array(z.string()).default([]),
});

export const promptsUpdateSchema = z.object({
    systemPrompt: z.string().optional(),
    ragPrompt: z.string().optional(),
});

export const llmSettingsUpdateSchema = z
    .object({
        temperature: z.number().min(0).max(2),
        topP: z.number().min(0).max(1),
        maxTokens: z.number().int().positive(),
        chunkSize: z.number().int().positive(),
        chunkOverlap: z.number().int().min(0),
        topK: z.number().int().positive(),
        similarityThreshold: z.number(),
    })
    .partial();

/**
 * Splits a comma separated tag field, dropping blanks.
 * Returns undefined when no tags remain.
 */
export function parseTagList(raw: string | undefined): string[] | undefined {
    if (!raw) {
        return undefined;
    }
    const tags = raw
        .split(',')
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0);
    return tags.length > 0 ? tags : undefined;
}
