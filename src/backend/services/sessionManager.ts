/**
 * Session Manager Service
 *
 * Saves chat history with file-based JSON persistence: one file per session
 * in the history directory.
 *
 * Key responsibilities:
 * - Create or update a session from the client's copy (upsert)
 * - Retrieve a session by ID
 * - List session summaries, most recently updated first
 * - Delete a session together with the documents uploaded during it
 *
 * Trade-offs:
 * - Not suitable for high concurrency (no locking)
 * - Listing reads every file
 * - A corrupt file is skipped rather than failing the listing
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
    SessionDetail,
    SessionInput,
    SessionSummary,
} from '../../shared/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('sessionManager');

/**
 * Configuration options for the SessionManager.
 */
export interface SessionManagerConfig {
    /** Directory path where session files are stored */
    storagePath: string;
    /**
     * Directory that uploaded documents live in. When set, deleting a session
     * only removes its documents that lie inside this directory.
     */
    uploadDir?: string;
    /** Clock used for timestamps */
    now: () => Date;
}

const DEFAULT_STORAGE_PATH = path.join('data', 'history');

const DEFAULT_TITLE = 'New Conversation';
const TITLE_MAX_LENGTH = 50;

const historyMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    sources: z.array(z.string()).optional(),
});

const storedSessionSchema = z.object({
    id: z.string(),
    title: z.string().default('Untitled'),
    messages: z.array(historyMessageSchema).default([]),
    documents: z.array(z.string()).default([]),
    createdAt: z.string().default(''),
    updatedAt: z.string().default(''),
});

/**
 * SessionManager class implementing CRUD operations for saved sessions.
 *
 * Design Pattern: Repository Pattern
 * - Encapsulates data access logic
 * - Abstracts the storage mechanism (could swap to database later)
 */
export class SessionManager {
    private readonly storagePath: string;
    private readonly uploadDir?: string;
    private readonly now: () => Date;

    constructor(config?: Partial<SessionManagerConfig>) {
        this.storagePath = config?.storagePath || DEFAULT_STORAGE_PATH;
        this.uploadDir = config?.uploadDir;
        this.now = config?.now ?? (() => new Date());
        this.ensureStorageDirectory();
    }

    private ensureStorageDirectory(): void {
        if (!fs.existsSync(this.storagePath)) {
            fs.mkdirSync(this.storagePath, { recursive: true });
        }
    }

    /**
     * Each session is stored in its own JSON file. Characters that are not
     * safe in a file name are replaced with underscores.
     */
    private getSessionFilePath(sessionId: string): string {
        const safeId = sessionId.replace(/[^A-Za-z0-9._-]/g, '_');
        return path.join(this.storagePath, `${safeId}.json`);
    }

    /**
     * Creates or updates a session.
     *
     * An update keeps the original createdAt and bumps updatedAt. A missing id
     * gets a fresh UUID; a missing or blank title is generated from the first
     * user message.
     */
    async saveSession(input: SessionInput): Promise<SessionDetail> {
        const id = input.id?.trim() || uuidv4();
        const filePath = this.getSessionFilePath(id);
        const now = this.now().toISOString();

        const existing = await this.readSessionFile(filePath);
        const title = input.title?.trim() || this.generateTitle(input);

        const session: SessionDetail = {
            id,
            title,
            messages: input.messages,
            documents: input.documents,
            createdAt: existing?.createdAt || now,
            updatedAt: now,
        };

        // Write to a temp file first, then rename for atomicity
        const tempPath = `${filePath}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify(session, null, 2), 'utf-8');
        await fs.promises.rename(tempPath, filePath);

        logger.info(`Saved session ${id} (${session.messages.length} messages)`);
        return session;
    }

    /**
     * @returns The session if found and readable, null otherwise
     */
    async getSession(id: string): Promise<SessionDetail | null> {
        const filePath = this.getSessionFilePath(id);
        try {
            return await this.readSessionFile(filePath);
        } catch (error) {
            // Corrupted files shouldn't crash the app
            logger.error(`Failed to read session ${id}`, error);
            return null;
        }
    }

    /**
     * Lists sessions, most recently updated first.
     */
    async listSessions(): Promise<SessionSummary[]> {
        if (!fs.existsSync(this.storagePath)) {
            return [];
        }

        const files = (await fs.promises.readdir(this.storagePath)).filter((file) =>
            file.endsWith('.json')
        );
        const summaries: SessionSummary[] = [];

        for (const file of files) {
            const filePath = path.join(this.storagePath, file);
            try {
                const session = await this.readSessionFile(filePath);
                if (session) {
                    summaries.push({
                        id: session.id,
                        title: session.title,
                        messageCount: session.messages.length,
                        documentCount: session.documents.length,
                        createdAt: session.createdAt,
                        updatedAt: session.updatedAt,
                    });
                }
            } catch (error) {
                logger.warn(`Skipping corrupt session file ${filePath}`, error);
            }
        }

        // ISO timestamps sort lexicographically
        summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
        return summaries;
    }

    /**
     * Deletes a session and the uploaded documents it lists.
     *
     * @returns true if deleted, false if the session didn't exist
     */
    async deleteSession(id: string): Promise<boolean> {
        const filePath = this.getSessionFilePath(id);
        if (!fs.existsSync(filePath)) {
            return false;
        }

        try {
            const session = await this.readSessionFile(filePath);
            for (const documentPath of session?.documents ?? []) {
                await this.deleteDocument(documentPath);
            }
        } catch (error) {
            logger.warn(`Error cleaning up documents for session ${id}`, error);
        }

        await fs.promises.unlink(filePath);
        logger.info(`Deleted session ${id}`);
        return true;
    }

    /**
     * Deletes every listed session.
     *
     * @returns number of sessions deleted
     */
    async clearSessions(): Promise<number> {
        let deleted = 0;
        for (const summary of await this.listSessions()) {
            if (await this.deleteSession(summary.id)) {
                deleted++;
            }
        }
        return deleted;
    }

    getStoragePath(): string {
        return this.storagePath;
    }

    /**
     * @returns null when the file does not exist
     * @throws when the file exists but is not a valid session
     */
    private async readSessionFile(filePath: string): Promise<SessionDetail | null> {
        let content: string;
        try {
            content = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw error;
        }
        return storedSessionSchema.parse(JSON.parse(content));
    }

    private async deleteDocument(documentPath: string): Promise<void> {
        const resolved = path.resolve(documentPath);
        if (this.uploadDir && !isInside(resolved, path.resolve(this.uploadDir))) {
            logger.warn(`Not deleting document outside the upload directory: ${documentPath}`);
            return;
        }

        const stats = await fs.promises.stat(resolved).catch(() => null);
        if (stats?.isFile()) {
            await fs.promises.unlink(resolved);
            logger.info(`Deleted associated document: ${documentPath}`);
        }
    }

    /**
     * Takes the first user message, truncated to ~50 characters at a word
     * boundary if possible.
     */
    private generateTitle(input: SessionInput): string {
        const firstUserMessage = input.messages.find((message) => message.role === 'user');
        const trimmed = firstUserMessage?.content.trim() ?? '';

        if (trimmed.length === 0) {
            return DEFAULT_TITLE;
        }
        if (trimmed.length <= TITLE_MAX_LENGTH) {
            return trimmed;
        }

        const truncated = trimmed.substring(0, TITLE_MAX_LENGTH);
        const lastSpace = truncated.lastIndexOf(' ');

        if (lastSpace > TITLE_MAX_LENGTH / 2) {
            return truncated.substring(0, lastSpace) + '...';
        }

        return truncated + '...';
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isInside(candidate: string, directory: string): boolean {
    const relative = path.relative(directory, candidate);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export function createSessionManager(
    config?: Partial<SessionManagerConfig>
): SessionManager {
    return new SessionManager(config);
}
