/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the Nexa Support backend.
 * It exposes REST endpoints for:
 * - Health checks (LLM connectivity)
 * - Chat, plain and streamed as server-sent events
 * - Ingestion of server-side paths and uploaded files
 * - Session history, prompts, uploads and index maintenance
 * - Runtime LLM, retrieval and chunking settings
 *
 * ARCHITECTURE NOTES:
 * - Routes only translate HTTP to service calls; every service comes from
 *   the ServiceContainer
 * - Request bodies are validated with zod schemas (./schemas)
 * - Errors flow to one error middleware that maps them to status codes
 */

import * as fs from 'fs';
import { Server } from 'http';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { ZodError } from 'zod';
import {
    ChatResponse,
    HealthResponse,
    IndexStatsResponse,
    IngestResponse,
    RAGStreamEvent,
    UploadResponse,
} from '../../shared/types';
import { EmbeddingError } from '../clients/embeddingClient';
import { LLMError } from '../clients/llmClient';
import { IModelManager } from '../clients/ollamaClient';
import { ServiceContainer } from '../container';
import { ChunkingError } from '../services/documentChunker';
import { DocumentLoadError, UnsupportedFormatError } from '../services/documentLoader';
import { ExactVectorStore } from '../services/exactVectorStore';
import { validateQuery } from '../services/queryProcessor';
import { RAGPipelineError } from '../services/ragPipeline';
import { MAX_UPLOAD_BYTES, UploadTooLargeError } from '../services/uploadStore';
import { VectorStoreError, VectorStoreErrorCode } from '../services/vectorStore';
import { createLogger } from '../utils/logger';
import {
    chatRequestSchema,
    ingestRequestSchema,
    llmSettingsUpdateSchema,
    parseTagList,
    promptsUpdateSchema,
    sessionSaveSchema,
    switchModelSchema,
    uploadFieldsSchema,
} from './schemas';

const logger = createLogger('server');

export const API_VERSION = '2.0.0';

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

/**
 * Status code and body for an error that reached the error middleware.
 */
export function toErrorResponse(err: unknown): { status: number; error: string; code: string } {
    if (err instanceof ApiError) {
        return { status: err.statusCode, error: err.message, code: err.code ?? 'API_ERROR' };
    }
    if (err instanceof ZodError) {
        const details = err.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        return { status: 400, error: details, code: 'VALIDATION_ERROR' };
    }
    if (err instanceof RAGPipelineError) {
        return { status: 400, error: err.message, code: err.code };
    }
    if (err instanceof UnsupportedFormatError) {
        return { status: 400, error: err.message, code: 'UNSUPPORTED_FORMAT' };
    }
    if (err instanceof DocumentLoadError) {
        return { status: 400, error: err.message, code: 'INVALID_DOCUMENT' };
    }
    if (err instanceof UploadTooLargeError) {
        return { status: 400, error: err.message, code: 'FILE_TOO_LARGE' };
    }
    if (err instanceof multer.MulterError) {
        return { status: 400, error: err.message, code: err.code };
    }
    if (err instanceof ChunkingError) {
        return { status: 400, error: err.message, code: 'INVALID_CHUNKING' };
    }
    if (err instanceof RangeError) {
        return { status: 400, error: err.message, code: 'INVALID_SETTING' };
    }
    if (err instanceof VectorStoreError) {
        if (err.code === VectorStoreErrorCode.LENGTH_MISMATCH) {
            return { status: 400, error: err.message, code: err.code };
        }
        if (err.code === VectorStoreErrorCode.REMOTE_ERROR) {
            return { status: 502, error: err.message, code: err.code };
        }
    }
    if (err instanceof LLMError || err instanceof EmbeddingError) {
        return { status: 502, error: err.message, code: err.code };
    }
    // Don't leak internal details
    return { status: 500, error: 'Internal server error', code: 'INTERNAL_ERROR' };
}

/**
 * Writes one server-sent event frame.
 */
function writeEvent(res: Response, event: RAGStreamEvent | { type: 'error'; data: string }): void {
    res.write(`event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`);
}

/**
 * Creates and configures the Express application.
 *
 * Creating the app is separate from listening so tests can drive it with
 * supertest.
 */
export function createApp(container: ServiceContainer): Express {
    const { settings } = container;
    const app = express();

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: settings.corsOrigin,
            methods: ['GET', 'POST', 'PUT', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '10mb' }));

    // Uploads are held in memory and written by the upload store
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: MAX_UPLOAD_BYTES,
        },
    });

    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`${req.method} ${req.path}`);
        next();
    });

    app.get('/', (_req: Request, res: Response) => {
        res.json({ message: `${settings.appName} service is running`, version: API_VERSION });
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * Always 200; an unreachable LLM reports status "degraded".
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        let llmConnected = false;
        try {
            llmConnected = await container.llm.healthCheck();
        } catch (error) {
            logger.warn('Health check failed', error);
        }

        const response: HealthResponse = {
            status: llmConnected ? 'ok' : 'degraded',
            llmConnected,
            detail: llmConnected ? 'All systems operational' : 'LLM service unreachable',
        };
        logger.info(`Health check: status=${response.status} llm=${llmConnected}`);
        res.json(response);
    });

    // =========================================================================
    // Chat Endpoints
    // =========================================================================

    /**
     * POST /api/chat
     *
     * Answers from the knowledge base, or with the refusal message when
     * nothing relevant is indexed.
     */
    app.post('/api/chat', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { message } = chatRequestSchema.parse(req.body);
            const result = await container.pipeline.generate(message.trim());

            const response: ChatResponse = { answer: result.answer, sources: result.sources };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/chat/stream
     *
     * Server-sent events, one frame per pipeline event. Once the stream has
     * started, a failure is reported as an `error` frame and the stream ends.
     */
    app.post('/api/chat/stream', async (req: Request, res: Response, next: NextFunction) => {
        let message: string;
        try {
            message = chatRequestSchema.parse(req.body).message.trim();
            const validation = validateQuery(message);
            if (!validation.valid) {
                throw new ApiError(validation.error ?? 'Invalid query', 400, 'INVALID_QUERY');
            }
        } catch (error) {
            next(error);
            return;
        }

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        let clientGone = false;
        res.on('close', () => {
            if (!res.writableEnded) {
                clientGone = true;
                logger.info('Stream client disconnected');
            }
        });

        try {
            // Leaving the loop early closes the generator and the LLM stream
            for await (const event of container.pipeline.generateStream(message)) {
                if (clientGone) {
                    break;
                }
                writeEvent(res, event);
            }
        } catch (error) {
            logger.error('Stream failed', error);
            if (!clientGone) {
                writeEvent(res, { type: 'error', data: toErrorResponse(error).error });
            }
        }
        res.end();
    });

    // =========================================================================
    // Ingestion Endpoints
    // =========================================================================

    /**
     * POST /api/ingest
     *
     * Ingests files and directories that already exist on the server.
     */
    app.post('/api/ingest', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = ingestRequestSchema.parse(req.body);
            const chunksIndexed = await container.ingestion.ingest(body.paths, {
                tags: body.tags,
                version: body.version,
            });

            const response: IngestResponse = { chunksIndexed };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/upload
     *
     * Multipart upload (`files`), saved to the upload directory and then
     * ingested. Optional `tags` is a comma separated list.
     */
    app.post(
        '/api/upload',
        upload.array('files'),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const files = Array.isArray(req.files) ? req.files : [];
                if (files.length === 0) {
                    throw new ApiError('No files uploaded', 400, 'MISSING_FILE');
                }
                const fields = uploadFieldsSchema.parse(req.body ?? {});

                const saved = await container.uploads.saveFiles(
                    files.map((file) => ({ originalName: file.originalname, content: file.buffer }))
                );

                const version = fields.version?.trim();
                const chunksIndexed = await container.ingestion.ingest(
                    saved.map((file) => file.savedPath),
                    { tags: parseTagList(fields.tags), version: version ? version : null }
                );

                const response: UploadResponse = { files: saved, chunksIndexed };
                res.json(response);
            } catch (error) {
                next(error);
            }
        }
    );

    // =========================================================================
    // Configuration Endpoints
    // =========================================================================

    app.get('/api/config', (_req: Request, res: Response) => {
        res.json({
            llmProvider: container.llm.provider,
            model: container.llm.model,
            vectorStore: container.vectorStore.kind,
            embeddingModel: settings.embeddingModel,
            embeddingDimension: container.embedder.dimension,
        });
    });

    app.get('/api/settings/llm', (_req: Request, res: Response) => {
        res.json(container.getRuntimeSettings());
    });

    app.put('/api/settings/llm', (req: Request, res: Response, next: NextFunction) => {
        try {
            const update = llmSettingsUpdateSchema.parse(req.body);
            res.json(container.updateRuntimeSettings(update));
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/prompts', (_req: Request, res: Response) => {
        res.json(container.prompts.getPrompts());
    });

    app.put('/api/prompts', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const update = promptsUpdateSchema.parse(req.body);
            res.json(await container.prompts.updatePrompts(update));
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Ollama Endpoints
    // =========================================================================

    // Only available when the active provider is Ollama
    const modelManager = (): IModelManager => {
        if (!container.modelManager) {
            throw new ApiError('Not using the Ollama provider', 400, 'NOT_OLLAMA');
        }
        return container.modelManager;
    };

    app.get('/api/ollama/models', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const manager = modelManager();
            res.json({ models: await manager.listModels(), current: manager.model });
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/ollama/status', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const manager = modelManager();
            const connected = await manager.healthCheck();
            res.json({
                connected,
                baseUrl: manager.baseUrl,
                model: manager.model,
                modelInfo: connected ? await manager.modelInfo() : {},
            });
        } catch (error) {
            next(error);
        }
    });

    app.put('/api/ollama/model', (req: Request, res: Response, next: NextFunction) => {
        try {
            const manager = modelManager();
            const { model } = switchModelSchema.parse(req.body);
            const previous = manager.setModel(model);
            logger.info(`Switched Ollama model: ${previous} -> ${model}`);
            res.json({ previous, current: model });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    app.get('/api/sessions', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json({ sessions: await container.sessions.listSessions() });
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = await container.sessions.getSession(req.params.id);
            if (!session) {
                throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
            }
            res.json(session);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/sessions
     *
     * Creates the session, or replaces it when the body carries a known id.
     */
    app.post('/api/sessions', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const input = sessionSaveSchema.parse(req.body);
            res.json(await container.sessions.saveSession(input));
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/sessions', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const deleted = await container.sessions.clearSessions();
            res.json({ deleted });
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const deleted = await container.sessions.deleteSession(req.params.id);
            if (!deleted) {
                throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
            }
            res.json({ deleted: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Upload and Index Maintenance Endpoints
    // =========================================================================

    app.get('/api/uploads', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json({ files: await container.uploads.listFiles() });
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/uploads/:filename', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const file = await container.uploads.deleteFile(req.params.filename);
            if (!file) {
                throw new ApiError('File not found', 404, 'FILE_NOT_FOUND');
            }
            res.json({ deleted: true, file });
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/index/stats', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const store = container.vectorStore;
            const response: IndexStatsResponse = {
                kind: store.kind,
                totalVectors: await store.count(),
                indexPath: null,
                metadataPath: null,
                indexSizeBytes: 0,
                metadataSizeBytes: 0,
            };

            if (store instanceof ExactVectorStore) {
                response.indexPath = store.getIndexPath();
                response.metadataPath = store.getMetadataPath();
                response.indexSizeBytes = await fileSize(response.indexPath);
                response.metadataSizeBytes = await fileSize(response.metadataPath);
            }

            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    app.post('/api/index/clear', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            await container.vectorStore.clear();
            logger.info('Vector index cleared');
            res.json({ cleared: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const { status, error, code } = toErrorResponse(err);
        if (status >= 500) {
            logger.error('Request failed', err);
        } else {
            logger.warn(`Request rejected (${status}): ${error}`);
        }
        res.status(status).json({ error, code });
    });

    return app;
}

/**
 * Size in bytes, or 0 when the file does not exist yet.
 */
async function fileSize(filePath: string): Promise<number> {
    try {
        return (await fs.promises.stat(filePath)).size;
    } catch {
        return 0;
    }
}

/**
 * Starts the Express server.
 *
 * @returns Promise that resolves with the listening server
 */
export function startServer(app: Express, host: string, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host, () => {
            logger.info(`Server running on http://${host}:${port}`);
            logger.info(`Health check: http://${host}:${port}/api/health`);
            resolve(server);
        });
        server.on('error', reject);
    });
}
