/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: Retrieval core (chunking, loading, vector stores, ingestion,
 *   the RAG pipeline) and file-backed stores (sessions, prompts, uploads)
 * - clients/: LLM and embedding clients
 * - config/: Settings read from the environment
 * - container.ts: Builds every service once at startup
 *
 * When run directly, this file starts the server.
 * When imported, it exports the factory functions.
 */

import { createServiceContainer } from './container';
import { ensureDataDirectories, loadSettings } from './config/settings';
import { createApp, startServer } from './server';
import { createLogger, setLogLevel } from './utils/logger';

export { createApp, startServer, toErrorResponse, ApiError, API_VERSION } from './server';
export { ServiceContainer, createServiceContainer } from './container';
export type { RuntimeSettings, ServiceOverrides } from './container';
export { loadSettings, ensureDataDirectories, ConfigError } from './config/settings';
export type { AppSettings, LoadSettingsOptions } from './config/settings';

export * from './services';
export * from './clients';

const logger = createLogger('main');

/**
 * Loads settings, builds the services and starts listening.
 */
export async function main(): Promise<void> {
    const settings = loadSettings();
    setLogLevel(settings.logLevel);
    ensureDataDirectories(settings);

    const container = createServiceContainer(settings);
    const app = createApp(container);
    await startServer(app, settings.host, settings.port);
}

// Main entry point - start server when run directly
if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error('Failed to start server', error);
        process.exit(1);
    });
}
