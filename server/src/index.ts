import { fileURLToPath } from 'url';
import { createApp, API_VERSION } from './app.js';
import { loadConfig } from './config/index.js';
import { createResolutionEngine } from './services/resolution-engine.js';
import { logger } from './utils/logger.js';

export { createApp } from './app.js';
export { loadConfig, DEFAULT_CONFIG } from './config/index.js';
export type { ResolverConfig } from './config/index.js';
export { createResolutionEngine, ResolutionEngine, rankSources } from './services/resolution-engine.js';
export { SecurityValidator } from './services/security-validator.js';
export * from './types/streaming.js';

const startServer = () => {
    const config = loadConfig();
    const engine = createResolutionEngine(config);
    const app = createApp(engine);

    const server = app.listen(config.port, () => {
        logger.info(`Stream Resolver API v${API_VERSION} listening on port ${config.port}`, {
            trustedDomains: config.trustedDomains.length,
            mirrorCount: config.mirrorCount,
            cacheTtlMs: config.cacheTtlMs
        }, 'SERVER');
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
        logger.fatal(`Server error${err.code ? ` (${err.code})` : ''}`, err, undefined, 'SERVER');
        process.exitCode = 1;
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`${signal} received, shutting down gracefully`, undefined, 'SERVER');
        server.close();
        engine.close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed', error instanceof Error ? error : undefined, undefined, 'SERVER');
                process.exit(1);
            });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    startServer();
}
