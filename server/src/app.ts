import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createStreamingRouter } from './routes/streaming.js';
import { ResolutionEngine } from './services/resolution-engine.js';
import { reliabilityMiddleware } from './middleware/reliability.js';
import { logger, createRequestContext } from './utils/logger.js';

export const API_VERSION = '1.0.0';

/**
 * Express app over a resolver engine. The caller owns the engine's lifetime.
 */
export function createApp(engine: ResolutionEngine): Express {
    const app = express();

    app.set('etag', 'strong');
    app.set('x-powered-by', false);

    // CORS configuration
    const corsOptions = {
        origin: process.env.CORS_ORIGIN || '*',
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'X-Request-Id'],
        maxAge: 86400
    };

    app.use(cors(corsOptions));
    app.use(express.json({ limit: '64kb' }));

    app.use((_req: Request, res: Response, next: NextFunction) => {
        res.set('X-Content-Type-Options', 'nosniff');
        res.set('X-Frame-Options', 'DENY');
        next();
    });

    app.use(reliabilityMiddleware);

    // Health check endpoint (fast response)
    app.get('/health', (_req: Request, res: Response) => {
        res.set('Cache-Control', 'no-cache');
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: API_VERSION,
            uptime: process.uptime(),
            cache: engine.cacheStats()
        });
    });

    app.use('/api/stream', createStreamingRouter(engine));

    // API documentation
    app.get('/api', (_req: Request, res: Response) => {
        res.set('Cache-Control', 'public, max-age=3600');
        res.json({
            name: 'Stream Resolver API',
            version: API_VERSION,
            description: 'Resolves content pages on trusted hosts to playable stream URLs',
            endpoints: {
                resolve: 'GET /api/stream/resolve?url={pageUrl}&type={movie|episode|series}&id={internalId}',
                invalidate: 'DELETE /api/stream/cache?url={pageUrl}',
                prefetch: 'POST /api/stream/prefetch',
                cacheStats: 'GET /api/stream/cache/stats',
                health: 'GET /health'
            }
        });
    });

    // 404 handler
    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Endpoint not found' });
    });

    // Error handler
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        const context = createRequestContext(req);
        // body-parser errors carry their own 4xx status
        const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
        if (status === 500) {
            logger.error('Unhandled error', err, context);
        }

        res.status(status).json({
            error: status === 500 ? 'Internal server error' : err.message,
            message: process.env.NODE_ENV === 'development' ? err.message : undefined,
            requestId: req.id
        });
    });

    return app;
}
