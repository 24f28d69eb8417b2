import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ResolutionEngine } from '../services/resolution-engine.js';
import { ContentPageRef, describeResult, isRetryable, ResolutionKind, ResolutionResult } from '../types/streaming.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const STATUS_BY_KIND: Record<ResolutionKind, number> = {
    'success': 200,
    'no-sources': 404,
    'network-error': 502,
    'parse-error': 422,
    'security-rejected': 403
};

const PageRefSchema = z.object({
    url: z.string().trim().min(1, 'url is required').max(2048),
    type: z.enum(['movie', 'episode', 'series']).default('movie'),
    id: z.string().trim().min(1).max(64).optional()
});

const CacheQuerySchema = z.object({
    url: z.string().trim().min(1, 'url is required').max(2048)
});

function toPageRef(input: z.infer<typeof PageRefSchema>): ContentPageRef {
    return {
        canonicalUrl: input.url,
        contentType: input.type,
        ...(input.id ? { internalId: input.id } : {})
    };
}

function badRequest(res: Response, error: z.ZodError): void {
    res.status(400).json({
        error: 'bad-request',
        message: error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; '),
        retryable: false
    });
}

function sendResult(res: Response, result: ResolutionResult): void {
    if (result.kind === 'success') {
        res.set('Cache-Control', 'private, max-age=60');
        res.json({ sources: result.sources, fromCache: result.fromCache, strategy: result.strategy ?? null });
        return;
    }
    res.status(STATUS_BY_KIND[result.kind]).json({
        error: result.kind,
        message: describeResult(result),
        retryable: isRetryable(result)
    });
}

/**
 * Stream resolution routes, bound to one engine instance
 */
export function createStreamingRouter(engine: ResolutionEngine): Router {
    const router = Router();

    /**
     * Resolve a content page to playable stream URLs
     * GET /api/stream/resolve?url={pageUrl}&type={movie|episode|series}&id={internalId}
     */
    router.get('/resolve', async (req: Request, res: Response): Promise<void> => {
        const parsed = PageRefSchema.safeParse(req.query);
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }

        const controller = new AbortController();
        // Client went away before we answered
        res.on('close', () => {
            if (!res.writableEnded) controller.abort();
        });

        try {
            const result = await engine.resolve(toPageRef(parsed.data), { signal: controller.signal });
            if (controller.signal.aborted) return;
            logger.info(`[STREAM] ${parsed.data.url}: ${describeResult(result)}`, { requestId: req.id, outcome: result.kind }, 'API');
            sendResult(res, result);
        } catch (error) {
            const failure = describeError(error);
            logger.error(`[STREAM] Failed to resolve ${parsed.data.url}`, failure, { requestId: req.id }, 'API');
            res.status(500).json({ error: 'internal', message: 'Failed to resolve stream', retryable: true });
        }
    });

    /**
     * Drop a cached resolution
     * DELETE /api/stream/cache?url={pageUrl}
     */
    router.delete('/cache', (req: Request, res: Response): void => {
        const parsed = CacheQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }
        res.json({ invalidated: engine.invalidate(parsed.data.url) });
    });

    /**
     * Warm the cache for a page the client is about to open
     * POST /api/stream/prefetch { url, type, id? }
     */
    router.post('/prefetch', async (req: Request, res: Response): Promise<void> => {
        const parsed = PageRefSchema.safeParse(req.body);
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }
        try {
            res.json({ cached: await engine.prefetch(toPageRef(parsed.data)) });
        } catch (error) {
            logger.error(`[STREAM] Prefetch failed for ${parsed.data.url}`, describeError(error), { requestId: req.id }, 'API');
            res.status(500).json({ error: 'internal', message: 'Prefetch failed', retryable: true });
        }
    });

    /**
     * GET /api/stream/cache/stats
     */
    router.get('/cache/stats', (_req: Request, res: Response): void => {
        res.set('Cache-Control', 'no-cache');
        res.json(engine.cacheStats());
    });

    return router;
}
