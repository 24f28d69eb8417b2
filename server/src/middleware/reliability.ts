import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, createRequestContext, PerformanceTimer } from '../utils/logger.js';

/**
 * A child abort scope: aborts when the parent aborts, when the timeout
 * fires, or when abort() is called. dispose() must run once the guarded
 * work is over so the timer and parent listener are released.
 */
export interface Deadline {
    readonly signal: AbortSignal;
    timedOut(): boolean;
    abort(reason?: string): void;
    dispose(): void;
}

export function createDeadline(timeoutMs: number | undefined, parentSignal?: AbortSignal): Deadline {
    const controller = new AbortController();
    let expired = false;

    const onParentAbort = () => controller.abort(parentSignal?.reason);
    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort(parentSignal.reason);
        } else {
            parentSignal.addEventListener('abort', onParentAbort, { once: true });
        }
    }

    const timeoutId = timeoutMs !== undefined
        ? setTimeout(() => {
            expired = true;
            controller.abort(new Error(`timed out after ${timeoutMs}ms`));
        }, timeoutMs)
        : undefined;

    return {
        signal: controller.signal,
        timedOut: () => expired,
        abort: (reason?: string) => {
            if (!controller.signal.aborted) controller.abort(new Error(reason ?? 'aborted'));
        },
        dispose: () => {
            if (timeoutId !== undefined) clearTimeout(timeoutId);
            parentSignal?.removeEventListener('abort', onParentAbort);
        }
    };
}

declare module 'express-serve-static-core' {
    interface Request {
        id?: string;
    }
}

/**
 * Express middleware: request id, request/response logging and slow-request warnings
 */
export function reliabilityMiddleware(req: Request, res: Response, next: NextFunction) {
    req.id = req.get('x-request-id') || uuidv4();
    res.set('X-Request-Id', req.id);

    const context = createRequestContext(req);
    const timer = new PerformanceTimer(`${req.method} ${req.path}`, context);

    logger.apiRequest(req.method, req.path, context);

    res.on('finish', () => {
        const duration = timer.end();
        logger.apiResponse(res.statusCode, { ...context, duration, statusCode: res.statusCode });
    });

    next();
}
