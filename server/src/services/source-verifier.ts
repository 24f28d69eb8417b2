/**
 * Stream source verification
 * Checks that a resolved source still answers before handing it to a player
 */

import { VideoSource } from '../types/streaming.js';
import { isNetworkError } from '../utils/errors.js';
import { logger, PerformanceTimer } from '../utils/logger.js';
import { BoundedFetcher } from './bounded-fetcher.js';
import { SecurityValidator } from './security-validator.js';

export interface VerificationResult {
    url: string;
    available: boolean;
    latency: number;
    status?: number;
    error?: string;
}

export interface VerifyOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

export class SourceVerifier {
    private readonly fetcher: BoundedFetcher;
    private readonly validator: SecurityValidator;
    private readonly timeoutMs: number;

    constructor(fetcher: BoundedFetcher, validator: SecurityValidator, timeoutMs: number) {
        this.fetcher = fetcher;
        this.validator = validator;
        this.timeoutMs = timeoutMs;
    }

    /**
     * Single HEAD request; true on 2xx. Never retries.
     */
    async verify(source: VideoSource, options: VerifyOptions = {}): Promise<boolean> {
        const result = await this.check(source, options);
        return result.available;
    }

    async check(source: VideoSource, options: VerifyOptions = {}): Promise<VerificationResult> {
        const start = Date.now();
        // Cached sources are re-checked in case the trust list changed since
        const validated = this.validator.validate(source.url);
        if (!validated.ok) {
            return { url: source.url, available: false, latency: 0, error: validated.reason };
        }

        try {
            const page = await this.fetcher.fetch(validated.url.href, {
                method: 'HEAD',
                maxBytes: 1,
                timeoutMs: options.timeoutMs ?? this.timeoutMs,
                signal: options.signal
            });
            return { url: source.url, available: true, latency: Date.now() - start, status: page.status };
        } catch (error) {
            const latency = Date.now() - start;
            if (isNetworkError(error)) {
                logger.debug(`Source unavailable (${error.kind}): ${source.url}`, { url: source.url, status: error.status }, 'VERIFIER');
                return {
                    url: source.url,
                    available: false,
                    latency,
                    error: error.message,
                    ...(error.status !== undefined ? { status: error.status } : {})
                };
            }
            throw error;
        }
    }

    /**
     * Checks sources in order and returns the first that answers, or null.
     */
    async firstWorking(sources: readonly VideoSource[], options: VerifyOptions = {}): Promise<VideoSource | null> {
        const timer = new PerformanceTimer('firstWorking', { candidates: sources.length });
        for (const source of sources) {
            if (options.signal?.aborted) break;
            if (await this.verify(source, options)) {
                timer.end({ url: source.url });
                return source;
            }
        }
        timer.end();
        logger.warn(`No working source among ${sources.length} candidate(s)`, undefined, 'VERIFIER');
        return null;
    }
}
