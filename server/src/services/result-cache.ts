import { CacheEntry, CacheStats, ResolutionResult, ValidatedUrl } from '../types/streaming.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { SecurityValidator } from './security-validator.js';

export interface ResultCacheOptions {
    ttlMs: number;
    maxEntries: number;
    now?: () => number;
}

export type Resolver = (key: ValidatedUrl) => Promise<ResolutionResult>;

interface InFlight {
    promise: Promise<ResolutionResult>;
}

/**
 * Short-lived, process-wide memo of successful resolutions, keyed by the
 * normalized page URL. Bounded LRU; concurrent misses on one key share a
 * single resolver call. Negative results pass through and are never kept.
 */
export class ResultCache {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly inflight = new Map<string, InFlight>();
    private readonly validator: SecurityValidator;
    private readonly ttlMs: number;
    private readonly maxEntries: number;
    private readonly now: () => number;
    private hits = 0;
    private misses = 0;

    constructor(validator: SecurityValidator, options: ResultCacheOptions) {
        this.validator = validator;
        this.ttlMs = options.ttlMs;
        this.maxEntries = Math.max(1, options.maxEntries);
        this.now = options.now ?? Date.now;
    }

    /**
     * The resolver receives the validated page URL with its path intact;
     * only the map key is normalized.
     */
    async getOrResolve(pageUrl: string, resolver: Resolver, ttlMs: number = this.ttlMs): Promise<ResolutionResult> {
        const validated = this.validator.validate(pageUrl);
        if (!validated.ok) {
            return { kind: 'security-rejected', reason: validated.reason };
        }
        const key = this.validator.keyOf(validated.url);

        const fresh = this.lookup(key, ttlMs);
        if (fresh) {
            this.hits++;
            logger.cacheHit(key, { cacheKey: key, sources: fresh.sources.length });
            return {
                kind: 'success',
                sources: [...fresh.sources],
                fromCache: true,
                ...(fresh.strategy ? { strategy: fresh.strategy } : {})
            };
        }

        const pending = this.inflight.get(key);
        if (pending) {
            logger.debug(`Joining in-flight resolution: ${key}`, { cacheKey: key }, 'CACHE');
            return copyResult(await pending.promise);
        }

        this.misses++;
        logger.cacheMiss(key, { cacheKey: key });

        const token: InFlight = { promise: this.run(key, validated.url, resolver) };
        this.inflight.set(key, token);

        try {
            const result = await token.promise;
            // invalidate() during the resolution detaches it
            if (this.inflight.get(key) === token) {
                this.store(key, result);
            } else {
                logger.debug(`Discarding detached resolution: ${key}`, { cacheKey: key }, 'CACHE');
            }
            return copyResult(result);
        } finally {
            if (this.inflight.get(key) === token) {
                this.inflight.delete(key);
            }
        }
    }

    /**
     * Entry for pageUrl if present and fresh. Does not count as a hit or touch LRU order.
     */
    peek(pageUrl: string): CacheEntry | undefined {
        const normalized = this.validator.normalizeKey(pageUrl);
        if (!normalized.ok) return undefined;
        const entry = this.entries.get(normalized.url.href);
        if (!entry || !this.isFresh(entry, this.ttlMs)) return undefined;
        return entry;
    }

    invalidate(pageUrl: string): boolean {
        const normalized = this.validator.normalizeKey(pageUrl);
        if (!normalized.ok) return false;
        const key = normalized.url.href;
        const removed = this.entries.delete(key);
        const detached = this.inflight.delete(key);
        if (removed || detached) {
            logger.debug(`Invalidated ${key}`, { cacheKey: key }, 'CACHE');
        }
        return removed || detached;
    }

    clear(): void {
        this.entries.clear();
        this.inflight.clear();
        this.hits = 0;
        this.misses = 0;
    }

    stats(): CacheStats {
        const now = this.now();
        let totalSources = 0;
        let totalAge = 0;
        for (const entry of this.entries.values()) {
            totalSources += entry.sources.length;
            totalAge += now - entry.fetchedAt;
        }
        return {
            entries: this.entries.size,
            maxEntries: this.maxEntries,
            inFlight: this.inflight.size,
            totalSources,
            hits: this.hits,
            misses: this.misses,
            averageAgeMs: this.entries.size > 0 ? Math.round(totalAge / this.entries.size) : 0
        };
    }

    private async run(key: string, url: ValidatedUrl, resolver: Resolver): Promise<ResolutionResult> {
        try {
            return await resolver(url);
        } catch (error) {
            const failure = describeError(error);
            logger.error(`Resolver threw for ${key}`, failure, { cacheKey: key }, 'CACHE');
            return { kind: 'parse-error', cause: failure.message };
        }
    }

    private lookup(key: string, ttlMs: number): CacheEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (!this.isFresh(entry, ttlMs)) {
            this.entries.delete(key);
            return undefined;
        }
        // Refresh LRU position
        this.entries.delete(key);
        this.entries.set(key, entry);
        return entry;
    }

    private isFresh(entry: CacheEntry, ttlMs: number): boolean {
        return this.now() - entry.fetchedAt < ttlMs;
    }

    private store(key: string, result: ResolutionResult): void {
        if (result.kind !== 'success' || result.sources.length === 0) return;

        const entry: CacheEntry = Object.freeze({
            normalizedUrlKey: key,
            sources: Object.freeze([...result.sources]),
            fetchedAt: this.now(),
            ...(result.strategy ? { strategy: result.strategy } : {})
        });
        this.entries.delete(key);
        this.entries.set(key, entry);

        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
            logger.debug(`Evicted ${oldest.value}`, { cacheKey: oldest.value }, 'CACHE');
        }
    }
}

function copyResult(result: ResolutionResult): ResolutionResult {
    return result.kind === 'success' ? { ...result, sources: [...result.sources] } : result;
}
