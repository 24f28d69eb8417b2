import axios, { AxiosInstance } from 'axios';
import { ResolverConfig } from '../config/index.js';
import { createStrategies } from '../sources/index.js';
import {
    CacheStats,
    CandidateSource,
    ContentPageRef,
    createVideoSource,
    describeResult,
    FetchedPage,
    ResolutionResult,
    ValidatedUrl,
    VideoSource
} from '../types/streaming.js';
import { describeError, isNetworkError, isSecurityRejection } from '../utils/errors.js';
import { logger, PerformanceTimer } from '../utils/logger.js';
import { qualityRank } from '../utils/quality.js';
import { BoundedFetcher } from './bounded-fetcher.js';
import { ExtractionStrategyChain } from './extraction-chain.js';
import { HlsPlaylistExpander } from './hls-expander.js';
import { MirrorRaceCoordinator } from './mirror-race.js';
import { ResultCache } from './result-cache.js';
import { SecurityValidator } from './security-validator.js';
import { SourceVerifier } from './source-verifier.js';
import { TimeoutSafeMatcher } from './timeout-safe-matcher.js';

export interface ResolveOptions {
    signal?: AbortSignal;
}

export interface EngineComponents {
    config: ResolverConfig;
    validator: SecurityValidator;
    fetcher: BoundedFetcher;
    matcher: TimeoutSafeMatcher;
    chain: ExtractionStrategyChain;
    hls: HlsPlaylistExpander;
    cache: ResultCache;
    verifier: SourceVerifier;
}

/**
 * Orders validated sources: best quality first, then lower mirror index
 * (sources without one after those with one), then extraction order.
 * Duplicate URLs keep their first position.
 */
export function rankSources(sources: readonly VideoSource[]): VideoSource[] {
    const indexed = sources.map((source, order) => ({ source, order }));
    indexed.sort((a, b) => {
        const byQuality = qualityRank(b.source.qualityLabel) - qualityRank(a.source.qualityLabel);
        if (byQuality !== 0) return byQuality;
        const mirrorA = a.source.mirrorIndex ?? Number.POSITIVE_INFINITY;
        const mirrorB = b.source.mirrorIndex ?? Number.POSITIVE_INFINITY;
        if (mirrorA !== mirrorB) return mirrorA < mirrorB ? -1 : 1;
        return a.order - b.order;
    });

    const seen = new Set<string>();
    const ranked: VideoSource[] = [];
    for (const { source } of indexed) {
        if (seen.has(source.url)) continue;
        seen.add(source.url);
        ranked.push(source);
    }
    return ranked;
}

/**
 * Turns a content page reference into playable stream URLs. Every outcome,
 * negative ones included, comes back as a ResolutionResult value.
 */
export class ResolutionEngine {
    private readonly config: ResolverConfig;
    private readonly validator: SecurityValidator;
    private readonly fetcher: BoundedFetcher;
    private readonly matcher: TimeoutSafeMatcher;
    private readonly chain: ExtractionStrategyChain;
    private readonly hls: HlsPlaylistExpander;
    private readonly cache: ResultCache;
    private readonly verifier: SourceVerifier;
    private readonly lifetime = new AbortController();

    constructor(components: EngineComponents) {
        this.config = components.config;
        this.validator = components.validator;
        this.fetcher = components.fetcher;
        this.matcher = components.matcher;
        this.chain = components.chain;
        this.hls = components.hls;
        this.cache = components.cache;
        this.verifier = components.verifier;
    }

    /**
     * Concurrent calls for one page share a single resolution. An aborted
     * caller stops waiting; the shared work carries on for the others.
     */
    async resolve(pageRef: ContentPageRef, options: ResolveOptions = {}): Promise<ResolutionResult> {
        if (this.lifetime.signal.aborted) {
            return { kind: 'network-error', cause: 'resolver is shut down' };
        }
        if (options.signal?.aborted) {
            return { kind: 'network-error', cause: 'aborted' };
        }

        const timer = new PerformanceTimer('resolve', { pageUrl: pageRef.canonicalUrl });
        const work = this.cache.getOrResolve(pageRef.canonicalUrl, (key) => this.resolveUncached(key, pageRef));
        const result = options.signal ? await raceAbort(work, options.signal) : await work;
        timer.end({ outcome: result.kind });

        if (result.kind !== 'success') {
            logger.info(describeResult(result), { pageUrl: pageRef.canonicalUrl, outcome: result.kind }, 'ENGINE');
        }
        return result;
    }

    invalidate(pageUrl: string): boolean {
        return this.cache.invalidate(pageUrl);
    }

    /**
     * Resolves now so a later resolve() is served from cache. True when the page ended up cached.
     */
    async prefetch(pageRef: ContentPageRef): Promise<boolean> {
        const result = await this.resolve(pageRef);
        return result.kind === 'success' && this.cache.peek(pageRef.canonicalUrl) !== undefined;
    }

    verify(source: VideoSource, options: ResolveOptions = {}): Promise<boolean> {
        return this.verifier.verify(source, { signal: options.signal });
    }

    firstWorking(sources: readonly VideoSource[], options: ResolveOptions = {}): Promise<VideoSource | null> {
        return this.verifier.firstWorking(sources, { signal: options.signal });
    }

    cacheStats(): CacheStats {
        return this.cache.stats();
    }

    clearCache(): void {
        this.cache.clear();
    }

    /**
     * Aborts in-flight work, terminates matcher workers and empties the cache.
     */
    async close(): Promise<void> {
        this.lifetime.abort(new Error('resolver closed'));
        this.cache.clear();
        await this.matcher.close();
    }

    private async resolveUncached(pageUrl: ValidatedUrl, pageRef: ContentPageRef): Promise<ResolutionResult> {
        const signal = this.lifetime.signal;

        let page: FetchedPage;
        try {
            page = await this.fetcher.fetch(pageUrl.href, {
                maxBytes: this.config.pageMaxBytes,
                timeoutMs: this.config.fetchTimeoutMs,
                signal
            });
        } catch (error) {
            if (isSecurityRejection(error)) {
                return { kind: 'security-rejected', reason: `redirected: ${error.reason}` };
            }
            if (isNetworkError(error)) {
                return {
                    kind: 'network-error',
                    cause: error.message,
                    ...(error.status !== undefined ? { status: error.status } : {})
                };
            }
            const failure = describeError(error);
            logger.error(`Unexpected failure fetching ${pageUrl.href}`, failure, { pageUrl: pageUrl.href }, 'ENGINE');
            return { kind: 'parse-error', cause: failure.message };
        }

        // A redirect must not carry the resolver off the trusted hosts
        let baseUrl = pageUrl.href;
        if (page.finalUrl !== pageUrl.href) {
            const landed = this.validator.validate(page.finalUrl);
            if (!landed.ok) {
                return { kind: 'security-rejected', reason: `redirected: ${landed.reason}` };
            }
            logger.debug(`Followed redirect to ${landed.url.href}`, { pageUrl: pageUrl.href }, 'ENGINE');
            baseUrl = landed.url.href;
        }
        const ref: ContentPageRef = { ...pageRef, canonicalUrl: baseUrl };

        try {
            const outcome = await this.chain.extract(page, ref, signal);
            if (outcome.kind === 'none') {
                const detail = outcome.lastError ?? 'no strategy found a stream';
                if (outcome.faults > 0) {
                    logger.warn(`Extraction faults on ${pageUrl.href}; page layout may have changed`, { pageUrl: pageUrl.href, faults: outcome.faults }, 'ENGINE');
                    return { kind: 'parse-error', cause: detail };
                }
                if (outcome.networkFailures > 0) {
                    return { kind: 'network-error', cause: detail };
                }
                return { kind: 'no-sources', reason: `no playable stream found (tried ${this.chain.order.join(', ')})` };
            }

            const candidates = await this.hls.expand(outcome.candidates, signal);
            const sources = this.toVideoSources(candidates);
            if (sources.length === 0) {
                return { kind: 'no-sources', reason: 'every candidate failed validation' };
            }
            return { kind: 'success', sources: rankSources(sources), fromCache: false, strategy: outcome.strategy };
        } catch (error) {
            const failure = describeError(error);
            logger.parsingError(`resolve ${pageUrl.href}`, failure, { pageUrl: pageUrl.href });
            return { kind: 'parse-error', cause: failure.message };
        }
    }

    private toVideoSources(candidates: readonly CandidateSource[]): VideoSource[] {
        const sources: VideoSource[] = [];
        for (const candidate of candidates) {
            const validated = this.validator.validate(candidate.url);
            if (!validated.ok) continue;
            sources.push(createVideoSource(validated.url, candidate));
        }
        return sources;
    }
}

function raceAbort(work: Promise<ResolutionResult>, signal: AbortSignal): Promise<ResolutionResult> {
    return new Promise((resolve, reject) => {
        const onAbort = () => resolve({ kind: 'network-error', cause: 'aborted' });
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            (result) => {
                signal.removeEventListener('abort', onAbort);
                resolve(result);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export interface EngineOverrides {
    client?: AxiosInstance;
    now?: () => number;
    matcherPoolSize?: number;
}

/**
 * Wires the resolver from configuration. Built once at start-up and passed
 * to whatever serves requests.
 */
export function createResolutionEngine(config: ResolverConfig, overrides: EngineOverrides = {}): ResolutionEngine {
    const validator = new SecurityValidator(config.trustedDomains);
    const client = overrides.client ?? axios.create({
        headers: {
            'User-Agent': config.userAgent,
            'Accept-Language': 'en-US,en;q=0.9'
        }
    });
    const fetcher = new BoundedFetcher(client, validator);
    const matcher = new TimeoutSafeMatcher({
        timeoutMs: config.matchTimeoutMs,
        inputCap: config.matchInputCap,
        ...(overrides.matcherPoolSize !== undefined ? { poolSize: overrides.matcherPoolSize } : {})
    });
    const coordinator = new MirrorRaceCoordinator();
    const chain = new ExtractionStrategyChain(createStrategies({ fetcher, matcher, validator, coordinator }, config), validator);
    const cache = new ResultCache(validator, {
        ttlMs: config.cacheTtlMs,
        maxEntries: config.cacheMaxEntries,
        ...(overrides.now ? { now: overrides.now } : {})
    });
    const verifier = new SourceVerifier(fetcher, validator, config.mirrorTimeoutMs);
    const hls = new HlsPlaylistExpander(fetcher, validator, {
        maxBytes: config.mirrorMaxBytes,
        timeoutMs: config.mirrorTimeoutMs
    });

    return new ResolutionEngine({ config, validator, fetcher, matcher, chain, hls, cache, verifier });
}
