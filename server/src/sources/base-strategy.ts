import type { CheerioAPI } from 'cheerio';
import { CandidateSource, ContentPageRef, FetchedPage, QualityLabel, StrategyName } from '../types/streaming.js';
import { isAbortError, describeError, isNetworkError, isSecurityRejection } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Everything a strategy may look at for one page
 */
export interface StrategyContext {
    page: FetchedPage;
    /** Validated page URL; relative URLs resolve against it */
    pageUrl: string;
    pageRef: ContentPageRef;
    $: CheerioAPI;
    signal: AbortSignal;
    /** 0 for the requested page, 1 inside a delegated iframe */
    depth: number;
}

/**
 * One way of pulling candidate stream URLs out of a page
 */
export interface ExtractionStrategy {
    readonly name: StrategyName;
    extract(context: StrategyContext): Promise<CandidateSource[]>;
}

const NON_NAVIGABLE = /^(javascript|data|blob|about|mailto):/i;

/**
 * Abstract base class with common functionality
 */
export abstract class BaseStrategy implements ExtractionStrategy {
    abstract readonly name: StrategyName;

    protected abstract collect(context: StrategyContext): Promise<CandidateSource[]>;

    async extract(context: StrategyContext): Promise<CandidateSource[]> {
        try {
            const candidates = await this.collect(context);
            logger.strategyResult(this.name, candidates.length, { pageUrl: context.pageUrl, depth: context.depth });
            return candidates;
        } catch (error) {
            this.handleError(error, context);
            throw error;
        }
    }

    /**
     * Resolves relative and protocol-relative references against base.
     * Returns null for anything that is not an http(s) URL.
     */
    protected resolveUrl(raw: string | undefined, base: string): string | null {
        const value = raw?.trim();
        if (!value || NON_NAVIGABLE.test(value)) return null;
        try {
            const resolved = new URL(value, base);
            return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.href : null;
        } catch {
            return null;
        }
    }

    protected candidate(url: string, qualityLabel: QualityLabel, extra: Omit<CandidateSource, 'url' | 'qualityLabel'> = {}): CandidateSource {
        return { url, qualityLabel, ...extra };
    }

    private handleError(error: unknown, context: StrategyContext): void {
        // Cancellations are expected whenever a race or request ends early
        if (isAbortError(error)) {
            logger.debug(`${this.name} was aborted`, { pageUrl: context.pageUrl }, 'EXTRACT');
            return;
        }
        if (isSecurityRejection(error)) {
            logger.warn(`${this.name} stopped at an untrusted redirect: ${error.reason}`, { pageUrl: context.pageUrl, url: error.url }, 'EXTRACT');
            return;
        }
        if (isNetworkError(error)) {
            logger.warn(`${this.name} network failure: ${error.message}`, { pageUrl: context.pageUrl, url: error.url }, 'EXTRACT');
            return;
        }
        logger.error(`Error during ${this.name}`, describeError(error), { pageUrl: context.pageUrl }, 'EXTRACT');
    }
}

/**
 * Drops repeated URLs, keeping the first occurrence.
 */
export function uniqueByUrl(candidates: readonly CandidateSource[]): CandidateSource[] {
    const seen = new Set<string>();
    const unique: CandidateSource[] = [];
    for (const candidate of candidates) {
        if (seen.has(candidate.url)) continue;
        seen.add(candidate.url);
        unique.push(candidate);
    }
    return unique;
}
