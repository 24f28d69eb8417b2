import * as cheerio from 'cheerio';
import { CandidateSource, ContentPageRef, FetchedPage, StrategyName } from '../types/streaming.js';
import { ExtractionStrategy } from '../sources/index.js';
import { describeError, isNetworkError, isSecurityRejection } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { SecurityValidator } from './security-validator.js';

export type ChainOutcome =
    | { kind: 'found'; strategy: StrategyName; candidates: CandidateSource[] }
    | { kind: 'none'; faults: number; networkFailures: number; lastError?: string };

/**
 * Tries each strategy in order and stops at the first one that yields a
 * candidate the validator accepts. A failing strategy never stops the chain.
 */
export class ExtractionStrategyChain {
    private readonly strategies: readonly ExtractionStrategy[];
    private readonly validator: SecurityValidator;

    constructor(strategies: readonly ExtractionStrategy[], validator: SecurityValidator) {
        this.strategies = strategies;
        this.validator = validator;
    }

    get order(): StrategyName[] {
        return this.strategies.map((strategy) => strategy.name);
    }

    async extract(page: FetchedPage, pageRef: ContentPageRef, signal: AbortSignal): Promise<ChainOutcome> {
        const $ = cheerio.load(page.body);
        let faults = 0;
        let networkFailures = 0;
        let lastError: string | undefined;

        for (const strategy of this.strategies) {
            if (signal.aborted) {
                networkFailures++;
                lastError = 'resolution aborted';
                break;
            }

            let candidates: CandidateSource[];
            try {
                candidates = await strategy.extract({
                    page,
                    pageUrl: pageRef.canonicalUrl,
                    pageRef,
                    $,
                    signal,
                    depth: 0
                });
            } catch (error) {
                const failure = describeError(error);
                lastError = `${strategy.name}: ${failure.message}`;
                // A refused redirect yields nothing, like an empty strategy
                if (isSecurityRejection(error)) continue;
                if (isNetworkError(error)) {
                    networkFailures++;
                } else {
                    faults++;
                }
                continue;
            }

            const accepted = candidates.filter((candidate) => this.validator.validate(candidate.url).ok);
            if (accepted.length > 0) {
                logger.info(`${strategy.name} found ${accepted.length} source(s)`, { pageUrl: pageRef.canonicalUrl, strategy: strategy.name }, 'EXTRACT');
                return { kind: 'found', strategy: strategy.name, candidates: accepted };
            }
        }

        return { kind: 'none', faults, networkFailures, ...(lastError ? { lastError } : {}) };
    }
}
