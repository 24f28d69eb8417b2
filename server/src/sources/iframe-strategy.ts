import * as cheerio from 'cheerio';
import { CandidateSource } from '../types/streaming.js';
import { BoundedFetcher } from '../services/bounded-fetcher.js';
import { SecurityValidator } from '../services/security-validator.js';
import { logger } from '../utils/logger.js';
import { BaseStrategy, StrategyContext, uniqueByUrl } from './base-strategy.js';
import { EmbeddedScriptStrategy } from './embedded-script-strategy.js';
import { StructuredTagStrategy } from './structured-tag-strategy.js';

export interface IframeFetchLimits {
    maxBytes: number;
    timeoutMs: number;
}

/**
 * Follows the first trusted <iframe> one level down and scans the embedded
 * document with the tag and script strategies. Never recurses further.
 */
export class IframeDelegationStrategy extends BaseStrategy {
    readonly name = 'iframe-delegation' as const;

    private readonly fetcher: BoundedFetcher;
    private readonly validator: SecurityValidator;
    private readonly tags: StructuredTagStrategy;
    private readonly scripts: EmbeddedScriptStrategy;
    private readonly limits: IframeFetchLimits;

    constructor(
        fetcher: BoundedFetcher,
        validator: SecurityValidator,
        tags: StructuredTagStrategy,
        scripts: EmbeddedScriptStrategy,
        limits: IframeFetchLimits
    ) {
        super();
        this.fetcher = fetcher;
        this.validator = validator;
        this.tags = tags;
        this.scripts = scripts;
        this.limits = limits;
    }

    protected async collect(context: StrategyContext): Promise<CandidateSource[]> {
        if (context.depth >= 1) return [];

        const target = this.firstTrustedFrame(context);
        if (!target) return [];

        logger.debug(`Delegating to iframe ${target}`, { pageUrl: context.pageUrl, url: target }, 'EXTRACT');
        const framePage = await this.fetcher.fetch(target, {
            maxBytes: this.limits.maxBytes,
            timeoutMs: this.limits.timeoutMs,
            signal: context.signal,
            headers: { Referer: context.pageUrl }
        });

        const $frame = cheerio.load(framePage.body);
        const fromTags = this.tags.scan($frame, target);
        if (fromTags.length > 0) return fromTags;
        return uniqueByUrl(await this.scripts.scan($frame, target, context.signal));
    }

    private firstTrustedFrame(context: StrategyContext): string | null {
        const frames = context.$('iframe').toArray();
        for (const frame of frames) {
            const $frame = context.$(frame);
            const raw = $frame.attr('src') || $frame.attr('data-src');
            const resolved = this.resolveUrl(raw, context.pageUrl);
            if (!resolved) continue;
            const validated = this.validator.validate(resolved);
            if (validated.ok) return validated.url.href;
        }
        return null;
    }
}
