import type { CheerioAPI } from 'cheerio';
import { CandidateSource } from '../types/streaming.js';
import { TimeoutSafeMatcher } from '../services/timeout-safe-matcher.js';
import { logger } from '../utils/logger.js';
import { BaseStrategy, StrategyContext, uniqueByUrl } from './base-strategy.js';
import { scanForMedia } from './player-patterns.js';

/**
 * Inline player setup scripts (jwplayer/plyr style `sources: [{file, label}]`
 * and bare media URLs). Every pattern runs through the timeout-safe matcher.
 */
export class EmbeddedScriptStrategy extends BaseStrategy {
    readonly name = 'embedded-script' as const;

    private readonly matcher: TimeoutSafeMatcher;
    private readonly scriptMaxChars: number;

    constructor(matcher: TimeoutSafeMatcher, scriptMaxChars: number) {
        super();
        this.matcher = matcher;
        this.scriptMaxChars = scriptMaxChars;
    }

    protected async collect(context: StrategyContext): Promise<CandidateSource[]> {
        return this.scan(context.$, context.pageUrl, context.signal);
    }

    async scan($: CheerioAPI, baseUrl: string, signal: AbortSignal): Promise<CandidateSource[]> {
        const scripts: string[] = [];
        $('script:not([src])').each((_, el) => {
            const text = $(el).text();
            if (!text.trim()) return;
            if (text.length > this.scriptMaxChars) {
                logger.warn(`Skipping inline script of ${text.length} chars`, { pageUrl: baseUrl, limit: this.scriptMaxChars }, 'EXTRACT');
                return;
            }
            scripts.push(text);
        });

        if (scripts.length === 0 || signal.aborted) return [];
        // One scan over every script, so the page gets one matcher budget in total
        const found = await scanForMedia(this.matcher, scripts.join('\n;\n'), { baseUrl, signal });
        return uniqueByUrl(found);
    }
}
