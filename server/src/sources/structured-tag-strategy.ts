import type { CheerioAPI } from 'cheerio';
import { CandidateSource, QualityLabel } from '../types/streaming.js';
import { detectQuality, normalizeLabel } from '../utils/quality.js';
import { BaseStrategy, StrategyContext, uniqueByUrl } from './base-strategy.js';
import { looksLikeMedia } from './player-patterns.js';

const QUALITY_ATTRIBUTES = ['label', 'size', 'res', 'data-quality', 'data-res', 'title'];

const MEDIA_TYPES = /^(video\/|application\/(x-mpegurl|vnd\.apple\.mpegurl|dash\+xml))/i;

/**
 * Explicit media markup: <video>/<source> elements, contentUrl microdata
 * and og:video meta tags. Cheapest and most trustworthy, so it runs first.
 */
export class StructuredTagStrategy extends BaseStrategy {
    readonly name = 'structured-tag' as const;

    protected async collect(context: StrategyContext): Promise<CandidateSource[]> {
        return this.scan(context.$, context.pageUrl);
    }

    /**
     * Synchronous scan of an already parsed document; also used on delegated iframes.
     */
    scan($: CheerioAPI, baseUrl: string): CandidateSource[] {
        const found: CandidateSource[] = [];

        const add = (raw: string | undefined, quality: QualityLabel) => {
            const url = this.resolveUrl(raw, baseUrl);
            if (!url) return;
            found.push(this.candidate(url, quality === 'unknown' ? detectQuality(url) : quality));
        };

        $('video').each((_, el) => {
            const $video = $(el);
            const direct = $video.attr('src') || $video.attr('data-src');
            if (direct) add(direct, this.qualityOf((name) => $video.attr(name)));
        });

        $('source').each((_, el) => {
            const $source = $(el);
            const src = $source.attr('src') || $source.attr('data-src');
            if (!src) return;
            const inVideo = $source.parent('video').length > 0;
            const type = $source.attr('type') ?? '';
            // Standalone <source> also appears in <picture> and <audio>
            if (!inVideo && !MEDIA_TYPES.test(type) && !looksLikeMedia(src)) return;
            add(src, this.qualityOf((name) => $source.attr(name)));
        });

        $('link[itemprop="contentUrl"], meta[itemprop="contentUrl"]').each((_, el) => {
            const $tag = $(el);
            add($tag.attr('href') || $tag.attr('content'), 'unknown');
        });

        $('meta[property="og:video:secure_url"], meta[property="og:video:url"], meta[property="og:video"]').each((_, el) => {
            add($(el).attr('content'), 'unknown');
        });

        return uniqueByUrl(found);
    }

    private qualityOf(attr: (name: string) => string | undefined): QualityLabel {
        for (const attribute of QUALITY_ATTRIBUTES) {
            const value = attr(attribute);
            if (!value) continue;
            const label = normalizeLabel(value);
            if (label !== 'unknown') return label;
        }
        return 'unknown';
    }
}
