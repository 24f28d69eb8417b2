import { z } from 'zod';
import { CandidateSource, ContentType, MirrorProbe } from '../types/streaming.js';
import { BoundedFetcher } from '../services/bounded-fetcher.js';
import { MirrorRaceCoordinator } from '../services/mirror-race.js';
import { SecurityValidator } from '../services/security-validator.js';
import { TimeoutSafeMatcher } from '../services/timeout-safe-matcher.js';
import { NetworkError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { detectQuality, normalizeLabel } from '../utils/quality.js';
import { BaseStrategy, StrategyContext, uniqueByUrl } from './base-strategy.js';
import { scanForMedia } from './player-patterns.js';

const INTERNAL_ID = /^[A-Za-z0-9_-]{1,64}$/;

const labelValue = z.union([z.string(), z.number()]).optional();

const MirrorSourceSchema = z.object({
    url: z.string().optional(),
    file: z.string().optional(),
    src: z.string().optional(),
    quality: labelValue,
    label: labelValue,
    size: z.union([z.number(), z.string()]).optional()
}).passthrough();

const MirrorListSchema = z.array(MirrorSourceSchema);
const SourcesPayloadSchema = z.object({ sources: z.array(MirrorSourceSchema) });
const EmbedPayloadSchema = z.object({ embed_url: z.string().min(1) });

type MirrorSource = z.infer<typeof MirrorSourceSchema>;

export interface MirrorStrategyOptions {
    mirrorCount: number;
    mirrorMaxBytes: number;
    mirrorTimeoutMs: number;
    raceTimeoutMs: number;
}

export function mirrorPathType(contentType: ContentType): 'movie' | 'tv' {
    return contentType === 'movie' ? 'movie' : 'tv';
}

/**
 * Builds `https://{host}/wp-json/dooplayer/v2/{id}/{movie|tv}/{n}` for n = 1..count.
 */
export function buildMirrorProbes(host: string, internalId: string, contentType: ContentType, count: number): MirrorProbe[] {
    const type = mirrorPathType(contentType);
    const probes: MirrorProbe[] = [];
    for (let serverIndex = 1; serverIndex <= count; serverIndex++) {
        probes.push({
            serverIndex,
            derivedUrl: `https://${host}/wp-json/dooplayer/v2/${encodeURIComponent(internalId)}/${type}/${serverIndex}`
        });
    }
    return probes;
}

/**
 * DooPlay themes carry the post id in a hidden form field:
 * `<input type="hidden" name="id" value="13800">`.
 */
function postIdFromPage(context: StrategyContext): string | undefined {
    const value = context.$('input[name="id"]').first().attr('value')?.trim();
    if (!value) return undefined;
    logger.debug(`Using post id ${value.slice(0, 80)} from the page`, { pageUrl: context.pageUrl }, 'EXTRACT');
    return value;
}

/**
 * Player API mirrors keyed by the page's internal id. Every mirror is asked
 * at once and the first one to yield a trusted stream wins.
 */
export class NumberedMirrorStrategy extends BaseStrategy {
    readonly name = 'numbered-mirror-api' as const;

    private readonly fetcher: BoundedFetcher;
    private readonly matcher: TimeoutSafeMatcher;
    private readonly validator: SecurityValidator;
    private readonly coordinator: MirrorRaceCoordinator;
    private readonly options: MirrorStrategyOptions;

    constructor(
        fetcher: BoundedFetcher,
        matcher: TimeoutSafeMatcher,
        validator: SecurityValidator,
        coordinator: MirrorRaceCoordinator,
        options: MirrorStrategyOptions
    ) {
        super();
        this.fetcher = fetcher;
        this.matcher = matcher;
        this.validator = validator;
        this.coordinator = coordinator;
        this.options = options;
    }

    protected async collect(context: StrategyContext): Promise<CandidateSource[]> {
        const internalId = context.pageRef.internalId ?? postIdFromPage(context);
        if (internalId === undefined) return [];
        if (!INTERNAL_ID.test(internalId)) {
            logger.warn('Ignoring malformed internal id', { pageUrl: context.pageUrl, internalId: internalId.slice(0, 80) }, 'EXTRACT');
            return [];
        }

        const host = new URL(context.pageUrl).host;
        const probes = buildMirrorProbes(host, internalId, context.pageRef.contentType, this.options.mirrorCount);

        const outcome = await this.coordinator.race(
            probes,
            (probe, signal) => this.probeMirror(probe, signal, context.pageUrl),
            (candidates) => candidates.filter((candidate) => this.validator.validate(candidate.url).ok),
            {
                perEndpointTimeoutMs: this.options.mirrorTimeoutMs,
                overallTimeoutMs: this.options.raceTimeoutMs,
                signal: context.signal
            }
        );

        switch (outcome.kind) {
            case 'won':
                return outcome.items;
            case 'exhausted':
                logger.debug(`All ${probes.length} mirrors came back empty`, { pageUrl: context.pageUrl }, 'RACE');
                return [];
            case 'timeout':
                throw new NetworkError('timeout', probes[0]?.derivedUrl ?? context.pageUrl, `Mirror race timed out after ${outcome.elapsedMs}ms`);
            case 'aborted':
                throw new NetworkError('aborted', context.pageUrl, 'Mirror race aborted');
        }
    }

    private async probeMirror(probe: MirrorProbe, signal: AbortSignal, pageUrl: string): Promise<CandidateSource[]> {
        const response = await this.fetcher.fetch(probe.derivedUrl, {
            maxBytes: this.options.mirrorMaxBytes,
            timeoutMs: this.options.mirrorTimeoutMs,
            signal,
            headers: { Accept: 'application/json, text/plain, */*', Referer: pageUrl }
        });

        const candidates = await this.parseMirrorBody(response.body, probe, signal, pageUrl);
        return candidates.map((candidate) => ({ ...candidate, mirrorIndex: probe.serverIndex }));
    }

    private async parseMirrorBody(body: string, probe: MirrorProbe, signal: AbortSignal, pageUrl: string): Promise<CandidateSource[]> {
        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch {
            return scanForMedia(this.matcher, body, { baseUrl: probe.derivedUrl, signal, mediaOnly: true });
        }

        const list = MirrorListSchema.safeParse(json);
        if (list.success) {
            return this.fromEntries(list.data, probe.derivedUrl);
        }
        const withSources = SourcesPayloadSchema.safeParse(json);
        if (withSources.success) {
            return this.fromEntries(withSources.data.sources, probe.derivedUrl);
        }
        const embed = EmbedPayloadSchema.safeParse(json);
        if (embed.success) {
            return this.followEmbed(embed.data.embed_url, probe, signal, pageUrl);
        }
        const single = MirrorSourceSchema.safeParse(json);
        if (single.success) {
            return this.fromEntries([single.data], probe.derivedUrl);
        }

        logger.debug(`Mirror ${probe.serverIndex} returned an unrecognized payload`, { url: probe.derivedUrl }, 'EXTRACT');
        return [];
    }

    private fromEntries(entries: readonly MirrorSource[], baseUrl: string): CandidateSource[] {
        const found: CandidateSource[] = [];
        for (const entry of entries) {
            const url = this.resolveUrl(entry.url ?? entry.file ?? entry.src, baseUrl);
            if (!url) continue;
            const labelled = normalizeLabel(entry.quality ?? entry.label);
            const size = typeof entry.size === 'number' ? entry.size : Number(entry.size);
            found.push(this.candidate(url, labelled === 'unknown' ? detectQuality(url) : labelled,
                Number.isFinite(size) && size > 0 ? { approxSizeBytes: size } : {}));
        }
        return uniqueByUrl(found);
    }

    /**
     * `embed_url` either carries the stream in its `source` parameter or
     * points at a player page that has to be fetched and scanned.
     */
    private async followEmbed(embedUrl: string, probe: MirrorProbe, signal: AbortSignal, pageUrl: string): Promise<CandidateSource[]> {
        const resolved = this.resolveUrl(embedUrl, probe.derivedUrl);
        if (!resolved) return [];

        const source = new URL(resolved).searchParams.get('source');
        if (source) {
            const url = this.resolveUrl(source, resolved);
            return url ? [this.candidate(url, detectQuality(url))] : [];
        }

        const validated = this.validator.validate(resolved);
        if (!validated.ok) return [];

        const embedPage = await this.fetcher.fetch(validated.url.href, {
            maxBytes: this.options.mirrorMaxBytes,
            timeoutMs: this.options.mirrorTimeoutMs,
            signal,
            headers: { Referer: pageUrl }
        });
        return scanForMedia(this.matcher, embedPage.body, { baseUrl: validated.url.href, signal });
    }
}
