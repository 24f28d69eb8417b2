import { CandidateSource, QualityLabel } from '../types/streaming.js';
import { describeError, isAbortError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { normalizeLabel } from '../utils/quality.js';
import { BoundedFetcher } from './bounded-fetcher.js';
import { SecurityValidator } from './security-validator.js';

export interface HlsVariant {
    url: string;
    qualityLabel: QualityLabel;
    bandwidth?: number;
}

export interface HlsFetchLimits {
    maxBytes: number;
    timeoutMs: number;
}

const STREAM_INF = '#EXT-X-STREAM-INF:';

function fromBandwidth(bandwidth: number): QualityLabel {
    if (bandwidth >= 2_000_000) return '1080p';
    if (bandwidth >= 1_000_000) return '720p';
    if (bandwidth >= 500_000) return '480p';
    return '360p';
}

function isPlaylistUrl(url: string): boolean {
    try {
        return new URL(url).pathname.toLowerCase().endsWith('.m3u8');
    } catch {
        return false;
    }
}

/**
 * Variant streams of an HLS master playlist, in playlist order. Quality
 * comes from RESOLUTION, or from BANDWIDTH when no resolution is given.
 * A media playlist (no #EXT-X-STREAM-INF) has no variants.
 */
export function parseMasterPlaylist(body: string, playlistUrl: string): HlsVariant[] {
    const variants: HlsVariant[] = [];
    let pending: { qualityLabel: QualityLabel; bandwidth?: number } | null = null;

    for (const rawLine of body.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) continue;

        if (line.startsWith(STREAM_INF)) {
            const resolution = line.match(/RESOLUTION=(\d+)x(\d+)/);
            const bandwidthMatch = line.match(/(?:^|[:,])BANDWIDTH=(\d+)/);
            const bandwidth = bandwidthMatch ? Number(bandwidthMatch[1]) : undefined;
            const height = resolution ? Number(resolution[2]) : 0;

            let qualityLabel: QualityLabel = height > 0 ? normalizeLabel(height) : 'unknown';
            if (qualityLabel === 'unknown' && bandwidth !== undefined) {
                qualityLabel = fromBandwidth(bandwidth);
            }
            pending = { qualityLabel, ...(bandwidth !== undefined ? { bandwidth } : {}) };
            continue;
        }

        if (line.startsWith('#') || pending === null) continue;

        try {
            variants.push({ url: new URL(line, playlistUrl).href, ...pending });
        } catch {
            logger.debug(`Skipping malformed variant URI in ${playlistUrl}`, { url: playlistUrl }, 'HLS');
        }
        pending = null;
    }
    return variants;
}

/**
 * Replaces each HLS master playlist among the candidates with its trusted
 * variants. A playlist that cannot be fetched, is not a master playlist or
 * lists no trusted variant stays as it was.
 */
export class HlsPlaylistExpander {
    private readonly fetcher: BoundedFetcher;
    private readonly validator: SecurityValidator;
    private readonly limits: HlsFetchLimits;

    constructor(fetcher: BoundedFetcher, validator: SecurityValidator, limits: HlsFetchLimits) {
        this.fetcher = fetcher;
        this.validator = validator;
        this.limits = limits;
    }

    async expand(candidates: readonly CandidateSource[], signal: AbortSignal): Promise<CandidateSource[]> {
        const expanded = await Promise.all(candidates.map((candidate) =>
            isPlaylistUrl(candidate.url) ? this.expandOne(candidate, signal) : Promise.resolve([candidate])
        ));
        return expanded.flat();
    }

    private async expandOne(master: CandidateSource, signal: AbortSignal): Promise<CandidateSource[]> {
        const validated = this.validator.validate(master.url);
        if (!validated.ok) return [master];

        let body: string;
        try {
            const playlist = await this.fetcher.fetch(validated.url.href, {
                maxBytes: this.limits.maxBytes,
                timeoutMs: this.limits.timeoutMs,
                signal,
                headers: { Accept: 'application/vnd.apple.mpegurl, */*' }
            });
            body = playlist.body;
        } catch (error) {
            if (!isAbortError(error)) {
                logger.debug(`Keeping unexpanded playlist: ${describeError(error).message}`, { url: master.url }, 'HLS');
            }
            return [master];
        }

        const variants = parseMasterPlaylist(body, validated.url.href)
            .filter((variant) => this.validator.validate(variant.url).ok);
        if (variants.length === 0) return [master];

        logger.debug(`Expanded master playlist into ${variants.length} variant(s)`, { url: master.url }, 'HLS');
        return variants.map((variant) => ({
            url: variant.url,
            qualityLabel: variant.qualityLabel,
            ...(master.mirrorIndex !== undefined ? { mirrorIndex: master.mirrorIndex } : {})
        }));
    }
}
