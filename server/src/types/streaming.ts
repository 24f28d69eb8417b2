/**
 * Streaming-related types for page resolution
 */

export type ContentType = 'movie' | 'episode' | 'series';

export interface ContentPageRef {
    readonly canonicalUrl: string;
    readonly contentType: ContentType;
    readonly internalId?: string;
}

export type QualityLabel = '2160p' | '1440p' | '1080p' | '720p' | '480p' | '360p' | '240p' | 'auto' | 'unknown';

/**
 * Raw extraction output. Nothing about the URL has been checked yet.
 */
export interface CandidateSource {
    url: string;
    qualityLabel: QualityLabel;
    mirrorIndex?: number;
    approxSizeBytes?: number;
}

/**
 * A URL that passed the trust policy. Only the SecurityValidator hands these out.
 */
export interface ValidatedUrl {
    readonly href: string;
    readonly host: string;
    readonly upgraded: boolean;
}

export interface VideoSource {
    readonly url: string;
    readonly qualityLabel: QualityLabel;
    readonly mirrorIndex?: number;
    readonly approxSizeBytes?: number;
}

export function createVideoSource(validated: ValidatedUrl, candidate: Omit<CandidateSource, 'url'>): VideoSource {
    const source: VideoSource = {
        url: validated.href,
        qualityLabel: candidate.qualityLabel,
        ...(candidate.mirrorIndex !== undefined ? { mirrorIndex: candidate.mirrorIndex } : {}),
        ...(candidate.approxSizeBytes !== undefined ? { approxSizeBytes: candidate.approxSizeBytes } : {})
    };
    return Object.freeze(source);
}

export type StrategyName = 'structured-tag' | 'numbered-mirror-api' | 'embedded-script' | 'iframe-delegation';

export type ResolutionResult =
    | { kind: 'success'; sources: readonly VideoSource[]; fromCache: boolean; strategy?: StrategyName }
    | { kind: 'no-sources'; reason: string }
    | { kind: 'network-error'; cause: string; status?: number }
    | { kind: 'parse-error'; cause: string }
    | { kind: 'security-rejected'; reason: string };

export type ResolutionKind = ResolutionResult['kind'];

export function isRetryable(result: ResolutionResult): boolean {
    return result.kind === 'network-error' || result.kind === 'parse-error';
}

export function describeResult(result: ResolutionResult): string {
    switch (result.kind) {
        case 'success':
            return `${result.sources.length} source(s)${result.fromCache ? ' (cached)' : ''}`;
        case 'no-sources':
            return `No sources: ${result.reason}`;
        case 'network-error':
            return `Network error: ${result.cause}`;
        case 'parse-error':
            return `Parse error: ${result.cause}`;
        case 'security-rejected':
            return `Rejected: ${result.reason}`;
    }
}

export interface MirrorProbe {
    readonly serverIndex: number;
    readonly derivedUrl: string;
}

export interface CacheEntry {
    readonly normalizedUrlKey: string;
    readonly sources: readonly VideoSource[];
    readonly fetchedAt: number;
    readonly strategy?: StrategyName;
}

export interface CacheStats {
    entries: number;
    maxEntries: number;
    inFlight: number;
    totalSources: number;
    hits: number;
    misses: number;
    averageAgeMs: number;
}

export interface FetchedPage {
    url: string;
    finalUrl: string;
    status: number;
    body: string;
    bytesRead: number;
    truncated: boolean;
    contentType?: string;
}
