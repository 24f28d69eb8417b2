import { CandidateSource } from '../types/streaming.js';
import { TimeoutSafeMatcher } from '../services/timeout-safe-matcher.js';
import { createDeadline } from '../middleware/reliability.js';
import { logger } from '../utils/logger.js';
import { detectQuality, normalizeLabel } from '../utils/quality.js';

/** `file: "..."` optionally followed by `label: "..."` (jwplayer, clappr, plyr configs) */
export const PLAYER_FILE_THEN_LABEL =
    /["']?file["']?\s*:\s*["']([^"']+)["'](?:\s*,\s*["']?(?:label|quality|res)["']?\s*:\s*["']?([^"',}]*)["']?)?/g;

/** The same entry written label first */
export const PLAYER_LABEL_THEN_FILE =
    /["']?(?:label|quality|res)["']?\s*:\s*["']?([^"',}]*)["']?\s*,\s*["']?file["']?\s*:\s*["']([^"']+)["']/g;

/** Any absolute media URL */
export const MEDIA_URL =
    /https?:\/\/[^\s"'<>\\]+?\.(?:mp4|m3u8|mpd|webm|mkv)(?:\?[^\s"'<>\\]*)?(?=[\s"'<>\\]|$)/gi;

const MEDIA_EXTENSION = /\.(?:mp4|m3u8|mpd|webm|mkv)(?:[?#]|$)/i;

export function looksLikeMedia(url: string): boolean {
    return MEDIA_EXTENSION.test(url);
}

/**
 * Script bodies often carry JSON-escaped slashes (`https:\/\/cdn...`).
 */
export function unescapeSlashes(text: string): string {
    return text.replace(/\\\//g, '/');
}

export interface ScanOptions {
    baseUrl: string;
    signal?: AbortSignal;
    /** Only look for bare media URLs, skipping player config entries */
    mediaOnly?: boolean;
    /** Time for the whole scan, all patterns together. Defaults to the matcher's per-call timeout. */
    budgetMs?: number;
}

function absolute(raw: string, base: string): string | null {
    try {
        const url = new URL(raw.trim(), base);
        return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null;
    } catch {
        return null;
    }
}

/**
 * Runs the player patterns over a script or page body through the matcher.
 * Player entries keep their labels and their order in the text; bare media
 * URLs not already seen follow. Every pattern shares one deadline, so a
 * hostile body costs at most budgetMs however many patterns are left.
 */
export async function scanForMedia(
    matcher: TimeoutSafeMatcher,
    text: string,
    options: ScanOptions
): Promise<CandidateSource[]> {
    const budgetMs = options.budgetMs ?? matcher.defaultTimeoutMs;
    const deadline = createDeadline(budgetMs, options.signal);
    try {
        const found = await collectMedia(matcher, unescapeSlashes(text), options.baseUrl, options.mediaOnly ?? false, deadline.signal);
        if (deadline.timedOut()) {
            logger.matcherTimeout('media scan', budgetMs, { url: options.baseUrl, found: found.length });
        }
        return found;
    } finally {
        deadline.dispose();
    }
}

async function collectMedia(
    matcher: TimeoutSafeMatcher,
    body: string,
    baseUrl: string,
    mediaOnly: boolean,
    signal: AbortSignal
): Promise<CandidateSource[]> {
    const entries: Array<{ index: number; file: string; label: string | null }> = [];

    if (!mediaOnly) {
        const fileFirst = await matcher.match(PLAYER_FILE_THEN_LABEL, body, { signal });
        if (fileFirst.matched) {
            for (const match of fileFirst.matches) {
                const [file, label] = match.groups;
                if (file && looksLikeMedia(file)) entries.push({ index: match.index, file, label: label || null });
            }
        }

        const labelFirst = await matcher.match(PLAYER_LABEL_THEN_FILE, body, { signal });
        if (labelFirst.matched) {
            for (const match of labelFirst.matches) {
                const [label, file] = match.groups;
                if (file && looksLikeMedia(file)) entries.push({ index: match.index, file, label: label || null });
            }
        }
        entries.sort((a, b) => a.index - b.index);
    }

    const labels = new Map<string, string | null>();
    for (const entry of entries) {
        const url = absolute(entry.file, baseUrl);
        if (!url) continue;
        // The same entry can match both patterns; the labelled match wins
        if (!labels.has(url) || (labels.get(url) === null && entry.label !== null)) {
            labels.set(url, entry.label);
        }
    }

    const media = await matcher.match(MEDIA_URL, body, { signal });
    if (media.matched) {
        for (const match of media.matches) {
            const url = absolute(match.value, baseUrl);
            if (url && !labels.has(url)) labels.set(url, null);
        }
    }

    const found: CandidateSource[] = [];
    for (const [url, label] of labels) {
        const fromLabel = normalizeLabel(label);
        found.push({ url, qualityLabel: fromLabel === 'unknown' ? detectQuality(url) : fromLabel });
    }
    return found;
}
