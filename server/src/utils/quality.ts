import { QualityLabel } from '../types/streaming.js';

const QUALITY_ORDER: readonly QualityLabel[] = ['2160p', '1440p', '1080p', '720p', '480p', '360p', '240p', 'auto', 'unknown'];

const HEIGHT_LABELS: ReadonlyArray<[number, QualityLabel]> = [
    [2160, '2160p'],
    [1440, '1440p'],
    [1080, '1080p'],
    [720, '720p'],
    [480, '480p'],
    [360, '360p'],
    [240, '240p']
];

/**
 * Higher is better. `auto` sits above `unknown` but below every concrete height.
 */
export function qualityRank(label: QualityLabel): number {
    return QUALITY_ORDER.length - QUALITY_ORDER.indexOf(label);
}

function fromHeight(height: number): QualityLabel {
    for (const [min, label] of HEIGHT_LABELS) {
        if (height >= min) return label;
    }
    return '240p';
}

/**
 * Maps a free-form label ("1080", "HD 720p", "FHD", "4K", "Auto") to a quality label.
 */
export function normalizeLabel(raw: string | number | null | undefined): QualityLabel {
    if (raw === null || raw === undefined) return 'unknown';
    if (typeof raw === 'number') {
        return Number.isFinite(raw) && raw > 0 ? fromHeight(raw) : 'unknown';
    }

    const text = raw.trim().toLowerCase();
    if (!text) return 'unknown';

    const height = text.match(/(\d{3,4})\s*p?\b/);
    if (height) {
        const value = Number(height[1]);
        if (value >= 144 && value <= 4320) return fromHeight(value);
    }

    if (/\b(4k|uhd)\b/.test(text)) return '2160p';
    if (/\b(2k|qhd)\b/.test(text)) return '1440p';
    if (/\bfhd\b|full\s*hd/.test(text)) return '1080p';
    if (/\bhd\b/.test(text)) return '720p';
    if (/\bsd\b/.test(text)) return '480p';
    if (/\bauto\b/.test(text)) return 'auto';
    return 'unknown';
}

/**
 * Guesses the quality from a stream URL, e.g. `movie.1080.mp4` or `ep-720p.m3u8`.
 */
export function detectQuality(url: string): QualityLabel {
    const path = url.toLowerCase().split('?')[0] ?? '';

    for (const [height, label] of HEIGHT_LABELS) {
        const marker = new RegExp(`[._/-]${height}p?(?=[._/-]|$)`);
        if (marker.test(path)) return label;
    }

    if (/[._/-](4k|uhd)(?=[._/-]|$)/.test(path)) return '2160p';
    if (/[._/-]fhd(?=[._/-]|$)/.test(path)) return '1080p';
    if (/[._/-]hd(?=[._/-]|$)/.test(path)) return '720p';
    if (/[._/-]sd(?=[._/-]|$)/.test(path)) return '480p';
    if (path.endsWith('.m3u8') || path.endsWith('.mpd')) return 'auto';
    return 'unknown';
}
