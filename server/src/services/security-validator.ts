import { ValidatedUrl } from '../types/streaming.js';
import { logger } from '../utils/logger.js';

export type ValidationResult =
    | { ok: true; url: ValidatedUrl }
    | { ok: false; reason: string };

/**
 * Trust policy for every URL the resolver touches: HTTPS only, trusted
 * hosts only. Plain HTTP on a trusted host is upgraded; anything else is
 * rejected. Used on the input page URL and again on each extracted
 * candidate.
 */
export class SecurityValidator {
    private readonly trustedDomains: readonly string[];

    constructor(trustedDomains: readonly string[]) {
        this.trustedDomains = trustedDomains.map((domain) => domain.trim().toLowerCase().replace(/\.$/, ''));
    }

    isTrustedHost(host: string): boolean {
        const normalized = host.toLowerCase().replace(/\.$/, '');
        if (!normalized) return false;
        return this.trustedDomains.some((domain) => normalized === domain || normalized.endsWith(`.${domain}`));
    }

    validate(rawUrl: string): ValidationResult {
        const result = this.check(rawUrl);
        if (!result.ok) {
            logger.securityRejected(rawUrl.slice(0, 200), result.reason);
        }
        return result;
    }

    /**
     * Cache key form of a page URL: validated, https, lower-case host,
     * no fragment, no trailing slash on the path. Only the key drops the
     * slash; the page itself is fetched at its validated URL.
     */
    normalizeKey(rawUrl: string): ValidationResult {
        const result = this.validate(rawUrl);
        if (!result.ok) return result;
        return { ok: true, url: { ...result.url, href: this.keyOf(result.url) } };
    }

    keyOf(url: ValidatedUrl): string {
        const parsed = new URL(url.href);
        if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
            parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
        }
        return parsed.href;
    }

    filterSecure(urls: readonly string[]): string[] {
        const accepted: string[] = [];
        for (const url of urls) {
            const result = this.validate(url);
            if (result.ok) accepted.push(result.url.href);
        }
        return accepted;
    }

    private check(rawUrl: string): ValidationResult {
        const trimmed = rawUrl.trim();
        if (!trimmed) {
            return { ok: false, reason: 'empty URL' };
        }

        let parsed: URL;
        try {
            parsed = new URL(trimmed);
        } catch {
            return { ok: false, reason: 'malformed URL' };
        }

        if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
            return { ok: false, reason: `scheme ${parsed.protocol.replace(/:$/, '')} not permitted` };
        }
        if (parsed.username || parsed.password) {
            return { ok: false, reason: 'embedded credentials not permitted' };
        }

        const host = parsed.hostname.toLowerCase().replace(/\.$/, '');
        if (!this.isTrustedHost(host)) {
            return {
                ok: false,
                reason: parsed.protocol === 'http:'
                    ? `cleartext URL from untrusted host ${host}`
                    : `untrusted host ${host}`
            };
        }

        const upgraded = parsed.protocol === 'http:';
        if (upgraded) {
            parsed.protocol = 'https:';
            // An explicit :80 only made sense for cleartext
            if (parsed.port === '80') parsed.port = '';
        }
        parsed.hostname = host;
        parsed.hash = '';

        if (upgraded) {
            logger.debug(`Upgraded to HTTPS: ${host}${parsed.pathname}`, undefined, 'SECURITY');
        }

        return { ok: true, url: { href: parsed.href, host, upgraded } };
    }
}
