import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_TRUSTED_DOMAINS, loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
    it('returns the defaults for an empty environment', () => {
        const config = loadConfig({});
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.trustedDomains).toEqual(DEFAULT_TRUSTED_DOMAINS);
        expect(config.pageMaxBytes).toBe(10 * 1024 * 1024);
        expect(config.mirrorCount).toBe(5);
        expect(config.cacheTtlMs).toBe(300_000);
    });

    it('reads numbers and CSV lists from the environment', () => {
        const config = loadConfig({
            TRUSTED_DOMAINS: ' Trusted.Example , cdn.other.example ,,',
            MIRROR_COUNT: '3',
            CACHE_TTL_MS: '60000',
            PORT: '8080'
        });
        expect(config.trustedDomains).toEqual(['trusted.example', 'cdn.other.example']);
        expect(config.mirrorCount).toBe(3);
        expect(config.cacheTtlMs).toBe(60_000);
        expect(config.port).toBe(8080);
    });

    it('falls back to defaults for blank or non-numeric values', () => {
        const config = loadConfig({ FETCH_TIMEOUT_MS: '  ', RACE_TIMEOUT_MS: 'soon' });
        expect(config.fetchTimeoutMs).toBe(DEFAULT_CONFIG.fetchTimeoutMs);
        expect(config.raceTimeoutMs).toBe(DEFAULT_CONFIG.raceTimeoutMs);
    });

    it('applies overrides after the environment', () => {
        const config = loadConfig({ MIRROR_COUNT: '2' }, { mirrorCount: 7 });
        expect(config.mirrorCount).toBe(7);
    });

    it('lists every invalid key in the error', () => {
        expect(() => loadConfig({ MIRROR_COUNT: '11', CACHE_MAX_ENTRIES: '0' })).toThrow(
            /Invalid resolver configuration: .*mirrorCount.*cacheMaxEntries/
        );
    });

    it('rejects domains that are not bare host names', () => {
        expect(() => loadConfig({ TRUSTED_DOMAINS: 'https://trusted.example/path' })).toThrow(/trustedDomains\.0/);
    });
});
