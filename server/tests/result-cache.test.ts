import { describe, it, expect, vi } from 'vitest';
import { ResultCache, Resolver } from '../src/services/result-cache.js';
import { SecurityValidator } from '../src/services/security-validator.js';
import { delay } from './helpers/delay.js';
import { ResolutionResult, VideoSource } from '../src/types/streaming.js';

const validator = new SecurityValidator(['trusted.example']);
const PAGE = 'https://trusted.example/movie/x';

function source(url: string): VideoSource {
    return { url, qualityLabel: '1080p' };
}

function success(...urls: string[]): ResolutionResult {
    return { kind: 'success', sources: urls.map(source), fromCache: false, strategy: 'structured-tag' };
}

function setup(options: { ttlMs?: number; maxEntries?: number } = {}) {
    let now = 1_000_000;
    const clock = {
        advance: (ms: number) => {
            now += ms;
        }
    };
    const cache = new ResultCache(validator, {
        ttlMs: options.ttlMs ?? 60_000,
        maxEntries: options.maxEntries ?? 100,
        now: () => now
    });
    return { cache, clock };
}

describe('ResultCache', () => {
    it('serves a fresh hit without calling the resolver again', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        const first = await cache.getOrResolve(PAGE, resolver);
        const second = await cache.getOrResolve(PAGE, resolver);

        expect(resolver).toHaveBeenCalledTimes(1);
        expect(first).toMatchObject({ kind: 'success', fromCache: false });
        expect(second).toEqual({
            kind: 'success',
            sources: [source('https://trusted.example/a.mp4')],
            fromCache: true,
            strategy: 'structured-tag'
        });
    });

    it('shares one key between http and https forms of a page', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        await cache.getOrResolve('http://trusted.example/movie/x', resolver);
        const again = await cache.getOrResolve('https://trusted.example/movie/x/', resolver);

        expect(resolver).toHaveBeenCalledTimes(1);
        expect(resolver.mock.calls[0]?.[0].href).toBe('https://trusted.example/movie/x');
        expect(again).toMatchObject({ fromCache: true });
    });

    it('hands the resolver the page URL with its path intact', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        await cache.getOrResolve('http://trusted.example/movies/film-x/#player', resolver);

        expect(resolver.mock.calls[0]?.[0].href).toBe('https://trusted.example/movies/film-x/');
        expect(cache.peek('https://trusted.example/movies/film-x')).toMatchObject({
            normalizedUrlKey: 'https://trusted.example/movies/film-x'
        });
    });

    it('rejects untrusted keys without resolving', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>();

        const result = await cache.getOrResolve('https://evil.example/x', resolver);

        expect(result).toEqual({ kind: 'security-rejected', reason: 'untrusted host evil.example' });
        expect(resolver).not.toHaveBeenCalled();
    });

    it('coalesces concurrent misses into one resolution', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>(async () => {
            await delay(30);
            return success('https://trusted.example/a.mp4');
        });

        const results = await Promise.all([
            cache.getOrResolve(PAGE, resolver),
            cache.getOrResolve(PAGE, resolver),
            cache.getOrResolve(PAGE, resolver)
        ]);

        expect(resolver).toHaveBeenCalledTimes(1);
        expect(results.map((result) => result.kind)).toEqual(['success', 'success', 'success']);
        expect(cache.stats()).toMatchObject({ entries: 1, inFlight: 0, misses: 1 });
    });

    it.each<ResolutionResult>([
        { kind: 'no-sources', reason: 'nothing on the page' },
        { kind: 'network-error', cause: 'HTTP 503', status: 503 },
        { kind: 'parse-error', cause: 'layout changed' }
    ])('never caches a $kind result', async (negative) => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>()
            .mockResolvedValueOnce(negative)
            .mockResolvedValueOnce(success('https://trusted.example/a.mp4'));

        expect(await cache.getOrResolve(PAGE, resolver)).toEqual(negative);
        expect(cache.peek(PAGE)).toBeUndefined();
        expect(await cache.getOrResolve(PAGE, resolver)).toMatchObject({ kind: 'success', fromCache: false });
        expect(resolver).toHaveBeenCalledTimes(2);
    });

    it('expires entries after the TTL', async () => {
        const { cache, clock } = setup({ ttlMs: 1000 });
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        await cache.getOrResolve(PAGE, resolver);
        clock.advance(999);
        expect(await cache.getOrResolve(PAGE, resolver)).toMatchObject({ fromCache: true });
        clock.advance(1);
        expect(await cache.getOrResolve(PAGE, resolver)).toMatchObject({ fromCache: false });
        expect(resolver).toHaveBeenCalledTimes(2);
    });

    it('evicts the least recently used entry beyond maxEntries', async () => {
        const { cache } = setup({ maxEntries: 2 });
        const resolver = vi.fn<Resolver>(async (url) => success(`${url.href}/stream.mp4`));

        await cache.getOrResolve('https://trusted.example/a', resolver);
        await cache.getOrResolve('https://trusted.example/b', resolver);
        // Touch a so b becomes the oldest
        await cache.getOrResolve('https://trusted.example/a', resolver);
        await cache.getOrResolve('https://trusted.example/c', resolver);

        expect(cache.peek('https://trusted.example/a')).toBeDefined();
        expect(cache.peek('https://trusted.example/b')).toBeUndefined();
        expect(cache.peek('https://trusted.example/c')).toBeDefined();
        expect(cache.stats().entries).toBe(2);
    });

    it('invalidate removes an entry', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        await cache.getOrResolve(PAGE, resolver);
        expect(cache.invalidate('http://trusted.example/movie/x')).toBe(true);
        expect(cache.invalidate(PAGE)).toBe(false);
        await cache.getOrResolve(PAGE, resolver);

        expect(resolver).toHaveBeenCalledTimes(2);
    });

    it('does not store a resolution that was invalidated while in flight', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>(async () => {
            await delay(30);
            return success('https://trusted.example/stale.mp4');
        });

        const pending = cache.getOrResolve(PAGE, resolver);
        await delay(5);
        expect(cache.invalidate(PAGE)).toBe(true);

        expect(await pending).toMatchObject({ kind: 'success' });
        expect(cache.peek(PAGE)).toBeUndefined();
    });

    it('hands out copies that cannot change the cached list', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4'));

        const first = await cache.getOrResolve(PAGE, resolver);
        if (first.kind === 'success') {
            const mutable: VideoSource[] = [...first.sources];
            mutable.push(source('https://trusted.example/injected.mp4'));
        }
        const second = await cache.getOrResolve(PAGE, resolver);

        expect(second.kind === 'success' && second.sources).toHaveLength(1);
        expect(Object.isFrozen(cache.peek(PAGE)?.sources)).toBe(true);
    });

    it('turns a throwing resolver into a parse-error', async () => {
        const { cache } = setup();
        const resolver = vi.fn<Resolver>().mockRejectedValue(new Error('boom'));

        expect(await cache.getOrResolve(PAGE, resolver)).toEqual({ kind: 'parse-error', cause: 'boom' });
        expect(cache.stats().entries).toBe(0);
    });

    it('reports statistics', async () => {
        const { cache, clock } = setup();
        const resolver = vi.fn<Resolver>().mockResolvedValue(success('https://trusted.example/a.mp4', 'https://trusted.example/b.mp4'));

        await cache.getOrResolve(PAGE, resolver);
        clock.advance(500);
        await cache.getOrResolve(PAGE, resolver);

        expect(cache.stats()).toEqual({
            entries: 1,
            maxEntries: 100,
            inFlight: 0,
            totalSources: 2,
            hits: 1,
            misses: 1,
            averageAgeMs: 500
        });

        cache.clear();
        expect(cache.stats()).toMatchObject({ entries: 0, hits: 0, misses: 0 });
    });
});
