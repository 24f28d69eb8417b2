import { afterEach, describe, it, expect } from 'vitest';
import { TimeoutSafeMatcher } from '../src/services/timeout-safe-matcher.js';

describe('TimeoutSafeMatcher', () => {
    let matcher: TimeoutSafeMatcher | undefined;

    afterEach(async () => {
        await matcher?.close();
        matcher = undefined;
    });

    it('returns every match of a global pattern with groups and positions', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10_000 });

        const outcome = await matcher.match(/file:"([^"]+)"/g, 'a file:"one.mp4" b file:"two.m3u8"');

        expect(outcome).toEqual({
            matched: true,
            matches: [
                { value: 'file:"one.mp4"', groups: ['one.mp4'], index: 2 },
                { value: 'file:"two.m3u8"', groups: ['two.m3u8'], index: 19 }
            ]
        });
    });

    it('returns only the first match of a non-global pattern', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10_000 });

        const outcome = await matcher.match(/(\d+)p/, '720p 1080p');

        expect(outcome).toEqual({ matched: true, matches: [{ value: '720p', groups: ['720'], index: 0 }] });
    });

    it('reports unmatched optional groups as null', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10_000 });

        const outcome = await matcher.match(/a(b)?c/, 'ac');

        expect(outcome).toEqual({ matched: true, matches: [{ value: 'ac', groups: [null], index: 0 }] });
    });

    it('reports no-match when nothing matches', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10_000 });

        expect(await matcher.match(/\.mp4/, 'nothing here')).toEqual({ matched: false, reason: 'no-match' });
    });

    it('gives up on catastrophic backtracking within the deadline', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 200, inputCap: 10_000 });
        const evil = `${'a'.repeat(30)}!`;

        const started = Date.now();
        const outcome = await matcher.match(/^(a+)+$/, evil);
        const elapsed = Date.now() - started;

        expect(outcome).toEqual({ matched: false, reason: 'timeout' });
        expect(elapsed).toBeLessThan(2000);
        expect(matcher.activeWorkers).toBe(0);
    });

    it('keeps working after a timed-out pattern', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 200, inputCap: 10_000 });

        await matcher.match(/^(a+)+$/, `${'a'.repeat(30)}!`);
        const outcome = await matcher.match(/b+/, 'abbbc');

        expect(outcome).toEqual({ matched: true, matches: [{ value: 'bbb', groups: [], index: 1 }] });
    });

    it('accepts a per-call timeout', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 60_000, inputCap: 10_000 });

        const outcome = await matcher.match(/^(a+)+$/, `${'a'.repeat(30)}!`, { timeoutMs: 100 });

        expect(outcome).toEqual({ matched: false, reason: 'timeout' });
    });

    it('stops when the signal aborts', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 60_000, inputCap: 10_000 });
        const controller = new AbortController();

        const pending = matcher.match(/^(a+)+$/, `${'a'.repeat(30)}!`, { signal: controller.signal });
        setTimeout(() => controller.abort(), 50);

        expect(await pending).toEqual({ matched: false, reason: 'aborted' });
    });

    it('truncates input to the cap before matching', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10 });

        const outcome = await matcher.match(/needle/, `${'x'.repeat(20)}needle`);

        expect(outcome).toEqual({ matched: false, reason: 'no-match' });
    });

    it('caps the number of matches', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 2000, inputCap: 10_000, maxMatches: 3 });

        const outcome = await matcher.match(/x/g, 'xxxxxxxx');

        expect(outcome.matched && outcome.matches.length).toBe(3);
    });

    it('runs concurrent calls independently', async () => {
        matcher = new TimeoutSafeMatcher({ timeoutMs: 300, inputCap: 10_000 });

        const [slow, fast] = await Promise.all([
            matcher.match(/^(a+)+$/, `${'a'.repeat(30)}!`),
            matcher.match(/ok/, 'ok')
        ]);

        expect(slow).toEqual({ matched: false, reason: 'timeout' });
        expect(fast).toEqual({ matched: true, matches: [{ value: 'ok', groups: [], index: 0 }] });
    });
});
