import { describe, it, expect, vi } from 'vitest';
import { MirrorRaceCoordinator } from '../src/services/mirror-race.js';
import { delay } from './helpers/delay.js';
import { MirrorProbe } from '../src/types/streaming.js';

function probes(count: number): MirrorProbe[] {
    return Array.from({ length: count }, (_, i) => ({
        serverIndex: i + 1,
        derivedUrl: `https://trusted.example/api/${i + 1}`
    }));
}

const options = { perEndpointTimeoutMs: 2000, overallTimeoutMs: 3000 };
const keepAll = (items: string[]) => items;

describe('MirrorRaceCoordinator', () => {
    const coordinator = new MirrorRaceCoordinator();

    it('takes the first probe with an acceptable result and aborts the rest', async () => {
        const abortedIndexes: number[] = [];
        const delays: Record<number, number> = { 1: 1500, 2: 1500, 3: 20, 4: 1500, 5: 1500 };

        const started = Date.now();
        const outcome = await coordinator.race(
            probes(5),
            async (probe, signal) => {
                signal.addEventListener('abort', () => abortedIndexes.push(probe.serverIndex));
                await delay(delays[probe.serverIndex] ?? 0, signal);
                return [`stream-${probe.serverIndex}`];
            },
            keepAll,
            options
        );
        const elapsed = Date.now() - started;

        expect(outcome).toMatchObject({ kind: 'won', winner: { serverIndex: 3 }, items: ['stream-3'] });
        expect(elapsed).toBeLessThan(1000);
        expect(abortedIndexes.sort()).toEqual([1, 2, 4, 5]);
    });

    it('skips probes whose results the acceptor empties', async () => {
        const outcome = await coordinator.race(
            probes(2),
            async (probe) => {
                await delay(probe.serverIndex === 1 ? 10 : 40);
                return probe.serverIndex === 1 ? ['https://evil.example/a.mp4'] : ['https://trusted.example/b.mp4'];
            },
            (items) => items.filter((url) => url.startsWith('https://trusted.example/')),
            options
        );

        expect(outcome).toMatchObject({ kind: 'won', winner: { serverIndex: 2 }, items: ['https://trusted.example/b.mp4'] });
    });

    it('discards a loser that ignores cancellation and finishes late', async () => {
        const lateDelivered = vi.fn();

        const outcome = await coordinator.race(
            probes(2),
            async (probe) => {
                if (probe.serverIndex === 1) {
                    await delay(10);
                    return ['winner'];
                }
                // Ignores the signal entirely
                await delay(80);
                lateDelivered();
                return ['late-loser'];
            },
            keepAll,
            options
        );

        expect(outcome).toMatchObject({ kind: 'won', items: ['winner'] });
        await delay(150);
        expect(lateDelivered).toHaveBeenCalledTimes(1);
        expect(outcome).toMatchObject({ kind: 'won', items: ['winner'] });
    });

    it('is exhausted when every probe fails or comes back empty', async () => {
        const outcome = await coordinator.race(
            probes(3),
            async (probe) => {
                if (probe.serverIndex === 2) throw new Error('HTTP 500');
                return [];
            },
            keepAll,
            options
        );

        expect(outcome.kind).toBe('exhausted');
        if (outcome.kind === 'exhausted') {
            expect(outcome.failures.map((failure) => failure.serverIndex).sort()).toEqual([1, 2, 3]);
            expect(outcome.failures.find((failure) => failure.serverIndex === 2)?.error?.message).toBe('HTTP 500');
        }
    });

    it('times out on the overall deadline and aborts every probe', async () => {
        const aborted: number[] = [];

        const outcome = await coordinator.race(
            probes(3),
            async (probe, signal) => {
                signal.addEventListener('abort', () => aborted.push(probe.serverIndex));
                await delay(5000, signal);
                return ['never'];
            },
            keepAll,
            { perEndpointTimeoutMs: 5000, overallTimeoutMs: 50 }
        );

        expect(outcome.kind).toBe('timeout');
        expect(aborted.sort()).toEqual([1, 2, 3]);
    });

    it('fails each probe that outlives its own deadline', async () => {
        const outcome = await coordinator.race(
            probes(2),
            async (probe, signal) => {
                await delay(probe.serverIndex === 1 ? 5000 : 100, signal);
                return [`stream-${probe.serverIndex}`];
            },
            keepAll,
            { perEndpointTimeoutMs: 50, overallTimeoutMs: 5000 }
        );

        expect(outcome.kind).toBe('exhausted');
    });

    it('reports aborted when the caller aborts', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 20);

        const outcome = await coordinator.race(
            probes(2),
            async (_probe, signal) => {
                await delay(5000, signal);
                return ['never'];
            },
            keepAll,
            { ...options, signal: controller.signal }
        );

        expect(outcome).toEqual({ kind: 'aborted' });
    });

    it('is exhausted immediately for an empty probe list', async () => {
        const runProbe = vi.fn();
        const outcome = await coordinator.race<string[], string>([], runProbe, keepAll, options);

        expect(outcome).toEqual({ kind: 'exhausted', failures: [] });
        expect(runProbe).not.toHaveBeenCalled();
    });
});
