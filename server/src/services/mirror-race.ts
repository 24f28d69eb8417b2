import { MirrorProbe } from '../types/streaming.js';
import { createDeadline, Deadline } from '../middleware/reliability.js';
import { describeError, isAbortError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RaceOptions {
    perEndpointTimeoutMs: number;
    overallTimeoutMs: number;
    signal?: AbortSignal;
}

export interface ProbeFailure {
    serverIndex: number;
    error?: Error;
}

export type RaceOutcome<T> =
    | { kind: 'won'; winner: MirrorProbe; items: T[]; elapsedMs: number }
    | { kind: 'exhausted'; failures: ProbeFailure[] }
    | { kind: 'timeout'; elapsedMs: number }
    | { kind: 'aborted' };

export type ProbeRunner<R> = (probe: MirrorProbe, signal: AbortSignal) => Promise<R>;
export type ProbeAcceptor<R, T> = (result: R, probe: MirrorProbe) => T[];

/**
 * Races mirror probes: first probe whose result the acceptor turns into a
 * non-empty list wins and every other probe is aborted on the spot. The
 * race settles without waiting for aborted probes to wind down; anything
 * they deliver afterwards is dropped.
 */
export class MirrorRaceCoordinator {
    race<R, T>(
        probes: readonly MirrorProbe[],
        runProbe: ProbeRunner<R>,
        accept: ProbeAcceptor<R, T>,
        options: RaceOptions
    ): Promise<RaceOutcome<T>> {
        if (options.signal?.aborted) {
            return Promise.resolve({ kind: 'aborted' });
        }
        if (probes.length === 0) {
            return Promise.resolve({ kind: 'exhausted', failures: [] });
        }

        const started = Date.now();
        const scope = createDeadline(options.overallTimeoutMs, options.signal);

        return new Promise<RaceOutcome<T>>((resolve) => {
            let settled = false;
            let pending = probes.length;
            const failures: ProbeFailure[] = [];
            const children = new Map<number, Deadline>();

            const settle = (outcome: RaceOutcome<T>) => {
                if (settled) return;
                settled = true;
                for (const child of children.values()) {
                    child.abort('race settled');
                    child.dispose();
                }
                children.clear();
                scope.signal.removeEventListener('abort', onScopeAbort);
                scope.dispose();
                resolve(outcome);
            };

            const onScopeAbort = () => {
                if (scope.timedOut()) {
                    logger.requestTimeout('mirror race', options.overallTimeoutMs, { probes: probes.length });
                    settle({ kind: 'timeout', elapsedMs: Date.now() - started });
                } else {
                    settle({ kind: 'aborted' });
                }
            };
            scope.signal.addEventListener('abort', onScopeAbort, { once: true });

            const finishProbe = (probe: MirrorProbe, failure?: Error) => {
                const child = children.get(probe.serverIndex);
                child?.dispose();
                children.delete(probe.serverIndex);
                failures.push({ serverIndex: probe.serverIndex, ...(failure ? { error: failure } : {}) });
                pending--;
                if (pending === 0) {
                    settle({ kind: 'exhausted', failures });
                }
            };

            for (const probe of probes) {
                const child = createDeadline(options.perEndpointTimeoutMs, scope.signal);
                children.set(probe.serverIndex, child);

                Promise.resolve()
                    .then(() => runProbe(probe, child.signal))
                    .then((result) => {
                        if (settled || child.signal.aborted) {
                            logger.debug(`Discarding late result from mirror ${probe.serverIndex}`, { serverIndex: probe.serverIndex }, 'RACE');
                            if (!settled) finishProbe(probe, new Error('probe aborted'));
                            return;
                        }
                        let items: T[];
                        try {
                            items = accept(result, probe);
                        } catch (error) {
                            finishProbe(probe, describeError(error));
                            return;
                        }
                        if (items.length === 0) {
                            finishProbe(probe);
                            return;
                        }
                        // The winner is finished; only the losers get aborted
                        children.get(probe.serverIndex)?.dispose();
                        children.delete(probe.serverIndex);
                        const elapsedMs = Date.now() - started;
                        logger.raceWon(probe.serverIndex, elapsedMs, { serverIndex: probe.serverIndex });
                        settle({ kind: 'won', winner: probe, items, elapsedMs });
                    })
                    .catch((error: unknown) => {
                        if (settled) {
                            logger.debug(`Mirror ${probe.serverIndex} ended after race settled`, { serverIndex: probe.serverIndex }, 'RACE');
                            return;
                        }
                        const failure = describeError(error);
                        if (!isAbortError(failure)) {
                            logger.debug(`Mirror ${probe.serverIndex} failed: ${failure.message}`, { serverIndex: probe.serverIndex }, 'RACE');
                        }
                        finishProbe(probe, failure);
                    });
            }
        });
    }
}
