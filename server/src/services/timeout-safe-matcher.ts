import { Worker } from 'node:worker_threads';
import { logger } from '../utils/logger.js';

export interface PatternMatch {
    value: string;
    groups: (string | null)[];
    index: number;
}

export type MatchFailureReason = 'no-match' | 'timeout' | 'aborted' | 'error';

export type MatchOutcome =
    | { matched: true; matches: PatternMatch[] }
    | { matched: false; reason: MatchFailureReason };

export interface MatchOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface TimeoutSafeMatcherOptions {
    timeoutMs: number;
    inputCap: number;
    maxMatches?: number;
    poolSize?: number;
}

interface WorkerMatchRequest {
    id: number;
    source: string;
    flags: string;
    input: string;
    maxMatches: number;
}

type WorkerMatchResponse =
    | { id: number; ok: true; matches: PatternMatch[] }
    | { id: number; ok: false; error: string };

const DEFAULT_MAX_MATCHES = 500;
const DEFAULT_POOL_SIZE = 2;

const WORKER_SCRIPT = `
const { parentPort } = require("node:worker_threads");

const toMatch = (match) => ({
  value: match[0],
  groups: match.slice(1).map((group) => (group === undefined ? null : group)),
  index: match.index
});

parentPort?.on("message", (message) => {
  const id = typeof message?.id === "number" ? message.id : null;
  if (id === null) return;

  try {
    const regex = new RegExp(String(message.source), String(message.flags));
    const input = String(message.input ?? "");
    const matches = [];
    if (regex.global) {
      let match;
      while (matches.length < message.maxMatches && (match = regex.exec(input)) !== null) {
        matches.push(toMatch(match));
        if (match[0] === "") regex.lastIndex += 1;
      }
    } else {
      const match = regex.exec(input);
      if (match) matches.push(toMatch(match));
    }
    parentPort?.postMessage({ id, ok: true, matches });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    parentPort?.postMessage({ id, ok: false, error: reason });
  }
});
`;

function isWorkerResponse(value: unknown): value is WorkerMatchResponse {
    return typeof value === 'object' && value !== null && 'id' in value && 'ok' in value;
}

/**
 * Runs regular expressions against untrusted text off the main thread. A
 * pattern that backtracks past its deadline gets its worker terminated and
 * reads as no match; callers never see an exception.
 */
export class TimeoutSafeMatcher {
    private readonly timeoutMs: number;
    private readonly inputCap: number;
    private readonly maxMatches: number;
    private readonly poolSize: number;
    private readonly idle: Worker[] = [];
    private readonly busy = new Set<Worker>();
    private nextTaskId = 1;
    private closed = false;

    constructor(options: TimeoutSafeMatcherOptions) {
        this.timeoutMs = options.timeoutMs;
        this.inputCap = options.inputCap;
        this.maxMatches = Math.max(1, Math.floor(options.maxMatches ?? DEFAULT_MAX_MATCHES));
        this.poolSize = Math.max(0, Math.floor(options.poolSize ?? DEFAULT_POOL_SIZE));
    }

    /** Per-call deadline when match() is not given one */
    get defaultTimeoutMs(): number {
        return this.timeoutMs;
    }

    get activeWorkers(): number {
        return this.busy.size;
    }

    async match(pattern: RegExp, input: string, options: MatchOptions = {}): Promise<MatchOutcome> {
        if (this.closed || options.signal?.aborted) {
            return { matched: false, reason: 'aborted' };
        }

        const timeoutMs = options.timeoutMs ?? this.timeoutMs;
        const request: WorkerMatchRequest = {
            id: this.nextTaskId++,
            source: pattern.source,
            flags: pattern.flags,
            input: input.length > this.inputCap ? input.slice(0, this.inputCap) : input,
            maxMatches: this.maxMatches
        };

        let worker: Worker;
        try {
            worker = this.acquire();
        } catch (error) {
            logger.error('Failed to start matcher worker', error instanceof Error ? error : undefined, undefined, 'MATCHER');
            return { matched: false, reason: 'error' };
        }

        return new Promise<MatchOutcome>((resolve) => {
            let settled = false;

            const cleanup = () => {
                clearTimeout(timer);
                options.signal?.removeEventListener('abort', onAbort);
                worker.off('message', onMessage);
                worker.off('error', onError);
                worker.off('exit', onExit);
            };

            const settle = (outcome: MatchOutcome, reusable: boolean) => {
                if (settled) return;
                settled = true;
                cleanup();
                if (reusable) {
                    this.release(worker);
                } else {
                    this.discard(worker);
                }
                resolve(outcome);
            };

            const onMessage = (message: unknown) => {
                if (!isWorkerResponse(message) || message.id !== request.id) return;
                if (!message.ok) {
                    logger.debug(`Pattern failed: ${message.error}`, { pattern: pattern.source.slice(0, 80) }, 'MATCHER');
                    settle({ matched: false, reason: 'error' }, true);
                    return;
                }
                settle(
                    message.matches.length > 0
                        ? { matched: true, matches: message.matches }
                        : { matched: false, reason: 'no-match' },
                    true
                );
            };

            const onError = (error: Error) => {
                logger.debug(`Matcher worker error: ${error.message}`, undefined, 'MATCHER');
                settle({ matched: false, reason: 'error' }, false);
            };

            const onExit = () => settle({ matched: false, reason: 'error' }, false);

            const onAbort = () => settle({ matched: false, reason: 'aborted' }, false);

            const timer = setTimeout(() => {
                logger.matcherTimeout(pattern.source.slice(0, 80), timeoutMs);
                settle({ matched: false, reason: 'timeout' }, false);
            }, timeoutMs);

            worker.on('message', onMessage);
            worker.on('error', onError);
            worker.on('exit', onExit);
            options.signal?.addEventListener('abort', onAbort, { once: true });

            worker.postMessage(request);
        });
    }

    /**
     * Terminates every worker, idle or busy. Pending calls resolve as errors.
     */
    async close(): Promise<void> {
        this.closed = true;
        const workers = [...this.idle, ...this.busy];
        this.idle.length = 0;
        this.busy.clear();
        await Promise.all(workers.map((worker) => worker.terminate()));
    }

    private acquire(): Worker {
        const worker = this.idle.pop() ?? new Worker(WORKER_SCRIPT, { eval: true });
        worker.ref();
        this.busy.add(worker);
        return worker;
    }

    private release(worker: Worker): void {
        this.busy.delete(worker);
        if (this.closed || this.idle.length >= this.poolSize) {
            this.terminate(worker);
            return;
        }
        // Idle workers must not keep the process alive
        worker.unref();
        this.idle.push(worker);
    }

    private discard(worker: Worker): void {
        this.busy.delete(worker);
        // A runaway pattern keeps the thread busy; terminate is the only way to stop it
        this.terminate(worker);
    }

    private terminate(worker: Worker): void {
        worker.terminate().catch((error: unknown) => {
            logger.debug(`Matcher worker did not terminate cleanly: ${String(error)}`, undefined, 'MATCHER');
        });
    }
}
