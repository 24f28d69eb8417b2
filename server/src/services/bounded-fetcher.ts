import axios, { AxiosInstance } from 'axios';
import { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { FetchedPage } from '../types/streaming.js';
import { NetworkError, SecurityRejectedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createDeadline } from '../middleware/reliability.js';
import { SecurityValidator } from './security-validator.js';

export interface BoundedFetchOptions {
    maxBytes: number;
    timeoutMs: number;
    signal?: AbortSignal;
    headers?: Record<string, string>;
    method?: 'GET' | 'HEAD';
}

const MAX_REDIRECTS = 5;

/**
 * One GET (or HEAD) per call, streamed and capped at maxBytes. A single
 * deadline covers connect, headers and body. Never retries.
 *
 * With a validator, every redirect hop must pass the trust policy over
 * HTTPS before it is requested; a refused hop fails the fetch with
 * SecurityRejectedError.
 */
export class BoundedFetcher {
    private readonly client: AxiosInstance;
    private readonly validator?: SecurityValidator;
    private requestCount = 0;

    constructor(client: AxiosInstance, validator?: SecurityValidator) {
        this.client = client;
        this.validator = validator;
    }

    get requestsIssued(): number {
        return this.requestCount;
    }

    fetch(url: string, options: BoundedFetchOptions): Promise<FetchedPage> {
        const deadline = createDeadline(options.timeoutMs, options.signal);
        this.requestCount++;

        return new Promise<FetchedPage>((resolve, reject) => {
            let settled = false;
            let stream: Readable | null = null;
            let refusedHop: SecurityRejectedError | null = null;

            const finish = (outcome: { page: FetchedPage } | { error: NetworkError | SecurityRejectedError }) => {
                if (settled) return;
                settled = true;
                deadline.signal.removeEventListener('abort', onAbort);
                deadline.dispose();
                if ('page' in outcome) resolve(outcome.page);
                else reject(outcome.error);
            };

            const abortError = (): NetworkError | SecurityRejectedError => refusedHop ?? (deadline.timedOut()
                ? new NetworkError('timeout', url, `Request timed out after ${options.timeoutMs}ms`)
                : new NetworkError('aborted', url, 'Request aborted'));

            // Settle on abort even when the transport is slow to notice
            const onAbort = () => {
                stream?.destroy();
                if (deadline.timedOut()) {
                    logger.requestTimeout(`fetch ${url}`, options.timeoutMs, { url });
                }
                finish({ error: abortError() });
            };

            if (deadline.signal.aborted) {
                finish({ error: abortError() });
                return;
            }
            deadline.signal.addEventListener('abort', onAbort, { once: true });

            this.client.request<Readable>({
                url,
                method: options.method ?? 'GET',
                responseType: 'stream',
                signal: deadline.signal,
                headers: options.headers,
                maxRedirects: MAX_REDIRECTS,
                beforeRedirect: (redirect: Record<string, unknown>) => {
                    const target = typeof redirect.href === 'string' ? redirect.href : '';
                    const reason = this.checkHop(target);
                    if (reason === null) return;
                    refusedHop = new SecurityRejectedError(target, reason);
                    logger.securityRejected(target.slice(0, 200), `redirect from ${url}: ${reason}`);
                    deadline.abort(reason);
                    // Throwing stops follow-redirects before the hop is requested
                    throw refusedHop;
                },
                validateStatus: () => true,
                decompress: true
            }).then((response) => {
                const body = response.data;
                if (settled) {
                    destroyBody(body);
                    return;
                }
                const finalUrl = readFinalUrl(response.request, url);
                const contentTypeHeader = response.headers['content-type'];
                const contentType = typeof contentTypeHeader === 'string' ? contentTypeHeader : undefined;

                if (response.status < 200 || response.status >= 300) {
                    destroyBody(body);
                    finish({
                        error: new NetworkError('http', url, `HTTP ${response.status}`, { status: response.status })
                    });
                    return;
                }

                if (options.method === 'HEAD' || !isReadable(body)) {
                    destroyBody(body);
                    finish({
                        page: { url, finalUrl, status: response.status, body: '', bytesRead: 0, truncated: false, contentType }
                    });
                    return;
                }

                stream = body;
                // Holds back a multi-byte character split by a chunk or by the cap
                const decoder = new StringDecoder('utf-8');
                const parts: string[] = [];
                let bytesRead = 0;

                body.on('data', (chunk: Buffer | string) => {
                    if (settled) return;
                    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                    const remaining = options.maxBytes - bytesRead;
                    if (buffer.length >= remaining) {
                        parts.push(decoder.write(buffer.subarray(0, remaining)));
                        bytesRead += remaining;
                        // Cap reached: release the connection, keep what we have
                        body.destroy();
                        logger.fetchTruncated(url, options.maxBytes, { url, bytesRead });
                        finish({
                            page: {
                                url, finalUrl, status: response.status, contentType,
                                body: parts.join(''),
                                bytesRead,
                                truncated: true
                            }
                        });
                        return;
                    }
                    parts.push(decoder.write(buffer));
                    bytesRead += buffer.length;
                });

                body.on('end', () => {
                    finish({
                        page: {
                            url, finalUrl, status: response.status, contentType,
                            body: parts.join('') + decoder.end(),
                            bytesRead,
                            truncated: false
                        }
                    });
                });

                body.on('error', (error: Error) => {
                    if (deadline.signal.aborted) {
                        finish({ error: abortError() });
                        return;
                    }
                    finish({ error: new NetworkError('transport', url, error.message, { cause: error }) });
                });
            }).catch((error: unknown) => {
                if (refusedHop || deadline.signal.aborted || axios.isCancel(error)) {
                    finish({ error: abortError() });
                    return;
                }
                const message = error instanceof Error ? error.message : String(error);
                finish({ error: new NetworkError('transport', url, message, { cause: error }) });
            });
        });
    }

    /**
     * Reason a redirect target may not be followed, or null to follow it.
     */
    private checkHop(target: string): string | null {
        if (!this.validator) return null;
        const result = this.validator.validate(target);
        if (!result.ok) return result.reason;
        if (result.url.upgraded) return `cleartext redirect to ${result.url.host}`;
        return null;
    }
}

function isReadable(value: unknown): value is Readable {
    return value instanceof Readable;
}

function destroyBody(body: unknown): void {
    if (isReadable(body)) body.destroy();
}

function readFinalUrl(request: unknown, fallback: string): string {
    // Node's http adapter exposes the redirected URL on res.responseUrl
    if (typeof request === 'object' && request !== null && 'res' in request) {
        const res = request.res;
        if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
            return res.responseUrl;
        }
    }
    return fallback;
}
