export type NetworkErrorKind = 'timeout' | 'aborted' | 'http' | 'transport';

/**
 * Transport-level failure from a single fetch. Retryable by the caller;
 * nothing below the engine retries on its own.
 */
export class NetworkError extends Error {
    readonly kind: NetworkErrorKind;
    readonly url: string;
    readonly status?: number;

    constructor(kind: NetworkErrorKind, url: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'NetworkError';
        this.kind = kind;
        this.url = url;
        this.status = options?.status;
    }
}

export function isNetworkError(error: unknown): error is NetworkError {
    return error instanceof NetworkError;
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof NetworkError) return error.kind === 'aborted';
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

export function describeError(error: unknown): Error {
    if (error instanceof Error) return error;
    return new Error(String(error));
}

/**
 * A redirect hop the trust policy refused. Raised before the hop is requested.
 */
export class SecurityRejectedError extends Error {
    readonly url: string;
    readonly reason: string;

    constructor(url: string, reason: string) {
        super(`Redirect rejected: ${reason}`);
        this.name = 'SecurityRejectedError';
        this.url = url;
        this.reason = reason;
    }
}

export function isSecurityRejection(error: unknown): error is SecurityRejectedError {
    return error instanceof SecurityRejectedError;
}
