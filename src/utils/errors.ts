/**
 * Custom error classes for the target
 *
 * Request failures are classified here so the retry loop and the sync
 * runner can branch on the class instead of on raw HTTP details.
 */

/**
 * Failure classes a single Sharpi request can end in
 */
export type RequestFailureKind =
    | 'NetworkTimeout'
    | 'Network'
    | 'RetriableServerError'
    | 'ClientError'
    | 'DuplicateConflict';

/**
 * Base interface for errors raised by a request to the partner API
 */
export interface RequestError extends Error {
    readonly kind: RequestFailureKind;
    readonly url: string;
    readonly method: string;
}

/**
 * Network timeout - the call neither completed nor failed within the
 * per-call timeout
 *
 * @example
 * throw new NetworkTimeoutError('POST', url, 30000);
 */
export class NetworkTimeoutError extends Error implements RequestError {
    readonly name = 'NetworkTimeoutError' as const;
    readonly kind = 'NetworkTimeout' as const;
    readonly method: string;
    readonly url: string;
    readonly timeoutMs: number;

    constructor(method: string, url: string, timeoutMs: number) {
        super(`${method} ${url} timed out after ${timeoutMs}ms`);
        this.method = method;
        this.url = url;
        this.timeoutMs = timeoutMs;
        Object.setPrototypeOf(this, NetworkTimeoutError.prototype);
    }
}

/**
 * Network error - no response was received (connection refused, reset, DNS)
 */
export class NetworkError extends Error implements RequestError {
    readonly name = 'NetworkError' as const;
    readonly kind = 'Network' as const;
    readonly method: string;
    readonly url: string;
    readonly originalError: Error | null;

    constructor(method: string, url: string, originalError: Error | null = null) {
        super(`${method} ${url} failed: ${originalError?.message ?? 'no response'}`);
        this.method = method;
        this.url = url;
        this.originalError = originalError;
        Object.setPrototypeOf(this, NetworkError.prototype);
    }
}

/**
 * Error carrying an HTTP response the API sent back
 */
abstract class ResponseError extends Error implements RequestError {
    abstract readonly kind: RequestFailureKind;
    readonly method: string;
    readonly url: string;
    readonly status: number;
    readonly body: unknown;

    constructor(message: string, method: string, url: string, status: number, body: unknown) {
        super(message);
        this.method = method;
        this.url = url;
        this.status = status;
        this.body = body;
    }
}

/**
 * Server error (5xx) - the same request may succeed on resubmission
 */
export class RetriableServerError extends ResponseError {
    readonly name = 'RetriableServerError' as const;
    readonly kind = 'RetriableServerError' as const;

    constructor(method: string, url: string, status: number, body: unknown) {
        super(`${method} ${url} returned ${status}`, method, url, status, body);
        Object.setPrototypeOf(this, RetriableServerError.prototype);
    }
}

/**
 * Client error (4xx other than a duplicate conflict) - never retried
 *
 * @example
 * throw new ClientError('POST', url, 422, { message: 'name is required' });
 */
export class ClientError extends ResponseError {
    readonly name = 'ClientError' as const;
    readonly kind = 'ClientError' as const;

    constructor(method: string, url: string, status: number, body: unknown) {
        super(`${method} ${url} returned ${status}: ${describeBody(body)}`, method, url, status, body);
        Object.setPrototypeOf(this, ClientError.prototype);
    }
}

/**
 * Duplicate conflict - a create hit an existing resource. Drives the
 * PATCH fallback; only surfaced when the caller asked not to patch.
 */
export class DuplicateConflictError extends ResponseError {
    readonly name = 'DuplicateConflictError' as const;
    readonly kind = 'DuplicateConflict' as const;

    constructor(method: string, url: string, status: number, body: unknown) {
        super(`${method} ${url} conflicts with an existing resource`, method, url, status, body);
        Object.setPrototypeOf(this, DuplicateConflictError.prototype);
    }
}

/**
 * Configuration error - the config file or environment is unusable
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError' as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

/**
 * Input line that is not a Singer message
 */
export class MessageParseError extends Error {
    readonly name = 'MessageParseError' as const;
    readonly lineNumber: number;

    constructor(message: string, lineNumber: number) {
        super(`Line ${lineNumber}: ${message}`);
        this.lineNumber = lineNumber;
        Object.setPrototypeOf(this, MessageParseError.prototype);
    }
}

/**
 * RECORD message for a stream the target has no sink for
 */
export class UnsupportedStreamError extends Error {
    readonly name = 'UnsupportedStreamError' as const;
    readonly stream: string;

    constructor(stream: string, supported: readonly string[]) {
        super(`Unsupported stream: ${stream}. Supported streams are: ${supported.join(', ')}`);
        this.stream = stream;
        Object.setPrototypeOf(this, UnsupportedStreamError.prototype);
    }
}

/**
 * Type guard to check if an error came from a request to the partner API
 */
export function isRequestError(error: unknown): error is RequestError {
    return (
        error instanceof Error &&
        'kind' in error &&
        typeof error.kind === 'string' &&
        'url' in error
    );
}

function describeBody(body: unknown): string {
    if (typeof body === 'string') return body;
    if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
        return body.message;
    }
    return JSON.stringify(body) ?? 'empty body';
}
