import type { AxiosInstance, AxiosResponse } from 'axios';
import axios from 'axios';
import { stringify } from 'lossless-json';
import {
    SHARPI_DEFAULT_BASE_URL,
    SHARPI_DUPLICATE_MESSAGE_MARKER,
    SHARPI_REQUEST_TIMEOUT_MS,
} from '../../config/sync/sharpi.js';
import type { DuplicateStrategy } from '../../config/sync/sharpi.js';
import {
    ClientError,
    ConfigError,
    DuplicateConflictError,
    NetworkError,
    NetworkTimeoutError,
    RetriableServerError,
    isRequestError,
} from '../../utils/errors.js';
import { attributeNormalizer } from '../../utils/customAttributes.js';
import type { AttributeNormalizer } from '../../utils/customAttributes.js';
import { sharpiLogger } from '../../utils/logger.js';
import type { SyncLogger } from '../../utils/logger.js';
import { createRetryPolicy, retryWithBackoff } from '../../utils/retry.js';
import type { RetryPolicy, RetryRuntime } from '../../utils/retry.js';
import type {
    ConflictPredicate,
    HttpMethod,
    SharpiClientContext,
    SharpiClientOptions,
    SharpiRequest,
    SharpiResponse,
    SyncRecord,
    UpsertResult,
    UpsertTarget,
} from './types.js';

// Feature module imports
import * as productsFn from './products.js';
import * as pricesFn from './prices.js';
import * as customersFn from './customers.js';

/**
 * Default duplicate detection: 409, or the 400 the API sends when a
 * unique constraint rejects a create
 */
export const isDuplicateKeyConflict: ConflictPredicate = (status, body) => {
    if (status === 409) return true;
    if (status !== 400) return false;

    const message = typeof body === 'object' && body !== null && 'message' in body ? body.message : body;
    return typeof message === 'string' && message.includes(SHARPI_DUPLICATE_MESSAGE_MARKER);
};

/**
 * Sharpi partner API client
 *
 * Features:
 * - Fixed per-call timeout, enforced on wall-clock time
 * - Capped exponential backoff on 5xx, timeouts and dropped connections
 * - POST-then-PATCH upsert when a create hits an existing resource
 * - Request/response detail logged at debug only
 */
export class SharpiClient {
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;
    private readonly retryRuntime: Partial<RetryRuntime>;
    private readonly isDuplicateConflict: ConflictPredicate;
    private readonly duplicateStrategy: DuplicateStrategy;
    private readonly logger: SyncLogger;
    private readonly normalizer: AttributeNormalizer;

    constructor(options: SharpiClientOptions) {
        if (!options.apiKey) {
            throw new ConfigError('Sharpi API key is required');
        }

        this.baseUrl = (options.baseUrl ?? SHARPI_DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? SHARPI_REQUEST_TIMEOUT_MS;
        this.retryPolicy = options.retryPolicy ?? createRetryPolicy();
        this.retryRuntime = options.retryRuntime ?? {};
        this.isDuplicateConflict = options.isDuplicateConflict ?? isDuplicateKeyConflict;
        this.duplicateStrategy = options.duplicateStrategy ?? 'patch';
        this.logger = options.logger ?? sharpiLogger;
        this.normalizer = options.normalizer ?? attributeNormalizer;

        this.http = axios.create({
            baseURL: this.baseUrl,
            headers: {
                'Content-Type': 'application/json',
                'X-API-Key': options.apiKey,
            },
            timeout: this.timeoutMs,
            // Lossless numbers from the input keep their digits on the wire
            transformRequest: [(data: unknown) => (data === undefined ? data : stringify(data))],
            // Status classification happens in classifyResponse
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    getBaseUrl(): string {
        return this.baseUrl;
    }

    // ============================================
    // REQUEST EXECUTION
    // ============================================

    /**
     * Send one request with retry. Resolves with a 2xx response or rejects
     * with a classified error once retries are exhausted or not allowed.
     */
    async request<T = unknown>(req: SharpiRequest): Promise<SharpiResponse<T>> {
        return retryWithBackoff(
            () => this.send<T>(req),
            this.retryPolicy,
            {
                ...this.retryRuntime,
                onRetry: (state, waitMs) => {
                    const error = state.lastError;
                    this.logger.warn({
                        method: req.method,
                        path: req.path,
                        attempt: state.attempt,
                        maxAttempts: this.retryPolicy.maxAttempts,
                        waitMs,
                        kind: isRequestError(error) ? error.kind : 'unknown',
                        status: error instanceof RetriableServerError ? error.status : undefined,
                    }, 'Sharpi request failed, retrying');
                    this.retryRuntime.onRetry?.(state, waitMs);
                },
            }
        );
    }

    /**
     * Single attempt: no retry
     */
    private async send<T>(req: SharpiRequest): Promise<SharpiResponse<T>> {
        const url = this.http.getUri({ url: req.path, params: req.params });
        this.logger.debug({ method: req.method, url, body: req.body }, 'Sharpi request');

        // axios' own timeout is a socket idle timer; this one bounds the whole
        // call, whatever the transport does with the abort signal
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new NetworkTimeoutError(req.method, url, this.timeoutMs));
            }, this.timeoutMs);
        });

        let response: AxiosResponse<T>;
        try {
            response = await Promise.race([
                this.http.request<T>({
                    method: req.method,
                    url: req.path,
                    params: req.params,
                    data: req.body,
                    signal: controller.signal,
                }),
                deadline,
            ]);
        } catch (error: unknown) {
            throw this.classifyTransportError(error, req.method, url);
        } finally {
            clearTimeout(timer);
        }

        this.logger.debug({ method: req.method, url, status: response.status, body: response.data }, 'Sharpi response');
        return this.classifyResponse(req, url, response);
    }

    private classifyResponse<T>(req: SharpiRequest, url: string, response: AxiosResponse<T>): SharpiResponse<T> {
        const { status, data } = response;

        if (status >= 200 && status < 300) {
            return { status, data, url };
        }
        if (status >= 500) {
            throw new RetriableServerError(req.method, url, status, data);
        }
        if (req.detectConflict && this.isDuplicateConflict(status, data)) {
            throw new DuplicateConflictError(req.method, url, status, data);
        }
        throw new ClientError(req.method, url, status, data);
    }

    private classifyTransportError(error: unknown, method: HttpMethod, url: string): Error {
        if (error instanceof NetworkTimeoutError) {
            return error;
        }
        if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
            return new NetworkTimeoutError(method, url, this.timeoutMs);
        }
        return new NetworkError(method, url, error instanceof Error ? error : null);
    }

    // ============================================
    // UPSERT
    // ============================================

    /**
     * POST the payload; if the API reports the resource already exists,
     * PATCH it once (or skip it, per the duplicate strategy)
     */
    async upsert<P>(target: UpsertTarget<P>): Promise<UpsertResult> {
        try {
            const created = await this.request({
                method: 'POST',
                path: target.endpoint,
                body: target.payload,
                detectConflict: true,
            });
            return { action: 'created', status: created.status, data: created.data };
        } catch (error: unknown) {
            if (!(error instanceof DuplicateConflictError)) {
                throw error;
            }

            if (this.duplicateStrategy === 'skip') {
                this.logger.warn({ endpoint: target.endpoint, status: error.status }, 'Duplicate record skipped');
                return { action: 'skipped', status: error.status, data: error.body };
            }

            const existing = target.resolveExisting(target.payload, error.body);
            if (!existing) {
                this.logger.warn({ endpoint: target.endpoint }, 'Duplicate record has no identifier to update');
                throw error;
            }

            this.logger.debug({ endpoint: target.endpoint, path: existing.path }, 'Duplicate record, updating existing resource');
            const updated = await this.request({
                method: 'PATCH',
                path: existing.path,
                params: existing.params,
                body: target.payload,
            });
            return { action: 'updated', status: updated.status, data: updated.data };
        }
    }

    /**
     * Build the context object that resource modules need
     */
    private getContext(): SharpiClientContext {
        return {
            request: this.request.bind(this),
            upsert: this.upsert.bind(this),
            normalizer: this.normalizer,
        };
    }

    // ============================================
    // RESOURCES (delegate to resource modules)
    // ============================================

    async upsertProduct(record: SyncRecord): Promise<UpsertResult> {
        return productsFn.upsertProduct(this.getContext(), record);
    }

    async upsertPrice(record: SyncRecord): Promise<UpsertResult> {
        return pricesFn.upsertPrice(this.getContext(), record);
    }

    async upsertCustomer(record: SyncRecord): Promise<UpsertResult> {
        return customersFn.upsertCustomer(this.getContext(), record);
    }
}
