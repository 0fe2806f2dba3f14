/**
 * Sharpi partner API type definitions
 */

import type { AxiosAdapter } from 'axios';
import type { DuplicateStrategy } from '../../config/sync/sharpi.js';
import type { AttributeNormalizer, CustomAttributes } from '../../utils/customAttributes.js';
import type { SyncLogger } from '../../utils/logger.js';
import type { RetryPolicy, RetryRuntime } from '../../utils/retry.js';

/**
 * One input row as the upstream runtime delivers it
 */
export type SyncRecord = Record<string, unknown>;

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number>;

export interface SharpiRequest {
    method: HttpMethod;
    /** Path relative to the API root, e.g. `products` or `products/ABC-1` */
    path: string;
    body?: unknown;
    params?: QueryParams;
    /** Classify duplicate-resource responses as DuplicateConflictError */
    detectConflict?: boolean;
}

export interface SharpiResponse<T = unknown> {
    status: number;
    data: T;
    url: string;
}

/**
 * Decides whether a 4xx response means "this resource already exists"
 */
export type ConflictPredicate = (status: number, body: unknown) => boolean;

/**
 * Where to PATCH once a create hit an existing resource
 */
export interface ExistingResourceRef {
    path: string;
    params?: QueryParams;
}

export interface UpsertTarget<P> {
    endpoint: string;
    payload: P;
    /** Null when neither the conflict body nor the payload identifies the resource */
    resolveExisting: (payload: P, conflictBody: unknown) => ExistingResourceRef | null;
}

export type UpsertAction = 'created' | 'updated' | 'skipped';

export interface UpsertResult<T = unknown> {
    action: UpsertAction;
    status: number;
    data: T;
}

export interface SharpiClientOptions {
    apiKey: string;
    baseUrl?: string;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
    retryRuntime?: Partial<RetryRuntime>;
    isDuplicateConflict?: ConflictPredicate;
    duplicateStrategy?: DuplicateStrategy;
    logger?: SyncLogger;
    /** Applied to every custom-attribute field a payload carries */
    normalizer?: AttributeNormalizer;
    /** Transport override; the default is axios' own http adapter */
    adapter?: AxiosAdapter;
}

/**
 * What the resource modules need from the client
 */
export interface SharpiClientContext {
    request: <T = unknown>(req: SharpiRequest) => Promise<SharpiResponse<T>>;
    upsert: <P>(target: UpsertTarget<P>) => Promise<UpsertResult>;
    normalizer: AttributeNormalizer;
}

// ============================================
// PAYLOADS
// ============================================

export interface ProductPayload {
    code: unknown;
    name: unknown;
    maker: unknown;
    sku: unknown;
    barcode: unknown;
    ncm: unknown;
    description: unknown;
    observation: unknown;
    line: unknown;
    active: unknown;
}

export interface PricePayload {
    product_code: unknown;
    price_table_id: unknown;
    price: string | null;
    max_allowed_discount: string | null;
    discount_type: unknown;
    active: unknown;
    custom_attributes: CustomAttributes;
}

export interface AddressPayload {
    street: unknown;
    city: unknown;
    state: unknown;
    zip: unknown;
    country: unknown;
    full_address: unknown;
    custom_attributes: CustomAttributes;
}

export interface CustomerPayload {
    code: unknown;
    name: unknown;
    legal_name: unknown;
    email: unknown;
    billing_address: AddressPayload;
    shipping_address: AddressPayload;
    tax_id: unknown;
    active: unknown;
    default_price_list_id: unknown;
    salesperson_ids: unknown;
    custom_attributes: CustomAttributes;
}
