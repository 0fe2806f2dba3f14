/**
 * Sharpi Sync Configuration
 *
 * Defines the request budget and parsing rules used when pushing records
 * to the Sharpi partner API.
 *
 * TO CHANGE SHARPI SYNC SETTINGS:
 * Simply update the values below. Changes take effect on next run.
 */

// ============================================
// API SETTINGS
// ============================================

/**
 * Partner API root. Overridable through SHARPI_BASE_URL or the config file.
 */
export const SHARPI_DEFAULT_BASE_URL = 'https://api.sharpi.com.br/v1/partner';

/**
 * Per-call network timeout. Applies to each HTTP call, not to a whole record.
 */
export const SHARPI_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Streams the target accepts, mapped to the API resource each one feeds
 */
export const SHARPI_STREAMS = ['products', 'prices', 'clients'] as const;
export type SharpiStream = typeof SHARPI_STREAMS[number];

// ============================================
// RETRY BUDGET
// ============================================

/**
 * Total attempts per request, the first one included
 */
export const SHARPI_RETRY_MAX_ATTEMPTS = 3;

/**
 * Ceiling on time spent across all attempts of one request
 */
export const SHARPI_RETRY_MAX_ELAPSED_MS = 15_000;

/**
 * First backoff wait; every following wait doubles
 */
export const SHARPI_RETRY_BASE_DELAY_MS = 1_000;

// ============================================
// DUPLICATE HANDLING
// ============================================

/**
 * Marker the API puts in a 400 body when a unique constraint rejects a create
 */
export const SHARPI_DUPLICATE_MESSAGE_MARKER = 'duplicate key';

export const DUPLICATE_STRATEGIES = ['patch', 'skip'] as const;
export type DuplicateStrategy = typeof DUPLICATE_STRATEGIES[number];

// ============================================
// CUSTOM ATTRIBUTES
// ============================================

/**
 * Text values that mean "no attributes". Case-sensitive.
 */
export const NULL_ATTRIBUTE_TOKENS: ReadonlySet<string> = new Set(['', 'None', 'null']);

/**
 * Field name holding custom attributes on records and their sub-objects
 */
export const CUSTOM_ATTRIBUTES_FIELD = 'custom_attributes';
