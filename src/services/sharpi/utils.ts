import { isLosslessNumber, stringify } from 'lossless-json';
import { isPlainObject } from '../../utils/customAttributes.js';
import type { SyncRecord } from './types.js';

/**
 * Field value, null when the record lacks it
 */
export function pick(record: SyncRecord, key: string): unknown {
    return record[key] ?? null;
}

/**
 * Field value, `fallback` only when the field is absent. An explicit null
 * is kept.
 */
export function pickOr(record: SyncRecord, key: string, fallback: unknown): unknown {
    return record[key] === undefined ? fallback : record[key];
}

/**
 * Nested object field; anything that is not an object reads as empty
 */
export function pickObject(record: SyncRecord, key: string): SyncRecord {
    const value = record[key];
    return isPlainObject(value) ? value : {};
}

/**
 * Decimal fields travel as strings. A lossless number keeps the exact
 * digits it had in the input line.
 */
export function stringOrNull(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value;
    if (isLosslessNumber(value)) return value.toString();
    if (typeof value === 'object') return stringify(value) ?? null;
    return String(value);
}

/**
 * Identifier the API echoes back in a conflict response, if any
 */
export function idFromConflictBody(body: unknown): string | null {
    if (!isPlainObject(body)) return null;
    const id = body.id ?? body.existing_id;
    if (typeof id === 'string' && id !== '') return id;
    if (typeof id === 'number') return String(id);
    return null;
}

/**
 * Natural key as a path segment; null when missing or empty
 */
export function keySegment(value: unknown): string | null {
    if (typeof value === 'number') return String(value);
    if (isLosslessNumber(value)) return encodeURIComponent(value.toString());
    if (typeof value === 'string' && value !== '') return encodeURIComponent(value);
    return null;
}
