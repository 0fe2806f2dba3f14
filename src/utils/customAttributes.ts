/**
 * Custom attribute normalization
 *
 * Upstream systems hand over `custom_attributes` as a mapping, as a null
 * marker, or as the text dump of a mapping. The API only takes mappings,
 * so every such field is rewritten before a record is sent. Malformed text
 * degrades to an empty mapping and a debug line; it never fails the record.
 */

import { CUSTOM_ATTRIBUTES_FIELD, NULL_ATTRIBUTE_TOKENS } from '../config/sync/sharpi.js';
import { parseLiteral } from './literalParser.js';
import type { LiteralValue } from './literalParser.js';
import { attributesLogger } from './logger.js';
import type { SyncLogger } from './logger.js';

export type CustomAttributes = Record<string, unknown>;

export type LiteralParseFn = (text: string) => LiteralValue;

/**
 * Object literal or parsed JSON object; arrays and class instances
 * (dates, lossless numbers) are not
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Looks like a mapping literal: `{` first and `}` last, nothing trimmed
 */
function hasMappingDelimiters(text: string): boolean {
    return text.startsWith('{') && text.endsWith('}');
}

export class AttributeNormalizer {
    constructor(
        private readonly logger: SyncLogger = attributesLogger,
        private readonly parse: LiteralParseFn = parseLiteral
    ) {}

    /**
     * Turn any custom-attribute value into a mapping. Mappings are returned
     * as-is (same reference), so normalizing twice changes nothing.
     */
    normalize(value: unknown): CustomAttributes {
        if (isPlainObject(value)) return value;
        if (typeof value !== 'string') return {};
        if (NULL_ATTRIBUTE_TOKENS.has(value)) return {};

        // Cheap pre-check: text that cannot be a mapping never reaches the parser
        if (!hasMappingDelimiters(value)) return {};

        let parsed: LiteralValue;
        try {
            parsed = this.parse(value);
        } catch (error: unknown) {
            this.logger.debug(
                { value, error: error instanceof Error ? error.message : String(error) },
                'Could not parse custom attributes, using empty mapping'
            );
            return {};
        }

        return isPlainObject(parsed) ? parsed : {};
    }

    /**
     * Rewrite every `custom_attributes` field on the record and on any
     * object nested in it (addresses, arrays of objects). Mutates and
     * returns the record.
     */
    normalizeRecord(record: Record<string, unknown>): Record<string, unknown> {
        for (const [key, value] of Object.entries(record)) {
            if (key === CUSTOM_ATTRIBUTES_FIELD) {
                record[key] = this.normalize(value);
            } else {
                this.normalizeNested(value);
            }
        }
        return record;
    }

    private normalizeNested(value: unknown): void {
        if (Array.isArray(value)) {
            for (const item of value) this.normalizeNested(item);
        } else if (isPlainObject(value)) {
            this.normalizeRecord(value);
        }
    }
}

/**
 * Shared instance for payload builders and the runner
 */
export const attributeNormalizer = new AttributeNormalizer();
