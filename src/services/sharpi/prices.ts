import { isLosslessNumber } from 'lossless-json';
import { attributeNormalizer } from '../../utils/customAttributes.js';
import type { AttributeNormalizer } from '../../utils/customAttributes.js';
import type { ExistingResourceRef, PricePayload, SharpiClientContext, SyncRecord, UpsertResult } from './types.js';
import { idFromConflictBody, keySegment, pick, pickOr, stringOrNull } from './utils.js';

export const PRICES_ENDPOINT = 'prices';

/**
 * Map an upstream price row to the Sharpi price body. Monetary values are
 * sent as strings, with the digits they had in the input.
 */
export function buildPricePayload(record: SyncRecord, normalizer: AttributeNormalizer = attributeNormalizer): PricePayload {
    return {
        product_code: pick(record, 'product_code'),
        price_table_id: pick(record, 'price_table_id'),
        price: stringOrNull(record.price),
        max_allowed_discount: stringOrNull(record.max_allowed_discount),
        discount_type: pickOr(record, 'discount_type', 'percentage'),
        active: pickOr(record, 'active', true),
        custom_attributes: normalizer.normalize(record.custom_attributes),
    };
}

/**
 * A price is one product in one price table: the product code is the path,
 * the table goes in the query
 */
export function resolveExistingPrice(payload: PricePayload, conflictBody: unknown): ExistingResourceRef | null {
    const id = idFromConflictBody(conflictBody);
    if (id) return { path: `${PRICES_ENDPOINT}/${encodeURIComponent(id)}` };

    const productCode = keySegment(payload.product_code);
    if (!productCode) return null;

    const tableId = payload.price_table_id;
    if (typeof tableId === 'string' || typeof tableId === 'number') {
        return { path: `${PRICES_ENDPOINT}/${productCode}`, params: { price_table_id: tableId } };
    }
    if (isLosslessNumber(tableId)) {
        return { path: `${PRICES_ENDPOINT}/${productCode}`, params: { price_table_id: tableId.toString() } };
    }
    return { path: `${PRICES_ENDPOINT}/${productCode}` };
}

export async function upsertPrice(ctx: SharpiClientContext, record: SyncRecord): Promise<UpsertResult> {
    return ctx.upsert({
        endpoint: PRICES_ENDPOINT,
        payload: buildPricePayload(record, ctx.normalizer),
        resolveExisting: resolveExistingPrice,
    });
}
