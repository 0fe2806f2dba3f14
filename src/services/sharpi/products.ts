import type { ExistingResourceRef, ProductPayload, SharpiClientContext, SyncRecord, UpsertResult } from './types.js';
import { idFromConflictBody, keySegment, pick, pickOr } from './utils.js';

export const PRODUCTS_ENDPOINT = 'products';

/**
 * Map an upstream product row to the Sharpi product body
 */
export function buildProductPayload(record: SyncRecord): ProductPayload {
    return {
        code: pick(record, 'code'),
        name: pick(record, 'name'),
        maker: pick(record, 'maker'),
        sku: pick(record, 'sku'),
        barcode: pick(record, 'barcode'),
        ncm: pick(record, 'ncm'),
        description: pick(record, 'description'),
        observation: pick(record, 'observation'),
        line: pick(record, 'line'),
        active: pickOr(record, 'active', true),
    };
}

/**
 * Products are addressed by their code
 */
export function resolveExistingProduct(payload: ProductPayload, conflictBody: unknown): ExistingResourceRef | null {
    const id = idFromConflictBody(conflictBody);
    if (id) return { path: `${PRODUCTS_ENDPOINT}/${encodeURIComponent(id)}` };

    const code = keySegment(payload.code);
    return code ? { path: `${PRODUCTS_ENDPOINT}/${code}` } : null;
}

export async function upsertProduct(ctx: SharpiClientContext, record: SyncRecord): Promise<UpsertResult> {
    return ctx.upsert({
        endpoint: PRODUCTS_ENDPOINT,
        payload: buildProductPayload(record),
        resolveExisting: resolveExistingProduct,
    });
}
