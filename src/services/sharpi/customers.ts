import { attributeNormalizer } from '../../utils/customAttributes.js';
import type { AttributeNormalizer } from '../../utils/customAttributes.js';
import type {
    AddressPayload,
    CustomerPayload,
    ExistingResourceRef,
    SharpiClientContext,
    SyncRecord,
    UpsertResult,
} from './types.js';
import { idFromConflictBody, keySegment, pick, pickObject, pickOr } from './utils.js';

export const CUSTOMERS_ENDPOINT = 'customers';

function buildAddressPayload(address: SyncRecord, normalizer: AttributeNormalizer): AddressPayload {
    return {
        street: pick(address, 'street'),
        city: pick(address, 'city'),
        state: pick(address, 'state'),
        zip: pick(address, 'zip'),
        country: pick(address, 'country'),
        full_address: pick(address, 'full_address'),
        custom_attributes: normalizer.normalize(address.custom_attributes),
    };
}

/**
 * Map an upstream client row to the Sharpi customer body. A missing
 * address still produces the full address shape with null fields.
 */
export function buildCustomerPayload(
    record: SyncRecord,
    normalizer: AttributeNormalizer = attributeNormalizer
): CustomerPayload {
    return {
        code: pick(record, 'code'),
        name: pick(record, 'name'),
        legal_name: pick(record, 'legal_name'),
        email: pick(record, 'email'),
        billing_address: buildAddressPayload(pickObject(record, 'billing_address'), normalizer),
        shipping_address: buildAddressPayload(pickObject(record, 'shipping_address'), normalizer),
        tax_id: pick(record, 'tax_id'),
        active: pickOr(record, 'active', true),
        default_price_list_id: pick(record, 'default_price_list_id'),
        salesperson_ids: pickOr(record, 'salesperson_ids', []),
        custom_attributes: normalizer.normalize(record.custom_attributes),
    };
}

export function resolveExistingCustomer(payload: CustomerPayload, conflictBody: unknown): ExistingResourceRef | null {
    const id = idFromConflictBody(conflictBody);
    if (id) return { path: `${CUSTOMERS_ENDPOINT}/${encodeURIComponent(id)}` };

    const code = keySegment(payload.code);
    return code ? { path: `${CUSTOMERS_ENDPOINT}/${code}` } : null;
}

export async function upsertCustomer(ctx: SharpiClientContext, record: SyncRecord): Promise<UpsertResult> {
    return ctx.upsert({
        endpoint: CUSTOMERS_ENDPOINT,
        payload: buildCustomerPayload(record, ctx.normalizer),
        resolveExisting: resolveExistingCustomer,
    });
}
