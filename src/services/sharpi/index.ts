// Export the class for typing purposes
export { SharpiClient, isDuplicateKeyConflict } from './client.js';

export { buildProductPayload, resolveExistingProduct, PRODUCTS_ENDPOINT } from './products.js';
export { buildPricePayload, resolveExistingPrice, PRICES_ENDPOINT } from './prices.js';
export { buildCustomerPayload, resolveExistingCustomer, CUSTOMERS_ENDPOINT } from './customers.js';

export type {
    SyncRecord,
    HttpMethod,
    QueryParams,
    SharpiRequest,
    SharpiResponse,
    ConflictPredicate,
    ExistingResourceRef,
    UpsertTarget,
    UpsertAction,
    UpsertResult,
    SharpiClientOptions,
    SharpiClientContext,
    ProductPayload,
    PricePayload,
    AddressPayload,
    CustomerPayload,
} from './types.js';
