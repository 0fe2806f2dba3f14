import { SHARPI_STREAMS } from '../../config/sync/sharpi.js';
import type { SharpiStream } from '../../config/sync/sharpi.js';
import { UnsupportedStreamError } from '../../utils/errors.js';
import type { SharpiClient } from '../sharpi/index.js';
import type { SyncRecord, UpsertResult } from '../sharpi/index.js';

export type RecordSink = (record: SyncRecord) => Promise<UpsertResult>;

/**
 * The part of the client the sinks call; lets the runner be driven by a fake
 */
export type SinkClient = Pick<SharpiClient, 'upsertProduct' | 'upsertPrice' | 'upsertCustomer'>;

export type SinkMap = Record<SharpiStream, RecordSink>;

export function createSinks(client: SinkClient): SinkMap {
    return {
        products: (record) => client.upsertProduct(record),
        prices: (record) => client.upsertPrice(record),
        clients: (record) => client.upsertCustomer(record),
    };
}

function isSupportedStream(stream: string): stream is SharpiStream {
    return SHARPI_STREAMS.some(name => name === stream);
}

export function getSink(sinks: SinkMap, stream: string): RecordSink {
    if (!isSupportedStream(stream)) {
        throw new UnsupportedStreamError(stream, SHARPI_STREAMS);
    }
    return sinks[stream];
}
