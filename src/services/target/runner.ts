/**
 * Target runner
 *
 * Reads Singer messages one line at a time and pushes each RECORD to its
 * stream's sink before reading the next line. No batching, no concurrency:
 * a STATE message is only forwarded once every record before it is done.
 */

import { createInterface } from 'node:readline';
import { stringify } from 'lossless-json';
import { attributeNormalizer } from '../../utils/customAttributes.js';
import type { AttributeNormalizer } from '../../utils/customAttributes.js';
import { isRequestError } from '../../utils/errors.js';
import { targetLogger } from '../../utils/logger.js';
import type { SyncLogger } from '../../utils/logger.js';
import type { UpsertAction } from '../sharpi/index.js';
import { parseSingerMessage } from './messages.js';
import type { RecordMessage } from './messages.js';
import { createSinks, getSink } from './sinks.js';
import type { SinkClient, SinkMap } from './sinks.js';

/**
 * Where STATE lines go; process.stdout in production
 */
export interface StateOutput {
    write(chunk: string): unknown;
}

export interface TargetRunnerOptions {
    client: SinkClient;
    normalizer?: AttributeNormalizer;
    /** Re-throw the first record failure instead of counting it and moving on */
    failFast?: boolean;
    logger?: SyncLogger;
    output?: StateOutput;
}

export type StreamCounts = Record<UpsertAction | 'failed', number>;

export interface SyncSummary {
    records: number;
    failed: number;
    streams: Record<string, StreamCounts>;
    lastState: unknown;
}

function emptyCounts(): StreamCounts {
    return { created: 0, updated: 0, skipped: 0, failed: 0 };
}

export class TargetRunner {
    private readonly sinks: SinkMap;
    private readonly normalizer: AttributeNormalizer;
    private readonly failFast: boolean;
    private readonly logger: SyncLogger;
    private readonly output: StateOutput;

    private records = 0;
    private failed = 0;
    private readonly streams: Record<string, StreamCounts> = {};
    private lastState: unknown = null;

    constructor(options: TargetRunnerOptions) {
        this.sinks = createSinks(options.client);
        this.normalizer = options.normalizer ?? attributeNormalizer;
        this.failFast = options.failFast ?? true;
        this.logger = options.logger ?? targetLogger;
        this.output = options.output ?? process.stdout;
    }

    /**
     * Consume the whole input. Resolves with the summary, or rejects with
     * the first input error (and the first record failure under failFast).
     */
    async run(input: NodeJS.ReadableStream): Promise<SyncSummary> {
        const lines = createInterface({ input, crlfDelay: Infinity });
        let lineNumber = 0;

        try {
            for await (const line of lines) {
                lineNumber++;
                await this.processLine(line, lineNumber);
            }
        } finally {
            lines.close();
        }

        const summary = this.getSummary();
        this.logger.info({ records: summary.records, failed: summary.failed, streams: summary.streams }, 'Sync finished');
        return summary;
    }

    async processLine(line: string, lineNumber: number): Promise<void> {
        if (line.trim() === '') return;

        const message = parseSingerMessage(line, lineNumber);
        switch (message.type) {
            case 'RECORD':
                await this.processRecord(message);
                break;
            case 'STATE':
                this.emitState(message.value);
                break;
            case 'SCHEMA':
                this.logger.debug({ stream: message.stream, keyProperties: message.key_properties }, 'Schema received');
                break;
            case 'ACTIVATE_VERSION':
                this.logger.debug({ stream: message.stream, version: message.version }, 'Activate version received');
                break;
        }
    }

    private async processRecord(message: RecordMessage): Promise<void> {
        const sink = getSink(this.sinks, message.stream);
        let counts = this.streams[message.stream];
        if (!counts) {
            counts = emptyCounts();
            this.streams[message.stream] = counts;
        }
        this.records++;

        const record = this.normalizer.normalizeRecord(message.record);
        try {
            const result = await sink(record);
            counts[result.action]++;
        } catch (error: unknown) {
            counts.failed++;
            this.failed++;
            if (this.failFast) throw error;

            this.logger.error({
                stream: message.stream,
                kind: isRequestError(error) ? error.kind : 'unknown',
                error: error instanceof Error ? error.message : String(error),
            }, 'Record failed, continuing');
        }
    }

    private emitState(value: unknown): void {
        this.lastState = value;
        this.output.write(`${stringify({ type: 'STATE', value }) ?? ''}\n`);
    }

    getSummary(): SyncSummary {
        const streams: Record<string, StreamCounts> = {};
        for (const [stream, counts] of Object.entries(this.streams)) {
            streams[stream] = { ...counts };
        }
        return { records: this.records, failed: this.failed, streams, lastState: this.lastState };
    }
}
