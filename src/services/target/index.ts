export { TargetRunner } from './runner.js';
export type { TargetRunnerOptions, SyncSummary, StreamCounts, StateOutput } from './runner.js';
export { createSinks, getSink } from './sinks.js';
export type { RecordSink, SinkClient, SinkMap } from './sinks.js';
export { parseSingerMessage, singerMessageSchema } from './messages.js';
export type { SingerMessage, RecordMessage } from './messages.js';
