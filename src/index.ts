export { SharpiClient, isDuplicateKeyConflict } from './services/sharpi/index.js';
export type {
    SyncRecord,
    SharpiClientOptions,
    SharpiRequest,
    SharpiResponse,
    UpsertResult,
    ConflictPredicate,
} from './services/sharpi/index.js';

export { TargetRunner } from './services/target/index.js';
export type { SyncSummary, TargetRunnerOptions } from './services/target/index.js';

export { AttributeNormalizer } from './utils/customAttributes.js';
export type { CustomAttributes } from './utils/customAttributes.js';
export { parseLiteral, LiteralSyntaxError } from './utils/literalParser.js';
export type { LiteralValue } from './utils/literalParser.js';
export { createRetryPolicy, retryWithBackoff, isTransientFailure } from './utils/retry.js';
export type { RetryPolicy, RetryRuntime, RetryState } from './utils/retry.js';
export * from './utils/errors.js';

export { loadTargetConfig, parseTargetConfig } from './config/targetConfig.js';
export type { TargetConfig } from './config/targetConfig.js';
