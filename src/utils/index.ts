export { createLogger, generateCorrelationId } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer, shortHash } from './hash.js';

export {
    withRetry,
    sleep,
    isRetryableError,
    calculateBackoffDelay,
    getRetryOptions,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export { withTimeout } from './timeout.js';

export { StatfsStorageProbe, ensureDir, removeDir, fileSize } from './storage.js';
export type { IStorageProbe } from './storage.js';

export { PipelineEventEmitter, createEventEmitter } from './events.js';
export type { PipelineEvents } from './events.js';
