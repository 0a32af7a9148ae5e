/**
 * Queue module exports
 */
export { VideoQueue } from './video-queue.js';
export { QueueProcessor, STOPPED_STEP, type QueueProcessorOptions } from './processor.js';
export {
    QueuePreconditionError,
    QueueBusyError,
    InvalidWorkerLimitError,
    ItemNotFailedError,
} from './errors.js';

// Re-export schemas
export * from './schemas.js';
