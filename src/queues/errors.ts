/**
 * Caller misuse of the queue. Never recorded on an item.
 */
export class QueuePreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'QueuePreconditionError';
    }
}

export class QueueBusyError extends QueuePreconditionError {
    constructor() {
        super('Queue is already processing');
        this.name = 'QueueBusyError';
    }
}

export class InvalidWorkerLimitError extends QueuePreconditionError {
    constructor(workerLimit: number) {
        super(`Worker limit must be a positive integer, got ${workerLimit}`);
        this.name = 'InvalidWorkerLimitError';
    }
}

export class ItemNotFailedError extends QueuePreconditionError {
    constructor(itemId: string) {
        super(`Only failed items can be retried (item ${itemId})`);
        this.name = 'ItemNotFailedError';
    }
}
