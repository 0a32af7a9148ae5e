/**
 * Queue Processor - runs pending queue items through the stage pipeline
 *
 * Stages:
 * 0. Fetch video info (best effort)
 * 1. Download (5-25%)
 * 2. Transcribe (30-75%)
 * 3. Summarize (80-95%)
 * 4. Save to database (98-100%)
 *
 * Items run on a bounded pool of async workers. A stage failure fails only its
 * item; a stop request is honoured at the next stage boundary.
 */
import { v4 as uuid } from 'uuid';
import { errorMessage, logger, createLogger, type Logger, type PipelineStage } from '../observability/logger.js';
import {
    activeWorkers as activeWorkersGauge,
    itemsTotal,
    progressCallbackErrors,
    runsTotal,
    stageDuration,
    stageFailures,
} from '../observability/metrics.js';
import type { StageOperations } from '../pipeline/types.js';
import { InvalidWorkerLimitError, QueueBusyError } from './errors.js';
import {
    DEFAULT_STEP,
    VideoStatus,
    toProgressEvent,
    type ProcessorStatus,
    type ProgressListener,
    type QueueItem,
    type QueueTally,
} from './schemas.js';
import type { VideoQueue } from './video-queue.js';

type ItemOutcome = 'completed' | 'failed' | 'skipped';

export const STOPPED_STEP = 'Stopped; waiting in queue...';

export interface QueueProcessorOptions {
    /** Directory handed to download/transcribe */
    audioDir: string;
}

export class QueueProcessor {
    private stopRequested = false;
    private runningQueue: VideoQueue | null = null;
    private currentRun: Promise<QueueTally | null> | null = null;

    constructor(
        private readonly queue: VideoQueue,
        private readonly stages: StageOperations,
        private readonly options: QueueProcessorOptions
    ) { }

    /**
     * Process every pending item of `queue` with at most `workerLimit` in flight.
     *
     * Preconditions are checked synchronously and throw. The pending snapshot is
     * taken and `isProcessing` set before this returns, so a second call made right
     * after it sees the queue as busy.
     */
    processQueuePendingItems(
        queue: VideoQueue,
        workerLimit: number,
        onProgress?: ProgressListener
    ): Promise<QueueTally> {
        if (!Number.isInteger(workerLimit) || workerLimit < 1) {
            throw new InvalidWorkerLimitError(workerLimit);
        }
        // One run per processor, whichever queue it is on
        if (queue.isProcessing || this.runningQueue !== null) {
            throw new QueueBusyError();
        }

        const snapshot = queue.pendingItems();
        if (snapshot.length === 0) {
            logger.warn('No pending items in queue');
            return Promise.resolve({ completed: 0, failed: 0, skipped: 0, total: 0 });
        }

        queue.isProcessing = true;
        this.stopRequested = false;
        this.runningQueue = queue;

        return this.runSnapshot(queue, snapshot, workerLimit, onProgress);
    }

    /**
     * Start a run in the background. Completion is logged; await `waitForIdle()`
     * to observe it.
     */
    start(queue: VideoQueue, workerLimit: number, onProgress?: ProgressListener): void {
        const run = this.processQueuePendingItems(queue, workerLimit, onProgress);

        this.currentRun = run
            .then((tally): QueueTally | null => {
                logger.info('Queue processing complete', { ...tally });
                return tally;
            })
            .catch((error: unknown) => {
                logger.error('Error in queue processing', error);
                return null;
            })
            .finally(() => {
                this.currentRun = null;
            });
    }

    /**
     * Resolves with the tally of the background run in flight, or null when idle
     */
    async waitForIdle(): Promise<QueueTally | null> {
        return this.currentRun ?? null;
    }

    /**
     * Request a cooperative stop. In-flight stage calls are not interrupted.
     */
    requestStop(): void {
        logger.info('Stop requested');
        this.stopRequested = true;
    }

    isStopRequested(): boolean {
        return this.stopRequested;
    }

    status(): ProcessorStatus {
        const queue = this.runningQueue ?? this.queue;
        const counts = queue.counts();

        return {
            isProcessing: queue.isProcessing,
            activeWorkers: queue.activeWorkers,
            pendingCount: counts.pending,
            activeCount: counts.active,
            completedCount: counts.completed,
            failedCount: counts.failed,
            totalCount: counts.total,
        };
    }

    private async runSnapshot(
        queue: VideoQueue,
        snapshot: QueueItem[],
        workerLimit: number,
        onProgress: ProgressListener | undefined
    ): Promise<QueueTally> {
        const runLogger = createLogger({ runId: uuid() });
        const poolSize = Math.min(workerLimit, snapshot.length);
        const tally: QueueTally = { completed: 0, failed: 0, skipped: 0, total: snapshot.length };
        let cursor = 0;

        runLogger.info('Starting parallel queue processing', {
            items: snapshot.length,
            workers: poolSize,
        });

        // Only this loop touches activeWorkers; increments and decrements never interleave mid-update
        const worker = async (): Promise<void> => {
            while (cursor < snapshot.length) {
                const item = snapshot[cursor++];

                queue.activeWorkers++;
                activeWorkersGauge.set(queue.activeWorkers);
                try {
                    const outcome = await this.processItem(queue, item, runLogger, onProgress);
                    tally[outcome]++;
                    itemsTotal.labels(outcome).inc();
                } finally {
                    queue.activeWorkers--;
                    activeWorkersGauge.set(queue.activeWorkers);
                }
            }
        };

        try {
            await Promise.all(Array.from({ length: poolSize }, () => worker()));
        } finally {
            queue.isProcessing = false;
            queue.activeWorkers = 0;
            activeWorkersGauge.set(0);
            this.runningQueue = null;
        }

        runsTotal.labels(this.stopRequested ? 'stopped' : 'finished').inc();
        runLogger.info('Queue processing finished', { ...tally });

        return tally;
    }

    private async processItem(
        queue: VideoQueue,
        item: QueueItem,
        runLogger: Logger,
        onProgress: ProgressListener | undefined
    ): Promise<ItemOutcome> {
        const itemLogger = runLogger.child({ itemId: item.id, url: item.url });
        const notify = (): void => this.notify(item, itemLogger, onProgress);

        if (this.stopRequested) {
            itemLogger.info('Stop requested before start, leaving item pending');
            return 'skipped';
        }
        if (queue.getById(item.id) !== item || item.status !== VideoStatus.PENDING) {
            itemLogger.warn('Item left the queue or changed state after the run started, skipping');
            return 'skipped';
        }

        // A pending item with progress is a stopped item starting a new attempt
        if (item.progress !== 0) {
            item.progress = 0;
            item.currentStep = DEFAULT_STEP;
        }

        const update = (progress: number, step: string): void => {
            item.progress = Math.max(item.progress, progress);
            item.currentStep = step;
            notify();
        };

        const halted = (): boolean => {
            if (!this.stopRequested) {
                return false;
            }
            item.status = VideoStatus.PENDING;
            item.currentStep = STOPPED_STEP;
            notify();
            itemLogger.info('Stop requested, item returned to pending', { progress: item.progress });
            return true;
        };

        try {
            itemLogger.info('Starting processing');

            // STAGE 0: metadata, failures are not fatal
            try {
                update(1, 'Fetching video info...');
                const info = await this.runStage('metadata', itemLogger, () => this.stages.fetchMetadata(item.url));
                item.title = info.title;
                item.duration = info.durationSeconds;
                update(3, `Found: ${info.title}`);
            } catch (error) {
                itemLogger.warn('Could not fetch video info', {
                    error: errorMessage(error),
                });
            }

            if (halted()) return 'skipped';

            // STAGE 1: download
            item.status = VideoStatus.DOWNLOADING;
            update(5, 'Starting download...');
            const handle = await this.runStage('download', itemLogger, () =>
                this.stages.download(item.url, this.options.audioDir)
            );
            if (!item.title) {
                item.title = handle;
            }
            update(25, 'Download complete');

            if (halted()) return 'skipped';

            // STAGE 2: transcribe
            item.status = VideoStatus.TRANSCRIBING;
            update(30, 'Starting transcription...');
            const transcription = await this.runStage('transcribe', itemLogger, () =>
                this.stages.transcribe(handle, this.options.audioDir)
            );
            update(75, 'Transcription complete');

            if (halted()) return 'skipped';

            // STAGE 3: summarize
            item.status = VideoStatus.SUMMARIZING;
            update(80, 'Generating summary...');
            const summary = await this.runStage('summarize', itemLogger, () =>
                this.stages.summarize(transcription, item.url)
            );
            update(95, 'Summary complete');

            if (halted()) return 'skipped';

            // STAGE 4: persist
            update(98, 'Saving to database...');
            await this.runStage('persist', itemLogger, () =>
                this.stages.persist(item.url, transcription, summary)
            );

            item.status = VideoStatus.COMPLETED;
            item.progress = 100;
            item.currentStep = 'Complete!';
            notify();

            itemLogger.info('Successfully processed', { title: item.title });
            return 'completed';
        } catch (error) {
            const message = errorMessage(error);

            item.status = VideoStatus.FAILED;
            item.error = message;
            item.currentStep = `Failed: ${message.slice(0, 50)}`;
            notify();

            itemLogger.error('Failed to process item', error);
            return 'failed';
        }
    }

    private async runStage<T>(stage: PipelineStage, itemLogger: Logger, fn: () => Promise<T>): Promise<T> {
        const stageLogger = itemLogger.child({ stage });
        const endTimer = stageDuration.labels(stage).startTimer();

        stageLogger.debug('Stage started');
        try {
            const result = await fn();
            stageLogger.debug('Stage completed');
            return result;
        } catch (error) {
            stageFailures.labels(stage).inc();
            throw error;
        } finally {
            endTimer();
        }
    }

    private notify(item: QueueItem, itemLogger: Logger, onProgress: ProgressListener | undefined): void {
        if (!onProgress) {
            return;
        }

        const onCallbackError = (error: unknown): void => {
            progressCallbackErrors.inc();
            itemLogger.error('Error in progress callback', error);
        };

        try {
            const result: unknown = onProgress(toProgressEvent(item));
            if (result instanceof Promise) {
                result.catch(onCallbackError);
            }
        } catch (error) {
            onCallbackError(error);
        }
    }
}
