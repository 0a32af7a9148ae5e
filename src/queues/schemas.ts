/**
 * Queue item and processing result type definitions
 */

export enum VideoStatus {
    PENDING = 'pending',
    DOWNLOADING = 'downloading',
    TRANSCRIBING = 'transcribing',
    SUMMARIZING = 'summarizing',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

export const ACTIVE_STATUSES: ReadonlySet<VideoStatus> = new Set([
    VideoStatus.DOWNLOADING,
    VideoStatus.TRANSCRIBING,
    VideoStatus.SUMMARIZING,
]);

export const DEFAULT_STEP = 'Waiting in queue...';

/**
 * A single video in the processing queue.
 * `error` is non-null exactly when `status` is FAILED.
 */
export interface QueueItem {
    readonly id: string;
    readonly url: string;
    readonly addedAt: Date;
    status: VideoStatus;
    progress: number;
    currentStep: string;
    error: string | null;
    title?: string;
    duration?: number;
}

/**
 * Shape delivered to progress observers and polled by the UI
 */
export interface ProgressEvent {
    id: string;
    status: VideoStatus;
    progress: number;
    currentStep: string;
    error: string | null;
    title: string | null;
    duration: number | null;
}

export interface QueueItemView extends ProgressEvent {
    url: string;
    addedAt: string;
}

export interface QueueCounts {
    total: number;
    completed: number;
    failed: number;
    pending: number;
    active: number;
}

export interface QueueSnapshot {
    items: QueueItemView[];
    isProcessing: boolean;
    activeWorkers: number;
    stats: QueueCounts;
}

/**
 * Aggregate result of one processing run
 */
export interface QueueTally {
    completed: number;
    failed: number;
    skipped: number;
    total: number;
}

export interface ProcessorStatus {
    isProcessing: boolean;
    activeWorkers: number;
    pendingCount: number;
    activeCount: number;
    completedCount: number;
    failedCount: number;
    totalCount: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

export function toProgressEvent(item: QueueItem): ProgressEvent {
    return {
        id: item.id,
        status: item.status,
        progress: item.progress,
        currentStep: item.currentStep,
        error: item.error,
        title: item.title ?? null,
        duration: item.duration ?? null,
    };
}

export function toItemView(item: QueueItem): QueueItemView {
    return {
        ...toProgressEvent(item),
        url: item.url,
        addedAt: item.addedAt.toISOString(),
    };
}
