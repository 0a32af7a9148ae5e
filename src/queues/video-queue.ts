/**
 * In-memory video queue
 *
 * Pure bookkeeping: items are added and removed by the HTTP/CLI layer between
 * runs, and mutated in place by QueueProcessor during a run.
 */
import { v4 as uuid } from 'uuid';
import { ItemNotFailedError } from './errors.js';
import {
    ACTIVE_STATUSES,
    DEFAULT_STEP,
    VideoStatus,
    toItemView,
    type QueueCounts,
    type QueueItem,
    type QueueSnapshot,
} from './schemas.js';

export class VideoQueue {
    private items: QueueItem[] = [];

    isProcessing = false;
    activeWorkers = 0;

    add(url: string): QueueItem {
        const item: QueueItem = {
            id: uuid(),
            url,
            addedAt: new Date(),
            status: VideoStatus.PENDING,
            progress: 0,
            currentStep: DEFAULT_STEP,
            error: null,
        };
        this.items.push(item);
        return item;
    }

    remove(id: string): boolean {
        const index = this.items.findIndex((item) => item.id === id);
        if (index === -1) {
            return false;
        }
        this.items.splice(index, 1);
        return true;
    }

    clear(): void {
        this.items = [];
    }

    getById(id: string): QueueItem | undefined {
        return this.items.find((item) => item.id === id);
    }

    all(): QueueItem[] {
        return [...this.items];
    }

    /**
     * Pending items in insertion order. This order is the dispatch order.
     */
    pendingItems(): QueueItem[] {
        return this.items.filter((item) => item.status === VideoStatus.PENDING);
    }

    activeItems(): QueueItem[] {
        return this.items.filter((item) => ACTIVE_STATUSES.has(item.status));
    }

    /**
     * Put a failed item back in line for the next run
     */
    requeue(id: string): QueueItem | undefined {
        const item = this.getById(id);
        if (!item) {
            return undefined;
        }
        if (item.status !== VideoStatus.FAILED) {
            throw new ItemNotFailedError(id);
        }

        item.status = VideoStatus.PENDING;
        item.progress = 0;
        item.currentStep = DEFAULT_STEP;
        item.error = null;
        return item;
    }

    counts(): QueueCounts {
        const counts: QueueCounts = { total: this.items.length, completed: 0, failed: 0, pending: 0, active: 0 };

        for (const item of this.items) {
            if (item.status === VideoStatus.COMPLETED) {
                counts.completed++;
            } else if (item.status === VideoStatus.FAILED) {
                counts.failed++;
            } else if (item.status === VideoStatus.PENDING) {
                counts.pending++;
            } else {
                counts.active++;
            }
        }

        return counts;
    }

    toSnapshot(): QueueSnapshot {
        return {
            items: this.items.map(toItemView),
            isProcessing: this.isProcessing,
            activeWorkers: this.activeWorkers,
            stats: this.counts(),
        };
    }
}
