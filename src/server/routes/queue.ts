/**
 * Queue routes - manage the shared video queue and its background run
 */
import { FastifyInstance } from 'fastify';
import { errorMessage, logger } from '../../observability/logger.js';
import {
    toItemView,
    type ProcessorStatus,
    type QueueItemView,
    type QueueSnapshot,
} from '../../queues/schemas.js';
import type { ServerDependencies } from '../index.js';

interface AddBody {
    url?: string;
}

interface StartBody {
    workers?: number;
}

interface IdParams {
    id: string;
}

interface ErrorResponse {
    error: string;
}

interface ItemResponse {
    success: boolean;
    item: QueueItemView;
}

interface MessageResponse {
    success: boolean;
    message: string;
}

interface StartResponse extends MessageResponse {
    pendingCount: number;
}

export async function queueRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    const { queue, processor, stages } = deps;

    /**
     * Add a video to the queue
     * POST /queue/add
     */
    fastify.post<{ Body: AddBody | undefined; Reply: ItemResponse | ErrorResponse }>(
        '/queue/add',
        async (request, reply) => {
            const rawUrl = request.body?.url;
            const url = typeof rawUrl === 'string' ? rawUrl.trim() : '';
            if (!url) {
                return reply.status(400).send({ error: 'No URL provided' });
            }

            const item = queue.add(url);

            try {
                const info = await stages.fetchMetadata(url);
                item.title = info.title;
                item.duration = info.durationSeconds;
            } catch (error) {
                logger.warn('Could not fetch video info for queued item', {
                    url,
                    error: errorMessage(error),
                });
            }

            logger.info('Added video to queue', { itemId: item.id, url });
            return reply.send({ success: true, item: toItemView(item) });
        }
    );

    /**
     * All queue items plus counts
     * GET /queue/list
     */
    fastify.get<{ Reply: QueueSnapshot }>('/queue/list', async (_request, reply) => {
        return reply.send(queue.toSnapshot());
    });

    /**
     * Start processing pending items in the background
     * POST /queue/start
     */
    fastify.post<{ Body: StartBody | undefined; Reply: StartResponse | ErrorResponse }>(
        '/queue/start',
        async (request, reply) => {
            if (queue.isProcessing) {
                return reply.status(400).send({ error: 'Queue is already processing' });
            }

            const pendingCount = queue.pendingItems().length;
            if (pendingCount === 0) {
                return reply.status(400).send({ error: 'No pending items in queue' });
            }

            // Precondition errors thrown here reach the error handler as 400s
            processor.start(queue, request.body?.workers ?? deps.workerLimit);

            return reply.send({
                success: true,
                message: 'Queue processing started',
                pendingCount,
            });
        }
    );

    /**
     * Request a cooperative stop of the current run
     * POST /queue/stop
     */
    fastify.post<{ Reply: MessageResponse }>('/queue/stop', async (_request, reply) => {
        processor.requestStop();
        return reply.send({
            success: true,
            message: 'Queue will stop once in-flight stages finish',
        });
    });

    /**
     * GET /queue/status
     */
    fastify.get<{ Reply: ProcessorStatus }>('/queue/status', async (_request, reply) => {
        return reply.send(processor.status());
    });

    /**
     * DELETE /queue/remove/:id
     */
    fastify.delete<{ Params: IdParams; Reply: MessageResponse | ErrorResponse }>(
        '/queue/remove/:id',
        async (request, reply) => {
            if (queue.isProcessing) {
                return reply.status(400).send({ error: 'Cannot remove items while queue is processing' });
            }
            if (!queue.remove(request.params.id)) {
                return reply.status(404).send({ error: 'Item not found' });
            }

            return reply.send({ success: true, message: 'Item removed' });
        }
    );

    /**
     * POST /queue/clear
     */
    fastify.post<{ Reply: MessageResponse | ErrorResponse }>('/queue/clear', async (_request, reply) => {
        if (queue.isProcessing) {
            return reply.status(400).send({ error: 'Cannot clear queue while processing' });
        }

        queue.clear();
        return reply.send({ success: true, message: 'Queue cleared' });
    });

    /**
     * Put a failed item back to pending
     * POST /queue/retry/:id
     */
    fastify.post<{ Params: IdParams; Reply: ItemResponse | ErrorResponse }>(
        '/queue/retry/:id',
        async (request, reply) => {
            if (queue.isProcessing) {
                return reply.status(400).send({ error: 'Cannot retry items while queue is processing' });
            }

            const item = queue.requeue(request.params.id);
            if (!item) {
                return reply.status(404).send({ error: 'Item not found' });
            }

            return reply.send({ success: true, item: toItemView(item) });
        }
    );
}
