/**
 * Single-video processing and stored transcript listing
 */
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { QueueProcessor } from '../../queues/processor.js';
import { VideoQueue } from '../../queues/video-queue.js';
import { VideoStatus, toItemView, type QueueItemView } from '../../queues/schemas.js';
import type { VideoRecord } from '../../storage/database.js';
import type { ServerDependencies } from '../index.js';

interface ProcessBody {
    url?: string;
}

interface ProcessResponse {
    success: boolean;
    item: QueueItemView;
    summary: string | null;
}

interface ErrorResponse {
    error: string;
    item?: QueueItemView;
}

interface VideosQuery {
    limit?: string;
}

interface VideosResponse {
    videos: VideoRecord[];
}

const limitSchema = z.coerce.number().int().min(1).max(500).default(50);

export async function videoRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    /**
     * Run one video through the pipeline and wait for the result
     * POST /process
     */
    fastify.post<{ Body: ProcessBody | undefined; Reply: ProcessResponse | ErrorResponse }>(
        '/process',
        async (request, reply) => {
            const rawUrl = request.body?.url;
            const url = typeof rawUrl === 'string' ? rawUrl.trim() : '';
            if (!url) {
                return reply.status(400).send({ error: 'No URL provided' });
            }

            // A private queue keeps this request out of the shared queue's run
            const queue = new VideoQueue();
            const processor = new QueueProcessor(queue, deps.stages, { audioDir: deps.audioDir });
            const item = queue.add(url);

            await processor.processQueuePendingItems(queue, 1);

            if (item.status !== VideoStatus.COMPLETED) {
                return reply.status(500).send({
                    error: item.error ?? 'Processing did not complete',
                    item: toItemView(item),
                });
            }

            const record = deps.store.getByUrl(url);
            return reply.send({
                success: true,
                item: toItemView(item),
                summary: record?.summary ?? null,
            });
        }
    );

    /**
     * Stored transcripts, most recent first
     * GET /videos?limit=
     */
    fastify.get<{ Querystring: VideosQuery; Reply: VideosResponse | ErrorResponse }>(
        '/videos',
        async (request, reply) => {
            const parsed = limitSchema.safeParse(request.query.limit);
            if (!parsed.success) {
                return reply.status(400).send({ error: 'limit must be an integer between 1 and 500' });
            }

            return reply.send({ videos: deps.store.listVideos(parsed.data) });
        }
    );
}
