/**
 * Metrics endpoint - Prometheus format
 * GET /metrics
 */
import { FastifyInstance } from 'fastify';
import { getMetrics, getContentType, queueItems } from '../../observability/metrics.js';
import type { ServerDependencies } from '../index.js';

export async function metricsRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    fastify.get('/metrics', async (_request, reply) => {
        // Update queue depth metrics before returning
        const counts = deps.queue.counts();
        queueItems.labels('pending').set(counts.pending);
        queueItems.labels('active').set(counts.active);
        queueItems.labels('completed').set(counts.completed);
        queueItems.labels('failed').set(counts.failed);

        const metrics = await getMetrics();

        return reply
            .header('Content-Type', getContentType())
            .send(metrics);
    });
}
