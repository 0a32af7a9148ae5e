/**
 * Fastify server setup
 */
import Fastify, { FastifyInstance } from 'fastify';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { QueuePreconditionError } from '../queues/errors.js';
import type { QueueProcessor } from '../queues/processor.js';
import type { VideoQueue } from '../queues/video-queue.js';
import type { StageOperations } from '../pipeline/types.js';
import type { TranscriptStore } from '../storage/database.js';
import { healthRoutes } from './routes/health.js';
import { readyRoutes } from './routes/ready.js';
import { metricsRoutes } from './routes/metrics.js';
import { queueRoutes } from './routes/queue.js';
import { videoRoutes } from './routes/videos.js';

/**
 * Everything the routes operate on; built once by the entry point
 */
export type ServerDependencies = {
    queue: VideoQueue;
    processor: QueueProcessor;
    stages: StageOperations;
    store: TranscriptStore;
    workerLimit: number;
    audioDir: string;
};

let server: FastifyInstance | null = null;

/**
 * Create and configure Fastify server
 */
export function createServer(): FastifyInstance {
    const fastify = Fastify({
        logger: {
            level: config.logLevel,
        },
    });

    fastify.setErrorHandler(async (error, request, reply) => {
        if (error instanceof QueuePreconditionError) {
            return reply.status(400).send({ error: error.message });
        }
        if (error.validation) {
            return reply.status(400).send({ error: error.message });
        }

        logger.error('Unhandled route error', error, { url: request.url });
        return reply.status(500).send({ error: error.message });
    });

    return fastify;
}

/**
 * Register all routes
 */
export async function registerRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    await fastify.register(healthRoutes);
    await fastify.register(readyRoutes, deps);
    await fastify.register(metricsRoutes, deps);
    await fastify.register(queueRoutes, deps);
    await fastify.register(videoRoutes, deps);

    logger.info('Routes registered: /health, /ready, /metrics, /queue/*, /process, /videos');
}

/**
 * Start the server
 */
export async function startServer(deps: ServerDependencies): Promise<FastifyInstance> {
    server = createServer();
    await registerRoutes(server, deps);

    await server.listen({ port: config.port, host: config.host });
    logger.info(`Server listening on http://${config.host}:${config.port}`);

    return server;
}

/**
 * Stop the server
 */
export async function stopServer(): Promise<void> {
    if (server) {
        await server.close();
        server = null;
        logger.info('Server stopped');
    }
}

/**
 * Get the server instance
 */
export function getServer(): FastifyInstance | null {
    return server;
}
