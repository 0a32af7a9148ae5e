/**
 * Health endpoint - liveness check
 * GET /health
 */
import { FastifyInstance } from 'fastify';

interface HealthResponse {
    status: 'healthy';
    service: string;
    uptimeSeconds: number;
    timestamp: string;
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
        return reply.send({
            status: 'healthy',
            service: 'video-digest-service',
            uptimeSeconds: Math.round(process.uptime()),
            timestamp: new Date().toISOString(),
        });
    });
}
