/**
 * Ready endpoint - readiness check with dependency status
 * GET /ready
 */
import { FastifyInstance } from 'fastify';
import { getAllCircuitStats, type CircuitBreakerStats } from '../../services/resilience.js';
import type { ServerDependencies } from '../index.js';

type DependencyStatus = 'connected' | 'disconnected';

interface ReadyResponse {
    status: 'ready' | 'not_ready';
    dependencies: {
        database: DependencyStatus;
    };
    circuits: CircuitBreakerStats[];
}

export async function readyRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    fastify.get<{ Reply: ReadyResponse }>('/ready', async (_request, reply) => {
        const databaseStatus: DependencyStatus = deps.store.ping() ? 'connected' : 'disconnected';

        // Open circuits are reported but do not block readiness; items fail individually
        const isReady = databaseStatus === 'connected';

        return reply.status(isReady ? 200 : 503).send({
            status: isReady ? 'ready' : 'not_ready',
            dependencies: {
                database: databaseStatus,
            },
            circuits: getAllCircuitStats(),
        });
    });
}
