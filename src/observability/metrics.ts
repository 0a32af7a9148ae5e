/**
 * Prometheus metrics for the video digest service
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// QUEUE METRICS
// ============================================================================

/**
 * Counter: Items that finished a run, by terminal outcome
 */
export const itemsTotal = new client.Counter({
    name: 'video_digest_items_total',
    help: 'Queue items that finished processing, by outcome',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Gauge: Items currently mid-pipeline
 */
export const activeWorkers = new client.Gauge({
    name: 'video_digest_active_workers',
    help: 'Number of queue items currently being processed',
    registers: [registry],
});

/**
 * Gauge: Queue items by status (refreshed on scrape)
 */
export const queueItems = new client.Gauge({
    name: 'video_digest_queue_items',
    help: 'Current number of queue items by status',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Counter: Processing runs by outcome
 */
export const runsTotal = new client.Counter({
    name: 'video_digest_runs_total',
    help: 'Queue processing runs',
    labelNames: ['outcome'] as const,
    registers: [registry],
});

// ============================================================================
// PIPELINE METRICS
// ============================================================================

/**
 * Histogram: Stage duration in seconds
 */
export const stageDuration = new client.Histogram({
    name: 'video_digest_stage_duration_seconds',
    help: 'Pipeline stage duration in seconds',
    labelNames: ['stage'] as const,
    buckets: [0.5, 1, 5, 15, 30, 60, 120, 300, 600, 1800],
    registers: [registry],
});

/**
 * Counter: Stage failures
 */
export const stageFailures = new client.Counter({
    name: 'video_digest_stage_failures_total',
    help: 'Pipeline stage failures',
    labelNames: ['stage'] as const,
    registers: [registry],
});

/**
 * Counter: Progress observer exceptions
 */
export const progressCallbackErrors = new client.Counter({
    name: 'video_digest_progress_callback_errors_total',
    help: 'Exceptions thrown by progress observers',
    registers: [registry],
});

// ============================================================================
// CIRCUIT BREAKER METRICS
// ============================================================================

/**
 * Gauge: Circuit breaker state (0 = closed, 1 = open, 2 = half-open)
 */
export const circuitState = new client.Gauge({
    name: 'video_digest_circuit_state',
    help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Get content type for Prometheus
 */
export function getContentType(): string {
    return registry.contentType;
}
