/**
 * Resilience utilities - circuit breakers and stage time budgets
 */
import { CircuitBreaker, CircuitState, type CircuitBreakerConfig, type CircuitBreakerStats } from './circuit-breaker.js';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';

export type Dependency = 'youtube' | 'whisper' | 'openai' | 'database';

// Circuit breaker instances for each dependency
const circuitBreakers: Map<string, CircuitBreaker> = new Map();

function getDefaultConfig(): Omit<CircuitBreakerConfig, 'name'> {
    return {
        failureThreshold: config.cbFailureThreshold,
        resetTimeout: config.cbResetTimeoutMs,
        halfOpenRequests: config.cbHalfOpenRequests,
    };
}

/**
 * Get or create a circuit breaker for a dependency
 */
export function getCircuitBreaker(name: Dependency): CircuitBreaker {
    let cb = circuitBreakers.get(name);

    if (!cb) {
        cb = new CircuitBreaker({
            name,
            ...getDefaultConfig(),
        });
        circuitBreakers.set(name, cb);
        logger.debug(`Circuit breaker created: ${name}`, getDefaultConfig());
    }

    return cb;
}

export function getAllCircuitStats(): CircuitBreakerStats[] {
    return [...circuitBreakers.values()].map((cb) => cb.getStats());
}

export function hasOpenCircuit(): boolean {
    for (const cb of circuitBreakers.values()) {
        if (cb.getState() === CircuitState.OPEN) {
            return true;
        }
    }
    return false;
}

export function resetAllCircuits(): void {
    for (const [name, cb] of circuitBreakers) {
        cb.reset();
        logger.info(`Circuit breaker reset: ${name}`);
    }
}

/**
 * Raised when a stage call outlives its time budget. The underlying call is
 * not cancelled; its eventual result is discarded.
 */
export class StageTimeoutError extends Error {
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'StageTimeoutError';
    }
}

export function withTimeout<T>(label: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(new StageTimeoutError(label, timeoutMs)), timeoutMs);

        Promise.resolve().then(fn).then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

/**
 * Execute with circuit breaker protection and a time budget
 */
export async function withCircuitBreaker<T>(
    name: Dependency,
    fn: () => Promise<T>,
    timeoutMs: number = config.stageTimeoutMs
): Promise<T> {
    const cb = getCircuitBreaker(name);
    return cb.execute(() => withTimeout(name, timeoutMs, fn));
}

export { CircuitBreaker, CircuitState };
export type { CircuitBreakerConfig, CircuitBreakerStats };
