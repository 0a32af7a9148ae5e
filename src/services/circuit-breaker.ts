/**
 * Circuit Breaker for external stage dependencies (yt-dlp, Whisper, OpenAI, SQLite)
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: too many consecutive failures, calls fail fast
 * - HALF_OPEN: a limited number of trial calls decide whether to close again
 */
import { logger } from '../observability/logger.js';
import { circuitState } from '../observability/metrics.js';

export enum CircuitState {
    CLOSED = 0,
    OPEN = 1,
    HALF_OPEN = 2,
}

export interface CircuitBreakerConfig {
    name: string;
    failureThreshold: number;      // Consecutive failures before opening
    resetTimeout: number;          // ms before a trial call is allowed
    halfOpenRequests: number;      // Successful trial calls needed to close
}

export interface CircuitBreakerStats {
    name: string;
    state: keyof typeof CircuitState;
    failureCount: number;
    lastFailureAt: string | null;
}

const DEFAULT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
    failureThreshold: 5,
    resetTimeout: 30000,
    halfOpenRequests: 3,
};

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private failureCount = 0;
    private successCount = 0;
    private lastFailureTime = 0;
    private halfOpenAttempts = 0;
    private readonly config: CircuitBreakerConfig;

    constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.updateMetrics();
    }

    /**
     * Execute a function with circuit breaker protection
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        this.refreshState();

        if (this.state === CircuitState.OPEN) {
            throw new CircuitOpenError(this.config.name);
        }

        if (this.state === CircuitState.HALF_OPEN) {
            if (this.halfOpenAttempts >= this.config.halfOpenRequests) {
                throw new CircuitOpenError(this.config.name);
            }
            this.halfOpenAttempts++;
        }

        try {
            const result = await fn();
            this.onSuccess();
            return result;
        } catch (error) {
            this.onFailure();
            throw error;
        }
    }

    getState(): CircuitState {
        this.refreshState();
        return this.state;
    }

    getStats(): CircuitBreakerStats {
        const state = this.getState();
        return {
            name: this.config.name,
            state: state === CircuitState.CLOSED ? 'CLOSED' : state === CircuitState.OPEN ? 'OPEN' : 'HALF_OPEN',
            failureCount: this.failureCount,
            lastFailureAt: this.lastFailureTime ? new Date(this.lastFailureTime).toISOString() : null,
        };
    }

    /**
     * Force the breaker closed
     */
    reset(): void {
        this.transitionTo(CircuitState.CLOSED);
    }

    private refreshState(): void {
        if (
            this.state === CircuitState.OPEN &&
            Date.now() - this.lastFailureTime >= this.config.resetTimeout
        ) {
            this.transitionTo(CircuitState.HALF_OPEN);
        }
    }

    private onSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.successCount++;
            if (this.successCount >= this.config.halfOpenRequests) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            this.failureCount = 0;
        }
    }

    private onFailure(): void {
        this.failureCount++;
        this.lastFailureTime = Date.now();

        if (this.state === CircuitState.HALF_OPEN) {
            this.transitionTo(CircuitState.OPEN);
        } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.config.failureThreshold) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(newState: CircuitState): void {
        const oldState = this.state;
        this.state = newState;

        if (newState === CircuitState.CLOSED) {
            this.failureCount = 0;
            this.successCount = 0;
            this.halfOpenAttempts = 0;
        } else if (newState === CircuitState.HALF_OPEN) {
            this.successCount = 0;
            this.halfOpenAttempts = 0;
        }

        if (oldState !== newState) {
            logger.info(`Circuit breaker ${this.config.name} transitioned`, {
                from: CircuitState[oldState],
                to: CircuitState[newState],
            });
        }

        this.updateMetrics();
    }

    private updateMetrics(): void {
        circuitState.labels(this.config.name).set(this.state);
    }
}

/**
 * Error thrown when circuit is open
 */
export class CircuitOpenError extends Error {
    constructor(circuitName: string) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitOpenError';
    }
}
