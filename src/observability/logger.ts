/**
 * Structured logger with correlation ID support
 */
import pino from 'pino';
import { config } from '../config/index.js';

// Create base logger
const baseLogger = pino({
    level: config.logLevel,
    base: {
        service: 'video-digest-service',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
    redact: ['openaiApiKey', '*.openaiApiKey'],
});

export type PipelineStage = 'metadata' | 'download' | 'transcribe' | 'summarize' | 'persist';

/**
 * Correlation fields. A run gets a `runId`; every item inside it adds `itemId`
 * and `url`, and stage timing adds `stage`.
 */
export interface LogContext {
    runId?: string;
    itemId?: string;
    requestId?: string;
    url?: string;
    stage?: PipelineStage;
}

export interface SerializedError {
    code: string;
    message: string;
    stack?: string;
    cause?: SerializedError | string;
}

/**
 * Message of a thrown value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function serializeError(error: Error): SerializedError {
    const serialized: SerializedError = {
        code: error.name,
        message: error.message,
        stack: error.stack,
    };

    if (error.cause !== undefined) {
        serialized.cause = error.cause instanceof Error ? serializeError(error.cause) : String(error.cause);
    }

    return serialized;
}

export class Logger {
    private logger: pino.Logger;

    constructor(context?: LogContext) {
        this.logger = context ? baseLogger.child(context) : baseLogger;
    }

    child(context: LogContext): Logger {
        const newLogger = new Logger();
        newLogger.logger = this.logger.child(context);
        return newLogger;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.logger.debug(data || {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.logger.info(data || {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.logger.warn(data || {}, message);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>): void {
        const errorData = error instanceof Error ? { error: serializeError(error) } : { error };
        this.logger.error({ ...errorData, ...data }, message);
    }
}

// Export singleton and factory
export const logger = new Logger();
export const createLogger = (context: LogContext) => new Logger(context);
