/**
 * Failure Scenario Tests
 * Tests circuit breaker behavior and how dependency failures surface on queue items
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker, CircuitState, CircuitOpenError } from '../../src/services/circuit-breaker.js';
import { withTimeout } from '../../src/services/resilience.js';
import { QueueProcessor } from '../../src/queues/processor.js';
import { VideoQueue } from '../../src/queues/video-queue.js';
import { VideoStatus } from '../../src/queues/schemas.js';
import { createFakeStages } from '../helpers/fake-stages.js';

const failingFn = async (): Promise<string> => { throw new Error('Fail'); };

describe('Circuit Breaker', () => {
    let circuitBreaker: CircuitBreaker;

    beforeEach(() => {
        circuitBreaker = new CircuitBreaker({
            name: 'test-circuit',
            failureThreshold: 3,
            resetTimeout: 100, // 100ms for fast tests
            halfOpenRequests: 2,
        });
    });

    async function forceOpen(): Promise<void> {
        for (let i = 0; i < 3; i++) {
            await circuitBreaker.execute(failingFn).catch(() => { });
        }
    }

    describe('State Transitions', () => {
        it('should start in CLOSED state', () => {
            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should open after failure threshold is reached', async () => {
            await forceOpen();

            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
        });

        it('should throw CircuitOpenError when circuit is open', async () => {
            await forceOpen();

            // Now expect fast-fail
            await expect(circuitBreaker.execute(async () => 'test'))
                .rejects.toThrow(CircuitOpenError);
        });

        it('should transition to HALF_OPEN after reset timeout', async () => {
            await forceOpen();
            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);

            // Wait for reset timeout
            await new Promise(resolve => setTimeout(resolve, 150));

            // getState should trigger transition to HALF_OPEN
            expect(circuitBreaker.getState()).toBe(CircuitState.HALF_OPEN);
        });

        it('should close after successful half-open requests', async () => {
            await forceOpen();
            await new Promise(resolve => setTimeout(resolve, 150));

            const successFn = async () => 'success';
            await circuitBreaker.execute(successFn);
            await circuitBreaker.execute(successFn);

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should reopen on failure during half-open', async () => {
            await forceOpen();
            await new Promise(resolve => setTimeout(resolve, 150));

            await circuitBreaker.execute(failingFn).catch(() => { });

            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
        });
    });

    describe('Success Path', () => {
        it('should reset failure count on success', async () => {
            const successFn = async () => 'success';

            // Fail twice (below threshold)
            await circuitBreaker.execute(failingFn).catch(() => { });
            await circuitBreaker.execute(failingFn).catch(() => { });

            // Succeed (should reset)
            await circuitBreaker.execute(successFn);

            // Fail twice more (should not trip)
            await circuitBreaker.execute(failingFn).catch(() => { });
            await circuitBreaker.execute(failingFn).catch(() => { });

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });
    });

    describe('getStats', () => {
        it('should report state by name', async () => {
            expect(circuitBreaker.getStats()).toEqual({
                name: 'test-circuit',
                state: 'CLOSED',
                failureCount: 0,
                lastFailureAt: null,
            });

            await forceOpen();
            const stats = circuitBreaker.getStats();

            expect(stats.state).toBe('OPEN');
            expect(stats.failureCount).toBe(3);
            expect(stats.lastFailureAt).not.toBeNull();
        });
    });

    describe('reset', () => {
        it('should force reset to CLOSED', async () => {
            await forceOpen();
            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);

            circuitBreaker.reset();

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
            expect(circuitBreaker.getStats().failureCount).toBe(0);
        });
    });
});

describe('Dependency failures during a run', () => {
    it('should fail remaining items fast once the download breaker opens', async () => {
        const youtube = new CircuitBreaker({ name: 'youtube', failureThreshold: 2, resetTimeout: 60000 });
        const stages = createFakeStages({
            download: () => youtube.execute(async (): Promise<string> => {
                throw new Error('yt-dlp exited with code 1: HTTP Error 429');
            }),
        });
        const queue = new VideoQueue();
        const processor = new QueueProcessor(queue, stages, { audioDir: '/tmp/video-digest-test' });
        queue.add('url-1');
        queue.add('url-2');
        queue.add('url-3');

        const tally = await processor.processQueuePendingItems(queue, 1);

        expect(tally).toEqual({ completed: 0, failed: 3, skipped: 0, total: 3 });
        expect(queue.all().map((item) => item.error)).toEqual([
            'yt-dlp exited with code 1: HTTP Error 429',
            'yt-dlp exited with code 1: HTTP Error 429',
            "Circuit breaker 'youtube' is open",
        ]);
    });

    it('should fail an item whose stage outlives its time budget', async () => {
        const stages = createFakeStages({
            transcribe: () => withTimeout('whisper', 20, () => new Promise<string>(() => { })),
        });
        const queue = new VideoQueue();
        const processor = new QueueProcessor(queue, stages, { audioDir: '/tmp/video-digest-test' });
        const item = queue.add('url-1');

        const tally = await processor.processQueuePendingItems(queue, 1);

        expect(tally.failed).toBe(1);
        expect(item.status).toBe(VideoStatus.FAILED);
        expect(item.error).toBe('whisper timed out after 20ms');
        expect(stages.summarize).not.toHaveBeenCalled();
    });
});
