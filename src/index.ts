/**
 * Video Digest Service - Main entry point
 *
 * Wires the shared video queue, the stage pipeline and the transcript store
 * together and exposes them over HTTP.
 */
import { config, getRedactedConfig } from './config/index.js';
import { logger } from './observability/logger.js';
import { VideoQueue, QueueProcessor } from './queues/index.js';
import { createStageOperations } from './pipeline/stages.js';
import { TranscriptStore } from './storage/index.js';
import { startServer, stopServer } from './server/index.js';

const store = new TranscriptStore(config.dbPath);
const queue = new VideoQueue();
const stages = createStageOperations(store);
const processor = new QueueProcessor(queue, stages, { audioDir: config.audioDir });

async function main(): Promise<void> {
    logger.info('Starting Video Digest Service...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        logger.info('Starting HTTP server...');
        await startServer({
            queue,
            processor,
            stages,
            store,
            workerLimit: config.queueMaxWorkers,
            audioDir: config.audioDir,
        });

        logger.info('Video Digest Service started successfully');
    } catch (error) {
        logger.error('Failed to start Video Digest Service', error);
        process.exit(1);
    }
}

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        // Let in-flight stages finish; remaining items stay pending
        processor.requestStop();
        const tally = await processor.waitForIdle();
        if (tally) {
            logger.info('Background run settled', { ...tally });
        }

        await stopServer();
        store.close();

        logger.info('Video Digest Service stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

// Start the service
void main();
