/**
 * Batch Processing Script
 * Runs a list of videos through the pipeline without the HTTP server
 */
import { readFile } from 'fs/promises';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { VideoQueue, QueueProcessor } from '../queues/index.js';
import { createStageOperations } from '../pipeline/stages.js';
import { TranscriptStore } from '../storage/index.js';
import { parseArgs, parseUrlList } from './batch-args.js';
import { createInterruptHandler } from './interrupt.js';

async function processBatch(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));

    const urls = args.urls.map((url) => url.trim()).filter((url) => url.length > 0);
    if (args.file) {
        urls.push(...parseUrlList(await readFile(args.file, 'utf-8')));
    }

    if (urls.length === 0) {
        console.log(`
Usage: npm run process -- --url <URL> [--url <URL> ...] [--file <path>] [--workers <n>]

Examples:
  npm run process -- --url "https://www.youtube.com/watch?v=<id>" --workers 2
  npm run process -- --file urls.txt
`);
        return 1;
    }

    const store = new TranscriptStore(config.dbPath);
    const queue = new VideoQueue();
    const processor = new QueueProcessor(queue, createStageOperations(store), { audioDir: config.audioDir });

    for (const url of urls) {
        queue.add(url);
    }

    process.on('SIGINT', createInterruptHandler(processor, (code) => process.exit(code)));

    try {
        const tally = await processor.processQueuePendingItems(
            queue,
            args.workers ?? config.queueMaxWorkers,
            (event) => {
                logger.info(event.currentStep, {
                    itemId: event.id,
                    status: event.status,
                    progress: event.progress,
                });
            }
        );

        console.log(`
Completed: ${tally.completed}
Failed:    ${tally.failed}
Skipped:   ${tally.skipped}
Total:     ${tally.total}
`);

        for (const item of queue.all()) {
            if (item.error) {
                console.log(`✗ ${item.url}: ${item.error}`);
            }
        }

        return tally.failed > 0 ? 1 : 0;
    } finally {
        store.close();
    }
}

// Run the script
processBatch()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        console.error('Batch failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    });
