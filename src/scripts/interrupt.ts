/**
 * SIGINT handling for the batch processing script
 */
import { logger } from '../observability/logger.js';

/** Exit code for a run ended by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

interface Stoppable {
    requestStop(): void;
}

/**
 * First interrupt asks the processor to stop at the next stage boundary;
 * a second one exits without waiting for in-flight stages.
 */
export function createInterruptHandler(processor: Stoppable, exit: (code: number) => void): () => void {
    let interrupts = 0;

    return () => {
        interrupts++;
        if (interrupts === 1) {
            logger.info('Interrupted, finishing in-flight stages (press Ctrl+C again to exit now)');
            processor.requestStop();
            return;
        }

        logger.warn('Interrupted again, exiting without waiting');
        exit(INTERRUPTED_EXIT_CODE);
    };
}
