/**
 * Production stage operations
 * yt-dlp for metadata and audio, Whisper for transcripts, OpenAI for summaries,
 * SQLite for storage. Each call runs under its dependency's circuit breaker and
 * the configured stage time budget.
 */
import { config } from '../config/index.js';
import { errorMessage, logger } from '../observability/logger.js';
import { downloader } from '../media/index.js';
import { summarizer, whisperClient } from '../ai/index.js';
import { withCircuitBreaker, withTimeout } from '../services/resilience.js';
import type { TranscriptStore } from '../storage/database.js';
import type { StageOperations, VideoMetadata } from './types.js';

interface RecordInfo {
    title: string;
    videoLength: number;
    channel: string;
}

/**
 * Title/channel for the stored record; defaults when yt-dlp cannot answer
 */
async function lookupRecordInfo(url: string): Promise<RecordInfo> {
    try {
        const info = await withTimeout('record info', config.stageTimeoutMs, () => downloader.fetchVideoInfo(url));
        return { title: info.title, videoLength: info.durationSeconds, channel: info.uploader };
    } catch (error) {
        logger.warn('Could not extract video info for record, using defaults', {
            url,
            error: errorMessage(error),
        });
        return { title: 'Unknown Title', videoLength: 0, channel: 'Unknown Channel' };
    }
}

export function createStageOperations(store: TranscriptStore): StageOperations {
    return {
        async fetchMetadata(url: string): Promise<VideoMetadata> {
            const info = await withCircuitBreaker('youtube', () => downloader.fetchVideoInfo(url));
            return { title: info.title, durationSeconds: info.durationSeconds };
        },

        async download(url: string, destDir: string): Promise<string> {
            // Reject malformed URLs before they count against the breaker
            downloader.extractVideoId(url);
            return withCircuitBreaker('youtube', () => downloader.downloadAudio(url, destDir));
        },

        transcribe(handle: string, destDir: string): Promise<string> {
            return withCircuitBreaker('whisper', () => whisperClient.transcribeAudio(handle, destDir));
        },

        summarize(text: string, url: string): Promise<string> {
            return withCircuitBreaker('openai', () => summarizer.generateSummary(text, url));
        },

        async persist(url: string, transcription: string, summary: string | null): Promise<void> {
            const info = await lookupRecordInfo(url);
            await withCircuitBreaker('database', async () => {
                store.saveTranscription({ url, transcription, summary, ...info });
            });
        },
    };
}
