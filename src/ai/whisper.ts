/**
 * Whisper Transcription Client
 * HTTP client for the Whisper ASR web service
 */
import { openAsBlob } from 'fs';
import { basename, join } from 'path';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { cleanupTempFile } from '../media/downloader.js';
import { splitAudio } from '../media/transcoder.js';

const SEGMENT_TIMEOUT_MS = 600000;

/**
 * Transcribe one audio file; returns plain text
 */
export async function transcribeFile(audioPath: string): Promise<string> {
    logger.info('Starting Whisper transcription', { audioPath });

    // File-backed blob; the segment is streamed into the request body
    const form = new FormData();
    form.append('audio_file', await openAsBlob(audioPath), basename(audioPath));

    const query = new URLSearchParams({
        task: 'transcribe',
        language: config.whisperLanguage,
        output: 'txt',
    });

    try {
        const response = await fetch(`${config.whisperApiUrl}/asr?${query.toString()}`, {
            method: 'POST',
            body: form,
            signal: AbortSignal.timeout(SEGMENT_TIMEOUT_MS),
        });

        if (!response.ok) {
            const errorText = await response.text();
            throw new Error(`Whisper API error: ${response.status} - ${errorText}`);
        }

        const text = (await response.text()).trim();

        logger.info('Whisper transcription complete', {
            audioPath,
            textLength: text.length,
        });

        return text;
    } catch (error) {
        logger.error('Whisper transcription failed', error, { audioPath });
        throw error;
    }
}

/**
 * Transcribe `<handle>.wav` in `audioDir` segment by segment.
 * Audio files are removed afterwards unless KEEP_AUDIO is set.
 */
export async function transcribeAudio(handle: string, audioDir: string): Promise<string> {
    const sourcePath = join(audioDir, `${handle}.wav`);
    const segmentPaths: string[] = [];

    try {
        const segments = await splitAudio(audioDir, handle, config.audioSegmentSeconds);
        segmentPaths.push(...segments.map((segment) => join(audioDir, segment.fileName)));

        const parts: string[] = [];
        for (const [index, segmentPath] of segmentPaths.entries()) {
            logger.info(`Transcribing segment ${index + 1}/${segmentPaths.length}`, { handle });
            parts.push(await transcribeFile(segmentPath));
        }

        return parts.filter((part) => part.length > 0).join(' ');
    } finally {
        for (const segmentPath of segmentPaths) {
            await cleanupTempFile(segmentPath);
        }
        if (!config.keepAudio) {
            await cleanupTempFile(sourcePath);
        }
    }
}

export const whisperClient = {
    transcribeFile,
    transcribeAudio,
};
