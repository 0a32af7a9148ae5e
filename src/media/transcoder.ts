/**
 * Media Transcoder
 * FFmpeg-based probing and segmenting of downloaded audio for transcription
 */
import ffmpeg from 'fluent-ffmpeg';
import { join } from 'path';
import { errorMessage, logger } from '../observability/logger.js';
import { cleanupTempFile } from './downloader.js';

export interface AudioSegment {
    index: number;
    fileName: string;
    startSeconds: number;
    durationSeconds: number;
}

/**
 * Get audio duration in seconds using ffprobe
 */
export function getAudioDuration(inputPath: string): Promise<number> {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(inputPath, (err, metadata) => {
            if (err) {
                reject(new Error(`ffprobe failed for ${inputPath}: ${errorMessage(err)}`));
                return;
            }

            resolve(metadata.format.duration || 0);
        });
    });
}

/**
 * Split a total duration into fixed-length segments; always at least one
 */
export function planSegments(handle: string, totalSeconds: number, segmentSeconds: number): AudioSegment[] {
    const count = Math.max(1, Math.ceil(totalSeconds / segmentSeconds));

    return Array.from({ length: count }, (_, index) => ({
        index,
        fileName: `${handle}_part${index}.wav`,
        startSeconds: index * segmentSeconds,
        durationSeconds: segmentSeconds,
    }));
}

/**
 * Extract one segment as 16-bit PCM, 16 kHz mono
 */
function extractSegment(inputPath: string, outputPath: string, segment: AudioSegment): Promise<void> {
    return new Promise((resolve, reject) => {
        ffmpeg(inputPath)
            .setStartTime(segment.startSeconds)
            .setDuration(segment.durationSeconds)
            .audioFrequency(16000)
            .audioChannels(1)
            .audioCodec('pcm_s16le')
            .outputOptions(['-y'])
            .output(outputPath)
            .on('start', (cmd: string) => {
                logger.debug('FFmpeg command', { cmd });
            })
            .on('end', () => resolve())
            .on('error', (err: Error) => {
                logger.error('FFmpeg segment error', err, { outputPath });
                reject(new Error(`ffmpeg failed to extract ${segment.fileName}: ${err.message}`));
            })
            .run();
    });
}

/**
 * Split `<handle>.wav` in `audioDir` into `<handle>_part<i>.wav` segments.
 * On failure the segments already written, and the partial one, are removed.
 */
export async function splitAudio(audioDir: string, handle: string, segmentSeconds: number): Promise<AudioSegment[]> {
    const inputPath = join(audioDir, `${handle}.wav`);
    const totalSeconds = await getAudioDuration(inputPath);
    const segments = planSegments(handle, totalSeconds, segmentSeconds);

    logger.info('Splitting audio', { handle, totalSeconds, segments: segments.length });

    const written: string[] = [];
    try {
        for (const segment of segments) {
            const outputPath = join(audioDir, segment.fileName);
            written.push(outputPath);
            await extractSegment(inputPath, outputPath, segment);
        }
    } catch (error) {
        for (const outputPath of written) {
            await cleanupTempFile(outputPath);
        }
        throw error;
    }

    return segments;
}
