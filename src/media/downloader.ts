/**
 * Media Downloader
 * Fetches video metadata and downloads audio from YouTube with yt-dlp
 */
import { spawn } from 'child_process';
import { access, mkdir, unlink } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { config } from '../config/index.js';
import { errorMessage, logger } from '../observability/logger.js';

export interface VideoInfo {
    title: string;
    durationSeconds: number;
    uploader: string;
    viewCount: number;
    uploadDate: string;
    webpageUrl: string | null;
}

const ytDlpInfoSchema = z.object({
    title: z.string().min(1).catch('Unknown Title'),
    duration: z.number().nonnegative().catch(0),
    uploader: z.string().min(1).catch('Unknown'),
    view_count: z.number().int().nonnegative().catch(0),
    upload_date: z.string().catch(''),
    webpage_url: z.string().url().nullable().catch(null),
});

interface ProcessOutput {
    stdout: string;
    stderr: string;
}

/**
 * Run yt-dlp and collect its output; rejects on a non-zero exit code
 */
function runYtDlp(args: string[]): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
        const proc = spawn(config.ytDlpPath, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';

        proc.stdout.on('data', (data: Buffer) => {
            stdout += data.toString();
        });

        proc.stderr.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        proc.on('close', (code) => {
            if (code !== 0) {
                reject(new Error(`yt-dlp exited with code ${code}: ${stderr.trim()}`));
                return;
            }
            resolve({ stdout, stderr });
        });

        proc.on('error', (error) => {
            logger.error('yt-dlp spawn error', error);
            reject(error);
        });
    });
}

/**
 * Parse the JSON document printed by `yt-dlp --dump-json`
 */
export function parseVideoInfo(stdout: string): VideoInfo {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout.trim());
    } catch {
        throw new Error('Failed to parse video info');
    }

    const parsed = ytDlpInfoSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error('Failed to parse video info');
    }

    const info = parsed.data;
    return {
        title: info.title,
        durationSeconds: Math.round(info.duration),
        uploader: info.uploader,
        viewCount: info.view_count,
        uploadDate: info.upload_date,
        webpageUrl: info.webpage_url,
    };
}

/**
 * Extract metadata without downloading the video
 */
export async function fetchVideoInfo(url: string): Promise<VideoInfo> {
    logger.info('Fetching video info', { url });

    let output: ProcessOutput;
    try {
        output = await runYtDlp(['--dump-json', '--no-warnings', '--no-playlist', url]);
    } catch (error) {
        const message = errorMessage(error);
        throw new Error(`Failed to fetch video info: ${message}`, { cause: error });
    }

    return parseVideoInfo(output.stdout);
}

/**
 * Extract the video ID from watch, short-link and shorts URLs
 */
export function extractVideoId(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new Error('Invalid YouTube URL');
    }

    const host = parsed.hostname.toLowerCase();

    if (host === 'youtu.be' || host.endsWith('.youtu.be')) {
        const id = parsed.pathname.split('/')[1];
        if (id) return id;
    } else if (host === 'youtube.com' || host.endsWith('.youtube.com')) {
        if (parsed.pathname.startsWith('/shorts/')) {
            const id = parsed.pathname.split('/')[2];
            if (id) return id;
        }
        const id = parsed.searchParams.get('v');
        if (id) return id;
    }

    throw new Error('Invalid YouTube URL');
}

// Names handed out to downloads that have not written their file yet
const reservedNames = new Set<string>();

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Pick `<base>` or the first free `<base>_<n>` for a .wav file in `dir`,
 * considering both files on disk and names reserved by running downloads
 */
export async function reserveAudioName(dir: string, base: string): Promise<string> {
    for (let n = 0; ; n++) {
        const name = n === 0 ? base : `${base}_${n}`;
        if (reservedNames.has(name)) continue;

        const taken = await fileExists(join(dir, `${name}.wav`));
        // Re-check: another download may have claimed the name while we awaited
        if (taken || reservedNames.has(name)) continue;

        reservedNames.add(name);
        return name;
    }
}

export function releaseAudioName(name: string): void {
    reservedNames.delete(name);
}

/**
 * Download audio as 16 kHz mono WAV. Resolves to the handle (file name
 * without extension) inside `audioDir`.
 */
export async function downloadAudio(url: string, audioDir: string): Promise<string> {
    const videoId = extractVideoId(url);
    await mkdir(audioDir, { recursive: true });

    const handle = await reserveAudioName(audioDir, `video_${videoId}`);
    const outputPath = join(audioDir, `${handle}.wav`);

    logger.info('Downloading audio', { url, outputPath });

    try {
        await runYtDlp([
            '--no-warnings',
            '--no-playlist',
            '-x',
            '--audio-format', 'wav',
            '--postprocessor-args', 'ffmpeg:-ar 16000 -ac 1',
            '--output', outputPath,
            url,
        ]);
    } catch (error) {
        const message = errorMessage(error);
        throw new Error(`Failed to download video: ${message}`, { cause: error });
    } finally {
        releaseAudioName(handle);
    }

    logger.info('Audio downloaded', { handle });
    return handle;
}

/**
 * Clean up temp file
 */
export async function cleanupTempFile(filePath: string): Promise<void> {
    try {
        await unlink(filePath);
        logger.debug('Cleaned up temp file', { filePath });
    } catch (error) {
        logger.warn('Failed to cleanup temp file', { filePath, error });
    }
}

export const downloader = {
    fetchVideoInfo,
    downloadAudio,
    extractVideoId,
    cleanupTempFile,
};
