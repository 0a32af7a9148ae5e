/**
 * Whisper Client Tests
 * fetch and ffmpeg segmenting are replaced with in-process fakes
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { AudioSegment } from '../../src/media/transcoder.js';

const transcoder = vi.hoisted(() => ({
    splitAudio: vi.fn(async (_audioDir: string, _handle: string, _segmentSeconds: number): Promise<AudioSegment[]> => []),
}));

vi.mock('../../src/media/transcoder.js', () => ({
    splitAudio: transcoder.splitAudio,
}));

import { transcribeAudio, transcribeFile } from '../../src/ai/whisper.js';

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

function segment(index: number): AudioSegment {
    return {
        index,
        fileName: `video_abc_part${index}.wav`,
        startSeconds: index * 1400,
        durationSeconds: 1400,
    };
}

describe('Whisper client', () => {
    let dir: string;
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('transcript text'));

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'video-digest-'));
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await rm(dir, { recursive: true, force: true });
    });

    describe('transcribeFile', () => {
        it('should post the audio to the ASR endpoint and trim the text', async () => {
            const audioPath = join(dir, 'video_abc_part0.wav');
            await writeFile(audioPath, 'RIFF');
            fetchMock.mockResolvedValue(new Response('  hello world \n'));

            const text = await transcribeFile(audioPath);

            expect(text).toBe('hello world');
            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe('http://localhost:9000/asr?task=transcribe&language=en&output=txt');
            expect(init?.method).toBe('POST');
            const body = init?.body;
            expect(body).toBeInstanceOf(FormData);
            if (body instanceof FormData) {
                const file = body.get('audio_file');
                expect(file).toBeInstanceOf(Blob);
                if (file instanceof Blob) {
                    expect(file.size).toBe(4);
                    expect(await file.text()).toBe('RIFF');
                }
            }
        });

        it('should reject on a non-2xx response', async () => {
            const audioPath = join(dir, 'video_abc_part0.wav');
            await writeFile(audioPath, 'RIFF');
            fetchMock.mockResolvedValue(new Response('model not loaded', { status: 500 }));

            await expect(transcribeFile(audioPath)).rejects.toThrow('Whisper API error: 500 - model not loaded');
        });
    });

    describe('transcribeAudio', () => {
        it('should join segment texts and remove the audio files', async () => {
            await writeFile(join(dir, 'video_abc.wav'), 'RIFF');
            for (const index of [0, 1, 2]) {
                await writeFile(join(dir, segment(index).fileName), 'RIFF');
            }
            transcoder.splitAudio.mockResolvedValue([segment(0), segment(1), segment(2)]);
            fetchMock
                .mockResolvedValueOnce(new Response('first part'))
                .mockResolvedValueOnce(new Response('   '))
                .mockResolvedValueOnce(new Response('third part'));

            const text = await transcribeAudio('video_abc', dir);

            expect(text).toBe('first part third part');
            expect(transcoder.splitAudio).toHaveBeenCalledWith(dir, 'video_abc', 1400);
            expect(await exists(join(dir, 'video_abc.wav'))).toBe(false);
            expect(await exists(join(dir, 'video_abc_part1.wav'))).toBe(false);
        });

        it('should clean up every segment when one fails', async () => {
            await writeFile(join(dir, 'video_abc.wav'), 'RIFF');
            for (const index of [0, 1]) {
                await writeFile(join(dir, segment(index).fileName), 'RIFF');
            }
            transcoder.splitAudio.mockResolvedValue([segment(0), segment(1)]);
            fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));

            await expect(transcribeAudio('video_abc', dir)).rejects.toThrow('Whisper API error: 503 - busy');
            expect(await exists(join(dir, 'video_abc_part0.wav'))).toBe(false);
            expect(await exists(join(dir, 'video_abc_part1.wav'))).toBe(false);
            expect(await exists(join(dir, 'video_abc.wav'))).toBe(false);
        });
    });
});
