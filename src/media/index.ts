/**
 * Media module exports
 */
export {
    downloader,
    fetchVideoInfo,
    downloadAudio,
    extractVideoId,
    parseVideoInfo,
    cleanupTempFile,
    type VideoInfo,
} from './downloader.js';

export {
    getAudioDuration,
    planSegments,
    splitAudio,
    type AudioSegment,
} from './transcoder.js';
