/**
 * Storage module exports
 */
export {
    TranscriptStore,
    type VideoRecord,
    type VideoRecordInput,
    type SaveResult,
} from './database.js';
