/**
 * SQLite transcript store
 * Upserts transcriptions and summaries by video URL
 */
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../observability/logger.js';

export interface VideoRecordInput {
    url: string;
    title: string;
    videoLength: number;
    channel: string;
    transcription: string;
    summary: string | null;
}

export interface VideoRecord extends VideoRecordInput {
    id: number;
    createdAt: string | null;
}

interface VideoRow {
    id: number;
    title: string | null;
    url: string;
    video_length: number | null;
    channel: string | null;
    transcription: string | null;
    summary: string | null;
    created_at: string | null;
}

interface ColumnInfo {
    name: string;
}

export type SaveResult = 'inserted' | 'updated';

function toRecord(row: VideoRow): VideoRecord {
    return {
        id: row.id,
        url: row.url,
        title: row.title ?? 'Unknown Title',
        videoLength: row.video_length ?? 0,
        channel: row.channel ?? 'Unknown Channel',
        transcription: row.transcription ?? '',
        summary: row.summary,
        createdAt: row.created_at,
    };
}

export class TranscriptStore {
    private readonly db: Database.Database;

    /**
     * Opens (creating if needed) the database at `dbPath`; ':memory:' is accepted
     */
    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.ensureSchema();
    }

    /**
     * Create the videos table and add columns missing from older databases
     */
    private ensureSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS videos (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                title TEXT,
                url TEXT,
                video_length INTEGER,
                channel TEXT,
                transcription TEXT,
                summary TEXT,
                created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
            )
        `);

        const columns = new Set(
            this.db.prepare<[], ColumnInfo>('PRAGMA table_info(videos)').all().map((column) => column.name)
        );

        if (!columns.has('summary')) {
            this.db.exec('ALTER TABLE videos ADD COLUMN summary TEXT');
            logger.info('Migrated videos table: added summary column');
        }
        if (!columns.has('created_at')) {
            // ALTER TABLE cannot default to CURRENT_TIMESTAMP
            this.db.exec('ALTER TABLE videos ADD COLUMN created_at TIMESTAMP');
            this.db.exec('UPDATE videos SET created_at = CURRENT_TIMESTAMP WHERE created_at IS NULL');
            logger.info('Migrated videos table: added created_at column');
        }

        this.db.exec('CREATE INDEX IF NOT EXISTS idx_videos_url ON videos(url)');
    }

    saveTranscription(input: VideoRecordInput): SaveResult {
        const findExisting = this.db.prepare<[string], { id: number }>('SELECT id FROM videos WHERE url = ?');
        const update = this.db.prepare<[string, string | null, string, number, string, string]>(`
            UPDATE videos
            SET transcription = ?, summary = ?, title = ?, video_length = ?, channel = ?
            WHERE url = ?
        `);
        const insert = this.db.prepare<[string, string, number, string, string, string | null]>(`
            INSERT INTO videos (title, url, video_length, channel, transcription, summary)
            VALUES (?, ?, ?, ?, ?, ?)
        `);

        const upsert = this.db.transaction((record: VideoRecordInput): SaveResult => {
            if (findExisting.get(record.url)) {
                update.run(
                    record.transcription,
                    record.summary,
                    record.title,
                    record.videoLength,
                    record.channel,
                    record.url
                );
                return 'updated';
            }

            insert.run(
                record.title,
                record.url,
                record.videoLength,
                record.channel,
                record.transcription,
                record.summary
            );
            return 'inserted';
        });

        const result = upsert(input);
        logger.info(result === 'updated' ? 'Updated existing video record' : 'Saved new video record', {
            url: input.url,
            title: input.title,
        });
        return result;
    }

    getByUrl(url: string): VideoRecord | undefined {
        const row = this.db
            .prepare<[string], VideoRow>('SELECT * FROM videos WHERE url = ? ORDER BY id DESC LIMIT 1')
            .get(url);
        return row ? toRecord(row) : undefined;
    }

    listVideos(limit = 50): VideoRecord[] {
        return this.db
            .prepare<[number], VideoRow>('SELECT * FROM videos ORDER BY created_at DESC, id DESC LIMIT ?')
            .all(limit)
            .map(toRecord);
    }

    ping(): boolean {
        try {
            this.db.prepare('SELECT 1').get();
            return true;
        } catch (error) {
            logger.debug('Database ping failed', { error });
            return false;
        }
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
            logger.info('Database connection closed');
        }
    }
}
