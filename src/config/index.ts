/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { resolve } from 'path';
import { z } from 'zod';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const portSchema = z.coerce.number().int().min(1).max(65535);
const positiveIntSchema = z.coerce.number().int().positive();
const pathSchema = z.string().min(1).transform((p) => resolve(p));
const booleanFlagSchema = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default('false')
    .transform((v) => v === 'true' || v === '1' || v === 'yes');

// Configuration schema
const configSchema = z.object({
    // HTTP server
    host: z.string().min(1).default('0.0.0.0'),
    port: portSchema.default(5001),

    // Storage locations
    audioDir: pathSchema.default('./data/audio'),
    dbPath: pathSchema.default('./data/transcriptions.db'),

    // Queue processing
    queueMaxWorkers: positiveIntSchema.default(3),
    stageTimeoutMs: positiveIntSchema.default(30 * 60 * 1000),

    // Download / transcription
    ytDlpPath: z.string().min(1).default('yt-dlp'),
    whisperApiUrl: urlSchema.default('http://localhost:9000'),
    whisperLanguage: z.string().min(2).default('en'),
    audioSegmentSeconds: positiveIntSchema.default(1400),
    keepAudio: booleanFlagSchema,

    // Summarization
    openaiApiKey: z.string().nullable().default(null),
    openaiModel: z.string().min(1).default('gpt-4o-mini'),
    summaryChunkTokens: positiveIntSchema.default(100000),
    promptPath: pathSchema.default('./prompts/summary.json'),

    // Logging
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Circuit Breaker Tuning
    cbFailureThreshold: positiveIntSchema.default(5),
    cbResetTimeoutMs: positiveIntSchema.default(30000),
    cbHalfOpenRequests: positiveIntSchema.default(3),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(): Record<string, unknown> {
    return {
        host: process.env.HOST,
        port: process.env.PORT,

        audioDir: process.env.AUDIO_DIR,
        dbPath: process.env.DB_PATH,

        queueMaxWorkers: process.env.QUEUE_MAX_WORKERS,
        stageTimeoutMs: process.env.STAGE_TIMEOUT_MS,

        ytDlpPath: process.env.YTDLP_PATH,
        whisperApiUrl: process.env.WHISPER_API_URL,
        whisperLanguage: process.env.WHISPER_LANGUAGE,
        audioSegmentSeconds: process.env.AUDIO_SEGMENT_SECONDS,
        keepAudio: process.env.KEEP_AUDIO?.toLowerCase(),

        openaiApiKey: process.env.OPENAI_API_KEY || null,
        openaiModel: process.env.OPENAI_MODEL,
        summaryChunkTokens: process.env.SUMMARY_CHUNK_TOKENS,
        promptPath: process.env.PROMPT_PATH,

        logLevel: process.env.LOG_LEVEL,

        cbFailureThreshold: process.env.CB_FAILURE_THRESHOLD,
        cbResetTimeoutMs: process.env.CB_RESET_TIMEOUT_MS,
        cbHalfOpenRequests: process.env.CB_HALF_OPEN_REQUESTS,
    };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const rawConfig = mapEnvToConfig();

    const result = configSchema.safeParse(rawConfig);

    if (!result.success) {
        const errors = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            const envVar = pathToEnvVar(path);
            return `  - ${envVar}: ${issue.message}`;
        });

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(errors.join('\n'));
        console.error('\nSee .env.example for available settings.\n');

        process.exit(1);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    if (path === 'ytDlpPath') {
        return 'YTDLP_PATH';
    }
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        host: cfg.host,
        port: cfg.port,
        audioDir: cfg.audioDir,
        dbPath: cfg.dbPath,
        queueMaxWorkers: cfg.queueMaxWorkers,
        stageTimeoutMs: cfg.stageTimeoutMs,
        whisperApiUrl: cfg.whisperApiUrl,
        whisperLanguage: cfg.whisperLanguage,
        audioSegmentSeconds: cfg.audioSegmentSeconds,
        keepAudio: cfg.keepAudio,
        openaiApiKey: cfg.openaiApiKey ? '[CONFIGURED]' : null,
        openaiModel: cfg.openaiModel,
        promptPath: cfg.promptPath,
        logLevel: cfg.logLevel,
    };
}

// Export singleton config
export const config = loadConfig();
