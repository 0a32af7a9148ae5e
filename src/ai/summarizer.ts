/**
 * Transcript summarization with the OpenAI chat completions API
 */
import OpenAI from 'openai';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from '../config/index.js';
import { errorMessage, logger } from '../observability/logger.js';

const CHUNK_MAX_TOKENS = 2000;
const COMBINE_MAX_TOKENS = 3000;

const promptTemplateSchema = z.object({
    normal: z.object({
        role: z.literal('user').default('user'),
        content: z.string().min(1),
    }),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

export interface PromptMessage {
    role: 'user';
    content: string;
}

/**
 * Sends one prompt and resolves to the completion text
 */
export type ChatCompleter = (message: PromptMessage, maxTokens: number) => Promise<string>;

export const DEFAULT_PROMPT_TEMPLATE: PromptTemplate = {
    normal: {
        role: 'user',
        content: 'Please summarize this video transcript: {transcript}\n\nVideo URL: {url}',
    },
};

/**
 * Load the prompt template; falls back to the built-in one when the file is
 * missing or malformed
 */
export async function loadPromptTemplate(path: string = config.promptPath): Promise<PromptTemplate> {
    try {
        const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
        return promptTemplateSchema.parse(raw);
    } catch (error) {
        logger.warn('Could not load prompt template, using default', {
            path,
            error: errorMessage(error),
        });
        return DEFAULT_PROMPT_TEMPLATE;
    }
}

export function formatPrompt(template: PromptTemplate, transcript: string, url: string): PromptMessage {
    // Single pass so placeholders inside the transcript are left alone
    const content = template.normal.content.replace(/\{(transcript|url)\}/g, (_match, key: string) =>
        key === 'transcript' ? transcript : url
    );

    return { role: template.normal.role, content };
}

/**
 * Split a transcription into chunks under a rough token budget (1 token ≈ 4 chars)
 */
export function splitTranscription(transcription: string, maxTokens: number): string[] {
    const words = transcription.split(/\s+/).filter((word) => word.length > 0);
    const chunks: string[] = [];
    let current: string[] = [];
    let currentChars = 0;

    for (const word of words) {
        const currentTokens = Math.floor(currentChars / 4);

        if (current.length > 0 && currentTokens + Math.floor(word.length / 4) > maxTokens) {
            chunks.push(current.join(' '));
            current = [];
            currentChars = 0;
        }

        current.push(word);
        currentChars += word.length;
    }

    if (current.length > 0) {
        chunks.push(current.join(' '));
    }

    return chunks;
}

let defaultCompleter: ChatCompleter | null = null;

export function createOpenAICompleter(apiKey: string, model: string): ChatCompleter {
    const client = new OpenAI({ apiKey });

    return async (message, maxTokens) => {
        const completion = await client.chat.completions.create({
            model,
            messages: [message],
            temperature: 0.7,
            max_tokens: maxTokens,
        });

        const content = completion.choices[0]?.message?.content;
        if (!content) {
            throw new Error('OpenAI returned an empty completion');
        }
        return content;
    };
}

function getDefaultCompleter(): ChatCompleter {
    if (!config.openaiApiKey) {
        throw new Error('OPENAI_API_KEY environment variable not set');
    }
    if (!defaultCompleter) {
        defaultCompleter = createOpenAICompleter(config.openaiApiKey, config.openaiModel);
    }
    return defaultCompleter;
}

export interface SummaryOptions {
    complete?: ChatCompleter;
    template?: PromptTemplate;
    maxChunkTokens?: number;
}

/**
 * Summarize each chunk, then merge the partial summaries when there are several
 */
export async function generateSummary(
    transcription: string,
    url: string,
    options: SummaryOptions = {}
): Promise<string> {
    const complete = options.complete ?? getDefaultCompleter();
    const template = options.template ?? await loadPromptTemplate();
    const chunks = splitTranscription(transcription, options.maxChunkTokens ?? config.summaryChunkTokens);

    if (chunks.length === 0) {
        throw new Error('Cannot summarize an empty transcription');
    }

    logger.info(`Processing ${chunks.length} chunk(s) for summarization`, { url });

    const summaries: string[] = [];
    for (const [index, chunk] of chunks.entries()) {
        logger.debug(`Summarizing chunk ${index + 1}/${chunks.length}`, { url });
        summaries.push(await complete(formatPrompt(template, chunk, url), CHUNK_MAX_TOKENS));
    }

    if (summaries.length === 1) {
        return summaries[0];
    }

    logger.info('Combining partial summaries', { url, parts: summaries.length });
    return complete(
        {
            role: 'user',
            content: `Please create a cohesive summary from these partial summaries:\n\n${summaries.join('\n\n')}\n\nVideo URL: ${url}`,
        },
        COMBINE_MAX_TOKENS
    );
}

export const summarizer = {
    generateSummary,
    loadPromptTemplate,
    splitTranscription,
    formatPrompt,
};
