/**
 * AI module exports
 */
export {
    whisperClient,
    transcribeFile,
    transcribeAudio,
} from './whisper.js';

export {
    summarizer,
    generateSummary,
    loadPromptTemplate,
    splitTranscription,
    formatPrompt,
    createOpenAICompleter,
    DEFAULT_PROMPT_TEMPLATE,
    type ChatCompleter,
    type PromptMessage,
    type PromptTemplate,
} from './summarizer.js';
