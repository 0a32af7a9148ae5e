/**
 * Stage operations consumed by the queue processor
 */

export interface VideoMetadata {
    title: string;
    durationSeconds: number;
}

/**
 * The five pipeline stages. Each may reject independently; the processor
 * decides which rejections are fatal to an item.
 */
export interface StageOperations {
    fetchMetadata(url: string): Promise<VideoMetadata>;
    /** Resolves to a handle (file name without extension) inside destDir */
    download(url: string, destDir: string): Promise<string>;
    transcribe(handle: string, destDir: string): Promise<string>;
    summarize(text: string, url: string): Promise<string>;
    /** Upserts by url */
    persist(url: string, transcription: string, summary: string | null): Promise<void>;
}
