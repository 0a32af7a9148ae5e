/**
 * Argument parsing for the batch processing script
 */

export interface BatchArgs {
    urls: string[];
    file?: string;
    workers?: number;
}

export function parseArgs(argv: string[]): BatchArgs {
    const result: BatchArgs = { urls: [] };

    for (let i = 0; i < argv.length; i++) {
        if (argv[i] === '--url' && argv[i + 1]) {
            result.urls.push(argv[i + 1]);
            i++;
        } else if (argv[i] === '--file' && argv[i + 1]) {
            result.file = argv[i + 1];
            i++;
        } else if (argv[i] === '--workers' && argv[i + 1]) {
            result.workers = Number(argv[i + 1]);
            i++;
        }
    }

    return result;
}

/**
 * One URL per line; blank lines and `#` comments are ignored
 */
export function parseUrlList(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}
