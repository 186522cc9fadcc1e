/**
 * @webkeep/utils
 *
 * Shared utility functions for webkeep packages
 */

/**
 * The current version of webkeep
 *
 * Used for displaying version information in CLI and error messages.
 */
export const VERSION = '0.1.0';

/**
 * Converts a file path to use POSIX-style forward slashes.
 * Local references written into snapshot markup and stylesheets must use
 * forward slashes regardless of the host platform.
 *
 * @param filePath - The file path to normalize
 * @returns The path with all backslashes replaced with forward slashes
 */
export function toPosixPath(filePath: string): string {
    return filePath.replaceAll('\\', '/');
}

/**
 * Executes async functions concurrently with a limit, reporting progress
 * as each individual item completes (not waiting for the whole batch).
 *
 * Unlike Promise.all with batching, this uses a worker pool pattern that
 * immediately starts the next item when one completes, maximizing throughput.
 * At most `concurrency` calls of `fn` are pending at any instant.
 *
 * @param items - Array of items to process
 * @param concurrency - Maximum number of concurrent executions
 * @param fn - Async function to execute for each item
 * @param onItemComplete - Optional callback fired when each item completes
 * @returns Array of results in the same order as input items
 *
 * @example
 * ```ts
 * const results = await runConcurrent(
 *   urls,
 *   5,
 *   async (url) => fetch(url),
 *   (result, index, completed, total) => {
 *     console.log(`Completed ${completed}/${total}`);
 *   }
 * );
 * ```
 */
export async function runConcurrent<T, R>(
    items: T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (
        result: R,
        index: number,
        completed: number,
        total: number,
    ) => void,
): Promise<R[]> {
    if (items.length === 0) {
        return [];
    }

    const results: R[] = new Array(items.length);
    const total = items.length;
    let nextIndex = 0;
    let completedCount = 0;

    async function worker(): Promise<void> {
        while (nextIndex < items.length) {
            const index = nextIndex++;
            const item = items[index];
            const result = await fn(item, index);
            results[index] = result;
            completedCount++;
            onItemComplete?.(result, index, completedCount, total);
        }
    }

    // Start workers up to the concurrency limit (or item count if smaller)
    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function pad(value: number, width = 2): string {
    return value.toString().padStart(width, '0');
}

/**
 * Formats a date as a second-precision, sortable capture timestamp
 * (`YYYYMMDD_HHMMSS`, local time).
 */
export function formatCaptureTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

/**
 * Formats a date as a human readable save timestamp
 * (`YYYY-MM-DD HH:MM:SS`, local time).
 */
export function formatSaveDate(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

/**
 * Builds a snapshot directory name from a domain and a capture timestamp.
 *
 * Every character outside `[A-Za-z0-9_-]` becomes an underscore, so
 * `example.com:8080` and `20240101_000000` give
 * `example_com_8080_20240101_000000`.
 */
export function snapshotDirectoryName(domain: string, timestamp: string): string {
    const safeDomain = domain.replace(/[^A-Za-z0-9_-]/g, '_') || 'unknown_domain';
    return `${safeDomain}_${timestamp}`;
}

/**
 * Returns a message for any thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
