/**
 * Shared event handler factory for capture progress events.
 *
 * Every command that captures pages (capture, batch) renders
 * CaptureProgressEvents the same way: the current activity goes to a spinner,
 * anything worth keeping in the scrollback goes to the log.
 */

import chalk from 'chalk';
import type {
    CaptureProgressEvent,
    CaptureState,
    CaptureVerboseEvent,
} from '@webkeep/capture';

/**
 * Options for creating a capture event handler
 */
export interface CaptureEventHandlerOptions {
    /** Receives lines that stay in the scrollback */
    log: (message: string) => void;
    /** Receives the current activity, typically a spinner's text */
    status?: (text: string) => void;
    /** Log every stored resource, not just failures (default: false) */
    logResources?: boolean;
}

/**
 * Activity shown while a capture is in each state
 */
export const STATE_LABELS: Record<CaptureState, string> = {
    init: 'Starting',
    'policy-check': 'Checking robots.txt',
    fetching: 'Fetching page',
    sanitizing: 'Sanitizing markup',
    'resource-discovery': 'Discovering resources',
    'resource-fetch': 'Downloading resources',
    rewriting: 'Rewriting references',
    persisting: 'Writing snapshot',
    thumbnail: 'Writing thumbnail',
    done: 'Done',
    failed: 'Failed',
};

/**
 * Shortens a URL for a log line, keeping its tail.
 */
export function formatUrlForLog(url: string, maxLength: number = 60): string {
    if (url.length <= maxLength) {
        return url;
    }
    return `...${url.slice(url.length - (maxLength - 3))}`;
}

function batchPrefix(event: { batchIndex?: number; batchTotal?: number }): string {
    if (event.batchIndex === undefined || event.batchTotal === undefined) {
        return '';
    }
    return chalk.gray(`[${event.batchIndex + 1}/${event.batchTotal}] `);
}

/**
 * Create an onProgress handler for WebsiteLibrary captures
 */
export function createCaptureProgressHandler(
    options: CaptureEventHandlerOptions,
): (event: CaptureProgressEvent) => void {
    const { log, status = () => {}, logResources = false } = options;

    return (event: CaptureProgressEvent) => {
        switch (event.type) {
            case 'state': {
                if (event.state !== 'done' && event.state !== 'failed') {
                    status(
                        `${batchPrefix(event)}${STATE_LABELS[event.state]}: ${formatUrlForLog(event.url)}`,
                    );
                }
                break;
            }

            case 'render-timeout': {
                const seconds = (event.timeoutMs / 1000).toFixed(1);
                log(
                    `${chalk.yellow('⏳')} ${event.engine} gave up waiting after ${seconds}s, keeping what loaded: ${formatUrlForLog(event.url)}`,
                );
                break;
            }

            case 'resource-progress': {
                status(
                    `${batchPrefix(event)}Downloading resources ${event.completed}/${event.total}`,
                );
                // Failures arrive as warnings through the verbose handler
                if (event.status === 'saved' && logResources) {
                    log(`${chalk.green('✓')} ${event.kind}: ${event.localPath ?? event.resourceUrl}`);
                }
                break;
            }

            case 'batch-item': {
                const prefix = batchPrefix(event);
                const shortUrl = formatUrlForLog(event.url);
                if (event.status === 'succeeded') {
                    log(`${prefix}${chalk.green('✓')} ${shortUrl}`);
                } else if (event.status === 'failed') {
                    log(
                        `${prefix}${chalk.red('✗')} ${shortUrl}${event.error ? ` - ${event.error}` : ''}`,
                    );
                }
                break;
            }
        }
    };
}

/**
 * Create an onVerbose handler
 *
 * @param log - Line sink, usually {@link SpinnerRegistry.safeLog}
 * @param verboseMode - If true, show all log levels; if false, only show warn/error
 */
export function createVerboseHandler(
    log: (message: string) => void,
    verboseMode: boolean = true,
): (event: CaptureVerboseEvent) => void {
    return (event) => {
        const { level } = event;

        // Always show warnings and errors; only show debug/info if verbose mode
        if (!verboseMode && level !== 'warn' && level !== 'error') {
            return;
        }

        let prefix: string;
        if (level === 'warn') {
            prefix = `[${chalk.yellow('⚠')} ${event.source}]`;
        } else if (level === 'error') {
            prefix = `[${chalk.red('✗')} ${event.source}]`;
        } else {
            prefix = `[${event.source}]`;
        }

        log(`${prefix} ${event.message}`);
    };
}
