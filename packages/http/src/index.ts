import { sleep } from '@webkeep/utils';

// ============================================================================
// SIGNAL UTILITIES
// ============================================================================

/**
 * Creates an AbortSignal that combines a timeout with an optional user signal.
 * If both are provided, the signal aborts when either triggers.
 *
 * @param timeout - Timeout in milliseconds
 * @param signal - Optional user-provided AbortSignal
 * @returns Combined AbortSignal, or undefined if neither provided
 */
export function createSignalWithTimeout(
    timeout?: number,
    signal?: AbortSignal,
): AbortSignal | undefined {
    if (!timeout && !signal) return undefined;
    if (!timeout) return signal;

    const timeoutSignal = AbortSignal.timeout(timeout);
    if (!signal) return timeoutSignal;

    // Combine both signals - abort when either fires
    return AbortSignal.any([signal, timeoutSignal]);
}

// ============================================================================
// HEADERS
// ============================================================================

/**
 * User agent sent by every request unless configured otherwise. Its product
 * token ("WebKeep") is also the agent name matched against robots.txt groups.
 */
export const DEFAULT_USER_AGENT = 'WebKeep/2.0';

/**
 * Builds the request headers for one fetch.
 */
export function buildRequestHeaders(
    userAgent: string = DEFAULT_USER_AGENT,
    accept: string = '*/*',
): Record<string, string> {
    return {
        'User-Agent': userAgent,
        Accept: accept,
        'Accept-Language': 'en-US,en;q=0.5',
    };
}

// ============================================================================
// ERRORS
// ============================================================================

/** Error codes that are considered transient and worth retrying */
const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'EPIPE',
    'ENOTFOUND', // DNS can be flaky
    'EAI_AGAIN', // DNS temporary failure
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

/** Default number of retry attempts for transient errors */
const DEFAULT_RETRY_ATTEMPTS = 2;

/** Delay between retry attempts in milliseconds */
const RETRY_DELAY_MS = 1000;

function codeOf(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function causeOf(error: Error): Error | undefined {
    return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * Extracts detailed error information from a fetch error.
 * Node.js fetch errors (via undici) wrap the actual cause in error.cause,
 * which can be nested multiple levels deep.
 */
export function getFetchErrorDetails(error: unknown): {
    message: string;
    code?: string;
    cause?: string;
    hint?: string;
} {
    if (!(error instanceof Error)) {
        return { message: String(error) };
    }

    // Build a chain of causes by walking error.cause
    const causes: string[] = [];
    let current: Error | undefined = error;
    let code: string | undefined;

    while (current) {
        code = code ?? codeOf(current);

        if (current.message && !causes.includes(current.message)) {
            causes.push(current.message);
        }

        current = causeOf(current);
    }

    let causeStr = causes.length > 1 ? causes.slice(1).join(' -> ') : undefined;
    if (code && causeStr) {
        causeStr = `[${code}] ${causeStr}`;
    } else if (code) {
        causeStr = `[${code}]`;
    }

    const fullText = causes.join(' ').toLowerCase();
    let hint: string | undefined;

    if (code === 'ENOTFOUND' || fullText.includes('getaddrinfo')) {
        hint =
            'DNS resolution failed. Check the URL spelling or your network connection.';
    } else if (code === 'ECONNREFUSED') {
        hint =
            'Connection refused. The server may be down or blocking connections.';
    } else if (code === 'ECONNRESET') {
        hint =
            'Connection reset by server. This may be a transient network issue.';
    } else if (
        code === 'ETIMEDOUT' ||
        error.name === 'TimeoutError' ||
        fullText.includes('timeout')
    ) {
        hint = 'Request timed out. The server may be slow or unresponsive.';
    } else if (
        code === 'CERT_HAS_EXPIRED' ||
        fullText.includes('certificate')
    ) {
        hint =
            'SSL certificate error. The site may have an expired or invalid certificate.';
    } else if (fullText.includes('socket hang up')) {
        hint =
            'Connection closed unexpectedly. The server may have dropped the connection.';
    }

    return {
        message: causes[0] || 'Unknown error',
        code,
        cause: causeStr,
        hint,
    };
}

/**
 * Custom error class for fetch failures with detailed information
 */
export class FetchError extends Error {
    readonly name = 'FetchError';
    public readonly url: string;
    public readonly code?: string;
    public readonly hint?: string;
    public readonly originalError: unknown;

    constructor(url: string, originalError: unknown) {
        const details = getFetchErrorDetails(originalError);

        let message = details.message;
        if (details.cause) {
            message += ` (${details.cause})`;
        }

        super(message);
        this.url = url;
        this.code = details.code;
        this.hint = details.hint;
        this.originalError = originalError;
    }

    /**
     * Returns a formatted error message suitable for display
     */
    format(verbose = false): string {
        let msg = `Failed to fetch ${this.url}: ${this.message}`;
        if (verbose && this.hint) {
            msg += `\n  Hint: ${this.hint}`;
        }
        return msg;
    }
}

/**
 * Error thrown when a response arrives with a non-success status.
 */
export class HttpStatusError extends Error {
    readonly name = 'HttpStatusError';

    constructor(
        public readonly url: string,
        public readonly status: number,
        public readonly statusText: string = '',
    ) {
        super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
    }
}

/**
 * Checks if an error is transient and worth retrying
 */
function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }

    let current: Error | undefined = error;
    while (current) {
        const code = codeOf(current);
        if (code && TRANSIENT_ERROR_CODES.has(code)) {
            return true;
        }
        current = causeOf(current);
    }

    const message = error.message.toLowerCase();
    return (
        message.includes('socket hang up') ||
        message.includes('other side closed') ||
        message.includes('connection reset')
    );
}

/**
 * Parses the Retry-After header value.
 * Can be either a number of seconds or an HTTP date.
 *
 * @returns Delay in milliseconds, or null if parsing fails
 */
function parseRetryAfter(retryAfter: string | null): number | null {
    if (!retryAfter) return null;

    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
        return seconds * 1000;
    }

    const date = Date.parse(retryAfter);
    if (!isNaN(date)) {
        const delay = date - Date.now();
        return delay > 0 ? delay : null;
    }

    return null;
}

/**
 * Adds jitter to a delay to prevent thundering herd
 */
function addJitter(delay: number, jitterFactor: number = 0.25): number {
    const jitter = delay * jitterFactor * Math.random();
    return Math.floor(delay + jitter);
}

export interface RobustFetchOptions extends RequestInit {
    /** Number of retry attempts for transient errors (default: 2) */
    retries?: number;
}

/**
 * Wrapper around fetch that retries on transient errors (including 429 rate limits)
 * and provides improved error messages.
 *
 * @param url - The URL to fetch
 * @param options - Fetch options plus optional retry count
 * @returns The fetch Response
 * @throws FetchError with detailed error information on failure
 */
export async function robustFetch(
    url: string,
    options: RobustFetchOptions = {},
): Promise<Response> {
    const { retries = DEFAULT_RETRY_ATTEMPTS, ...fetchOptions } = options;

    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
        try {
            const response = await fetch(url, fetchOptions);

            // Handle rate limiting (429 Too Many Requests)
            if (response.status === 429 && attempt < retries) {
                await response.body?.cancel();
                const retryAfterDelay = parseRetryAfter(
                    response.headers.get('Retry-After'),
                );
                const backoffDelay = RETRY_DELAY_MS * Math.pow(2, attempt);
                await sleep(addJitter(retryAfterDelay ?? backoffDelay));
                continue;
            }

            // Handle server errors (5xx) with retry
            if (response.status >= 500 && attempt < retries) {
                await response.body?.cancel();
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            // Last attempt: a 429/5xx goes back to the caller as is
            return response;
        } catch (error) {
            lastError = error;

            if (attempt < retries && isTransientError(error)) {
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            throw new FetchError(url, error);
        }
    }

    throw new FetchError(url, lastError);
}

/**
 * Fetches a URL and throws {@link HttpStatusError} unless the response is a
 * success.
 */
export async function fetchOk(
    url: string,
    options: RobustFetchOptions = {},
): Promise<Response> {
    const response = await robustFetch(url, options);
    if (!response.ok) {
        // Release the connection before surfacing the error
        await response.body?.cancel();
        throw new HttpStatusError(url, response.status, response.statusText);
    }
    return response;
}

/**
 * Returns the media type of a response without parameters, lower-cased.
 */
export function getMediaType(response: Response): string {
    const contentType = response.headers.get('content-type');
    if (!contentType) return '';
    return contentType.split(';')[0].trim().toLowerCase();
}
