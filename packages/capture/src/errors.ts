/**
 * Errors raised by the capture engine
 */

import type { CaptureEngine, ResourceKind } from '@webkeep/types';
import { errorMessage } from '@webkeep/utils';

/**
 * Raised when robots.txt forbids fetching the page.
 */
export class PolicyDeniedError extends Error {
    readonly name = 'PolicyDeniedError';

    constructor(
        public readonly url: string,
        public readonly userAgent: string,
    ) {
        super(`robots.txt disallows ${url} for ${userAgent}`);
    }
}

/**
 * Raised when an engine could not retrieve the page at all.
 */
export class BackendError extends Error {
    readonly name = 'BackendError';

    constructor(
        public readonly engine: CaptureEngine,
        public readonly url: string,
        cause: unknown,
    ) {
        super(`${engine} engine failed to load ${url}: ${errorMessage(cause)}`, {
            cause,
        });
    }
}

/**
 * A single resource download that failed. Collected, never fatal.
 */
export class ResourceFetchError extends Error {
    readonly name = 'ResourceFetchError';

    constructor(
        public readonly url: string,
        public readonly kind: ResourceKind,
        cause: unknown,
    ) {
        super(`Failed to fetch ${kind} ${url}: ${errorMessage(cause)}`, {
            cause,
        });
    }
}

/**
 * Raised when the snapshot could not be written to disk.
 */
export class WriteError extends Error {
    readonly name = 'WriteError';

    constructor(
        public readonly path: string,
        cause: unknown,
    ) {
        super(`Failed to write ${path}: ${errorMessage(cause)}`, { cause });
    }
}

/**
 * Raised when a snapshot directory has no readable metadata.json.
 */
export class MissingMetadataError extends Error {
    readonly name = 'MissingMetadataError';

    constructor(
        public readonly directory: string,
        public readonly reason: string,
    ) {
        super(`No valid metadata.json in ${directory}: ${reason}`);
    }
}
