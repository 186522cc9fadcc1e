/**
 * Type definitions for page capture, progress reporting and results
 */

import type { HTMLElement } from 'node-html-parser';
import type {
    CaptureEngine,
    ResourceKind,
    SnapshotMetadata,
} from '@webkeep/types';
import { DEFAULT_USER_AGENT } from '@webkeep/http';

export type { CaptureEngine, ResourceKind, SnapshotMetadata } from '@webkeep/types';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Which resource kinds a capture stores locally.
 */
export interface ResourceToggles {
    downloadImages: boolean;
    downloadCss: boolean;
    downloadJs: boolean;
    downloadFonts: boolean;
}

/**
 * Settings shared by every capture of one orchestrator.
 */
export interface CaptureConfig extends ResourceToggles {
    /** Directory under which snapshot directories are created */
    baseDir: string;
    /** Width of the resource download pool */
    maxConcurrentDownloads: number;
    /** Timeout for every network call, in seconds */
    timeout: number;
    /** Consult robots.txt before fetching */
    respectRobotsTxt: boolean;
    /** Strip scripts, embeds and inline handlers from captured markup */
    sanitizeHtml: boolean;
    /** User agent for HTTP requests and robots.txt matching */
    userAgent: string;
    /** Run the browser engines headless */
    headless: boolean;
    /** Engine used when a request names none */
    preferredEngine: CaptureEngine;
    /** Pause after a browser page is ready, in milliseconds */
    settleDelay: number;
    /** Retry attempts for transient HTTP failures */
    retries: number;
}

export const DEFAULT_CAPTURE_CONFIG: CaptureConfig = {
    baseDir: 'saved_websites',
    maxConcurrentDownloads: 8,
    timeout: 30,
    respectRobotsTxt: true,
    sanitizeHtml: false,
    userAgent: DEFAULT_USER_AGENT,
    headless: true,
    preferredEngine: 'direct',
    settleDelay: 2000,
    retries: 2,
    downloadImages: true,
    downloadCss: true,
    downloadJs: true,
    downloadFonts: true,
};

/**
 * One page to capture. Frozen when a run starts.
 */
export interface CaptureRequest {
    readonly url: string;
    /** Overrides the configured preferred engine */
    readonly engine?: CaptureEngine;
    /** Overrides the configured sanitize setting */
    readonly sanitizeHtml?: boolean;
    /** Skip every robots.txt check for this run */
    readonly ignorePolicy?: boolean;
}

// ============================================================================
// CAPTURE SESSION
// ============================================================================

/**
 * States of a single capture run.
 */
export type CaptureState =
    | 'init'
    | 'policy-check'
    | 'fetching'
    | 'sanitizing'
    | 'resource-discovery'
    | 'resource-fetch'
    | 'rewriting'
    | 'persisting'
    | 'thumbnail'
    | 'done'
    | 'failed';

/**
 * Where a reference lives, so it can be rewritten in place.
 */
export type ResourceLocation =
    | {
          type: 'attribute';
          element: HTMLElement;
          attribute: string;
      }
    | {
          type: 'css-span';
          /** Offset of the first character of the reference */
          start: number;
          /** Offset just past the last character of the reference */
          end: number;
      };

/**
 * A resource referenced by markup or a stylesheet.
 */
export interface ResourceReference {
    kind: ResourceKind;
    /** Reference exactly as written */
    original: string;
    /** Absolute URL the reference resolves to */
    url: string;
    /** Path relative to the referencing file, set once fetched */
    localPath?: string;
    location: ResourceLocation;
}

/**
 * A resource that could not be stored locally.
 */
export interface ResourceFailure {
    url: string;
    kind: ResourceKind;
    message: string;
}

// ============================================================================
// PROGRESS EVENTS
// ============================================================================

/**
 * Position of a capture inside a batch, present on events of batch items.
 */
export interface BatchPosition {
    /** Zero-based index of the URL in the batch */
    batchIndex?: number;
    batchTotal?: number;
}

/**
 * Emitted on every state transition of a capture.
 */
export interface StateChangeEvent extends BatchPosition {
    type: 'state';
    url: string;
    state: CaptureState;
    previous: CaptureState;
    /** Reason for entering `failed` */
    error?: string;
}

/**
 * Emitted when a browser engine stopped waiting for the page to be ready.
 * The capture carries on with whatever had loaded.
 */
export interface RenderTimeoutEvent extends BatchPosition {
    type: 'render-timeout';
    url: string;
    engine: CaptureEngine;
    timeoutMs: number;
}

/**
 * Emitted as each resource download finishes.
 */
export interface ResourceProgressEvent extends BatchPosition {
    type: 'resource-progress';
    /** Page being captured */
    url: string;
    resourceUrl: string;
    kind: ResourceKind;
    status: 'saved' | 'failed' | 'skipped';
    /** Path under the snapshot directory, for saved resources */
    localPath?: string;
    error?: string;
    completed: number;
    total: number;
}

/**
 * Emitted by the batch driver around each URL.
 */
export interface BatchItemEvent {
    type: 'batch-item';
    url: string;
    status: 'started' | 'succeeded' | 'failed';
    batchIndex: number;
    batchTotal: number;
    error?: string;
}

/**
 * All possible capture progress events
 */
export type CaptureProgressEvent =
    | StateChangeEvent
    | RenderTimeoutEvent
    | ResourceProgressEvent
    | BatchItemEvent;

/**
 * Structured progress callback for capture operations
 */
export type OnCaptureProgress = (event: CaptureProgressEvent) => void;

// ===== Structured Verbose Event Types =====

/**
 * Structured verbose log entry
 */
export interface CaptureVerboseEvent {
    type: 'verbose';
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Source component */
    source:
        | 'policy'
        | 'backend'
        | 'browser'
        | 'downloader'
        | 'snapshot'
        | 'orchestrator'
        | 'versioning'
        | 'library';
    /** Human-readable message */
    message: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

/**
 * Structured verbose callback
 */
export type OnCaptureVerbose = (event: CaptureVerboseEvent) => void;

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Result of one successful capture.
 */
export interface CaptureResult {
    metadata: SnapshotMetadata;
    /** Resources that could not be stored; the snapshot keeps their remote URLs */
    errors: ResourceFailure[];
}

export interface BatchFailure {
    url: string;
    error: string;
}

/**
 * Result of a batch capture.
 */
export interface BatchResult {
    succeeded: CaptureResult[];
    failures: BatchFailure[];
    total: number;
    successful: number;
    failed: number;
}
