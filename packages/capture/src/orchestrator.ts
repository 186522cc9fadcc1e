/**
 * Capture orchestration
 *
 * Drives one URL through
 *
 * ```
 * init -> policy-check -> fetching -> sanitizing? -> resource-discovery
 *      -> resource-fetch -> rewriting -> persisting -> thumbnail -> done
 * ```
 *
 * with `failed` reachable from every other state. The snapshot directory is
 * created only once the page has been retrieved, and removed again if
 * anything fails after that.
 */

import { parse as parseHTML, type HTMLElement } from 'node-html-parser';
import type { CaptureEngine } from '@webkeep/types';
import {
    errorMessage,
    formatCaptureTimestamp,
    formatSaveDate,
    snapshotDirectoryName,
} from '@webkeep/utils';
import { createBackend, type FetchBackend } from './backends/index.js';
import type { BrowserLauncher } from './browser.js';
import { BackendError, PolicyDeniedError } from './errors.js';
import { FetchPolicyCache } from './fetch-policy.js';
import { ResourceDownloader } from './resource-downloader.js';
import { discoverResources } from './resource-resolver.js';
import { extractTitle, sanitizeDocument } from './sanitize.js';
import { SnapshotMaterializer, type SnapshotHandle } from './snapshot.js';
import {
    DEFAULT_CAPTURE_CONFIG,
    type BatchFailure,
    type BatchPosition,
    type BatchResult,
    type CaptureConfig,
    type CaptureProgressEvent,
    type CaptureRequest,
    type CaptureResult,
    type CaptureState,
    type OnCaptureProgress,
    type OnCaptureVerbose,
    type ResourceFailure,
} from './types.js';
import { rewriteHtmlReferences } from './url-rewriter.js';

export interface CaptureOrchestratorOptions {
    /** Overrides of {@link DEFAULT_CAPTURE_CONFIG} */
    config?: Partial<CaptureConfig>;
    /** Structured progress callback */
    onProgress?: OnCaptureProgress;
    /** Structured verbose callback */
    onVerbose?: OnCaptureVerbose;
    /** Clock used for timestamps */
    now?: () => Date;
    /** Starts browsers for the browser engines */
    launcher?: BrowserLauncher;
    /** Ready-made backends, used instead of creating them */
    backends?: Partial<Record<CaptureEngine, FetchBackend>>;
}

/**
 * Per-request settings for a batch; every URL of the batch shares them.
 */
export interface BatchOptions {
    engine?: CaptureEngine;
    sanitizeHtml?: boolean;
    ignorePolicy?: boolean;
    /** Checked between URLs; URLs not yet started are reported as cancelled */
    signal?: AbortSignal;
}

/**
 * Transient state of one capture run.
 */
interface CaptureSession {
    readonly request: CaptureRequest;
    readonly engine: CaptureEngine;
    readonly position: BatchPosition;
    state: CaptureState;
    document?: HTMLElement;
    handle?: SnapshotHandle;
    errors: ResourceFailure[];
}

const PARSE_OPTIONS = {
    comment: true,
    blockTextElements: {
        script: true,
        noscript: true,
        style: true,
        pre: true,
    },
};

function checkUrl(url: string): URL {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new Error(`Unsupported protocol ${parsed.protocol}`);
    }
    return parsed;
}

/**
 * Turns URLs into snapshots.
 *
 * Browser sessions stay open between single captures; call
 * {@link CaptureOrchestrator.close} when done. Batches release them on their
 * own.
 */
export class CaptureOrchestrator {
    readonly config: CaptureConfig;
    private readonly policy: FetchPolicyCache;
    private readonly materializer: SnapshotMaterializer;
    private readonly backends = new Map<CaptureEngine, FetchBackend>();
    private readonly onProgress?: OnCaptureProgress;
    private readonly onVerbose?: OnCaptureVerbose;
    private readonly now: () => Date;
    private readonly launcher?: BrowserLauncher;

    constructor(options: CaptureOrchestratorOptions = {}) {
        this.config = { ...DEFAULT_CAPTURE_CONFIG, ...options.config };
        this.onProgress = options.onProgress;
        this.onVerbose = options.onVerbose;
        this.now = options.now ?? (() => new Date());
        this.launcher = options.launcher;

        for (const backend of Object.values(options.backends ?? {})) {
            if (backend) this.backends.set(backend.engine, backend);
        }

        this.policy = new FetchPolicyCache({
            userAgent: this.config.userAgent,
            timeout: this.timeoutMs,
            retries: this.config.retries,
            onVerbose: this.onVerbose,
        });
        this.materializer = new SnapshotMaterializer(this.config.baseDir, {
            onVerbose: this.onVerbose,
        });
    }

    private get timeoutMs(): number {
        return this.config.timeout * 1000;
    }

    /**
     * Captures a single page.
     *
     * @throws PolicyDeniedError when robots.txt forbids the page
     * @throws BackendError when the page could not be retrieved
     * @throws WriteError when the snapshot could not be written
     */
    async capture(request: CaptureRequest | string): Promise<CaptureResult> {
        const frozen = Object.freeze(
            typeof request === 'string' ? { url: request } : { ...request },
        );
        return this.run(frozen, {});
    }

    /**
     * Captures pages one after another. A failing URL is recorded and the
     * batch moves on.
     */
    async captureBatch(urls: string[], options: BatchOptions = {}): Promise<BatchResult> {
        const succeeded: CaptureResult[] = [];
        const failures: BatchFailure[] = [];
        const batchTotal = urls.length;

        try {
            for (const [batchIndex, url] of urls.entries()) {
                if (options.signal?.aborted) {
                    failures.push({ url, error: 'Batch cancelled' });
                    continue;
                }

                this.emit({ type: 'batch-item', url, status: 'started', batchIndex, batchTotal });

                try {
                    const request = Object.freeze({
                        url,
                        engine: options.engine,
                        sanitizeHtml: options.sanitizeHtml,
                        ignorePolicy: options.ignorePolicy,
                    });
                    succeeded.push(await this.run(request, { batchIndex, batchTotal }));
                    this.emit({
                        type: 'batch-item',
                        url,
                        status: 'succeeded',
                        batchIndex,
                        batchTotal,
                    });
                } catch (error) {
                    const message = errorMessage(error);
                    failures.push({ url, error: message });
                    this.emit({
                        type: 'batch-item',
                        url,
                        status: 'failed',
                        batchIndex,
                        batchTotal,
                        error: message,
                    });
                }
            }
        } finally {
            await this.close();
        }

        return {
            succeeded,
            failures,
            total: batchTotal,
            successful: succeeded.length,
            failed: failures.length,
        };
    }

    /**
     * Releases browser sessions held by the engines. Every backend is
     * released; a failure is logged and does not stop the others.
     */
    async close(): Promise<void> {
        for (const backend of this.backends.values()) {
            try {
                await backend.release();
            } catch (error) {
                this.log('warn', `Failed to release ${backend.engine} backend: ${errorMessage(error)}`);
            }
        }
    }

    private backendFor(engine: CaptureEngine): FetchBackend {
        let backend = this.backends.get(engine);
        if (!backend) {
            backend = createBackend(engine, {
                userAgent: this.config.userAgent,
                retries: this.config.retries,
                headless: this.config.headless,
                settleDelay: this.config.settleDelay,
                launcher: this.launcher,
                onVerbose: this.onVerbose,
            });
            this.backends.set(engine, backend);
        }
        return backend;
    }

    private async run(request: CaptureRequest, position: BatchPosition): Promise<CaptureResult> {
        const session: CaptureSession = {
            request,
            engine: request.engine ?? this.config.preferredEngine,
            position,
            state: 'init',
            errors: [],
        };
        const checkPolicy = this.config.respectRobotsTxt && !request.ignorePolicy;
        const sanitize = request.sanitizeHtml ?? this.config.sanitizeHtml;

        try {
            let target: URL;
            try {
                target = checkUrl(request.url);
            } catch (error) {
                throw new BackendError(session.engine, request.url, error);
            }

            if (checkPolicy) {
                this.transition(session, 'policy-check');
                if (!(await this.policy.allowed(request.url))) {
                    throw new PolicyDeniedError(request.url, this.config.userAgent);
                }
            }

            this.transition(session, 'fetching');
            const rendered = await this.backendFor(session.engine).render(
                request.url,
                this.timeoutMs,
            );
            if (rendered.timedOut) {
                this.emit({
                    type: 'render-timeout',
                    url: request.url,
                    engine: session.engine,
                    timeoutMs: this.timeoutMs,
                    ...position,
                });
            }
            const document = parseHTML(rendered.html, PARSE_OPTIONS);
            session.document = document;

            if (sanitize) {
                this.transition(session, 'sanitizing');
                const removed = sanitizeDocument(document);
                this.log('debug', `Sanitized ${removed} elements and attributes`);
            }

            const capturedAt = this.now();
            const timestamp = formatCaptureTimestamp(capturedAt);
            const handle = await this.materializer.begin(
                snapshotDirectoryName(target.host, timestamp),
            );
            session.handle = handle;

            this.transition(session, 'resource-discovery');
            const references = discoverResources(document, rendered.finalUrl, this.config);
            this.log('debug', `Discovered ${references.length} resource references`);

            this.transition(session, 'resource-fetch');
            const downloader = new ResourceDownloader({
                toggles: this.config,
                policy: checkPolicy ? this.policy : undefined,
                userAgent: this.config.userAgent,
                timeout: this.timeoutMs,
                retries: this.config.retries,
                onVerbose: this.onVerbose,
            });
            const results = await downloader.fetchAll(references, handle.path, {
                maxWorkers: this.config.maxConcurrentDownloads,
                onResult: (result, completed, total) => {
                    this.emit({
                        type: 'resource-progress',
                        url: request.url,
                        resourceUrl: result.url,
                        kind: result.kind,
                        status: result.status,
                        localPath: result.status === 'saved' ? result.localPath : undefined,
                        error:
                            result.status === 'failed'
                                ? result.error.message
                                : result.status === 'skipped'
                                  ? result.reason
                                  : undefined,
                        completed,
                        total,
                        ...position,
                    });
                },
            });
            for (const result of results) {
                if (result.status === 'failed') {
                    session.errors.push({
                        url: result.url,
                        kind: result.kind,
                        message: result.error.message,
                    });
                }
            }

            this.transition(session, 'rewriting');
            rewriteHtmlReferences(references);
            const markup = document.toString();

            this.transition(session, 'persisting');
            const metadata = await this.materializer.commit(
                handle,
                markup,
                {
                    url: request.url,
                    title: extractTitle(document),
                    domain: target.host,
                    timestamp,
                    dateSaved: formatSaveDate(capturedAt),
                    thumbnail: '',
                    directory: handle.path,
                    engineUsed: session.engine,
                },
                () => this.transition(session, 'thumbnail'),
            );

            this.transition(session, 'done');
            this.log(
                'info',
                `Captured ${request.url} into ${handle.path} (${session.errors.length} resource errors)`,
            );
            return { metadata, errors: session.errors };
        } catch (error) {
            if (session.handle) {
                await this.materializer.abort(session.handle).catch((abortError: unknown) => {
                    this.log('warn', `Failed to remove ${session.handle?.path}: ${errorMessage(abortError)}`);
                });
            }
            this.transition(session, 'failed', errorMessage(error));
            throw error;
        }
    }

    private transition(session: CaptureSession, next: CaptureState, error?: string): void {
        const previous = session.state;
        session.state = next;
        this.emit({
            type: 'state',
            url: session.request.url,
            state: next,
            previous,
            error,
            ...session.position,
        });
    }

    private emit(event: CaptureProgressEvent): void {
        this.onProgress?.(event);
    }

    private log(level: 'debug' | 'info' | 'warn', message: string): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'orchestrator', message });
    }
}
