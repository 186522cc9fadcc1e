/**
 * Concurrent resource downloader
 *
 * Fetches every resource a page references through a bounded worker pool and
 * stores each under the snapshot's `assets/` tree. Stylesheets are processed
 * before they are written: the resources they reference are fetched in turn
 * (sequentially, inside the stylesheet's task) and their references rewritten
 * to the local copies.
 */

import { createWriteStream } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
    buildRequestHeaders,
    createSignalWithTimeout,
    DEFAULT_USER_AGENT,
    getMediaType,
    HttpStatusError,
    robustFetch,
} from '@webkeep/http';
import type { ResourceKind } from '@webkeep/types';
import { runConcurrent } from '@webkeep/utils';
import { ResourceFetchError } from './errors.js';
import type { FetchPolicyCache } from './fetch-policy.js';
import {
    cssRelativePath,
    discoverCssResources,
    FilenameRegistry,
    reclassifyByContentType,
    synthesizeFilename,
} from './resource-resolver.js';
import type {
    OnCaptureVerbose,
    ResourceReference,
    ResourceToggles,
} from './types.js';
import { rewriteCssReferences } from './url-rewriter.js';

/** Nested stylesheets deeper than this are left pointing at their remote URL */
export const MAX_STYLESHEET_DEPTH = 3;

/**
 * Outcome of one download task.
 */
export type DownloadResult =
    | {
          status: 'saved';
          kind: ResourceKind;
          url: string;
          /** Path relative to the snapshot directory */
          localPath: string;
      }
    | {
          status: 'skipped';
          kind: ResourceKind;
          url: string;
          reason: string;
      }
    | {
          status: 'failed';
          kind: ResourceKind;
          url: string;
          error: ResourceFetchError;
      };

export interface ResourceDownloaderOptions {
    toggles: ResourceToggles;
    /** Consulted before every fetch; omit to skip robots.txt checks */
    policy?: FetchPolicyCache;
    userAgent?: string;
    /** Timeout for each request in milliseconds */
    timeout?: number;
    retries?: number;
    onVerbose?: OnCaptureVerbose;
}

export interface FetchAllOptions {
    /** Width of the worker pool */
    maxWorkers: number;
    /** Fired as each top-level task finishes */
    onResult?: (result: DownloadResult, completed: number, total: number) => void;
}

/**
 * State shared by the tasks of one fetchAll call.
 */
interface DownloadRun {
    snapshotDir: string;
    registry: FilenameRegistry;
    /** One promise per (kind, URL), covering nested fetches too */
    inflight: Map<string, Promise<DownloadResult>>;
    /** Settled outcomes, readable without awaiting */
    settled: Map<string, DownloadResult>;
}

interface DownloadTask {
    kind: ResourceKind;
    url: string;
    references: ResourceReference[];
}

function taskKey(kind: ResourceKind, url: string): string {
    return `${kind} ${url}`;
}

/**
 * Groups references into one task per distinct (kind, URL), keeping first
 * appearance order.
 */
export function groupReferences(references: ResourceReference[]): DownloadTask[] {
    const tasks = new Map<string, DownloadTask>();
    for (const reference of references) {
        const key = taskKey(reference.kind, reference.url);
        const task = tasks.get(key);
        if (task) {
            task.references.push(reference);
        } else {
            tasks.set(key, {
                kind: reference.kind,
                url: reference.url,
                references: [reference],
            });
        }
    }
    return [...tasks.values()];
}

export class ResourceDownloader {
    private readonly toggles: ResourceToggles;
    private readonly policy?: FetchPolicyCache;
    private readonly userAgent: string;
    private readonly timeout: number;
    private readonly retries: number | undefined;
    private readonly onVerbose?: OnCaptureVerbose;

    constructor(options: ResourceDownloaderOptions) {
        this.toggles = options.toggles;
        this.policy = options.policy;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.timeout = options.timeout ?? 30_000;
        this.retries = options.retries;
        this.onVerbose = options.onVerbose;
    }

    /**
     * Downloads every referenced resource into `snapshotDir` and sets the
     * `localPath` of each reference whose resource was stored. Failures are
     * returned, never thrown.
     *
     * @returns One result per distinct (kind, URL), in first appearance order
     */
    async fetchAll(
        references: ResourceReference[],
        snapshotDir: string,
        options: FetchAllOptions,
    ): Promise<DownloadResult[]> {
        const tasks = groupReferences(references);
        const run: DownloadRun = {
            snapshotDir,
            registry: new FilenameRegistry(),
            inflight: new Map(),
            settled: new Map(),
        };

        this.log('debug', `Fetching ${tasks.length} resources`, {
            workers: options.maxWorkers,
        });

        return runConcurrent(
            tasks,
            options.maxWorkers,
            async (task) => {
                const result = await this.obtain(run, task.kind, task.url, 0, []);
                if (result.status === 'saved') {
                    for (const reference of task.references) {
                        reference.localPath = result.localPath;
                    }
                }
                return result;
            },
            options.onResult,
        );
    }

    /**
     * Returns the shared download of a (kind, URL), starting it on first
     * request.
     */
    private obtain(
        run: DownloadRun,
        kind: ResourceKind,
        url: string,
        depth: number,
        ancestors: string[],
    ): Promise<DownloadResult> {
        const key = taskKey(kind, url);
        let pending = run.inflight.get(key);
        if (!pending) {
            pending = this.download(run, kind, url, depth, ancestors).then((result) => {
                run.settled.set(key, result);
                return result;
            });
            run.inflight.set(key, pending);
        }
        return pending;
    }

    private async download(
        run: DownloadRun,
        kind: ResourceKind,
        url: string,
        depth: number,
        ancestors: string[],
    ): Promise<DownloadResult> {
        if (this.policy && !(await this.policy.allowed(url))) {
            this.log('info', `Skipping ${url}: disallowed by robots.txt`);
            return { status: 'skipped', kind, url, reason: 'Disallowed by robots.txt' };
        }

        try {
            const response = await robustFetch(url, {
                headers: buildRequestHeaders(this.userAgent),
                signal: createSignalWithTimeout(this.timeout),
                retries: this.retries,
            });

            if (!response.ok) {
                await response.body?.cancel();
                throw new HttpStatusError(url, response.status, response.statusText);
            }

            const mediaType = getMediaType(response);
            const storedKind = reclassifyByContentType(kind, mediaType);
            const localPath = run.registry.claim(
                url,
                storedKind,
                synthesizeFilename(url, storedKind, mediaType),
            );
            const target = join(run.snapshotDir, localPath);
            await mkdir(join(target, '..'), { recursive: true });

            if (storedKind === 'stylesheet') {
                const cssText = await response.text();
                const rewritten = await this.processStylesheet(
                    run,
                    cssText,
                    response.url || url,
                    depth,
                    [...ancestors, url],
                );
                await writeFile(target, rewritten, 'utf-8');
            } else if (storedKind === 'script') {
                await writeFile(target, await response.text(), 'utf-8');
            } else if (response.body) {
                await pipeline(Readable.fromWeb(response.body), createWriteStream(target));
            } else {
                await writeFile(target, '');
            }

            this.log('debug', `Saved ${url} -> ${localPath}`);
            return { status: 'saved', kind: storedKind, url, localPath };
        } catch (error) {
            const failure = new ResourceFetchError(url, kind, error);
            this.log('warn', failure.message);
            return { status: 'failed', kind, url, error: failure };
        }
    }

    /**
     * Fetches what a stylesheet references and rewrites it to the local
     * copies. Nested fetches run one after another.
     */
    private async processStylesheet(
        run: DownloadRun,
        cssText: string,
        cssUrl: string,
        depth: number,
        ancestors: string[],
    ): Promise<string> {
        const references = discoverCssResources(cssText, cssUrl, this.toggles);

        for (const task of groupReferences(references)) {
            const localPath = await this.nestedPath(run, task, depth, ancestors);
            if (!localPath) continue;
            for (const reference of task.references) {
                reference.localPath = cssRelativePath(localPath);
            }
        }

        return rewriteCssReferences(cssText, references);
    }

    /**
     * Local path for a resource a stylesheet references, or undefined when
     * the reference stays remote.
     */
    private async nestedPath(
        run: DownloadRun,
        task: DownloadTask,
        depth: number,
        ancestors: string[],
    ): Promise<string | undefined> {
        if (task.kind !== 'stylesheet') {
            const result = await this.obtain(run, task.kind, task.url, depth, ancestors);
            return result.status === 'saved' ? result.localPath : undefined;
        }

        if (depth + 1 > MAX_STYLESHEET_DEPTH) {
            this.log('debug', `Not following ${task.url}: import depth limit reached`);
            return undefined;
        }

        const key = taskKey('stylesheet', task.url);
        if (ancestors.includes(task.url) || run.inflight.has(key)) {
            // Import cycle, or the stylesheet is being fetched elsewhere:
            // waiting on it could deadlock, so point at its name directly
            const settled = run.settled.get(key);
            if (settled) {
                return settled.status === 'saved' ? settled.localPath : undefined;
            }
            return run.registry.lookup(task.url, 'stylesheet');
        }

        const result = await this.obtain(
            run,
            'stylesheet',
            task.url,
            depth + 1,
            ancestors,
        );
        return result.status === 'saved' ? result.localPath : undefined;
    }

    private log(
        level: 'debug' | 'info' | 'warn',
        message: string,
        data?: Record<string, unknown>,
    ): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'downloader', message, data });
    }
}
