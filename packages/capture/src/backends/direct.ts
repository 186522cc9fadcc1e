/**
 * Plain HTTP backend: one GET, no script execution
 */

import {
    buildRequestHeaders,
    createSignalWithTimeout,
    DEFAULT_USER_AGENT,
    HttpStatusError,
    robustFetch,
} from '@webkeep/http';
import { BackendError } from '../errors.js';
import type { FetchBackend, RenderResult } from './types.js';

export interface DirectBackendOptions {
    userAgent?: string;
    retries?: number;
}

export class DirectBackend implements FetchBackend {
    readonly engine = 'direct' as const;
    private readonly userAgent: string;
    private readonly retries: number | undefined;

    constructor(options: DirectBackendOptions = {}) {
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.retries = options.retries;
    }

    async render(url: string, timeout: number): Promise<RenderResult> {
        try {
            const response = await robustFetch(url, {
                headers: buildRequestHeaders(
                    this.userAgent,
                    'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                ),
                signal: createSignalWithTimeout(timeout),
                retries: this.retries,
            });

            if (!response.ok) {
                await response.body?.cancel();
                throw new HttpStatusError(url, response.status, response.statusText);
            }

            return {
                html: await response.text(),
                finalUrl: response.url || url,
                timedOut: false,
            };
        } catch (error) {
            throw new BackendError(this.engine, url, error);
        }
    }

    async release(): Promise<void> {
        // Nothing held between requests
    }
}
