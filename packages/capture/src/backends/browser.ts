/**
 * Headless-browser backends
 *
 * `browser-dom` navigates until DOMContentLoaded and waits for a `<body>`;
 * `browser-idle` navigates until the network is idle. Both then pause for a
 * settle delay so late scripts can finish touching the DOM, and return the
 * serialized document.
 *
 * A readiness wait that runs out of time is not a failure: the backend keeps
 * going with whatever has loaded and reports `timedOut`.
 */

import { errorMessage } from '@webkeep/utils';
import { BrowserSession, type RenderPage } from '../browser.js';
import { BackendError } from '../errors.js';
import type { OnCaptureVerbose } from '../types.js';
import type { FetchBackend, RenderResult } from './types.js';

export type BrowserEngine = 'browser-dom' | 'browser-idle';

export interface BrowserBackendOptions {
    session: BrowserSession;
    /** Pause after the page is ready, in milliseconds */
    settleDelay?: number;
    onVerbose?: OnCaptureVerbose;
}

function isTimeoutError(error: unknown): boolean {
    return error instanceof Error && error.name === 'TimeoutError';
}

export class BrowserBackend implements FetchBackend {
    private readonly session: BrowserSession;
    private readonly settleDelay: number;
    private readonly onVerbose?: OnCaptureVerbose;

    constructor(
        readonly engine: BrowserEngine,
        options: BrowserBackendOptions,
    ) {
        this.session = options.session;
        this.settleDelay = options.settleDelay ?? 2000;
        this.onVerbose = options.onVerbose;
    }

    async render(url: string, timeout: number): Promise<RenderResult> {
        let page: RenderPage;
        try {
            page = await this.session.newPage();
        } catch (error) {
            throw new BackendError(this.engine, url, error);
        }

        try {
            const timedOut = await this.waitForPage(page, url, timeout);

            if (this.settleDelay > 0) {
                await page.waitForTimeout(this.settleDelay);
            }

            return {
                html: await page.content(),
                finalUrl: page.url() || url,
                timedOut,
            };
        } catch (error) {
            throw new BackendError(this.engine, url, error);
        } finally {
            await page.close().catch((error: unknown) => {
                this.log('debug', `Failed to close page: ${errorMessage(error)}`);
            });
        }
    }

    /**
     * @returns true when the readiness wait ran out of time
     */
    private async waitForPage(
        page: RenderPage,
        url: string,
        timeout: number,
    ): Promise<boolean> {
        try {
            if (this.engine === 'browser-dom') {
                await page.goto(url, { waitUntil: 'domcontentloaded', timeout });
                await page.waitForSelector('body', { timeout });
            } else {
                await page.goto(url, { waitUntil: 'networkidle', timeout });
            }
            return false;
        } catch (error) {
            if (!isTimeoutError(error)) {
                throw error;
            }
            this.log(
                'warn',
                `Timed out after ${timeout}ms waiting for ${url}, continuing with partial page`,
            );
            return true;
        }
    }

    async release(): Promise<void> {
        await this.session.release();
    }

    private log(level: 'debug' | 'warn', message: string): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'backend', message });
    }
}
