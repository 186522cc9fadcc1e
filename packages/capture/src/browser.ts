/**
 * Browser management for Playwright-based capture
 */

import { chromium } from 'playwright';
import { errorMessage } from '@webkeep/utils';
import type { OnCaptureVerbose } from './types.js';

/**
 * The part of a Playwright page the browser engines use.
 */
export interface RenderPage {
    goto(
        url: string,
        options: {
            waitUntil: 'domcontentloaded' | 'networkidle';
            timeout: number;
        },
    ): Promise<unknown>;
    waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
    waitForTimeout(timeout: number): Promise<void>;
    content(): Promise<string>;
    url(): string;
    close(): Promise<void>;
}

/**
 * The part of a Playwright browser the engines use.
 */
export interface RenderBrowser {
    isConnected(): boolean;
    newPage(options: {
        userAgent?: string;
        viewport?: { width: number; height: number };
        ignoreHTTPSErrors?: boolean;
    }): Promise<RenderPage>;
    close(): Promise<void>;
}

/**
 * Starts a browser. Tests pass a launcher that returns a stand-in.
 */
export type BrowserLauncher = (options: { headless: boolean }) => Promise<RenderBrowser>;

/**
 * Launches headless Chromium through Playwright.
 */
export const launchChromium: BrowserLauncher = ({ headless }) =>
    chromium.launch({ headless });

/**
 * Options for configuring browser behavior.
 */
export interface BrowserOptions {
    /** Whether to run the browser in headless mode */
    headless: boolean;
    /** User agent string to use for requests */
    userAgent?: string;
    /** Viewport size for the browser window */
    viewport?: { width: number; height: number };
    /** Starts the browser; defaults to {@link launchChromium} */
    launcher?: BrowserLauncher;
    /** Structured verbose callback */
    onVerbose?: OnCaptureVerbose;
}

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

/**
 * An exclusively held browser, launched on first use.
 *
 * Before each reuse the browser is checked for a live connection; a browser
 * that crashed or was closed underneath us is discarded and relaunched.
 * The owner must call {@link BrowserSession.release} when done.
 */
export class BrowserSession {
    private browser: RenderBrowser | null = null;
    private readonly headless: boolean;
    private readonly userAgent: string;
    private readonly viewport: { width: number; height: number };
    private readonly launcher: BrowserLauncher;
    private readonly onVerbose?: OnCaptureVerbose;

    constructor(options: Partial<BrowserOptions> = {}) {
        this.headless = options.headless ?? true;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.viewport = options.viewport ?? DEFAULT_VIEWPORT;
        this.launcher = options.launcher ?? launchChromium;
        this.onVerbose = options.onVerbose;
    }

    /**
     * Whether a browser is currently held.
     */
    get active(): boolean {
        return this.browser !== null;
    }

    /**
     * Returns a healthy browser, launching or relaunching as needed.
     *
     * @throws Error if the browser fails to launch
     */
    async acquire(): Promise<RenderBrowser> {
        if (this.browser && this.browser.isConnected()) {
            return this.browser;
        }

        if (this.browser) {
            this.log('warn', 'Browser connection lost, relaunching');
            await this.closeQuietly(this.browser);
            this.browser = null;
        }

        this.log('debug', `Launching browser (headless: ${this.headless})`);
        this.browser = await this.launcher({ headless: this.headless });
        return this.browser;
    }

    /**
     * Opens a page in its own context.
     */
    async newPage(): Promise<RenderPage> {
        const browser = await this.acquire();
        return browser.newPage({
            userAgent: this.userAgent,
            viewport: this.viewport,
            // Ignore HTTPS errors for development sites
            ignoreHTTPSErrors: true,
        });
    }

    /**
     * Close the browser and clean up resources
     */
    async release(): Promise<void> {
        if (!this.browser) {
            return;
        }
        const browser = this.browser;
        this.browser = null;
        await browser.close();
        this.log('debug', 'Browser closed');
    }

    private async closeQuietly(browser: RenderBrowser): Promise<void> {
        try {
            await browser.close();
        } catch (error) {
            this.log('debug', `Ignoring close failure: ${errorMessage(error)}`);
        }
    }

    private log(level: 'debug' | 'warn', message: string): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'browser', message });
    }
}
