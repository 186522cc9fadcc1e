/**
 * Tests for the fetch backends
 *
 * The browser engines run against an in-process stand-in for Playwright.
 */

import { describe, it, expect, vi } from 'vitest';
import {
    server,
    createHtmlHandler,
    create404Handler,
    createNetworkErrorHandler,
} from '../../../test/helpers/msw-handlers.js';
import { http, HttpResponse } from 'msw';
import {
    BrowserBackend,
    createBackend,
    DirectBackend,
} from '../src/backends/index.js';
import {
    BrowserSession,
    type BrowserLauncher,
    type RenderBrowser,
    type RenderPage,
} from '../src/browser.js';
import { BackendError } from '../src/errors.js';

class TimeoutError extends Error {
    readonly name = 'TimeoutError';
}

interface FakePageBehaviour {
    html?: string;
    finalUrl?: string;
    gotoError?: Error;
}

class FakePage implements RenderPage {
    readonly gotoCalls: Array<{ url: string; waitUntil: string; timeout: number }> = [];
    readonly selectors: string[] = [];
    readonly waits: number[] = [];
    closed = false;
    private current = '';

    constructor(private readonly behaviour: FakePageBehaviour) {}

    async goto(
        url: string,
        options: { waitUntil: 'domcontentloaded' | 'networkidle'; timeout: number },
    ): Promise<null> {
        this.gotoCalls.push({ url, ...options });
        this.current = this.behaviour.finalUrl ?? url;
        if (this.behaviour.gotoError) throw this.behaviour.gotoError;
        return null;
    }

    async waitForSelector(selector: string): Promise<null> {
        this.selectors.push(selector);
        return null;
    }

    async waitForTimeout(timeout: number): Promise<void> {
        this.waits.push(timeout);
    }

    async content(): Promise<string> {
        return this.behaviour.html ?? '<html><body></body></html>';
    }

    url(): string {
        return this.current;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

class FakeBrowser implements RenderBrowser {
    readonly pages: FakePage[] = [];
    readonly userAgents: Array<string | undefined> = [];
    connected = true;
    closed = false;

    constructor(private readonly behaviour: FakePageBehaviour = {}) {}

    isConnected(): boolean {
        return this.connected;
    }

    async newPage(options: { userAgent?: string }): Promise<FakePage> {
        this.userAgents.push(options.userAgent);
        const page = new FakePage(this.behaviour);
        this.pages.push(page);
        return page;
    }

    async close(): Promise<void> {
        this.closed = true;
        this.connected = false;
    }
}

function fakeLauncher(behaviour: FakePageBehaviour = {}) {
    const browsers: FakeBrowser[] = [];
    const launcher: BrowserLauncher = async () => {
        const browser = new FakeBrowser(behaviour);
        browsers.push(browser);
        return browser;
    };
    return { browsers, launcher };
}

describe('DirectBackend', () => {
    it('returns the page body', async () => {
        server.use(createHtmlHandler('https://example.com/', '<p>hello</p>'));

        const result = await new DirectBackend({ retries: 0 }).render(
            'https://example.com/',
            5000,
        );

        expect(result.html).toBe('<p>hello</p>');
        expect(result.finalUrl).toBe('https://example.com/');
        expect(result.timedOut).toBe(false);
    });

    it('sends the configured user agent', async () => {
        let userAgent: string | null = null;
        server.use(
            http.get('https://example.com/', ({ request }) => {
                userAgent = request.headers.get('user-agent');
                return HttpResponse.text('ok');
            }),
        );

        await new DirectBackend({ userAgent: 'TestAgent/1.0', retries: 0 }).render(
            'https://example.com/',
            5000,
        );

        expect(userAgent).toBe('TestAgent/1.0');
    });

    it('raises BackendError on an error status', async () => {
        server.use(create404Handler('https://example.com/missing'));

        const error = await new DirectBackend({ retries: 0 })
            .render('https://example.com/missing', 5000)
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(BackendError);
        if (error instanceof BackendError) {
            expect(error.engine).toBe('direct');
            expect(error.url).toBe('https://example.com/missing');
            expect(error.message).toContain('HTTP 404');
        }
    });

    it('raises BackendError when the network fails', async () => {
        server.use(createNetworkErrorHandler('https://example.com/down'));

        await expect(
            new DirectBackend({ retries: 0 }).render('https://example.com/down', 5000),
        ).rejects.toBeInstanceOf(BackendError);
    });
});

describe('BrowserBackend', () => {
    it('waits for DOMContentLoaded and a body on browser-dom', async () => {
        const { browsers, launcher } = fakeLauncher({ html: '<body>dom</body>' });
        const backend = new BrowserBackend('browser-dom', {
            session: new BrowserSession({ launcher }),
            settleDelay: 250,
        });

        const result = await backend.render('https://example.com/', 4000);

        const [page] = browsers[0].pages;
        expect(page.gotoCalls).toEqual([
            { url: 'https://example.com/', waitUntil: 'domcontentloaded', timeout: 4000 },
        ]);
        expect(page.selectors).toEqual(['body']);
        expect(page.waits).toEqual([250]);
        expect(page.closed).toBe(true);
        expect(result).toEqual({
            html: '<body>dom</body>',
            finalUrl: 'https://example.com/',
            timedOut: false,
        });
    });

    it('waits for network idle on browser-idle', async () => {
        const { browsers, launcher } = fakeLauncher();
        const backend = new BrowserBackend('browser-idle', {
            session: new BrowserSession({ launcher }),
            settleDelay: 0,
        });

        await backend.render('https://example.com/', 4000);

        const [page] = browsers[0].pages;
        expect(page.gotoCalls.map((call) => call.waitUntil)).toEqual(['networkidle']);
        expect(page.selectors).toEqual([]);
        expect(page.waits).toEqual([]);
    });

    it('reports the URL the browser ended up on', async () => {
        const { launcher } = fakeLauncher({ finalUrl: 'https://example.com/home' });
        const backend = new BrowserBackend('browser-idle', {
            session: new BrowserSession({ launcher }),
            settleDelay: 0,
        });

        const result = await backend.render('https://example.com/', 4000);

        expect(result.finalUrl).toBe('https://example.com/home');
    });

    it('continues with the partial page when the wait times out', async () => {
        const { browsers, launcher } = fakeLauncher({
            html: '<body>partial</body>',
            gotoError: new TimeoutError('Timeout 4000ms exceeded'),
        });
        const onVerbose = vi.fn();
        const backend = new BrowserBackend('browser-dom', {
            session: new BrowserSession({ launcher }),
            settleDelay: 0,
            onVerbose,
        });

        const result = await backend.render('https://example.com/', 4000);

        expect(result.timedOut).toBe(true);
        expect(result.html).toBe('<body>partial</body>');
        expect(browsers[0].pages[0].selectors).toEqual([]);
        expect(onVerbose).toHaveBeenCalledWith(
            expect.objectContaining({ level: 'warn', source: 'backend' }),
        );
    });

    it('raises BackendError for other navigation failures and closes the page', async () => {
        const { browsers, launcher } = fakeLauncher({
            gotoError: new Error('net::ERR_NAME_NOT_RESOLVED'),
        });
        const backend = new BrowserBackend('browser-idle', {
            session: new BrowserSession({ launcher }),
            settleDelay: 0,
        });

        const error = await backend.render('https://example.com/', 4000).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(BackendError);
        if (error instanceof BackendError) {
            expect(error.engine).toBe('browser-idle');
            expect(error.message).toBe(
                'browser-idle engine failed to load https://example.com/: net::ERR_NAME_NOT_RESOLVED',
            );
        }
        expect(browsers[0].pages[0].closed).toBe(true);
    });

    it('raises BackendError when the browser cannot start', async () => {
        const backend = new BrowserBackend('browser-dom', {
            session: new BrowserSession({
                launcher: async () => {
                    throw new Error('no browser installed');
                },
            }),
        });

        await expect(backend.render('https://example.com/', 4000)).rejects.toBeInstanceOf(
            BackendError,
        );
    });

    it('closes the browser on release', async () => {
        const { browsers, launcher } = fakeLauncher();
        const backend = new BrowserBackend('browser-idle', {
            session: new BrowserSession({ launcher }),
            settleDelay: 0,
        });

        await backend.render('https://example.com/', 4000);
        await backend.release();

        expect(browsers[0].closed).toBe(true);
    });
});

describe('BrowserSession', () => {
    it('reuses a connected browser', async () => {
        const { browsers, launcher } = fakeLauncher();
        const session = new BrowserSession({ launcher });

        const first = await session.acquire();
        const second = await session.acquire();

        expect(first).toBe(second);
        expect(browsers).toHaveLength(1);
        expect(session.active).toBe(true);
    });

    it('relaunches a browser that lost its connection', async () => {
        const { browsers, launcher } = fakeLauncher();
        const session = new BrowserSession({ launcher });

        await session.acquire();
        browsers[0].connected = false;
        await session.acquire();

        expect(browsers).toHaveLength(2);
        expect(browsers[0].closed).toBe(true);
    });

    it('is inactive after release', async () => {
        const { launcher } = fakeLauncher();
        const session = new BrowserSession({ launcher });

        await session.acquire();
        await session.release();

        expect(session.active).toBe(false);
    });
});

describe('createBackend', () => {
    it('creates a backend per engine', () => {
        expect(createBackend('direct')).toBeInstanceOf(DirectBackend);
        expect(createBackend('browser-dom').engine).toBe('browser-dom');
        expect(createBackend('browser-idle')).toBeInstanceOf(BrowserBackend);
    });

    it('hands the configured user agent to browser pages', async () => {
        const { browsers, launcher } = fakeLauncher();
        const backend = createBackend('browser-dom', { userAgent: 'WebKeep/2.0', launcher });

        await backend.render('https://example.com/', 5000);

        expect(browsers[0].userAgents).toEqual(['WebKeep/2.0']);
    });
});
