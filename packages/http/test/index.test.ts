import { describe, it, expect, vi, afterEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import {
    server,
    createHtmlHandler,
    createStatusHandler,
    createNetworkErrorHandler,
} from '../../../test/helpers/msw-handlers.js';
import {
    buildRequestHeaders,
    createSignalWithTimeout,
    DEFAULT_USER_AGENT,
    fetchOk,
    FetchError,
    getFetchErrorDetails,
    getMediaType,
    HttpStatusError,
    robustFetch,
} from '../src/index.js';

describe('createSignalWithTimeout', () => {
    it('returns undefined without a timeout or signal', () => {
        expect(createSignalWithTimeout()).toBeUndefined();
    });

    it('returns the caller signal when no timeout is given', () => {
        const controller = new AbortController();
        expect(createSignalWithTimeout(undefined, controller.signal)).toBe(
            controller.signal,
        );
    });

    it('aborts when the caller signal aborts', () => {
        const controller = new AbortController();
        const signal = createSignalWithTimeout(60_000, controller.signal);
        controller.abort();
        expect(signal?.aborted).toBe(true);
    });
});

describe('buildRequestHeaders', () => {
    it('uses the default user agent', () => {
        expect(buildRequestHeaders()['User-Agent']).toBe(DEFAULT_USER_AGENT);
    });

    it('accepts a custom user agent and accept header', () => {
        const headers = buildRequestHeaders('TestAgent/1.0', 'text/html');
        expect(headers['User-Agent']).toBe('TestAgent/1.0');
        expect(headers.Accept).toBe('text/html');
    });
});

describe('getFetchErrorDetails', () => {
    it('walks the cause chain and extracts the code', () => {
        const cause = Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.test'), {
            code: 'ENOTFOUND',
        });
        const error = new Error('fetch failed', { cause });

        const details = getFetchErrorDetails(error);

        expect(details.message).toBe('fetch failed');
        expect(details.code).toBe('ENOTFOUND');
        expect(details.cause).toBe('[ENOTFOUND] getaddrinfo ENOTFOUND nowhere.test');
        expect(details.hint).toContain('DNS resolution failed');
    });

    it('stringifies non-error values', () => {
        expect(getFetchErrorDetails('boom')).toEqual({ message: 'boom' });
    });
});

describe('robustFetch', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('returns successful responses', async () => {
        server.use(createHtmlHandler('https://example.com/', '<p>hi</p>'));

        const response = await robustFetch('https://example.com/', {
            retries: 0,
        });

        expect(response.status).toBe(200);
        expect(await response.text()).toBe('<p>hi</p>');
    });

    it('sends the given headers', async () => {
        let seenAgent: string | null = null;
        server.use(
            http.get('https://example.com/agent', ({ request }) => {
                seenAgent = request.headers.get('user-agent');
                return HttpResponse.text('ok');
            }),
        );

        await robustFetch('https://example.com/agent', {
            headers: buildRequestHeaders('TestAgent/1.0'),
            retries: 0,
        });

        expect(seenAgent).toBe('TestAgent/1.0');
    });

    it('hands back the last 5xx response once retries are exhausted', async () => {
        server.use(createStatusHandler('https://example.com/down', 503));

        const response = await robustFetch('https://example.com/down', {
            retries: 0,
        });

        expect(response.status).toBe(503);
    });

    it('releases the body of a rate-limited response before retrying', async () => {
        const limited = new Response('slow down', {
            status: 429,
            headers: { 'Retry-After': '0' },
        });
        const fetchSpy = vi
            .spyOn(globalThis, 'fetch')
            .mockResolvedValueOnce(limited)
            .mockResolvedValueOnce(new Response('ok'));

        const response = await robustFetch('https://example.com/limited', { retries: 1 });

        expect(fetchSpy).toHaveBeenCalledTimes(2);
        expect(limited.bodyUsed).toBe(true);
        expect(await response.text()).toBe('ok');
    });

    it('wraps network failures in FetchError', async () => {
        server.use(createNetworkErrorHandler('https://example.com/broken'));

        await expect(
            robustFetch('https://example.com/broken', { retries: 0 }),
        ).rejects.toBeInstanceOf(FetchError);
    });
});

describe('fetchOk', () => {
    it('throws HttpStatusError for non-success statuses', async () => {
        server.use(createStatusHandler('https://example.com/missing', 404));

        const error = await fetchOk('https://example.com/missing', {
            retries: 0,
        }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpStatusError);
        if (error instanceof HttpStatusError) {
            expect(error.status).toBe(404);
            expect(error.url).toBe('https://example.com/missing');
        }
    });
});

describe('getMediaType', () => {
    it('drops parameters and lower-cases', () => {
        const response = new Response('', {
            headers: { 'Content-Type': 'Text/HTML; charset=utf-8' },
        });
        expect(getMediaType(response)).toBe('text/html');
    });

    it('returns an empty string without a content type', () => {
        const response = new Response(null);
        expect(getMediaType(response)).toBe('');
    });
});
