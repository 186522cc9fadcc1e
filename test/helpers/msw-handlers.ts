/**
 * MSW (Mock Service Worker) Handlers
 *
 * Default HTTP handlers for testing. Individual tests register the pages and
 * resources they need with server.use() and the factories below.
 */

import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';

// ============================================================================
// DEFAULT HANDLERS
// ============================================================================

/**
 * Default handlers that provide baseline responses for tests.
 * These can be overridden per-test using server.use().
 */
export const handlers = [
    // No robots.txt anywhere unless a test provides one: everything allowed
    http.get('*/robots.txt', () => {
        return new HttpResponse(null, { status: 404 });
    }),
];

/**
 * MSW server instance for Node.js tests
 */
export const server = setupServer(...handlers);

// ============================================================================
// HANDLER FACTORIES
// ============================================================================

/**
 * Creates a handler that serves an HTML document.
 */
export function createHtmlHandler(url: string, html: string) {
    return http.get(url, () => {
        return new HttpResponse(html, {
            headers: { 'Content-Type': 'text/html; charset=utf-8' },
        });
    });
}

/**
 * Creates a handler that serves a stylesheet.
 */
export function createCssHandler(url: string, css: string) {
    return http.get(url, () => {
        return new HttpResponse(css, {
            headers: { 'Content-Type': 'text/css' },
        });
    });
}

/**
 * Creates a handler that serves a script.
 */
export function createJsHandler(url: string, js: string) {
    return http.get(url, () => {
        return new HttpResponse(js, {
            headers: { 'Content-Type': 'application/javascript' },
        });
    });
}

/**
 * Creates a handler that serves opaque content with the given content type.
 * Tests use short ASCII bodies as stand-ins for image and font bytes.
 */
export function createBinaryHandler(
    url: string,
    body: string,
    contentType: string,
) {
    return http.get(url, () => {
        return new HttpResponse(body, {
            headers: { 'Content-Type': contentType },
        });
    });
}

/**
 * Creates a handler that serves a robots.txt body for an origin.
 */
export function createRobotsHandler(origin: string, body: string) {
    return http.get(`${origin}/robots.txt`, () => {
        return new HttpResponse(body, {
            headers: { 'Content-Type': 'text/plain' },
        });
    });
}

/**
 * Creates a handler that answers with a bare status code.
 */
export function createStatusHandler(url: string, status: number) {
    return http.get(url, () => {
        return new HttpResponse(null, { status });
    });
}

/**
 * Creates a handler that returns a 404 error.
 */
export function create404Handler(url: string) {
    return createStatusHandler(url, 404);
}

/**
 * Creates a handler that returns a 500 error.
 */
export function create500Handler(url: string) {
    return http.get(url, () => {
        return new HttpResponse('Internal Server Error', { status: 500 });
    });
}

/**
 * Creates a handler that fails at the network level.
 */
export function createNetworkErrorHandler(url: string) {
    return http.get(url, () => {
        return HttpResponse.error();
    });
}
