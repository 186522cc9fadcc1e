import type { CaptureEngine } from '@webkeep/types';

/**
 * Markup produced by a backend.
 */
export interface RenderResult {
    html: string;
    /** URL after redirects; relative references resolve against it */
    finalUrl: string;
    /** The engine gave up waiting for the page to be ready */
    timedOut: boolean;
}

/**
 * A strategy that turns a URL into markup.
 */
export interface FetchBackend {
    readonly engine: CaptureEngine;
    /**
     * @param timeout - Milliseconds allowed for loading the page
     * @throws BackendError when nothing could be retrieved
     */
    render(url: string, timeout: number): Promise<RenderResult>;
    /** Frees anything the backend holds open. Safe to call repeatedly. */
    release(): Promise<void>;
}
