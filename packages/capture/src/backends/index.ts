import type { CaptureEngine } from '@webkeep/types';
import { BrowserSession, type BrowserLauncher } from '../browser.js';
import type { OnCaptureVerbose } from '../types.js';
import { BrowserBackend } from './browser.js';
import { DirectBackend } from './direct.js';
import type { FetchBackend } from './types.js';

export type { FetchBackend, RenderResult } from './types.js';
export { DirectBackend, type DirectBackendOptions } from './direct.js';
export {
    BrowserBackend,
    type BrowserBackendOptions,
    type BrowserEngine,
} from './browser.js';

export interface BackendFactoryOptions {
    userAgent?: string;
    retries?: number;
    headless?: boolean;
    settleDelay?: number;
    launcher?: BrowserLauncher;
    onVerbose?: OnCaptureVerbose;
}

/**
 * Creates the backend for an engine. Browser backends get a session of
 * their own, launched on first render.
 */
export function createBackend(
    engine: CaptureEngine,
    options: BackendFactoryOptions = {},
): FetchBackend {
    switch (engine) {
        case 'direct':
            return new DirectBackend({
                userAgent: options.userAgent,
                retries: options.retries,
            });
        case 'browser-dom':
        case 'browser-idle':
            return new BrowserBackend(engine, {
                session: new BrowserSession({
                    headless: options.headless,
                    userAgent: options.userAgent,
                    launcher: options.launcher,
                    onVerbose: options.onVerbose,
                }),
                settleDelay: options.settleDelay,
                onVerbose: options.onVerbose,
            });
    }
}
