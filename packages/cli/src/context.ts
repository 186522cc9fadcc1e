/**
 * Builds the library a command runs against from configuration and global
 * flags, and tears it down afterwards.
 */

import { SqliteCatalog } from '@webkeep/catalog';
import { WebsiteLibrary } from '@webkeep/library';
import type { CommandContext } from './commands.js';
import { loadConfig, mergeConfig, type WebkeepConfig } from './config.js';
import { createCaptureProgressHandler, createVerboseHandler } from './progress/index.js';
import { SpinnerRegistry } from './spinner-registry.js';

/**
 * Options accepted by every command.
 */
export interface GlobalOptions {
    config?: string;
    baseDir?: string;
    database?: string;
    verbose?: boolean;
}

export interface RunOptions {
    /** Settings that override the config file for this command */
    overrides?: Partial<Record<keyof WebkeepConfig, unknown>>;
    /**
     * The first interrupt aborts `context.signal` instead of exiting; a
     * second one exits.
     */
    cancellable?: boolean;
}

/**
 * Resolves the effective configuration for a command.
 */
export async function resolveConfig(
    globals: GlobalOptions,
    overrides: RunOptions['overrides'] = {},
): Promise<WebkeepConfig> {
    const { config } = await loadConfig({ configPath: globals.config });
    return mergeConfig(config, {
        baseDir: globals.baseDir,
        databasePath: globals.database,
        ...overrides,
    });
}

/**
 * Runs a command against a library backed by the configured SQLite catalog.
 *
 * @returns The command's exit code
 */
export async function withLibrary(
    globals: GlobalOptions,
    run: (context: CommandContext) => Promise<number> | number,
    options: RunOptions = {},
): Promise<number> {
    const settings = await resolveConfig(globals, options.overrides);
    const registry = new SpinnerRegistry();
    const controller = new AbortController();

    if (options.cancellable) {
        registry.setupSignalHandlers(() => {
            if (controller.signal.aborted) {
                process.exit(130);
            }
            controller.abort();
            registry.safeLog('Interrupted, stopping after the current page (interrupt again to quit)');
        });
    } else {
        registry.setupSignalHandlers();
    }

    const library = new WebsiteLibrary({
        catalog: new SqliteCatalog(settings.databasePath),
        config: settings,
        onProgress: createCaptureProgressHandler({
            log: (message) => registry.safeLog(message),
            status: (text) => registry.status(text),
        }),
        onVerbose: createVerboseHandler(
            (message) => registry.safeLog(message, true),
            globals.verbose ?? false,
        ),
    });

    try {
        return await run({
            library,
            registry,
            print: (line) => console.log(line),
            signal: controller.signal,
        });
    } finally {
        registry.cleanup();
        await library.close();
    }
}
