/**
 * Entry point of the webkeep CLI.
 *
 * Commands are defined in cli.ts; index.ts re-exports what embedding code
 * and tests use.
 */

import { parseArgs } from './cli.js';

export { createProgram, parseArgs, parseId } from './cli.js';
export * from './commands.js';
export {
    ConfigError,
    DEFAULT_CONFIG,
    loadConfig,
    mergeConfig,
    webkeepConfigSchema,
    type LoadConfigOptions,
    type LoadedConfig,
    type WebkeepConfig,
} from './config.js';
export { resolveConfig, withLibrary, type GlobalOptions, type RunOptions } from './context.js';
export { SpinnerRegistry, formatLogTime, type SpinnerRegistryOptions } from './spinner-registry.js';
export {
    createCaptureProgressHandler,
    createVerboseHandler,
    formatUrlForLog,
    STATE_LABELS,
    type CaptureEventHandlerOptions,
} from './progress/index.js';

/**
 * Runs the CLI against `process.argv`.
 */
export async function main(): Promise<void> {
    await parseArgs();
}
