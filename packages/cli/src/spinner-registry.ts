/**
 * Spinner registry for ora spinners.
 *
 * Keeps log lines from tearing through active spinners, and clears them when
 * the process is interrupted.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

export interface SpinnerRegistryOptions {
    /** Line sink for {@link SpinnerRegistry.safeLog} (default: console.log) */
    write?: (line: string) => void;
    /** Clock for log timestamps */
    now?: () => Date;
    /** Create spinners that never render, for non-interactive output */
    silent?: boolean;
}

/**
 * Formats a time as `HH:MM:SS.mmm`.
 */
export function formatLogTime(date: Date): string {
    const pad = (value: number, width: number = 2) => value.toString().padStart(width, '0');
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Registry for ora spinners with synchronized logging.
 *
 * @example
 * ```typescript
 * const registry = new SpinnerRegistry();
 * registry.setupSignalHandlers();
 *
 * const spinner = registry.start('Capturing...');
 * registry.safeLog('Something happened');
 * registry.succeed(spinner, 'Saved');
 *
 * registry.cleanup();
 * ```
 */
export class SpinnerRegistry {
    private spinners: Set<Ora> = new Set();
    private signalHandlers: Array<() => void> = [];
    private readonly write: (line: string) => void;
    private readonly now: () => Date;
    private readonly silent: boolean;

    constructor(options: SpinnerRegistryOptions = {}) {
        this.write = options.write ?? ((line) => console.log(line));
        this.now = options.now ?? (() => new Date());
        this.silent = options.silent ?? false;
    }

    /**
     * Starts a spinner and registers it.
     */
    start(text: string): Ora {
        const spinner = ora({ text, isSilent: this.silent }).start();
        this.spinners.add(spinner);
        return spinner;
    }

    succeed(spinner: Ora, text: string) {
        this.spinners.delete(spinner);
        spinner.succeed(text);
    }

    fail(spinner: Ora, text: string) {
        this.spinners.delete(spinner);
        spinner.fail(text);
    }

    /**
     * Updates the text of the most recently started spinner.
     */
    status(text: string) {
        const current = [...this.spinners].at(-1);
        if (current) {
            current.text = text;
        }
    }

    get activeCount(): number {
        return this.spinners.size;
    }

    /**
     * Logs a timestamped message without interfering with active spinners.
     *
     * @param isVerbose - Formats the message in gray
     */
    safeLog(message: string, isVerbose: boolean = false) {
        const line = `[${formatLogTime(this.now())}] ${message}`;

        // Clear spinner lines without stopping them (avoids flicker)
        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.clear();
            }
        }

        this.write(isVerbose ? chalk.gray(line) : chalk.cyan(line));

        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.render();
            }
        }
    }

    /**
     * Sets up handlers that clear spinners on SIGINT/SIGTERM. `onInterrupt`
     * runs instead of exiting when given, so a batch can stop between pages.
     */
    setupSignalHandlers(onInterrupt?: () => void) {
        const handler = () => {
            this.clearAll();
            if (onInterrupt) {
                onInterrupt();
            } else {
                process.exit(130);
            }
        };

        process.on('SIGINT', handler);
        process.on('SIGTERM', handler);

        this.signalHandlers.push(() => {
            process.off('SIGINT', handler);
            process.off('SIGTERM', handler);
        });
    }

    clearAll() {
        for (const spinner of this.spinners) {
            spinner.clear();
        }
    }

    /**
     * Stops every spinner still running and removes the signal handlers.
     */
    cleanup() {
        for (const spinner of this.spinners) {
            spinner.stop();
        }
        this.spinners.clear();
        this.signalHandlers.forEach((remove) => remove());
        this.signalHandlers = [];
    }
}
