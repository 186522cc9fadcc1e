#!/usr/bin/env -S node --import tsx
/**
 * Entry point for the webkeep CLI application.
 *
 * This module serves as the executable wrapper that bootstraps the CLI by
 * importing and invoking the main function from `@webkeep/cli`. It provides
 * top-level error handling for any fatal, unhandled errors that escape the
 * CLI's own error management.
 *
 * @packageDocumentation
 */

import { main } from '@webkeep/cli';
import { errorMessage } from '@webkeep/utils';

main().catch((error: unknown) => {
    console.error(`\n[webkeep] A fatal, unhandled error occurred: ${errorMessage(error)}`);
    if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
    }
    process.exit(1);
});
