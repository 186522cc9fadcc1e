/**
 * Command line argument parsing and CLI setup for webkeep.
 *
 * This module defines all CLI commands and options using commander.js and
 * hands each one to its implementation in commands.ts.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';
import { CAPTURE_ENGINES, type CaptureEngine } from '@webkeep/types';
import { errorMessage, VERSION } from '@webkeep/utils';
import {
    batchCommand,
    captureCommand,
    deleteCommand,
    exportCommand,
    forkCommand,
    importCommand,
    listCommand,
    noteAddCommand,
    noteListCommand,
    showCommand,
    tagAddCommand,
    tagListCommand,
    tagRemoveCommand,
    type CommandContext,
} from './commands.js';
import { resolveConfig, withLibrary, type GlobalOptions, type RunOptions } from './context.js';

/**
 * Options shared by the capture and batch commands.
 */
interface CaptureCliOptions {
    engine?: CaptureEngine;
    sanitize?: boolean;
    ignoreRobots?: boolean;
    headless: boolean;
    timeout?: string;
}

/**
 * Parses a catalog id argument.
 */
export function parseId(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Expected a numeric catalog id.');
    }
    return Number(value);
}

function captureCliOptions(command: Command): Command {
    return command
        .addOption(
            new Option('-e, --engine <engine>', 'Engine used to fetch the page').choices(
                CAPTURE_ENGINES,
            ),
        )
        .option('--sanitize', 'Strip scripts, embeds and inline handlers')
        .option('--ignore-robots', 'Skip robots.txt checks')
        .option('--no-headless', 'Run the browser engines in visible mode')
        .option('-t, --timeout <seconds>', 'Timeout for every network call');
}

function captureOverrides(opts: CaptureCliOptions): RunOptions['overrides'] {
    return {
        // --no-headless defaults to true, which must not mask the config file
        headless: opts.headless === false ? false : undefined,
        timeout: opts.timeout === undefined ? undefined : Number(opts.timeout),
    };
}

/**
 * Creates the webkeep program.
 *
 * @param execute - Runs a command against a library; replaced in tests
 */
export function createProgram(
    execute: (
        globals: GlobalOptions,
        run: (context: CommandContext) => Promise<number> | number,
        options?: RunOptions,
    ) => Promise<number> = withLibrary,
): Command {
    const program = new Command();

    /**
     * Runs a command and records its exit code. Errors are printed, not
     * thrown, so one bad id does not end in a stack trace.
     */
    const action = async (
        command: Command,
        run: (context: CommandContext) => Promise<number> | number,
        options?: RunOptions,
    ) => {
        const globals = command.optsWithGlobals<GlobalOptions>();
        try {
            const code = await execute(globals, run, options);
            if (code !== 0) {
                process.exitCode = code;
            }
        } catch (error) {
            console.error(chalk.red(`✗ ${errorMessage(error)}`));
            if (globals.verbose && error instanceof Error && error.stack) {
                console.error(chalk.gray(error.stack));
            }
            process.exitCode = 1;
        }
    };

    program
        .name('webkeep')
        .description('Capture web pages into self-contained local snapshots')
        .version(VERSION)
        .option('-c, --config <path>', 'Config file (default: searched from the working directory)')
        .option('-d, --base-dir <dir>', 'Directory that holds snapshots')
        .option('--database <path>', 'SQLite catalog file')
        .option('-v, --verbose', 'Enable verbose logging', false);

    captureCliOptions(
        program
            .command('capture')
            .description('Capture one page')
            .argument('<url>', 'Page to capture (https:// is added when missing)'),
    ).action(async (url: string, opts: CaptureCliOptions, command: Command) => {
        await action(
            command,
            (context) =>
                captureCommand(context, url, {
                    engine: opts.engine,
                    sanitize: opts.sanitize,
                    ignoreRobots: opts.ignoreRobots,
                }),
            { overrides: captureOverrides(opts) },
        );
    });

    captureCliOptions(
        program
            .command('batch')
            .description('Capture several pages one after another')
            .argument('[urls...]', 'Pages to capture')
            .option('-f, --file <path>', 'File with one URL per line'),
    ).action(
        async (urls: string[], opts: CaptureCliOptions & { file?: string }, command: Command) => {
            await action(
                command,
                (context) =>
                    batchCommand(context, urls, {
                        file: opts.file,
                        engine: opts.engine,
                        sanitize: opts.sanitize,
                        ignoreRobots: opts.ignoreRobots,
                    }),
                { overrides: captureOverrides(opts), cancellable: true },
            );
        },
    );

    program
        .command('list')
        .description('List catalogued snapshots, newest first')
        .option('-s, --search <text>', 'Match title, URL or domain')
        .option('--tag <name>', 'Only snapshots carrying this tag')
        .option('--json', 'Print entries as JSON')
        .action(
            async (opts: { search?: string; tag?: string; json?: boolean }, command: Command) => {
                await action(command, (context) => listCommand(context, opts));
            },
        );

    program
        .command('show')
        .description('Show one snapshot with its tags and notes')
        .argument('<id>', 'Catalog id', parseId)
        .action(async (id: number, _opts: unknown, command: Command) => {
            await action(command, (context) => showCommand(context, id));
        });

    const tag = program.command('tag').description('Manage tags');
    tag.command('add')
        .argument('<id>', 'Catalog id', parseId)
        .argument('<name>', 'Tag name')
        .action(async (id: number, name: string, _opts: unknown, command: Command) => {
            await action(command, (context) => tagAddCommand(context, id, name));
        });
    tag.command('remove')
        .argument('<id>', 'Catalog id', parseId)
        .argument('<name>', 'Tag name')
        .action(async (id: number, name: string, _opts: unknown, command: Command) => {
            await action(command, (context) => tagRemoveCommand(context, id, name));
        });
    tag.command('list')
        .description('List all tags with usage counts')
        .action(async (_opts: unknown, command: Command) => {
            await action(command, (context) => tagListCommand(context));
        });

    const note = program.command('note').description('Manage notes');
    note.command('add')
        .argument('<id>', 'Catalog id', parseId)
        .argument('<text...>', 'Note text')
        .action(async (id: number, text: string[], _opts: unknown, command: Command) => {
            await action(command, (context) => noteAddCommand(context, id, text.join(' ')));
        });
    note.command('list')
        .argument('<id>', 'Catalog id', parseId)
        .action(async (id: number, _opts: unknown, command: Command) => {
            await action(command, (context) => noteListCommand(context, id));
        });

    program
        .command('fork')
        .description('Create an edited version of a snapshot')
        .argument('<target>', 'Catalog id or snapshot directory')
        .option('--title <title>', 'Title of the new version')
        .action(async (target: string, opts: { title?: string }, command: Command) => {
            await action(command, (context) => forkCommand(context, target, opts));
        });

    program
        .command('export')
        .description('Pack a snapshot into a zip file')
        .argument('<target>', 'Catalog id or snapshot directory')
        .option('-o, --output <path>', 'Zip file to write (default: <directory>.zip)')
        .action(async (target: string, opts: { output?: string }, command: Command) => {
            await action(command, (context) => exportCommand(context, target, opts));
        });

    program
        .command('import')
        .description('Unpack an exported snapshot and catalogue it')
        .argument('<zip>', 'Zip file')
        .action(async (zip: string, _opts: unknown, command: Command) => {
            await action(command, (context) => importCommand(context, zip));
        });

    program
        .command('delete')
        .description('Remove a snapshot from the catalog and from disk')
        .argument('<id>', 'Catalog id', parseId)
        .action(async (id: number, _opts: unknown, command: Command) => {
            await action(command, (context) => deleteCommand(context, id));
        });

    program
        .command('config')
        .description('Print the effective configuration')
        .action(async (_opts: unknown, command: Command) => {
            const globals = command.optsWithGlobals<GlobalOptions>();
            try {
                console.log(JSON.stringify(await resolveConfig(globals), null, 2));
            } catch (error) {
                console.error(chalk.red(`✗ ${errorMessage(error)}`));
                process.exitCode = 1;
            }
        });

    return program;
}

/**
 * Parses command line arguments and runs the selected command.
 */
export async function parseArgs(argv: string[] = process.argv): Promise<void> {
    await createProgram().parseAsync(argv);
}
