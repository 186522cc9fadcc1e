/**
 * Command implementations.
 *
 * Each command works against a {@link CommandContext} and returns the exit
 * code for the process. Errors that are not about the command's own outcome
 * (unknown ids, unreadable files) are thrown to the caller.
 */

import { readFile } from 'fs/promises';
import chalk from 'chalk';
import type { CaptureEngine } from '@webkeep/capture';
import { UnknownEntryError, type CatalogEntry } from '@webkeep/catalog';
import type { WebsiteLibrary } from '@webkeep/library';
import { errorMessage } from '@webkeep/utils';
import type { SpinnerRegistry } from './spinner-registry.js';

export interface CommandContext {
    library: WebsiteLibrary;
    registry: SpinnerRegistry;
    /** Plain output for command results */
    print: (line: string) => void;
    /** Aborted on the first interrupt of a cancellable command */
    signal?: AbortSignal;
}

export interface CaptureCommandOptions {
    engine?: CaptureEngine;
    sanitize?: boolean;
    ignoreRobots?: boolean;
}

/**
 * Normalizes a URL by adding https:// if no protocol is specified.
 *
 * This allows users to pass URLs like "example.com" without the protocol.
 */
export function normalizeUrl(url: string): string {
    if (/^[a-z][a-z\d+.-]*:\/\//i.test(url)) {
        return url;
    }
    return `https://${url}`;
}

/**
 * Reads a URL list: one URL per line, blank lines and `#` comments skipped.
 */
export async function readUrlFile(path: string): Promise<string[]> {
    const content = await readFile(path, 'utf-8');
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function requireEntry(context: CommandContext, id: number): CatalogEntry {
    const entry = context.library.catalog.getEntry(id);
    if (!entry) {
        throw new UnknownEntryError(id);
    }
    return entry;
}

/**
 * Accepts either a catalog id or a snapshot directory.
 */
export function resolveSnapshotDirectory(context: CommandContext, target: string): string {
    if (/^\d+$/.test(target)) {
        return requireEntry(context, Number(target)).directory;
    }
    return target;
}

function formatTags(context: CommandContext, entryId: number): string {
    return context.library.catalog
        .listTags(entryId)
        .map((tag) => tag.name)
        .join(', ');
}

export async function captureCommand(
    context: CommandContext,
    url: string,
    options: CaptureCommandOptions = {},
): Promise<number> {
    const { registry, print } = context;
    const target = normalizeUrl(url);
    const spinner = registry.start(`Capturing ${target}`);

    try {
        const { metadata, errors } = await context.library.capture({
            url: target,
            engine: options.engine,
            sanitizeHtml: options.sanitize,
            ignorePolicy: options.ignoreRobots,
        });
        registry.succeed(spinner, `Saved ${chalk.bold(metadata.title)} to ${chalk.cyan(metadata.directory)}`);
        if (metadata.id !== undefined) {
            print(`    Catalog id: ${metadata.id}`);
        }
        if (errors.length > 0) {
            print(`    ${chalk.yellow('!')} ${errors.length} resources kept their remote URLs`);
        }
        return 0;
    } catch (error) {
        registry.fail(spinner, `Capture failed: ${errorMessage(error)}`);
        return 1;
    }
}

export interface BatchCommandOptions extends CaptureCommandOptions {
    /** File with one URL per line */
    file?: string;
}

export async function batchCommand(
    context: CommandContext,
    urls: string[],
    options: BatchCommandOptions = {},
): Promise<number> {
    const { registry, print } = context;
    const targets = [...urls, ...(options.file ? await readUrlFile(options.file) : [])].map(
        normalizeUrl,
    );
    if (targets.length === 0) {
        print(chalk.red('No URLs given'));
        return 1;
    }

    const spinner = registry.start(`Capturing ${targets.length} pages`);
    const result = await context.library.captureBatch(targets, {
        engine: options.engine,
        sanitizeHtml: options.sanitize,
        ignorePolicy: options.ignoreRobots,
        signal: context.signal,
    });

    const summary = `Captured ${chalk.bold(result.successful)} of ${result.total} pages`;
    if (result.failed === 0) {
        registry.succeed(spinner, summary);
        return 0;
    }
    registry.fail(spinner, summary);
    for (const failure of result.failures) {
        print(`    ${chalk.red('✗')} ${failure.url}: ${failure.error}`);
    }
    return 1;
}

export interface ListCommandOptions {
    search?: string;
    tag?: string;
    json?: boolean;
}

export function listCommand(context: CommandContext, options: ListCommandOptions = {}): number {
    const { print } = context;
    const entries = context.library.list({ search: options.search, tag: options.tag });

    if (options.json) {
        print(JSON.stringify(entries, null, 2));
        return 0;
    }
    if (entries.length === 0) {
        print('No snapshots found');
        return 0;
    }

    for (const entry of entries) {
        const tags = formatTags(context, entry.id);
        const edited = entry.isEdited ? chalk.yellow(' (edited)') : '';
        print(
            `${chalk.bold(`#${entry.id}`)}  ${chalk.gray(entry.dateSaved)}  ${entry.title}${edited}${tags ? chalk.cyan(`  [${tags}]`) : ''}`,
        );
        print(`    ${entry.url}`);
    }
    return 0;
}

export function showCommand(context: CommandContext, id: number): number {
    const { print } = context;
    const entry = requireEntry(context, id);
    const tags = formatTags(context, id);

    print(chalk.bold(entry.title));
    print(`  URL:        ${entry.url}`);
    print(`  Domain:     ${entry.domain}`);
    print(`  Saved:      ${entry.dateSaved}`);
    print(`  Directory:  ${entry.directory}`);
    print(`  Thumbnail:  ${entry.thumbnail}`);
    if (entry.isEdited) {
        print(`  Edited:     yes${entry.parentId !== null ? ` (from #${entry.parentId})` : ''}`);
    }
    print(`  Tags:       ${tags || chalk.gray('none')}`);

    const notes = context.library.catalog.listNotes(id);
    if (notes.length > 0) {
        print('  Notes:');
        for (const note of notes) {
            print(`    ${chalk.gray(`[${note.dateCreated}]`)} ${note.text}`);
        }
    }
    return 0;
}

export function tagAddCommand(context: CommandContext, id: number, name: string): number {
    const tag = name.trim();
    if (!tag) {
        context.print(chalk.red('Tag names cannot be empty'));
        return 1;
    }
    if (context.library.catalog.addTag(id, tag)) {
        context.print(`Tagged #${id} with ${tag}`);
    } else {
        context.print(`#${id} is already tagged ${tag}`);
    }
    return 0;
}

export function tagRemoveCommand(context: CommandContext, id: number, name: string): number {
    requireEntry(context, id);
    const tag = context.library.catalog.listTags(id).find((candidate) => candidate.name === name.trim());
    if (!tag) {
        context.print(chalk.red(`#${id} is not tagged ${name}`));
        return 1;
    }
    context.library.catalog.removeTag(id, tag.id);
    context.print(`Removed ${tag.name} from #${id}`);
    return 0;
}

export function tagListCommand(context: CommandContext): number {
    const tags = context.library.catalog.listAllTags();
    if (tags.length === 0) {
        context.print('No tags');
        return 0;
    }
    for (const tag of tags) {
        context.print(`${tag.name} (${tag.count})`);
    }
    return 0;
}

export function noteAddCommand(context: CommandContext, id: number, text: string): number {
    const noteId = context.library.catalog.addNote(id, text);
    context.print(`Added note ${noteId} to #${id}`);
    return 0;
}

export function noteListCommand(context: CommandContext, id: number): number {
    requireEntry(context, id);
    const notes = context.library.catalog.listNotes(id);
    if (notes.length === 0) {
        context.print(`No notes on #${id}`);
        return 0;
    }
    for (const note of notes) {
        context.print(`${chalk.gray(`[${note.dateCreated}]`)} ${note.text}`);
    }
    return 0;
}

export async function forkCommand(
    context: CommandContext,
    target: string,
    options: { title?: string } = {},
): Promise<number> {
    const directory = resolveSnapshotDirectory(context, target);
    const metadata = await context.library.fork(directory, options.title);
    context.print(
        `Forked into ${metadata.directory}${metadata.id !== undefined ? ` (#${metadata.id})` : ''}`,
    );
    return 0;
}

export async function exportCommand(
    context: CommandContext,
    target: string,
    options: { output?: string } = {},
): Promise<number> {
    const directory = resolveSnapshotDirectory(context, target);
    const zipPath = await context.library.export(directory, options.output);
    context.print(`Exported to ${zipPath}`);
    return 0;
}

export async function importCommand(context: CommandContext, zipPath: string): Promise<number> {
    const metadata = await context.library.import(zipPath);
    context.print(
        `Imported ${metadata.title} into ${metadata.directory}${metadata.id !== undefined ? ` (#${metadata.id})` : ''}`,
    );
    return 0;
}

export async function deleteCommand(context: CommandContext, id: number): Promise<number> {
    requireEntry(context, id);
    const removed = await context.library.delete(id);
    context.print(removed ? `Deleted #${id}` : `Deleted #${id} (its directory was already gone)`);
    return 0;
}
