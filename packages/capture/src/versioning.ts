/**
 * Snapshot versioning: deriving a new, editable snapshot from an existing one
 */

import { cp, rm } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import type { Catalog, SnapshotMetadata } from '@webkeep/types';
import { formatCaptureTimestamp, formatSaveDate, snapshotDirectoryName } from '@webkeep/utils';
import { WriteError } from './errors.js';
import {
    createUniqueDirectory,
    readSnapshotMetadata,
    THUMBNAIL_FILE,
    writeSnapshotMetadata,
} from './snapshot.js';
import type { OnCaptureVerbose } from './types.js';

export interface ForkOptions {
    /** Title of the new version; defaults to "<title> (edited)" */
    title?: string;
    /** Looked up for the catalog id of the source snapshot */
    catalog?: Pick<Catalog, 'findByDirectory'>;
    /** Clock used for the new timestamps */
    now?: () => Date;
    onVerbose?: OnCaptureVerbose;
}

/**
 * Copies a snapshot into a fresh sibling directory and marks the copy as an
 * edited version of the source.
 *
 * @returns Metadata of the new version, as written to its metadata.json
 * @throws MissingMetadataError when the source has no valid metadata
 * @throws WriteError when the copy could not be written
 */
export async function forkSnapshot(
    directory: string,
    options: ForkOptions = {},
): Promise<SnapshotMetadata> {
    const sourcePath = resolve(directory);
    const source = await readSnapshotMetadata(sourcePath);

    const created = (options.now ?? (() => new Date()))();
    const timestamp = formatCaptureTimestamp(created);
    const parent = dirname(sourcePath);

    let name: string;
    try {
        name = await createUniqueDirectory(
            parent,
            snapshotDirectoryName(source.domain, timestamp),
        );
    } catch (error) {
        throw new WriteError(parent, error);
    }
    const targetPath = join(parent, name);

    const sourceEntry =
        options.catalog?.findByDirectory(sourcePath) ??
        options.catalog?.findByDirectory(source.directory) ??
        null;

    const metadata: SnapshotMetadata = {
        url: source.url,
        title: options.title ?? `${source.title} (edited)`,
        domain: source.domain,
        timestamp,
        dateSaved: formatSaveDate(created),
        thumbnail: join(targetPath, THUMBNAIL_FILE),
        directory: targetPath,
        engineUsed: source.engineUsed,
        isEdited: true,
        originalDirectory: source.directory,
        parentId: sourceEntry?.id ?? source.id ?? null,
    };

    try {
        await cp(sourcePath, targetPath, { recursive: true });
        await writeSnapshotMetadata(targetPath, metadata);
    } catch (error) {
        await rm(targetPath, { recursive: true, force: true });
        throw error instanceof WriteError ? error : new WriteError(targetPath, error);
    }

    options.onVerbose?.({
        type: 'verbose',
        level: 'info',
        source: 'versioning',
        message: `Forked ${sourcePath} into ${targetPath}`,
    });

    return metadata;
}
