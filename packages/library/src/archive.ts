/**
 * Zip export and import of snapshot directories
 *
 * An exported archive holds one top-level folder named after the snapshot
 * directory:
 *
 * ```
 * example_com_20240101_120000/index.html
 * example_com_20240101_120000/metadata.json
 * example_com_20240101_120000/assets/css/site.css
 * ```
 *
 * Import accepts any archive with a `metadata.json` somewhere in it; the
 * folder holding the shallowest one becomes the snapshot.
 */

import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, relative, resolve, sep } from 'path';
import JSZip from 'jszip';
import type { SnapshotMetadata } from '@webkeep/types';
import {
    createUniqueDirectory,
    METADATA_FILE,
    MissingMetadataError,
    parseMetadata,
    readSnapshotMetadata,
    THUMBNAIL_FILE,
    WriteError,
    writeSnapshotMetadata,
} from '@webkeep/capture';
import {
    errorMessage,
    formatCaptureTimestamp,
    formatSaveDate,
    snapshotDirectoryName,
    toPosixPath,
} from '@webkeep/utils';
import { InvalidArchiveError } from './errors.js';

async function listFiles(directory: string): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await readdir(directory, { withFileTypes: true })) {
        const path = join(directory, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await listFiles(path)));
        } else if (entry.isFile()) {
            files.push(path);
        }
    }
    return files.sort();
}

/**
 * Packs a snapshot directory into a zip file.
 *
 * @param zipPath - Defaults to `<directory>.zip`
 * @returns Path of the written archive
 * @throws MissingMetadataError when the directory is not a snapshot
 * @throws WriteError when the archive could not be written
 */
export async function exportSnapshot(directory: string, zipPath?: string): Promise<string> {
    const root = resolve(directory);
    await readSnapshotMetadata(root);

    const target = zipPath ?? `${root}.zip`;
    const folder = basename(root);
    const zip = new JSZip();

    for (const file of await listFiles(root)) {
        zip.file(`${folder}/${toPosixPath(relative(root, file))}`, await readFile(file));
    }

    try {
        const content = await zip.generateAsync({
            type: 'nodebuffer',
            compression: 'DEFLATE',
        });
        await writeFile(target, content);
    } catch (error) {
        throw new WriteError(target, error);
    }
    return target;
}

export interface UnpackOptions {
    /** Clock used for the new timestamps */
    now?: () => Date;
}

/**
 * Locates the shallowest metadata.json of an archive.
 *
 * @returns The folder prefix of the snapshot (`''` or ending in `/`)
 */
function findSnapshotPrefix(zip: JSZip): string | null {
    let best: string | null = null;
    zip.forEach((path, file) => {
        if (file.dir) return;
        const segments = path.split('/');
        if (segments[segments.length - 1] !== METADATA_FILE) return;
        const prefix = segments.slice(0, -1).map((segment) => `${segment}/`).join('');
        if (best === null || prefix.split('/').length < best.split('/').length) {
            best = prefix;
        }
    });
    return best;
}

/**
 * Unpacks an exported snapshot into a fresh directory under `baseDir` and
 * rewrites its metadata for the new location. Catalog ids from the system
 * that exported the archive are dropped.
 *
 * @throws InvalidArchiveError when the file is not a zip or has no metadata
 * @throws WriteError when the snapshot could not be written
 */
export async function unpackSnapshot(
    zipPath: string,
    baseDir: string,
    options: UnpackOptions = {},
): Promise<SnapshotMetadata> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(await readFile(zipPath));
    } catch (error) {
        throw new InvalidArchiveError(zipPath, errorMessage(error));
    }

    const prefix = findSnapshotPrefix(zip);
    const metadataFile = prefix === null ? null : zip.file(`${prefix}${METADATA_FILE}`);
    if (prefix === null || metadataFile === null) {
        throw new InvalidArchiveError(zipPath, 'No metadata.json found');
    }

    let source: SnapshotMetadata;
    try {
        source = parseMetadata(await metadataFile.async('string'), zipPath);
    } catch (error) {
        if (error instanceof MissingMetadataError) {
            throw new InvalidArchiveError(zipPath, error.reason);
        }
        throw error;
    }

    const imported = (options.now ?? (() => new Date()))();
    const timestamp = formatCaptureTimestamp(imported);
    const parent = resolve(baseDir);

    const dirName = snapshotDirectoryName(source.domain, timestamp);

    let name: string;
    try {
        name = await createUniqueDirectory(parent, dirName);
    } catch (error) {
        throw new WriteError(join(parent, dirName), error);
    }
    const targetPath = join(parent, name);

    try {
        const files: Array<[string, JSZip.JSZipObject]> = [];
        zip.forEach((path, file) => {
            if (!file.dir && path.startsWith(prefix)) {
                files.push([path.slice(prefix.length), file]);
            }
        });

        for (const [path, file] of files) {
            const destination = resolve(targetPath, path);
            // Entries like ../../x would land outside the snapshot
            if (!destination.startsWith(targetPath + sep)) continue;
            await mkdir(dirname(destination), { recursive: true });
            await writeFile(destination, await file.async('nodebuffer'));
        }

        const metadata: SnapshotMetadata = {
            ...source,
            timestamp,
            dateSaved: formatSaveDate(imported),
            directory: targetPath,
            thumbnail: join(targetPath, THUMBNAIL_FILE),
        };
        delete metadata.id;
        delete metadata.parentId;

        await writeSnapshotMetadata(targetPath, metadata);
        return metadata;
    } catch (error) {
        await rm(targetPath, { recursive: true, force: true });
        throw error instanceof WriteError ? error : new WriteError(targetPath, error);
    }
}
