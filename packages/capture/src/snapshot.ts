/**
 * On-disk layout of a snapshot
 *
 * ```
 * <baseDir>/<domain>_<timestamp>/
 *   index.html
 *   metadata.json
 *   thumbnail.png
 *   assets/{css,js,images,fonts}/
 * ```
 */

import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import sharp from 'sharp';
import { z } from 'zod';
import {
    ASSET_SUBDIRECTORIES,
    CAPTURE_ENGINES,
    type CaptureEngine,
    type SnapshotMetadata,
} from '@webkeep/types';
import { errorMessage } from '@webkeep/utils';
import { MissingMetadataError, WriteError } from './errors.js';
import type { OnCaptureVerbose } from './types.js';

export const INDEX_FILE = 'index.html';
export const METADATA_FILE = 'metadata.json';
export const THUMBNAIL_FILE = 'thumbnail.png';

const THUMBNAIL_WIDTH = 200;
const THUMBNAIL_HEIGHT = 150;
const THUMBNAIL_BACKGROUND = '#f0f0f0';

// ============================================================================
// METADATA
// ============================================================================

/** Engine names written by earlier archivers */
const LEGACY_ENGINES: Record<string, CaptureEngine> = {
    requests: 'direct',
    selenium: 'browser-dom',
    playwright: 'browser-idle',
};

/**
 * Engine name as found in metadata and configuration files. Names used by
 * earlier archivers are mapped onto the current engines.
 */
export const captureEngineSchema = z.preprocess(
    (value) =>
        typeof value === 'string' && value in LEGACY_ENGINES ? LEGACY_ENGINES[value] : value,
    z.enum(CAPTURE_ENGINES),
);

/**
 * Schema of metadata.json. Keys are snake_case on disk.
 */
export const metadataRecordSchema = z.object({
    url: z.string(),
    title: z.string(),
    domain: z.string(),
    timestamp: z.string(),
    date_saved: z.string(),
    thumbnail: z.string(),
    directory: z.string(),
    engine_used: captureEngineSchema.default('direct'),
    is_edited: z.boolean().optional(),
    original_directory: z.string().optional(),
    parent_id: z.number().int().nullable().optional(),
    id: z.number().int().optional(),
});

export type MetadataRecord = z.infer<typeof metadataRecordSchema>;

/**
 * Converts metadata to its on-disk record, leaving out unset fields.
 */
export function toMetadataRecord(metadata: SnapshotMetadata): MetadataRecord {
    const record: MetadataRecord = {
        url: metadata.url,
        title: metadata.title,
        domain: metadata.domain,
        timestamp: metadata.timestamp,
        date_saved: metadata.dateSaved,
        thumbnail: metadata.thumbnail,
        directory: metadata.directory,
        engine_used: metadata.engineUsed,
    };
    if (metadata.isEdited !== undefined) record.is_edited = metadata.isEdited;
    if (metadata.originalDirectory !== undefined) {
        record.original_directory = metadata.originalDirectory;
    }
    if (metadata.parentId !== undefined) record.parent_id = metadata.parentId;
    if (metadata.id !== undefined) record.id = metadata.id;
    return record;
}

export function fromMetadataRecord(record: MetadataRecord): SnapshotMetadata {
    const metadata: SnapshotMetadata = {
        url: record.url,
        title: record.title,
        domain: record.domain,
        timestamp: record.timestamp,
        dateSaved: record.date_saved,
        thumbnail: record.thumbnail,
        directory: record.directory,
        engineUsed: record.engine_used,
    };
    if (record.is_edited !== undefined) metadata.isEdited = record.is_edited;
    if (record.original_directory !== undefined) {
        metadata.originalDirectory = record.original_directory;
    }
    if (record.parent_id !== undefined) metadata.parentId = record.parent_id;
    if (record.id !== undefined) metadata.id = record.id;
    return metadata;
}

/**
 * Serializes metadata as metadata.json content (4-space indented).
 */
export function serializeMetadata(metadata: SnapshotMetadata): string {
    return JSON.stringify(toMetadataRecord(metadata), null, 4);
}

/**
 * Parses and validates metadata.json content.
 *
 * @throws MissingMetadataError when the content is not a valid record
 */
export function parseMetadata(content: string, directory: string): SnapshotMetadata {
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new MissingMetadataError(directory, `invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = metadataRecordSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new MissingMetadataError(directory, issues);
    }
    return fromMetadataRecord(parsed.data);
}

/**
 * Reads the metadata of a snapshot directory.
 *
 * @throws MissingMetadataError when metadata.json is absent or malformed
 */
export async function readSnapshotMetadata(directory: string): Promise<SnapshotMetadata> {
    let content: string;
    try {
        content = await readFile(join(directory, METADATA_FILE), 'utf-8');
    } catch (error) {
        throw new MissingMetadataError(directory, errorMessage(error));
    }
    return parseMetadata(content, directory);
}

/**
 * Writes the metadata of a snapshot directory.
 */
export async function writeSnapshotMetadata(
    directory: string,
    metadata: SnapshotMetadata,
): Promise<void> {
    const path = join(directory, METADATA_FILE);
    try {
        await writeFile(path, serializeMetadata(metadata), 'utf-8');
    } catch (error) {
        throw new WriteError(path, error);
    }
}

/**
 * Writes the 200x150 placeholder thumbnail.
 */
export async function writeThumbnail(path: string): Promise<void> {
    try {
        await sharp({
            create: {
                width: THUMBNAIL_WIDTH,
                height: THUMBNAIL_HEIGHT,
                channels: 3,
                background: THUMBNAIL_BACKGROUND,
            },
        })
            .png()
            .toFile(path);
    } catch (error) {
        throw new WriteError(path, error);
    }
}

// ============================================================================
// DIRECTORY LIFECYCLE
// ============================================================================

/**
 * A snapshot directory being filled.
 */
export interface SnapshotHandle {
    /** Directory name under the base directory */
    readonly name: string;
    /** Absolute path of the directory */
    readonly path: string;
}

function isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Creates fresh directory `<parent>/<name>`, appending `_1`, `_2`, ... when
 * the name is taken.
 *
 * @returns The name that was created
 */
export async function createUniqueDirectory(parent: string, name: string): Promise<string> {
    await mkdir(parent, { recursive: true });

    for (let attempt = 0; ; attempt++) {
        const candidate = attempt === 0 ? name : `${name}_${attempt}`;
        try {
            await mkdir(join(parent, candidate));
            return candidate;
        } catch (error) {
            if (!isAlreadyExists(error)) throw error;
        }
    }
}

export interface SnapshotMaterializerOptions {
    onVerbose?: OnCaptureVerbose;
}

/**
 * Owns the directories of the snapshots written under one base directory.
 */
export class SnapshotMaterializer {
    readonly baseDir: string;
    private readonly onVerbose?: OnCaptureVerbose;

    constructor(baseDir: string, options: SnapshotMaterializerOptions = {}) {
        this.baseDir = resolve(baseDir);
        this.onVerbose = options.onVerbose;
    }

    /**
     * Creates the snapshot directory and its asset subdirectories.
     *
     * @throws WriteError when the directory cannot be created
     */
    async begin(dirName: string): Promise<SnapshotHandle> {
        let name: string;
        try {
            name = await createUniqueDirectory(this.baseDir, dirName);
        } catch (error) {
            throw new WriteError(join(this.baseDir, dirName), error);
        }

        const handle: SnapshotHandle = { name, path: join(this.baseDir, name) };
        try {
            for (const subdirectory of Object.values(ASSET_SUBDIRECTORIES)) {
                await mkdir(join(handle.path, 'assets', subdirectory), { recursive: true });
            }
        } catch (error) {
            await this.abort(handle);
            throw new WriteError(handle.path, error);
        }

        this.log('debug', `Created snapshot directory ${handle.path}`);
        return handle;
    }

    /**
     * Writes the rewritten page.
     */
    async writeMarkup(handle: SnapshotHandle, markup: string): Promise<void> {
        const path = join(handle.path, INDEX_FILE);
        try {
            await writeFile(path, markup, 'utf-8');
        } catch (error) {
            throw new WriteError(path, error);
        }
    }

    /**
     * Writes the placeholder thumbnail and returns its path.
     */
    async writeThumbnail(handle: SnapshotHandle): Promise<string> {
        const path = join(handle.path, THUMBNAIL_FILE);
        await writeThumbnail(path);
        return path;
    }

    async writeMetadata(handle: SnapshotHandle, metadata: SnapshotMetadata): Promise<void> {
        await writeSnapshotMetadata(handle.path, metadata);
    }

    /**
     * Writes page, thumbnail and metadata in one go. The metadata's
     * `thumbnail` field is set to the written thumbnail.
     *
     * @param onThumbnail - Called once the page is written, before the thumbnail
     */
    async commit(
        handle: SnapshotHandle,
        markup: string,
        metadata: SnapshotMetadata,
        onThumbnail?: () => void,
    ): Promise<SnapshotMetadata> {
        await this.writeMarkup(handle, markup);
        onThumbnail?.();
        const thumbnail = await this.writeThumbnail(handle);
        const committed = { ...metadata, thumbnail };
        await this.writeMetadata(handle, committed);
        return committed;
    }

    /**
     * Removes the snapshot directory and everything in it.
     */
    async abort(handle: SnapshotHandle): Promise<void> {
        await rm(handle.path, { recursive: true, force: true });
        this.log('debug', `Removed snapshot directory ${handle.path}`);
    }

    private log(level: 'debug', message: string): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'snapshot', message });
    }
}
