/**
 * Website library
 *
 * Ties the capture engine to a catalog: every snapshot written through the
 * library is registered, and deleting, forking or importing keeps disk and
 * catalog in step.
 */

import { existsSync, statSync } from 'fs';
import { rm } from 'fs/promises';
import { resolve } from 'path';
import {
    CaptureOrchestrator,
    forkSnapshot,
    type BatchOptions,
    type BatchResult,
    type BrowserLauncher,
    type CaptureConfig,
    type CaptureRequest,
    type CaptureResult,
    type FetchBackend,
    type OnCaptureProgress,
    type OnCaptureVerbose,
} from '@webkeep/capture';
import type {
    Catalog,
    CatalogEntry,
    CatalogFilter,
    CaptureEngine,
    SnapshotMetadata,
} from '@webkeep/types';
import { exportSnapshot, unpackSnapshot } from './archive.js';

export interface WebsiteLibraryOptions {
    /** Where snapshots are registered; closed by {@link WebsiteLibrary.close} */
    catalog: Catalog;
    config?: Partial<CaptureConfig>;
    onProgress?: OnCaptureProgress;
    onVerbose?: OnCaptureVerbose;
    /** Clock used for timestamps */
    now?: () => Date;
    launcher?: BrowserLauncher;
    backends?: Partial<Record<CaptureEngine, FetchBackend>>;
}

export class WebsiteLibrary {
    readonly catalog: Catalog;
    readonly orchestrator: CaptureOrchestrator;
    private readonly onVerbose?: OnCaptureVerbose;
    private readonly now: () => Date;

    constructor(options: WebsiteLibraryOptions) {
        this.catalog = options.catalog;
        this.onVerbose = options.onVerbose;
        this.now = options.now ?? (() => new Date());
        this.orchestrator = new CaptureOrchestrator({
            config: options.config,
            onProgress: options.onProgress,
            onVerbose: options.onVerbose,
            now: this.now,
            launcher: options.launcher,
            backends: options.backends,
        });
    }

    get baseDir(): string {
        return this.orchestrator.config.baseDir;
    }

    /**
     * Captures a page and registers the snapshot. A failed capture leaves
     * the catalog untouched.
     */
    async capture(request: CaptureRequest | string): Promise<CaptureResult> {
        const result = await this.orchestrator.capture(request);
        this.register(result.metadata);
        return result;
    }

    /**
     * Captures pages one after another and registers each snapshot.
     */
    async captureBatch(urls: string[], options: BatchOptions = {}): Promise<BatchResult> {
        const result = await this.orchestrator.captureBatch(urls, options);
        for (const item of result.succeeded) {
            this.register(item.metadata);
        }
        return result;
    }

    list(filter?: CatalogFilter): CatalogEntry[] {
        return this.catalog.listEntries(filter);
    }

    /**
     * Removes an entry from the catalog and its directory from disk.
     *
     * @returns true when a snapshot directory was removed
     */
    async delete(id: number): Promise<boolean> {
        const entry = this.catalog.getEntry(id);
        this.catalog.deleteEntry(id);

        if (!entry || !existsSync(entry.directory) || !statSync(entry.directory).isDirectory()) {
            return false;
        }
        await rm(entry.directory, { recursive: true, force: true });
        this.log('info', `Deleted ${entry.directory}`);
        return true;
    }

    /**
     * Packs a snapshot into a zip file.
     *
     * @param zipPath - Defaults to `<directory>.zip`
     */
    async export(directory: string, zipPath?: string): Promise<string> {
        const written = await exportSnapshot(directory, zipPath);
        this.log('info', `Exported ${directory} to ${written}`);
        return written;
    }

    /**
     * Unpacks an exported snapshot under the base directory and registers it.
     *
     * @throws InvalidArchiveError when the archive holds no metadata.json
     */
    async import(zipPath: string): Promise<SnapshotMetadata> {
        const metadata = await unpackSnapshot(zipPath, this.baseDir, { now: this.now });
        this.register(metadata);
        this.log('info', `Imported ${zipPath} into ${metadata.directory}`);
        return metadata;
    }

    /**
     * Creates an edited version of a snapshot. The new entry carries the
     * tags of its source.
     */
    async fork(directory: string, title?: string): Promise<SnapshotMetadata> {
        const metadata = await forkSnapshot(directory, {
            title,
            catalog: this.catalog,
            now: this.now,
            onVerbose: this.onVerbose,
        });

        const id = this.register(metadata);
        const source =
            this.catalog.findByDirectory(resolve(directory)) ??
            (metadata.originalDirectory
                ? this.catalog.findByDirectory(metadata.originalDirectory)
                : null);
        if (id !== null && source) {
            for (const tag of this.catalog.listTags(source.id)) {
                this.catalog.addTag(id, tag.name);
            }
        }
        return metadata;
    }

    /**
     * Releases browser sessions and closes the catalog.
     */
    async close(): Promise<void> {
        await this.orchestrator.close();
        this.catalog.close();
    }

    /**
     * Adds metadata to the catalog, setting its `id` on success.
     */
    private register(metadata: SnapshotMetadata): number | null {
        const id = this.catalog.addEntry(metadata);
        if (id === null) {
            this.log('warn', `${metadata.directory} is already catalogued`);
            return null;
        }
        metadata.id = id;
        return id;
    }

    private log(level: 'info' | 'warn', message: string): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'library', message });
    }
}
