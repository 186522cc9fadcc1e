/**
 * `@webkeep/types`
 *
 * Shared TypeScript types for webkeep packages.
 * This module provides the snapshot metadata model, the capture engine
 * identifiers, and the catalog contract consumed by the capture engine.
 *
 * @packageDocumentation
 */

// ============================================================================
// CAPTURE ENGINES
// ============================================================================

/**
 * Strategies that can retrieve the main document of a page.
 *
 * - `direct`: a single HTTP GET, no JavaScript execution
 * - `browser-dom`: headless Chromium, waits for DOM-ready and a `<body>`
 * - `browser-idle`: headless Chromium, waits for the network to go idle
 */
export const CAPTURE_ENGINES = ['direct', 'browser-dom', 'browser-idle'] as const;

export type CaptureEngine = (typeof CAPTURE_ENGINES)[number];

/**
 * Type guard for engine names coming from configuration or the CLI.
 */
export function isCaptureEngine(value: string): value is CaptureEngine {
    return CAPTURE_ENGINES.some((engine) => engine === value);
}

// ============================================================================
// RESOURCES
// ============================================================================

/**
 * Kinds of static resources a snapshot stores locally.
 */
export type ResourceKind = 'stylesheet' | 'script' | 'image' | 'font';

/**
 * Subdirectory of `assets/` that holds each resource kind.
 */
export const ASSET_SUBDIRECTORIES: Record<ResourceKind, string> = {
    stylesheet: 'css',
    script: 'js',
    image: 'images',
    font: 'fonts',
};

// ============================================================================
// SNAPSHOT METADATA
// ============================================================================

/**
 * Descriptive record of one snapshot.
 *
 * Written to `metadata.json` inside the snapshot directory and mirrored into
 * the catalog, which may add an `id` of its own.
 */
export interface SnapshotMetadata {
    /** URL that was captured */
    url: string;
    /** Document title, or "Unknown Title" */
    title: string;
    /** Host (and port) of the captured URL */
    domain: string;
    /** Capture timestamp, `YYYYMMDD_HHMMSS` */
    timestamp: string;
    /** Save timestamp, `YYYY-MM-DD HH:MM:SS` */
    dateSaved: string;
    /** Path of the thumbnail image */
    thumbnail: string;
    /** Path of the snapshot directory */
    directory: string;
    /** Engine that retrieved the main document */
    engineUsed: CaptureEngine;
    /** Set on snapshots derived from another snapshot */
    isEdited?: boolean;
    /** Directory of the snapshot this one was derived from */
    originalDirectory?: string;
    /** Catalog id of the snapshot this one was derived from */
    parentId?: number | null;
    /** Catalog id, once registered */
    id?: number;
}

// ============================================================================
// CATALOG CONTRACT
// ============================================================================

/**
 * A snapshot as stored in the catalog.
 */
export interface CatalogEntry {
    id: number;
    url: string;
    title: string;
    domain: string;
    timestamp: string;
    dateSaved: string;
    directory: string;
    thumbnail: string;
    isEdited: boolean;
    parentId: number | null;
}

/**
 * Fields of a catalog entry that may be updated after insertion.
 */
export type CatalogEntryUpdate = Partial<
    Pick<CatalogEntry, 'url' | 'title' | 'domain' | 'thumbnail' | 'isEdited'>
>;

export interface CatalogTag {
    id: number;
    name: string;
}

export interface CatalogTagUsage extends CatalogTag {
    /** Number of entries carrying the tag */
    count: number;
}

export interface CatalogNote {
    id: number;
    entryId: number;
    text: string;
    dateCreated: string;
}

/**
 * Filter for {@link Catalog.listEntries}.
 */
export interface CatalogFilter {
    /** Substring matched against title, url and domain */
    search?: string;
    /** Only entries carrying this tag */
    tag?: string;
}

/**
 * Narrow contract between the capture engine and the catalog that stores
 * website, tag and note records.
 *
 * Inserting a metadata record whose directory is already catalogued is not an
 * error: {@link Catalog.addEntry} returns `null` and the caller treats the
 * snapshot as already archived.
 */
export interface Catalog {
    addEntry(metadata: SnapshotMetadata): number | null;
    updateEntry(id: number, fields: CatalogEntryUpdate): void;
    findByDirectory(directory: string): CatalogEntry | null;
    getEntry(id: number): CatalogEntry | null;
    /** Entries ordered newest first */
    listEntries(filter?: CatalogFilter): CatalogEntry[];
    /** Removes the entry with its tag links and notes */
    deleteEntry(id: number): void;
    /** @returns false when the entry already carries the tag */
    addTag(entryId: number, name: string): boolean;
    removeTag(entryId: number, tagId: number): void;
    /** Tags of one entry, ordered by name */
    listTags(entryId: number): CatalogTag[];
    /** All tags with usage counts, most used first */
    listAllTags(): CatalogTagUsage[];
    addNote(entryId: number, text: string): number;
    /** Notes of one entry, newest first */
    listNotes(entryId: number): CatalogNote[];
    close(): void;
}
