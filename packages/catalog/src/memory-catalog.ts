/**
 * In-memory catalog with the same ordering and uniqueness rules as
 * {@link SqliteCatalog}
 */

import type {
    Catalog,
    CatalogEntry,
    CatalogEntryUpdate,
    CatalogFilter,
    CatalogNote,
    CatalogTag,
    CatalogTagUsage,
    SnapshotMetadata,
} from '@webkeep/types';
import { formatSaveDate } from '@webkeep/utils';
import { UnknownEntryError } from './errors.js';

export interface MemoryCatalogOptions {
    /** Clock used for note timestamps */
    now?: () => Date;
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export class MemoryCatalog implements Catalog {
    private readonly entries = new Map<number, CatalogEntry>();
    private readonly tags = new Map<number, CatalogTag>();
    /** entry id -> tag ids */
    private readonly links = new Map<number, Set<number>>();
    private readonly notes = new Map<number, CatalogNote>();
    private nextEntryId = 1;
    private nextTagId = 1;
    private nextNoteId = 1;
    private readonly now: () => Date;

    constructor(options: MemoryCatalogOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    addEntry(metadata: SnapshotMetadata): number | null {
        if (this.findByDirectory(metadata.directory)) {
            return null;
        }

        const parentId = metadata.parentId ?? null;
        const id = this.nextEntryId++;
        this.entries.set(id, {
            id,
            url: metadata.url,
            title: metadata.title,
            domain: metadata.domain,
            timestamp: metadata.timestamp,
            dateSaved: metadata.dateSaved,
            directory: metadata.directory,
            thumbnail: metadata.thumbnail,
            isEdited: metadata.isEdited ?? false,
            parentId: parentId !== null && this.entries.has(parentId) ? parentId : null,
        });
        return id;
    }

    updateEntry(id: number, fields: CatalogEntryUpdate): void {
        const entry = this.entries.get(id);
        if (!entry) return;

        const updated = { ...entry };
        if (fields.url !== undefined) updated.url = fields.url;
        if (fields.title !== undefined) updated.title = fields.title;
        if (fields.domain !== undefined) updated.domain = fields.domain;
        if (fields.thumbnail !== undefined) updated.thumbnail = fields.thumbnail;
        if (fields.isEdited !== undefined) updated.isEdited = fields.isEdited;
        this.entries.set(id, updated);
    }

    findByDirectory(directory: string): CatalogEntry | null {
        for (const entry of this.entries.values()) {
            if (entry.directory === directory) return { ...entry };
        }
        return null;
    }

    getEntry(id: number): CatalogEntry | null {
        const entry = this.entries.get(id);
        return entry ? { ...entry } : null;
    }

    listEntries(filter: CatalogFilter = {}): CatalogEntry[] {
        const search = filter.search?.toLowerCase();
        const tagId = filter.tag ? this.tagIdByName(filter.tag) : undefined;

        return [...this.entries.values()]
            .filter((entry) => {
                if (filter.tag) {
                    if (tagId === undefined || !this.links.get(entry.id)?.has(tagId)) {
                        return false;
                    }
                }
                if (search) {
                    return [entry.title, entry.url, entry.domain].some((field) =>
                        field.toLowerCase().includes(search),
                    );
                }
                return true;
            })
            .sort((a, b) => compareText(b.dateSaved, a.dateSaved) || b.id - a.id)
            .map((entry) => ({ ...entry }));
    }

    deleteEntry(id: number): void {
        this.links.delete(id);
        for (const note of [...this.notes.values()]) {
            if (note.entryId === id) this.notes.delete(note.id);
        }
        this.entries.delete(id);

        for (const entry of this.entries.values()) {
            if (entry.parentId === id) entry.parentId = null;
        }
    }

    addTag(entryId: number, name: string): boolean {
        this.requireEntry(entryId);

        let tagId = this.tagIdByName(name);
        if (tagId === undefined) {
            tagId = this.nextTagId++;
            this.tags.set(tagId, { id: tagId, name });
        }

        let linked = this.links.get(entryId);
        if (!linked) {
            linked = new Set();
            this.links.set(entryId, linked);
        }
        if (linked.has(tagId)) return false;
        linked.add(tagId);
        return true;
    }

    removeTag(entryId: number, tagId: number): void {
        this.links.get(entryId)?.delete(tagId);
    }

    listTags(entryId: number): CatalogTag[] {
        return [...(this.links.get(entryId) ?? [])]
            .flatMap((tagId) => {
                const tag = this.tags.get(tagId);
                return tag ? [{ ...tag }] : [];
            })
            .sort((a, b) => compareText(a.name, b.name));
    }

    listAllTags(): CatalogTagUsage[] {
        return [...this.tags.values()]
            .map((tag) => {
                let count = 0;
                for (const linked of this.links.values()) {
                    if (linked.has(tag.id)) count++;
                }
                return { ...tag, count };
            })
            .sort((a, b) => b.count - a.count || compareText(a.name, b.name));
    }

    addNote(entryId: number, text: string): number {
        this.requireEntry(entryId);
        const id = this.nextNoteId++;
        this.notes.set(id, {
            id,
            entryId,
            text,
            dateCreated: formatSaveDate(this.now()),
        });
        return id;
    }

    listNotes(entryId: number): CatalogNote[] {
        return [...this.notes.values()]
            .filter((note) => note.entryId === entryId)
            .sort((a, b) => compareText(b.dateCreated, a.dateCreated) || b.id - a.id)
            .map((note) => ({ ...note }));
    }

    close(): void {
        // Nothing to release
    }

    private tagIdByName(name: string): number | undefined {
        for (const tag of this.tags.values()) {
            if (tag.name === name) return tag.id;
        }
        return undefined;
    }

    private requireEntry(entryId: number): void {
        if (!this.entries.has(entryId)) {
            throw new UnknownEntryError(entryId);
        }
    }
}
