/**
 * SQLite-backed catalog
 *
 * Schema (compatible with databases written by earlier archivers):
 *
 * ```
 * websites(id, url, title, domain, timestamp, date_saved, directory UNIQUE,
 *          thumbnail, is_edited, parent_id -> websites.id)
 * tags(id, name UNIQUE)
 * website_tags(website_id, tag_id)   primary key on both
 * notes(id, website_id, note, date_created)
 * ```
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
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

export interface SqliteCatalogOptions {
    /** Clock used for note timestamps */
    now?: () => Date;
}

// ============================================================================
// ROW SCHEMAS
// ============================================================================

// Older databases may hold NULL in any column but the id, url and directory
const text = z
    .string()
    .nullable()
    .transform((value) => value ?? '');

const entryRowSchema = z.object({
    id: z.number().int(),
    url: z.string(),
    title: z
        .string()
        .nullable()
        .transform((value) => value ?? 'Unknown Title'),
    domain: text,
    timestamp: text,
    date_saved: text,
    directory: z.string(),
    thumbnail: text,
    is_edited: z
        .union([z.number(), z.boolean()])
        .nullable()
        .transform((value) => Boolean(value)),
    parent_id: z.number().int().nullable(),
});

const tagRowSchema = z.object({ id: z.number().int(), name: z.string() });

const tagUsageRowSchema = tagRowSchema.extend({ count: z.number().int() });

const noteRowSchema = z.object({
    id: z.number().int(),
    website_id: z.number().int(),
    note: text,
    date_created: text,
});

const idRowSchema = z.object({ id: z.number().int() });

function toEntry(row: unknown): CatalogEntry {
    const parsed = entryRowSchema.parse(row);
    return {
        id: parsed.id,
        url: parsed.url,
        title: parsed.title,
        domain: parsed.domain,
        timestamp: parsed.timestamp,
        dateSaved: parsed.date_saved,
        directory: parsed.directory,
        thumbnail: parsed.thumbnail,
        isEdited: parsed.is_edited,
        parentId: parsed.parent_id,
    };
}

const ENTRY_COLUMNS =
    'w.id, w.url, w.title, w.domain, w.timestamp, w.date_saved, ' +
    'w.directory, w.thumbnail, w.is_edited, w.parent_id';

const UPDATE_COLUMNS = [
    ['url', 'url'],
    ['title', 'title'],
    ['domain', 'domain'],
    ['thumbnail', 'thumbnail'],
    ['isEdited', 'is_edited'],
] as const;

function isUniqueViolation(error: unknown): boolean {
    return (
        error instanceof Database.SqliteError &&
        (error.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
            error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
    );
}

// ============================================================================
// CATALOG
// ============================================================================

export class SqliteCatalog implements Catalog {
    private readonly db: Database.Database;
    private readonly now: () => Date;

    /**
     * Opens (creating if needed) the database at `path`. Pass `':memory:'`
     * for a throwaway catalog.
     */
    constructor(
        readonly path: string = 'websites.db',
        options: SqliteCatalogOptions = {},
    ) {
        if (path !== ':memory:') {
            mkdirSync(dirname(path), { recursive: true });
        }
        this.now = options.now ?? (() => new Date());

        this.db = new Database(path);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.createTables();
    }

    private createTables(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS websites (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                url TEXT NOT NULL,
                title TEXT,
                domain TEXT,
                timestamp TEXT,
                date_saved TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
                directory TEXT UNIQUE,
                thumbnail TEXT,
                is_edited BOOLEAN DEFAULT 0,
                parent_id INTEGER,
                FOREIGN KEY (parent_id) REFERENCES websites (id) ON DELETE SET NULL
            );

            CREATE TABLE IF NOT EXISTS tags (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT UNIQUE
            );

            CREATE TABLE IF NOT EXISTS website_tags (
                website_id INTEGER,
                tag_id INTEGER,
                PRIMARY KEY (website_id, tag_id),
                FOREIGN KEY (website_id) REFERENCES websites (id),
                FOREIGN KEY (tag_id) REFERENCES tags (id)
            );

            CREATE TABLE IF NOT EXISTS notes (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                website_id INTEGER,
                note TEXT,
                date_created TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
                FOREIGN KEY (website_id) REFERENCES websites (id)
            );

            CREATE INDEX IF NOT EXISTS idx_websites_date_saved ON websites(date_saved DESC);
            CREATE INDEX IF NOT EXISTS idx_notes_website ON notes(website_id);
        `);
    }

    // --------------------------------------------------------------------------
    // Entries
    // --------------------------------------------------------------------------

    addEntry(metadata: SnapshotMetadata): number | null {
        const stmt = this.db.prepare(`
            INSERT INTO websites
                (url, title, domain, timestamp, date_saved, directory, thumbnail, is_edited, parent_id)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, (SELECT id FROM websites WHERE id = ?))
        `);

        try {
            const result = stmt.run(
                metadata.url,
                metadata.title,
                metadata.domain,
                metadata.timestamp,
                metadata.dateSaved,
                metadata.directory,
                metadata.thumbnail,
                metadata.isEdited ? 1 : 0,
                metadata.parentId ?? null,
            );
            return Number(result.lastInsertRowid);
        } catch (error) {
            // Directory already catalogued
            if (isUniqueViolation(error)) return null;
            throw error;
        }
    }

    updateEntry(id: number, fields: CatalogEntryUpdate): void {
        const assignments: string[] = [];
        const values: Array<string | number> = [];

        for (const [key, column] of UPDATE_COLUMNS) {
            const value = fields[key];
            if (value === undefined) continue;
            assignments.push(`${column} = ?`);
            values.push(typeof value === 'boolean' ? Number(value) : value);
        }
        if (assignments.length === 0) return;

        this.db
            .prepare(`UPDATE websites SET ${assignments.join(', ')} WHERE id = ?`)
            .run(...values, id);
    }

    findByDirectory(directory: string): CatalogEntry | null {
        const row = this.db
            .prepare(`SELECT ${ENTRY_COLUMNS} FROM websites w WHERE w.directory = ?`)
            .get(directory);
        return row === undefined ? null : toEntry(row);
    }

    getEntry(id: number): CatalogEntry | null {
        const row = this.db
            .prepare(`SELECT ${ENTRY_COLUMNS} FROM websites w WHERE w.id = ?`)
            .get(id);
        return row === undefined ? null : toEntry(row);
    }

    listEntries(filter: CatalogFilter = {}): CatalogEntry[] {
        let query = `SELECT ${ENTRY_COLUMNS} FROM websites w`;
        const where: string[] = [];
        const params: string[] = [];

        if (filter.tag) {
            query +=
                ' JOIN website_tags wt ON w.id = wt.website_id' +
                ' JOIN tags t ON wt.tag_id = t.id';
            where.push('t.name = ?');
            params.push(filter.tag);
        }

        if (filter.search) {
            where.push('(w.title LIKE ? OR w.url LIKE ? OR w.domain LIKE ?)');
            const pattern = `%${filter.search}%`;
            params.push(pattern, pattern, pattern);
        }

        if (where.length > 0) {
            query += ` WHERE ${where.join(' AND ')}`;
        }
        query += ' ORDER BY w.date_saved DESC, w.id DESC';

        return this.db
            .prepare(query)
            .all(...params)
            .map(toEntry);
    }

    deleteEntry(id: number): void {
        const remove = this.db.transaction((entryId: number) => {
            this.db.prepare('DELETE FROM website_tags WHERE website_id = ?').run(entryId);
            this.db.prepare('DELETE FROM notes WHERE website_id = ?').run(entryId);
            this.db.prepare('DELETE FROM websites WHERE id = ?').run(entryId);
        });
        remove(id);
    }

    // --------------------------------------------------------------------------
    // Tags
    // --------------------------------------------------------------------------

    addTag(entryId: number, name: string): boolean {
        this.requireEntry(entryId);

        const link = this.db.transaction((tagName: string): boolean => {
            this.db.prepare('INSERT OR IGNORE INTO tags (name) VALUES (?)').run(tagName);
            const tag = idRowSchema.parse(
                this.db.prepare('SELECT id FROM tags WHERE name = ?').get(tagName),
            );
            const result = this.db
                .prepare('INSERT OR IGNORE INTO website_tags (website_id, tag_id) VALUES (?, ?)')
                .run(entryId, tag.id);
            return result.changes === 1;
        });
        return link(name);
    }

    removeTag(entryId: number, tagId: number): void {
        this.db
            .prepare('DELETE FROM website_tags WHERE website_id = ? AND tag_id = ?')
            .run(entryId, tagId);
    }

    listTags(entryId: number): CatalogTag[] {
        return this.db
            .prepare(
                `SELECT t.id, t.name
                 FROM tags t
                 JOIN website_tags wt ON t.id = wt.tag_id
                 WHERE wt.website_id = ?
                 ORDER BY t.name`,
            )
            .all(entryId)
            .map((row) => tagRowSchema.parse(row));
    }

    listAllTags(): CatalogTagUsage[] {
        return this.db
            .prepare(
                `SELECT t.id, t.name, COUNT(wt.website_id) AS count
                 FROM tags t
                 LEFT JOIN website_tags wt ON t.id = wt.tag_id
                 GROUP BY t.id
                 ORDER BY count DESC, t.name`,
            )
            .all()
            .map((row) => tagUsageRowSchema.parse(row));
    }

    // --------------------------------------------------------------------------
    // Notes
    // --------------------------------------------------------------------------

    addNote(entryId: number, text: string): number {
        this.requireEntry(entryId);
        const result = this.db
            .prepare('INSERT INTO notes (website_id, note, date_created) VALUES (?, ?, ?)')
            .run(entryId, text, formatSaveDate(this.now()));
        return Number(result.lastInsertRowid);
    }

    listNotes(entryId: number): CatalogNote[] {
        return this.db
            .prepare(
                `SELECT id, website_id, note, date_created
                 FROM notes
                 WHERE website_id = ?
                 ORDER BY date_created DESC, id DESC`,
            )
            .all(entryId)
            .map((row) => {
                const parsed = noteRowSchema.parse(row);
                return {
                    id: parsed.id,
                    entryId: parsed.website_id,
                    text: parsed.note,
                    dateCreated: parsed.date_created,
                };
            });
    }

    close(): void {
        this.db.close();
    }

    private requireEntry(entryId: number): void {
        if (this.getEntry(entryId) === null) {
            throw new UnknownEntryError(entryId);
        }
    }
}
