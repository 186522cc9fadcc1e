/**
 * Behaviour shared by every catalog implementation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Catalog, SnapshotMetadata } from '@webkeep/types';
import { MemoryCatalog, SqliteCatalog, UnknownEntryError } from '../src/index.js';

function snapshot(name: string, overrides: Partial<SnapshotMetadata> = {}): SnapshotMetadata {
    return {
        url: `https://${name}.example.com/`,
        title: `${name} page`,
        domain: `${name}.example.com`,
        timestamp: '20240101_000000',
        dateSaved: '2024-01-01 00:00:00',
        thumbnail: `/archive/${name}/thumbnail.png`,
        directory: `/archive/${name}`,
        engineUsed: 'direct',
        ...overrides,
    };
}

const implementations: Array<[string, (now: () => Date) => Catalog]> = [
    ['SqliteCatalog', (now) => new SqliteCatalog(':memory:', { now })],
    ['MemoryCatalog', (now) => new MemoryCatalog({ now })],
];

describe.each(implementations)('%s', (_name, create) => {
    let catalog: Catalog;
    let clock: Date;

    beforeEach(() => {
        clock = new Date(2024, 2, 1, 9, 0, 0);
        catalog = create(() => clock);
    });

    afterEach(() => {
        catalog.close();
    });

    describe('entries', () => {
        it('adds and reads back an entry', () => {
            const id = catalog.addEntry(snapshot('alpha'));

            expect(id).toBe(1);
            expect(catalog.getEntry(1)).toEqual({
                id: 1,
                url: 'https://alpha.example.com/',
                title: 'alpha page',
                domain: 'alpha.example.com',
                timestamp: '20240101_000000',
                dateSaved: '2024-01-01 00:00:00',
                directory: '/archive/alpha',
                thumbnail: '/archive/alpha/thumbnail.png',
                isEdited: false,
                parentId: null,
            });
        });

        it('returns null for a directory already catalogued', () => {
            catalog.addEntry(snapshot('alpha'));

            expect(catalog.addEntry(snapshot('alpha', { title: 'again' }))).toBeNull();
            expect(catalog.listEntries()).toHaveLength(1);
        });

        it('finds entries by directory', () => {
            catalog.addEntry(snapshot('alpha'));
            const id = catalog.addEntry(snapshot('beta'));

            expect(catalog.findByDirectory('/archive/beta')?.id).toBe(id);
            expect(catalog.findByDirectory('/archive/gamma')).toBeNull();
        });

        it('records the parent of an edited version', () => {
            const parent = catalog.addEntry(snapshot('alpha'));
            const child = catalog.addEntry(
                snapshot('alpha-edit', { isEdited: true, parentId: parent }),
            );

            const entry = child === null ? null : catalog.getEntry(child);
            expect(entry?.isEdited).toBe(true);
            expect(entry?.parentId).toBe(parent);
        });

        it('drops a parent id that names no entry', () => {
            const id = catalog.addEntry(snapshot('orphan', { parentId: 99 }));

            expect(id === null ? null : catalog.getEntry(id)?.parentId).toBeNull();
        });

        it('updates selected fields', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;

            catalog.updateEntry(id, { title: 'Renamed', isEdited: true });

            const entry = catalog.getEntry(id);
            expect(entry?.title).toBe('Renamed');
            expect(entry?.isEdited).toBe(true);
            expect(entry?.url).toBe('https://alpha.example.com/');
        });

        it('lists newest first', () => {
            catalog.addEntry(snapshot('old', { dateSaved: '2024-01-01 00:00:00' }));
            catalog.addEntry(snapshot('new', { dateSaved: '2024-03-01 00:00:00' }));
            catalog.addEntry(snapshot('mid', { dateSaved: '2024-02-01 00:00:00' }));

            expect(catalog.listEntries().map((entry) => entry.directory)).toEqual([
                '/archive/new',
                '/archive/mid',
                '/archive/old',
            ]);
        });

        it('lists later insertions first when saved in the same second', () => {
            catalog.addEntry(snapshot('first'));
            catalog.addEntry(snapshot('second'));

            expect(catalog.listEntries().map((entry) => entry.id)).toEqual([2, 1]);
        });

        it('searches title, url and domain ignoring case', () => {
            catalog.addEntry(snapshot('alpha', { title: 'Gardening Tips' }));
            catalog.addEntry(snapshot('beta', { url: 'https://beta.example.com/garden' }));
            catalog.addEntry(snapshot('gamma'));

            expect(
                catalog
                    .listEntries({ search: 'GARDEN' })
                    .map((entry) => entry.directory)
                    .sort(),
            ).toEqual(['/archive/alpha', '/archive/beta']);
            expect(catalog.listEntries({ search: 'gamma.example' })).toHaveLength(1);
        });

        it('filters by tag, combined with search', () => {
            const alpha = catalog.addEntry(snapshot('alpha')) ?? 0;
            const beta = catalog.addEntry(snapshot('beta')) ?? 0;
            catalog.addEntry(snapshot('gamma'));
            catalog.addTag(alpha, 'news');
            catalog.addTag(beta, 'news');

            expect(catalog.listEntries({ tag: 'news' }).map((entry) => entry.id)).toEqual([
                beta,
                alpha,
            ]);
            expect(
                catalog.listEntries({ tag: 'news', search: 'alpha' }).map((entry) => entry.id),
            ).toEqual([alpha]);
            expect(catalog.listEntries({ tag: 'missing' })).toEqual([]);
        });

        it('deletes an entry with its tags and notes', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;
            catalog.addTag(id, 'news');
            catalog.addNote(id, 'remember this');

            catalog.deleteEntry(id);

            expect(catalog.getEntry(id)).toBeNull();
            expect(catalog.listTags(id)).toEqual([]);
            expect(catalog.listNotes(id)).toEqual([]);
            expect(catalog.listAllTags()).toEqual([{ id: 1, name: 'news', count: 0 }]);
        });

        it('clears the parent link of versions when the parent is deleted', () => {
            const parent = catalog.addEntry(snapshot('alpha')) ?? 0;
            const child =
                catalog.addEntry(snapshot('alpha-edit', { isEdited: true, parentId: parent })) ??
                0;

            catalog.deleteEntry(parent);

            expect(catalog.getEntry(child)?.parentId).toBeNull();
        });
    });

    describe('tags', () => {
        it('links a tag once', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;

            expect(catalog.addTag(id, 'news')).toBe(true);
            expect(catalog.addTag(id, 'news')).toBe(false);
            expect(catalog.listTags(id)).toEqual([{ id: 1, name: 'news' }]);
        });

        it('shares tags between entries', () => {
            const alpha = catalog.addEntry(snapshot('alpha')) ?? 0;
            const beta = catalog.addEntry(snapshot('beta')) ?? 0;

            catalog.addTag(alpha, 'news');
            catalog.addTag(beta, 'news');

            expect(catalog.listTags(beta)).toEqual([{ id: 1, name: 'news' }]);
        });

        it('lists the tags of an entry by name', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;
            catalog.addTag(id, 'zebra');
            catalog.addTag(id, 'apple');
            catalog.addTag(id, 'mango');

            expect(catalog.listTags(id).map((tag) => tag.name)).toEqual([
                'apple',
                'mango',
                'zebra',
            ]);
        });

        it('counts usage, most used first then by name', () => {
            const alpha = catalog.addEntry(snapshot('alpha')) ?? 0;
            const beta = catalog.addEntry(snapshot('beta')) ?? 0;
            catalog.addTag(alpha, 'solo');
            catalog.addTag(alpha, 'shared');
            catalog.addTag(beta, 'shared');
            catalog.addTag(beta, 'another');

            expect(catalog.listAllTags()).toEqual([
                { id: 2, name: 'shared', count: 2 },
                { id: 3, name: 'another', count: 1 },
                { id: 1, name: 'solo', count: 1 },
            ]);
        });

        it('removes a tag from one entry only', () => {
            const alpha = catalog.addEntry(snapshot('alpha')) ?? 0;
            const beta = catalog.addEntry(snapshot('beta')) ?? 0;
            catalog.addTag(alpha, 'news');
            catalog.addTag(beta, 'news');

            catalog.removeTag(alpha, 1);

            expect(catalog.listTags(alpha)).toEqual([]);
            expect(catalog.listTags(beta)).toEqual([{ id: 1, name: 'news' }]);
        });

        it('refuses tags for unknown entries', () => {
            expect(() => catalog.addTag(5, 'news')).toThrow(UnknownEntryError);
        });
    });

    describe('notes', () => {
        it('stores notes with their creation time', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;

            const noteId = catalog.addNote(id, 'first look');

            expect(catalog.listNotes(id)).toEqual([
                {
                    id: noteId,
                    entryId: id,
                    text: 'first look',
                    dateCreated: '2024-03-01 09:00:00',
                },
            ]);
        });

        it('lists newest first', () => {
            const id = catalog.addEntry(snapshot('alpha')) ?? 0;
            catalog.addNote(id, 'one');
            clock = new Date(2024, 2, 2, 9, 0, 0);
            catalog.addNote(id, 'two');
            catalog.addNote(id, 'three');

            expect(catalog.listNotes(id).map((note) => note.text)).toEqual([
                'three',
                'two',
                'one',
            ]);
        });

        it('keeps notes per entry', () => {
            const alpha = catalog.addEntry(snapshot('alpha')) ?? 0;
            const beta = catalog.addEntry(snapshot('beta')) ?? 0;
            catalog.addNote(alpha, 'about alpha');

            expect(catalog.listNotes(beta)).toEqual([]);
        });

        it('refuses notes for unknown entries', () => {
            expect(() => catalog.addNote(5, 'lost')).toThrow(UnknownEntryError);
        });
    });
});
