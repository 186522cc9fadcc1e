/**
 * Tests for SnapshotMaterializer and metadata handling
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import sharp from 'sharp';
import type { SnapshotMetadata } from '@webkeep/types';
import { MissingMetadataError, WriteError } from '../src/errors.js';
import {
    parseMetadata,
    readSnapshotMetadata,
    serializeMetadata,
    SnapshotMaterializer,
} from '../src/snapshot.js';

const METADATA: SnapshotMetadata = {
    url: 'https://example.com/',
    title: 'Example',
    domain: 'example.com',
    timestamp: '20240101_000000',
    dateSaved: '2024-01-01 00:00:00',
    thumbnail: '/s/thumbnail.png',
    directory: '/s',
    engineUsed: 'direct',
};

describe('metadata', () => {
    it('serializes with snake_case keys and four-space indentation', () => {
        expect(serializeMetadata(METADATA)).toBe(
            [
                '{',
                '    "url": "https://example.com/",',
                '    "title": "Example",',
                '    "domain": "example.com",',
                '    "timestamp": "20240101_000000",',
                '    "date_saved": "2024-01-01 00:00:00",',
                '    "thumbnail": "/s/thumbnail.png",',
                '    "directory": "/s",',
                '    "engine_used": "direct"',
                '}',
            ].join('\n'),
        );
    });

    it('includes versioning fields when set', () => {
        const record = JSON.parse(
            serializeMetadata({
                ...METADATA,
                isEdited: true,
                originalDirectory: '/original',
                parentId: null,
            }),
        );

        expect(record.is_edited).toBe(true);
        expect(record.original_directory).toBe('/original');
        expect(record.parent_id).toBeNull();
    });

    it('parses what it serializes', () => {
        const metadata = { ...METADATA, isEdited: true, parentId: 3, id: 7 };
        expect(parseMetadata(serializeMetadata(metadata), '/s')).toEqual(metadata);
    });

    it('maps engine names of older archives', () => {
        const record = JSON.parse(serializeMetadata(METADATA));
        record.engine_used = 'selenium';

        expect(parseMetadata(JSON.stringify(record), '/s').engineUsed).toBe('browser-dom');
    });

    it('defaults a missing engine to direct', () => {
        const record = JSON.parse(serializeMetadata(METADATA));
        delete record.engine_used;

        expect(parseMetadata(JSON.stringify(record), '/s').engineUsed).toBe('direct');
    });

    it('rejects records with missing fields', () => {
        expect(() => parseMetadata('{"title": "x"}', '/s')).toThrow(MissingMetadataError);
    });

    it('rejects content that is not JSON', () => {
        expect(() => parseMetadata('not json', '/s')).toThrow(MissingMetadataError);
    });
});

describe('SnapshotMaterializer', () => {
    let baseDir: string;

    beforeEach(async () => {
        baseDir = await mkdtemp(join(tmpdir(), 'snapshot-test-'));
    });

    afterEach(async () => {
        await rm(baseDir, { recursive: true, force: true });
    });

    it('creates the directory with its asset layout', async () => {
        const materializer = new SnapshotMaterializer(baseDir);

        const handle = await materializer.begin('example_com_20240101_000000');

        expect(handle.name).toBe('example_com_20240101_000000');
        expect(handle.path).toBe(join(baseDir, 'example_com_20240101_000000'));
        for (const subdirectory of ['css', 'js', 'images', 'fonts']) {
            expect(existsSync(join(handle.path, 'assets', subdirectory))).toBe(true);
        }
    });

    it('suffixes names that already exist', async () => {
        const materializer = new SnapshotMaterializer(baseDir);

        const first = await materializer.begin('example_com_20240101_000000');
        const second = await materializer.begin('example_com_20240101_000000');
        const third = await materializer.begin('example_com_20240101_000000');

        expect([first.name, second.name, third.name]).toEqual([
            'example_com_20240101_000000',
            'example_com_20240101_000000_1',
            'example_com_20240101_000000_2',
        ]);
    });

    it('creates a missing base directory', async () => {
        const materializer = new SnapshotMaterializer(join(baseDir, 'nested', 'base'));

        const handle = await materializer.begin('site');

        expect(existsSync(handle.path)).toBe(true);
    });

    it('raises WriteError when the base directory cannot be created', async () => {
        const blocker = join(baseDir, 'file');
        await writeFile(blocker, 'x');
        const materializer = new SnapshotMaterializer(join(blocker, 'base'));

        await expect(materializer.begin('site')).rejects.toBeInstanceOf(WriteError);
    });

    it('commits page, thumbnail and metadata', async () => {
        const materializer = new SnapshotMaterializer(baseDir);
        const handle = await materializer.begin('site');

        const committed = await materializer.commit(handle, '<p>hi</p>', {
            ...METADATA,
            directory: handle.path,
        });

        expect(committed.thumbnail).toBe(join(handle.path, 'thumbnail.png'));
        expect(await readFile(join(handle.path, 'index.html'), 'utf-8')).toBe('<p>hi</p>');
        expect(await readSnapshotMetadata(handle.path)).toEqual(committed);

        const thumbnail = await sharp(committed.thumbnail).metadata();
        expect(thumbnail.format).toBe('png');
        expect(thumbnail.width).toBe(200);
        expect(thumbnail.height).toBe(150);
    });

    it('signals the thumbnail step once the page is written', async () => {
        const materializer = new SnapshotMaterializer(baseDir);
        const handle = await materializer.begin('site');
        const seen: Array<[boolean, boolean]> = [];

        await materializer.commit(handle, '<p>hi</p>', { ...METADATA, directory: handle.path }, () =>
            seen.push([
                existsSync(join(handle.path, 'index.html')),
                existsSync(join(handle.path, 'thumbnail.png')),
            ]),
        );

        expect(seen).toEqual([[true, false]]);
    });

    it('removes everything on abort', async () => {
        const materializer = new SnapshotMaterializer(baseDir);
        const handle = await materializer.begin('site');
        await materializer.writeMarkup(handle, '<p>partial</p>');

        await materializer.abort(handle);

        expect(existsSync(handle.path)).toBe(false);
    });
});

describe('readSnapshotMetadata', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'metadata-test-'));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('raises MissingMetadataError without metadata.json', async () => {
        const error = await readSnapshotMetadata(directory).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(MissingMetadataError);
        if (error instanceof MissingMetadataError) {
            expect(error.directory).toBe(directory);
        }
    });

    it('raises MissingMetadataError for malformed metadata', async () => {
        await writeFile(join(directory, 'metadata.json'), '{"url": 1}');

        await expect(readSnapshotMetadata(directory)).rejects.toBeInstanceOf(
            MissingMetadataError,
        );
    });
});
