/**
 * Tests for config file loading and CLI overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
    ConfigError,
    DEFAULT_CONFIG,
    loadConfig,
    mergeConfig,
} from '../src/config.js';

describe('config', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'config-test-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('has the documented defaults', () => {
        expect(DEFAULT_CONFIG).toEqual({
            baseDir: 'saved_websites',
            databasePath: 'websites.db',
            maxConcurrentDownloads: 8,
            timeout: 30,
            respectRobotsTxt: true,
            sanitizeHtml: false,
            userAgent: 'WebKeep/2.0',
            headless: true,
            downloadImages: true,
            downloadCss: true,
            downloadJs: true,
            downloadFonts: true,
            preferredEngine: 'direct',
            settleDelay: 2000,
            retries: 2,
        });
    });

    describe('loadConfig', () => {
        it('falls back to defaults when no file exists', async () => {
            const loaded = await loadConfig({ searchFrom: dir });

            expect(loaded).toEqual({ config: DEFAULT_CONFIG, filepath: null });
        });

        it('reads .webkeeprc.json and resolves paths against it', async () => {
            await writeFile(
                join(dir, '.webkeeprc.json'),
                JSON.stringify({ baseDir: 'snapshots', timeout: 10, preferredEngine: 'selenium' }),
            );

            const loaded = await loadConfig({ searchFrom: dir });

            expect(loaded.filepath).toBe(join(dir, '.webkeeprc.json'));
            expect(loaded.config).toEqual({
                ...DEFAULT_CONFIG,
                baseDir: join(dir, 'snapshots'),
                databasePath: join(dir, 'websites.db'),
                timeout: 10,
                preferredEngine: 'browser-dom',
            });
        });

        it('reads the webkeep key of package.json', async () => {
            await writeFile(
                join(dir, 'package.json'),
                JSON.stringify({ name: 'archive', webkeep: { sanitizeHtml: true } }),
            );

            const { config } = await loadConfig({ searchFrom: dir });

            expect(config.sanitizeHtml).toBe(true);
        });

        it('loads an explicit file', async () => {
            const path = join(dir, 'custom.json');
            await writeFile(path, JSON.stringify({ databasePath: '/data/catalog.db' }));

            const loaded = await loadConfig({ configPath: path });

            expect(loaded.filepath).toBe(path);
            expect(loaded.config.databasePath).toBe('/data/catalog.db');
        });

        it('rejects invalid values', async () => {
            const path = join(dir, '.webkeeprc.json');
            await writeFile(path, JSON.stringify({ maxConcurrentDownloads: 0 }));

            const error = await loadConfig({ searchFrom: dir }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ConfigError);
            expect(error instanceof Error && error.message).toBe(
                `Invalid configuration in ${path}: maxConcurrentDownloads: Number must be greater than 0`,
            );
        });

        it('rejects unknown keys', async () => {
            const path = join(dir, '.webkeeprc.json');
            await writeFile(path, JSON.stringify({ colour: 'blue' }));

            await expect(loadConfig({ searchFrom: dir })).rejects.toThrow(
                `Invalid configuration in ${path}: Unrecognized key(s) in object: 'colour'`,
            );
        });

        it('reports unparseable files', async () => {
            await writeFile(join(dir, '.webkeeprc.json'), '{ not json');

            await expect(loadConfig({ searchFrom: dir })).rejects.toBeInstanceOf(ConfigError);
        });
    });

    describe('mergeConfig', () => {
        it('applies defined overrides only', () => {
            const merged = mergeConfig(DEFAULT_CONFIG, {
                baseDir: 'elsewhere',
                headless: undefined,
                timeout: 5,
            });

            expect(merged).toEqual({ ...DEFAULT_CONFIG, baseDir: 'elsewhere', timeout: 5 });
        });

        it('validates overrides', () => {
            expect(() => mergeConfig(DEFAULT_CONFIG, { timeout: Number('soon') })).toThrow(
                ConfigError,
            );
        });
    });
});
