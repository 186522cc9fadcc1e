/**
 * Resource discovery and local naming
 *
 * Finds the stylesheets, scripts, images and fonts a page (or stylesheet)
 * references, resolves each reference to an absolute URL and decides the
 * file name it is stored under.
 */

import { createHash } from 'crypto';
import { extname } from 'path';
import type { HTMLElement } from 'node-html-parser';
import { ASSET_SUBDIRECTORIES, type ResourceKind } from '@webkeep/types';
import type { ResourceReference, ResourceToggles } from './types.js';

// ============================================================================
// URL RESOLUTION
// ============================================================================

const SKIPPED_SCHEMES = ['data:', 'blob:', 'javascript:', 'mailto:', 'tel:', 'about:'];

/**
 * A reference already pointing into a snapshot's `assets/` tree, as written
 * into markup.
 */
const LOCAL_HTML_REFERENCE = /^assets\/(?:css|js|images|fonts)\/[^/]+$/;

/**
 * A reference already pointing into a snapshot's `assets/` tree, as written
 * into a stored stylesheet.
 */
const LOCAL_CSS_REFERENCE = /^\.\.\/(?:css|js|images|fonts)\/[^/]+$/;

/**
 * Whether a reference points at a file inside a snapshot.
 */
export function isLocalReference(reference: string, context: 'html' | 'css'): boolean {
    const pattern = context === 'html' ? LOCAL_HTML_REFERENCE : LOCAL_CSS_REFERENCE;
    return pattern.test(reference.trim());
}

/**
 * Resolve a reference against a base URL
 *
 * @returns The absolute http(s) URL, or null when the reference names nothing
 * fetchable
 */
export function resolveReference(reference: string, baseUrl: string): string | null {
    const value = reference.trim();
    if (!value || value.startsWith('#')) {
        return null;
    }

    const lower = value.toLowerCase();
    if (SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
        return null;
    }

    try {
        // Handle protocol-relative URLs
        const resolved = value.startsWith('//')
            ? new URL(new URL(baseUrl).protocol + value)
            : new URL(value, baseUrl);

        if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
            return null;
        }

        resolved.hash = '';
        return resolved.href;
    } catch {
        return null;
    }
}

// ============================================================================
// HTML DISCOVERY
// ============================================================================

function relTokens(element: HTMLElement): string[] {
    return (element.getAttribute('rel') ?? '').toLowerCase().split(/\s+/);
}

/**
 * Returns the URL relative references of a document resolve against,
 * honouring a `<base href>` element.
 */
export function documentBaseUrl(root: HTMLElement, pageUrl: string): string {
    const baseHref = root.querySelector('base')?.getAttribute('href');
    if (!baseHref) {
        return pageUrl;
    }
    try {
        return new URL(baseHref, pageUrl).href;
    } catch {
        return pageUrl;
    }
}

/**
 * Enumerates the resources referenced by markup, in document order.
 *
 * Covers `<link rel="stylesheet" href>`, `<script src>` and `<img src>`.
 * References that are empty, fragments, `data:`/`blob:`/`javascript:` or
 * already local are skipped.
 */
export function discoverResources(
    root: HTMLElement,
    pageUrl: string,
    toggles: ResourceToggles,
): ResourceReference[] {
    const baseUrl = documentBaseUrl(root, pageUrl);
    const references: ResourceReference[] = [];

    for (const element of root.querySelectorAll('link, script, img')) {
        let kind: ResourceKind;
        let attribute: string;

        switch (element.tagName) {
            case 'LINK':
                if (!toggles.downloadCss || !relTokens(element).includes('stylesheet')) {
                    continue;
                }
                kind = 'stylesheet';
                attribute = 'href';
                break;
            case 'SCRIPT':
                if (!toggles.downloadJs) continue;
                kind = 'script';
                attribute = 'src';
                break;
            case 'IMG':
                if (!toggles.downloadImages) continue;
                kind = 'image';
                attribute = 'src';
                break;
            default:
                continue;
        }

        const original = element.getAttribute(attribute);
        if (!original || isLocalReference(original, 'html')) continue;

        const url = resolveReference(original, baseUrl);
        if (!url) continue;

        references.push({
            kind,
            original,
            url,
            location: { type: 'attribute', element, attribute },
        });
    }

    return references;
}

// ============================================================================
// CSS DISCOVERY
// ============================================================================

const FONT_EXTENSIONS = new Set(['.woff', '.woff2', '.ttf', '.otf', '.eot']);

const IMAGE_EXTENSIONS = new Set([
    '.png',
    '.jpg',
    '.jpeg',
    '.gif',
    '.svg',
    '.webp',
    '.avif',
    '.bmp',
    '.ico',
]);

/**
 * Pattern to match url() in CSS. Group 1 is everything up to the value,
 * group 2 the quote, group 3 the value.
 */
const CSS_URL_PATTERN = /(url\(\s*(['"]?))([^'")]+)\2\s*\)/gi;

/**
 * Pattern to match `@import "x.css"` (the url() form is matched above).
 */
const CSS_IMPORT_STRING_PATTERN = /(@import\s+(['"]))([^'"]+)\2/gi;

const IMPORT_BEFORE_URL = /@import\s*$/i;

type Range = readonly [number, number];

function findRanges(text: string, pattern: RegExp): Range[] {
    const ranges: Range[] = [];
    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        ranges.push([start, start + match[0].length]);
    }
    return ranges;
}

function inRanges(ranges: Range[], offset: number): boolean {
    return ranges.some(([start, end]) => offset >= start && offset < end);
}

function urlExtension(url: string): string {
    try {
        return extname(new URL(url).pathname).toLowerCase();
    } catch {
        return '';
    }
}

/**
 * Classifies a `url()` reference of a stylesheet by its extension. An
 * extensionless reference is a font inside `@font-face` and an image
 * elsewhere; any other extension is not a resource we store.
 */
export function classifyCssUrl(url: string, inFontFace: boolean): ResourceKind | null {
    const extension = urlExtension(url);
    if (FONT_EXTENSIONS.has(extension)) return 'font';
    if (IMAGE_EXTENSIONS.has(extension)) return 'image';
    if (extension === '') return inFontFace ? 'font' : 'image';
    return null;
}

/**
 * Enumerates the resources referenced by stylesheet text.
 *
 * `url()` references become fonts or images, `@import` references nested
 * stylesheets. Relative references resolve against the stylesheet's own URL.
 * Each reference records the exact span of its value for rewriting.
 */
export function discoverCssResources(
    cssText: string,
    cssUrl: string,
    toggles: ResourceToggles,
): ResourceReference[] {
    const comments = findRanges(cssText, /\/\*[\s\S]*?\*\//g);
    const fontFaces = findRanges(cssText, /@font-face\s*\{[^}]*\}/gi);
    const references: ResourceReference[] = [];

    const add = (kind: ResourceKind, original: string, start: number) => {
        if (isLocalReference(original, 'css')) return;
        const url = resolveReference(original, cssUrl);
        if (!url) return;
        references.push({
            kind,
            original,
            url,
            location: { type: 'css-span', start, end: start + original.length },
        });
    };

    for (const match of cssText.matchAll(CSS_URL_PATTERN)) {
        const index = match.index ?? 0;
        if (inRanges(comments, index)) continue;

        const original = match[3].trimEnd();
        const start = index + match[1].length;

        if (IMPORT_BEFORE_URL.test(cssText.slice(Math.max(0, index - 16), index))) {
            if (toggles.downloadCss) add('stylesheet', original, start);
            continue;
        }

        const url = resolveReference(original, cssUrl);
        if (!url) continue;

        const kind = classifyCssUrl(url, inRanges(fontFaces, index));
        if (kind === 'font' && toggles.downloadFonts) add(kind, original, start);
        if (kind === 'image' && toggles.downloadImages) add(kind, original, start);
    }

    if (toggles.downloadCss) {
        for (const match of cssText.matchAll(CSS_IMPORT_STRING_PATTERN)) {
            const index = match.index ?? 0;
            if (inRanges(comments, index)) continue;
            add('stylesheet', match[3], index + match[1].length);
        }
    }

    return references.sort((a, b) => spanStart(a) - spanStart(b));
}

function spanStart(reference: ResourceReference): number {
    return reference.location.type === 'css-span' ? reference.location.start : 0;
}

/**
 * Adjusts the kind of a stylesheet-discovered reference to what the server
 * says it is. Only images and fonts are ever swapped.
 */
export function reclassifyByContentType(
    kind: ResourceKind,
    mediaType: string,
): ResourceKind {
    if (kind !== 'image' && kind !== 'font') return kind;
    if (
        mediaType.startsWith('font/') ||
        mediaType.startsWith('application/font') ||
        mediaType === 'application/vnd.ms-fontobject' ||
        mediaType === 'application/x-font-ttf'
    ) {
        return 'font';
    }
    if (mediaType.startsWith('image/')) return 'image';
    return kind;
}

// ============================================================================
// FILE NAMES
// ============================================================================

const FILENAME_PREFIXES: Record<ResourceKind, string> = {
    stylesheet: 'style',
    script: 'script',
    image: 'image',
    font: 'font',
};

const DEFAULT_EXTENSIONS: Record<ResourceKind, string> = {
    stylesheet: '.css',
    script: '.js',
    image: '.jpg',
    font: '.woff',
};

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
    'text/css': '.css',
    'application/javascript': '.js',
    'text/javascript': '.js',
    'application/x-javascript': '.js',
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/gif': '.gif',
    'image/webp': '.webp',
    'image/avif': '.avif',
    'image/svg+xml': '.svg',
    'image/bmp': '.bmp',
    'image/x-icon': '.ico',
    'image/vnd.microsoft.icon': '.ico',
    'font/woff': '.woff',
    'font/woff2': '.woff2',
    'font/ttf': '.ttf',
    'font/otf': '.otf',
    'application/font-woff': '.woff',
    'application/font-woff2': '.woff2',
    'application/x-font-ttf': '.ttf',
    'application/vnd.ms-fontobject': '.eot',
};

/**
 * First 10 hex characters of the md5 of a URL.
 */
export function urlHash(url: string): string {
    return createHash('md5').update(url).digest('hex').slice(0, 10);
}

/**
 * Extension for a media type, or null when unknown.
 */
export function extensionForMediaType(mediaType: string): string | null {
    return CONTENT_TYPE_EXTENSIONS[mediaType] ?? null;
}

function sanitizeFilename(name: string): string {
    return name.replace(/[^A-Za-z0-9._-]/g, '_');
}

function lastPathSegment(url: string): string {
    try {
        const segment = new URL(url).pathname.split('/').pop() ?? '';
        return decodeURIComponent(segment);
    } catch {
        return '';
    }
}

/**
 * Decides the file name of a resource.
 *
 * The last path segment is used when it carries an extension; otherwise the
 * name is `<prefix>_<hash><ext>`, with the extension taken from the media
 * type or the kind's default.
 */
export function synthesizeFilename(
    url: string,
    kind: ResourceKind,
    mediaType: string = '',
): string {
    const segment = sanitizeFilename(lastPathSegment(url));
    if (/^[^.].*\.[A-Za-z0-9]{1,8}$/.test(segment)) {
        return segment;
    }

    const extension = extensionForMediaType(mediaType) ?? DEFAULT_EXTENSIONS[kind];
    return `${FILENAME_PREFIXES[kind]}_${urlHash(url)}${extension}`;
}

/**
 * Hands out file names within one capture run.
 *
 * A URL keeps the name it was first given; a name already taken by another
 * URL in the same directory gets a `<hash>_` prefix.
 */
export class FilenameRegistry {
    private readonly byUrl = new Map<string, string>();
    private readonly taken = new Map<string, string>();

    /**
     * Claims a name for a URL.
     *
     * @returns Path relative to the snapshot directory, e.g. `assets/css/site.css`
     */
    claim(url: string, kind: ResourceKind, candidate: string): string {
        const directory = ASSET_SUBDIRECTORIES[kind];
        const urlKey = `${directory} ${url}`;

        const existing = this.byUrl.get(urlKey);
        if (existing) {
            return existing;
        }

        let name = candidate;
        const owner = this.taken.get(`${directory}/${name}`);
        if (owner !== undefined && owner !== url) {
            name = `${urlHash(url)}_${candidate}`;
        }

        const path = `assets/${directory}/${name}`;
        this.taken.set(`${directory}/${name}`, url);
        this.byUrl.set(urlKey, path);
        return path;
    }

    /**
     * Path already claimed for a URL, if any.
     */
    lookup(url: string, kind: ResourceKind): string | undefined {
        return this.byUrl.get(`${ASSET_SUBDIRECTORIES[kind]} ${url}`);
    }
}

/**
 * Converts a snapshot-relative path (`assets/fonts/a.woff`) into the form a
 * stored stylesheet uses to reach it (`../fonts/a.woff`).
 */
export function cssRelativePath(snapshotPath: string): string {
    return snapshotPath.replace(/^assets\//, '../');
}
