/**
 * URL Rewriting for Captured Resources
 *
 * Points the references of a captured page and its stylesheets at the
 * locally stored copies. References without a local path (skipped or failed
 * downloads) are set to the absolute URL they resolved to, since their
 * relative form means nothing inside the snapshot.
 */

import type { ResourceReference } from './types.js';

/**
 * Represents a URL replacement to be made in content
 */
interface UrlReplacement {
    /** Start position in the source string */
    start: number;
    /** End position in the source string */
    end: number;
    /** The new URL to replace with */
    newUrl: string;
}

/**
 * Apply replacements to content, working from the end so earlier offsets
 * stay valid.
 */
function applyReplacements(content: string, replacements: UrlReplacement[]): string {
    const sorted = [...replacements].sort((a, b) => b.start - a.start);

    let result = content;
    for (const { start, end, newUrl } of sorted) {
        result = result.slice(0, start) + newUrl + result.slice(end);
    }
    return result;
}

/**
 * Sets the owning attribute of every markup reference to its local path, or
 * to its absolute URL when it was not stored.
 *
 * @returns Number of attributes pointed at a local copy
 */
export function rewriteHtmlReferences(references: ResourceReference[]): number {
    let rewritten = 0;

    for (const { location, localPath, url } of references) {
        if (location.type !== 'attribute') continue;

        location.element.setAttribute(location.attribute, localPath ?? url);
        if (localPath) rewritten++;
    }

    return rewritten;
}

/**
 * Replaces the span of every stylesheet reference with its local path, or
 * with its absolute URL when it was not stored.
 */
export function rewriteCssReferences(
    cssText: string,
    references: ResourceReference[],
): string {
    const replacements: UrlReplacement[] = [];

    for (const { location, localPath, url } of references) {
        if (location.type !== 'css-span') continue;
        replacements.push({
            start: location.start,
            end: location.end,
            newUrl: localPath ?? url,
        });
    }

    return applyReplacements(cssText, replacements);
}
