import type { HTMLElement } from 'node-html-parser';

const ACTIVE_ELEMENTS = 'script, iframe, object, embed';

/**
 * Strips active content from a parsed document in place: `script`, `iframe`,
 * `object` and `embed` elements, and every `on*` event handler attribute.
 *
 * @returns Number of elements and attributes removed
 */
export function sanitizeDocument(root: HTMLElement): number {
    let removed = 0;

    for (const element of root.querySelectorAll(ACTIVE_ELEMENTS)) {
        element.remove();
        removed++;
    }

    for (const element of root.querySelectorAll('*')) {
        for (const name of Object.keys(element.rawAttributes)) {
            if (name.toLowerCase().startsWith('on')) {
                element.removeAttribute(name);
                removed++;
            }
        }
    }

    return removed;
}

/**
 * Text of the document's `<title>`, or "Unknown Title".
 */
export function extractTitle(root: HTMLElement): string {
    const title = root.querySelector('title')?.text.trim();
    return title || 'Unknown Title';
}
