export const HIGHLIGHT_MARKER = '**';

const DEFAULT_CONTEXT_RADIUS = 50;
const ELLIPSIS = '...';

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive literal pattern for `query`. Matching, highlighting and
 * context extraction all go through it so they agree on what a match is.
 */
export function queryPattern(query: string, global = false): RegExp {
    return new RegExp(escapeRegExp(query), global ? 'giu' : 'iu');
}

export function matchesQuery(text: string, query: string): boolean {
    return query !== '' && queryPattern(query).test(text);
}

/**
 * Wraps every case-insensitive occurrence of `query` in `text` with the
 * marker. Occurrences are taken left to right and never overlap, so removing
 * the markers gives back `text` unchanged.
 */
export function highlight(text: string, query: string, marker: string = HIGHLIGHT_MARKER): string {
    if (query === '') return text;
    return text.replace(queryPattern(query, true), match => `${marker}${match}${marker}`);
}

/**
 * Window of `radius` characters either side of the first match, with an
 * ellipsis on each side that was cut. Returns `text` as-is when there is no
 * match.
 */
export function extractContext(text: string, query: string, radius: number = DEFAULT_CONTEXT_RADIUS): string {
    if (query === '') return text;
    const match = queryPattern(query).exec(text);
    if (!match) return text;

    const start = Math.max(0, match.index - radius);
    const end = Math.min(text.length, match.index + match[0].length + radius);
    const prefix = start > 0 ? ELLIPSIS : '';
    const suffix = end < text.length ? ELLIPSIS : '';
    return `${prefix}${text.slice(start, end)}${suffix}`;
}
