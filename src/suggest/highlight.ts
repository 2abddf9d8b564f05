export interface MatchParts {
    before: string;
    match: string;
    after: string;
}

/**
 * Splits a name around the first occurrence of the query.
 * Returns null when there is nothing to highlight.
 */
export function splitMatch(name: string, query: string, caseSensitive: boolean): MatchParts | null {
    if (!query) return null;

    const start = caseSensitive
        ? name.indexOf(query)
        : name.toLowerCase().indexOf(query.toLowerCase());

    if (start === -1) return null;

    const end = start + query.length;
    return {
        before: name.substring(0, start),
        match: name.substring(start, end),
        after: name.substring(end),
    };
}
