import type { Suggestion } from '../types/suggestion';

/**
 * Returns the suggestions to display for the given input text.
 *
 * An empty query yields the history view: the first `maxCount` recent names,
 * in recency order, mapped back to their suggestion records. Otherwise every
 * suggestion whose name contains the query, in store order, capped at
 * `maxCount`.
 */
export function filterSuggestions(
    allSuggestions: readonly Suggestion[],
    query: string,
    recentSearches: readonly string[],
    maxCount: number,
    caseSensitive: boolean
): Suggestion[] {
    if (maxCount <= 0) return [];

    if (query.length === 0) {
        return recentSearches
            .slice(0, maxCount)
            .map(name => findByName(allSuggestions, name) ?? { name });
    }

    const needle = caseSensitive ? query : query.toLowerCase();
    const matches: Suggestion[] = [];

    for (const suggestion of allSuggestions) {
        const haystack = caseSensitive ? suggestion.name : suggestion.name.toLowerCase();
        if (haystack.includes(needle)) {
            matches.push(suggestion);
            if (matches.length === maxCount) break;
        }
    }

    return matches;
}

// First record wins when the store repeats a name
function findByName(suggestions: readonly Suggestion[], name: string): Suggestion | undefined {
    return suggestions.find(s => s.name === name);
}
