import { devWarn } from '../utils/errorHandler';

/**
 * Normalizes a caller-supplied history seed: duplicates removed (first one
 * kept), capped at `maxCount`.
 */
export function seedHistory(initial: readonly string[] | undefined, maxCount: number): string[] {
    if (!initial) return [];

    const seen = new Set<string>();
    const unique = initial.filter(name => {
        if (seen.has(name)) return false;
        seen.add(name);
        return true;
    });

    const capped = unique.slice(0, Math.max(0, maxCount));
    if (capped.length < initial.length) {
        devWarn('history', `Dropped ${initial.length - capped.length} seeded entries`, {
            maxCount,
        });
    }
    return capped;
}

/**
 * Records a selection in the history (most recent first).
 *
 * A name already present keeps its position: ordering is first-seen, not
 * most-recently-used. Returns the same array when nothing changes.
 */
export function recordSelection(
    recentSearches: readonly string[],
    name: string,
    maxCount: number,
    enabled: boolean
): readonly string[] {
    if (!enabled || recentSearches.includes(name)) return recentSearches;

    const updated = [name, ...recentSearches];
    while (updated.length > maxCount) {
        updated.pop();
    }
    return updated;
}
