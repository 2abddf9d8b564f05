import { describe, it, expect } from 'vitest';
import { filterSuggestions } from '../src/suggest/filter';
import type { Suggestion } from '../src/types/suggestion';

const countries: Suggestion[] = [
    { name: 'Canada', tag: 'maple' },
    { name: 'Australia' },
    { name: 'Germany', tag: 'eagle' },
];

describe('filterSuggestions', () => {
    it('returns substring matches in store order', () => {
        // "Germany" contains "an" too ("Germ-an-y")
        expect(filterSuggestions(countries, 'an', [], 5, false)).toEqual([
            { name: 'Canada', tag: 'maple' },
            { name: 'Germany', tag: 'eagle' },
        ]);
    });

    it('ignores case by default', () => {
        const result = filterSuggestions(countries, 'AUS', [], 5, false);
        expect(result.map(s => s.name)).toEqual(['Australia']);
    });

    it('respects case when caseSensitive is set', () => {
        expect(filterSuggestions(countries, 'aus', [], 5, true)).toEqual([]);
        expect(filterSuggestions(countries, 'Aus', [], 5, true).map(s => s.name)).toEqual(['Australia']);
    });

    it('truncates to the first maxCount matches', () => {
        const result = filterSuggestions(countries, 'a', [], 2, false);
        expect(result.map(s => s.name)).toEqual(['Canada', 'Australia']);
    });

    it('returns nothing for maxCount 0', () => {
        expect(filterSuggestions(countries, 'a', ['Canada'], 0, false)).toEqual([]);
        expect(filterSuggestions(countries, '', ['Canada'], 0, false)).toEqual([]);
    });

    it('returns an empty list when nothing matches', () => {
        expect(filterSuggestions(countries, 'zz', ['Canada'], 5, false)).toEqual([]);
    });

    it('returns an empty list for an empty store', () => {
        expect(filterSuggestions([], 'an', [], 5, false)).toEqual([]);
    });

    describe('empty query', () => {
        it('returns history in recency order mapped to records', () => {
            const result = filterSuggestions(countries, '', ['Germany', 'Canada'], 5, false);
            expect(result).toEqual([
                { name: 'Germany', tag: 'eagle' },
                { name: 'Canada', tag: 'maple' },
            ]);
        });

        it('caps history at maxCount', () => {
            const result = filterSuggestions(countries, '', ['Germany', 'Canada', 'Australia'], 2, false);
            expect(result.map(s => s.name)).toEqual(['Germany', 'Canada']);
        });

        it('keeps history names missing from the store, without a tag', () => {
            expect(filterSuggestions(countries, '', ['Atlantis'], 5, false)).toEqual([{ name: 'Atlantis' }]);
        });

        it('returns an empty list without history', () => {
            expect(filterSuggestions(countries, '', [], 5, false)).toEqual([]);
        });
    });

    it('maps a repeated store name to its first record', () => {
        const store: Suggestion[] = [{ name: 'Spain', tag: 'first' }, { name: 'Spain', tag: 'second' }];
        expect(filterSuggestions(store, '', ['Spain'], 5, false)).toEqual([{ name: 'Spain', tag: 'first' }]);
    });

    it('keeps every match a substring under the case policy', () => {
        const store: Suggestion[] = ['Alpha', 'alphabet', 'BETA', 'gamma', 'ALP'].map(name => ({ name }));
        const result = filterSuggestions(store, 'alp', [], 10, false);
        expect(result.map(s => s.name)).toEqual(['Alpha', 'alphabet', 'ALP']);
        for (const s of result) {
            expect(s.name.toLowerCase()).toContain('alp');
        }
    });
});
