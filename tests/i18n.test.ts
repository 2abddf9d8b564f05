import { describe, it, expect } from 'vitest';
import { createSuggestFieldI18n, suggestFieldResources } from '../src/i18n';

describe('createSuggestFieldI18n', () => {
    it('should default to English labels', async () => {
        const i18n = await createSuggestFieldI18n();
        expect(i18n.t('suggestField.clear')).toBe('Clear');
        expect(i18n.t('suggestField.recent')).toBe('Recent searches');
    });

    it('should translate into German', async () => {
        const i18n = await createSuggestFieldI18n('de');
        expect(i18n.t('suggestField.clear')).toBe('Leeren');
    });

    it('should create independent instances', async () => {
        const en = await createSuggestFieldI18n('en');
        const de = await createSuggestFieldI18n('de');
        expect(en).not.toBe(de);
        expect(en.language).toBe('en');
    });

    it('should define the same keys for every language', () => {
        expect(Object.keys(suggestFieldResources.de.translation.suggestField).sort())
            .toEqual(Object.keys(suggestFieldResources.en.translation.suggestField).sort());
    });
});
