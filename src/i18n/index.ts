import i18next, { type i18n } from 'i18next';
import { initReactI18next } from 'react-i18next';
import en from './locales/en.json';
import de from './locales/de.json';

export const suggestFieldResources = {
    en: { translation: en },
    de: { translation: de },
} as const;

export type SuggestFieldLanguage = keyof typeof suggestFieldResources;

/**
 * Creates a standalone i18next instance carrying the field's labels.
 * Apps with their own i18next setup can merge `suggestFieldResources` instead.
 */
export async function createSuggestFieldI18n(language: SuggestFieldLanguage = 'en'): Promise<i18n> {
    const instance = i18next.createInstance();
    await instance.use(initReactI18next).init({
        resources: suggestFieldResources,
        lng: language,
        fallbackLng: 'en',
        interpolation: {
            escapeValue: false, // React escapes
        },
    });
    return instance;
}
