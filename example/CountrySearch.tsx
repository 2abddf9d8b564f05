import { useState } from 'react';
import { I18nextProvider } from 'react-i18next';
import type { i18n } from 'i18next';
import { SuggestField } from '../src/components/SuggestField';
import type { Suggestion } from '../src/types/suggestion';

const COUNTRIES: Suggestion[] = [
    'United States',
    'United Kingdom',
    'Canada',
    'Australia',
    'Germany',
    'France',
    'Italy',
    'Spain',
    'Japan',
    'China',
    'India',
    'Brazil',
    'Mexico',
    'Russia',
    'South Korea',
].map(name => ({ name, tag: 'flag' }));

export interface CountrySearchProps {
    /** Instance from `createSuggestFieldI18n()`, or the app's own with the field's labels merged in. */
    i18n: i18n;
}

export function CountrySearch({ i18n }: CountrySearchProps) {
    const [selectedCountry, setSelectedCountry] = useState('');

    return (
        <I18nextProvider i18n={i18n}>
            <div className="country-search">
                <h2>Country Name</h2>
                <SuggestField
                    suggestions={COUNTRIES}
                    onSelected={(country) => setSelectedCountry(country.name)}
                    placeholder="Search Country"
                    renderIcon={(tag) => <span aria-hidden="true" data-icon={tag}>⚑</span>}
                />

                {selectedCountry && (
                    <p className="country-search-selected">
                        <strong>Selected Country: </strong>
                        <span>{selectedCountry}</span>
                    </p>
                )}
            </div>
        </I18nextProvider>
    );
}
