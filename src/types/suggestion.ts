export type Suggestion = {
    readonly name: string;
    readonly tag?: string;  // opaque icon identifier, resolved by the embedding app
};

export type SuggestionDisplayStyle = 'list' | 'grid' | 'chips';

export const DISPLAY_STYLES: readonly SuggestionDisplayStyle[] = ['list', 'grid', 'chips'];

export type FilterState = {
    readonly query: string;
    readonly suggestions: readonly Suggestion[];
    readonly loading: boolean;
};

export type SuggestFieldState = {
    readonly text: string;
    readonly focused: boolean;
    readonly recentSearches: readonly string[];
    readonly filter: FilterState;
};

export interface SuggestFieldCallbacks {
    onSelected: (suggestion: Suggestion) => void;
    onSubmitted?: (text: string) => void;
    onChanged?: (text: string) => void;
}

export interface SuggestFieldOptions extends SuggestFieldCallbacks {
    suggestions: readonly Suggestion[];
    maxSuggestions?: number;
    enableHistory?: boolean;
    displayStyle?: SuggestionDisplayStyle;
    /** Quiet period in milliseconds before the list is recomputed. */
    debounceTime?: number;
    caseSensitive?: boolean;
    /** Seeds the history, most recent first. */
    recentSearches?: readonly string[];
}

export type ResolvedSuggestFieldOptions = {
    readonly suggestions: readonly Suggestion[];
    readonly maxSuggestions: number;
    readonly enableHistory: boolean;
    readonly displayStyle: SuggestionDisplayStyle;
    readonly debounceTime: number;
    readonly caseSensitive: boolean;
    readonly recentSearches: readonly string[];
};
