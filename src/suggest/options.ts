import { config } from '../config';
import { ConfigError } from '../utils/errors';
import {
    DISPLAY_STYLES,
    type ResolvedSuggestFieldOptions,
    type SuggestFieldOptions,
} from '../types/suggestion';

/**
 * Applies defaults and checks the filtering options.
 * @throws ConfigError for a negative or fractional `maxSuggestions`, a
 * negative or non-finite `debounceTime`, or an unknown `displayStyle`.
 */
export function resolveOptions(options: SuggestFieldOptions): ResolvedSuggestFieldOptions {
    const maxSuggestions = options.maxSuggestions ?? config.MAX_SUGGESTIONS;
    if (!Number.isInteger(maxSuggestions) || maxSuggestions < 0) {
        throw new ConfigError(
            'maxSuggestions',
            `maxSuggestions must be a non-negative integer, got ${maxSuggestions}`
        );
    }

    const debounceTime = options.debounceTime ?? config.DEBOUNCE_TIME_MS;
    if (!Number.isFinite(debounceTime) || debounceTime < 0) {
        throw new ConfigError(
            'debounceTime',
            `debounceTime must be a non-negative number of milliseconds, got ${debounceTime}`
        );
    }

    const displayStyle = options.displayStyle ?? config.DISPLAY_STYLE;
    if (!DISPLAY_STYLES.includes(displayStyle)) {
        throw new ConfigError('displayStyle', `Unknown displayStyle "${displayStyle}"`);
    }

    return {
        suggestions: [...options.suggestions],
        maxSuggestions,
        enableHistory: options.enableHistory ?? config.ENABLE_HISTORY,
        displayStyle,
        debounceTime,
        caseSensitive: options.caseSensitive ?? config.CASE_SENSITIVE,
        recentSearches: options.recentSearches ?? [],
    };
}
