export { SuggestField, type SuggestFieldProps } from './components/SuggestField';
export { SuggestionPanel, type SuggestionPanelProps, type SuggestionPanelRef } from './components/SuggestionPanel';
export { HighlightedText } from './components/HighlightedText';
export { useSuggestField, type SuggestFieldActions } from './hooks/useSuggestField';
export { SuggestFieldController, type SuggestFieldListener } from './suggest/SuggestFieldController';
export { filterSuggestions } from './suggest/filter';
export { recordSelection, seedHistory } from './suggest/history';
export { splitMatch, type MatchParts } from './suggest/highlight';
export { Debouncer } from './suggest/debounce';
export { resolveOptions } from './suggest/options';
export { createSuggestFieldI18n, suggestFieldResources, type SuggestFieldLanguage } from './i18n';
export { ConfigError, formatError } from './utils/errors';
export { config, type Config } from './config';
export { DISPLAY_STYLES } from './types/suggestion';
export type * from './types/suggestion';
