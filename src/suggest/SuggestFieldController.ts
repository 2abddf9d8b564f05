import { Debouncer } from './debounce';
import { filterSuggestions } from './filter';
import { recordSelection, seedHistory } from './history';
import { resolveOptions } from './options';
import { devLog } from '../utils/errorHandler';
import type {
    ResolvedSuggestFieldOptions,
    Suggestion,
    SuggestFieldCallbacks,
    SuggestFieldOptions,
    SuggestFieldState,
} from '../types/suggestion';

export type SuggestFieldListener = (state: SuggestFieldState) => void;

const EMPTY: readonly Suggestion[] = [];

/**
 * State holder for one mounted suggest field.
 *
 * Every transition replaces the state object and notifies subscribers
 * synchronously. Text changes reach `onChanged` before the recomputation is
 * scheduled; the recomputation itself runs once per quiet period.
 */
export class SuggestFieldController {
    readonly options: ResolvedSuggestFieldOptions;

    private callbacks: SuggestFieldCallbacks;
    private state: SuggestFieldState;
    private readonly debouncer: Debouncer;
    private readonly listeners = new Set<SuggestFieldListener>();

    constructor(options: SuggestFieldOptions) {
        this.options = resolveOptions(options);
        this.callbacks = pickCallbacks(options);
        this.debouncer = new Debouncer(this.options.debounceTime);
        this.state = {
            text: '',
            focused: false,
            recentSearches: seedHistory(this.options.recentSearches, this.options.maxSuggestions),
            filter: { query: '', suggestions: EMPTY, loading: false },
        };
    }

    getState(): SuggestFieldState {
        return this.state;
    }

    subscribe(listener: SuggestFieldListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    updateCallbacks(callbacks: SuggestFieldCallbacks): void {
        this.callbacks = pickCallbacks(callbacks);
    }

    changeText(text: string): void {
        this.setState({
            ...this.state,
            text,
            filter: { ...this.state.filter, loading: true },
        });

        try {
            this.callbacks.onChanged?.(text);
        } finally {
            // loading is already set; the recomputation must still clear it
            this.debouncer.schedule(() => this.recompute());
        }
    }

    focus(): void {
        if (this.state.text.length === 0) {
            this.setState({
                ...this.state,
                focused: true,
                filter: {
                    ...this.state.filter,
                    query: '',
                    suggestions: this.compute(''),
                },
            });
            return;
        }
        this.setState({ ...this.state, focused: true });
    }

    blur(): void {
        if (!this.state.focused) return;
        this.setState({ ...this.state, focused: false });
    }

    select(suggestion: Suggestion): void {
        this.debouncer.cancel();

        const { maxSuggestions, enableHistory } = this.options;
        const recentSearches = recordSelection(
            this.state.recentSearches,
            suggestion.name,
            maxSuggestions,
            enableHistory
        );
        if (recentSearches !== this.state.recentSearches) {
            devLog('SuggestField', `Added "${suggestion.name}" to history`);
        }

        this.setState({
            text: suggestion.name,
            focused: false,
            recentSearches,
            filter: { query: suggestion.name, suggestions: EMPTY, loading: false },
        });

        this.callbacks.onSelected(suggestion);
    }

    submit(): void {
        this.callbacks.onSubmitted?.(this.state.text);
    }

    clear(): void {
        this.setState({
            ...this.state,
            filter: { ...this.state.filter, suggestions: EMPTY },
        });
        this.changeText('');
    }

    dismiss(): void {
        this.debouncer.cancel();
        this.setState({
            ...this.state,
            filter: { ...this.state.filter, suggestions: EMPTY, loading: false },
        });
    }

    dispose(): void {
        if (this.debouncer.isPending) {
            devLog('SuggestField', 'Cancelled pending recomputation on dispose');
        }
        this.debouncer.cancel();
        this.listeners.clear();
    }

    private recompute(): void {
        const query = this.state.text;
        this.setState({
            ...this.state,
            filter: { query, suggestions: this.compute(query), loading: false },
        });
    }

    private compute(query: string): Suggestion[] {
        const { suggestions, maxSuggestions, caseSensitive } = this.options;
        return filterSuggestions(
            suggestions,
            query,
            this.state.recentSearches,
            maxSuggestions,
            caseSensitive
        );
    }

    private setState(next: SuggestFieldState): void {
        this.state = next;
        for (const listener of [...this.listeners]) {
            listener(next);
        }
    }
}

function pickCallbacks({ onSelected, onSubmitted, onChanged }: SuggestFieldCallbacks): SuggestFieldCallbacks {
    return { onSelected, onSubmitted, onChanged };
}
