import { useState, useEffect, useMemo } from 'react';
import { SuggestFieldController } from '../suggest/SuggestFieldController';
import { devError } from '../utils/errorHandler';
import type {
    ResolvedSuggestFieldOptions,
    Suggestion,
    SuggestFieldOptions,
    SuggestFieldState,
} from '../types/suggestion';

export interface SuggestFieldActions {
    changeText: (text: string) => void;
    focus: () => void;
    blur: () => void;
    select: (suggestion: Suggestion) => void;
    submit: () => void;
    clear: () => void;
    dismiss: () => void;
}

interface UseSuggestFieldResult {
    state: SuggestFieldState;
    options: ResolvedSuggestFieldOptions;
    actions: SuggestFieldActions;
}

/**
 * Binds a suggest field controller to a component.
 *
 * Filtering options are read on mount only; remount (e.g. with a new `key`)
 * to change them. Callbacks are refreshed on every render.
 */
export function useSuggestField(options: SuggestFieldOptions): UseSuggestFieldResult {
    const [controller] = useState(() => {
        try {
            return new SuggestFieldController(options);
        } catch (error) {
            devError('useSuggestField', error);
            throw error;
        }
    });
    const [state, setState] = useState<SuggestFieldState>(() => controller.getState());

    const { onSelected, onSubmitted, onChanged } = options;
    useEffect(() => {
        controller.updateCallbacks({ onSelected, onSubmitted, onChanged });
    }, [controller, onSelected, onSubmitted, onChanged]);

    useEffect(() => {
        const unsubscribe = controller.subscribe(setState);
        // Pick up anything that changed between render and subscription
        setState(controller.getState());
        return () => {
            unsubscribe();
            controller.dispose();
        };
    }, [controller]);

    const actions = useMemo<SuggestFieldActions>(() => ({
        changeText: (text) => controller.changeText(text),
        focus: () => controller.focus(),
        blur: () => controller.blur(),
        select: (suggestion) => controller.select(suggestion),
        submit: () => controller.submit(),
        clear: () => controller.clear(),
        dismiss: () => controller.dismiss(),
    }), [controller]);

    return { state, options: controller.options, actions };
}
