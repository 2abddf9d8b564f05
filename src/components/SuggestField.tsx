import React, { useCallback, useId, useRef } from 'react';
import { useTranslation } from 'react-i18next';
import { useSuggestField } from '../hooks/useSuggestField';
import { useFloatingPanel } from '../hooks/useFloatingPanel';
import { SuggestionPanel, type SuggestionPanelRef } from './SuggestionPanel';
import { config } from '../config';
import type { Suggestion, SuggestFieldOptions } from '../types/suggestion';
import './SuggestField.css';

export interface SuggestFieldProps extends SuggestFieldOptions {
    id?: string;
    className?: string;
    placeholder?: string;
    showClearButton?: boolean;
    autoCorrect?: boolean;
    /** Height of one suggestion row in px; the panel shows at most `maxSuggestions` rows. */
    suggestionItemHeight?: number;
    gridColumns?: number;
    prefixIcon?: React.ReactNode;
    suffixIcon?: React.ReactNode;
    /** Renders a suggestion's `tag`. Without it tags are not shown. */
    renderIcon?: (tag: string) => React.ReactNode;
}

export const SuggestField: React.FC<SuggestFieldProps> = ({
    id,
    className,
    placeholder,
    showClearButton = config.SHOW_CLEAR_BUTTON,
    autoCorrect = true,
    suggestionItemHeight = config.SUGGESTION_ITEM_HEIGHT,
    gridColumns = config.GRID_COLUMNS,
    prefixIcon,
    suffixIcon,
    renderIcon,
    ...options
}) => {
    const { t } = useTranslation();
    const { state, options: resolved, actions } = useSuggestField(options);

    const generatedId = useId();
    const inputId = id ?? `suggest-field-${generatedId}`;
    const panelId = `${inputId}-suggestions`;

    const containerRef = useRef<HTMLDivElement>(null);
    const floatingRef = useRef<HTMLDivElement>(null);
    const panelRef = useRef<SuggestionPanelRef>(null);
    const inputRef = useRef<HTMLInputElement>(null);

    const { text, filter } = state;
    const isOpen = filter.suggestions.length > 0;
    const maxHeight = suggestionItemHeight * resolved.maxSuggestions;

    useFloatingPanel(containerRef, floatingRef, isOpen, maxHeight);

    // Drop DOM focus too, so focusing the field again shows the history view
    const handleSelect = useCallback((suggestion: Suggestion) => {
        actions.select(suggestion);
        inputRef.current?.blur();
    }, [actions]);

    const handleKeyDown = useCallback((event: React.KeyboardEvent<HTMLInputElement>) => {
        if (panelRef.current?.onKeyDown(event)) {
            event.preventDefault();
            return;
        }

        if (event.key === 'Enter') {
            actions.submit();
        } else if (event.key === 'Escape' && isOpen) {
            event.preventDefault();
            actions.dismiss();
        }
    }, [actions, isOpen]);

    return (
        <div className={`suggest-field ${className ?? ''}`} ref={containerRef}>
            <div className="suggest-field-input-row">
                {prefixIcon && <span className="suggest-field-prefix">{prefixIcon}</span>}
                <input
                    ref={inputRef}
                    id={inputId}
                    type="text"
                    role="combobox"
                    aria-expanded={isOpen}
                    aria-controls={panelId}
                    aria-autocomplete="list"
                    autoComplete="off"
                    autoCorrect={autoCorrect ? 'on' : 'off'}
                    spellCheck={autoCorrect}
                    className="suggest-field-input"
                    value={text}
                    placeholder={placeholder}
                    onChange={(e) => actions.changeText(e.target.value)}
                    onFocus={actions.focus}
                    onBlur={actions.blur}
                    onKeyDown={handleKeyDown}
                />
                {filter.loading && (
                    <span className="suggest-field-spinner" role="status" aria-label={t('suggestField.loading')} />
                )}
                {showClearButton && text.length > 0 && (
                    <button
                        type="button"
                        className="suggest-field-clear"
                        aria-label={t('suggestField.clear')}
                        onMouseDown={(e) => e.preventDefault()}
                        onClick={actions.clear}
                    >
                        ×
                    </button>
                )}
                {suffixIcon && <span className="suggest-field-suffix">{suffixIcon}</span>}
            </div>

            {isOpen && (
                <div className="suggest-field-floating" ref={floatingRef}>
                    <SuggestionPanel
                        ref={panelRef}
                        id={panelId}
                        items={filter.suggestions}
                        displayStyle={resolved.displayStyle}
                        text={text}
                        caseSensitive={resolved.caseSensitive}
                        gridColumns={gridColumns}
                        maxHeight={maxHeight}
                        caption={text.length === 0 ? t('suggestField.recent') : undefined}
                        onSelect={handleSelect}
                        renderIcon={renderIcon}
                    />
                </div>
            )}
        </div>
    );
};
