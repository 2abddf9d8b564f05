import { forwardRef, useEffect, useImperativeHandle, useState, useCallback, type ReactNode } from 'react';
import { HighlightedText } from './HighlightedText';
import type { Suggestion, SuggestionDisplayStyle } from '../types/suggestion';

export interface SuggestionPanelRef {
    onKeyDown: (event: { key: string }) => boolean;
}

export interface SuggestionPanelProps {
    id: string;
    items: readonly Suggestion[];
    displayStyle: SuggestionDisplayStyle;
    text: string;
    caseSensitive: boolean;
    gridColumns: number;
    maxHeight: number;
    caption?: string;
    onSelect: (suggestion: Suggestion) => void;
    renderIcon?: (tag: string) => ReactNode;
}

export const SuggestionPanel = forwardRef<SuggestionPanelRef, SuggestionPanelProps>(
    ({ id, items, displayStyle, text, caseSensitive, gridColumns, maxHeight, caption, onSelect, renderIcon }, ref) => {
        const [activeIndex, setActiveIndex] = useState(-1);

        // Reset keyboard highlight when items change
        useEffect(() => {
            setActiveIndex(-1);
        }, [items]);

        const selectItem = useCallback((index: number) => {
            const item = items[index];
            if (item) {
                onSelect(item);
            }
        }, [items, onSelect]);

        useImperativeHandle(ref, () => ({
            onKeyDown: (event: { key: string }) => {
                if (items.length === 0) return false;

                if (event.key === 'ArrowUp') {
                    setActiveIndex((prev) => (prev <= 0 ? items.length - 1 : prev - 1));
                    return true;
                }

                if (event.key === 'ArrowDown') {
                    setActiveIndex((prev) => (prev + 1) % items.length);
                    return true;
                }

                if (event.key === 'Enter' && activeIndex >= 0) {
                    selectItem(activeIndex);
                    return true;
                }

                return false;
            },
        }), [items.length, activeIndex, selectItem]);

        if (items.length === 0) {
            return null;
        }

        const icon = (suggestion: Suggestion) =>
            suggestion.tag !== undefined && renderIcon ? (
                <span className="suggest-field-icon">{renderIcon(suggestion.tag)}</span>
            ) : null;

        const itemProps = (suggestion: Suggestion, index: number) => ({
            key: `${index}:${suggestion.name}`,
            id: `${id}-option-${index}`,
            role: 'option',
            'aria-selected': index === activeIndex,
            // Keep focus in the input so blur does not race the click
            onMouseDown: (event: { preventDefault: () => void }) => event.preventDefault(),
            onClick: () => selectItem(index),
            onMouseEnter: () => setActiveIndex(index),
        });

        let body: ReactNode;
        switch (displayStyle) {
            case 'grid':
                body = (
                    <div
                        className="suggest-field-grid"
                        style={{ gridTemplateColumns: `repeat(${gridColumns}, minmax(0, 1fr))` }}
                    >
                        {items.map((suggestion, index) => {
                            const { key, ...rest } = itemProps(suggestion, index);
                            return (
                                <div
                                    key={key}
                                    {...rest}
                                    className={`suggest-field-item ${index === activeIndex ? 'is-active' : ''} ${suggestion.name === text ? 'is-selected' : ''}`}
                                >
                                    {icon(suggestion)}
                                    <span className="suggest-field-label">{suggestion.name}</span>
                                </div>
                            );
                        })}
                    </div>
                );
                break;
            case 'chips':
                body = (
                    <div className="suggest-field-chips">
                        {items.map((suggestion, index) => {
                            const { key, ...rest } = itemProps(suggestion, index);
                            return (
                                <button
                                    key={key}
                                    type="button"
                                    tabIndex={-1}
                                    {...rest}
                                    className={`suggest-field-chip ${index === activeIndex ? 'is-active' : ''}`}
                                >
                                    {icon(suggestion)}
                                    <span className="suggest-field-label">{suggestion.name}</span>
                                </button>
                            );
                        })}
                    </div>
                );
                break;
            default:
                body = items.map((suggestion, index) => {
                    const { key, ...rest } = itemProps(suggestion, index);
                    return (
                        <div
                            key={key}
                            {...rest}
                            className={`suggest-field-item ${index === activeIndex ? 'is-active' : ''}`}
                        >
                            {icon(suggestion)}
                            <HighlightedText text={suggestion.name} query={text} caseSensitive={caseSensitive} />
                        </div>
                    );
                });
        }

        return (
            <div
                id={id}
                role="listbox"
                className={`suggest-field-panel suggest-field-panel--${displayStyle}`}
                style={{ maxHeight: `${maxHeight}px` }}
            >
                {caption && <div className="suggest-field-caption">{caption}</div>}
                {body}
            </div>
        );
    }
);

SuggestionPanel.displayName = 'SuggestionPanel';
