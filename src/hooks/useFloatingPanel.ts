import { useEffect, type RefObject } from 'react';
import { autoUpdate, computePosition, flip, offset, shift, size } from '@floating-ui/dom';
import { config } from '../config';
import { devError } from '../utils/errorHandler';

/**
 * Keeps the suggestion panel pinned under its input while open.
 * The panel height is clamped to `maxHeight` or the space left in the viewport.
 */
export function useFloatingPanel(
    referenceRef: RefObject<HTMLElement>,
    floatingRef: RefObject<HTMLElement>,
    open: boolean,
    maxHeight: number
): void {
    useEffect(() => {
        const reference = referenceRef.current;
        const floating = floatingRef.current;
        if (!open || !reference || !floating) return;

        const update = () => {
            computePosition(reference, floating, {
                strategy: 'absolute',
                placement: 'bottom-start',
                middleware: [
                    offset(config.PANEL_OFFSET_PX),
                    flip({ padding: config.VIEWPORT_PADDING_PX }),
                    shift({ padding: config.VIEWPORT_PADDING_PX }),
                    size({
                        padding: config.VIEWPORT_PADDING_PX,
                        apply({ availableHeight, rects, elements }) {
                            const maxH = Math.min(maxHeight, Math.max(0, availableHeight));
                            Object.assign(elements.floating.style, {
                                maxHeight: `${maxH}px`,
                                minWidth: `${rects.reference.width}px`,
                            });
                        },
                    }),
                ],
            })
                .then(({ x, y }) => {
                    Object.assign(floating.style, {
                        left: `${Math.round(x)}px`,
                        top: `${Math.round(y)}px`,
                    });
                })
                .catch((error: unknown) => {
                    devError('useFloatingPanel', error);
                });
        };

        return autoUpdate(reference, floating, update);
    }, [referenceRef, floatingRef, open, maxHeight]);
}
