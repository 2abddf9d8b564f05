// Default configuration for suggest fields

export const config = {
    MAX_SUGGESTIONS: 5,
    DEBOUNCE_TIME_MS: 300,
    DISPLAY_STYLE: 'list',
    ENABLE_HISTORY: true,
    CASE_SENSITIVE: false,

    // Presentation
    SUGGESTION_ITEM_HEIGHT: 50, // px, panel max height is this times MAX_SUGGESTIONS
    SHOW_CLEAR_BUTTON: true,
    GRID_COLUMNS: 2,
    PANEL_OFFSET_PX: 4,
    VIEWPORT_PADDING_PX: 8,
} as const;

export type Config = typeof config;
