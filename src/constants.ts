/**
 * Application Constants
 */

/** Environment variable for the selected-row background color */
export const HIGHLIGHT_COLOR_ENV = "LOGPANE_HIGHLIGHT_COLOR";

/** Environment variable for the search-match background color */
export const MATCH_COLOR_ENV = "LOGPANE_MATCH_COLOR";

/**
 * Reserved lines for the LogViewer layout.
 * Accounts for: header(2) + footer hints(2)
 */
export const VIEWER_RESERVED_LINES = 4;

/**
 * Minimum rows given to the list in the viewer
 */
export const MIN_LIST_HEIGHT = 3;

/** Frame size used by `print` when no size is given */
export const DEFAULT_PRINT_WIDTH = 80;
export const DEFAULT_PRINT_HEIGHT = 24;
