/**
 * Settings Defaults
 *
 * Default values and getter functions for viewer settings.
 * Getters check settings object first, then fall back to environment variables,
 * then fall back to hardcoded defaults.
 */

import { HIGHLIGHT_COLOR_ENV, MATCH_COLOR_ENV } from "../constants.js";
import { parseColorName } from "../terminal/style.js";
import type { ColorName } from "../terminal/types.js";
import type { LogListOptions } from "../widgets/log-list/renderer.js";
import type { LogLevel, ViewerSettings } from "./types.js";

/**
 * Default values for viewer settings
 */
export const DEFAULTS = {
  /** Default selected-row background */
  highlightColor: "blue" as ColorName,
  /** Default search-match background */
  matchColor: "yellow" as ColorName,
  /** Default log level */
  logLevel: "info" as LogLevel,
} as const;

/**
 * Get the selected-row background color.
 *
 * Priority:
 * 1. settings.highlightColor (if provided)
 * 2. LOGPANE_HIGHLIGHT_COLOR environment variable, when it names a known color
 * 3. Default: "blue"
 */
export function getHighlightColor(settings?: ViewerSettings): ColorName {
  if (settings?.highlightColor !== undefined) {
    return settings.highlightColor;
  }

  return parseColorName(process.env[HIGHLIGHT_COLOR_ENV]) ?? DEFAULTS.highlightColor;
}

/**
 * Get the search-match background color.
 *
 * Priority:
 * 1. settings.matchColor (if provided)
 * 2. LOGPANE_MATCH_COLOR environment variable, when it names a known color
 * 3. Default: "yellow"
 */
export function getMatchColor(settings?: ViewerSettings): ColorName {
  if (settings?.matchColor !== undefined) {
    return settings.matchColor;
  }

  return parseColorName(process.env[MATCH_COLOR_ENV]) ?? DEFAULTS.matchColor;
}

/**
 * Get the log level.
 *
 * Note: No environment variable - CLI argument takes precedence anyway.
 */
export function getLogLevel(settings?: ViewerSettings): LogLevel {
  return settings?.logLevel ?? DEFAULTS.logLevel;
}

/**
 * Build the list widget options from settings.
 */
export function buildListOptions(settings?: ViewerSettings): LogListOptions {
  return {
    style: {},
    highlightStyle: { bg: getHighlightColor(settings), fg: "white" },
    matchStyle: { bg: getMatchColor(settings), fg: "black" },
  };
}
