/**
 * Settings Type Definitions
 */

import type { ColorName } from "../terminal/types.js";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

/** User-adjustable viewer settings; every field is optional */
export interface ViewerSettings {
  /** Background of the selected row */
  highlightColor?: ColorName | undefined;
  /** Background of search matches */
  matchColor?: ColorName | undefined;
  logLevel?: LogLevel | undefined;
}
