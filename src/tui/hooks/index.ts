/**
 * TUI Hooks barrel export
 */

export { useLogListModel } from "./useLogListModel.js";
export { useTerminalSize } from "./useTerminalSize.js";
export type { UseLogListModelResult } from "./useLogListModel.js";
export type { TerminalSize } from "./useTerminalSize.js";
