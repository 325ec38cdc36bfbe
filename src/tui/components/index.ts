/**
 * TUI Components barrel export
 */

export { LogViewer } from "./LogViewer.js";
