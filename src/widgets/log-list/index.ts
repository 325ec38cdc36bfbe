/**
 * Log list widget barrel export
 */

export { LogListItem } from "./item.js";
export { LogListModel, LIST_KEY_BINDINGS } from "./model.js";
export { LogListState } from "./state.js";
export { LogList, DEFAULT_LOG_LIST_OPTIONS } from "./renderer.js";
export type { LogListOptions } from "./renderer.js";
export { composeLines, measureHeight, cellWidth, lineText, DEFAULT_MATCH_STYLE } from "./line-composer.js";
export type { ComposeStyles } from "./line-composer.js";
export { computeWindow, clampSelection } from "./window.js";
export { renderToLines } from "./frame.js";
export type { FrameOptions } from "./frame.js";
export type { ViewportWindow, WindowInput } from "./window.js";
