/**
 * Frame Rendering
 *
 * Draws one frame of a log list model into a fresh cell buffer. Shared by
 * the interactive viewer and the headless print command.
 */

import { CellBuffer } from "../../terminal/buffer.js";
import type { LogListModel } from "./model.js";
import { LogList, type LogListOptions } from "./renderer.js";

export interface FrameOptions {
  width: number;
  height: number;
  options?: Partial<LogListOptions>;
  noColor?: boolean;
}

/**
 * Render the model into a fresh buffer and return its rows.
 * The model's scroll offset is updated as in an interactive frame.
 */
export function renderToLines(model: LogListModel, { width, height, options, noColor }: FrameOptions): string[] {
  const buffer = new CellBuffer(width, height);
  new LogList(model.items, options).render(buffer.area, buffer, model.state);
  return buffer.toAnsiLines({ noColor });
}
