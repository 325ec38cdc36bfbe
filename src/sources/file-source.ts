/**
 * Log File Source
 *
 * Loads a log file once and turns its lines into list items.
 */

import { readFile } from "fs/promises";
import stripAnsi from "strip-ansi";
import type { Style } from "../terminal/types.js";
import { LogListItem } from "../widgets/log-list/item.js";
import { LogListModel } from "../widgets/log-list/model.js";
import { getLogger } from "../utils/logger.js";

export type LogLineLevel = "error" | "warn" | "info" | "debug" | "trace" | "unknown";

const LEVEL_PATTERN = /\b(ERROR|FATAL|WARN|WARNING|INFO|DEBUG|TRACE)\b/;

/**
 * Split raw file text into log lines. A single trailing newline does not
 * produce an empty last line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Read a log file from disk.
 */
export async function readLogFile(path: string): Promise<string[]> {
  const text = await readFile(path, "utf-8");
  const lines = splitLines(text);
  getLogger().debug({ path, lines: lines.length }, "Loaded log file");
  return lines;
}

/**
 * Detect the severity keyword of a log line (first match wins).
 * Colour escapes around the keyword are ignored.
 */
export function detectLevel(line: string): LogLineLevel {
  const match = LEVEL_PATTERN.exec(stripAnsi(line));
  switch (match?.[1]) {
    case "ERROR":
    case "FATAL":
      return "error";
    case "WARN":
    case "WARNING":
      return "warn";
    case "INFO":
      return "info";
    case "DEBUG":
      return "debug";
    case "TRACE":
      return "trace";
    default:
      return "unknown";
  }
}

function getLevelStyle(level: LogLineLevel): Style {
  switch (level) {
    case "error":
      return { fg: "red" };
    case "warn":
      return { fg: "yellow" };
    case "debug":
    case "trace":
      return { fg: "gray" };
    default:
      return {};
  }
}

/**
 * Build a list item for a log line, coloured by its level.
 */
export function createItem(line: string): LogListItem {
  return new LogListItem(line, getLevelStyle(detectLevel(line)));
}

/**
 * Build a model holding every line, with an optional initial query.
 */
export function createModel(lines: readonly string[], query = ""): LogListModel {
  const model = new LogListModel();
  for (const line of lines) {
    model.push(createItem(line));
  }
  model.setFindText(query);
  return model;
}
