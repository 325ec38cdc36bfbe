/**
 * LogViewer Component Tests
 */

import React from "react";
import { describe, it, expect, vi, beforeEach } from "vitest";
import { render } from "ink-testing-library";
import { LogViewer } from "../../../../src/tui/components/LogViewer.js";
import { createModel } from "../../../../src/sources/file-source.js";
import type { LogListModel } from "../../../../src/widgets/log-list/model.js";

// Mock useTerminalSize
vi.mock("../../../../src/tui/hooks/useTerminalSize.js", () => ({
  useTerminalSize: () => ({ width: 40, height: 7, contentHeight: 3 }),
}));

const DOWN = "\u001B[B";
const UP = "\u001B[A";
const CTRL_N = "\u000E";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function tenLines(): LogListModel {
  return createModel(Array.from({ length: 10 }, (_, i) => `line-${i}`));
}

describe("LogViewer", () => {
  const mockOnExit = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("shows no logs message when empty", () => {
    const { lastFrame } = render(<LogViewer model={createModel([])} onExit={mockOnExit} noColor />);

    expect(lastFrame()).toContain("No logs yet");
  });

  it("renders the first rows and the entry count", () => {
    const { lastFrame } = render(<LogViewer model={tenLines()} onExit={mockOnExit} noColor />);

    expect(lastFrame()).toContain("line-0");
    expect(lastFrame()).toContain("line-2");
    expect(lastFrame()).not.toContain("line-3");
    expect(lastFrame()).toContain("1/10 entries");
  });

  it("shows key hints", () => {
    const { lastFrame } = render(<LogViewer model={tenLines()} onExit={mockOnExit} noColor />);

    expect(lastFrame()).toContain("/ find");
    expect(lastFrame()).toContain("q quit");
  });

  it("scrolls as the selection moves down", async () => {
    const model = tenLines();
    const { lastFrame, stdin } = render(<LogViewer model={model} onExit={mockOnExit} noColor />);

    await delay(10);
    stdin.write(DOWN);
    await delay(20);
    stdin.write(DOWN);
    await delay(20);
    stdin.write(CTRL_N);
    await delay(50);

    expect(model.selected()).toBe(3);
    expect(model.state.offset).toBe(1);
    expect(lastFrame()).toContain("line-3");
    expect(lastFrame()).not.toContain("line-0");
    expect(lastFrame()).toContain("4/10 entries");
  });

  it("moves the selection up", async () => {
    const model = tenLines();
    model.select(5);
    const { stdin } = render(<LogViewer model={model} onExit={mockOnExit} noColor />);

    await delay(10);
    stdin.write(UP);
    await delay(50);

    expect(model.selected()).toBe(4);
  });

  it("calls onExit when 'q' is pressed", async () => {
    const { stdin } = render(<LogViewer model={tenLines()} onExit={mockOnExit} noColor />);

    await delay(10);
    stdin.write("q");
    await delay(50);

    expect(mockOnExit).toHaveBeenCalled();
  });

  it("edits the search query in find mode", async () => {
    const model = tenLines();
    const { lastFrame, stdin } = render(<LogViewer model={model} onExit={mockOnExit} noColor />);

    await delay(10);
    stdin.write("/");
    await delay(50);
    expect(model.isFocused()).toBe(false);

    stdin.write("9");
    await delay(50);

    expect(model.findText()).toBe("9");
    expect(lastFrame()).toContain("find: 9");

    stdin.write(DOWN);
    await delay(50);
    expect(model.selected()).toBe(0);
    expect(mockOnExit).not.toHaveBeenCalled();
  });

  it("leaves find mode on ESC and gives keys back to the list", async () => {
    const model = tenLines();
    const { stdin } = render(<LogViewer model={model} onExit={mockOnExit} noColor />);

    await delay(10);
    stdin.write("/");
    await delay(50);
    stdin.write("\u001b");
    await delay(50);

    expect(model.isFocused()).toBe(true);
    expect(mockOnExit).not.toHaveBeenCalled();

    stdin.write(DOWN);
    await delay(50);
    expect(model.selected()).toBe(1);
  });
});
