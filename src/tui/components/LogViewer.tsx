/**
 * LogViewer Component
 *
 * Full-screen log list with search. Draws the list through the cell
 * buffer widget and dynamically adjusts to terminal size.
 */

import React, { useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import { MIN_LIST_HEIGHT, VIEWER_RESERVED_LINES } from "../../constants.js";
import { fromInkInput } from "../../terminal/keys.js";
import type { LogListModel } from "../../widgets/log-list/model.js";
import type { LogListOptions } from "../../widgets/log-list/renderer.js";
import { renderToLines } from "../../widgets/log-list/frame.js";
import { useLogListModel } from "../hooks/useLogListModel.js";
import { useTerminalSize } from "../hooks/useTerminalSize.js";

interface LogViewerProps {
  model: LogListModel;
  options?: Partial<LogListOptions>;
  title?: string;
  noColor?: boolean;
  onExit: () => void;
}

export function LogViewer({ model, options, title = "Logs", noColor, onExit }: LogViewerProps): React.ReactElement {
  const { width, contentHeight } = useTerminalSize(VIEWER_RESERVED_LINES);
  const { query, handleKey, setQuery, setFocused } = useLogListModel(model);
  const [findMode, setFindMode] = useState(false);

  // The list takes keys unless the search input is open
  useEffect(() => {
    setFocused(!findMode);
  }, [findMode, setFocused]);

  useInput((input, key) => {
    if (findMode) {
      if (key.escape) {
        setFindMode(false);
      }
      return;
    }

    if (key.escape || input === "q") {
      onExit();
      return;
    }

    if (input === "/") {
      setFindMode(true);
      return;
    }

    handleKey(fromInkInput(input, key));
  });

  const listHeight = Math.max(MIN_LIST_HEIGHT, contentHeight);
  const lines = model.length > 0 ? renderToLines(model, { width, height: listHeight, options, noColor }) : [];
  const selected = model.selected();

  return (
    <Box flexDirection="column" width={width}>
      {/* Header */}
      <Box justifyContent="space-between" marginBottom={1}>
        <Text bold color={model.isFocused() ? "cyan" : "gray"}>
          {title}
        </Text>
        {model.length > 0 && (
          <Text dimColor>
            {selected === null ? "-" : Math.min(selected, model.length - 1) + 1}/{model.length} entries{query ? ` | find: ${query}` : ""}
          </Text>
        )}
      </Box>

      {/* Log lines */}
      <Box flexDirection="column" height={listHeight}>
        {lines.map((line, index) => (
          <Text key={index} wrap="truncate-end">
            {line}
          </Text>
        ))}
        {model.length === 0 && <Text dimColor>No logs yet</Text>}
      </Box>

      {/* Footer hints */}
      <Box marginTop={1}>
        {findMode ? (
          <>
            <Text color="yellow">/</Text>
            <TextInput value={query} onChange={setQuery} onSubmit={() => setFindMode(false)} placeholder="search" />
            <Text dimColor> | Enter/ESC done</Text>
          </>
        ) : (
          <Text dimColor>↑↓ move | / find | q quit</Text>
        )}
      </Box>
    </Box>
  );
}
