/**
 * useLogListModel Hook
 *
 * Bridges the mutable LogListModel into React: every mutation made
 * through the returned helpers schedules a re-render.
 */

import { useCallback, useState } from "react";
import type { KeyEvent } from "../../terminal/keys.js";
import type { LogListModel } from "../../widgets/log-list/model.js";

export interface UseLogListModelResult {
  /** Current search query */
  query: string;
  /** Route a key to the list; re-renders when the list consumed it */
  handleKey: (event: KeyEvent) => boolean;
  setQuery: (query: string) => void;
  setFocused: (focused: boolean) => void;
}

export function useLogListModel(model: LogListModel): UseLogListModelResult {
  const [query, setQueryState] = useState(() => model.findText());
  const [, setRevision] = useState(0);

  const refresh = useCallback(() => {
    setRevision((revision) => revision + 1);
  }, []);

  const handleKey = useCallback(
    (event: KeyEvent) => {
      // Key routing to the list only happens while it holds focus
      if (!model.isFocused()) {
        return false;
      }
      const consumed = model.onKey(event);
      if (consumed) {
        refresh();
      }
      return consumed;
    },
    [model, refresh],
  );

  const setQuery = useCallback(
    (value: string) => {
      model.setFindText(value);
      setQueryState(value);
    },
    [model],
  );

  const setFocused = useCallback(
    (focused: boolean) => {
      if (focused) {
        model.focus();
      } else {
        model.blur();
      }
      refresh();
    },
    [model, refresh],
  );

  return { query, handleKey, setQuery, setFocused };
}
